import { describe, it, expect } from 'vitest';
import { ConfigError } from '@micro-recall/shared';
import { dayStart, loadStudyConfig } from './config';

describe('loadStudyConfig', () => {
  it('uses the defaults when nothing is set', () => {
    expect(loadStudyConfig({})).toEqual({
      scheduler: {
        desired_retention: 0.9,
        minimum_interval: 1,
        maximum_interval: 36500,
        learning_steps: [1, 10],
        relearning_steps: [10],
        lapse_min_interval_secs: 1,
        preserve_stability_on_lapse: true,
      },
      day_rollover_hour: 4,
      log_level: 'info',
    });
  });

  it('reads values from the environment', () => {
    const config = loadStudyConfig({
      MICRO_RECALL_DESIRED_RETENTION: '0.85',
      MICRO_RECALL_MAXIMUM_INTERVAL: '365',
      MICRO_RECALL_DAY_ROLLOVER_HOUR: '0',
      MICRO_RECALL_LOG_LEVEL: 'warn',
      UNRELATED: 'ignored',
    });

    expect(config.scheduler.desired_retention).toBe(0.85);
    expect(config.scheduler.maximum_interval).toBe(365);
    expect(config.day_rollover_hour).toBe(0);
    expect(config.log_level).toBe('warn');
  });

  it('rejects a retention target outside (0, 1)', () => {
    expect(() => loadStudyConfig({ MICRO_RECALL_DESIRED_RETENTION: '1.2' })).toThrow(ConfigError);
  });

  it('rejects values that are not numbers', () => {
    expect(() => loadStudyConfig({ MICRO_RECALL_MAXIMUM_INTERVAL: 'soon' })).toThrow(ConfigError);
  });

  it('rejects a rollover hour outside the day', () => {
    expect(() => loadStudyConfig({ MICRO_RECALL_DAY_ROLLOVER_HOUR: '24' })).toThrow(ConfigError);
  });

  it('rejects an unknown log level', () => {
    expect(() => loadStudyConfig({ MICRO_RECALL_LOG_LEVEL: 'verbose' })).toThrow(ConfigError);
  });
});

describe('dayStart', () => {
  it('starts the day at the rollover hour', () => {
    expect(dayStart(new Date('2024-06-10T15:30:00.000Z'), 4).toISOString()).toBe('2024-06-10T04:00:00.000Z');
  });

  it('belongs to the previous day before the rollover hour', () => {
    expect(dayStart(new Date('2024-06-10T02:00:00.000Z'), 4).toISOString()).toBe('2024-06-09T04:00:00.000Z');
  });

  it('handles month boundaries', () => {
    expect(dayStart(new Date('2024-03-01T01:00:00.000Z'), 4).toISOString()).toBe('2024-02-29T04:00:00.000Z');
  });

  it('is the instant itself at exactly the rollover hour', () => {
    expect(dayStart(new Date('2024-06-10T04:00:00.000Z'), 4).toISOString()).toBe('2024-06-10T04:00:00.000Z');
  });
});
