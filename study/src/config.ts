import { z } from 'zod';
import {
  ConfigError,
  DEFAULT_SCHEDULER_CONFIG,
  formatIssues,
  parseSchedulerConfig,
  type SchedulerConfig,
} from '@micro-recall/shared';
import type { LogLevel } from './logger';

export interface StudyConfig {
  scheduler: SchedulerConfig;
  day_rollover_hour: number;      // UTC hour at which a new study day begins
  log_level: LogLevel;
}

export const DEFAULT_DAY_ROLLOVER_HOUR = 4;

type Env = Record<string, string | undefined>;

const numberFromEnv = z
  .string()
  .trim()
  .min(1)
  .transform(value => Number(value))
  .pipe(z.number().finite());

const EnvSchema = z.object({
  MICRO_RECALL_DESIRED_RETENTION: numberFromEnv.optional(),
  MICRO_RECALL_MAXIMUM_INTERVAL: numberFromEnv.optional(),
  MICRO_RECALL_DAY_ROLLOVER_HOUR: numberFromEnv
    .pipe(z.number().int().min(0).max(23))
    .optional(),
  MICRO_RECALL_LOG_LEVEL: z.enum(['debug', 'info', 'warn', 'error', 'silent']).optional(),
});

/**
 * Read the study config from environment variables. Unset variables fall
 * back to the defaults; set but invalid ones are an error.
 * @throws ConfigError
 */
export function loadStudyConfig(env: Env = process.env): StudyConfig {
  const result = EnvSchema.safeParse(env);
  if (!result.success) {
    throw new ConfigError('Invalid environment', formatIssues(result.error.issues));
  }
  const vars = result.data;

  return {
    scheduler: parseSchedulerConfig({
      desired_retention: vars.MICRO_RECALL_DESIRED_RETENTION ?? DEFAULT_SCHEDULER_CONFIG.desired_retention,
      maximum_interval: vars.MICRO_RECALL_MAXIMUM_INTERVAL ?? DEFAULT_SCHEDULER_CONFIG.maximum_interval,
    }),
    day_rollover_hour: vars.MICRO_RECALL_DAY_ROLLOVER_HOUR ?? DEFAULT_DAY_ROLLOVER_HOUR,
    log_level: vars.MICRO_RECALL_LOG_LEVEL ?? 'info',
  };
}

/**
 * Start of the study day containing `now`, in UTC. Before the rollover hour
 * the study day is still yesterday's.
 */
export function dayStart(now: Date, rolloverHour: number = DEFAULT_DAY_ROLLOVER_HOUR): Date {
  const start = new Date(Date.UTC(now.getUTCFullYear(), now.getUTCMonth(), now.getUTCDate(), rolloverHour));
  if (start.getTime() > now.getTime()) {
    start.setUTCDate(start.getUTCDate() - 1);
  }
  return start;
}
