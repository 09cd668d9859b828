import { z } from 'zod';
import { ConfigError, formatIssues } from '../errors';

export interface SchedulerConfig {
  desired_retention: number;      // Target recall probability, exclusive (0, 1)
  minimum_interval: number;       // Shortest gap between reviews, in days
  maximum_interval: number;       // Longest gap between reviews, in days
  learning_steps: number[];       // minutes
  relearning_steps: number[];     // minutes
  lapse_min_interval_secs: number;
  preserve_stability_on_lapse: boolean;
}

export const DEFAULT_SCHEDULER_CONFIG: Readonly<SchedulerConfig> = {
  desired_retention: 0.9,
  minimum_interval: 1,
  maximum_interval: 36500,        // ~100 years
  learning_steps: [1, 10],        // 1 min, 10 min
  relearning_steps: [10],         // 10 min
  lapse_min_interval_secs: 1,
  preserve_stability_on_lapse: true,
};

const stepList = z.array(z.number().positive().finite()).min(1, 'at least one step is required');

export const SchedulerConfigSchema = z
  .object({
    desired_retention: z
      .number()
      .gt(0, 'desired retention must be greater than 0')
      .lt(1, 'desired retention must be less than 1'),
    minimum_interval: z.number().int().min(1, 'minimum interval must be at least 1 day'),
    maximum_interval: z.number().int().min(1, 'maximum interval must be at least 1 day'),
    learning_steps: stepList,
    relearning_steps: stepList,
    lapse_min_interval_secs: z.number().int().positive('lapse minimum interval must be greater than 0'),
    preserve_stability_on_lapse: z.boolean(),
  })
  .refine(config => config.minimum_interval <= config.maximum_interval, {
    message: 'minimum interval must not exceed maximum interval',
    path: ['minimum_interval'],
  });

/**
 * Validate a (partial) scheduler config, filling gaps from the defaults.
 */
export function parseSchedulerConfig(input: Partial<SchedulerConfig> = {}): SchedulerConfig {
  const result = SchedulerConfigSchema.safeParse({ ...DEFAULT_SCHEDULER_CONFIG, ...input });
  if (!result.success) {
    throw new ConfigError('Invalid scheduler config', formatIssues(result.error.issues));
  }
  return result.data;
}
