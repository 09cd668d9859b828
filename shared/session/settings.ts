import { z } from 'zod';
import { ConfigError, formatIssues } from '../errors';
import type { SchedulerConfig } from '../scheduler/config';

// Bit positions in `easy_days_mask`
export enum Weekday {
  MONDAY = 0,
  TUESDAY = 1,
  WEDNESDAY = 2,
  THURSDAY = 3,
  FRIDAY = 4,
  SATURDAY = 5,
  SUNDAY = 6,
}

export interface DeckSettings {
  new_cards_per_day: number;
  review_limit_per_day: number;
  micro_session_size: number;     // cards per due_and_new session
  protect_overload: boolean;      // apply review_limit_per_day at all
  shuffle_new: boolean;
  easy_days_enabled: boolean;
  easy_day_load_factor: number;   // (0, 1], scales both daily limits on easy days
  easy_days_mask: number;         // one bit per Weekday
  fsrs_target_retention: number;
  min_interval_days: number;
  max_interval_days: number;
  lapse_min_interval_secs: number;
  preserve_stability_on_lapse: boolean;
}

export type DailyLimits = Pick<DeckSettings, 'new_cards_per_day' | 'review_limit_per_day'>;

export function easyDaysMask(...days: Weekday[]): number {
  return days.reduce((mask, day) => mask | (1 << day), 0);
}

// Small on purpose: a session should take a couple of minutes
export const DEFAULT_DECK_SETTINGS: Readonly<DeckSettings> = {
  new_cards_per_day: 5,
  review_limit_per_day: 30,
  micro_session_size: 5,
  protect_overload: true,
  shuffle_new: false,
  easy_days_enabled: false,
  easy_day_load_factor: 0.5,
  easy_days_mask: easyDaysMask(Weekday.SATURDAY, Weekday.SUNDAY),
  fsrs_target_retention: 0.9,
  min_interval_days: 1,
  max_interval_days: 36500,
  lapse_min_interval_secs: 600,   // same as the first relearning step
  preserve_stability_on_lapse: true,
};

const positiveCount = (field: string) =>
  z.number({ invalid_type_error: `${field} must be a number` })
    .int(`${field} must be an integer`)
    .positive(`${field} must be greater than 0`);

export const DeckSettingsSchema = z
  .object({
    new_cards_per_day: positiveCount('new_cards_per_day'),
    review_limit_per_day: positiveCount('review_limit_per_day'),
    micro_session_size: positiveCount('micro_session_size'),
    protect_overload: z.boolean(),
    shuffle_new: z.boolean(),
    easy_days_enabled: z.boolean(),
    easy_day_load_factor: z
      .number()
      .gt(0, 'easy_day_load_factor must be greater than 0')
      .max(1, 'easy_day_load_factor must be at most 1'),
    easy_days_mask: z.number().int().min(0).max(easyDaysMask(
      Weekday.MONDAY, Weekday.TUESDAY, Weekday.WEDNESDAY, Weekday.THURSDAY,
      Weekday.FRIDAY, Weekday.SATURDAY, Weekday.SUNDAY
    )),
    fsrs_target_retention: z
      .number()
      .gt(0, 'fsrs_target_retention must be greater than 0')
      .lt(1, 'fsrs_target_retention must be less than 1'),
    min_interval_days: positiveCount('min_interval_days'),
    max_interval_days: positiveCount('max_interval_days'),
    lapse_min_interval_secs: positiveCount('lapse_min_interval_secs'),
    preserve_stability_on_lapse: z.boolean(),
  })
  .superRefine((settings, ctx) => {
    if (settings.min_interval_days > settings.max_interval_days) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        path: ['min_interval_days'],
        message: 'min_interval_days must not exceed max_interval_days',
      });
    }
    if (settings.easy_days_enabled && settings.easy_days_mask === 0) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        path: ['easy_days_mask'],
        message: 'easy days must include at least one day when enabled',
      });
    }
  });

/**
 * Validate deck settings. Fields left out are taken from `defaults`;
 * invalid values are rejected, never clamped.
 * @throws ConfigError
 */
export function parseDeckSettings(
  input: unknown,
  defaults: Readonly<DeckSettings> = DEFAULT_DECK_SETTINGS
): DeckSettings {
  const candidate = typeof input === 'object' && input !== null ? { ...defaults, ...input } : input;
  const result = DeckSettingsSchema.safeParse(candidate);
  if (!result.success) {
    throw new ConfigError('Invalid deck settings', formatIssues(result.error.issues));
  }
  return result.data;
}

/**
 * Easy days go by the UTC weekday of `now`.
 */
export function isEasyDay(settings: DeckSettings, now: Date): boolean {
  if (!settings.easy_days_enabled) return false;
  // getUTCDay() counts from Sunday
  return (settings.easy_days_mask & easyDaysMask((now.getUTCDay() + 6) % 7)) !== 0;
}

export function dailyLimits(settings: DeckSettings, now: Date): DailyLimits {
  if (!isEasyDay(settings, now)) {
    return {
      new_cards_per_day: settings.new_cards_per_day,
      review_limit_per_day: settings.review_limit_per_day,
    };
  }
  const scale = (limit: number) => Math.floor(limit * settings.easy_day_load_factor);
  return {
    new_cards_per_day: scale(settings.new_cards_per_day),
    review_limit_per_day: scale(settings.review_limit_per_day),
  };
}

/**
 * The scheduler options a deck overrides. Learning steps stay global.
 */
export function deckSchedulerConfig(settings: DeckSettings): Partial<SchedulerConfig> {
  return {
    desired_retention: settings.fsrs_target_retention,
    minimum_interval: settings.min_interval_days,
    maximum_interval: settings.max_interval_days,
    lapse_min_interval_secs: settings.lapse_min_interval_secs,
    preserve_stability_on_lapse: settings.preserve_stability_on_lapse,
  };
}
