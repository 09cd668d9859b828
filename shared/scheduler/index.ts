/**
 * Scheduler module
 *
 * Card review state, the memory model seam and the deterministic scheduler
 * that moves cards between NEW, LEARNING, REVIEWING and RELEARNING.
 */

export {
  Phase,
  Grade,
  ALL_GRADES,
  PHASE_TRANSITIONS,
  canTransition,
  assertNever,
  initialReviewState,
  isNewState,
  checkReviewState,
  ReviewStateSchema,
  type ReviewState,
  type ReviewLog,
  type ReviewOutcome,
} from './types';

export {
  DEFAULT_SCHEDULER_CONFIG,
  SchedulerConfigSchema,
  parseSchedulerConfig,
  type SchedulerConfig,
} from './config';

export {
  FsrsMemoryModel,
  createMemoryModel,
  type MemoryModel,
  type MemoryModelOptions,
} from './memory-model';

export {
  Scheduler,
  LAPSE_STABILITY_RATIO,
  MIN_DIFFICULTY,
  MAX_DIFFICULTY,
  type IntervalPreview,
  type ReplayedReview,
} from './scheduler';

export { formatInterval } from './format';
