export {
  SessionMode,
  NO_PROGRESS,
  type SelectionMode,
  type DeckCard,
  type DailyProgress,
  type SessionPlan,
  type QueueCounts,
  type SessionSummary,
} from './types';

export {
  DEFAULT_DECK_SETTINGS,
  DeckSettingsSchema,
  Weekday,
  easyDaysMask,
  parseDeckSettings,
  isEasyDay,
  dailyLimits,
  deckSchedulerConfig,
  type DeckSettings,
  type DailyLimits,
} from './settings';

export {
  buildSession,
  planSession,
  resetReviewStates,
  countQueues,
  stateOf,
} from './build-session';

export {
  StudySession,
  SessionStatus,
  type StudySessionOptions,
  type SessionProgress,
} from './study-session';
