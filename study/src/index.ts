/**
 * @micro-recall/study
 *
 * Orchestration around the scheduling core: configuration, logging, the
 * IndexedDB repository and the study service.
 */

export { loadStudyConfig, dayStart, DEFAULT_DAY_ROLLOVER_HOUR, type StudyConfig } from './config';
export { createLogger, type Logger, type LogLevel } from './logger';
export { StudyDB, DEFAULT_DB_NAME, type DeckRow, type CardRow, type ReviewLogRow } from './db/database';
export { DexieStudyRepository, type StudyRepository, type Deck, type NewCard } from './db/repository';
export { systemClock, fixedClock, FixedClock, type Clock } from './services/clock';
export { StudyService, type StudyServiceOptions, type DeckOverview } from './services/study-service';
