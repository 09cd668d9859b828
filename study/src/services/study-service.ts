/**
 * StudyService - wires the pure core to a clock and a repository
 *
 * Reads "now" once per operation, builds sessions from stored cards, and
 * persists every review as it happens. When a review cannot be stored the
 * session is rolled back to before that grade and the error is rethrown, so
 * the session never runs ahead of what is saved.
 */

import {
  buildSession,
  countQueues,
  DEFAULT_DECK_SETTINGS,
  deckSchedulerConfig,
  resetReviewStates,
  Scheduler,
  SchedulingPreconditionError,
  SessionMode,
  stateOf,
  StudySession,
  type DeckSettings,
  type Grade,
  type IntervalPreview,
  type QueueCounts,
  type ReviewOutcome,
  type ReviewState,
  type SessionSummary,
} from '@micro-recall/shared';
import { dayStart, loadStudyConfig, type StudyConfig } from '../config';
import type { Deck, StudyRepository } from '../db/repository';
import { createLogger, type Logger } from '../logger';
import { systemClock, type Clock } from './clock';

export interface StudyServiceOptions {
  repository: StudyRepository;
  clock?: Clock;
  config?: StudyConfig;
  logger?: Logger;
  createId?: () => string;
}

export interface DeckOverview {
  deck_id: string;
  total: number;
  due: QueueCounts;
}

export class StudyService {
  /** Settings a deck gets for the fields it leaves out. */
  readonly deckDefaults: Readonly<DeckSettings>;

  private readonly repository: StudyRepository;
  private readonly clock: Clock;
  private readonly config: StudyConfig;
  private readonly log: Logger;
  private readonly createId: () => string;

  constructor(options: StudyServiceOptions) {
    this.repository = options.repository;
    this.clock = options.clock ?? systemClock;
    this.config = options.config ?? loadStudyConfig({});
    this.log = options.logger ?? createLogger('study', this.config.log_level);
    this.createId = options.createId ?? (() => crypto.randomUUID());
    this.deckDefaults = {
      ...DEFAULT_DECK_SETTINGS,
      fsrs_target_retention: this.config.scheduler.desired_retention,
      min_interval_days: this.config.scheduler.minimum_interval,
      max_interval_days: this.config.scheduler.maximum_interval,
    };
  }

  // ============ Decks & Cards ============

  async saveDeck(deck: Deck): Promise<void> {
    await this.repository.saveDeck(
      { ...deck, settings: { ...this.deckDefaults, ...deck.settings } },
      this.clock.now()
    );
    this.log.info(`Saved deck ${deck.id}`);
  }

  async addCard(deckId: string, cardId: string): Promise<ReviewState> {
    const state = await this.repository.addCard({
      card_id: cardId,
      deck_id: deckId,
      created_at: this.clock.now().toISOString(),
    });
    this.log.debug(`Added card ${cardId} to deck ${deckId}`);
    return state;
  }

  async deckOverview(deckId: string): Promise<DeckOverview> {
    const cards = await this.repository.loadDeckCards(deckId);
    return {
      deck_id: deckId,
      total: cards.length,
      due: countQueues(cards, this.clock.now()),
    };
  }

  /**
   * Reset learning progress for the whole deck in one atomic write.
   * Returns the number of cards reset.
   */
  async resetDeck(deckId: string): Promise<number> {
    const states = await this.repository.loadReviewStates(deckId);
    const reset = resetReviewStates(states);
    await this.repository.resetDeck(deckId, reset);
    this.log.warn(`Reset learning progress of ${reset.length} cards in deck ${deckId}`);
    return reset.length;
  }

  /**
   * Scheduler for one deck: global learning steps, the deck's retention
   * target, interval bounds and lapse handling.
   */
  schedulerFor(settings: DeckSettings): Scheduler {
    return new Scheduler({ ...this.config.scheduler, ...deckSchedulerConfig(settings) });
  }

  // ============ Sessions ============

  /**
   * Build and start a session. Reset is not a session; use resetDeck.
   */
  async startSession(deckId: string, mode: SessionMode): Promise<StudySession> {
    if (mode === SessionMode.RESET) {
      throw new SchedulingPreconditionError('Reset is not a study session, use resetDeck', 'INVALID_MODE');
    }

    const now = this.clock.now();
    const [cards, settings, progress] = await Promise.all([
      this.repository.loadDeckCards(deckId),
      this.repository.loadDeckSettings(deckId),
      this.repository.countDailyProgress(deckId, dayStart(now, this.config.day_rollover_hour)),
    ]);

    const cardIds = buildSession(mode, cards, settings, now, progress);
    const session = new StudySession({
      id: this.createId(),
      deck_id: deckId,
      card_ids: cardIds,
      states: cards.map(stateOf),
      scheduler: this.schedulerFor(settings),
    });
    session.start(now);

    this.log.info(`Started ${mode} session ${session.id} for deck ${deckId} with ${cardIds.length} cards`, progress);
    return session;
  }

  /**
   * Interval previews for the card currently shown, or [] when none is.
   */
  previewCurrent(session: StudySession): IntervalPreview[] {
    const cardId = session.currentCardId();
    if (cardId === null) return [];
    return session.scheduler.preview(session.stateOf(cardId), this.clock.now());
  }

  async answer(session: StudySession, cardId: string, grade: Grade): Promise<ReviewOutcome> {
    const outcome = session.grade(cardId, grade, this.clock.now());

    try {
      await this.repository.appendReview(outcome.log, outcome.state);
    } catch (error) {
      session.revertLast();
      this.log.error(`Failed to store review of card ${cardId}, review reverted`, error);
      throw error;
    }

    this.log.debug(`Card ${cardId} graded ${grade}, due ${outcome.state.due_at}`);
    return outcome;
  }

  async finishSession(session: StudySession): Promise<SessionSummary> {
    const summary = session.finish(this.clock.now());

    try {
      await this.repository.appendSessionSummary(summary);
    } catch (error) {
      this.log.error(`Failed to store summary of session ${session.id}`, error);
      throw error;
    }

    this.log.info(
      `Finished session ${session.id}: ${summary.total_reviews} reviews in ${Math.round(summary.duration_ms / 1000)}s`
    );
    return summary;
  }
}
