/**
 * StudySession - one practice run over a prebuilt card list
 *
 * not_started -> in_progress -> completed, one way. Each grade goes through
 * the scheduler and is recorded in order; the caller persists the outcomes.
 * A session has a single owner and its calls are sequential.
 */

import { SchedulingPreconditionError } from '../errors';
import type { Scheduler } from '../scheduler/scheduler';
import { Grade, initialReviewState, type ReviewOutcome, type ReviewState } from '../scheduler/types';
import type { SessionSummary } from './types';

export enum SessionStatus {
  NOT_STARTED = 'not_started',
  IN_PROGRESS = 'in_progress',
  COMPLETED = 'completed',
}

export interface StudySessionOptions {
  id: string;
  deck_id: string;
  card_ids: readonly string[];
  /** Current states of the listed cards; missing cards start as NEW. */
  states: readonly ReviewState[];
  scheduler: Scheduler;
}

export interface SessionProgress {
  answered: number;
  total: number;
  remaining: number;
}

interface RecordedReview {
  before: ReviewState;
  outcome: ReviewOutcome;
}

export class StudySession {
  readonly id: string;
  readonly deck_id: string;
  readonly card_ids: readonly string[];
  readonly scheduler: Scheduler;

  private readonly states = new Map<string, ReviewState>();
  private readonly recorded: RecordedReview[] = [];
  private _status = SessionStatus.NOT_STARTED;
  private cursor = 0;
  private revealed = false;
  private startedAt: string | null = null;
  private completedAt: string | null = null;
  private finished = false;       // finish() was called; the summary is out

  constructor(options: StudySessionOptions) {
    const seen = new Set<string>();
    for (const cardId of options.card_ids) {
      if (seen.has(cardId)) {
        throw new SchedulingPreconditionError(`Card ${cardId} appears twice in session`, 'DUPLICATE_CARD');
      }
      seen.add(cardId);
    }

    this.id = options.id;
    this.deck_id = options.deck_id;
    this.card_ids = [...options.card_ids];
    this.scheduler = options.scheduler;

    for (const state of options.states) {
      if (seen.has(state.card_id)) {
        this.states.set(state.card_id, state);
      }
    }
  }

  get status(): SessionStatus {
    return this._status;
  }

  // ============ Transitions ============

  start(now: Date): void {
    if (this._status !== SessionStatus.NOT_STARTED) {
      throw new SchedulingPreconditionError(`Session ${this.id} was already started`, 'SESSION_ALREADY_STARTED');
    }
    this.startedAt = now.toISOString();
    this.cursor = 0;
    this._status = SessionStatus.IN_PROGRESS;

    // Nothing to study: straight to completed with an empty summary
    if (this.card_ids.length === 0) {
      this.complete(now);
    }
  }

  reveal(): void {
    this.requireInProgress('reveal');
    this.revealed = true;
  }

  /**
   * Grade the current card. `cardId` must be the card being shown.
   */
  grade(cardId: string, grade: Grade, now: Date): ReviewOutcome {
    this.requireInProgress('grade');

    const current = this.card_ids[this.cursor];
    if (cardId !== current) {
      if (this.recorded.some(r => r.outcome.log.card_id === cardId)) {
        throw new SchedulingPreconditionError(`Card ${cardId} was already graded`, 'CARD_ALREADY_GRADED');
      }
      throw new SchedulingPreconditionError(
        `Card ${cardId} is not the current card (expected ${current})`,
        'CARD_OUT_OF_ORDER'
      );
    }

    const before = this.stateOf(current);
    const outcome = this.scheduler.grade(before, grade, now);
    this.states.set(current, outcome.state);
    this.recorded.push({ before, outcome });
    this.cursor++;
    this.revealed = false;

    if (this.cursor >= this.card_ids.length) {
      this.complete(now);
    }
    return outcome;
  }

  /**
   * End the session. Ends early when cards remain; on a completed session
   * just returns the summary.
   */
  finish(now: Date): SessionSummary {
    if (this._status === SessionStatus.NOT_STARTED) {
      throw new SchedulingPreconditionError(`Session ${this.id} has not started`, 'SESSION_NOT_STARTED');
    }
    if (this._status === SessionStatus.IN_PROGRESS) {
      this.complete(now);
    }
    this.finished = true;
    return this.summary();
  }

  /**
   * Undo the most recent grade, e.g. when it could not be stored. The grade
   * that completed the session can be undone; nothing can once the session
   * was finished.
   */
  revertLast(): ReviewOutcome {
    if (this.finished) {
      throw new SchedulingPreconditionError(`Cannot revert: session ${this.id} was finished`, 'SESSION_COMPLETED');
    }
    const last = this.recorded.pop();
    if (!last) {
      throw new SchedulingPreconditionError(`Session ${this.id} has no review to revert`, 'NOTHING_TO_REVERT');
    }
    this.states.set(last.before.card_id, last.before);
    this.cursor = this.card_ids.indexOf(last.before.card_id);
    this.revealed = false;
    this.completedAt = null;
    this._status = SessionStatus.IN_PROGRESS;
    return last.outcome;
  }

  // ============ Queries ============

  currentCardId(): string | null {
    if (this._status !== SessionStatus.IN_PROGRESS) return null;
    return this.card_ids[this.cursor] ?? null;
  }

  isRevealed(): boolean {
    return this.revealed;
  }

  progress(): SessionProgress {
    const answered = this.recorded.length;
    return { answered, total: this.card_ids.length, remaining: this.card_ids.length - answered };
  }

  reviews(): ReviewOutcome[] {
    return this.recorded.map(r => r.outcome);
  }

  stateOf(cardId: string): ReviewState {
    return this.states.get(cardId) ?? initialReviewState(cardId, this.deck_id);
  }

  summary(): SessionSummary {
    if (this._status !== SessionStatus.COMPLETED || this.startedAt === null || this.completedAt === null) {
      throw new SchedulingPreconditionError(`Session ${this.id} is not completed`, 'SESSION_NOT_COMPLETED');
    }

    const counts: Record<Grade, number> = {
      [Grade.AGAIN]: 0,
      [Grade.HARD]: 0,
      [Grade.GOOD]: 0,
      [Grade.EASY]: 0,
    };
    for (const { outcome } of this.recorded) {
      counts[outcome.log.grade]++;
    }

    return {
      session_id: this.id,
      deck_id: this.deck_id,
      started_at: this.startedAt,
      completed_at: this.completedAt,
      duration_ms: Math.max(0, Date.parse(this.completedAt) - Date.parse(this.startedAt)),
      total_reviews: this.recorded.length,
      again: counts[Grade.AGAIN],
      hard: counts[Grade.HARD],
      good: counts[Grade.GOOD],
      easy: counts[Grade.EASY],
    };
  }

  // ============ Internals ============

  private complete(now: Date): void {
    this.completedAt = now.toISOString();
    this.revealed = false;
    this._status = SessionStatus.COMPLETED;
  }

  private requireInProgress(action: string): void {
    if (this._status === SessionStatus.NOT_STARTED) {
      throw new SchedulingPreconditionError(`Cannot ${action}: session ${this.id} has not started`, 'SESSION_NOT_STARTED');
    }
    if (this._status === SessionStatus.COMPLETED) {
      throw new SchedulingPreconditionError(`Cannot ${action}: session ${this.id} is completed`, 'SESSION_COMPLETED');
    }
  }
}
