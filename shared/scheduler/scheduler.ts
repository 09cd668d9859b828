/**
 * Review Scheduler
 *
 * Pure mapping from (current state, grade, now) to (new state, log entry).
 * Never reads the clock, never mutates its input.
 *
 * Short-term phases (LEARNING, RELEARNING) walk a list of minute-based steps,
 * Anki style. The long-term phase (REVIEWING) asks the memory model for new
 * stability and difficulty and turns stability into a day interval.
 */

import { parseSchedulerConfig, type SchedulerConfig } from './config';
import { formatInterval } from './format';
import { createMemoryModel, type MemoryModel } from './memory-model';
import {
  ALL_GRADES,
  assertNever,
  canTransition,
  Grade,
  isNewState,
  Phase,
  type ReviewLog,
  type ReviewOutcome,
  type ReviewState,
} from './types';

// ============ Constants ============

const MINUTE_MS = 60 * 1000;
const DAY_MS = 24 * 60 * MINUTE_MS;
const MIN_STEP_MS = 1000;
const MIN_LAPSE_RECALL = 0.01;

export const MIN_DIFFICULTY = 1;
export const MAX_DIFFICULTY = 10;

/**
 * A lapse keeps at most this share of the previous stability. Lapses on
 * overdue cards keep less again, in proportion to the recall probability left.
 */
export const LAPSE_STABILITY_RATIO = 0.9;

// ============ Types ============

interface Memory {
  stability: number;
  difficulty: number;
}

interface Transition {
  phase: Phase;
  learning_step: number;
  memory: Memory;
  due_ms: number;
  lapse: boolean;
}

export interface IntervalPreview {
  grade: Grade;
  phase: Phase;
  due_at: string;
  interval_minutes: number;
  label: string;
}

export interface ReplayedReview {
  grade: Grade;
  reviewed_at: string;
}

// ============ Helpers ============

function clampDifficulty(difficulty: number): number {
  if (!Number.isFinite(difficulty)) return MAX_DIFFICULTY;
  return Math.min(MAX_DIFFICULTY, Math.max(MIN_DIFFICULTY, difficulty));
}

function positiveOr(value: number, fallback: number): number {
  return Number.isFinite(value) && value > 0 ? value : fallback;
}

function elapsedDays(lastReviewedAt: string | null, nowMs: number): number {
  if (!lastReviewedAt) return 0;
  return Math.max(0, (nowMs - Date.parse(lastReviewedAt)) / DAY_MS);
}

function stepDelayMs(minutes: number): number {
  return Math.max(MIN_STEP_MS, Math.round(minutes * MINUTE_MS));
}

// ============ Scheduler ============

export class Scheduler {
  readonly config: SchedulerConfig;
  private readonly model: MemoryModel;

  /**
   * @throws ConfigError when the config is invalid (e.g. retention outside (0, 1))
   */
  constructor(config: Partial<SchedulerConfig> = {}, model?: MemoryModel) {
    this.config = parseSchedulerConfig(config);
    this.model = model ?? createMemoryModel({
      desired_retention: this.config.desired_retention,
      maximum_interval: this.config.maximum_interval,
    });
  }

  /**
   * Apply one grade to a card.
   */
  grade(state: ReviewState, grade: Grade, now: Date): ReviewOutcome {
    const nowMs = now.getTime();
    const elapsed = elapsedDays(state.last_reviewed_at, nowMs);
    const next = this.transition(state, grade, nowMs, elapsed);

    if (!canTransition(state.phase, next.phase)) {
      throw new Error(`Scheduler produced invalid transition ${Phase[state.phase]} -> ${Phase[next.phase]}`);
    }

    const reviewedAt = now.toISOString();
    const newState: ReviewState = {
      card_id: state.card_id,
      deck_id: state.deck_id,
      phase: next.phase,
      stability: next.memory.stability,
      difficulty: next.memory.difficulty,
      due_at: new Date(next.due_ms).toISOString(),
      last_reviewed_at: reviewedAt,
      reps: state.reps + 1,
      lapses: state.lapses + (next.lapse ? 1 : 0),
      learning_step: next.learning_step,
    };

    const log: ReviewLog = Object.freeze({
      card_id: state.card_id,
      deck_id: state.deck_id,
      grade,
      reviewed_at: reviewedAt,
      previous_phase: state.phase,
      elapsed_days: elapsed,
      state: Object.freeze({ ...newState }),
    });

    return { state: newState, log };
  }

  /**
   * What each grade would do to the card right now, for rating buttons.
   */
  preview(state: ReviewState, now: Date): IntervalPreview[] {
    return ALL_GRADES.map(grade => {
      const { state: next } = this.grade(state, grade, now);
      const dueMs = next.due_at ? Date.parse(next.due_at) : now.getTime();
      const minutes = (dueMs - now.getTime()) / MINUTE_MS;
      return {
        grade,
        phase: next.phase,
        due_at: new Date(dueMs).toISOString(),
        interval_minutes: minutes,
        label: formatInterval(minutes),
      };
    });
  }

  /**
   * Current probability of recall (1 for cards never reviewed).
   */
  retrievability(state: ReviewState, now: Date): number {
    if (isNewState(state) || state.stability === null) {
      return 1;
    }
    return this.model.retrievability(elapsedDays(state.last_reviewed_at, now.getTime()), state.stability);
  }

  /**
   * Rebuild a state by replaying reviews in order. Deterministic: the same
   * log always yields the same state.
   */
  replay(initial: ReviewState, reviews: readonly ReplayedReview[]): ReviewState {
    let state = initial;
    for (const review of reviews) {
      state = this.grade(state, review.grade, new Date(review.reviewed_at)).state;
    }
    return state;
  }

  // ============ Transitions ============

  private transition(state: ReviewState, grade: Grade, nowMs: number, elapsed: number): Transition {
    switch (state.phase) {
      case Phase.NEW:
        return this.stepTransition(Phase.LEARNING, 0, grade, this.initialMemory(grade), nowMs);

      case Phase.LEARNING:
        return this.stepTransition(Phase.LEARNING, state.learning_step, grade, this.shortTermMemory(state, grade), nowMs);

      case Phase.REVIEWING:
        return this.reviewTransition(state, grade, nowMs, elapsed);

      case Phase.RELEARNING:
        return this.stepTransition(Phase.RELEARNING, state.learning_step, grade, this.shortTermMemory(state, grade), nowMs);

      default:
        return assertNever(state.phase);
    }
  }

  /**
   * Step-based scheduling shared by LEARNING and RELEARNING.
   * AGAIN restarts the steps, HARD repeats the current one, GOOD advances
   * (graduating after the last step), EASY graduates at once.
   */
  private stepTransition(
    phase: Phase.LEARNING | Phase.RELEARNING,
    currentStep: number,
    grade: Grade,
    memory: Memory,
    nowMs: number
  ): Transition {
    const steps = phase === Phase.LEARNING ? this.config.learning_steps : this.config.relearning_steps;
    const step = Math.min(Math.max(0, currentStep), steps.length - 1);

    switch (grade) {
      case Grade.AGAIN: {
        const delay = phase === Phase.RELEARNING ? this.lapseDelayMs() : stepDelayMs(steps[0]);
        return { phase, learning_step: 0, memory, due_ms: nowMs + delay, lapse: false };
      }

      case Grade.HARD: {
        const hardDelay = (steps[step] + steps[Math.min(step + 1, steps.length - 1)]) / 2;
        return { phase, learning_step: step, memory, due_ms: nowMs + stepDelayMs(hardDelay), lapse: false };
      }

      case Grade.GOOD: {
        const nextStep = step + 1;
        if (nextStep >= steps.length) {
          return this.graduate(memory, nowMs);
        }
        return { phase, learning_step: nextStep, memory, due_ms: nowMs + stepDelayMs(steps[nextStep]), lapse: false };
      }

      case Grade.EASY:
        return this.graduate(memory, nowMs);

      default:
        return assertNever(grade);
    }
  }

  // First relearning step, but never sooner than the deck's lapse minimum
  private lapseDelayMs(): number {
    return Math.max(stepDelayMs(this.config.relearning_steps[0]), this.config.lapse_min_interval_secs * 1000);
  }

  private graduate(memory: Memory, nowMs: number): Transition {
    const days = this.boundedInterval(this.model.intervalDays(memory.stability));
    return { phase: Phase.REVIEWING, learning_step: 0, memory, due_ms: nowMs + days * DAY_MS, lapse: false };
  }

  private reviewTransition(state: ReviewState, grade: Grade, nowMs: number, elapsed: number): Transition {
    const { stability, difficulty } = this.currentMemory(state, grade);
    const retrievability = Math.min(1, Math.max(0, this.model.retrievability(elapsed, stability)));

    if (grade === Grade.AGAIN) {
      return {
        phase: Phase.RELEARNING,
        learning_step: 0,
        memory: this.lapseMemory({ stability, difficulty }, retrievability),
        due_ms: nowMs + this.lapseDelayMs(),
        lapse: true,
      };
    }

    const recall = (g: Grade.HARD | Grade.GOOD | Grade.EASY): Memory => {
      const next = positiveOr(this.model.nextRecallStability(difficulty, stability, retrievability, g), stability);
      return {
        // GOOD and EASY never lose stability
        stability: g === Grade.HARD ? next : Math.max(next, stability),
        difficulty: clampDifficulty(this.model.nextDifficulty(difficulty, g)),
      };
    };

    const hard = recall(Grade.HARD);
    const good = recall(Grade.GOOD);
    const easy = recall(Grade.EASY);

    let hardDays = this.boundedInterval(this.model.intervalDays(hard.stability));
    let goodDays = this.boundedInterval(this.model.intervalDays(good.stability));
    let easyDays = this.boundedInterval(this.model.intervalDays(easy.stability));
    hardDays = Math.min(hardDays, goodDays);
    goodDays = Math.min(Math.max(goodDays, hardDays + 1), this.config.maximum_interval);
    easyDays = Math.min(Math.max(easyDays, goodDays + 1), this.config.maximum_interval);

    const selected = grade === Grade.HARD
      ? { memory: hard, days: hardDays }
      : grade === Grade.GOOD
        ? { memory: good, days: goodDays }
        : { memory: easy, days: easyDays };

    return {
      phase: Phase.REVIEWING,
      learning_step: 0,
      memory: selected.memory,
      due_ms: nowMs + selected.days * DAY_MS,
      lapse: false,
    };
  }

  // ============ Memory ============

  private initialMemory(grade: Grade): Memory {
    return {
      stability: positiveOr(this.model.initialStability(grade), 0.1),
      difficulty: clampDifficulty(this.model.initialDifficulty(grade)),
    };
  }

  /**
   * Stored memory of a reviewed card. A reviewed state without memory fields
   * breaks the ReviewState invariant; it is treated like a first review.
   */
  private currentMemory(state: ReviewState, grade: Grade): Memory {
    if (state.stability === null || state.difficulty === null || !(state.stability > 0)) {
      return this.initialMemory(grade);
    }
    return { stability: state.stability, difficulty: state.difficulty };
  }

  /**
   * The loss of an on-time lapse is fixed by the model at the target
   * retention. An overdue card keeps `retrievability / desired_retention` of
   * that, so the later the lapse, the lower the new stability.
   */
  private lapseMemory(current: Memory, retrievability: number): Memory {
    const ceiling = current.stability * LAPSE_STABILITY_RATIO;
    const onTime = this.config.preserve_stability_on_lapse
      ? {
        stability: positiveOr(
          this.model.nextForgetStability(current.difficulty, current.stability, this.config.desired_retention),
          ceiling
        ),
        difficulty: clampDifficulty(this.model.nextDifficulty(current.difficulty, Grade.AGAIN)),
      }
      : this.initialMemory(Grade.AGAIN);
    const recall = Number.isFinite(retrievability) ? Math.max(MIN_LAPSE_RECALL, retrievability) : 1;
    const overdue = Math.min(1, recall / this.config.desired_retention);

    return {
      stability: Math.min(onTime.stability, ceiling) * overdue,
      difficulty: onTime.difficulty,
    };
  }

  private shortTermMemory(state: ReviewState, grade: Grade): Memory {
    const current = this.currentMemory(state, grade);
    return {
      stability: positiveOr(this.model.nextShortTermStability(current.stability, grade), current.stability),
      difficulty: clampDifficulty(this.model.nextDifficulty(current.difficulty, grade)),
    };
  }

  private boundedInterval(days: number): number {
    if (!Number.isFinite(days)) return this.config.maximum_interval;
    return Math.min(this.config.maximum_interval, Math.max(this.config.minimum_interval, Math.round(days)));
  }
}
