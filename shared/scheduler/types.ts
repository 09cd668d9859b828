/**
 * Review state data model.
 *
 * A card's scheduling snapshot, the grades a learner can give, and the
 * append-only log entry written for every review. Timestamps are ISO-8601
 * strings; "now" is always passed in by the caller as a Date.
 */

import { z } from 'zod';

// ============ Enums ============

// Card phase - numeric values match the ts-fsrs State enum
export enum Phase {
  NEW = 0,
  LEARNING = 1,
  REVIEWING = 2,
  RELEARNING = 3,
}

export enum Grade {
  AGAIN = 0,
  HARD = 1,
  GOOD = 2,
  EASY = 3,
}

export const ALL_GRADES: readonly Grade[] = [Grade.AGAIN, Grade.HARD, Grade.GOOD, Grade.EASY];

// ============ Review State ============

export interface ReviewState {
  card_id: string;
  deck_id: string;
  phase: Phase;
  stability: number | null;       // days until recall probability decays to the target
  difficulty: number | null;      // 1 (easy) to 10 (hard)
  due_at: string | null;
  last_reviewed_at: string | null;
  reps: number;                   // every grade counts
  lapses: number;                 // AGAIN while REVIEWING
  learning_step: number;          // index into learning/relearning steps, 0 otherwise
}

/**
 * Immutable record of one review. `state` is the state the review produced.
 */
export interface ReviewLog {
  readonly card_id: string;
  readonly deck_id: string;
  readonly grade: Grade;
  readonly reviewed_at: string;
  readonly previous_phase: Phase;
  readonly elapsed_days: number;
  readonly state: Readonly<ReviewState>;
}

export interface ReviewOutcome {
  state: ReviewState;
  log: ReviewLog;
}

// ============ Phase Transitions ============

/**
 * Every phase change the scheduler may perform. Staying in place is always
 * allowed and listed explicitly so the table reads as the full state machine.
 */
export const PHASE_TRANSITIONS: Readonly<Record<Phase, readonly Phase[]>> = {
  [Phase.NEW]: [Phase.LEARNING, Phase.REVIEWING],
  [Phase.LEARNING]: [Phase.LEARNING, Phase.REVIEWING],
  [Phase.REVIEWING]: [Phase.REVIEWING, Phase.RELEARNING],
  [Phase.RELEARNING]: [Phase.RELEARNING, Phase.REVIEWING],
};

export function canTransition(from: Phase, to: Phase): boolean {
  return PHASE_TRANSITIONS[from].includes(to);
}

export function assertNever(value: never): never {
  throw new Error(`Unexpected value: ${String(value)}`);
}

// ============ Constructors & Checks ============

/**
 * Creates the state of a card that has never been reviewed.
 */
export function initialReviewState(cardId: string, deckId: string): ReviewState {
  return {
    card_id: cardId,
    deck_id: deckId,
    phase: Phase.NEW,
    stability: null,
    difficulty: null,
    due_at: null,
    last_reviewed_at: null,
    reps: 0,
    lapses: 0,
    learning_step: 0,
  };
}

export function isNewState(state: ReviewState): boolean {
  return state.phase === Phase.NEW && state.reps === 0;
}

/**
 * Returns the invariant violations of a state; an empty list means valid.
 */
export function checkReviewState(state: ReviewState): string[] {
  const problems: string[] = [];
  const fresh = isNewState(state);
  const memoryFields = [state.stability, state.difficulty, state.due_at];

  if (fresh && memoryFields.some(v => v !== null)) {
    problems.push('unreviewed card must not carry stability, difficulty or due_at');
  }
  if (!fresh && memoryFields.some(v => v === null)) {
    problems.push('reviewed card must carry stability, difficulty and due_at');
  }
  if (state.phase === Phase.NEW && state.reps > 0) {
    problems.push('NEW phase requires reps = 0');
  }
  if (state.stability !== null && !(state.stability > 0)) {
    problems.push('stability must be positive');
  }
  if (state.due_at !== null && state.last_reviewed_at !== null && state.due_at <= state.last_reviewed_at) {
    problems.push('due_at must be after last_reviewed_at');
  }
  if (!fresh && state.last_reviewed_at === null) {
    problems.push('reviewed card must carry last_reviewed_at');
  }
  return problems;
}

// ============ Schemas ============

const isoTimestamp = z.string().datetime();

export const ReviewStateSchema = z
  .object({
    card_id: z.string().min(1),
    deck_id: z.string().min(1),
    phase: z.nativeEnum(Phase),
    stability: z.number().nullable(),
    difficulty: z.number().nullable(),
    due_at: isoTimestamp.nullable(),
    last_reviewed_at: isoTimestamp.nullable(),
    reps: z.number().int().min(0),
    lapses: z.number().int().min(0),
    learning_step: z.number().int().min(0),
  })
  .superRefine((state, ctx) => {
    for (const problem of checkReviewState(state)) {
      ctx.addIssue({ code: z.ZodIssueCode.custom, message: problem });
    }
  });
