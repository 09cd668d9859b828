import type { ReviewState } from '../scheduler/types';

// ============ Modes ============

export enum SessionMode {
  DUE_AND_NEW = 'due_and_new',
  FULL_DECK = 'full_deck',
  MISTAKES_ONLY = 'mistakes_only',
  RESET = 'reset',
}

// Modes that pick cards (everything but reset)
export type SelectionMode = Exclude<SessionMode, SessionMode.RESET>;

// ============ Inputs ============

/**
 * A card as the builder sees it. Content is not inspected; a missing
 * state means the card was never reviewed.
 */
export interface DeckCard {
  card_id: string;
  deck_id: string;
  created_at: string;
  state: ReviewState | null;
}

/**
 * What has already happened today, counted from the review log.
 */
export interface DailyProgress {
  new_introduced: number;
  reviews_done: number;
}

export const NO_PROGRESS: Readonly<DailyProgress> = {
  new_introduced: 0,
  reviews_done: 0,
};

// ============ Outputs ============

export type SessionPlan =
  | { mode: SelectionMode; card_ids: string[] }
  | { mode: SessionMode.RESET; states: ReviewState[] };

export interface QueueCounts {
  new: number;
  learning: number;
  review: number;
}

export interface SessionSummary {
  session_id: string;
  deck_id: string;
  started_at: string;
  completed_at: string;
  duration_ms: number;
  total_reviews: number;
  again: number;
  hard: number;
  good: number;
  easy: number;
}
