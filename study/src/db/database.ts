import Dexie, { type DexieOptions, type Table } from 'dexie';
import type { DeckSettings, Grade, Phase, ReviewState, SessionSummary } from '@micro-recall/shared';

// Stored rows. Timestamps are ISO strings so they sort as text in indexes.

// Settings are stored flat; only `id` is indexed
export interface DeckRow extends DeckSettings {
  id: string;
  name: string;
  created_at: string;
  updated_at: string;
}

export interface CardRow extends ReviewState {
  created_at: string;
}

export interface ReviewLogRow {
  seq?: number;                   // auto-increment, keeps append order
  card_id: string;
  deck_id: string;
  grade: Grade;
  reviewed_at: string;
  previous_phase: Phase;
  elapsed_days: number;
  state: ReviewState;
}

export type SessionSummaryRow = SessionSummary;

export const DEFAULT_DB_NAME = 'MicroRecallDB';

// Dexie database class
export class StudyDB extends Dexie {
  decks!: Table<DeckRow, string>;
  cards!: Table<CardRow, string>;
  reviewLogs!: Table<ReviewLogRow, number>;
  sessionSummaries!: Table<SessionSummaryRow, string>;

  /**
   * `options` lets Node callers and tests pass their own IndexedDB
   * implementation (e.g. fake-indexeddb).
   */
  constructor(name: string = DEFAULT_DB_NAME, options?: DexieOptions) {
    super(name, options);

    this.version(1).stores({
      decks: 'id',
      cards: 'card_id, deck_id',
      reviewLogs: '++seq, card_id, deck_id, [deck_id+reviewed_at]',
      sessionSummaries: 'session_id, deck_id, completed_at',
    });
  }
}
