/**
 * Study repository - persistence boundary of the study service
 *
 * `StudyRepository` is what the service needs from storage; the Dexie
 * implementation keeps everything in IndexedDB. Per-card writes and deck
 * resets each run in one `rw` transaction, so a failure leaves nothing
 * half-written. Every storage failure surfaces as a PersistenceError.
 */

import Dexie from 'dexie';
import { z } from 'zod';
import {
  Grade,
  initialReviewState,
  MicroRecallError,
  parseDeckSettings,
  PersistenceError,
  Phase,
  ReviewStateSchema,
  type DailyProgress,
  type DeckCard,
  type DeckSettings,
  type ReviewLog,
  type ReviewState,
  type SessionSummary,
} from '@micro-recall/shared';
import type { CardRow, DeckRow, ReviewLogRow, StudyDB } from './database';

// ============ Types ============

export interface Deck {
  id: string;
  name: string;
  /** Fields left out take their default values. */
  settings: Partial<DeckSettings>;
}

export interface NewCard {
  card_id: string;
  deck_id: string;
  created_at: string;
}

export interface StudyRepository {
  saveDeck(deck: Deck, now: Date): Promise<void>;
  addCard(card: NewCard): Promise<ReviewState>;
  loadReviewStates(deckId: string): Promise<ReviewState[]>;
  loadDeckCards(deckId: string): Promise<DeckCard[]>;
  loadDeckSettings(deckId: string): Promise<DeckSettings>;
  /** Stores the log entry and the card's new state together. */
  appendReview(log: ReviewLog, state: ReviewState): Promise<void>;
  /**
   * Replaces every state of the deck at once. `states` must cover every card
   * of the deck and nothing else. Logs are kept.
   */
  resetDeck(deckId: string, states: readonly ReviewState[]): Promise<void>;
  countDailyProgress(deckId: string, since: Date): Promise<DailyProgress>;
  listReviewLogs(cardId: string): Promise<ReviewLog[]>;
  appendSessionSummary(summary: SessionSummary): Promise<void>;
  listSessionSummaries(deckId: string, limit?: number): Promise<SessionSummary[]>;
}

// ============ Row Schemas ============

const isoTimestamp = z.string().datetime();

const CardRowSchema = z.object({ created_at: isoTimestamp }).passthrough();

const ReviewLogRowSchema = z.object({
  card_id: z.string().min(1),
  deck_id: z.string().min(1),
  grade: z.nativeEnum(Grade),
  reviewed_at: isoTimestamp,
  previous_phase: z.nativeEnum(Phase),
  elapsed_days: z.number().min(0),
  state: ReviewStateSchema,
});

const SessionSummarySchema = z.object({
  session_id: z.string().min(1),
  deck_id: z.string().min(1),
  started_at: isoTimestamp,
  completed_at: isoTimestamp,
  duration_ms: z.number().min(0),
  total_reviews: z.number().int().min(0),
  again: z.number().int().min(0),
  hard: z.number().int().min(0),
  good: z.number().int().min(0),
  easy: z.number().int().min(0),
});

function toReviewState(row: CardRow): ReviewState {
  return ReviewStateSchema.parse({
    card_id: row.card_id,
    deck_id: row.deck_id,
    phase: row.phase,
    stability: row.stability,
    difficulty: row.difficulty,
    due_at: row.due_at,
    last_reviewed_at: row.last_reviewed_at,
    reps: row.reps,
    lapses: row.lapses,
    learning_step: row.learning_step,
  });
}

function toDeckCard(row: CardRow): DeckCard {
  const { created_at } = CardRowSchema.parse(row);
  return {
    card_id: row.card_id,
    deck_id: row.deck_id,
    created_at,
    state: toReviewState(row),
  };
}

// Unknown keys (the auto-increment seq) are stripped by the schema
function toReviewLog(row: ReviewLogRow): ReviewLog {
  return Object.freeze(ReviewLogRowSchema.parse(row));
}

// ============ Dexie Implementation ============

export class DexieStudyRepository implements StudyRepository {
  constructor(private readonly db: StudyDB) {}

  async saveDeck(deck: Deck, now: Date): Promise<void> {
    const settings = parseDeckSettings(deck.settings);
    await this.run(`save deck ${deck.id}`, async () => {
      const existing = await this.db.decks.get(deck.id);
      const row: DeckRow = {
        id: deck.id,
        name: deck.name,
        ...settings,
        created_at: existing?.created_at ?? now.toISOString(),
        updated_at: now.toISOString(),
      };
      await this.db.decks.put(row);
    });
  }

  async addCard(card: NewCard): Promise<ReviewState> {
    return this.run(`add card ${card.card_id}`, () =>
      this.db.transaction('rw', [this.db.decks, this.db.cards], async () => {
        if (!(await this.db.decks.get(card.deck_id))) {
          throw new PersistenceError(`Deck ${card.deck_id} not found`);
        }
        if (await this.db.cards.get(card.card_id)) {
          throw new PersistenceError(`Card ${card.card_id} already exists`);
        }
        const state = initialReviewState(card.card_id, card.deck_id);
        await this.db.cards.add({ ...state, created_at: card.created_at });
        return state;
      })
    );
  }

  async loadReviewStates(deckId: string): Promise<ReviewState[]> {
    return this.run(`load review states of deck ${deckId}`, async () => {
      const rows = await this.db.cards.where('deck_id').equals(deckId).toArray();
      return rows.map(toReviewState);
    });
  }

  async loadDeckCards(deckId: string): Promise<DeckCard[]> {
    return this.run(`load cards of deck ${deckId}`, async () => {
      const rows = await this.db.cards.where('deck_id').equals(deckId).toArray();
      return rows.map(toDeckCard);
    });
  }

  async loadDeckSettings(deckId: string): Promise<DeckSettings> {
    return this.run(`load settings of deck ${deckId}`, async () => {
      const deck = await this.db.decks.get(deckId);
      if (!deck) {
        throw new PersistenceError(`Deck ${deckId} not found`);
      }
      // Row keys that are not settings are stripped by the schema
      return parseDeckSettings(deck);
    });
  }

  async appendReview(log: ReviewLog, state: ReviewState): Promise<void> {
    await this.run(`store review of card ${state.card_id}`, () =>
      this.db.transaction('rw', [this.db.cards, this.db.reviewLogs], async () => {
        const current = await this.db.cards.get(state.card_id);
        if (!current) {
          throw new PersistenceError(`Card ${state.card_id} not found`);
        }
        await this.db.cards.put({ ...state, created_at: current.created_at });
        await this.db.reviewLogs.add({ ...log, state: { ...log.state } });
      })
    );
  }

  async resetDeck(deckId: string, states: readonly ReviewState[]): Promise<void> {
    await this.run(`reset deck ${deckId}`, () =>
      this.db.transaction('rw', [this.db.cards], async () => {
        const rows = await this.db.cards.where('deck_id').equals(deckId).toArray();
        const createdAt = new Map(rows.map(row => [row.card_id, row.created_at]));

        const updated: CardRow[] = states.map(state => {
          const created = createdAt.get(state.card_id);
          if (state.deck_id !== deckId || created === undefined) {
            throw new PersistenceError(`Card ${state.card_id} does not belong to deck ${deckId}`);
          }
          return { ...state, created_at: created };
        });

        const covered = new Set(updated.map(row => row.card_id));
        const missing = rows.filter(row => !covered.has(row.card_id)).map(row => row.card_id);
        if (missing.length > 0 || covered.size !== updated.length) {
          throw new PersistenceError(
            `Reset of deck ${deckId} must replace every card exactly once (missing: ${missing.join(', ') || 'none'})`
          );
        }
        await this.db.cards.bulkPut(updated);
      })
    );
  }

  /**
   * Distinct cards introduced (first reviewed while NEW) and reviewed
   * (graded while REVIEWING or RELEARNING) since `since`. Both review phases
   * draw on the same daily review limit.
   */
  async countDailyProgress(deckId: string, since: Date): Promise<DailyProgress> {
    return this.run(`count daily progress of deck ${deckId}`, async () => {
      const logs = await this.db.reviewLogs
        .where('[deck_id+reviewed_at]')
        .between([deckId, since.toISOString()], [deckId, Dexie.maxKey], true, true)
        .toArray();

      const introduced = new Set<string>();
      const reviewed = new Set<string>();
      for (const log of logs) {
        if (log.previous_phase === Phase.NEW) introduced.add(log.card_id);
        if (log.previous_phase === Phase.REVIEWING || log.previous_phase === Phase.RELEARNING) {
          reviewed.add(log.card_id);
        }
      }
      return { new_introduced: introduced.size, reviews_done: reviewed.size };
    });
  }

  async listReviewLogs(cardId: string): Promise<ReviewLog[]> {
    return this.run(`list review logs of card ${cardId}`, async () => {
      const rows = await this.db.reviewLogs.where('card_id').equals(cardId).toArray();
      return rows.map(toReviewLog);
    });
  }

  async appendSessionSummary(summary: SessionSummary): Promise<void> {
    await this.run(`store summary of session ${summary.session_id}`, async () => {
      await this.db.sessionSummaries.add({ ...summary });
    });
  }

  /**
   * Most recent first.
   */
  async listSessionSummaries(deckId: string, limit = 20): Promise<SessionSummary[]> {
    return this.run(`list session summaries of deck ${deckId}`, async () => {
      const rows = await this.db.sessionSummaries.where('deck_id').equals(deckId).toArray();
      return rows
        .map(row => SessionSummarySchema.parse(row))
        .sort((a, b) => b.completed_at.localeCompare(a.completed_at))
        .slice(0, limit);
    });
  }

  // Wraps storage failures; errors that are already ours pass through
  private async run<T>(operation: string, fn: () => Promise<T>): Promise<T> {
    try {
      return await fn();
    } catch (error) {
      if (error instanceof MicroRecallError) {
        throw error;
      }
      throw new PersistenceError(`Failed to ${operation}`, error);
    }
  }
}
