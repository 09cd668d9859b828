import { afterEach, beforeEach, describe, it, expect } from 'vitest';
import { IDBKeyRange, indexedDB } from 'fake-indexeddb';
import {
  ConfigError,
  DEFAULT_DECK_SETTINGS,
  Grade,
  initialReviewState,
  PersistenceError,
  Phase,
  Scheduler,
  type ReviewState,
  type SessionSummary,
} from '@micro-recall/shared';
import { StudyDB } from './database';
import { DexieStudyRepository } from './repository';

const T = new Date('2024-04-02T09:00:00.000Z');
const hoursLater = (hours: number) => new Date(T.getTime() + hours * 60 * 60 * 1000);

const scheduler = new Scheduler();

let db: StudyDB;
let repo: DexieStudyRepository;

beforeEach(async () => {
  db = new StudyDB(`test-${Math.random().toString(36).slice(2)}`, { indexedDB, IDBKeyRange });
  repo = new DexieStudyRepository(db);
  await repo.saveDeck({ id: 'deck-1', name: 'Test Deck', settings: DEFAULT_DECK_SETTINGS }, T);
});

afterEach(async () => {
  await db.delete();
});

// Helper to add a card and grade it once
async function addReviewedCard(cardId: string, grade: Grade, at: Date): Promise<ReviewState> {
  const state = await repo.addCard({ card_id: cardId, deck_id: 'deck-1', created_at: T.toISOString() });
  const outcome = scheduler.grade(state, grade, at);
  await repo.appendReview(outcome.log, outcome.state);
  return outcome.state;
}

const reviewingState = (cardId: string): ReviewState => ({
  card_id: cardId,
  deck_id: 'deck-1',
  phase: Phase.REVIEWING,
  stability: 5,
  difficulty: 5,
  due_at: T.toISOString(),
  last_reviewed_at: hoursLater(-5 * 24).toISOString(),
  reps: 2,
  lapses: 0,
  learning_step: 0,
});

const summary = (sessionId: string, completedAt: Date): SessionSummary => ({
  session_id: sessionId,
  deck_id: 'deck-1',
  started_at: T.toISOString(),
  completed_at: completedAt.toISOString(),
  duration_ms: completedAt.getTime() - T.getTime(),
  total_reviews: 1,
  again: 0,
  hard: 0,
  good: 1,
  easy: 0,
});

describe('decks', () => {
  it('stores and loads deck settings', async () => {
    await repo.saveDeck({
      id: 'deck-2',
      name: 'Other',
      settings: { new_cards_per_day: 3, review_limit_per_day: 12, micro_session_size: 4 },
    }, T);

    expect(await repo.loadDeckSettings('deck-2')).toEqual({
      ...DEFAULT_DECK_SETTINGS,
      new_cards_per_day: 3,
      review_limit_per_day: 12,
      micro_session_size: 4,
    });
  });

  it('stores the scheduling and easy-day settings', async () => {
    const settings = {
      ...DEFAULT_DECK_SETTINGS,
      protect_overload: false,
      shuffle_new: true,
      easy_days_enabled: true,
      easy_day_load_factor: 0.25,
      fsrs_target_retention: 0.85,
      min_interval_days: 2,
      max_interval_days: 365,
      lapse_min_interval_secs: 86_400,
      preserve_stability_on_lapse: false,
    };
    await repo.saveDeck({ id: 'deck-2', name: 'Other', settings }, T);

    expect(await repo.loadDeckSettings('deck-2')).toEqual(settings);
  });

  it('keeps the creation time when a deck is saved again', async () => {
    await repo.saveDeck({ id: 'deck-1', name: 'Renamed', settings: DEFAULT_DECK_SETTINGS }, hoursLater(1));

    const row = await db.decks.get('deck-1');
    expect(row?.name).toBe('Renamed');
    expect(row?.created_at).toBe(T.toISOString());
    expect(row?.updated_at).toBe(hoursLater(1).toISOString());
  });

  it('does not assume settings for an unknown deck', async () => {
    await expect(repo.loadDeckSettings('missing')).rejects.toThrow(PersistenceError);
  });

  it('rejects invalid settings before writing', async () => {
    await expect(repo.saveDeck({
      id: 'deck-3',
      name: 'Broken',
      settings: { ...DEFAULT_DECK_SETTINGS, micro_session_size: 0 },
    }, T)).rejects.toThrow(ConfigError);
    expect(await db.decks.get('deck-3')).toBeUndefined();
  });
});

describe('cards', () => {
  it('adds new cards in the NEW phase', async () => {
    const state = await repo.addCard({ card_id: 'card-1', deck_id: 'deck-1', created_at: T.toISOString() });

    expect(state).toEqual(initialReviewState('card-1', 'deck-1'));
    expect(await repo.loadDeckCards('deck-1')).toEqual([
      { card_id: 'card-1', deck_id: 'deck-1', created_at: T.toISOString(), state },
    ]);
  });

  it('rejects duplicate cards and unknown decks', async () => {
    await repo.addCard({ card_id: 'card-1', deck_id: 'deck-1', created_at: T.toISOString() });

    await expect(repo.addCard({ card_id: 'card-1', deck_id: 'deck-1', created_at: T.toISOString() }))
      .rejects.toThrow(PersistenceError);
    await expect(repo.addCard({ card_id: 'card-2', deck_id: 'missing', created_at: T.toISOString() }))
      .rejects.toThrow(PersistenceError);
  });

  it('wraps invalid stored rows in a PersistenceError', async () => {
    await db.cards.put({ ...reviewingState('bad'), stability: -1, created_at: T.toISOString() });

    await expect(repo.loadReviewStates('deck-1')).rejects.toThrow(PersistenceError);
  });
});

describe('appendReview', () => {
  it('stores the new state together with its log entry', async () => {
    const state = await addReviewedCard('card-1', Grade.GOOD, T);

    expect(await repo.loadReviewStates('deck-1')).toEqual([state]);

    const logs = await repo.listReviewLogs('card-1');
    expect(logs).toHaveLength(1);
    expect(logs[0].grade).toBe(Grade.GOOD);
    expect(logs[0].previous_phase).toBe(Phase.NEW);
    expect(logs[0].state).toEqual(state);
  });

  it('lists logs in the order they were appended', async () => {
    const first = await addReviewedCard('card-1', Grade.AGAIN, T);
    const second = scheduler.grade(first, Grade.GOOD, hoursLater(1));
    await repo.appendReview(second.log, second.state);

    const logs = await repo.listReviewLogs('card-1');
    expect(logs.map(log => log.grade)).toEqual([Grade.AGAIN, Grade.GOOD]);
  });

  it('writes nothing for an unknown card', async () => {
    const outcome = scheduler.grade(initialReviewState('ghost', 'deck-1'), Grade.GOOD, T);

    await expect(repo.appendReview(outcome.log, outcome.state)).rejects.toThrow(PersistenceError);
    expect(await db.reviewLogs.count()).toBe(0);
  });
});

describe('resetDeck', () => {
  it('replaces every state and keeps the review history', async () => {
    await addReviewedCard('card-1', Grade.GOOD, T);
    await addReviewedCard('card-2', Grade.EASY, T);

    await repo.resetDeck('deck-1', [initialReviewState('card-1', 'deck-1'), initialReviewState('card-2', 'deck-1')]);

    expect(await repo.loadReviewStates('deck-1')).toEqual([
      initialReviewState('card-1', 'deck-1'),
      initialReviewState('card-2', 'deck-1'),
    ]);
    expect(await db.reviewLogs.count()).toBe(2);
  });

  it('rejects a reset that leaves cards of the deck out', async () => {
    const first = await addReviewedCard('card-1', Grade.EASY, T);
    const second = await addReviewedCard('card-2', Grade.EASY, T);

    await expect(repo.resetDeck('deck-1', [initialReviewState('card-1', 'deck-1')]))
      .rejects.toThrow(PersistenceError);

    expect(await repo.loadReviewStates('deck-1')).toEqual([first, second]);
  });

  it('rejects a reset that lists a card twice', async () => {
    const kept = await addReviewedCard('card-1', Grade.GOOD, T);

    await expect(repo.resetDeck('deck-1', [
      initialReviewState('card-1', 'deck-1'),
      initialReviewState('card-1', 'deck-1'),
    ])).rejects.toThrow(PersistenceError);

    expect(await repo.loadReviewStates('deck-1')).toEqual([kept]);
  });

  it('changes nothing when one of the states does not belong to the deck', async () => {
    const kept = await addReviewedCard('card-1', Grade.GOOD, T);

    await expect(repo.resetDeck('deck-1', [
      initialReviewState('card-1', 'deck-1'),
      initialReviewState('stranger', 'deck-1'),
    ])).rejects.toThrow(PersistenceError);

    expect(await repo.loadReviewStates('deck-1')).toEqual([kept]);
  });
});

describe('countDailyProgress', () => {
  it('counts distinct new and review cards since the given time', async () => {
    await addReviewedCard('old', Grade.GOOD, hoursLater(-30));
    const learning = await addReviewedCard('card-1', Grade.AGAIN, T);
    const again = scheduler.grade(learning, Grade.GOOD, hoursLater(1));
    await repo.appendReview(again.log, again.state);
    await addReviewedCard('card-2', Grade.GOOD, hoursLater(2));

    await repo.addCard({ card_id: 'card-3', deck_id: 'deck-1', created_at: T.toISOString() });
    const review = scheduler.grade(reviewingState('card-3'), Grade.GOOD, hoursLater(3));
    await repo.appendReview(review.log, review.state);

    expect(await repo.countDailyProgress('deck-1', T)).toEqual({ new_introduced: 2, reviews_done: 1 });
  });

  it('counts relearning cards as reviews, once per card', async () => {
    await repo.addCard({ card_id: 'card-1', deck_id: 'deck-1', created_at: T.toISOString() });
    const lapse = scheduler.grade(reviewingState('card-1'), Grade.AGAIN, hoursLater(1));
    await repo.appendReview(lapse.log, lapse.state);
    const relearned = scheduler.grade(lapse.state, Grade.GOOD, hoursLater(2));
    await repo.appendReview(relearned.log, relearned.state);

    await repo.addCard({ card_id: 'card-2', deck_id: 'deck-1', created_at: T.toISOString() });
    const slipped: ReviewState = { ...reviewingState('card-2'), phase: Phase.RELEARNING, lapses: 1 };
    const recovered = scheduler.grade(slipped, Grade.GOOD, hoursLater(3));
    await repo.appendReview(recovered.log, recovered.state);

    expect(await repo.countDailyProgress('deck-1', T)).toEqual({ new_introduced: 0, reviews_done: 2 });
  });

  it('ignores other decks', async () => {
    await addReviewedCard('card-1', Grade.GOOD, T);

    expect(await repo.countDailyProgress('deck-2', hoursLater(-1))).toEqual({ new_introduced: 0, reviews_done: 0 });
  });
});

describe('session summaries', () => {
  it('lists the most recent summaries first', async () => {
    await repo.appendSessionSummary(summary('s1', hoursLater(1)));
    await repo.appendSessionSummary(summary('s3', hoursLater(3)));
    await repo.appendSessionSummary(summary('s2', hoursLater(2)));

    const recent = await repo.listSessionSummaries('deck-1', 2);
    expect(recent.map(s => s.session_id)).toEqual(['s3', 's2']);
    expect(recent[0]).toEqual(summary('s3', hoursLater(3)));
  });

  it('rejects a second summary for the same session', async () => {
    await repo.appendSessionSummary(summary('s1', hoursLater(1)));
    await expect(repo.appendSessionSummary(summary('s1', hoursLater(2)))).rejects.toThrow(PersistenceError);
  });
});
