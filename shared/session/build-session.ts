/**
 * Session Builder
 *
 * Picks and orders the cards of one practice run. Pure: "now" and the day's
 * progress come from the caller, so the same inputs always give the same
 * session.
 *
 * Priority follows the study queue: learning cards that are due come first
 * (they are mid-flight), then overdue reviews oldest first, then new cards in
 * creation order up to the daily quota. Decks can shuffle their new cards;
 * the order is seeded by the UTC date, so it holds for the whole day.
 */

import { assertNever, initialReviewState, Phase, type ReviewState } from '../scheduler/types';
import { dailyLimits, parseDeckSettings, type DeckSettings } from './settings';
import {
  NO_PROGRESS,
  SessionMode,
  type DailyProgress,
  type DeckCard,
  type QueueCounts,
  type SelectionMode,
  type SessionPlan,
} from './types';

// ============ Partitioning ============

interface Candidate {
  card_id: string;
  phase: Phase;
  due_ms: number;
  created_ms: number;
}

interface Partition {
  learning: Candidate[];        // LEARNING, any due time
  reviews: Candidate[];         // REVIEWING and RELEARNING, any due time
  fresh: Candidate[];           // NEW
}

export function stateOf(card: DeckCard): ReviewState {
  return card.state ?? initialReviewState(card.card_id, card.deck_id);
}

function toCandidate(card: DeckCard): Candidate {
  const state = stateOf(card);
  return {
    card_id: card.card_id,
    phase: state.phase,
    // A reviewed card without a due time is treated as due
    due_ms: state.due_at ? Date.parse(state.due_at) : 0,
    created_ms: Date.parse(card.created_at) || 0,
  };
}

function byDue(a: Candidate, b: Candidate): number {
  if (a.due_ms !== b.due_ms) return a.due_ms - b.due_ms;
  return a.card_id < b.card_id ? -1 : a.card_id > b.card_id ? 1 : 0;
}

function byCreation(a: Candidate, b: Candidate): number {
  if (a.created_ms !== b.created_ms) return a.created_ms - b.created_ms;
  return a.card_id < b.card_id ? -1 : a.card_id > b.card_id ? 1 : 0;
}

function partition(cards: readonly DeckCard[]): Partition {
  const result: Partition = { learning: [], reviews: [], fresh: [] };

  for (const card of cards) {
    const candidate = toCandidate(card);
    switch (candidate.phase) {
      case Phase.NEW:
        result.fresh.push(candidate);
        break;
      case Phase.LEARNING:
        result.learning.push(candidate);
        break;
      case Phase.REVIEWING:
      case Phase.RELEARNING:
        result.reviews.push(candidate);
        break;
      default:
        assertNever(candidate.phase);
    }
  }

  result.learning.sort(byDue);
  result.reviews.sort(byDue);
  result.fresh.sort(byCreation);
  return result;
}

// ============ Day-seeded shuffle ============

// FNV-1a with a murmur3 finalizer
function hashKey(key: string): number {
  let hash = 0x811c9dc5;
  for (let i = 0; i < key.length; i++) {
    hash = Math.imul(hash ^ key.charCodeAt(i), 0x01000193);
  }
  hash = Math.imul(hash ^ (hash >>> 16), 0x85ebca6b);
  hash = Math.imul(hash ^ (hash >>> 13), 0xc2b2ae35);
  return (hash ^ (hash >>> 16)) >>> 0;
}

function shuffleForDay(candidates: readonly Candidate[], now: Date): Candidate[] {
  const day = now.toISOString().slice(0, 10);
  const rank = new Map(candidates.map(c => [c.card_id, hashKey(`${day}:${c.card_id}`)]));
  const rankOf = (c: Candidate) => rank.get(c.card_id) ?? 0;
  return [...candidates].sort((a, b) => rankOf(a) - rankOf(b) || byCreation(a, b));
}

const isDue = (nowMs: number) => (candidate: Candidate) => candidate.due_ms <= nowMs;

const ids = (candidates: Candidate[]) => candidates.map(c => c.card_id);

// ============ Modes ============

function dueAndNew(deck: Partition, settings: DeckSettings, now: Date, progress: DailyProgress): string[] {
  const nowMs = now.getTime();
  const size = settings.micro_session_size;
  const limits = dailyLimits(settings, now);
  const reviewBudget = settings.protect_overload
    ? Math.max(0, limits.review_limit_per_day - progress.reviews_done)
    : Infinity;
  const newBudget = Math.max(0, limits.new_cards_per_day - progress.new_introduced);
  const fresh = settings.shuffle_new ? shuffleForDay(deck.fresh, now) : deck.fresh;

  const selection = [
    ...deck.learning.filter(isDue(nowMs)),
    ...deck.reviews.filter(isDue(nowMs)).slice(0, reviewBudget),
  ];
  const slots = Math.max(0, size - selection.length);
  selection.push(...fresh.slice(0, Math.min(newBudget, slots)));

  return ids(selection.slice(0, size));
}

function fullDeck(deck: Partition): string[] {
  // Complete pass: every card once, not-yet-due cards after the due ones
  return ids([...deck.learning, ...deck.reviews, ...deck.fresh]);
}

function mistakesOnly(deck: Partition): string[] {
  return ids(deck.reviews.filter(c => c.phase === Phase.RELEARNING));
}

// ============ Public API ============

/**
 * Ordered card ids for one session. Nothing eligible gives an empty list.
 * @throws ConfigError when the settings are invalid
 */
export function buildSession(
  mode: SelectionMode,
  cards: readonly DeckCard[],
  settings: DeckSettings,
  now: Date,
  progress: DailyProgress = NO_PROGRESS
): string[] {
  const valid = parseDeckSettings(settings);
  const deck = partition(cards);

  switch (mode) {
    case SessionMode.DUE_AND_NEW:
      return dueAndNew(deck, valid, now, progress);
    case SessionMode.FULL_DECK:
      return fullDeck(deck);
    case SessionMode.MISTAKES_ONLY:
      return mistakesOnly(deck);
    default:
      return assertNever(mode);
  }
}

/**
 * Reset learning progress: every state goes back to a fresh NEW state.
 * Review logs are history and are not touched.
 */
export function resetReviewStates(states: readonly ReviewState[]): ReviewState[] {
  return states.map(state => initialReviewState(state.card_id, state.deck_id));
}

/**
 * Plan any of the four modes. Reset yields the replacement states instead of
 * a card list; the caller must store them in one atomic write.
 */
export function planSession(
  mode: SessionMode,
  cards: readonly DeckCard[],
  settings: DeckSettings,
  now: Date,
  progress: DailyProgress = NO_PROGRESS
): SessionPlan {
  switch (mode) {
    case SessionMode.RESET:
      parseDeckSettings(settings);
      return { mode, states: resetReviewStates(cards.map(stateOf)) };
    case SessionMode.DUE_AND_NEW:
    case SessionMode.FULL_DECK:
    case SessionMode.MISTAKES_ONLY:
      return { mode, card_ids: buildSession(mode, cards, settings, now, progress) };
    default:
      return assertNever(mode);
  }
}

/**
 * Queue counts for a deck overview: all new cards, plus learning and review
 * cards that are due now.
 */
export function countQueues(cards: readonly DeckCard[], now: Date): QueueCounts {
  const nowMs = now.getTime();
  const counts: QueueCounts = { new: 0, learning: 0, review: 0 };

  for (const card of cards) {
    const candidate = toCandidate(card);
    switch (candidate.phase) {
      case Phase.NEW:
        counts.new++;
        break;
      case Phase.LEARNING:
      case Phase.RELEARNING:
        if (candidate.due_ms <= nowMs) counts.learning++;
        break;
      case Phase.REVIEWING:
        if (candidate.due_ms <= nowMs) counts.review++;
        break;
      default:
        assertNever(candidate.phase);
    }
  }

  return counts;
}
