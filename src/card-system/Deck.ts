/**
 * Deck operations for Dragon Cell solitaire.
 *
 * A Deck is represented as a plain Card array. This module provides
 * factory functions and operations (shuffle, validation) that work on
 * Card arrays, keeping the data model simple and composable.
 */

import type { Card } from './Card';
import {
  CARD_VALUES,
  DRAGONS_PER_SUIT,
  FLOWER,
  SUITS,
  cardLabel,
  dragon,
  numbered,
  parseCardLabel,
} from './Card';

/** Number of cards in a full deck. */
export const DECK_SIZE = 40;

/**
 * Create the full 40-card deck: for each suit (red, green, black)
 * the numbered cards 1-9 followed by four dragons, then the flower.
 */
export function createFullDeck(): Card[] {
  const deck: Card[] = [];
  for (const suit of SUITS) {
    for (const value of CARD_VALUES) {
      deck.push(numbered(suit, value));
    }
    for (let i = 0; i < DRAGONS_PER_SUIT; i++) {
      deck.push(dragon(suit));
    }
  }
  deck.push(FLOWER);
  return deck;
}

/**
 * Create a deck from card labels (`R5`, `GD`, `FL`).
 *
 * @throws If any label is not recognised.
 */
export function createDeckFrom(labels: readonly string[]): Card[] {
  return labels.map((label) => {
    const card = parseCardLabel(label);
    if (!card) {
      throw new Error(`Unknown card label: '${label}'`);
    }
    return card;
  });
}

/**
 * Check that `cards` is exactly the full deck composition, in any order.
 *
 * @returns A description of the first problem found, or `null` if the
 *          deck is valid.
 */
export function validateDeck(cards: readonly Card[]): string | null {
  if (cards.length !== DECK_SIZE) {
    return `Need exactly ${DECK_SIZE} cards to deal, got ${cards.length}`;
  }

  const remaining = new Map<string, number>();
  for (const card of createFullDeck()) {
    const label = cardLabel(card);
    remaining.set(label, (remaining.get(label) ?? 0) + 1);
  }

  for (const card of cards) {
    const label = cardLabel(card);
    const left = remaining.get(label) ?? 0;
    if (left === 0) {
      return `Unexpected extra card ${label}`;
    }
    remaining.set(label, left - 1);
  }

  return null;
}

/**
 * Shuffle a deck in place using the Fisher-Yates algorithm.
 *
 * An optional random number generator can be supplied for
 * deterministic testing. The generator must return a value
 * in [0, 1) (same contract as Math.random).
 *
 * @returns The same array reference (mutated).
 */
export function shuffle<T>(deck: T[], rng: () => number = Math.random): T[] {
  for (let i = deck.length - 1; i > 0; i--) {
    const j = Math.floor(rng() * (i + 1));
    [deck[i], deck[j]] = [deck[j], deck[i]];
  }
  return deck;
}

/**
 * Create a deterministic RNG from a numeric seed.
 * Uses a simple linear congruential generator (LCG) compatible
 * with the shuffle() function's () => number contract.
 */
export function createSeededRng(seed: number): () => number {
  let s = seed >>> 0;
  return () => {
    s = (s * 1664525 + 1013904223) % 4294967296;
    return s / 4294967296;
  };
}
