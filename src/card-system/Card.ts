/**
 * Card types and factory functions for Dragon Cell solitaire.
 *
 * Defines Suit and the Card tagged union (numbered, dragon, flower)
 * as the foundational data model consumed by the board and rules
 * modules. Cards are immutable values: factories return frozen objects
 * and equality is structural.
 */

/** The three suits. */
export type Suit = 'red' | 'green' | 'black';

/** All suits in canonical order (foundation index order). */
export const SUITS: readonly Suit[] = ['red', 'green', 'black'] as const;

/** Numbered card values run from 1 to 9. */
export type CardValue = 1 | 2 | 3 | 4 | 5 | 6 | 7 | 8 | 9;

/** All numbered card values in ascending order. */
export const CARD_VALUES: readonly CardValue[] = [
  1, 2, 3, 4, 5, 6, 7, 8, 9,
] as const;

/** Highest numbered card value (a complete foundation). */
export const MAX_CARD_VALUE = 9;

/** Dragons of each suit in a full deck. */
export const DRAGONS_PER_SUIT = 4;

export interface NumberedCard {
  readonly kind: 'numbered';
  readonly suit: Suit;
  readonly value: CardValue;
}

export interface DragonCard {
  readonly kind: 'dragon';
  readonly suit: Suit;
}

export interface FlowerCard {
  readonly kind: 'flower';
}

/** Any card in the deck. */
export type Card = NumberedCard | DragonCard | FlowerCard;

/** Create a numbered card. */
export function numbered(suit: Suit, value: CardValue): NumberedCard {
  const card: NumberedCard = { kind: 'numbered', suit, value };
  return Object.freeze(card);
}

/** Create a dragon card. */
export function dragon(suit: Suit): DragonCard {
  const card: DragonCard = { kind: 'dragon', suit };
  return Object.freeze(card);
}

/** The single flower card. */
export const FLOWER: FlowerCard = createFlower();

function createFlower(): FlowerCard {
  const card: FlowerCard = { kind: 'flower' };
  return Object.freeze(card);
}

/** Narrow a number to a valid card value. */
export function isCardValue(n: number): n is CardValue {
  return Number.isInteger(n) && n >= 1 && n <= MAX_CARD_VALUE;
}

/**
 * Whether `candidate` may be placed on top of `target` in a tableau
 * column: both numbered, different suits, candidate one lower.
 */
export function canStackOn(candidate: Card, target: Card): boolean {
  if (candidate.kind !== 'numbered' || target.kind !== 'numbered') {
    return false;
  }
  return (
    candidate.suit !== target.suit && candidate.value + 1 === target.value
  );
}

/** The suit of a card, or `undefined` for the flower. */
export function cardSuit(card: Card): Suit | undefined {
  return card.kind === 'flower' ? undefined : card.suit;
}

/** Structural equality. */
export function cardsEqual(a: Card, b: Card): boolean {
  switch (a.kind) {
    case 'numbered':
      return b.kind === 'numbered' && a.suit === b.suit && a.value === b.value;
    case 'dragon':
      return b.kind === 'dragon' && a.suit === b.suit;
    case 'flower':
      return b.kind === 'flower';
  }
}

// ── Labels ──────────────────────────────────────────────────

const SUIT_SYMBOLS: Record<Suit, string> = {
  red: 'R',
  green: 'G',
  black: 'B',
};

/** Single-letter symbol for a suit (R, G, B). */
export function suitSymbol(suit: Suit): string {
  return SUIT_SYMBOLS[suit];
}

/** Parse a suit from its symbol or full name (case-insensitive). */
export function parseSuit(text: string): Suit | undefined {
  switch (text.toLowerCase()) {
    case 'r':
    case 'red':
      return 'red';
    case 'g':
    case 'green':
      return 'green';
    case 'b':
    case 'black':
      return 'black';
    default:
      return undefined;
  }
}

/**
 * Short label for a card: `R5` for numbered, `GD` for a dragon,
 * `FL` for the flower.
 */
export function cardLabel(card: Card): string {
  switch (card.kind) {
    case 'numbered':
      return `${suitSymbol(card.suit)}${card.value}`;
    case 'dragon':
      return `${suitSymbol(card.suit)}D`;
    case 'flower':
      return 'FL';
  }
}

/**
 * Parse a label produced by {@link cardLabel}.
 * @returns The card, or `undefined` if the label is not recognised.
 */
export function parseCardLabel(label: string): Card | undefined {
  const text = label.trim().toUpperCase();
  if (text === 'FL') return FLOWER;
  if (text.length !== 2) return undefined;

  const suit = parseSuit(text[0]);
  if (!suit) return undefined;

  if (text[1] === 'D') return dragon(suit);
  const value = Number(text[1]);
  return isCardValue(value) ? numbered(suit, value) : undefined;
}
