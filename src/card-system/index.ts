/**
 * Card System Module
 *
 * The card model shared by the board and rules modules:
 * suits, the card union and its stacking rule, deck factories
 * and the Pile abstraction used for tableau columns.
 */
export const CARD_SYSTEM_VERSION = '0.1.0';

// Card types and factory
export type {
  Card,
  CardValue,
  DragonCard,
  FlowerCard,
  NumberedCard,
  Suit,
} from './Card';
export {
  CARD_VALUES,
  DRAGONS_PER_SUIT,
  FLOWER,
  MAX_CARD_VALUE,
  SUITS,
  canStackOn,
  cardLabel,
  cardSuit,
  cardsEqual,
  dragon,
  isCardValue,
  numbered,
  parseCardLabel,
  parseSuit,
  suitSymbol,
} from './Card';

// Deck factory and operations
export {
  DECK_SIZE,
  createDeckFrom,
  createFullDeck,
  createSeededRng,
  shuffle,
  validateDeck,
} from './Deck';

// Pile abstraction
export { Pile } from './Pile';
