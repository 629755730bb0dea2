/**
 * Dragon Cell game rules.
 *
 * All functions are pure or mutate only the state passed in. Every
 * mutating operation validates through the same `check*` function its
 * `can*` predicate uses, so a rejected move throws before anything
 * changes. No presentation dependency.
 *
 * Rules:
 * - 40-card deck: three suits of numbered cards 1-9, four dragons per
 *   suit, one flower.
 * - Deal round-robin into 8 columns of 5, all face-up.
 * - Tableau columns build down in alternating suits (different suit,
 *   one lower). Empty columns accept any card.
 * - Three free cells each hold one card.
 * - Foundations build up by suit from 1 to 9; the flower has its own slot.
 * - When all four dragons of a suit are exposed they can be merged
 *   into a free cell, which is then locked for the rest of the game.
 * - Win: foundations complete, flower placed, no card left in play.
 */

import type { Card, NumberedCard, Suit } from '../../src/card-system/Card';
import {
  DRAGONS_PER_SUIT,
  MAX_CARD_VALUE,
  SUITS,
  canStackOn,
  cardLabel,
  cardsEqual,
  dragon,
  isCardValue,
  numbered,
} from '../../src/card-system/Card';
import {
  createFullDeck,
  createSeededRng,
  shuffle,
  validateDeck,
} from '../../src/card-system/Deck';
import type {
  DragonCellMove,
  DragonCellState,
  FoundationMove,
  Location,
} from './DragonCellState';
import {
  EMPTY_CELL,
  FOUNDATION_SUITS,
  FREE_CELL_COUNT,
  TABLEAU_COUNT,
  columnAt,
  createEmptyState,
  describeLocation,
  dragonLockedCell,
  freeCellAt,
  occupiedCell,
} from './DragonCellState';
import type { MoveRejection } from './IllegalMoveError';
import { reject, throwIfRejected } from './IllegalMoveError';

// ── Suit utilities ──────────────────────────────────────────

/**
 * Get the foundation index for a given suit.
 */
export function foundationIndex(suit: Suit): number {
  return FOUNDATION_SUITS.indexOf(suit);
}

/**
 * The next value the suit's foundation accepts, or undefined once
 * the foundation is complete.
 */
export function nextFoundationValue(
  state: DragonCellState,
  suit: Suit,
): number | undefined {
  const current = state.foundations[foundationIndex(suit)];
  return current < MAX_CARD_VALUE ? current + 1 : undefined;
}

// ── Deal ────────────────────────────────────────────────────

/**
 * Deal a board from an ordered deck. Card `i` goes to column `i % 8`,
 * so each column receives 5 cards in input order.
 *
 * @throws If the deck is not exactly the 40-card composition.
 */
export function dealFromDeck(deck: readonly Card[]): DragonCellState {
  const problem = validateDeck(deck);
  if (problem) {
    throw new Error(problem);
  }

  const state = createEmptyState();
  deck.forEach((card, i) => {
    state.tableau[i % TABLEAU_COUNT].push(card);
  });
  return state;
}

/**
 * Shuffle a full deck with a seeded RNG and deal it.
 */
export function dealSeeded(seed: number): DragonCellState {
  const deck = shuffle(createFullDeck(), createSeededRng(seed));
  return dealFromDeck(deck);
}

// ── Accessors ───────────────────────────────────────────────

function checkLocation(loc: Location): MoveRejection | null {
  const limit = loc.kind === 'column' ? TABLEAU_COUNT : FREE_CELL_COUNT;
  if (!Number.isInteger(loc.index) || loc.index < 0 || loc.index >= limit) {
    return reject(
      'out-of-range',
      `${loc.kind === 'column' ? 'Column' : 'Free cell'} index ${loc.index} ` +
        `out of range (0-${limit - 1})`,
    );
  }
  return null;
}

function checkColumnIndex(col: number): MoveRejection | null {
  return checkLocation(columnAt(col));
}

/**
 * The card that lives at a location: a column's top card, or a free
 * cell's plain card. Empty, locked or out-of-range locations give
 * undefined.
 */
export function cardAt(
  state: DragonCellState,
  loc: Location,
): Card | undefined {
  if (checkLocation(loc)) return undefined;
  if (loc.kind === 'column') {
    return state.tableau[loc.index].peek();
  }
  const cell = state.freeCells[loc.index];
  return cell.kind === 'card' ? cell.card : undefined;
}

function checkSource(
  state: DragonCellState,
  loc: Location,
): MoveRejection | null {
  const outOfRange = checkLocation(loc);
  if (outOfRange) return outOfRange;
  if (cardAt(state, loc)) return null;

  if (loc.kind === 'free-cell') {
    const cell = state.freeCells[loc.index];
    if (cell.kind === 'dragon-locked') {
      return reject(
        'empty-source',
        `Free cell ${loc.index} is locked by the ${cell.suit} dragons`,
      );
    }
  }
  return reject('empty-source', `${capitalize(describeLocation(loc))} is empty`);
}

function capitalize(text: string): string {
  return text.charAt(0).toUpperCase() + text.slice(1);
}

function takeCard(state: DragonCellState, loc: Location): Card {
  if (loc.kind === 'column') {
    return state.tableau[loc.index].popOrThrow();
  }
  const cell = state.freeCells[loc.index];
  if (cell.kind !== 'card') {
    throw new Error(`Free cell ${loc.index} holds no card`);
  }
  state.freeCells[loc.index] = EMPTY_CELL;
  return cell.card;
}

function placeCard(state: DragonCellState, loc: Location, card: Card): void {
  if (loc.kind === 'column') {
    state.tableau[loc.index].push(card);
  } else {
    state.freeCells[loc.index] = occupiedCell(card);
  }
}

/**
 * Whether `card` may be placed on column `col`: empty columns accept
 * anything, otherwise the card must stack on the top card.
 */
function checkPlacementOnColumn(
  state: DragonCellState,
  card: Card,
  col: number,
): MoveRejection | null {
  const top = state.tableau[col].peek();
  if (!top || canStackOn(card, top)) return null;
  return reject(
    'cannot-stack',
    `Cannot place ${cardLabel(card)} on ${cardLabel(top)} in column ${col}`,
  );
}

// ── Single-card moves ───────────────────────────────────────

/**
 * Check moving the card at `from` to `to` (a column or free cell).
 *
 * Legal when:
 * - The source holds a card (locked free cells never do).
 * - A destination free cell is empty.
 * - A destination column is not the source column, and is either
 *   empty or topped by a card the moved card stacks on.
 *
 * @returns The rejection, or `null` if the move is legal.
 */
export function checkMove(
  state: DragonCellState,
  from: Location,
  to: Location,
): MoveRejection | null {
  const sourceProblem = checkSource(state, from);
  if (sourceProblem) return sourceProblem;
  const destProblem = checkLocation(to);
  if (destProblem) return destProblem;

  const card = cardAt(state, from);
  if (!card) return reject('empty-source', 'Nothing to move');

  if (to.kind === 'free-cell') {
    const cell = state.freeCells[to.index];
    if (cell.kind === 'empty') return null;
    return reject(
      'cell-occupied',
      cell.kind === 'dragon-locked'
        ? `Free cell ${to.index} is locked by the ${cell.suit} dragons`
        : `Free cell ${to.index} already holds ${cardLabel(cell.card)}`,
    );
  }

  if (from.kind === 'column' && from.index === to.index) {
    return reject('same-column', 'Source and destination columns are the same');
  }
  return checkPlacementOnColumn(state, card, to.index);
}

/** Whether moving the card at `from` to `to` is legal. */
export function canMove(
  state: DragonCellState,
  from: Location,
  to: Location,
): boolean {
  return checkMove(state, from, to) === null;
}

/**
 * Move the card at `from` to `to`.
 *
 * @throws {IllegalMoveError} If the move is illegal; the state is unchanged.
 * @returns The card that was moved.
 */
export function moveCard(
  state: DragonCellState,
  from: Location,
  to: Location,
): Card {
  throwIfRejected(checkMove(state, from, to));
  const card = takeCard(state, from);
  placeCard(state, to, card);
  return card;
}

// ── Foundation moves ────────────────────────────────────────

/**
 * Check moving the card at `from` to its foundation.
 *
 * Legal when the card is the flower and the flower slot is free, or
 * a numbered card whose value is exactly one more than its suit's
 * foundation counter. Dragons never go to a foundation.
 */
export function checkFoundationMove(
  state: DragonCellState,
  from: Location,
): MoveRejection | null {
  const sourceProblem = checkSource(state, from);
  if (sourceProblem) return sourceProblem;

  const card = cardAt(state, from);
  if (!card) return reject('empty-source', 'Nothing to move');

  switch (card.kind) {
    case 'flower':
      return state.flowerPlaced
        ? reject('foundation-order', 'The flower has already been placed')
        : null;
    case 'dragon':
      return reject(
        'foundation-order',
        `${cardLabel(card)} is a dragon; dragons never go to a foundation`,
      );
    case 'numbered': {
      const current = state.foundations[foundationIndex(card.suit)];
      if (current + 1 === card.value) return null;
      return reject(
        'foundation-order',
        `${cardLabel(card)} cannot go to the foundation yet ` +
          `(${card.suit} foundation is at ${current})`,
      );
    }
  }
}

/** Whether the card at `from` may move to its foundation. */
export function canMoveToFoundation(
  state: DragonCellState,
  from: Location,
): boolean {
  return checkFoundationMove(state, from) === null;
}

/**
 * Move the card at `from` to its foundation (or the flower slot).
 *
 * @throws {IllegalMoveError} If the move is illegal; the state is unchanged.
 * @returns The card that was moved.
 */
export function moveToFoundation(
  state: DragonCellState,
  from: Location,
): Card {
  throwIfRejected(checkFoundationMove(state, from));
  const card = takeCard(state, from);
  if (card.kind === 'flower') {
    state.flowerPlaced = true;
  } else if (card.kind === 'numbered') {
    state.foundations[foundationIndex(card.suit)] += 1;
  }
  return card;
}

// ── Stack moves ─────────────────────────────────────────────

/**
 * Length of the movable run that starts at `startIndex` in column
 * `col`: each card above must stack on the one below it. Counts up to
 * the first break or the top of the column; 0 when `startIndex` is out
 * of bounds.
 */
export function stackLength(
  state: DragonCellState,
  col: number,
  startIndex: number,
): number {
  if (checkColumnIndex(col)) return 0;
  const pile = state.tableau[col];
  let below = pile.at(startIndex);
  if (!below || !Number.isInteger(startIndex)) return 0;

  let length = 1;
  for (let i = startIndex + 1; i < pile.size(); i++) {
    const above = pile.at(i);
    if (!above || !canStackOn(above, below)) break;
    length++;
    below = above;
  }
  return length;
}

/**
 * Check moving every card from `startIndex` to the top of `fromCol`
 * onto `toCol`.
 *
 * Legal when the columns differ, the slice is a single unbroken run
 * all the way to the top, and its bottom card can be placed on the
 * destination. Run length is not limited by free cells.
 */
export function checkStackMove(
  state: DragonCellState,
  fromCol: number,
  startIndex: number,
  toCol: number,
): MoveRejection | null {
  const rangeProblem = checkColumnIndex(fromCol) ?? checkColumnIndex(toCol);
  if (rangeProblem) return rangeProblem;
  if (fromCol === toCol) {
    return reject('same-column', 'Source and destination columns are the same');
  }

  const source = state.tableau[fromCol];
  const bottom = Number.isInteger(startIndex) ? source.at(startIndex) : undefined;
  if (!bottom) {
    return source.isEmpty()
      ? reject('empty-source', `Column ${fromCol} is empty`)
      : reject(
          'out-of-range',
          `Start index ${startIndex} out of range for column ${fromCol} ` +
            `(0-${source.size() - 1})`,
        );
  }

  if (stackLength(state, fromCol, startIndex) < source.size() - startIndex) {
    return reject(
      'not-a-run',
      `Cards from ${cardLabel(bottom)} up in column ${fromCol} ` +
        'are not a single descending, alternating run',
    );
  }

  return checkPlacementOnColumn(state, bottom, toCol);
}

/** Whether the stack move is legal. */
export function canMoveStack(
  state: DragonCellState,
  fromCol: number,
  startIndex: number,
  toCol: number,
): boolean {
  return checkStackMove(state, fromCol, startIndex, toCol) === null;
}

/**
 * Move the run from `startIndex` to the top of `fromCol` onto `toCol`,
 * preserving its order.
 *
 * @throws {IllegalMoveError} If the move is illegal; the state is unchanged.
 * @returns The moved cards, bottom first.
 */
export function moveStack(
  state: DragonCellState,
  fromCol: number,
  startIndex: number,
  toCol: number,
): Card[] {
  throwIfRejected(checkStackMove(state, fromCol, startIndex, toCol));
  const run = state.tableau[fromCol].takeFrom(startIndex);
  state.tableau[toCol].push(...run);
  return run;
}

// ── Dragon merge ────────────────────────────────────────────

/**
 * Count the dragons of `suit` that are exposed: on top of a column or
 * sitting unlocked in a free cell.
 */
export function countExposedDragons(
  state: DragonCellState,
  suit: Suit,
): number {
  const target = dragon(suit);
  let count = 0;
  for (const pile of state.tableau) {
    const top = pile.peek();
    if (top && cardsEqual(top, target)) count++;
  }
  for (const cell of state.freeCells) {
    if (cell.kind === 'card' && cardsEqual(cell.card, target)) count++;
  }
  return count;
}

/**
 * Check merging the four dragons of `suit`.
 *
 * Legal when all four are exposed and a free cell will be empty once
 * the merge has vacated the cells holding those dragons.
 */
export function checkMerge(
  state: DragonCellState,
  suit: Suit,
): MoveRejection | null {
  const exposed = countExposedDragons(state, suit);
  if (exposed < DRAGONS_PER_SUIT) {
    return reject(
      'dragons-not-exposed',
      `Cannot merge ${suit} dragons: only ${exposed} of ${DRAGONS_PER_SUIT} are exposed`,
    );
  }

  const target = dragon(suit);
  const hasReceivingCell = state.freeCells.some(
    (cell) =>
      cell.kind === 'empty' ||
      (cell.kind === 'card' && cardsEqual(cell.card, target)),
  );
  if (!hasReceivingCell) {
    return reject(
      'no-free-cell',
      `Cannot merge ${suit} dragons: no free cell to receive them`,
    );
  }
  return null;
}

/** Whether the dragons of `suit` can be merged now. */
export function canMergeDragons(state: DragonCellState, suit: Suit): boolean {
  return checkMerge(state, suit) === null;
}

/**
 * Remove the four exposed dragons of `suit` and lock the lowest
 * empty free cell with them.
 *
 * @throws {IllegalMoveError} If the merge is not possible; the state is unchanged.
 * @returns The index of the locked free cell.
 */
export function mergeDragons(state: DragonCellState, suit: Suit): number {
  throwIfRejected(checkMerge(state, suit));

  const target = dragon(suit);
  for (const pile of state.tableau) {
    const top = pile.peek();
    if (top && cardsEqual(top, target)) pile.pop();
  }
  state.freeCells.forEach((cell, i) => {
    if (cell.kind === 'card' && cardsEqual(cell.card, target)) {
      state.freeCells[i] = EMPTY_CELL;
    }
  });

  const slot = state.freeCells.findIndex((cell) => cell.kind === 'empty');
  if (slot === -1) {
    throw new Error(`No empty free cell after vacating ${suit} dragons`);
  }
  state.freeCells[slot] = dragonLockedCell(suit);
  return slot;
}

// ── Auto-advance ────────────────────────────────────────────

/** Every location a card can be played from: columns, then free cells. */
export function allSources(): Location[] {
  const sources: Location[] = [];
  for (let col = 0; col < TABLEAU_COUNT; col++) sources.push(columnAt(col));
  for (let i = 0; i < FREE_CELL_COUNT; i++) sources.push(freeCellAt(i));
  return sources;
}

/**
 * Whether a card may be sent to its foundation without the player
 * asking.
 *
 * **Heuristic:** the flower is always safe. A numbered card is safe
 * when it is a 1, or when no foundation is more than one step behind
 * it (value <= min foundation + 1), so it can no longer be needed as a
 * tableau build target.
 */
export function isSafeToAutoAdvance(
  state: DragonCellState,
  card: Card,
): boolean {
  switch (card.kind) {
    case 'flower':
      return true;
    case 'dragon':
      return false;
    case 'numbered':
      return card.value === 1 || card.value <= minFoundation(state) + 1;
  }
}

function minFoundation(state: DragonCellState): number {
  return Math.min(...state.foundations);
}

/**
 * Find every source whose card can go to the foundation now and is
 * safe to auto-advance.
 *
 * @returns Foundation moves in source order (columns, then free cells).
 */
export function findSafeAutoMoves(state: DragonCellState): FoundationMove[] {
  const moves: FoundationMove[] = [];
  for (const from of allSources()) {
    const card = cardAt(state, from);
    if (!card) continue;
    if (canMoveToFoundation(state, from) && isSafeToAutoAdvance(state, card)) {
      moves.push({ kind: 'foundation', from });
    }
  }
  return moves;
}

/**
 * Repeatedly move safe cards to the foundations until a full pass
 * over columns and free cells moves nothing.
 *
 * @returns The number of cards advanced.
 */
export function autoAdvance(state: DragonCellState): number {
  let moved = 0;
  let progressed = true;
  while (progressed) {
    progressed = false;
    for (const from of allSources()) {
      const card = cardAt(state, from);
      if (!card) continue;
      if (canMoveToFoundation(state, from) && isSafeToAutoAdvance(state, card)) {
        moveToFoundation(state, from);
        moved++;
        progressed = true;
      }
    }
  }
  return moved;
}

// ── Win detection ───────────────────────────────────────────

/**
 * Check if the game is won: every foundation at 9, the flower placed,
 * every column empty and no plain card left in a free cell.
 */
export function isWon(state: DragonCellState): boolean {
  return (
    state.foundations.every((f) => f === MAX_CARD_VALUE) &&
    state.flowerPlaced &&
    state.tableau.every((pile) => pile.isEmpty()) &&
    state.freeCells.every((cell) => cell.kind !== 'card')
  );
}

// ── Move dispatch ───────────────────────────────────────────

/** Check any move without applying it. */
export function checkAnyMove(
  state: DragonCellState,
  move: DragonCellMove,
): MoveRejection | null {
  switch (move.kind) {
    case 'card':
      return checkMove(state, move.from, move.to);
    case 'foundation':
      return checkFoundationMove(state, move.from);
    case 'stack':
      return checkStackMove(state, move.fromCol, move.startIndex, move.toCol);
    case 'merge':
      return checkMerge(state, move.suit);
  }
}

/**
 * Apply any DragonCellMove to the game state.
 *
 * @throws {IllegalMoveError} If the move is illegal; the state is unchanged.
 */
export function applyMove(state: DragonCellState, move: DragonCellMove): void {
  switch (move.kind) {
    case 'card':
      moveCard(state, move.from, move.to);
      return;
    case 'foundation':
      moveToFoundation(state, move.from);
      return;
    case 'stack':
      moveStack(state, move.fromCol, move.startIndex, move.toCol);
      return;
    case 'merge':
      mergeDragons(state, move.suit);
      return;
  }
}

/**
 * Human-readable description of a move, e.g.
 * `Move column 2 -> free cell 0`.
 */
export function describeMove(move: DragonCellMove): string {
  switch (move.kind) {
    case 'card':
      return `Move ${describeLocation(move.from)} -> ${describeLocation(move.to)}`;
    case 'foundation':
      return `Move ${describeLocation(move.from)} -> foundation`;
    case 'stack':
      return `Move column ${move.fromCol} from row ${move.startIndex} -> column ${move.toCol}`;
    case 'merge':
      return `Merge ${move.suit} dragons`;
  }
}

/**
 * Get all legal moves from the current state.
 *
 * Column-to-column moves of a single top card are listed as `card`
 * moves; runs of two or more cards as `stack` moves.
 */
export function getLegalMoves(state: DragonCellState): DragonCellMove[] {
  const moves: DragonCellMove[] = [];

  for (const from of allSources()) {
    if (!cardAt(state, from)) continue;

    if (canMoveToFoundation(state, from)) {
      moves.push({ kind: 'foundation', from });
    }
    for (let col = 0; col < TABLEAU_COUNT; col++) {
      const to = columnAt(col);
      if (canMove(state, from, to)) moves.push({ kind: 'card', from, to });
    }
    for (let i = 0; i < FREE_CELL_COUNT; i++) {
      const to = freeCellAt(i);
      if (canMove(state, from, to)) moves.push({ kind: 'card', from, to });
    }
  }

  for (let fromCol = 0; fromCol < TABLEAU_COUNT; fromCol++) {
    const size = state.tableau[fromCol].size();
    for (let startIndex = 0; startIndex < size - 1; startIndex++) {
      for (let toCol = 0; toCol < TABLEAU_COUNT; toCol++) {
        if (canMoveStack(state, fromCol, startIndex, toCol)) {
          moves.push({ kind: 'stack', fromCol, startIndex, toCol });
        }
      }
    }
  }

  for (const suit of SUITS) {
    if (canMergeDragons(state, suit)) moves.push({ kind: 'merge', suit });
  }

  return moves;
}

/**
 * Check if no legal moves remain (game is stuck).
 */
export function hasNoMoves(state: DragonCellState): boolean {
  return getLegalMoves(state).length === 0;
}

/**
 * The numbered card each foundation shows on top, or undefined when
 * it is empty.
 */
export function foundationTops(
  state: DragonCellState,
): (NumberedCard | undefined)[] {
  return FOUNDATION_SUITS.map((suit, fi) => {
    const value = state.foundations[fi];
    return isCardValue(value) ? numbered(suit, value) : undefined;
  });
}
