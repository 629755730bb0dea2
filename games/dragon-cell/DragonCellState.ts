/**
 * Dragon Cell state types.
 *
 * Defines the game-specific state for Dragon Cell solitaire, kept
 * separate from the rules and from any presentation layer.
 */

import type { Card, Suit } from '../../src/card-system/Card';
import { SUITS } from '../../src/card-system/Card';
import { Pile } from '../../src/card-system/Pile';

// ── Constants ───────────────────────────────────────────────

/** Number of tableau columns. */
export const TABLEAU_COUNT = 8;

/** Number of free-cell slots. */
export const FREE_CELL_COUNT = 3;

/** Number of foundations (one per suit). */
export const FOUNDATION_COUNT = 3;

/** Cards per tableau column in a fresh deal. */
export const CARDS_PER_COLUMN = 5;

/** Foundation suit order (matches SUITS from card-system). */
export const FOUNDATION_SUITS: readonly Suit[] = SUITS;

// ── Free cells ──────────────────────────────────────────────

export interface EmptyCell {
  readonly kind: 'empty';
}

export interface OccupiedCell {
  readonly kind: 'card';
  readonly card: Card;
}

/**
 * A free cell permanently taken by four merged dragons. It never
 * holds a playable card again.
 */
export interface DragonLockedCell {
  readonly kind: 'dragon-locked';
  readonly suit: Suit;
}

export type FreeCellState = EmptyCell | OccupiedCell | DragonLockedCell;

export const EMPTY_CELL: EmptyCell = { kind: 'empty' };

export function occupiedCell(card: Card): OccupiedCell {
  return { kind: 'card', card };
}

export function dragonLockedCell(suit: Suit): DragonLockedCell {
  return { kind: 'dragon-locked', suit };
}

// ── Locations ───────────────────────────────────────────────

/** The top card of a tableau column. */
export interface ColumnLocation {
  readonly kind: 'column';
  /** Column index (0-7). */
  readonly index: number;
}

/** A free-cell slot. */
export interface FreeCellLocation {
  readonly kind: 'free-cell';
  /** Free-cell index (0-2). */
  readonly index: number;
}

/** Where a single card is taken from or put to. */
export type Location = ColumnLocation | FreeCellLocation;

export function columnAt(index: number): ColumnLocation {
  return { kind: 'column', index };
}

export function freeCellAt(index: number): FreeCellLocation {
  return { kind: 'free-cell', index };
}

/** Human-readable description of a location, e.g. `column 3`. */
export function describeLocation(loc: Location): string {
  return loc.kind === 'column'
    ? `column ${loc.index}`
    : `free cell ${loc.index}`;
}

// ── Move types ──────────────────────────────────────────────

/** Move the top card of a column or a free cell's card to a column or free cell. */
export interface CardMove {
  readonly kind: 'card';
  readonly from: Location;
  readonly to: Location;
}

/** Move the top card of a column or a free cell's card to its foundation. */
export interface FoundationMove {
  readonly kind: 'foundation';
  readonly from: Location;
}

/** Move a run of cards from `startIndex` to the top of one column onto another. */
export interface StackMove {
  readonly kind: 'stack';
  readonly fromCol: number;
  /** Index of the run's bottom card in the source column (0 = bottom). */
  readonly startIndex: number;
  readonly toCol: number;
}

/** Merge the four exposed dragons of a suit into a locked free cell. */
export interface MergeMove {
  readonly kind: 'merge';
  readonly suit: Suit;
}

/**
 * Any player action in Dragon Cell.
 */
export type DragonCellMove = CardMove | FoundationMove | StackMove | MergeMove;

// ── Game state ──────────────────────────────────────────────

/**
 * Foundation progress per suit (red, green, black): the highest
 * numbered card placed so far, 0 when none.
 */
export type Foundations = [number, number, number];

/**
 * Complete Dragon Cell board state.
 *
 * All cards are face-up (open information).
 */
export interface DragonCellState {
  /**
   * Eight tableau columns.
   * Top of pile = last card pushed = the card available to move.
   */
  readonly tableau: readonly Pile[];

  /** Three free-cell slots. */
  readonly freeCells: FreeCellState[];

  /** Foundation counters indexed by FOUNDATION_SUITS. */
  readonly foundations: Foundations;

  /** Whether the flower has been placed. */
  flowerPlaced: boolean;
}

/** Create an empty board (no cards dealt). */
export function createEmptyState(): DragonCellState {
  const tableau: Pile[] = [];
  for (let col = 0; col < TABLEAU_COUNT; col++) {
    tableau.push(new Pile());
  }
  const freeCells: FreeCellState[] = [];
  for (let i = 0; i < FREE_CELL_COUNT; i++) {
    freeCells.push(EMPTY_CELL);
  }
  return {
    tableau,
    freeCells,
    foundations: [0, 0, 0],
    flowerPlaced: false,
  };
}

/**
 * Deep copy of a board. Columns and arrays are new; cards and cell
 * values are immutable and shared.
 */
export function cloneState(state: DragonCellState): DragonCellState {
  return {
    tableau: state.tableau.map((pile) => new Pile(pile.toArray())),
    freeCells: [...state.freeCells],
    foundations: [
      state.foundations[0],
      state.foundations[1],
      state.foundations[2],
    ],
    flowerPlaced: state.flowerPlaced,
  };
}

/**
 * Install `snapshot` into `target` in place, so existing references
 * to `target` observe the restored board.
 */
export function restoreState(
  target: DragonCellState,
  snapshot: DragonCellState,
): void {
  for (let col = 0; col < TABLEAU_COUNT; col++) {
    target.tableau[col].replaceWith(snapshot.tableau[col].toArray());
  }
  target.freeCells.splice(0, target.freeCells.length, ...snapshot.freeCells);
  for (let fi = 0; fi < FOUNDATION_COUNT; fi++) {
    target.foundations[fi] = snapshot.foundations[fi];
  }
  target.flowerPlaced = snapshot.flowerPlaced;
}
