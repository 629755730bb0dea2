import { cardLabel, parseCardLabel, parseSuit } from '../../src/card-system/Card';
import type { Card } from '../../src/card-system/Card';
import { Pile } from '../../src/card-system/Pile';
import type {
  DragonCellState,
  FreeCellState,
  Foundations,
} from '../../games/dragon-cell/DragonCellState';
import {
  EMPTY_CELL,
  FREE_CELL_COUNT,
  TABLEAU_COUNT,
  dragonLockedCell,
  occupiedCell,
} from '../../games/dragon-cell/DragonCellState';

// ── Helpers shared by the Dragon Cell tests ─────────────────

export function card(label: string): Card {
  const parsed = parseCardLabel(label);
  if (!parsed) throw new Error(`Bad test card label '${label}'`);
  return parsed;
}

function cell(text: string | null): FreeCellState {
  if (text === null) return EMPTY_CELL;
  if (text.startsWith('locked:')) {
    const suit = parseSuit(text.slice('locked:'.length));
    if (!suit) throw new Error(`Bad test cell '${text}'`);
    return dragonLockedCell(suit);
  }
  return occupiedCell(card(text));
}

export interface BoardLayout {
  /** Column cards bottom to top; missing columns are empty. */
  columns?: string[][];
  /** Free cells: a card label, `locked:<suit>`, or null. */
  cells?: (string | null)[];
  foundations?: Foundations;
  flowerPlaced?: boolean;
}

/**
 * Build a board from card labels. Boards need not hold all 40 cards.
 */
export function board(layout: BoardLayout = {}): DragonCellState {
  const tableau: Pile[] = [];
  for (let col = 0; col < TABLEAU_COUNT; col++) {
    tableau.push(new Pile((layout.columns?.[col] ?? []).map(card)));
  }
  const freeCells: FreeCellState[] = [];
  for (let i = 0; i < FREE_CELL_COUNT; i++) {
    freeCells.push(cell(layout.cells?.[i] ?? null));
  }
  return {
    tableau,
    freeCells,
    foundations: layout.foundations ?? [0, 0, 0],
    flowerPlaced: layout.flowerPlaced ?? false,
  };
}

/** Labels of a column, bottom to top. */
export function column(state: DragonCellState, col: number): string[] {
  return state.tableau[col].toArray().map(cardLabel);
}

/**
 * Deal order that produces the given columns (bottom to top, five
 * cards each): card `i` of the deck lands in column `i % 8`.
 */
export function deckFromColumns(columns: string[][]): string[] {
  const labels: string[] = [];
  for (let row = 0; row < 5; row++) {
    for (const col of columns) {
      labels.push(col[row]);
    }
  }
  return labels;
}

/**
 * Cards accounted for on the board: tableau, plain free-cell cards,
 * four per locked cell, foundation counters and the flower.
 */
export function countAllCards(state: DragonCellState): number {
  let count = 0;
  for (const pile of state.tableau) count += pile.size();
  for (const c of state.freeCells) {
    if (c.kind === 'card') count += 1;
    if (c.kind === 'dragon-locked') count += 4;
  }
  for (const f of state.foundations) count += f;
  if (state.flowerPlaced) count += 1;
  return count;
}

// ── Layouts ─────────────────────────────────────────────────

/**
 * A mid-difficulty deal. No top card can go to a foundation; R1 sits
 * under R7 in column 6.
 */
export const PLAIN_LAYOUT: string[][] = [
  ['B5', 'G2', 'B3', 'R4', 'G9'],
  ['G1', 'B2', 'R3', 'G4', 'R8'],
  ['B1', 'R2', 'G3', 'B4', 'B9'],
  ['FL', 'RD', 'GD', 'BD', 'R9'],
  ['RD', 'GD', 'BD', 'R5', 'G8'],
  ['RD', 'GD', 'BD', 'G5', 'B8'],
  ['RD', 'GD', 'BD', 'R1', 'R7'],
  ['R6', 'G6', 'G7', 'B6', 'B7'],
];

/**
 * A deal whose numbered cards and flower all auto-advance, leaving a
 * red, green and black dragon stacked in each of columns 0-3.
 */
export const WINNABLE_LAYOUT: string[][] = [
  ['BD', 'GD', 'RD', 'R1', 'FL'],
  ['BD', 'GD', 'RD', 'B1', 'G1'],
  ['BD', 'GD', 'RD', 'G2', 'R2'],
  ['BD', 'GD', 'RD', 'R3', 'B2'],
  ['B4', 'G4', 'R4', 'B3', 'G3'],
  ['G6', 'R6', 'B5', 'G5', 'R5'],
  ['R8', 'B7', 'G7', 'R7', 'B6'],
  ['B9', 'G9', 'R9', 'B8', 'G8'],
];
