/**
 * Game transcript types and recorder for Dragon Cell.
 *
 * Records a replay-ready, JSON-serializable transcript capturing the
 * deal, every player action, auto-advances, undo/redo actions and the
 * final outcome. The transcript lives in memory only.
 *
 * Usage:
 *   const recorder = new DragonCellTranscriptRecorder(seed, state);
 *   recorder.recordMove(move);
 *   recorder.recordAutoAdvance(count);
 *   recorder.recordUndo();
 *   recorder.recordRedo();
 *   const transcript = recorder.finalize('win');
 */

import { cardLabel } from '../../src/card-system/Card';
import type { Suit } from '../../src/card-system/Card';
import type {
  DragonCellMove,
  DragonCellState,
  FreeCellState,
} from './DragonCellState';
import { FOUNDATION_SUITS } from './DragonCellState';

// ── Snapshot types ──────────────────────────────────────────

/** A card as its label (`R5`, `GD`, `FL`). */
export type CardSnapshot = string;

/** Snapshot of a free cell: a card label, `locked:<suit>`, or null. */
export type FreeCellSnapshot = CardSnapshot | `locked:${Suit}` | null;

/** Snapshot of a single foundation. */
export interface FoundationSnapshot {
  suit: Suit;
  /** Highest value placed (0-9). */
  value: number;
}

/** Complete board snapshot at a point in time. */
export interface BoardSnapshot {
  /** Cards in each column, bottom to top. */
  tableau: CardSnapshot[][];
  freeCells: FreeCellSnapshot[];
  foundations: FoundationSnapshot[];
  flowerPlaced: boolean;
}

// ── Move record types ───────────────────────────────────────

/** A player-initiated action. */
export interface PlayerMoveRecord {
  kind: 'player-move';
  move: DragonCellMove;
}

/** Cards sent to the foundations by the engine after a deal or action. */
export interface AutoAdvanceRecord {
  kind: 'auto-advance';
  count: number;
}

export interface UndoRecord {
  kind: 'undo';
}

export interface RedoRecord {
  kind: 'redo';
}

/** Any action recorded in the transcript. */
export type TranscriptEntry =
  | PlayerMoveRecord
  | AutoAdvanceRecord
  | UndoRecord
  | RedoRecord;

// ── Game outcome ────────────────────────────────────────────

export type GameOutcome = 'win' | 'abandoned' | 'in-progress';

// ── Transcript ──────────────────────────────────────────────

/** A complete Dragon Cell game transcript. */
export interface DragonCellTranscript {
  /** Format version for future compatibility. */
  version: 1;
  game: 'dragon-cell';
  /** The RNG seed used for the deal, or null for an explicit deck. */
  seed: number | null;
  /** ISO 8601 timestamp when the game started. */
  startedAt: string;
  /** ISO 8601 timestamp when the game ended (set on finalize). */
  endedAt: string;
  /** Board state after the deal, before any moves. */
  initialState: BoardSnapshot;
  /** All actions in order. */
  moves: TranscriptEntry[];
  /** Final outcome (set on finalize). */
  outcome: GameOutcome;
}

// ── Helpers ─────────────────────────────────────────────────

function snapshotFreeCell(cell: FreeCellState): FreeCellSnapshot {
  switch (cell.kind) {
    case 'empty':
      return null;
    case 'card':
      return cardLabel(cell.card);
    case 'dragon-locked':
      return `locked:${cell.suit}`;
  }
}

/** Create a board snapshot from the current game state. */
export function snapshotBoard(state: DragonCellState): BoardSnapshot {
  return {
    tableau: state.tableau.map((pile) => pile.toArray().map(cardLabel)),
    freeCells: state.freeCells.map(snapshotFreeCell),
    foundations: FOUNDATION_SUITS.map((suit, fi) => ({
      suit,
      value: state.foundations[fi],
    })),
    flowerPlaced: state.flowerPlaced,
  };
}

// ── DragonCellTranscriptRecorder ────────────────────────────

/**
 * Records a game transcript by capturing actions as they happen.
 */
export class DragonCellTranscriptRecorder {
  private readonly transcript: DragonCellTranscript;

  constructor(seed: number | null, initialState: DragonCellState) {
    this.transcript = {
      version: 1,
      game: 'dragon-cell',
      seed,
      startedAt: new Date().toISOString(),
      endedAt: '',
      initialState: snapshotBoard(initialState),
      moves: [],
      outcome: 'in-progress',
    };
  }

  recordMove(move: DragonCellMove): void {
    this.transcript.moves.push({ kind: 'player-move', move });
  }

  /** Record an auto-advance; a count of zero is not recorded. */
  recordAutoAdvance(count: number): void {
    if (count > 0) {
      this.transcript.moves.push({ kind: 'auto-advance', count });
    }
  }

  recordUndo(): void {
    this.transcript.moves.push({ kind: 'undo' });
  }

  recordRedo(): void {
    this.transcript.moves.push({ kind: 'redo' });
  }

  /**
   * Finalize the transcript with the game outcome.
   *
   * @returns The complete transcript.
   */
  finalize(outcome: GameOutcome): DragonCellTranscript {
    this.transcript.endedAt = new Date().toISOString();
    this.transcript.outcome = outcome;
    return this.transcript;
  }

  /**
   * Clear a recorded outcome so recording can continue, e.g. after a
   * winning move has been undone.
   */
  reopen(): void {
    this.transcript.endedAt = '';
    this.transcript.outcome = 'in-progress';
  }

  /**
   * Get the transcript in its current state (may not be finalized).
   */
  getTranscript(): DragonCellTranscript {
    return this.transcript;
  }
}
