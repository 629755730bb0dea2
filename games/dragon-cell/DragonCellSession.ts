/**
 * DragonCellSession -- the headless command shell for one game.
 *
 * Owns the board and wires the rules to their collaborators:
 *   - Each player action plus the auto-advance it triggers is one
 *     SnapshotCommand in the UndoRedoManager
 *   - Actions, auto-advances and undo/redo go to the transcript recorder
 *   - Lifecycle events go to a GameEventEmitter
 *
 * Presentation layers (the CLI, tests) drive a session and read its
 * state; they never mutate the board directly.
 */

import type { Card } from '../../src/card-system/Card';
import { GameEventEmitter } from '../../src/core-engine/GameEventEmitter';
import type { Command } from '../../src/core-engine/UndoRedoManager';
import { UndoRedoManager } from '../../src/core-engine/UndoRedoManager';
import type { DragonCellMove, DragonCellState } from './DragonCellState';
import { cloneState, restoreState } from './DragonCellState';
import {
  applyMove,
  autoAdvance,
  dealFromDeck,
  dealSeeded,
  describeMove,
  hasNoMoves,
  isWon,
} from './DragonCellRules';
import type { IllegalMoveCode } from './IllegalMoveError';
import { IllegalMoveError } from './IllegalMoveError';
import { DragonCellTranscriptRecorder } from './GameTranscript';
import type { DragonCellTranscript } from './GameTranscript';

/** Undo steps kept by default. */
export const DEFAULT_MAX_UNDO_HISTORY = 64;

export interface SessionOptions {
  /** Shuffle seed. Defaults to `Date.now()`. Ignored when `deck` is given. */
  seed?: number;
  /** Explicit 40-card deal order. */
  deck?: readonly Card[];
  /** Undo steps retained. Defaults to 64. */
  maxUndoHistory?: number;
  /** Send safe cards to the foundations automatically. Defaults to true. */
  autoAdvance?: boolean;
  /** Emitter to publish lifecycle events on. A new one is created if omitted. */
  events?: GameEventEmitter;
}

/** Outcome of a player action. */
export type ActionResult =
  | {
      readonly ok: true;
      /** Cards auto-advanced after the action. */
      readonly autoAdvanced: number;
      readonly won: boolean;
    }
  | {
      readonly ok: false;
      readonly code: IllegalMoveCode;
      readonly reason: string;
    };

// ── SnapshotCommand ─────────────────────────────────────────

/**
 * A reversible step stored as full board copies taken before and
 * after it. Restoring happens in place, so the session's board
 * reference stays valid.
 */
export class SnapshotCommand implements Command {
  constructor(
    private readonly state: DragonCellState,
    private readonly before: DragonCellState,
    private readonly after: DragonCellState,
    readonly description?: string,
  ) {}

  execute(): void {
    restoreState(this.state, this.after);
  }

  undo(): void {
    restoreState(this.state, this.before);
  }
}

// ── Session ─────────────────────────────────────────────────

export class DragonCellSession {
  readonly events: GameEventEmitter;

  private board: DragonCellState;
  private currentSeed: number | null;
  private readonly history: UndoRedoManager;
  private recorder: DragonCellTranscriptRecorder;
  private readonly autoAdvanceEnabled: boolean;

  constructor(options: SessionOptions = {}) {
    const {
      maxUndoHistory = DEFAULT_MAX_UNDO_HISTORY,
      autoAdvance: autoAdvanceEnabled = true,
      events = new GameEventEmitter(),
    } = options;

    this.events = events;
    this.autoAdvanceEnabled = autoAdvanceEnabled;
    this.history = new UndoRedoManager({ maxHistory: maxUndoHistory });

    if (options.deck) {
      this.currentSeed = null;
      this.board = dealFromDeck(options.deck);
    } else {
      this.currentSeed = options.seed ?? Date.now();
      this.board = dealSeeded(this.currentSeed);
    }
    this.recorder = new DragonCellTranscriptRecorder(this.currentSeed, this.board);
    this.afterDeal();
  }

  // ── Read-only views ─────────────────────────────────────

  /** The live board. Renderers read it; only the session mutates it. */
  get state(): DragonCellState {
    return this.board;
  }

  /** Seed of the current deal, or null for an explicit deck. */
  get seed(): number | null {
    return this.currentSeed;
  }

  get won(): boolean {
    return isWon(this.board);
  }

  /** Whether no legal action remains. */
  get stuck(): boolean {
    return hasNoMoves(this.board);
  }

  canUndo(): boolean {
    return this.history.canUndo();
  }

  canRedo(): boolean {
    return this.history.canRedo();
  }

  /** An independent deep copy of the board. */
  snapshot(): DragonCellState {
    return cloneState(this.board);
  }

  /** The transcript recorded so far. */
  get transcript(): DragonCellTranscript {
    return this.recorder.getTranscript();
  }

  // ── Actions ─────────────────────────────────────────────

  /**
   * Apply a player action, then auto-advance.
   *
   * A rejected action leaves the board, history and transcript as
   * they were.
   */
  play(move: DragonCellMove): ActionResult {
    const description = describeMove(move);
    const before = cloneState(this.board);

    try {
      applyMove(this.board, move);
    } catch (err) {
      if (err instanceof IllegalMoveError) {
        this.events.emit('move-rejected', {
          description,
          code: err.code,
          reason: err.message,
        });
        return { ok: false, code: err.code, reason: err.message };
      }
      throw err;
    }

    if (move.kind === 'merge') {
      const cellIndex = this.board.freeCells.findIndex(
        (cell) => cell.kind === 'dragon-locked' && cell.suit === move.suit,
      );
      this.events.emit('dragons-merged', { suit: move.suit, cellIndex });
    }
    this.recorder.recordMove(move);
    this.events.emit('move-applied', { description });

    const advanced = this.runAutoAdvance();
    this.history.record(
      new SnapshotCommand(this.board, before, cloneState(this.board), description),
    );

    const won = this.checkWin();
    return { ok: true, autoAdvanced: advanced, won };
  }

  /**
   * Undo the last action (and its auto-advance).
   * @returns Whether anything was undone.
   */
  undo(): boolean {
    if (!this.history.undo()) return false;
    if (this.recorder.getTranscript().outcome === 'win' && !this.won) {
      this.recorder.reopen();
    }
    this.recorder.recordUndo();
    this.events.emit('undo', this.historySizes());
    return true;
  }

  /**
   * Redo the last undone action.
   * @returns Whether anything was redone.
   */
  redo(): boolean {
    if (!this.history.redo()) return false;
    this.recorder.recordRedo();
    this.events.emit('redo', this.historySizes());
    this.checkWin();
    return true;
  }

  /**
   * Abandon the current game and deal a new one. History is cleared.
   *
   * @returns The finalized transcript of the abandoned game.
   */
  newGame(seed: number = Date.now()): DragonCellTranscript {
    const finished = this.recorder.finalize(this.won ? 'win' : 'abandoned');

    this.currentSeed = seed;
    this.board = dealSeeded(seed);
    this.history.clear();
    this.recorder = new DragonCellTranscriptRecorder(seed, this.board);
    this.afterDeal();
    return finished;
  }

  // ── Internals ───────────────────────────────────────────

  private afterDeal(): void {
    this.events.emit('new-game', { seed: this.currentSeed });
    this.runAutoAdvance();
  }

  private runAutoAdvance(): number {
    if (!this.autoAdvanceEnabled) return 0;
    const count = autoAdvance(this.board);
    this.recorder.recordAutoAdvance(count);
    if (count > 0) {
      this.events.emit('cards-auto-advanced', { count });
    }
    return count;
  }

  private checkWin(): boolean {
    if (!isWon(this.board)) return false;
    this.recorder.finalize('win');
    this.events.emit('game-won', { seed: this.currentSeed });
    return true;
  }

  private historySizes(): { undoSize: number; redoSize: number } {
    return {
      undoSize: this.history.undoSize,
      redoSize: this.history.redoSize,
    };
  }
}
