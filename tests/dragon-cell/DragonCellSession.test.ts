import { describe, it, expect, vi } from 'vitest';
import {
  DEFAULT_MAX_UNDO_HISTORY,
  DragonCellSession,
  SnapshotCommand,
} from '../../games/dragon-cell/DragonCellSession';
import type { DragonCellMove } from '../../games/dragon-cell/DragonCellState';
import { cloneState, columnAt, freeCellAt } from '../../games/dragon-cell/DragonCellState';
import { autoAdvance, dealSeeded } from '../../games/dragon-cell/DragonCellRules';
import { snapshotBoard } from '../../games/dragon-cell/GameTranscript';
import { GameEventEmitter } from '../../src/core-engine/GameEventEmitter';
import { createDeckFrom } from '../../src/card-system/Deck';
import {
  PLAIN_LAYOUT,
  WINNABLE_LAYOUT,
  board,
  column,
  deckFromColumns,
} from './helpers';

// ── Helpers ─────────────────────────────────────────────────

function plainSession(options: { maxUndoHistory?: number; events?: GameEventEmitter } = {}) {
  return new DragonCellSession({
    deck: createDeckFrom(deckFromColumns(PLAIN_LAYOUT)),
    ...options,
  });
}

/** R8 from column 1 onto G9 in column 0. */
const R8_ONTO_G9: DragonCellMove = { kind: 'stack', fromCol: 1, startIndex: 4, toCol: 0 };

/** R7 from column 6 into free cell 0, uncovering R1. */
const R7_TO_CELL: DragonCellMove = { kind: 'card', from: columnAt(6), to: freeCellAt(0) };

/** B9 onto R9: never legal. */
const B9_ONTO_R9: DragonCellMove = { kind: 'card', from: columnAt(2), to: columnAt(3) };

// ── Tests ───────────────────────────────────────────────────

describe('DragonCellSession', () => {
  describe('construction', () => {
    it('should deal an explicit deck without a seed', () => {
      const session = plainSession();
      expect(session.seed).toBeNull();
      expect(column(session.state, 0)).toEqual(['B5', 'G2', 'B3', 'R4', 'G9']);
      expect(session.canUndo()).toBe(false);
      expect(session.won).toBe(false);
      expect(session.stuck).toBe(false);
    });

    it('should deal from a seed and auto-advance the deal', () => {
      const session = new DragonCellSession({ seed: 42 });
      const expected = dealSeeded(42);
      autoAdvance(expected);

      expect(session.seed).toBe(42);
      expect(snapshotBoard(session.state)).toEqual(snapshotBoard(expected));
    });

    it('should emit new-game and the initial auto-advance', () => {
      const events = new GameEventEmitter();
      const log: string[] = [];
      events.on('new-game', ({ seed }) => log.push(`new-game ${String(seed)}`));
      events.on('cards-auto-advanced', ({ count }) => log.push(`advanced ${count}`));

      const session = new DragonCellSession({
        deck: createDeckFrom(deckFromColumns(WINNABLE_LAYOUT)),
        events,
      });

      expect(session.events).toBe(events);
      expect(log).toEqual(['new-game null', 'advanced 28']);
      expect(session.state.foundations).toEqual([9, 9, 9]);
      expect(session.state.flowerPlaced).toBe(true);
    });

    it('should skip auto-advance when disabled', () => {
      const session = new DragonCellSession({
        deck: createDeckFrom(deckFromColumns(WINNABLE_LAYOUT)),
        autoAdvance: false,
      });
      expect(session.state.foundations).toEqual([0, 0, 0]);

      const result = session.play({ kind: 'foundation', from: columnAt(0) });
      expect(result).toEqual({ ok: true, autoAdvanced: 0, won: false });
      expect(session.state.flowerPlaced).toBe(true);
      expect(column(session.state, 0)).toEqual(['BD', 'GD', 'RD', 'R1']);
    });

    it('should reject a bad deck', () => {
      expect(() => new DragonCellSession({ deck: [] })).toThrow(
        'Need exactly 40 cards to deal, got 0',
      );
    });
  });

  describe('play', () => {
    it('should apply a legal move', () => {
      const session = plainSession();
      expect(session.play(R8_ONTO_G9)).toEqual({ ok: true, autoAdvanced: 0, won: false });
      expect(column(session.state, 0)).toEqual(['B5', 'G2', 'B3', 'R4', 'G9', 'R8']);
      expect(column(session.state, 1)).toEqual(['G1', 'B2', 'R3', 'G4']);
      expect(session.canUndo()).toBe(true);
    });

    it('should auto-advance cards uncovered by a move', () => {
      const events = new GameEventEmitter();
      const log: string[] = [];
      events.on('move-applied', ({ description }) => log.push(description));
      events.on('cards-auto-advanced', ({ count }) => log.push(`advanced ${count}`));
      const session = plainSession({ events });

      expect(session.play(R7_TO_CELL)).toEqual({ ok: true, autoAdvanced: 1, won: false });
      expect(session.state.foundations).toEqual([1, 0, 0]);
      expect(column(session.state, 6)).toEqual(['RD', 'GD', 'BD']);
      expect(log).toEqual(['Move column 6 -> free cell 0', 'advanced 1']);
    });

    it('should leave everything unchanged when a move is rejected', () => {
      const rejected = vi.fn();
      const events = new GameEventEmitter();
      events.on('move-rejected', rejected);
      const session = plainSession({ events });
      const before = snapshotBoard(session.state);

      expect(session.play(B9_ONTO_R9)).toEqual({
        ok: false,
        code: 'cannot-stack',
        reason: 'Cannot place B9 on R9 in column 3',
      });
      expect(rejected).toHaveBeenCalledWith({
        description: 'Move column 2 -> column 3',
        code: 'cannot-stack',
        reason: 'Cannot place B9 on R9 in column 3',
      });
      expect(snapshotBoard(session.state)).toEqual(before);
      expect(session.canUndo()).toBe(false);
      expect(session.transcript.moves).toEqual([]);
    });
  });

  describe('undo / redo', () => {
    it('should undo a move together with its auto-advance', () => {
      const session = plainSession();
      session.play(R7_TO_CELL);

      expect(session.undo()).toBe(true);
      expect(column(session.state, 6)).toEqual(['RD', 'GD', 'BD', 'R1', 'R7']);
      expect(session.state.foundations).toEqual([0, 0, 0]);
      expect(session.state.freeCells[0].kind).toBe('empty');
      expect(session.canRedo()).toBe(true);
    });

    it('should redo an undone move', () => {
      const session = plainSession();
      session.play(R7_TO_CELL);
      const after = snapshotBoard(session.state);
      session.undo();

      expect(session.redo()).toBe(true);
      expect(snapshotBoard(session.state)).toEqual(after);
    });

    it('should keep the same board reference across undo and redo', () => {
      const session = plainSession();
      const live = session.state;
      session.play(R8_ONTO_G9);
      session.undo();
      session.redo();
      expect(session.state).toBe(live);
    });

    it('should return false with nothing to undo or redo', () => {
      const undo = vi.fn();
      const events = new GameEventEmitter();
      events.on('undo', undo);
      const session = plainSession({ events });

      expect(session.undo()).toBe(false);
      expect(session.redo()).toBe(false);
      expect(undo).not.toHaveBeenCalled();
    });

    it('should emit history sizes', () => {
      const events = new GameEventEmitter();
      const sizes: string[] = [];
      events.on('undo', ({ undoSize, redoSize }) => sizes.push(`undo ${undoSize}/${redoSize}`));
      events.on('redo', ({ undoSize, redoSize }) => sizes.push(`redo ${undoSize}/${redoSize}`));
      const session = plainSession({ events });
      session.play(R8_ONTO_G9);
      session.undo();
      session.redo();
      expect(sizes).toEqual(['undo 0/1', 'redo 1/0']);
    });

    it('should discard redo after a new move', () => {
      const session = plainSession();
      session.play(R8_ONTO_G9);
      session.undo();
      session.play(R7_TO_CELL);
      expect(session.canRedo()).toBe(false);
    });

    it('should honour maxUndoHistory', () => {
      const session = plainSession({ maxUndoHistory: 1 });
      session.play(R8_ONTO_G9);
      session.play(R7_TO_CELL);
      expect(session.undo()).toBe(true);
      expect(session.undo()).toBe(false);
      expect(column(session.state, 1)).toEqual(['G1', 'B2', 'R3', 'G4']);
    });

    it('should keep 64 undo steps by default', () => {
      const session = plainSession();
      session.play(R7_TO_CELL);
      for (let i = 0; i < 70; i++) {
        const result = session.play({
          kind: 'card',
          from: freeCellAt(i % 2),
          to: freeCellAt((i + 1) % 2),
        });
        expect(result.ok).toBe(true);
      }

      let undone = 0;
      while (session.undo()) undone++;
      expect(undone).toBe(DEFAULT_MAX_UNDO_HISTORY);
      expect(DEFAULT_MAX_UNDO_HISTORY).toBe(64);
    });
  });

  describe('winning', () => {
    it('should win by merging the dragons of every suit', () => {
      const events = new GameEventEmitter();
      const log: string[] = [];
      events.on('dragons-merged', ({ suit, cellIndex }) => log.push(`merged ${suit} ${cellIndex}`));
      events.on('move-applied', ({ description }) => log.push(description));
      events.on('game-won', ({ seed }) => log.push(`won ${String(seed)}`));
      const session = new DragonCellSession({
        deck: createDeckFrom(deckFromColumns(WINNABLE_LAYOUT)),
        events,
      });

      expect(session.play({ kind: 'merge', suit: 'red' })).toEqual({
        ok: true,
        autoAdvanced: 0,
        won: false,
      });
      session.play({ kind: 'merge', suit: 'green' });
      expect(session.play({ kind: 'merge', suit: 'black' })).toEqual({
        ok: true,
        autoAdvanced: 0,
        won: true,
      });

      expect(log).toEqual([
        'merged red 0',
        'Merge red dragons',
        'merged green 1',
        'Merge green dragons',
        'merged black 2',
        'Merge black dragons',
        'won null',
      ]);
      expect(session.won).toBe(true);
      expect(session.stuck).toBe(true);
      expect(session.transcript.outcome).toBe('win');
      expect(session.transcript.endedAt).not.toBe('');
    });

    it('should reopen the transcript when the winning move is undone', () => {
      const session = new DragonCellSession({
        deck: createDeckFrom(deckFromColumns(WINNABLE_LAYOUT)),
      });
      session.play({ kind: 'merge', suit: 'red' });
      session.play({ kind: 'merge', suit: 'green' });
      session.play({ kind: 'merge', suit: 'black' });
      expect(session.transcript.outcome).toBe('win');

      expect(session.undo()).toBe(true);
      expect(session.won).toBe(false);
      expect(session.transcript.outcome).toBe('in-progress');
      expect(session.transcript.endedAt).toBe('');

      expect(session.redo()).toBe(true);
      expect(session.won).toBe(true);
      expect(session.transcript.outcome).toBe('win');
      expect(session.transcript.endedAt).not.toBe('');
    });

    it('should reject merging a suit that is still buried', () => {
      const session = new DragonCellSession({
        deck: createDeckFrom(deckFromColumns(WINNABLE_LAYOUT)),
      });
      expect(session.play({ kind: 'merge', suit: 'green' })).toEqual({
        ok: false,
        code: 'dragons-not-exposed',
        reason: 'Cannot merge green dragons: only 0 of 4 are exposed',
      });
    });
  });

  describe('newGame', () => {
    it('should return the abandoned transcript and deal from the seed', () => {
      const newGame = vi.fn();
      const events = new GameEventEmitter();
      const session = plainSession({ events });
      session.play(R8_ONTO_G9);
      events.on('new-game', newGame);

      const finished = session.newGame(7);
      expect(finished.outcome).toBe('abandoned');
      expect(finished.seed).toBeNull();
      expect(finished.moves).toEqual([{ kind: 'player-move', move: R8_ONTO_G9 }]);

      const expected = dealSeeded(7);
      autoAdvance(expected);
      expect(session.seed).toBe(7);
      expect(snapshotBoard(session.state)).toEqual(snapshotBoard(expected));
      expect(session.canUndo()).toBe(false);
      expect(session.transcript.seed).toBe(7);
      expect(session.transcript.outcome).toBe('in-progress');
      expect(newGame).toHaveBeenCalledWith({ seed: 7 });
    });

    it('should report a won game as a win', () => {
      const session = new DragonCellSession({
        deck: createDeckFrom(deckFromColumns(WINNABLE_LAYOUT)),
      });
      session.play({ kind: 'merge', suit: 'red' });
      session.play({ kind: 'merge', suit: 'green' });
      session.play({ kind: 'merge', suit: 'black' });
      expect(session.newGame(1).outcome).toBe('win');
    });
  });

  describe('snapshot', () => {
    it('should return an independent copy of the board', () => {
      const session = plainSession();
      const copy = session.snapshot();
      copy.tableau[0].clear();
      expect(session.state.tableau[0].size()).toBe(5);
    });
  });
});

describe('SnapshotCommand', () => {
  it('should restore the after and before boards in place', () => {
    const state = board({ columns: [['R5']] });
    const before = cloneState(state);
    const after = board({ cells: ['R5'] });
    const command = new SnapshotCommand(state, before, after, 'Move column 0 -> free cell 0');

    command.execute();
    expect(column(state, 0)).toEqual([]);
    expect(state.freeCells[0].kind).toBe('card');

    command.undo();
    expect(column(state, 0)).toEqual(['R5']);
    expect(state.freeCells[0].kind).toBe('empty');
    expect(command.description).toBe('Move column 0 -> free cell 0');
  });
});
