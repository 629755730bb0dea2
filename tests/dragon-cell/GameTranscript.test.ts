import { describe, it, expect } from 'vitest';
import {
  DragonCellTranscriptRecorder,
  snapshotBoard,
} from '../../games/dragon-cell/GameTranscript';
import { columnAt, freeCellAt } from '../../games/dragon-cell/DragonCellState';
import { moveCard } from '../../games/dragon-cell/DragonCellRules';
import { board } from './helpers';

describe('snapshotBoard', () => {
  it('should capture cards as labels and cells by kind', () => {
    const state = board({
      columns: [['R9', 'GD']],
      cells: ['FL', 'locked:green', null],
      foundations: [1, 0, 2],
    });

    expect(snapshotBoard(state)).toEqual({
      tableau: [['R9', 'GD'], [], [], [], [], [], [], []],
      freeCells: ['FL', 'locked:green', null],
      foundations: [
        { suit: 'red', value: 1 },
        { suit: 'green', value: 0 },
        { suit: 'black', value: 2 },
      ],
      flowerPlaced: false,
    });
  });
});

describe('DragonCellTranscriptRecorder', () => {
  it('should start an in-progress transcript', () => {
    const recorder = new DragonCellTranscriptRecorder(5, board({ columns: [['B2']] }));
    const transcript = recorder.getTranscript();

    expect(transcript.version).toBe(1);
    expect(transcript.game).toBe('dragon-cell');
    expect(transcript.seed).toBe(5);
    expect(transcript.endedAt).toBe('');
    expect(transcript.outcome).toBe('in-progress');
    expect(transcript.moves).toEqual([]);
    expect(Number.isNaN(Date.parse(transcript.startedAt))).toBe(false);
  });

  it('should keep the initial board as dealt', () => {
    const state = board({ columns: [['B2']] });
    const recorder = new DragonCellTranscriptRecorder(null, state);
    moveCard(state, columnAt(0), freeCellAt(0));

    const { initialState } = recorder.getTranscript();
    expect(initialState.tableau[0]).toEqual(['B2']);
    expect(initialState.freeCells).toEqual([null, null, null]);
  });

  it('should record actions in order and skip empty auto-advances', () => {
    const recorder = new DragonCellTranscriptRecorder(1, board());
    recorder.recordMove({ kind: 'merge', suit: 'black' });
    recorder.recordAutoAdvance(0);
    recorder.recordAutoAdvance(2);
    recorder.recordUndo();
    recorder.recordRedo();

    expect(recorder.getTranscript().moves).toEqual([
      { kind: 'player-move', move: { kind: 'merge', suit: 'black' } },
      { kind: 'auto-advance', count: 2 },
      { kind: 'undo' },
      { kind: 'redo' },
    ]);
  });

  it('should finalize with the outcome and an end time', () => {
    const recorder = new DragonCellTranscriptRecorder(1, board());
    const transcript = recorder.finalize('abandoned');

    expect(transcript).toBe(recorder.getTranscript());
    expect(transcript.outcome).toBe('abandoned');
    expect(Number.isNaN(Date.parse(transcript.endedAt))).toBe(false);
  });

  it('should clear the outcome on reopen', () => {
    const recorder = new DragonCellTranscriptRecorder(1, board());
    recorder.finalize('win');
    recorder.reopen();

    expect(recorder.getTranscript().outcome).toBe('in-progress');
    expect(recorder.getTranscript().endedAt).toBe('');
  });

  it('should serialize to JSON without loss', () => {
    const recorder = new DragonCellTranscriptRecorder(9, board({ columns: [['R1']] }));
    recorder.recordMove({ kind: 'foundation', from: columnAt(0) });
    const transcript = recorder.finalize('win');

    expect(JSON.parse(JSON.stringify(transcript))).toEqual(transcript);
  });
});
