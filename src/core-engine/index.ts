/**
 * Core Engine Module
 *
 * Game-agnostic plumbing shared by the game modules: undo/redo
 * history and the typed lifecycle event emitter.
 */
export const ENGINE_VERSION = '0.1.0';

// Undo/Redo system
export type { Command, UndoRedoManagerOptions } from './UndoRedoManager';
export { UndoRedoManager } from './UndoRedoManager';

// Game event system
export type {
  MoveAppliedPayload,
  MoveRejectedPayload,
  CardsAutoAdvancedPayload,
  DragonsMergedPayload,
  HistoryPayload,
  GameWonPayload,
  NewGamePayload,
  GameEventMap,
  GameEventName,
  GameEventListener,
} from './GameEventEmitter';
export { GameEventEmitter } from './GameEventEmitter';
