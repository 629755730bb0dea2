/**
 * Typed Event Emitter.
 *
 * A type-safe, zero-dependency emitter for game lifecycle events.
 * The session emits these at key points; shells (CLI output,
 * transcripts, tests) subscribe to them.
 */

import type { Suit } from '../card-system/Card';

// ── Event Payloads ──────────────────────────────────────────

/**
 * Emitted after a player action has been applied.
 */
export interface MoveAppliedPayload {
  /** Human-readable description, e.g. "Move column 2 -> free cell 0". */
  readonly description: string;
}

/**
 * Emitted when a player action is rejected. The board is unchanged.
 */
export interface MoveRejectedPayload {
  readonly description: string;
  /** Machine-readable rejection code. */
  readonly code: string;
  /** Player-facing reason. */
  readonly reason: string;
}

/**
 * Emitted when auto-advance moved at least one card to a foundation.
 */
export interface CardsAutoAdvancedPayload {
  /** Number of cards advanced. */
  readonly count: number;
}

/**
 * Emitted after four dragons have been merged into a free cell.
 */
export interface DragonsMergedPayload {
  readonly suit: Suit;
  /** Index of the free cell that is now locked. */
  readonly cellIndex: number;
}

/**
 * Emitted after an undo or redo changed the board.
 */
export interface HistoryPayload {
  /** Steps left on the undo stack. */
  readonly undoSize: number;
  /** Steps left on the redo stack. */
  readonly redoSize: number;
}

/**
 * Emitted when the board reaches the won state.
 */
export interface GameWonPayload {
  /** Seed of the won deal, or null for an explicit deck. */
  readonly seed: number | null;
}

/**
 * Emitted when a new board has been dealt.
 */
export interface NewGamePayload {
  /** Seed used for the shuffle, or null for an explicit deck. */
  readonly seed: number | null;
}

// ── Event Map ───────────────────────────────────────────────

/**
 * Maps event names to their payload types.
 *
 * Subscribing to an event name not in this map produces a
 * compile-time TypeScript error.
 */
export interface GameEventMap {
  'move-applied': MoveAppliedPayload;
  'move-rejected': MoveRejectedPayload;
  'cards-auto-advanced': CardsAutoAdvancedPayload;
  'dragons-merged': DragonsMergedPayload;
  undo: HistoryPayload;
  redo: HistoryPayload;
  'game-won': GameWonPayload;
  'new-game': NewGamePayload;
}

/** Union of all valid game event names. */
export type GameEventName = keyof GameEventMap;

// ── Listener types ──────────────────────────────────────────

/** A callback for a specific event type. */
export type GameEventListener<K extends GameEventName> = (
  payload: GameEventMap[K],
) => void;

type ListenerTable = {
  [K in GameEventName]: Array<GameEventListener<K>>;
};

function emptyListenerTable(): ListenerTable {
  return {
    'move-applied': [],
    'move-rejected': [],
    'cards-auto-advanced': [],
    'dragons-merged': [],
    undo: [],
    redo: [],
    'game-won': [],
    'new-game': [],
  };
}

// ── Emitter ─────────────────────────────────────────────────

/**
 * A minimal, typed event emitter for game lifecycle events.
 *
 * Usage:
 * ```ts
 * const emitter = new GameEventEmitter();
 * emitter.on('cards-auto-advanced', ({ count }) => {
 *   console.log(`Auto-moved ${count} card(s) to foundation.`);
 * });
 * ```
 */
export class GameEventEmitter {
  private readonly listeners: ListenerTable = emptyListenerTable();

  /**
   * Subscribe to an event. Returns an unsubscribe function.
   */
  on<K extends GameEventName>(
    event: K,
    listener: GameEventListener<K>,
  ): () => void {
    const list: Array<GameEventListener<K>> = this.listeners[event];
    list.push(listener);
    return () => this.off(event, listener);
  }

  /**
   * Subscribe to an event for a single emission only.
   * Returns an unsubscribe function (in case you want to
   * cancel before it fires).
   */
  once<K extends GameEventName>(
    event: K,
    listener: GameEventListener<K>,
  ): () => void {
    const wrapper: GameEventListener<K> = (payload) => {
      this.off(event, wrapper);
      listener(payload);
    };
    return this.on(event, wrapper);
  }

  /**
   * Remove a specific listener for an event.
   */
  off<K extends GameEventName>(
    event: K,
    listener: GameEventListener<K>,
  ): void {
    const list: Array<GameEventListener<K>> = this.listeners[event];
    const index = list.indexOf(listener);
    if (index !== -1) {
      list.splice(index, 1);
    }
  }

  /**
   * Emit an event with the given payload.
   * Listeners are called synchronously in registration order.
   */
  emit<K extends GameEventName>(event: K, payload: GameEventMap[K]): void {
    const list: Array<GameEventListener<K>> = this.listeners[event];
    // Copy so listeners can unsubscribe during emission
    for (const fn of [...list]) {
      fn(payload);
    }
  }

  /**
   * Remove all listeners, optionally for a specific event only.
   */
  removeAllListeners(event?: GameEventName): void {
    if (event) {
      this.listeners[event].length = 0;
      return;
    }
    for (const list of Object.values(this.listeners)) {
      list.length = 0;
    }
  }

  /**
   * Return the number of listeners for a given event.
   */
  listenerCount(event: GameEventName): number {
    return this.listeners[event].length;
  }
}
