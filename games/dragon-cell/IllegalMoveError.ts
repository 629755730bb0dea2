/**
 * Error raised when a Dragon Cell move or merge is rejected.
 *
 * Rejections never mutate the board. The `code` lets callers branch on
 * the kind of rejection; the message is meant for the player.
 */

export type IllegalMoveCode =
  | 'out-of-range'
  | 'empty-source'
  | 'same-column'
  | 'cell-occupied'
  | 'cannot-stack'
  | 'not-a-run'
  | 'foundation-order'
  | 'dragons-not-exposed'
  | 'no-free-cell';

export class IllegalMoveError extends Error {
  readonly code: IllegalMoveCode;

  constructor(code: IllegalMoveCode, message: string) {
    super(message);
    this.name = 'IllegalMoveError';
    this.code = code;
  }
}

/** A rejected check: what went wrong and why. */
export interface MoveRejection {
  readonly code: IllegalMoveCode;
  readonly reason: string;
}

export function reject(code: IllegalMoveCode, reason: string): MoveRejection {
  return { code, reason };
}

/** Throw the rejection as an IllegalMoveError, or return if there is none. */
export function throwIfRejected(rejection: MoveRejection | null): void {
  if (rejection) {
    throw new IllegalMoveError(rejection.code, rejection.reason);
  }
}
