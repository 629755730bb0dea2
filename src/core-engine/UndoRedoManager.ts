/**
 * Undo/Redo Manager.
 *
 * Command-pattern linear history. Commands define `execute()` and
 * `undo()`; the manager keeps an undo stack and a redo stack, with an
 * optional cap on how many undo steps are retained.
 *
 * Game code that has already applied a change (for example, a move
 * followed by the auto-advance it triggered) hands the finished step
 * to `record()` instead of `execute()`.
 */

// ── Command interface ───────────────────────────────────────

/**
 * A reversible command that can be executed and undone.
 */
export interface Command {
  /** Apply the command (forward). */
  execute(): void;
  /** Reverse the command (backward). */
  undo(): void;
  /** Optional human-readable description for debugging/transcripts. */
  readonly description?: string;
}

export interface UndoRedoManagerOptions {
  /**
   * Maximum number of undo steps kept. When exceeded, the oldest
   * step is dropped. Defaults to unlimited.
   */
  maxHistory?: number;
}

// ── UndoRedoManager ─────────────────────────────────────────

/**
 * - `execute(cmd)` runs a command and pushes it onto the undo stack.
 * - `record(cmd)` pushes an already-applied command.
 * - `undo()` pops the last command, calls `undo()`, and pushes it
 *   onto the redo stack.
 * - `redo()` pops from the redo stack, calls `execute()`, and pushes
 *   it back onto the undo stack.
 * - A new command after an undo clears the redo stack.
 * - `undo()` / `redo()` on an empty stack do nothing and return false.
 */
export class UndoRedoManager {
  private readonly undoStack: Command[] = [];
  private readonly redoStack: Command[] = [];
  private readonly maxHistory: number;

  constructor(options: UndoRedoManagerOptions = {}) {
    const { maxHistory = Infinity } = options;
    if (!(maxHistory >= 1)) {
      throw new Error(`maxHistory must be at least 1, got ${maxHistory}`);
    }
    this.maxHistory = maxHistory;
  }

  /**
   * Execute a command and add it to the undo history.
   */
  execute(command: Command): void {
    command.execute();
    this.record(command);
  }

  /**
   * Add a command whose effect has already been applied.
   * Clears the redo stack (no branching history).
   */
  record(command: Command): void {
    this.undoStack.push(command);
    if (this.undoStack.length > this.maxHistory) {
      this.undoStack.shift();
    }
    this.redoStack.length = 0;
  }

  /**
   * Undo the most recent command.
   * @returns Whether a command was undone.
   */
  undo(): boolean {
    const command = this.undoStack.pop();
    if (command === undefined) {
      return false;
    }
    command.undo();
    this.redoStack.push(command);
    return true;
  }

  /**
   * Redo the most recently undone command.
   * @returns Whether a command was redone.
   */
  redo(): boolean {
    const command = this.redoStack.pop();
    if (command === undefined) {
      return false;
    }
    command.execute();
    this.undoStack.push(command);
    return true;
  }

  canUndo(): boolean {
    return this.undoStack.length > 0;
  }

  canRedo(): boolean {
    return this.redoStack.length > 0;
  }

  get undoSize(): number {
    return this.undoStack.length;
  }

  get redoSize(): number {
    return this.redoStack.length;
  }

  /**
   * Read-only view of the undo history (oldest first).
   */
  get history(): readonly Command[] {
    return [...this.undoStack];
  }

  /** Clear all undo and redo history. */
  clear(): void {
    this.undoStack.length = 0;
    this.redoStack.length = 0;
  }
}
