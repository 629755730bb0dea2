/**
 * Text command parser for the Dragon Cell CLI.
 *
 * Syntax (case-insensitive):
 *   cc <src> <dst>            move top card column -> column
 *   cc <src>:<depth> <dst>    move the run starting <depth> below the top
 *   cf <col> <cell>           column -> free cell
 *   fc <cell> <col>           free cell -> column
 *   ff <cell> <cell>          free cell -> free cell
 *   ctf <col>                 column -> foundation
 *   ftf <cell>                free cell -> foundation
 *   dragon|dr r|g|b           merge dragons
 *   undo|u  redo|r  new|n [seed]  quit|q|exit  help|h|?
 */

import type { Suit } from '../../src/card-system/Card';
import { parseSuit } from '../../src/card-system/Card';
import type { DragonCellMove, DragonCellState } from './DragonCellState';
import {
  FREE_CELL_COUNT,
  TABLEAU_COUNT,
  columnAt,
  freeCellAt,
} from './DragonCellState';

// ── Command types ───────────────────────────────────────────

export type Command =
  | {
      readonly kind: 'column-to-column';
      readonly src: number;
      /** Cards below the top where the run starts (0 = top card only). */
      readonly depth: number;
      readonly dst: number;
    }
  | { readonly kind: 'column-to-cell'; readonly col: number; readonly cell: number }
  | { readonly kind: 'cell-to-column'; readonly cell: number; readonly col: number }
  | { readonly kind: 'cell-to-cell'; readonly src: number; readonly dst: number }
  | { readonly kind: 'column-to-foundation'; readonly col: number }
  | { readonly kind: 'cell-to-foundation'; readonly cell: number }
  | { readonly kind: 'merge-dragons'; readonly suit: Suit }
  | { readonly kind: 'undo' }
  | { readonly kind: 'redo' }
  | { readonly kind: 'new-game'; readonly seed?: number }
  | { readonly kind: 'quit' }
  | { readonly kind: 'help' };

export type ParseResult<T> =
  | { readonly ok: true; readonly value: T }
  | { readonly ok: false; readonly error: string };

function ok<T>(value: T): ParseResult<T> {
  return { ok: true, value };
}

function fail<T>(error: string): ParseResult<T> {
  return { ok: false, error };
}

// ── Token parsers ───────────────────────────────────────────

function parseIndex(
  token: string | undefined,
  limit: number,
  what: string,
): ParseResult<number> {
  if (token === undefined) return fail(`Missing ${what} index`);
  if (!/^\d+$/.test(token)) {
    return fail(`'${token}' is not a valid ${what} index`);
  }
  const n = Number(token);
  if (n >= limit) {
    return fail(`${capitalize(what)} index ${n} out of range (0-${limit - 1})`);
  }
  return ok(n);
}

function capitalize(text: string): string {
  return text.charAt(0).toUpperCase() + text.slice(1);
}

const parseColumn = (token: string | undefined) =>
  parseIndex(token, TABLEAU_COUNT, 'column');

const parseCell = (token: string | undefined) =>
  parseIndex(token, FREE_CELL_COUNT, 'free-cell');

function parseColumnToColumn(tokens: string[]): ParseResult<Command> {
  if (tokens.length < 3) return fail('Usage: cc <src[:<depth>]> <dst>');

  const colon = tokens[1].indexOf(':');
  const srcPart = colon === -1 ? tokens[1] : tokens[1].slice(0, colon);
  const depthPart = colon === -1 ? undefined : tokens[1].slice(colon + 1);
  const src = parseColumn(srcPart);
  if (!src.ok) return src;

  let depth = 0;
  if (depthPart !== undefined) {
    if (!/^\d+$/.test(depthPart)) return fail(`Invalid depth '${depthPart}'`);
    depth = Number(depthPart);
  }

  const dst = parseColumn(tokens[2]);
  if (!dst.ok) return dst;
  return ok({ kind: 'column-to-column', src: src.value, depth, dst: dst.value });
}

// ── parseCommand ────────────────────────────────────────────

/**
 * Parse a single line of input into a Command.
 */
export function parseCommand(input: string): ParseResult<Command> {
  const tokens = input.trim().split(/\s+/).filter((t) => t.length > 0);
  if (tokens.length === 0) return fail('Empty input');

  const name = tokens[0].toLowerCase();
  switch (name) {
    case 'cc':
      return parseColumnToColumn(tokens);

    case 'cf': {
      if (tokens.length < 3) return fail('Usage: cf <src_col> <cell_idx>');
      const col = parseColumn(tokens[1]);
      if (!col.ok) return col;
      const cell = parseCell(tokens[2]);
      if (!cell.ok) return cell;
      return ok({ kind: 'column-to-cell', col: col.value, cell: cell.value });
    }

    case 'fc': {
      if (tokens.length < 3) return fail('Usage: fc <cell_idx> <dst_col>');
      const cell = parseCell(tokens[1]);
      if (!cell.ok) return cell;
      const col = parseColumn(tokens[2]);
      if (!col.ok) return col;
      return ok({ kind: 'cell-to-column', cell: cell.value, col: col.value });
    }

    case 'ff': {
      if (tokens.length < 3) return fail('Usage: ff <src_cell> <dst_cell>');
      const src = parseCell(tokens[1]);
      if (!src.ok) return src;
      const dst = parseCell(tokens[2]);
      if (!dst.ok) return dst;
      return ok({ kind: 'cell-to-cell', src: src.value, dst: dst.value });
    }

    case 'ctf': {
      if (tokens.length < 2) return fail('Usage: ctf <src_col>');
      const col = parseColumn(tokens[1]);
      if (!col.ok) return col;
      return ok({ kind: 'column-to-foundation', col: col.value });
    }

    case 'ftf': {
      if (tokens.length < 2) return fail('Usage: ftf <cell_idx>');
      const cell = parseCell(tokens[1]);
      if (!cell.ok) return cell;
      return ok({ kind: 'cell-to-foundation', cell: cell.value });
    }

    case 'dragon':
    case 'dr': {
      if (tokens.length < 2) return fail('Usage: dragon r|g|b');
      const suit = parseSuit(tokens[1]);
      if (!suit) {
        return fail(`'${tokens[1]}' is not a valid suit. Use r, g, or b.`);
      }
      return ok({ kind: 'merge-dragons', suit });
    }

    case 'undo':
    case 'u':
      return ok({ kind: 'undo' });

    case 'redo':
    case 'r':
      return ok({ kind: 'redo' });

    case 'new':
    case 'n': {
      if (tokens.length < 2) return ok({ kind: 'new-game' });
      if (!/^\d+$/.test(tokens[1])) {
        return fail(`'${tokens[1]}' is not a valid seed`);
      }
      return ok({ kind: 'new-game', seed: Number(tokens[1]) });
    }

    case 'quit':
    case 'q':
    case 'exit':
      return ok({ kind: 'quit' });

    case 'help':
    case 'h':
    case '?':
      return ok({ kind: 'help' });

    default:
      return fail(`Unknown command '${tokens[0]}'. Type 'help' for help.`);
  }
}

// ── Command -> move ─────────────────────────────────────────

/**
 * Convert a move command into a DragonCellMove against the current
 * board. A column-to-column command becomes a stack move whose start
 * index is `depth` cards below the top.
 *
 * @returns The move; `undefined` for shell commands (undo, quit, ...);
 *          or an error when the source column is empty or the depth
 *          reaches below the bottom card.
 */
export function commandToMove(
  command: Command,
  state: DragonCellState,
): ParseResult<DragonCellMove | undefined> {
  switch (command.kind) {
    case 'column-to-column': {
      const { src } = command;
      if (!Number.isInteger(src) || src < 0 || src >= TABLEAU_COUNT) {
        return fail(`Column index ${src} out of range (0-${TABLEAU_COUNT - 1})`);
      }
      const size = state.tableau[src].size();
      if (size === 0) return fail('Source column is empty.');
      if (command.depth >= size) {
        return fail(
          `Column ${command.src} has only ${size} card(s); depth ${command.depth} is too deep.`,
        );
      }
      return ok({
        kind: 'stack',
        fromCol: command.src,
        startIndex: size - 1 - command.depth,
        toCol: command.dst,
      });
    }
    case 'column-to-cell':
      return ok({ kind: 'card', from: columnAt(command.col), to: freeCellAt(command.cell) });
    case 'cell-to-column':
      return ok({ kind: 'card', from: freeCellAt(command.cell), to: columnAt(command.col) });
    case 'cell-to-cell':
      return ok({ kind: 'card', from: freeCellAt(command.src), to: freeCellAt(command.dst) });
    case 'column-to-foundation':
      return ok({ kind: 'foundation', from: columnAt(command.col) });
    case 'cell-to-foundation':
      return ok({ kind: 'foundation', from: freeCellAt(command.cell) });
    case 'merge-dragons':
      return ok({ kind: 'merge', suit: command.suit });
    case 'undo':
    case 'redo':
    case 'new-game':
    case 'quit':
    case 'help':
      return ok(undefined);
  }
}
