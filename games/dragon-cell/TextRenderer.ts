/**
 * Plain-text renderer for Dragon Cell.
 *
 * Turns a board into terminal lines. It only reads state. ANSI color
 * is optional so output can be compared verbatim in tests or piped.
 */

import type { Card, Suit } from '../../src/card-system/Card';
import { cardLabel, numbered, isCardValue, suitSymbol } from '../../src/card-system/Card';
import type { DragonCellState, FreeCellState } from './DragonCellState';
import { FOUNDATION_SUITS, TABLEAU_COUNT } from './DragonCellState';
import helpContent from './help-content.json';

/** A titled block of help text. */
export interface HelpSection {
  heading: string;
  body: string;
}

export interface TextRendererOptions {
  /** Wrap card labels in ANSI color codes. Defaults to true. */
  color?: boolean;
  /** Help sections. Defaults to the bundled help-content.json. */
  helpSections?: readonly HelpSection[];
}

// ── ANSI ────────────────────────────────────────────────────

const RESET = '\x1b[0m';

const SUIT_COLORS: Record<Suit, string> = {
  red: '\x1b[31m',
  green: '\x1b[32m',
  black: '\x1b[90m',
};

const FLOWER_COLOR = '\x1b[35m';
const INFO_COLOR = '\x1b[36m';
const ERROR_COLOR = '\x1b[31m';
const WIN_COLOR = '\x1b[33m';

const EMPTY_SLOT = '[  ]';
const GAP = ' .. ';

export class TextRenderer {
  private readonly color: boolean;
  private readonly helpSections: readonly HelpSection[];

  constructor(options: TextRendererOptions = {}) {
    this.color = options.color ?? true;
    this.helpSections = options.helpSections ?? helpContent;
  }

  // ── Board ───────────────────────────────────────────────

  /**
   * Render the full board: free cells, flower slot and foundations on
   * one line, then the column header and the tableau row by row.
   */
  render(state: DragonCellState): string {
    const cells = state.freeCells
      .map((cell, i) => `${i}:${this.freeCell(cell)}`)
      .join(' ');
    const flower = state.flowerPlaced
      ? `[${this.paint(FLOWER_COLOR, 'FL')}]`
      : EMPTY_SLOT;
    const foundations = FOUNDATION_SUITS.map((suit, fi) => {
      const value = state.foundations[fi];
      const top = isCardValue(value) ? this.card(numbered(suit, value)) : '[--]';
      return `${suitSymbol(suit)}${top}`;
    }).join(' ');

    const lines = [
      `FREE CELLS: ${cells}  FLOWER: ${flower}  FOUND: ${foundations}`,
      '',
    ];

    const header: string[] = [];
    for (let col = 0; col < TABLEAU_COUNT; col++) header.push(` ${col}  `);
    lines.push(`COL: ${header.join(' ')}`.trimEnd());

    const depth = Math.max(...state.tableau.map((pile) => pile.size()));
    if (depth === 0) {
      lines.push('(all columns empty)');
    }
    for (let row = 0; row < depth; row++) {
      const slots = state.tableau.map((pile) => {
        const card = pile.at(row);
        return card ? this.card(card) : GAP;
      });
      lines.push(`${String(row).padStart(3)}: ${slots.join(' ')}`.trimEnd());
    }

    return lines.join('\n');
  }

  // ── Messages ────────────────────────────────────────────

  info(message: string): string {
    return `${this.paint(INFO_COLOR, '[INFO]')} ${message}`;
  }

  error(message: string): string {
    return `${this.paint(ERROR_COLOR, '[ERR ]')} ${message}`;
  }

  help(): string {
    return this.helpSections
      .map((section) => `${section.heading.toUpperCase()}\n${indent(section.body)}`)
      .join('\n\n');
  }

  win(): string {
    return this.paint(
      WIN_COLOR,
      "*** You won! Type 'new' for another game. ***",
    );
  }

  // ── Pieces ──────────────────────────────────────────────

  private card(card: Card): string {
    const label = cardLabel(card);
    const color = card.kind === 'flower' ? FLOWER_COLOR : SUIT_COLORS[card.suit];
    return `[${this.paint(color, label)}]`;
  }

  private freeCell(cell: FreeCellState): string {
    switch (cell.kind) {
      case 'empty':
        return EMPTY_SLOT;
      case 'card':
        return this.card(cell.card);
      case 'dragon-locked':
        return `[${this.paint(SUIT_COLORS[cell.suit], 'XX')}]`;
    }
  }

  private paint(code: string, text: string): string {
    return this.color ? `${code}${text}${RESET}` : text;
  }
}

function indent(text: string): string {
  return text
    .split('\n')
    .map((line) => `  ${line}`)
    .join('\n');
}
