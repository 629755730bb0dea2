/**
 * Dragon Cell -- interactive terminal game.
 *
 * Usage:
 *   npm start -- [--seed <n>] [--no-color] [--no-auto]
 *
 * Reads one command per line (see `help`), applies it to a
 * DragonCellSession and prints the board after every action.
 */

import * as readline from 'node:readline';
import { GameEventEmitter } from '../../src/core-engine/GameEventEmitter';
import { parseCommand, commandToMove } from './CommandParser';
import type { Command } from './CommandParser';
import { DragonCellSession } from './DragonCellSession';
import { TextRenderer } from './TextRenderer';

// ── CLI Arg Parsing ─────────────────────────────────────────

interface CliOptions {
  seed?: number;
  color: boolean;
  autoAdvance: boolean;
}

function parseArgs(args: string[]): CliOptions {
  const options: CliOptions = { color: true, autoAdvance: true };

  for (let i = 0; i < args.length; i++) {
    const arg = args[i];
    if (arg === '--help' || arg === '-h') {
      console.log(`
Usage: npm start -- [--seed <n>] [--no-color] [--no-auto]

Options:
  --seed <n>    Deal a reproducible game from a numeric seed
  --no-color    Plain output without ANSI colors
  --no-auto     Do not move safe cards to the foundations automatically
`);
      process.exit(0);
    } else if (arg === '--seed' || arg === '-s') {
      const value = Number(args[++i]);
      if (!Number.isInteger(value) || value < 0) {
        console.error(`Error: --seed needs a non-negative integer, got '${args[i]}'`);
        process.exit(1);
      }
      options.seed = value;
    } else if (arg === '--no-color') {
      options.color = false;
    } else if (arg === '--no-auto') {
      options.autoAdvance = false;
    } else {
      console.error(`Error: unknown argument '${arg}'`);
      process.exit(1);
    }
  }

  return options;
}

// ── Game loop ───────────────────────────────────────────────

/**
 * Handle one parsed command. Returns true when the player quits.
 */
function handle(
  command: Command,
  session: DragonCellSession,
  renderer: TextRenderer,
): boolean {
  switch (command.kind) {
    case 'quit':
      console.log(renderer.info('Thanks for playing. Goodbye!'));
      return true;
    case 'help':
      console.log(renderer.help());
      return false;
    case 'undo':
      console.log(
        session.undo()
          ? renderer.info('Undo successful.')
          : renderer.error('Nothing to undo.'),
      );
      return false;
    case 'redo':
      console.log(
        session.redo()
          ? renderer.info('Redo successful.')
          : renderer.error('Nothing to redo.'),
      );
      return false;
    case 'new-game':
      session.newGame(command.seed);
      console.log(renderer.info(`A new game has been dealt (seed ${session.seed}).`));
      return false;
    default:
      break;
  }

  const converted = commandToMove(command, session.state);
  if (!converted.ok) {
    console.log(renderer.error(converted.error));
    return false;
  }
  if (!converted.value) return false;

  const result = session.play(converted.value);
  if (!result.ok) {
    console.log(renderer.error(result.reason));
  }
  return false;
}

async function main(): Promise<void> {
  const options = parseArgs(process.argv.slice(2));
  const renderer = new TextRenderer({ color: options.color });
  // Subscribe before the deal so the opening auto-advance is reported.
  const events = new GameEventEmitter();
  events.on('cards-auto-advanced', ({ count }) => {
    console.log(renderer.info(`Auto-moved ${count} card(s) to foundation.`));
  });
  events.on('dragons-merged', ({ suit, cellIndex }) => {
    console.log(renderer.info(`Merged the ${suit} dragons into free cell ${cellIndex}.`));
  });
  events.on('game-won', () => {
    console.log(renderer.win());
  });
  const session = new DragonCellSession({
    seed: options.seed,
    autoAdvance: options.autoAdvance,
    events,
  });

  console.log(renderer.info(`Dealt game with seed ${session.seed}. Type 'help' for commands.`));
  console.log(renderer.render(session.state));

  const rl = readline.createInterface({
    input: process.stdin,
    output: process.stdout,
    prompt: '> ',
  });
  rl.prompt();

  for await (const line of rl) {
    const parsed = parseCommand(line);
    if (!parsed.ok) {
      console.log(renderer.error(parsed.error));
      rl.prompt();
      continue;
    }
    if (handle(parsed.value, session, renderer)) break;

    console.log(renderer.render(session.state));
    if (!session.won && session.stuck) {
      console.log(renderer.info("No legal moves remain. Type 'undo' or 'new'."));
    }
    rl.prompt();
  }

  rl.close();
}

main().catch((err: unknown) => {
  console.error('[dragon-cell] Fatal error:', err);
  process.exitCode = 1;
});
