/**
 * CLI entry point for terminal-delve
 *
 * Parses flags, asks for a hero name when needed, then runs the game on a
 * Node terminal adapter over stdin/stdout.
 */

import * as p from '@clack/prompts';
import { HELP_TEXT, parseArgs, validatePlayerName } from './args';
import { DEFAULT_PLAYER_NAME, runDungeonGame, setTheme } from './game';
import { createNodeTerminal } from './node-terminal';

async function askPlayerName(): Promise<string | null> {
  p.intro('delve');
  const name = await p.text({
    message: 'What is your name, adventurer?',
    placeholder: DEFAULT_PLAYER_NAME,
    defaultValue: DEFAULT_PLAYER_NAME,
    validate: validatePlayerName,
  });
  if (p.isCancel(name)) {
    p.cancel('Cancelled.');
    return null;
  }
  return name;
}

async function main() {
  const parsed = parseArgs(process.argv.slice(2));
  if (!parsed.ok) {
    p.log.error(parsed.error);
    console.log(HELP_TEXT);
    process.exit(1);
  }

  const { options } = parsed;
  if (options.help) {
    console.log(HELP_TEXT);
    process.exit(0);
  }

  setTheme(options.theme);

  let playerName = options.name;
  if (playerName === undefined && !options.load) {
    const answer = await askPlayerName();
    if (answer === null) process.exit(0);
    playerName = answer;
  }

  const terminal = createNodeTerminal({
    onInterrupt: () => {
      terminal.dispose();
      process.exit(0);
    },
  });

  process.on('exit', () => terminal.dispose());
  process.on('SIGINT', () => { terminal.dispose(); process.exit(0); });
  process.on('SIGTERM', () => { terminal.dispose(); process.exit(0); });

  runDungeonGame(terminal, {
    playerName,
    seed: options.seed,
    savePath: options.savePath,
    load: options.load,
    onQuit: () => {
      terminal.dispose();
      p.outro('Farewell, adventurer.');
      process.exit(0);
    },
  });
}

main().catch((err: unknown) => {
  p.log.error(err instanceof Error ? err.message : String(err));
  process.exit(1);
});
