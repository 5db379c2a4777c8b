/**
 * Command-line arguments for the delve CLI
 */

import { homedir } from 'os';
import { resolve } from 'path';
import { type ThemeMode, getThemeModes, isValidThemeMode } from './themes';

export interface CliOptions {
  name?: string;
  seed?: number;
  savePath: string;
  load: boolean;
  theme: ThemeMode;
  help: boolean;
}

export type ParseResult =
  | { ok: true; options: CliOptions }
  | { ok: false; error: string };

export const MAX_NAME_LENGTH = 32;

export function defaultSavePath(home: string = homedir()): string {
  return resolve(home, '.terminal-delve', 'save.txt');
}

/**
 * Hero name check shared by --name and the interactive prompt.
 * Empty input is allowed: the prompt falls back to its default.
 */
export function validatePlayerName(value: string | undefined): string | undefined {
  if (!value) return undefined;
  if (/[\r\n]/.test(value)) return 'Name must fit on one line';
  if (value.trim() === '') return 'Name cannot be blank';
  if (value.length > MAX_NAME_LENGTH) return `Name must be at most ${MAX_NAME_LENGTH} characters`;
  return undefined;
}

export function parseArgs(args: readonly string[], home: string = homedir()): ParseResult {
  const options: CliOptions = {
    savePath: defaultSavePath(home),
    load: false,
    theme: 'cyan',
    help: false,
  };

  for (let i = 0; i < args.length; i++) {
    const arg = args[i];

    if (arg === '--help' || arg === '-h') {
      options.help = true;
      continue;
    }
    if (arg === '--load' || arg === '-l') {
      options.load = true;
      continue;
    }

    if (arg !== '--name' && arg !== '--seed' && arg !== '--save' && arg !== '--theme') {
      return { ok: false, error: `Unknown argument: ${arg}` };
    }

    const value = args[i + 1];
    if (value === undefined || value.startsWith('--')) {
      return { ok: false, error: `${arg} needs a value` };
    }
    i++;

    switch (arg) {
      case '--name': {
        const problem = value === '' ? 'Name cannot be blank' : validatePlayerName(value);
        if (problem) return { ok: false, error: problem };
        options.name = value;
        break;
      }
      case '--seed': {
        const seed = Number(value);
        if (!/^\d+$/.test(value) || !Number.isSafeInteger(seed)) {
          return { ok: false, error: `Seed must be a non-negative integer, got "${value}"` };
        }
        options.seed = seed;
        break;
      }
      case '--save':
        options.savePath = resolve(value);
        break;
      case '--theme':
        if (!isValidThemeMode(value)) {
          return { ok: false, error: `Unknown theme: ${value} (available: ${getThemeModes().join(', ')})` };
        }
        options.theme = value;
        break;
    }
  }

  return { ok: true, options };
}

export const HELP_TEXT = `
  delve: a terminal dungeon crawler

  Usage:
    delve                        Prompt for a hero name and start
    delve --name <name>          Start with this hero name
    delve --load                 Continue from the save file
    delve --save <path>          Save file location (default ~/.terminal-delve/save.txt)
    delve --seed <n>             Reproducible dungeon layout
    delve --theme <theme>        Set color theme
    delve --help                 Show this help

  Themes:
    ${getThemeModes().join(', ')}

  Controls:
    Arrow keys / WASD    Move (walk into enemies to attack)
    1-9                  Use an item from your pack
    Enter                Confirm / select
    ESC                  Pause menu (save, load, quit)
`;
