/**
 * terminal-delve
 *
 * A turn-based dungeon crawler for xterm.js and the command line.
 *
 * Library usage (xterm.js):
 *   import { runDungeonGame, setTheme } from 'terminal-delve';
 *   setTheme('amber');
 *   const controller = runDungeonGame(terminal, { savePath: 'delve-save.txt' });
 *
 * CLI usage:
 *   npx terminal-delve --name Ada
 */

export * from './game';

export { getPalette, getThemeModes, isValidThemeMode, paint, THEME_MODES, ANSI_RESET } from './themes';
export type { DungeonPalette } from './themes';
