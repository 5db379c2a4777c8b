/**
 * Delve: terminal dungeon crawler
 *
 * Drives a GameSession on any xterm.js-compatible terminal: main menu,
 * turn-based movement, inventory hotkeys, pause and game-over menus.
 * The game redraws after every key press; nothing runs on a timer.
 */

import { type DungeonPalette, paint } from '../../themes';
import {
  type GameTerminal,
  type TerminalKeyEvent,
  enterAlternateBuffer,
  exitAlternateBuffer,
  getCurrentPalette,
} from '../utils';
import {
  GAME_OVER_MENU_ITEMS,
  MAIN_MENU_ITEMS,
  PAUSE_MENU_ITEMS,
  type SimpleMenuItem,
  centerText,
  checkShortcut,
  navigateMenu,
  renderSimpleMenu,
} from '../shared/menu';
import {
  type GameSession,
  type SessionOptions,
  addMessage,
  createSession,
  handleMovement,
  newGame,
  shutdown,
  update,
  useItem,
} from './engine';
import type { Direction } from './entities';
import { describeItem } from './items';
import { CLEAR_SCREEN, renderFrame } from './render';
import { loadGame, saveGame } from './save';

/**
 * Dungeon Game Controller
 */
export interface DungeonController {
  stop: () => void;
  readonly isRunning: boolean;
  readonly session: GameSession;
}

export interface DungeonOptions extends SessionOptions {
  /** Name for new characters */
  playerName?: string;
  /** Where SAVE writes and LOAD reads */
  savePath: string;
  /** Load savePath straight away instead of showing the main menu */
  load?: boolean;
  /** Called once after the game has quit and left the alternate buffer */
  onQuit?: () => void;
}

export const DEFAULT_PLAYER_NAME = 'Adventurer';

const MOVE_KEYS = new Map<string, Direction>([
  ['ArrowUp', 'north'],
  ['w', 'north'],
  ['ArrowDown', 'south'],
  ['s', 'south'],
  ['ArrowRight', 'east'],
  ['d', 'east'],
  ['ArrowLeft', 'west'],
  ['a', 'west'],
]);

// Inventory slots reachable from the keyboard
const HOTKEY_SLOTS = 9;

const SIDEBAR_WIDTH = 18;
const SIDEBAR_LINES = ['MOVE  ←↑→↓ WASD', 'USE   1-9', 'MENU  ESC'];

/**
 * Packed inventory line: slot number followed by the item glyph
 */
export function packLine(session: GameSession): string {
  const inventory = session.player?.inventory ?? [];
  if (inventory.length === 0) return 'Pack: empty';

  const slots = inventory.slice(0, HOTKEY_SLOTS).map((id, i) => {
    const item = session.items.get(id);
    return `${i + 1}${item ? item.symbol : '?'}`;
  });
  const extra = inventory.length > HOTKEY_SLOTS ? ` +${inventory.length - HOTKEY_SLOTS}` : '';
  return `Pack: ${slots.join(' ')}${extra}`;
}

/**
 * Run the dungeon crawler on a terminal
 */
export function runDungeonGame(terminal: GameTerminal, options: DungeonOptions): DungeonController {
  const { playerName = DEFAULT_PLAYER_NAME, savePath, load = false, onQuit, ...sessionOptions } = options;
  const session = createSession(sessionOptions);

  let running = true;
  let paused = false;
  let menuSelection = 0;
  // One-line notice under the main menu (e.g. a failed load)
  let notice = '';

  const controller: DungeonController = {
    stop: () => {
      if (!running) return;
      running = false;
    },
    get isRunning() { return running; },
    session,
  };

  function startNewGame() {
    newGame(session, playerName);
    paused = false;
    menuSelection = 0;
    notice = '';
  }

  function tryLoad(): boolean {
    if (!loadGame(session, savePath)) return false;
    paused = false;
    menuSelection = 0;
    notice = '';
    addMessage(session, `Welcome back, ${session.player?.name ?? playerName}.`);
    return true;
  }

  function quit() {
    controller.stop();
  }

  // ==========================================================================
  // Rendering
  // ==========================================================================

  function renderMainMenu(palette: DungeonPalette): string {
    const centerX = Math.floor(terminal.cols / 2);
    const title = '══ DELVE ══';
    const subtitle = 'A terminal dungeon crawler';

    let output = CLEAR_SCREEN;
    output += centerText(title, centerX, 4) + paint(palette.accent, title);
    output += centerText(subtitle, centerX, 6) + paint(palette.dim, subtitle);
    output += renderSimpleMenu(MAIN_MENU_ITEMS, menuSelection, { centerX, startY: 9 }, palette);
    if (notice) {
      output += centerText(notice, centerX, 13) + paint(palette.enemy, notice);
    }
    const navHint = '↑↓ select   ENTER confirm';
    output += centerText(navHint, centerX, 15) + paint(palette.dim, navHint);
    return output;
  }

  function renderOverlay(
    title: string,
    titleColor: string,
    items: readonly SimpleMenuItem[],
    palette: DungeonPalette
  ): string {
    const centerX = Math.floor(session.config.mapWidth / 2) + 1;
    const titleY = Math.max(1, Math.floor(session.config.mapHeight / 2) - 2);

    let output = centerText(title, centerX, titleY) + paint(titleColor, title);
    output += renderSimpleMenu(items, menuSelection, { centerX, startY: titleY + 2, showShortcuts: false }, palette);
    return output;
  }

  /**
   * Key help and the named pack contents, right of the map when there is room
   */
  function renderSidebar(palette: DungeonPalette): string {
    const x = session.config.mapWidth + 3;
    const width = terminal.cols - x + 1;
    if (width < SIDEBAR_WIDTH) return '';

    let output = SIDEBAR_LINES
      .map((line, i) => `\x1b[${i + 2};${x}H` + paint(palette.dim, line))
      .join('');

    const inventory = session.player?.inventory ?? [];
    let row = SIDEBAR_LINES.length + 3;
    output += `\x1b[${row++};${x}H` + paint(palette.accent, 'PACK');
    inventory.slice(0, HOTKEY_SLOTS).forEach((id, i) => {
      const item = session.items.get(id);
      if (!item) return;
      const full = `${i + 1} ${describeItem(item)}`;
      const line = full.length <= width ? full : `${i + 1} ${item.name}`.slice(0, width);
      output += `\x1b[${row++};${x}H` + paint(palette.item, line);
    });
    return output;
  }

  function render() {
    if (!running) return;
    const palette = getCurrentPalette();

    if (session.state === 'mainMenu') {
      terminal.write(renderMainMenu(palette));
      return;
    }

    let output = renderFrame(session, palette);
    output += `\x1b[${session.config.mapHeight + 3};1H` + paint(palette.dim, packLine(session));
    output += renderSidebar(palette);

    if (session.state === 'gameOver') {
      output += renderOverlay('══ GAME OVER ══', palette.enemy, GAME_OVER_MENU_ITEMS, palette);
    } else if (paused) {
      output += renderOverlay('══ PAUSED ══', palette.accent, PAUSE_MENU_ITEMS, palette);
    }

    terminal.write(output);
  }

  // ==========================================================================
  // Input
  // ==========================================================================

  /**
   * Shared menu input: returns the chosen index, or -1 when nothing was chosen
   */
  function menuChoice(items: readonly SimpleMenuItem[], key: string, domEvent: TerminalKeyEvent['domEvent']): number {
    const { newSelection, confirmed } = navigateMenu(menuSelection, items.length, key, domEvent);
    if (newSelection !== menuSelection) {
      menuSelection = newSelection;
      return -1;
    }
    if (confirmed) return menuSelection;
    return checkShortcut(items, key);
  }

  function handleMainMenu(key: string, domEvent: TerminalKeyEvent['domEvent']) {
    switch (menuChoice(MAIN_MENU_ITEMS, key, domEvent)) {
      case 0: // New game
        startNewGame();
        break;
      case 1: // Load
        if (!tryLoad()) notice = 'No save game found.';
        break;
      case 2: // Quit
        quit();
        break;
    }
  }

  function handleGameOver(key: string, domEvent: TerminalKeyEvent['domEvent']) {
    switch (menuChoice(GAME_OVER_MENU_ITEMS, key, domEvent)) {
      case 0: // New game
        startNewGame();
        break;
      case 1: // Quit
        quit();
        break;
    }
  }

  function handlePauseMenu(key: string, domEvent: TerminalKeyEvent['domEvent']) {
    if (key === 'escape') {
      paused = false;
      return;
    }

    switch (menuChoice(PAUSE_MENU_ITEMS, key, domEvent)) {
      case 0: // Resume
        paused = false;
        break;
      case 1: // Save
        addMessage(session, saveGame(session, savePath) ? 'Game saved.' : 'Could not save game.');
        paused = false;
        break;
      case 2: // Load
        if (!tryLoad()) {
          addMessage(session, 'Could not load game.');
          paused = false;
        }
        break;
      case 3: // Quit
        quit();
        break;
    }
  }

  function handlePlaying(key: string, domEvent: TerminalKeyEvent['domEvent']) {
    if (key === 'escape') {
      paused = true;
      menuSelection = 0;
      return;
    }

    const direction = MOVE_KEYS.get(domEvent.key) ?? MOVE_KEYS.get(key);
    if (direction) {
      handleMovement(session, direction);
      update(session);
      if (session.state === 'gameOver') menuSelection = 0;
      return;
    }

    const slot = Number.parseInt(key, 10);
    if (key.length === 1 && slot >= 1 && slot <= HOTKEY_SLOTS) {
      useItem(session, slot - 1);
    }
  }

  setTimeout(() => {
    if (!running) return;

    enterAlternateBuffer(terminal, 'dungeon-game');

    if (load && !tryLoad()) {
      notice = 'No save game found.';
    }
    render();

    const keyListener = terminal.onKey(({ domEvent }) => {
      if (!running) {
        keyListener.dispose();
        return;
      }

      domEvent.preventDefault();
      domEvent.stopPropagation();

      const key = domEvent.key.toLowerCase();

      if (session.state === 'mainMenu') {
        handleMainMenu(key, domEvent);
      } else if (session.state === 'gameOver') {
        handleGameOver(key, domEvent);
      } else if (paused) {
        handlePauseMenu(key, domEvent);
      } else {
        handlePlaying(key, domEvent);
      }

      render();
    });

    const resizeListener = terminal.onResize(() => {
      render();
    });

    const originalStop = controller.stop;
    controller.stop = () => {
      if (!running) return;
      keyListener.dispose();
      resizeListener.dispose();
      originalStop();
      exitAlternateBuffer(terminal, 'dungeon-game');
      shutdown(session);
      onQuit?.();
    };
  }, 25);

  return controller;
}
