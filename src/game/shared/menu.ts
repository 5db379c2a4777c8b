/**
 * Shared Menu Helpers
 *
 * Index-based menu navigation (arrow keys / W S + Enter/Space) with
 * keyboard shortcuts for quick access.
 */

import { paint, type DungeonPalette } from '../../themes';
import type { TerminalKeyEvent } from '../utils';

export interface SimpleMenuItem {
  label: string;
  shortcut?: string; // e.g., 'ESC', 'N', 'Q'
}

/** The part of a key event the menus look at */
export type MenuKeyEvent = Pick<TerminalKeyEvent['domEvent'], 'key'>;

/**
 * Handle menu navigation
 * Returns new selection index
 */
export function navigateMenu(
  currentSelection: number,
  itemCount: number,
  key: string,
  domEvent: MenuKeyEvent
): { newSelection: number; confirmed: boolean } {
  let newSelection = currentSelection;
  let confirmed = false;

  if (domEvent.key === 'ArrowUp' || key === 'w') {
    newSelection = (currentSelection - 1 + itemCount) % itemCount;
  } else if (domEvent.key === 'ArrowDown' || key === 's') {
    newSelection = (currentSelection + 1) % itemCount;
  } else if (domEvent.key === 'Enter' || domEvent.key === ' ') {
    confirmed = true;
  }

  return { newSelection, confirmed };
}

/**
 * Check if a shortcut key was pressed
 * Returns the index of the matching item, or -1 if no match
 */
export function checkShortcut(
  items: readonly SimpleMenuItem[],
  key: string
): number {
  return items.findIndex(item => item.shortcut !== undefined && key === item.shortcut.toLowerCase());
}

/**
 * Render a menu, one item per row, centered on centerX
 * Returns ANSI escape sequence string
 */
export function renderSimpleMenu(
  items: readonly SimpleMenuItem[],
  selection: number,
  options: {
    centerX: number;
    startY: number;
    showShortcuts?: boolean;
  },
  palette: DungeonPalette
): string {
  const { centerX, startY, showShortcuts = true } = options;
  const selectedStyle = palette.accent ? `\x1b[1m${palette.accent}` : '';

  let output = '';

  items.forEach((item, i) => {
    const isSelected = i === selection;

    let displayText = item.label;
    if (showShortcuts && item.shortcut) {
      displayText += ` [${item.shortcut}]`;
    }

    const text = isSelected ? `► ${displayText} ◄` : `  ${displayText}  `;
    const style = isSelected ? selectedStyle : palette.dim;

    output += centerText(text, centerX, startY + i) + paint(style, text);
  });

  return output;
}

/**
 * Cursor position that centers text on centerX (never left of column 1)
 */
export function centerText(text: string, centerX: number, row: number): string {
  const x = Math.max(1, centerX - Math.floor(text.length / 2));
  return `\x1b[${row};${x}H`;
}

export const MAIN_MENU_ITEMS: readonly SimpleMenuItem[] = [
  { label: 'NEW GAME', shortcut: 'N' },
  { label: 'LOAD GAME', shortcut: 'L' },
  { label: 'QUIT', shortcut: 'Q' },
];

// SAVE has no shortcut: S already moves the selection down
export const PAUSE_MENU_ITEMS: readonly SimpleMenuItem[] = [
  { label: 'RESUME', shortcut: 'ESC' },
  { label: 'SAVE' },
  { label: 'LOAD', shortcut: 'L' },
  { label: 'QUIT', shortcut: 'Q' },
];

export const GAME_OVER_MENU_ITEMS: readonly SimpleMenuItem[] = [
  { label: 'NEW GAME', shortcut: 'N' },
  { label: 'QUIT', shortcut: 'Q' },
];
