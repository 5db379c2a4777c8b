/**
 * Shared utilities for the game
 *
 * Theme state, the terminal surface the game draws on, and
 * alternate screen buffer bookkeeping.
 */

import type { IDisposable } from '@xterm/xterm';
import { type ThemeMode, type DungeonPalette, getPalette } from '../themes';

// ============================================================================
// Terminal Surface
// ============================================================================

export interface TerminalKeyEvent {
  key: string;
  domEvent: {
    key: string;
    preventDefault: () => void;
    stopPropagation: () => void;
  };
}

/**
 * The slice of the xterm.js Terminal API the game uses.
 * An xterm.js Terminal satisfies it as-is; the CLI adapts stdin/stdout to it.
 */
export interface GameTerminal {
  readonly cols: number;
  readonly rows: number;
  write(data: string): void;
  onKey(listener: (event: TerminalKeyEvent) => void): IDisposable;
  onResize(listener: (size: { cols: number; rows: number }) => void): IDisposable;
}

// ============================================================================
// Theme Configuration
// ============================================================================

/**
 * Current theme mode - configured by the consuming application
 */
let currentTheme: ThemeMode = 'cyan';

/**
 * Set the current theme mode
 */
export function setTheme(mode: ThemeMode): void {
  currentTheme = mode;
}

/**
 * Get the current theme mode
 */
export function getTheme(): ThemeMode {
  return currentTheme;
}

/**
 * Get the glyph palette of the current theme
 */
export function getCurrentPalette(): DungeonPalette {
  return getPalette(currentTheme);
}

// ============================================================================
// Alternate Buffer Management
// ============================================================================

/**
 * Track which terminals are currently in alternate buffer.
 * This prevents double-entry/exit issues and provides debugging info.
 */
const alternateBufferState = new WeakMap<GameTerminal, { reason: string; enteredAt: number }>();

/**
 * Enter alternate screen buffer with state tracking.
 * Safe to call multiple times - will log warning but not double-enter.
 *
 * @param reason - Description of why we're entering (for debugging)
 * @returns true if buffer was entered, false if already in buffer
 */
export function enterAlternateBuffer(terminal: GameTerminal, reason: string): boolean {
  const existing = alternateBufferState.get(terminal);
  if (existing) {
    console.warn(`[AlternateBuffer] Already in buffer (entered by: ${existing.reason}), requested by: ${reason}`);
    return false;
  }

  terminal.write('\x1b[?1049h'); // Enter alternate screen buffer
  terminal.write('\x1b[?25l');   // Hide cursor
  terminal.write('\x1b[2J\x1b[H'); // Clear screen

  alternateBufferState.set(terminal, { reason, enteredAt: Date.now() });
  return true;
}

/**
 * Exit alternate screen buffer with state tracking.
 *
 * @returns true if buffer was exited, false if not in buffer
 */
export function exitAlternateBuffer(terminal: GameTerminal, reason: string): boolean {
  if (!alternateBufferState.has(terminal)) {
    console.warn(`[AlternateBuffer] Not in alternate buffer, exit requested by: ${reason}`);
    return false;
  }

  terminal.write('\x1b[?1049l'); // Exit alternate screen buffer
  terminal.write('\x1b[?25h');   // Show cursor

  alternateBufferState.delete(terminal);
  return true;
}

/**
 * Check if terminal is currently in alternate buffer
 */
export function isInAlternateBuffer(terminal: GameTerminal): boolean {
  return alternateBufferState.has(terminal);
}

// Re-export ThemeMode type for convenience
export type { ThemeMode } from '../themes';
