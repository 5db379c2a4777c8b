/**
 * Node terminal adapter
 *
 * Maps stdin/stdout to the xterm.js-compatible GameTerminal interface so the
 * game runs directly in any terminal emulator.
 */

import type { IDisposable } from '@xterm/xterm';
import type { GameTerminal, TerminalKeyEvent } from './game/utils';

/** What the adapter needs from stdin */
export interface KeyboardInput {
  isTTY?: boolean;
  setRawMode?(mode: boolean): unknown;
  setEncoding(encoding: BufferEncoding): unknown;
  resume(): unknown;
  pause(): unknown;
  on(event: 'data', listener: (data: string) => void): unknown;
  off(event: 'data', listener: (data: string) => void): unknown;
}

/** What the adapter needs from stdout */
export interface ScreenOutput {
  columns?: number;
  rows?: number;
  write(data: string): unknown;
  on(event: 'resize', listener: () => void): unknown;
  off(event: 'resize', listener: () => void): unknown;
}

export interface NodeTerminal extends GameTerminal {
  /** Restore the terminal: cooked mode, main buffer, visible cursor */
  dispose(): void;
}

export interface NodeTerminalOptions {
  input?: KeyboardInput;
  output?: ScreenOutput;
  /** Ctrl+C arrives as data in raw mode */
  onInterrupt?: () => void;
}

// Synchronized output: wrap writes with DEC sync sequences so the
// terminal batches clear + redraw into a single atomic paint.
export const SYNC_START = '\x1b[?2026h';
export const SYNC_END = '\x1b[?2026l';

export const RESTORE_SEQUENCE = '\x1b[?1049l\x1b[?25h\x1b[0m';

/**
 * Parse raw stdin escape sequences into key names
 * compatible with DOM KeyboardEvent.key values
 */
export function parseKey(data: string): string {
  if (data === '\x1b[A' || data === '\x1bOA') return 'ArrowUp';
  if (data === '\x1b[B' || data === '\x1bOB') return 'ArrowDown';
  if (data === '\x1b[C' || data === '\x1bOC') return 'ArrowRight';
  if (data === '\x1b[D' || data === '\x1bOD') return 'ArrowLeft';
  if (data === '\r' || data === '\n') return 'Enter';
  if (data === '\x1b') return 'Escape';
  if (data === '\x7f' || data === '\b') return 'Backspace';
  if (data === '\t') return 'Tab';
  return data;
}

class ListenerSet<T> {
  private readonly listeners: ((value: T) => void)[] = [];

  add(listener: (value: T) => void): IDisposable {
    this.listeners.push(listener);
    return {
      dispose: () => {
        const idx = this.listeners.indexOf(listener);
        if (idx !== -1) this.listeners.splice(idx, 1);
      },
    };
  }

  emit(value: T): void {
    for (const listener of [...this.listeners]) {
      listener(value);
    }
  }

  clear(): void {
    this.listeners.length = 0;
  }
}

export function createNodeTerminal(options: NodeTerminalOptions = {}): NodeTerminal {
  const input = options.input ?? process.stdin;
  const output = options.output ?? process.stdout;
  const keyListeners = new ListenerSet<TerminalKeyEvent>();
  const resizeListeners = new ListenerSet<{ cols: number; rows: number }>();
  let disposed = false;

  const cols = () => output.columns || 80;
  const rows = () => output.rows || 24;

  const onData = (data: string) => {
    if (data === '\x03') {
      options.onInterrupt?.();
      return;
    }

    const key = parseKey(data);
    keyListeners.emit({
      key: data,
      domEvent: {
        key,
        preventDefault: () => {},
        stopPropagation: () => {},
      },
    });
  };

  const onResize = () => {
    resizeListeners.emit({ cols: cols(), rows: rows() });
  };

  if (input.isTTY) {
    input.setRawMode?.(true);
  }
  input.resume();
  input.setEncoding('utf8');
  input.on('data', onData);
  output.on('resize', onResize);

  return {
    get cols() { return cols(); },
    get rows() { return rows(); },
    write: (data: string) => {
      output.write(SYNC_START + data + SYNC_END);
    },
    onKey: listener => keyListeners.add(listener),
    onResize: listener => resizeListeners.add(listener),
    dispose: () => {
      if (disposed) return;
      disposed = true;
      input.off('data', onData);
      output.off('resize', onResize);
      keyListeners.clear();
      resizeListeners.clear();
      if (input.isTTY) {
        input.setRawMode?.(false);
      }
      input.pause();
      output.write(RESTORE_SEQUENCE);
    },
  };
}
