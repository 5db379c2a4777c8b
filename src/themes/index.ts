/**
 * Terminal color themes
 *
 * Each theme maps the dungeon's glyph classes (walls, floor, stairs,
 * creatures, loot) to ANSI escape codes.
 */

/**
 * Available theme identifiers
 */
export const THEME_MODES = ['cyan', 'amber', 'green', 'blood', 'ice', 'mono'] as const;

export type ThemeMode = (typeof THEME_MODES)[number];

/**
 * ANSI colors for every glyph class the renderer paints.
 * An empty string paints the glyph without any escape sequence.
 */
export interface DungeonPalette {
  /** Display name */
  name: string;
  /** Titles, selected UI, status line */
  accent: string;
  /** Hints, message log */
  dim: string;
  wall: string;
  floor: string;
  door: string;
  stairs: string;
  trap: string;
  player: string;
  enemy: string;
  item: string;
}

// ============================================================================
// Palettes
// ============================================================================

const palettes: Record<ThemeMode, DungeonPalette> = {
  cyan: {
    name: 'Cyberpunk',
    accent: '\x1b[96m',
    dim: '\x1b[2m\x1b[96m',
    wall: '\x1b[38;5;24m',
    floor: '\x1b[38;5;238m',
    door: '\x1b[38;5;136m',
    stairs: '\x1b[1;97m',
    trap: '\x1b[38;5;161m',
    player: '\x1b[1;93m',
    enemy: '\x1b[1;91m',
    item: '\x1b[1;95m',
  },
  amber: {
    name: 'Amber',
    accent: '\x1b[38;5;214m',
    dim: '\x1b[2m\x1b[38;5;214m',
    wall: '\x1b[38;5;94m',
    floor: '\x1b[38;5;237m',
    door: '\x1b[38;5;172m',
    stairs: '\x1b[1;38;5;229m',
    trap: '\x1b[38;5;160m',
    player: '\x1b[1;97m',
    enemy: '\x1b[1;38;5;202m',
    item: '\x1b[1;38;5;220m',
  },
  green: {
    name: 'Phosphor',
    accent: '\x1b[92m',
    dim: '\x1b[2m\x1b[92m',
    wall: '\x1b[38;5;22m',
    floor: '\x1b[38;5;236m',
    door: '\x1b[38;5;34m',
    stairs: '\x1b[1;97m',
    trap: '\x1b[38;5;118m',
    player: '\x1b[1;92m',
    enemy: '\x1b[1;93m',
    item: '\x1b[1;96m',
  },
  blood: {
    name: 'Blood',
    accent: '\x1b[91m',
    dim: '\x1b[2m\x1b[91m',
    wall: '\x1b[38;5;52m',
    floor: '\x1b[38;5;236m',
    door: '\x1b[38;5;130m',
    stairs: '\x1b[1;97m',
    trap: '\x1b[38;5;196m',
    player: '\x1b[1;97m',
    enemy: '\x1b[1;91m',
    item: '\x1b[1;93m',
  },
  ice: {
    name: 'Ice',
    accent: '\x1b[38;5;153m',
    dim: '\x1b[2m\x1b[38;5;153m',
    wall: '\x1b[38;5;67m',
    floor: '\x1b[38;5;239m',
    door: '\x1b[38;5;110m',
    stairs: '\x1b[1;97m',
    trap: '\x1b[38;5;203m',
    player: '\x1b[1;97m',
    enemy: '\x1b[1;38;5;209m',
    item: '\x1b[1;38;5;117m',
  },
  // No escape codes at all, for dumb terminals and piped output
  mono: {
    name: 'Monochrome',
    accent: '',
    dim: '',
    wall: '',
    floor: '',
    door: '',
    stairs: '',
    trap: '',
    player: '',
    enemy: '',
    item: '',
  },
};

// ============================================================================
// API Functions
// ============================================================================

/**
 * Get the glyph palette for a theme
 */
export function getPalette(mode: ThemeMode): DungeonPalette {
  return palettes[mode];
}

/**
 * Get all available theme modes
 */
export function getThemeModes(): ThemeMode[] {
  return [...THEME_MODES];
}

const VALID_THEME_MODES = new Set<string>(THEME_MODES);

/**
 * Check if a string is a valid theme mode
 */
export function isValidThemeMode(value: string): value is ThemeMode {
  return VALID_THEME_MODES.has(value);
}

/**
 * ANSI reset code
 */
export const ANSI_RESET = '\x1b[0m';

/**
 * Wrap text in a color, resetting afterwards. Bare text when the color is empty.
 */
export function paint(color: string, text: string): string {
  return color ? `${color}${text}${ANSI_RESET}` : text;
}
