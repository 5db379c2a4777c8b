/**
 * Terminal dungeon crawler for xterm.js and CLI
 *
 * Usage:
 * 1. Set the theme: setTheme('amber')
 * 2. Run the game: runDungeonGame(terminal, { savePath })
 * 3. Or drive a GameSession directly through the engine functions
 */

// Re-export utilities
export {
  setTheme,
  getTheme,
  getCurrentPalette,
  enterAlternateBuffer,
  exitAlternateBuffer,
  isInAlternateBuffer,
} from './utils';

export type { ThemeMode, GameTerminal, TerminalKeyEvent } from './utils';

// Re-export menu utilities
export {
  navigateMenu,
  checkShortcut,
  renderSimpleMenu,
  centerText,
  MAIN_MENU_ITEMS,
  PAUSE_MENU_ITEMS,
  GAME_OVER_MENU_ITEMS,
} from './shared/menu';

export type { SimpleMenuItem, MenuKeyEvent } from './shared/menu';

// Terminal runner
export { runDungeonGame, packLine, DEFAULT_PLAYER_NAME } from './dungeon';
export type { DungeonController, DungeonOptions } from './dungeon';

// Engine
export {
  createSession,
  startPosition,
  allocateEntityId,
  addMessage,
  newGame,
  resumeGame,
  nextLevel,
  shutdown,
  spawnEnemies,
  spawnItems,
  getEnemyAt,
  handleMovement,
  handleCombat,
  pickUpItem,
  useItem,
  update,
  DEFAULT_CONFIG,
  INITIAL_ENEMIES,
  ITEMS_PER_LEVEL,
  SPAWN_CELL,
} from './dungeon/engine';

export type {
  GameState,
  GameConfig,
  GameSession,
  FloorItem,
  PlayerStats,
  SessionOptions,
} from './dungeon/engine';

// Entities, items, map and generation
export {
  createPlayer,
  createEnemy,
  takeDamage,
  heal,
  isAlive,
  addToInventory,
  movePlayer,
  samePosition,
  ENEMY_STATS,
  SPAWN_ORDER,
  INVENTORY_CAPACITY,
} from './dungeon/entities';

export type { Position, Direction, EntityId, EnemyType, Combatant, Player, Enemy } from './dungeon/entities';

export { ItemArena, ITEM_TEMPLATES, LOOT_TABLE, describeItem } from './dungeon/items';
export type { Item, ItemId, ItemEffect, ItemKind, ItemTemplate, LootKey } from './dungeon/items';

export { DungeonMap, TILES } from './dungeon/map';
export type { Tile, TileType } from './dungeon/map';

export { RoomGenerator, centeredRoom } from './dungeon/generator';
export type { DungeonGenerator, Rect } from './dungeon/generator';

export { SeededRandom, randomSeed } from './dungeon/random';

// Rendering and saves
export { renderFrame, statusLine, moveTo, CLEAR_SCREEN } from './dungeon/render';
export { serializeSave, parseSave, saveGame, loadGame } from './dungeon/save';
