/**
 * Dungeon Engine: Pure Game Logic
 *
 * Session state, the turn loop (move → combat → pickup → stairs),
 * melee resolution, spawning and level transitions. Every operation takes
 * the session it acts on; nothing here is global.
 */

import {
  type Direction,
  type Enemy,
  type EntityId,
  type Player,
  type Position,
  SPAWN_ORDER,
  addToInventory,
  createEnemy,
  createPlayer,
  heal,
  isAlive,
  movePlayer,
  samePosition,
  takeDamage,
} from './entities';
import { ItemArena, ITEM_TEMPLATES, LOOT_TABLE, type ItemId } from './items';
import type { DungeonMap } from './map';
import { type DungeonGenerator, RoomGenerator } from './generator';

// ============================================================================
// Types
// ============================================================================

export type GameState = 'mainMenu' | 'playing' | 'gameOver';

export interface GameConfig {
  mapWidth: number;
  mapHeight: number;
  maxMessages: number;
}

export interface FloorItem {
  itemId: ItemId;
  pos: Position;
}

export interface GameSession {
  state: GameState;
  readonly config: GameConfig;
  readonly generator: DungeonGenerator;
  nextEntityId: EntityId;
  player: Player | null;
  map: DungeonMap | null;
  enemies: Enemy[];
  readonly items: ItemArena;
  floorItems: FloorItem[];
  messages: string[];
}

/** Everything a save file records about the player */
export type PlayerStats = Pick<
  Player,
  'name' | 'health' | 'maxHealth' | 'attackPower' | 'defense' | 'level' | 'experience' | 'gold' | 'dungeonLevel'
>;

export interface SessionOptions extends Partial<GameConfig> {
  /** Seed for the default generator. Ignored when a generator is given. */
  seed?: number;
  generator?: DungeonGenerator;
}

// ============================================================================
// Constants
// ============================================================================

export const DEFAULT_CONFIG: GameConfig = {
  mapWidth: 60,
  mapHeight: 16,
  maxMessages: 5,
};

export const INITIAL_ENEMIES = 5;
export const ITEMS_PER_LEVEL = 3;

// Where a freshly created player stands before being placed in the room
export const SPAWN_CELL: Position = { x: 5, y: 5 };

// ============================================================================
// Session
// ============================================================================

export function createSession(options: SessionOptions = {}): GameSession {
  const { seed, generator, ...overrides } = options;
  return {
    state: 'mainMenu',
    config: {
      mapWidth: overrides.mapWidth ?? DEFAULT_CONFIG.mapWidth,
      mapHeight: overrides.mapHeight ?? DEFAULT_CONFIG.mapHeight,
      maxMessages: overrides.maxMessages ?? DEFAULT_CONFIG.maxMessages,
    },
    generator: generator ?? new RoomGenerator(seed),
    nextEntityId: 1,
    player: null,
    map: null,
    enemies: [],
    items: new ItemArena(),
    floorItems: [],
    messages: [],
  };
}

/**
 * Cell inside the generated room where the player starts each level
 */
export function startPosition(config: GameConfig): Position {
  return {
    x: Math.floor(config.mapWidth / 4) + 1,
    y: Math.floor(config.mapHeight / 4) + 1,
  };
}

export function allocateEntityId(session: GameSession): EntityId {
  return session.nextEntityId++;
}

/**
 * Append to the message log, evicting the oldest past the cap
 */
export function addMessage(session: GameSession, message: string): void {
  session.messages.push(message);
  while (session.messages.length > session.config.maxMessages) {
    session.messages.shift();
  }
}

/**
 * Build a fresh level: new map, no enemies or floor items yet
 */
function generateLevel(session: GameSession): void {
  session.map = session.generator.generate(session.config.mapWidth, session.config.mapHeight);
  session.enemies = [];
  clearFloorItems(session);
}

function clearFloorItems(session: GameSession): void {
  for (const floorItem of session.floorItems) {
    session.items.release(floorItem.itemId);
  }
  session.floorItems = [];
}

// ============================================================================
// Game Lifecycle
// ============================================================================

export function newGame(session: GameSession, playerName: string): void {
  const player = createPlayer(allocateEntityId(session), playerName, SPAWN_CELL);
  session.items.clear();
  session.floorItems = [];
  session.player = player;
  generateLevel(session);
  player.pos = startPosition(session.config);

  spawnEnemies(session, INITIAL_ENEMIES);
  spawnItems(session, ITEMS_PER_LEVEL);

  session.state = 'playing';
  session.messages = [];
  addMessage(session, `Welcome to the dungeon, ${playerName}!`);
}

/**
 * Start playing a restored character on a brand-new level.
 * The pack, the map and its loot are not part of a save.
 */
export function resumeGame(session: GameSession, stats: PlayerStats): void {
  const player = createPlayer(allocateEntityId(session), stats.name, SPAWN_CELL);
  player.health = stats.health;
  player.maxHealth = stats.maxHealth;
  player.attackPower = stats.attackPower;
  player.defense = stats.defense;
  player.level = stats.level;
  player.experience = stats.experience;
  player.gold = stats.gold;
  player.dungeonLevel = stats.dungeonLevel;

  session.items.clear();
  session.floorItems = [];
  session.player = player;
  generateLevel(session);
  spawnEnemies(session, INITIAL_ENEMIES);

  session.state = 'playing';
}

export function nextLevel(session: GameSession): void {
  const player = session.player;
  if (!player) return;

  player.dungeonLevel++;
  generateLevel(session);
  player.pos = startPosition(session.config);

  spawnEnemies(session, INITIAL_ENEMIES + player.dungeonLevel);
  spawnItems(session, ITEMS_PER_LEVEL);

  addMessage(session, `You descend to dungeon level ${player.dungeonLevel}`);
}

/**
 * Drop everything the session holds
 */
export function shutdown(session: GameSession): void {
  session.player = null;
  session.map = null;
  session.enemies = [];
  session.floorItems = [];
  session.items.clear();
  session.messages = [];
}

// ============================================================================
// Spawning
// ============================================================================

function randomInteriorCell(session: GameSession): Position {
  const rng = session.generator.rng;
  const x = rng.nextInt(1, session.config.mapWidth - 2);
  const y = rng.nextInt(1, session.config.mapHeight - 2);
  return { x, y };
}

/**
 * Spawn enemies anywhere inside the outer wall, walls included
 */
export function spawnEnemies(session: GameSession, count: number): void {
  for (let i = 0; i < count; i++) {
    const pos = randomInteriorCell(session);
    const type = session.generator.rng.pick(SPAWN_ORDER);
    session.enemies.push(createEnemy(allocateEntityId(session), type, pos));
  }
}

export function spawnItems(session: GameSession, count: number): void {
  for (let i = 0; i < count; i++) {
    const pos = randomInteriorCell(session);
    const loot = session.generator.rng.pick(LOOT_TABLE);
    const item = session.items.create(ITEM_TEMPLATES[loot]);
    session.floorItems.push({ itemId: item.id, pos });
  }
}

// ============================================================================
// Turn Loop
// ============================================================================

export function getEnemyAt(session: GameSession, pos: Position): Enemy | undefined {
  return session.enemies.find(e => isAlive(e) && samePosition(e.pos, pos));
}

/**
 * Move the player one step. There is no walkability gate: the step always
 * lands, then combat, pickup and stairs resolve in that order.
 */
export function handleMovement(session: GameSession, dir: Direction): void {
  const { player, map } = session;
  if (!player || !map) return;

  movePlayer(player, dir);

  const enemy = getEnemyAt(session, player.pos);
  if (enemy) {
    handleCombat(session, enemy);
  }

  pickUpItem(session);

  if (map.getTile(player.pos.x, player.pos.y)?.type === 'stairsDown') {
    nextLevel(session);
  }
}

/**
 * One exchange of blows. The player's hit ignores enemy defense; the
 * counter-attack subtracts player defense but always deals at least 1.
 */
export function handleCombat(session: GameSession, enemy: Enemy): void {
  const player = session.player;
  if (!player) return;

  const damage = player.attackPower;
  takeDamage(enemy, damage);
  addMessage(session, `You hit ${enemy.name} for ${damage} damage!`);

  if (isAlive(enemy)) {
    const enemyDamage = Math.max(1, enemy.attackPower - player.defense);
    takeDamage(player, enemyDamage);
    addMessage(session, `${enemy.name} hits you for ${enemyDamage} damage!`);

    if (!isAlive(player)) {
      session.state = 'gameOver';
      addMessage(session, 'You have been slain!');
    }
  } else {
    player.experience += enemy.expReward;
    player.gold += enemy.goldReward;
    addMessage(session, `You defeated ${enemy.name}! +${enemy.expReward} XP`);
  }
}

/**
 * Pick up whatever lies under the player. Gold goes straight to the purse.
 */
export function pickUpItem(session: GameSession): boolean {
  const player = session.player;
  if (!player) return false;

  const index = session.floorItems.findIndex(f => samePosition(f.pos, player.pos));
  if (index === -1) return false;

  const floorItem = session.floorItems[index];
  const item = session.items.get(floorItem.itemId);
  if (!item) {
    session.floorItems.splice(index, 1);
    return false;
  }

  if (item.kind === 'gold') {
    player.gold += item.amount;
    session.items.release(item.id);
    session.floorItems.splice(index, 1);
    addMessage(session, `You pick up ${item.amount} gold.`);
    return true;
  }

  if (!addToInventory(player, item.id)) {
    addMessage(session, 'Your pack is full.');
    return false;
  }
  session.floorItems.splice(index, 1);
  addMessage(session, `You pick up ${item.name}.`);
  return true;
}

/**
 * Apply and consume the item in an inventory slot
 */
export function useItem(session: GameSession, slot: number): boolean {
  const player = session.player;
  if (!player) return false;

  const itemId = player.inventory[slot];
  const item = itemId === undefined ? undefined : session.items.get(itemId);
  if (!item) return false;

  switch (item.kind) {
    case 'potion': {
      const before = player.health;
      heal(player, item.heal);
      addMessage(session, `You drink the ${item.name} and recover ${player.health - before} health.`);
      break;
    }
    case 'weapon':
      player.attackPower += item.damage;
      addMessage(session, `You wield the ${item.name}. Attack is now ${player.attackPower}.`);
      break;
    case 'armor':
      player.defense += item.defense;
      addMessage(session, `You strap on the ${item.name}. Defense is now ${player.defense}.`);
      break;
    case 'gold':
      player.gold += item.amount;
      addMessage(session, `You count ${item.amount} gold into your purse.`);
      break;
  }

  player.inventory.splice(slot, 1);
  session.items.release(item.id);
  return true;
}

/**
 * Reap dead enemies: the first one found, at most one per tick
 */
export function update(session: GameSession): void {
  const index = session.enemies.findIndex(e => !isAlive(e));
  if (index !== -1) {
    session.enemies.splice(index, 1);
  }
}
