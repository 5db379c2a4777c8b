/**
 * Dungeon entities: player, enemies and the enemy stat table
 */

import type { ItemId } from './items';

// ============================================================================
// Types
// ============================================================================

export interface Position {
  x: number;
  y: number;
}

export type Direction = 'north' | 'south' | 'east' | 'west';

export type EntityId = number;

export type EnemyType =
  | 'goblin'
  | 'orc'
  | 'skeleton'
  | 'zombie'
  | 'dragon'
  | 'rat'
  | 'spider';

/** Anything that can take a hit */
export interface Combatant {
  health: number;
  maxHealth: number;
  attackPower: number;
  defense: number;
}

export interface Player extends Combatant {
  id: EntityId;
  name: string;
  pos: Position;
  level: number;
  experience: number;
  gold: number;
  dungeonLevel: number;
  inventory: ItemId[];
}

export interface Enemy extends Combatant {
  id: EntityId;
  type: EnemyType;
  pos: Position;
  name: string;
  symbol: string;
  expReward: number;
  goldReward: number;
}

interface EnemyStats {
  name: string;
  symbol: string;
  health: number;
  maxHealth: number;
  attackPower: number;
  defense: number;
}

// ============================================================================
// Constants
// ============================================================================

export const INVENTORY_CAPACITY = 21;
export const ENEMY_EXP_REWARD = 10;
export const ENEMY_GOLD_REWARD = 5;

// Dragons start at 0 health (of 200) and so spawn dead.
export const ENEMY_STATS: Record<EnemyType, EnemyStats> = {
  goblin:   { name: 'Goblin',   symbol: 'g', health: 20, maxHealth: 20,  attackPower: 5,  defense: 2 },
  orc:      { name: 'Orc',      symbol: 'o', health: 40, maxHealth: 40,  attackPower: 10, defense: 5 },
  skeleton: { name: 'Skeleton', symbol: 's', health: 25, maxHealth: 25,  attackPower: 8,  defense: 3 },
  zombie:   { name: 'Zombie',   symbol: 'z', health: 35, maxHealth: 35,  attackPower: 6,  defense: 8 },
  dragon:   { name: 'Dragon',   symbol: 'D', health: 0,  maxHealth: 200, attackPower: 30, defense: 20 },
  rat:      { name: 'Rat',      symbol: 'r', health: 5,  maxHealth: 5,   attackPower: 2,  defense: 0 },
  spider:   { name: 'Spider',   symbol: 'x', health: 15, maxHealth: 15,  attackPower: 6,  defense: 1 },
};

// Order the spawner draws enemy types from
export const SPAWN_ORDER: readonly [EnemyType, ...EnemyType[]] = [
  'goblin', 'orc', 'skeleton', 'zombie', 'rat', 'spider', 'dragon',
];

const MOVE_DELTAS: Record<Direction, Position> = {
  north: { x: 0, y: -1 },
  south: { x: 0, y: 1 },
  east: { x: 2, y: 0 },
  west: { x: -1, y: 0 },
};

// ============================================================================
// Construction
// ============================================================================

export function createPlayer(id: EntityId, name: string, pos: Position): Player {
  return {
    id,
    name,
    pos: { ...pos },
    health: 100,
    maxHealth: 100,
    attackPower: 5,
    defense: 2,
    level: 1,
    experience: 0,
    gold: 0,
    dungeonLevel: 1,
    inventory: [],
  };
}

export function createEnemy(id: EntityId, type: EnemyType, pos: Position): Enemy {
  return {
    id,
    type,
    pos: { ...pos },
    ...ENEMY_STATS[type],
    expReward: ENEMY_EXP_REWARD,
    goldReward: ENEMY_GOLD_REWARD,
  };
}

// ============================================================================
// Behaviour
// ============================================================================

export function takeDamage(target: Combatant, amount: number): void {
  target.health = Math.max(0, target.health - Math.max(0, amount));
}

export function isAlive(target: Combatant): boolean {
  return target.health > 0;
}

export function heal(player: Player, amount: number): void {
  player.health = Math.min(player.health + amount, player.maxHealth);
}

/**
 * Add an item to the pack. Accepts while the pack holds 20 or fewer,
 * so the pack tops out at INVENTORY_CAPACITY.
 */
export function addToInventory(player: Player, itemId: ItemId): boolean {
  if (player.inventory.length < INVENTORY_CAPACITY) {
    player.inventory.push(itemId);
    return true;
  }
  return false;
}

/**
 * Step the player one move. Legality of the destination is the caller's concern.
 */
export function movePlayer(player: Player, dir: Direction): boolean {
  const delta = MOVE_DELTAS[dir];
  player.pos = { x: player.pos.x + delta.x, y: player.pos.y + delta.y };
  return true;
}

export function samePosition(a: Position, b: Position): boolean {
  return a.x === b.x && a.y === b.y;
}
