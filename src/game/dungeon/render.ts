/**
 * Frame rendering: turns a session into one ANSI string
 */

import { type DungeonPalette, paint } from '../../themes';
import { type Position, isAlive } from './entities';
import type { GameSession } from './engine';
import type { DungeonMap, TileType } from './map';

export const CLEAR_SCREEN = '\x1b[2J\x1b[H';

const TILE_COLORS: Record<TileType, Exclude<keyof DungeonPalette, 'name'>> = {
  floor: 'floor',
  wall: 'wall',
  door: 'door',
  stairsUp: 'stairs',
  stairsDown: 'stairs',
  trap: 'trap',
};

/**
 * Cursor to a 0-based map cell (terminal rows/cols are 1-based)
 */
export function moveTo(pos: Position): string {
  return `\x1b[${pos.y + 1};${pos.x + 1}H`;
}

function renderMap(map: DungeonMap, palette: DungeonPalette): string {
  let output = '';
  map.rows().forEach((row, y) => {
    output += `\x1b[${y + 1};1H`;
    for (const tile of row) {
      output += paint(palette[TILE_COLORS[tile.type]], tile.symbol);
    }
  });
  return output;
}

function renderEntities(session: GameSession, palette: DungeonPalette): string {
  const { map, player } = session;
  const onMap = (pos: Position) => !map || map.isValidPosition(pos.x, pos.y);
  let output = '';

  for (const floorItem of session.floorItems) {
    const item = session.items.get(floorItem.itemId);
    if (item && onMap(floorItem.pos)) {
      output += moveTo(floorItem.pos) + paint(palette.item, item.symbol);
    }
  }

  if (player && onMap(player.pos)) {
    output += moveTo(player.pos) + paint(palette.player, '@');
  }

  for (const enemy of session.enemies) {
    if (isAlive(enemy) && onMap(enemy.pos)) {
      output += moveTo(enemy.pos) + paint(palette.enemy, enemy.symbol);
    }
  }

  return output;
}

export function statusLine(session: GameSession): string {
  const player = session.player;
  if (!player) return '';
  return `Health: ${player.health}/${player.maxHealth}  Level: ${player.level}  Gold: ${player.gold}  Dungeon: ${player.dungeonLevel}`;
}

function renderUI(session: GameSession, palette: DungeonPalette): string {
  if (!session.player) return '';
  const row = session.config.mapHeight + 2;
  return `\x1b[${row};1H` + paint(palette.accent, statusLine(session));
}

function renderMessages(session: GameSession, palette: DungeonPalette): string {
  let row = session.config.mapHeight + 4;
  let output = '';
  for (const message of session.messages) {
    output += `\x1b[${row++};1H` + paint(palette.dim, message);
  }
  return output;
}

/**
 * Full frame: clear, map, entities, status line, message log.
 * Sections whose data is missing are skipped.
 */
export function renderFrame(session: GameSession, palette: DungeonPalette): string {
  let output = CLEAR_SCREEN;
  if (session.map) output += renderMap(session.map, palette);
  output += renderEntities(session, palette);
  output += renderUI(session, palette);
  output += renderMessages(session, palette);
  return output;
}
