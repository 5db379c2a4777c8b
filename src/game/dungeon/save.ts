/**
 * Save files
 *
 * Three plain-text lines:
 *   name
 *   health maxHealth attackPower defense
 *   level experience gold dungeonLevel
 *
 * Only the player's stats are kept. Loading always starts a fresh level.
 */

import { readFileSync, writeFileSync, mkdirSync, existsSync } from 'fs';
import { dirname } from 'path';
import type { Player } from './entities';
import { type GameSession, type PlayerStats, resumeGame } from './engine';

export function serializeSave(player: PlayerStats): string {
  return [
    player.name,
    `${player.health} ${player.maxHealth} ${player.attackPower} ${player.defense}`,
    `${player.level} ${player.experience} ${player.gold} ${player.dungeonLevel}`,
  ].join('\n') + '\n';
}

/**
 * Parse save text. Returns null unless there is a name line followed by
 * eight integers.
 */
export function parseSave(text: string): PlayerStats | null {
  const newline = text.indexOf('\n');
  if (newline === -1) return null;

  const name = text.slice(0, newline).replace(/\r$/, '');
  const fields = text.slice(newline + 1).trim().split(/\s+/);
  if (fields.length < 8) return null;

  const numbers = fields.slice(0, 8).map(f => (/^-?\d+$/.test(f) ? Number(f) : NaN));
  if (numbers.some(n => !Number.isSafeInteger(n))) return null;

  const [health, maxHealth, attackPower, defense, level, experience, gold, dungeonLevel] = numbers;
  return { name, health, maxHealth, attackPower, defense, level, experience, gold, dungeonLevel };
}

export function saveGame(session: GameSession, path: string): boolean {
  const player: Player | null = session.player;
  if (!player) return false;

  try {
    const dir = dirname(path);
    if (!existsSync(dir)) mkdirSync(dir, { recursive: true });
    writeFileSync(path, serializeSave(player));
    return true;
  } catch (err) {
    console.warn(`[SaveGame] Could not write ${path}: ${err instanceof Error ? err.message : String(err)}`);
    return false;
  }
}

export function loadGame(session: GameSession, path: string): boolean {
  let text: string;
  try {
    text = readFileSync(path, 'utf-8');
  } catch (err) {
    console.warn(`[SaveGame] Could not read ${path}: ${err instanceof Error ? err.message : String(err)}`);
    return false;
  }

  const stats = parseSave(text);
  if (!stats) {
    console.warn(`[SaveGame] Ignoring malformed save file ${path}`);
    return false;
  }

  resumeGame(session, stats);
  return true;
}
