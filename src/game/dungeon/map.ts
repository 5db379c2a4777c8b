/**
 * Dungeon map: fixed-size grid of tiles
 *
 * Out-of-bounds coordinates never throw: reads report "not walkable" or
 * undefined, writes are ignored.
 */

import type { Position } from './entities';

export type TileType = 'floor' | 'wall' | 'door' | 'stairsUp' | 'stairsDown' | 'trap';

export interface Tile {
  readonly type: TileType;
  readonly symbol: string;
  readonly walkable: boolean;
}

export const TILES: Record<TileType, Tile> = {
  floor: { type: 'floor', symbol: '.', walkable: true },
  wall: { type: 'wall', symbol: '#', walkable: false },
  door: { type: 'door', symbol: '+', walkable: true },
  stairsUp: { type: 'stairsUp', symbol: '<', walkable: true },
  stairsDown: { type: 'stairsDown', symbol: '>', walkable: true },
  trap: { type: 'trap', symbol: '^', walkable: true },
};

export class DungeonMap {
  private readonly tiles: Tile[][];
  private stairs: Position | null = null;

  constructor(readonly width: number, readonly height: number) {
    this.tiles = [];
    for (let y = 0; y < height; y++) {
      this.tiles.push(new Array<Tile>(width).fill(TILES.wall));
    }
  }

  isValidPosition(x: number, y: number): boolean {
    return x >= 0 && x < this.width && y >= 0 && y < this.height;
  }

  isWalkable(x: number, y: number): boolean {
    return this.getTile(x, y)?.walkable ?? false;
  }

  getTile(x: number, y: number): Tile | undefined {
    if (!this.isValidPosition(x, y)) return undefined;
    return this.tiles[y][x];
  }

  setTile(x: number, y: number, type: TileType): void {
    if (!this.isValidPosition(x, y)) return;
    this.tiles[y][x] = TILES[type];
  }

  /**
   * Wall off every cell and forget the staircase
   */
  clear(): void {
    for (const row of this.tiles) {
      row.fill(TILES.wall);
    }
    this.stairs = null;
  }

  get stairsDown(): Position | null {
    return this.stairs ? { ...this.stairs } : null;
  }

  setStairsDown(pos: Position): void {
    this.stairs = { ...pos };
  }

  /**
   * Tile symbols of one row, left to right
   */
  rowSymbols(y: number): string {
    const row = this.tiles[y];
    return row ? row.map(t => t.symbol).join('') : '';
  }

  /**
   * Rows of tiles, top to bottom
   */
  rows(): readonly (readonly Tile[])[] {
    return this.tiles;
  }
}
