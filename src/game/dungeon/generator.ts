/**
 * Dungeon generation
 *
 * A session only relies on the DungeonGenerator interface, so a different
 * layout algorithm can be dropped in. The generator's random source is also
 * used for spawning, which keeps a whole session reproducible from one seed.
 */

import { DungeonMap } from './map';
import { SeededRandom, randomSeed } from './random';

export interface DungeonGenerator {
  readonly seed: number;
  readonly rng: SeededRandom;
  generate(width: number, height: number): DungeonMap;
}

export interface Rect {
  x: number;
  y: number;
  width: number;
  height: number;
}

/**
 * The room carved by RoomGenerator: the middle half of each axis
 */
export function centeredRoom(width: number, height: number): Rect {
  return {
    x: Math.floor(width / 4),
    y: Math.floor(height / 4),
    width: Math.floor(width / 2),
    height: Math.floor(height / 2),
  };
}

/**
 * One centered floor room with a down staircase somewhere inside it.
 */
export class RoomGenerator implements DungeonGenerator {
  readonly rng: SeededRandom;

  constructor(readonly seed: number = randomSeed()) {
    this.rng = new SeededRandom(seed);
  }

  generate(width: number, height: number): DungeonMap {
    const map = new DungeonMap(width, height);
    const room = centeredRoom(width, height);

    // Never carve the last column or row
    for (let y = room.y; y < room.y + room.height && y < height - 1; y++) {
      for (let x = room.x; x < room.x + room.width && x < width - 1; x++) {
        map.setTile(x, y, 'floor');
      }
    }

    const stairs = {
      x: this.rng.nextInt(room.x, room.x + room.width - 1),
      y: this.rng.nextInt(room.y, room.y + room.height - 1),
    };
    map.setTile(stairs.x, stairs.y, 'stairsDown');
    map.setStairsDown(stairs);

    return map;
  }
}
