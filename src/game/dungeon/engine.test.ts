import { describe, it, expect } from 'vitest';
import {
  createSession,
  newGame,
  nextLevel,
  handleMovement,
  handleCombat,
  pickUpItem,
  useItem,
  update,
  spawnEnemies,
  getEnemyAt,
  addMessage,
  shutdown,
  startPosition,
  DEFAULT_CONFIG,
  type GameSession,
} from './engine';
import { createEnemy, addToInventory, type EnemyType, type Position } from './entities';
import { ITEM_TEMPLATES, type LootKey } from './items';
import { DungeonMap } from './map';
import { SeededRandom } from './random';
import { RoomGenerator, type DungeonGenerator } from './generator';

function openMap(width = 60, height = 16): DungeonMap {
  const map = new DungeonMap(width, height);
  for (let y = 0; y < height; y++) {
    for (let x = 0; x < width; x++) map.setTile(x, y, 'floor');
  }
  return map;
}

/**
 * A game in progress on an open floor with nothing else on it.
 * The player stands at (16, 5).
 */
function startGame(seed = 1): GameSession {
  const session = createSession({ seed });
  newGame(session, 'Ada');
  session.map = openMap();
  session.enemies = [];
  session.floorItems = [];
  return session;
}

function placeEnemy(session: GameSession, type: EnemyType, pos: Position) {
  const enemy = createEnemy(session.nextEntityId++, type, pos);
  session.enemies.push(enemy);
  return enemy;
}

function placeItem(session: GameSession, key: LootKey, pos: Position) {
  const item = session.items.create(ITEM_TEMPLATES[key]);
  session.floorItems.push({ itemId: item.id, pos });
  return item;
}

function giveItem(session: GameSession, key: LootKey) {
  const item = session.items.create(ITEM_TEMPLATES[key]);
  if (session.player) addToInventory(session.player, item.id);
  return item;
}

describe('createSession', () => {
  it('starts at the main menu with nothing loaded', () => {
    const session = createSession({ seed: 3 });
    expect(session.state).toBe('mainMenu');
    expect(session.config).toEqual(DEFAULT_CONFIG);
    expect(session.nextEntityId).toBe(1);
    expect(session.player).toBeNull();
    expect(session.map).toBeNull();
    expect(session.enemies).toEqual([]);
    expect(session.messages).toEqual([]);
    expect(session.generator.seed).toBe(3);
  });

  it('applies config overrides', () => {
    const session = createSession({ mapWidth: 40, maxMessages: 2 });
    expect(session.config).toEqual({ mapWidth: 40, mapHeight: 16, maxMessages: 2 });
  });

  it('uses a supplied generator', () => {
    const generator = new RoomGenerator(11);
    const session = createSession({ generator, seed: 99 });
    expect(session.generator).toBe(generator);
    expect(session.generator.seed).toBe(11);
  });
});

describe('startPosition', () => {
  it('is one cell inside the room corner', () => {
    expect(startPosition(DEFAULT_CONFIG)).toEqual({ x: 16, y: 5 });
    expect(startPosition({ mapWidth: 20, mapHeight: 10, maxMessages: 5 })).toEqual({ x: 6, y: 3 });
  });
});

describe('newGame', () => {
  it('sets up a playable level', () => {
    const session = createSession({ seed: 1 });
    newGame(session, 'Ada');

    expect(session.state).toBe('playing');
    expect(session.player?.name).toBe('Ada');
    expect(session.player?.id).toBe(1);
    expect(session.player?.pos).toEqual({ x: 16, y: 5 });
    expect(session.map?.width).toBe(60);
    expect(session.map?.height).toBe(16);
    expect(session.enemies).toHaveLength(5);
    expect(session.floorItems).toHaveLength(3);
    expect(session.items.size).toBe(3);
    expect(session.messages).toEqual(['Welcome to the dungeon, Ada!']);
  });

  it('hands out entity ids in order', () => {
    const session = createSession({ seed: 1 });
    newGame(session, 'Ada');
    expect(session.enemies.map(e => e.id)).toEqual([2, 3, 4, 5, 6]);
    expect(session.nextEntityId).toBe(7);
  });

  it('spawns enemies and items inside the outer wall', () => {
    for (let seed = 0; seed < 20; seed++) {
      const session = createSession({ seed });
      newGame(session, 'Ada');
      const positions = [...session.enemies.map(e => e.pos), ...session.floorItems.map(f => f.pos)];
      for (const pos of positions) {
        expect(pos.x).toBeGreaterThanOrEqual(1);
        expect(pos.x).toBeLessThanOrEqual(58);
        expect(pos.y).toBeGreaterThanOrEqual(1);
        expect(pos.y).toBeLessThanOrEqual(14);
      }
    }
  });

  it('is reproducible from a seed', () => {
    const a = createSession({ seed: 2024 });
    const b = createSession({ seed: 2024 });
    newGame(a, 'Ada');
    newGame(b, 'Ada');
    expect(a.enemies).toEqual(b.enemies);
    expect(a.floorItems).toEqual(b.floorItems);
    expect(a.map?.stairsDown).toEqual(b.map?.stairsDown);
  });

  it('starts over with a fresh log, keeping ids monotonic', () => {
    const session = createSession({ seed: 1 });
    newGame(session, 'Ada');
    addMessage(session, 'something happened');
    newGame(session, 'Bea');
    expect(session.messages).toEqual(['Welcome to the dungeon, Bea!']);
    expect(session.player?.id).toBe(7);
    expect(session.items.size).toBe(3);
  });
});

describe('addMessage', () => {
  it('keeps only the newest messages', () => {
    const session = createSession({ maxMessages: 3 });
    for (let i = 1; i <= 5; i++) addMessage(session, `m${i}`);
    expect(session.messages).toEqual(['m3', 'm4', 'm5']);
  });
});

describe('handleCombat', () => {
  it('trades blows with a goblin', () => {
    const session = startGame();
    const goblin = placeEnemy(session, 'goblin', { x: 18, y: 5 });

    handleCombat(session, goblin);

    expect(goblin.health).toBe(15);
    expect(session.player?.health).toBe(97);
    expect(session.messages).toEqual([
      'Welcome to the dungeon, Ada!',
      'You hit Goblin for 5 damage!',
      'Goblin hits you for 3 damage!',
    ]);
  });

  it('ignores enemy defense on the player hit', () => {
    const session = startGame();
    const zombie = placeEnemy(session, 'zombie', { x: 1, y: 1 });
    handleCombat(session, zombie);
    expect(zombie.health).toBe(30);
  });

  it('always costs the player at least 1 health', () => {
    const session = startGame();
    const player = session.player;
    if (!player) throw new Error('no player');
    player.defense = 50;
    const spider = placeEnemy(session, 'spider', { x: 1, y: 1 });

    handleCombat(session, spider);

    expect(player.health).toBe(99);
    expect(session.messages.at(-1)).toBe('Spider hits you for 1 damage!');
  });

  it('rewards a kill and skips the counter-attack', () => {
    const session = startGame();
    const rat = placeEnemy(session, 'rat', { x: 1, y: 1 });

    handleCombat(session, rat);

    expect(rat.health).toBe(0);
    expect(session.player?.health).toBe(100);
    expect(session.player?.experience).toBe(10);
    expect(session.player?.gold).toBe(5);
    expect(session.messages.at(-1)).toBe('You defeated Rat! +10 XP');
    // Still listed until the next update
    expect(session.enemies).toContain(rat);
  });

  it('ends the game when the player falls', () => {
    const session = startGame();
    const player = session.player;
    if (!player) throw new Error('no player');
    player.health = 8;
    const orc = placeEnemy(session, 'orc', { x: 1, y: 1 });

    handleCombat(session, orc);

    expect(player.health).toBe(0);
    expect(session.state).toBe('gameOver');
    expect(session.messages.slice(-2)).toEqual(['Orc hits you for 8 damage!', 'You have been slain!']);
  });

  it('kills a goblin in four rounds', () => {
    const session = startGame();
    const goblin = placeEnemy(session, 'goblin', { x: 1, y: 1 });
    for (let i = 0; i < 4; i++) handleCombat(session, goblin);

    expect(goblin.health).toBe(0);
    expect(session.player?.health).toBe(91);

    update(session);
    expect(session.enemies).toEqual([]);
  });
});

describe('update', () => {
  it('reaps only the first dead enemy per tick', () => {
    const session = startGame();
    const deadA = placeEnemy(session, 'rat', { x: 1, y: 1 });
    const alive = placeEnemy(session, 'goblin', { x: 2, y: 2 });
    const deadB = placeEnemy(session, 'rat', { x: 3, y: 3 });
    deadA.health = 0;
    deadB.health = 0;

    update(session);
    expect(session.enemies).toEqual([alive, deadB]);

    update(session);
    expect(session.enemies).toEqual([alive]);

    update(session);
    expect(session.enemies).toEqual([alive]);
  });

  it('reaps dragons, which spawn dead', () => {
    const session = startGame();
    const dragon = placeEnemy(session, 'dragon', { x: 4, y: 4 });
    expect(getEnemyAt(session, { x: 4, y: 4 })).toBeUndefined();
    expect(session.enemies).toEqual([dragon]);
    update(session);
    expect(session.enemies).toEqual([]);
  });
});

describe('getEnemyAt', () => {
  it('finds the living enemy at a position', () => {
    const session = startGame();
    const corpse = placeEnemy(session, 'rat', { x: 4, y: 4 });
    corpse.health = 0;
    const goblin = placeEnemy(session, 'goblin', { x: 4, y: 4 });
    expect(getEnemyAt(session, { x: 4, y: 4 })).toBe(goblin);
    expect(getEnemyAt(session, { x: 5, y: 4 })).toBeUndefined();
  });
});

describe('handleMovement', () => {
  it('does nothing before a game starts', () => {
    const session = createSession();
    handleMovement(session, 'north');
    expect(session.player).toBeNull();
    expect(session.messages).toEqual([]);
  });

  it('moves east two cells', () => {
    const session = startGame();
    handleMovement(session, 'east');
    expect(session.player?.pos).toEqual({ x: 18, y: 5 });
  });

  it('walks straight into walls', () => {
    const session = startGame();
    session.map = new DungeonMap(60, 16);
    handleMovement(session, 'north');
    expect(session.player?.pos).toEqual({ x: 16, y: 4 });
    expect(session.map.isWalkable(16, 4)).toBe(false);
  });

  it('can leave the map without failing', () => {
    const session = startGame();
    const player = session.player;
    if (!player) throw new Error('no player');
    player.pos = { x: 0, y: 0 };
    handleMovement(session, 'west');
    expect(player.pos).toEqual({ x: -1, y: 0 });
    expect(player.dungeonLevel).toBe(1);
  });

  it('attacks an enemy standing on the destination', () => {
    const session = startGame();
    const goblin = placeEnemy(session, 'goblin', { x: 18, y: 5 });
    handleMovement(session, 'east');
    expect(goblin.health).toBe(15);
    expect(session.player?.pos).toEqual({ x: 18, y: 5 });
    expect(session.player?.health).toBe(97);
  });

  it('descends when stepping on the down staircase', () => {
    const session = startGame();
    session.map?.setTile(18, 5, 'stairsDown');

    handleMovement(session, 'east');

    expect(session.player?.dungeonLevel).toBe(2);
    expect(session.player?.pos).toEqual({ x: 16, y: 5 });
    expect(session.enemies).toHaveLength(7);
    expect(session.floorItems).toHaveLength(3);
    expect(session.messages.at(-1)).toBe('You descend to dungeon level 2');
  });

  it('fights before taking the stairs in the same turn', () => {
    const session = startGame();
    session.map?.setTile(18, 5, 'stairsDown');
    const goblin = placeEnemy(session, 'goblin', { x: 18, y: 5 });

    handleMovement(session, 'east');

    expect(goblin.health).toBe(15);
    expect(session.enemies).not.toContain(goblin);
    expect(session.messages).toEqual([
      'Welcome to the dungeon, Ada!',
      'You hit Goblin for 5 damage!',
      'Goblin hits you for 3 damage!',
      'You descend to dungeon level 2',
    ]);
  });

  it('picks up an item on the destination', () => {
    const session = startGame();
    const potion = placeItem(session, 'healthPotion', { x: 16, y: 6 });
    handleMovement(session, 'south');
    expect(session.player?.inventory).toEqual([potion.id]);
    expect(session.floorItems).toEqual([]);
    expect(session.messages.at(-1)).toBe('You pick up Health Potion.');
  });
});

describe('pickUpItem', () => {
  it('puts gold straight into the purse', () => {
    const session = startGame();
    const coins = placeItem(session, 'goldCoins', { x: 16, y: 5 });

    expect(pickUpItem(session)).toBe(true);

    expect(session.player?.gold).toBe(25);
    expect(session.player?.inventory).toEqual([]);
    expect(session.items.get(coins.id)).toBeUndefined();
    expect(session.messages.at(-1)).toBe('You pick up 25 gold.');
  });

  it('leaves the item when the pack is full', () => {
    const session = startGame();
    for (let i = 0; i < 21; i++) giveItem(session, 'healthPotion');
    placeItem(session, 'shortSword', { x: 16, y: 5 });

    expect(pickUpItem(session)).toBe(false);

    expect(session.player?.inventory).toHaveLength(21);
    expect(session.floorItems).toHaveLength(1);
    expect(session.messages.at(-1)).toBe('Your pack is full.');
  });

  it('returns false with nothing underfoot', () => {
    const session = startGame();
    placeItem(session, 'shortSword', { x: 30, y: 5 });
    expect(pickUpItem(session)).toBe(false);
    expect(session.floorItems).toHaveLength(1);
  });
});

describe('useItem', () => {
  it('drinks a potion, capped at max health', () => {
    const session = startGame();
    const player = session.player;
    if (!player) throw new Error('no player');
    const potion = giveItem(session, 'healthPotion');
    player.health = 90;

    expect(useItem(session, 0)).toBe(true);

    expect(player.health).toBe(100);
    expect(player.inventory).toEqual([]);
    expect(session.items.get(potion.id)).toBeUndefined();
    expect(session.messages.at(-1)).toBe('You drink the Health Potion and recover 10 health.');
  });

  it('wields a weapon', () => {
    const session = startGame();
    giveItem(session, 'shortSword');
    expect(useItem(session, 0)).toBe(true);
    expect(session.player?.attackPower).toBe(8);
    expect(session.messages.at(-1)).toBe('You wield the Short Sword. Attack is now 8.');
  });

  it('wears armor', () => {
    const session = startGame();
    giveItem(session, 'leatherArmor');
    expect(useItem(session, 0)).toBe(true);
    expect(session.player?.defense).toBe(4);
    expect(session.messages.at(-1)).toBe('You strap on the Leather Armor. Defense is now 4.');
  });

  it('uses the requested slot only', () => {
    const session = startGame();
    const sword = giveItem(session, 'shortSword');
    giveItem(session, 'leatherArmor');
    useItem(session, 1);
    expect(session.player?.inventory).toEqual([sword.id]);
    expect(session.player?.defense).toBe(4);
    expect(session.player?.attackPower).toBe(5);
  });

  it('returns false for an empty slot', () => {
    const session = startGame();
    expect(useItem(session, 0)).toBe(false);
    expect(useItem(session, 8)).toBe(false);
  });
});

describe('nextLevel', () => {
  it('scales the enemy count with depth', () => {
    const session = createSession({ seed: 5 });
    newGame(session, 'Ada');
    nextLevel(session);
    expect(session.player?.dungeonLevel).toBe(2);
    expect(session.enemies).toHaveLength(7);
    nextLevel(session);
    expect(session.player?.dungeonLevel).toBe(3);
    expect(session.enemies).toHaveLength(8);
  });

  it('continues entity ids from the previous level', () => {
    const session = createSession({ seed: 5 });
    newGame(session, 'Ada');
    nextLevel(session);
    expect(session.enemies.map(e => e.id)).toEqual([7, 8, 9, 10, 11, 12, 13]);
  });

  it('replaces the floor loot', () => {
    const session = createSession({ seed: 5 });
    newGame(session, 'Ada');
    const before = session.floorItems.map(f => f.itemId);
    nextLevel(session);
    expect(session.floorItems).toHaveLength(3);
    for (const id of before) {
      expect(session.items.get(id)).toBeUndefined();
    }
  });

  it('keeps carried items', () => {
    const session = startGame();
    const potion = giveItem(session, 'healthPotion');
    nextLevel(session);
    expect(session.player?.inventory).toEqual([potion.id]);
    expect(session.items.get(potion.id)).toBe(potion);
  });
});

describe('spawnEnemies', () => {
  it('draws from the shared random source', () => {
    const session = startGame(8);
    spawnEnemies(session, 50);
    expect(session.enemies).toHaveLength(50);
    const types = new Set(session.enemies.map(e => e.type));
    expect(types.size).toBeGreaterThan(3);
  });
});

describe('pluggable generator', () => {
  class OpenFloorGenerator implements DungeonGenerator {
    readonly seed = 4;
    readonly rng = new SeededRandom(4);
    calls = 0;

    generate(width: number, height: number): DungeonMap {
      this.calls++;
      return openMap(width, height);
    }
  }

  it('builds every level with the supplied generator', () => {
    const generator = new OpenFloorGenerator();
    const session = createSession({ generator, mapWidth: 20, mapHeight: 10 });
    newGame(session, 'Ada');
    expect(session.map?.rowSymbols(0)).toBe('.'.repeat(20));
    nextLevel(session);
    expect(generator.calls).toBe(2);
    expect(session.player?.pos).toEqual({ x: 6, y: 3 });
  });
});

describe('shutdown', () => {
  it('releases everything the session holds', () => {
    const session = createSession({ seed: 1 });
    newGame(session, 'Ada');
    shutdown(session);
    expect(session.player).toBeNull();
    expect(session.map).toBeNull();
    expect(session.enemies).toEqual([]);
    expect(session.floorItems).toEqual([]);
    expect(session.items.size).toBe(0);
    expect(session.messages).toEqual([]);
  });
});
