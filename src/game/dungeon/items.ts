/**
 * Items and the arena that owns them.
 *
 * Floor slots and the player's pack refer to items by id; the arena holds
 * the only copy of each record. Records are never mutated once created.
 */

export type ItemId = number;

export type ItemEffect =
  | { kind: 'potion'; heal: number }
  | { kind: 'weapon'; damage: number }
  | { kind: 'armor'; defense: number }
  | { kind: 'gold'; amount: number };

export type ItemKind = ItemEffect['kind'];

export type ItemTemplate = { name: string; symbol: string } & ItemEffect;

export type Item = { readonly id: ItemId } & ItemTemplate;

export type LootKey = 'healthPotion' | 'shortSword' | 'leatherArmor' | 'goldCoins';

export const ITEM_TEMPLATES: Record<LootKey, ItemTemplate> = {
  healthPotion: { name: 'Health Potion', symbol: '!', kind: 'potion', heal: 20 },
  shortSword: { name: 'Short Sword', symbol: '/', kind: 'weapon', damage: 3 },
  leatherArmor: { name: 'Leather Armor', symbol: '[', kind: 'armor', defense: 2 },
  goldCoins: { name: 'Gold Coins', symbol: '$', kind: 'gold', amount: 25 },
};

// Potions are the common drop
export const LOOT_TABLE: readonly [LootKey, ...LootKey[]] = [
  'healthPotion',
  'healthPotion',
  'healthPotion',
  'shortSword',
  'leatherArmor',
  'goldCoins',
];

export class ItemArena {
  private readonly items = new Map<ItemId, Item>();
  private nextId: ItemId = 1;

  create(template: ItemTemplate): Item {
    const item: Item = { ...template, id: this.nextId++ };
    this.items.set(item.id, item);
    return item;
  }

  get(id: ItemId): Item | undefined {
    return this.items.get(id);
  }

  release(id: ItemId): boolean {
    return this.items.delete(id);
  }

  get size(): number {
    return this.items.size;
  }

  clear(): void {
    this.items.clear();
  }
}

/**
 * One-line description for the inventory panel
 */
export function describeItem(item: Item): string {
  switch (item.kind) {
    case 'potion': return `${item.name} (+${item.heal} HP)`;
    case 'weapon': return `${item.name} (+${item.damage} ATK)`;
    case 'armor': return `${item.name} (+${item.defense} DEF)`;
    case 'gold': return `${item.name} (${item.amount}g)`;
  }
}
