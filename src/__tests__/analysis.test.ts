import {
  computeCollectionStats,
  computeSkinShardStats,
  formatCollectionStats,
  ownedSkinsByChampion,
  skinsByChampion,
  summarizeLoot,
  unownedShardsByChampion,
} from '../analysis/index.js';
import type { Champion } from '../lcu/schemas.js';
import { lootItem } from './helpers/fake-lcu.js';

describe('computeSkinShardStats', () => {
  const loot = [
    lootItem({ lootId: 'CHAMPION_SKIN_RENTAL_1001', displayCategories: 'SKIN', value: 520, itemStatus: 'OWNED', count: 2 }),
    lootItem({ lootId: 'CHAMPION_SKIN_RENTAL_1002', displayCategories: 'SKIN', value: 520, itemStatus: 'NONE', count: 1 }),
    lootItem({ lootId: 'CHAMPION_SKIN_RENTAL_2003', displayCategories: 'SKIN', value: 1350, itemStatus: 'NONE', count: 3 }),
    lootItem({ lootId: 'CHAMPION_RENTAL_1', displayCategories: 'CHAMPION', value: 450, count: 4 }),
  ];

  it('buckets skin shards by price tier', () => {
    expect(computeSkinShardStats(loot)).toEqual({
      tiers: [
        { value: 520, owned: 2, notOwned: 1 },
        { value: 1350, owned: 2, notOwned: 1 },
      ],
      totalShards: 6,
    });
  });

  it('accounts for every shard copy', () => {
    const stats = computeSkinShardStats(loot);
    const counted = stats.tiers.reduce((sum, t) => sum + t.owned + t.notOwned, 0);
    expect(counted).toBe(stats.totalShards);
  });

  it('returns no tiers for an empty loot tab', () => {
    expect(computeSkinShardStats([])).toEqual({ tiers: [], totalShards: 0 });
  });
});

describe('collection statistics', () => {
  const champions: Champion[] = [
    {
      id: 266,
      key: 'Aatrox',
      name: 'Aatrox',
      skins: [
        { id: 266000, name: 'Aatrox', isBase: true },
        { id: 266001, name: 'Justicar Aatrox', isBase: false },
        { id: 266002, name: 'Mecha Aatrox', isBase: false },
      ],
    },
    {
      id: 103,
      key: 'Ahri',
      name: 'Ahri',
      skins: [
        { id: 103000, name: 'Ahri', isBase: true },
        { id: 103001, name: 'Dynasty Ahri', isBase: false },
      ],
    },
  ];

  const loot = [
    lootItem({ lootId: 'CHAMPION_SKIN_RENTAL_266002', itemStatus: 'NONE', disenchantRecipeName: 'SKIN_RENTAL_disenchant', parentStoreItemId: 266, count: 2 }),
    lootItem({ lootId: 'CHAMPION_SKIN_RENTAL_103001', itemStatus: 'OWNED', disenchantRecipeName: 'SKIN_RENTAL_disenchant', parentStoreItemId: 103 }),
    lootItem({ lootId: 'CHAMPION_SKIN_266002', itemStatus: 'NONE', disenchantRecipeName: 'SKIN_disenchant', parentStoreItemId: 266 }),
  ];

  it('drops base skins', () => {
    expect(skinsByChampion(champions).get('Aatrox')?.map((s) => s.id)).toEqual([266001, 266002]);
  });

  it('counts one unowned shard per loot entry', () => {
    expect([...unownedShardsByChampion(loot)]).toEqual([[266, 1]]);
  });

  it('counts owned non-base skins per champion', () => {
    expect([...ownedSkinsByChampion(champions, [266000, 266001, 103001])]).toEqual([
      [266, 1],
      [103, 1],
    ]);
  });

  it('builds one row per champion with totals', () => {
    const stats = computeCollectionStats(champions, loot, [266001, 103001]);

    expect(stats.rows).toEqual([
      { championId: 266, championName: 'Aatrox', skinCount: 2, ownedSkins: 1, unownedShards: 1, totalSum: 2 },
      { championId: 103, championName: 'Ahri', skinCount: 1, ownedSkins: 1, unownedShards: 0, totalSum: 1 },
    ]);
    expect(stats.totals).toEqual({ skinCount: 3, ownedSkins: 2, unownedShards: 1, totalSum: 3 });
  });

  it('renders the statistics table', () => {
    const text = formatCollectionStats(computeCollectionStats(champions, loot, [266001, 103001]));

    expect(text.split('\n')).toEqual([
      'Statistics about your challenge collection:',
      '+---------------+-----------------+---------------------+-----------+',
      '| Champion Name | Amount of Skins | Unowned Skin Shards | Total Sum |',
      '+---------------+-----------------+---------------------+-----------+',
      '| Aatrox        | 2               | 1                   | 2         |',
      '| Ahri          | 1               | 0                   | 1         |',
      '| Total         | 3               | 1                   | 3         |',
      '+---------------+-----------------+---------------------+-----------+',
    ]);
  });
});

describe('summarizeLoot', () => {
  it('counts categories and currency balances', () => {
    const summary = summarizeLoot([
      lootItem({ lootId: 'CURRENCY_champion', displayCategories: 'CURRENCY', count: 12000 }),
      lootItem({ lootId: 'CURRENCY_cosmetic', displayCategories: 'CURRENCY', count: 3400 }),
      lootItem({ lootId: 'MATERIAL_key', displayCategories: 'CHEST', count: 2 }),
      lootItem({ lootId: 'MATERIAL_key_fragment', displayCategories: 'CHEST', count: 1 }),
      lootItem({ lootId: 'CHAMPION_RENTAL_1', displayCategories: 'CHAMPION', count: 3 }),
      lootItem({ lootId: 'SOMETHING', count: 1 }),
    ]);

    expect(summary).toEqual({
      totalEntries: 6,
      totalItems: 15407,
      byCategory: { CURRENCY: 15400, CHEST: 3, CHAMPION: 3, OTHER: 1 },
      blueEssence: 12000,
      orangeEssence: 3400,
      mythicEssence: 0,
      keys: 2,
      keyFragments: 1,
    });
  });
});
