/**
 * Challenge Collection Statistics
 *
 * Per champion: the number of skins, the unowned skin shards and the sum of
 * owned skins plus unique unowned shards. Useful for skin collection
 * challenges. Champion skin permanents are ignored because the client
 * redeems them automatically when the skin is not owned.
 */

import type { Champion, ChampionSkin, PlayerLootItem } from '../lcu/schemas.js';
import { TextTable } from '../format/table.js';
import {
  OWNED_STATUS,
  SKIN_SHARD_DISENCHANT_RECIPE,
  type CollectionRow,
  type CollectionStats,
} from '../types.js';

/**
 * Map champion key -> non-base skins
 */
export function skinsByChampion(champions: Champion[]): Map<string, ChampionSkin[]> {
  const result = new Map<string, ChampionSkin[]>();
  for (const champion of champions) {
    result.set(
      champion.key,
      champion.skins.filter((skin) => !skin.isBase)
    );
  }
  return result;
}

/**
 * Map champion id -> number of unique unowned skin shards.
 * A stack of several copies of the same shard counts once.
 */
export function unownedShardsByChampion(loot: PlayerLootItem[]): Map<number, number> {
  const result = new Map<number, number>();
  for (const item of loot) {
    if (item.itemStatus === OWNED_STATUS) continue;
    if (item.disenchantRecipeName !== SKIN_SHARD_DISENCHANT_RECIPE) continue;

    result.set(item.parentStoreItemId, (result.get(item.parentStoreItemId) ?? 0) + 1);
  }
  return result;
}

/**
 * Map champion id -> number of owned non-base skins
 */
export function ownedSkinsByChampion(
  champions: Champion[],
  ownedSkinIds: Iterable<number>
): Map<number, number> {
  const owned = new Set(ownedSkinIds);
  const result = new Map<number, number>();

  for (const champion of champions) {
    const count = champion.skins.filter((skin) => !skin.isBase && owned.has(skin.id)).length;
    if (count > 0) {
      result.set(champion.id, count);
    }
  }
  return result;
}

export function computeCollectionStats(
  champions: Champion[],
  loot: PlayerLootItem[],
  ownedSkinIds: Iterable<number>
): CollectionStats {
  const skins = skinsByChampion(champions);
  const unowned = unownedShardsByChampion(loot);
  const owned = ownedSkinsByChampion(champions, ownedSkinIds);

  const rows: CollectionRow[] = champions.map((champion) => {
    const ownedSkins = owned.get(champion.id) ?? 0;
    const unownedShards = unowned.get(champion.id) ?? 0;
    return {
      championId: champion.id,
      championName: champion.name,
      skinCount: skins.get(champion.key)?.length ?? 0,
      ownedSkins,
      unownedShards,
      totalSum: ownedSkins + unownedShards,
    };
  });

  const totals = rows.reduce(
    (acc, row) => ({
      skinCount: acc.skinCount + row.skinCount,
      ownedSkins: acc.ownedSkins + row.ownedSkins,
      unownedShards: acc.unownedShards + row.unownedShards,
      totalSum: acc.totalSum + row.totalSum,
    }),
    { skinCount: 0, ownedSkins: 0, unownedShards: 0, totalSum: 0 }
  );

  return { rows, totals };
}

export function formatCollectionStats(stats: CollectionStats): string {
  const table = new TextTable().setColumns([
    'Champion Name',
    'Amount of Skins',
    'Unowned Skin Shards',
    'Total Sum',
  ]);

  for (const row of stats.rows) {
    table.addRow([row.championName, row.skinCount, row.unownedShards, row.totalSum]);
  }
  table.addRow(['Total', stats.totals.skinCount, stats.totals.unownedShards, stats.totals.totalSum]);

  return `Statistics about your challenge collection:\n${table.render()}`;
}
