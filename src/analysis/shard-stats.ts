/**
 * Skin Shard Statistics
 * Counts owned and unowned skin shards of each price tier in the loot tab
 */

import type { PlayerLootItem } from '../lcu/schemas.js';
import { TextTable } from '../format/table.js';
import { OWNED_STATUS, type ShardTierStats, type SkinShardStats } from '../types.js';

export function computeSkinShardStats(loot: PlayerLootItem[]): SkinShardStats {
  const tiers = new Map<number, ShardTierStats>();
  let totalShards = 0;

  for (const item of loot) {
    if (item.displayCategories !== 'SKIN') continue;

    const tier = tiers.get(item.value) ?? { value: item.value, owned: 0, notOwned: 0 };
    totalShards += item.count;

    if (item.itemStatus === OWNED_STATUS) {
      tier.owned += item.count;
    } else if (item.count > 0) {
      // One copy can still unlock the skin, the rest are duplicates
      tier.notOwned += 1;
      tier.owned += item.count - 1;
    }

    tiers.set(item.value, tier);
  }

  return {
    tiers: [...tiers.values()].sort((a, b) => a.value - b.value),
    totalShards,
  };
}

export function formatSkinShardStats(stats: SkinShardStats): string {
  const table = new TextTable().setColumns(['Tier', 'Owned', 'Not Owned']);
  for (const tier of stats.tiers) {
    table.addRow([tier.value, tier.owned, tier.notOwned]);
  }

  return [
    'Statistics about your skin shards in the loot tab:',
    table.render(),
    `Total shards: ${stats.totalShards}`,
  ].join('\n');
}
