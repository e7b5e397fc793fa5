/**
 * Loot tab overview: entry counts per category and currency balances
 */

import type { PlayerLootItem } from '../lcu/schemas.js';
import { LootCurrency, type LootSummary } from '../types.js';

export function summarizeLoot(loot: PlayerLootItem[]): LootSummary {
  const byCategory: Record<string, number> = {};
  const balance = (lootId: LootCurrency): number =>
    loot.filter((item) => item.lootId === lootId).reduce((sum, item) => sum + item.count, 0);

  for (const item of loot) {
    const category = item.displayCategories || 'OTHER';
    byCategory[category] = (byCategory[category] ?? 0) + item.count;
  }

  return {
    totalEntries: loot.length,
    totalItems: loot.reduce((sum, item) => sum + item.count, 0),
    byCategory,
    blueEssence: balance(LootCurrency.BlueEssence),
    orangeEssence: balance(LootCurrency.OrangeEssence),
    mythicEssence: balance(LootCurrency.MythicEssence),
    keys: balance(LootCurrency.Key),
    keyFragments: balance(LootCurrency.KeyFragment),
  };
}
