/**
 * Chest Opener
 * Opens loot containers that need no key
 */

import type { LcuClient } from '../lcu/client.js';
import type { LootRecipe, PlayerLootItem } from '../lcu/schemas.js';
import type { ActionResult } from '../types.js';
import { sleep } from '../utils/sleep.js';

export interface OpenReport {
  dryRun: boolean;
  opened: Array<ActionResult & { recipeName: string; count: number }>;
  skipped: Array<{ lootId: string; name: string; reason: string }>;
}

export function findOpenableItems(loot: PlayerLootItem[]): PlayerLootItem[] {
  return loot.filter((item) => item.displayCategories === 'CHEST' && item.count > 0);
}

/**
 * An OPEN recipe whose only input slot is the container itself
 */
export function selectOpenRecipe(recipes: LootRecipe[]): LootRecipe | undefined {
  return recipes.find((recipe) => recipe.type === 'OPEN' && recipe.slots.length === 1);
}

export async function openContainers(
  client: LcuClient,
  loot: PlayerLootItem[],
  options: { dryRun: boolean; delayMs?: number }
): Promise<OpenReport> {
  const report: OpenReport = { dryRun: options.dryRun, opened: [], skipped: [] };
  let calls = 0;

  for (const item of findOpenableItems(loot)) {
    const name = item.localizedName || item.lootName || item.lootId;
    const recipes = await client.getRecipesForItem(item.lootId);
    if (!recipes.success || !recipes.data) {
      report.skipped.push({ lootId: item.lootId, name, reason: recipes.error ?? 'No recipes' });
      continue;
    }

    const recipe = selectOpenRecipe(recipes.data);
    if (!recipe) {
      report.skipped.push({ lootId: item.lootId, name, reason: 'Requires a key or other material' });
      continue;
    }

    if (options.dryRun) {
      report.opened.push({
        lootId: item.lootId,
        name,
        recipeName: recipe.recipeName,
        count: item.count,
        success: true,
      });
      continue;
    }

    if (calls > 0 && options.delayMs) {
      await sleep(options.delayMs);
    }
    calls++;

    const result = await client.craft(recipe.recipeName, [item.lootId], item.count);
    if (!result.success) {
      console.error(`Failed to open ${item.lootId}: ${result.error}`);
    }
    report.opened.push({
      lootId: item.lootId,
      name,
      recipeName: recipe.recipeName,
      count: item.count,
      success: result.success,
      error: result.error,
    });
  }

  return report;
}

export function formatOpenReport(report: OpenReport): string {
  const lines: string[] = [report.dryRun ? '# Containers to open (dry run)' : '# Opened containers'];

  for (const entry of report.opened) {
    const status = entry.success ? '' : ` FAILED: ${entry.error ?? 'unknown error'}`;
    lines.push(`- ${entry.name} x${entry.count} via ${entry.recipeName}${status}`);
  }
  if (report.opened.length === 0) {
    lines.push('Nothing to open');
  }

  if (report.skipped.length > 0) {
    lines.push('');
    lines.push('## Skipped');
    for (const entry of report.skipped) {
      lines.push(`- ${entry.name}: ${entry.reason}`);
    }
  }

  return lines.join('\n');
}
