/**
 * Disenchant Planner
 * Decides which duplicate shards can be turned into essence, and crafts them
 */

import type { LcuClient } from '../lcu/client.js';
import type { PlayerLootItem } from '../lcu/schemas.js';
import {
  LootCurrency,
  OWNED_STATUS,
  SHARD_TYPE_NAMES,
  ShardType,
  type ActionResult,
  type DisenchantPlan,
  type DisenchantRecommendation,
  type DisenchantRules,
} from '../types.js';
import { sleep } from '../utils/sleep.js';

export const DEFAULT_DISENCHANT_RULES: DisenchantRules = {
  includeChampionShards: true,
  includeSkinShards: true,
  includeWardSkinShards: true,
  keepUnownedCopies: 1,
  protectedLootIds: [],
};

export interface ExecutionReport {
  disenchanted: number;
  failed: number;
  shardsDisenchanted: number;
  details: ActionResult[];
}

export class DisenchantPlanner {
  private rules: DisenchantRules;

  constructor(rules: Partial<DisenchantRules> = {}) {
    this.rules = { ...DEFAULT_DISENCHANT_RULES, ...rules };
  }

  /**
   * Generate a disenchant plan for the given loot
   */
  generatePlan(loot: PlayerLootItem[]): DisenchantPlan {
    const recommendations = loot
      .filter((item) => this.isTargetShard(item))
      .map((item) => this.analyzeItem(item));

    // DISENCHANT first, biggest essence gain first
    recommendations.sort((a, b) => {
      if (a.action !== b.action) return a.action === 'DISENCHANT' ? -1 : 1;
      return b.essence - a.essence;
    });

    const toDisenchant = recommendations.filter((r) => r.action === 'DISENCHANT');
    const essenceIn = (currency: LootCurrency): number =>
      toDisenchant.filter((r) => r.currency === currency).reduce((sum, r) => sum + r.essence, 0);

    return {
      generatedAt: new Date(),
      summary: {
        totalAnalyzed: recommendations.length,
        disenchant: toDisenchant.length,
        keep: recommendations.length - toDisenchant.length,
        shardsDisenchanted: toDisenchant.reduce((sum, r) => sum + r.disenchantCount, 0),
        blueEssence: essenceIn(LootCurrency.BlueEssence),
        orangeEssence: essenceIn(LootCurrency.OrangeEssence),
      },
      recommendations,
    };
  }

  private isTargetShard(item: PlayerLootItem): boolean {
    switch (item.type) {
      case ShardType.Champion:
        return this.rules.includeChampionShards;
      case ShardType.Skin:
        return this.rules.includeSkinShards;
      case ShardType.WardSkin:
        return this.rules.includeWardSkinShards;
      default:
        return false;
    }
  }

  /**
   * Analyze a single shard stack
   */
  private analyzeItem(item: PlayerLootItem): DisenchantRecommendation {
    const recipeName = item.disenchantRecipeName || `${item.type}_disenchant`;
    const keep = (reason: string): DisenchantRecommendation => ({
      item,
      action: 'KEEP',
      disenchantCount: 0,
      keepCount: item.count,
      recipeName,
      essence: 0,
      currency: item.disenchantLootName,
      reason,
    });

    if (this.rules.protectedLootIds.includes(item.lootId)) {
      return keep('Protected');
    }

    if (item.disenchantValue <= 0) {
      return keep('No disenchant recipe');
    }

    const isOwned = item.itemStatus === OWNED_STATUS;
    const keepCount = isOwned ? 0 : Math.min(item.count, this.rules.keepUnownedCopies);
    const disenchantCount = item.count - keepCount;

    if (disenchantCount <= 0) {
      return keep(`Not owned yet, keeping ${keepCount} to unlock`);
    }

    return {
      item,
      action: 'DISENCHANT',
      disenchantCount,
      keepCount,
      recipeName,
      essence: item.disenchantValue * disenchantCount,
      currency: item.disenchantLootName,
      reason: isOwned
        ? 'Already owned, every copy is a duplicate'
        : `Not owned, keeping ${keepCount} to unlock`,
    };
  }

  /**
   * Craft every DISENCHANT entry, one call per stack.
   * A failed entry is reported and does not stop the rest.
   */
  async executePlan(
    plan: DisenchantPlan,
    client: LcuClient,
    options: { delayMs?: number } = {}
  ): Promise<ExecutionReport> {
    const details: ActionResult[] = [];
    let shardsDisenchanted = 0;
    const entries = plan.recommendations.filter((r) => r.action === 'DISENCHANT');

    for (const [index, rec] of entries.entries()) {
      if (index > 0 && options.delayMs) {
        await sleep(options.delayMs);
      }

      const result = await client.craft(rec.recipeName, [rec.item.lootId], rec.disenchantCount);
      details.push({
        lootId: rec.item.lootId,
        name: describeItem(rec.item),
        success: result.success,
        error: result.error,
      });

      if (result.success) {
        shardsDisenchanted += rec.disenchantCount;
      } else {
        console.error(`Failed to disenchant ${rec.item.lootId}: ${result.error}`);
      }
    }

    const disenchanted = details.filter((d) => d.success).length;
    return {
      disenchanted,
      failed: details.length - disenchanted,
      shardsDisenchanted,
      details,
    };
  }

  /**
   * Format the plan for display
   */
  formatPlan(plan: DisenchantPlan): string {
    const lines: string[] = [];

    lines.push('# Disenchant Plan');
    lines.push(`Generated: ${plan.generatedAt.toISOString()}`);
    lines.push('');
    lines.push('## Summary');
    lines.push(`- Total analyzed: ${plan.summary.totalAnalyzed}`);
    lines.push(`- Disenchant: ${plan.summary.disenchant} (${plan.summary.shardsDisenchanted} shards)`);
    lines.push(`- Keep: ${plan.summary.keep}`);
    lines.push(`- Blue Essence gained: ${plan.summary.blueEssence}`);
    lines.push(`- Orange Essence gained: ${plan.summary.orangeEssence}`);
    lines.push('');

    if (plan.summary.disenchant > 0) {
      lines.push('## DISENCHANT');
      for (const rec of plan.recommendations.filter((r) => r.action === 'DISENCHANT')) {
        lines.push(`- ${describeItem(rec.item)} x${rec.disenchantCount} (+${rec.essence} ${currencyLabel(rec.currency)})`);
        lines.push(`  Reason: ${rec.reason}`);
      }
      lines.push('');
    }

    lines.push('## KEEP');
    lines.push(`${plan.summary.keep} stacks kept`);

    return lines.join('\n');
  }

  updateRules(rules: Partial<DisenchantRules>): void {
    this.rules = { ...this.rules, ...rules };
  }
}

function describeItem(item: PlayerLootItem): string {
  const name = item.localizedName || item.itemDesc || item.lootName || item.lootId;
  const kind = Object.values(ShardType).find((t) => t === item.type);
  return kind ? `${name} [${SHARD_TYPE_NAMES[kind]}]` : name;
}

function currencyLabel(currency: string): string {
  switch (currency) {
    case LootCurrency.BlueEssence:
      return 'BE';
    case LootCurrency.OrangeEssence:
      return 'OE';
    default:
      return currency || 'essence';
  }
}
