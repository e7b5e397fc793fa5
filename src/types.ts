/**
 * Core type definitions for LCU Loot Tools
 */

import type { PlayerLootItem } from './lcu/schemas.js';

// Loot item types that can be disenchanted into essence
export enum ShardType {
  Champion = 'CHAMPION_RENTAL',
  Skin = 'SKIN_RENTAL',
  WardSkin = 'WARDSKIN_RENTAL',
}

export const SHARD_TYPE_NAMES: Record<ShardType, string> = {
  [ShardType.Champion]: 'Champion Shard',
  [ShardType.Skin]: 'Skin Shard',
  [ShardType.WardSkin]: 'Ward Skin Shard',
};

// Well-known loot ids for currencies and materials
export enum LootCurrency {
  BlueEssence = 'CURRENCY_champion',
  OrangeEssence = 'CURRENCY_cosmetic',
  MythicEssence = 'CURRENCY_mythic',
  Key = 'MATERIAL_key',
  KeyFragment = 'MATERIAL_key_fragment',
}

export const OWNED_STATUS = 'OWNED';
export const SKIN_SHARD_DISENCHANT_RECIPE = 'SKIN_RENTAL_disenchant';

export type SettingsSection = 'game-settings' | 'input-settings';

// Inventory types queried through /lol-inventory/v2/inventory/{type}
export type InventoryType = 'CHAMPION_SKIN' | 'SUMMONER_ICON' | 'CHAMPION';

// Session credentials derived from the client lockfile
export interface LcuCredentials {
  baseUrl: string;
  authorization: string;
}

// Skin shard statistics per price tier
export interface ShardTierStats {
  value: number;
  owned: number;
  notOwned: number;
}

export interface SkinShardStats {
  tiers: ShardTierStats[];
  totalShards: number;
}

// Collection challenge statistics
export interface CollectionRow {
  championId: number;
  championName: string;
  skinCount: number;
  ownedSkins: number;
  unownedShards: number;
  totalSum: number;
}

export interface CollectionStats {
  rows: CollectionRow[];
  totals: {
    skinCount: number;
    ownedSkins: number;
    unownedShards: number;
    totalSum: number;
  };
}

// Loot tab overview
export interface LootSummary {
  totalEntries: number;
  totalItems: number;
  byCategory: Record<string, number>;
  blueEssence: number;
  orangeEssence: number;
  mythicEssence: number;
  keys: number;
  keyFragments: number;
}

// Disenchant recommendation
export interface DisenchantRecommendation {
  item: PlayerLootItem;
  action: 'DISENCHANT' | 'KEEP';
  disenchantCount: number;
  keepCount: number;
  recipeName: string;
  essence: number;
  currency: string;
  reason: string;
}

// Disenchant plan
export interface DisenchantPlan {
  generatedAt: Date;
  summary: {
    totalAnalyzed: number;
    disenchant: number;
    keep: number;
    shardsDisenchanted: number;
    blueEssence: number;
    orangeEssence: number;
  };
  recommendations: DisenchantRecommendation[];
}

// Rules deciding which shards may be disenchanted
export interface DisenchantRules {
  includeChampionShards: boolean;
  includeSkinShards: boolean;
  includeWardSkinShards: boolean;
  keepUnownedCopies: number;
  protectedLootIds: string[];
}

// Outcome of a single mutation call made while executing a plan
export interface ActionResult {
  lootId: string;
  name: string;
  success: boolean;
  error?: string;
}

// API response wrapper
export interface ApiResult<T> {
  success: boolean;
  data?: T;
  error?: string;
  status?: number;
}
