/**
 * Schemas for the LCU records this project reads.
 * Only the fields the tools use are kept; everything else is stripped.
 */

import { z } from 'zod';

export const playerLootItemSchema = z.object({
  lootId: z.string(),
  lootName: z.string().default(''),
  type: z.string().default(''),
  displayCategories: z.string().default(''),
  itemStatus: z.string().default('NONE'),
  count: z.number().int().nonnegative(),
  value: z.number().default(0),
  disenchantValue: z.number().default(0),
  disenchantLootName: z.string().default(''),
  disenchantRecipeName: z.string().optional(),
  storeItemId: z.number().default(0),
  parentStoreItemId: z.number().default(0),
  localizedName: z.string().default(''),
  itemDesc: z.string().default(''),
  rarity: z.string().default(''),
});

export type PlayerLootItem = z.infer<typeof playerLootItemSchema>;

export const lootRecipeSchema = z.object({
  recipeName: z.string(),
  type: z.string().default(''),
  slots: z
    .array(
      z.object({
        lootIds: z.array(z.string()).default([]),
        quantity: z.number().default(1),
      })
    )
    .default([]),
});

export type LootRecipe = z.infer<typeof lootRecipeSchema>;

export const inventoryItemSchema = z.object({
  itemId: z.number(),
  inventoryType: z.string().default(''),
  ownershipType: z.string().optional(),
});

export type LcuInventoryItem = z.infer<typeof inventoryItemSchema>;

export const challengeSchema = z.object({
  id: z.number(),
  name: z.string().default(''),
  currentLevel: z.string().default('NONE'),
  isCapstone: z.boolean().optional(),
});

export type Challenge = z.infer<typeof challengeSchema>;

export const summonerSchema = z.object({
  summonerId: z.number(),
  displayName: z.string().default(''),
  gameName: z.string().optional(),
  profileIconId: z.number(),
  summonerLevel: z.number().default(0),
});

export type Summoner = z.infer<typeof summonerSchema>;

// Public champion data (Meraki Analytics champions.json)
export const championSkinSchema = z.object({
  id: z.number(),
  name: z.string(),
  isBase: z.boolean(),
});

export const championSchema = z.object({
  id: z.number(),
  key: z.string(),
  name: z.string(),
  skins: z.array(championSkinSchema),
});

export type ChampionSkin = z.infer<typeof championSkinSchema>;
export type Champion = z.infer<typeof championSchema>;

export const settingsDataSchema = z.record(z.unknown());

export type SettingsData = z.infer<typeof settingsDataSchema>;
