/**
 * MCP Tool Definitions
 * Defines all available tools for LCU Loot Tools
 */

import { z } from 'zod';

export const toolSchemas = {
  // Connection
  connect: {
    name: 'lol_connect',
    description: 'Connect to the running League client through its lockfile and show the logged-in summoner',
    inputSchema: z.object({
      lockfilePath: z.string().optional().describe('Path to the client lockfile (defaults to configuration or the standard install location)'),
    }),
  },

  // Statistics
  lootSummary: {
    name: 'lol_loot_summary',
    description: 'Summarize the loot tab: item counts per category and essence, key and key fragment balances',
    inputSchema: z.object({}),
  },

  skinShardStats: {
    name: 'lol_skin_shard_stats',
    description: 'Count owned and unowned skin shards for each price tier in the loot tab',
    inputSchema: z.object({}),
  },

  collectionStats: {
    name: 'lol_collection_stats',
    description: 'Per champion skin counts, unowned skin shards and owned-plus-shard totals for skin collection challenges',
    inputSchema: z.object({
      limit: z.number().int().positive().optional().describe('Only list the first N champions (totals still cover all)'),
    }),
  },

  // Disenchanting
  planDisenchant: {
    name: 'lol_plan_disenchant',
    description: 'Plan which duplicate champion, skin and ward skin shards to disenchant and how much essence that yields',
    inputSchema: z.object({
      includeChampionShards: z.boolean().optional().describe('Include champion shards (default: true)'),
      includeSkinShards: z.boolean().optional().describe('Include skin shards (default: true)'),
      includeWardSkinShards: z.boolean().optional().describe('Include ward skin shards (default: true)'),
      keepUnownedCopies: z.number().int().nonnegative().optional().describe('Copies of an unowned shard to keep for unlocking (default: 1)'),
      protectedLootIds: z.array(z.string()).optional().describe('Loot ids that must never be disenchanted'),
    }),
  },

  executeDisenchant: {
    name: 'lol_execute_disenchant',
    description: 'Disenchant everything in the most recent plan. This cannot be undone.',
    inputSchema: z.object({
      confirm: z.boolean().describe('Must be true to run the disenchant calls'),
    }),
  },

  // Containers
  openChests: {
    name: 'lol_open_chests',
    description: 'Open capsules, orbs and other containers that need no key',
    inputSchema: z.object({
      dryRun: z.boolean().optional().describe('Only list what would be opened (default: true)'),
    }),
  },

  // Settings
  backupSettings: {
    name: 'lol_backup_settings',
    description: 'Save game and input settings to JSON files',
    inputSchema: z.object({
      backupDir: z.string().optional().describe('Directory for the backup files'),
    }),
  },

  restoreSettings: {
    name: 'lol_restore_settings',
    description: 'Restore game and input settings from JSON backup files',
    inputSchema: z.object({
      backupDir: z.string().optional().describe('Directory holding the backup files'),
    }),
  },

  // Cosmetics
  randomizeTokens: {
    name: 'lol_randomize_tokens',
    description: 'Show three random challenge tokens on the profile',
    inputSchema: z.object({}),
  },

  removeTokens: {
    name: 'lol_remove_tokens',
    description: 'Remove all challenge tokens from the profile',
    inputSchema: z.object({}),
  },

  randomizeIcon: {
    name: 'lol_randomize_icon',
    description: 'Switch to a random owned profile icon',
    inputSchema: z.object({}),
  },
};

export type ToolKey = keyof typeof toolSchemas;
export type ToolArgs<K extends ToolKey> = z.infer<(typeof toolSchemas)[K]['inputSchema']>;
