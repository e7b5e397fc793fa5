#!/usr/bin/env node
/**
 * LCU Loot Tools MCP Server
 *
 * Bookkeeping helpers for the League client's local API:
 * - Skin shard and collection challenge statistics
 * - Disenchanting duplicate champion, skin and ward skin shards
 * - Opening key-free containers
 * - Backing up and restoring game and input settings
 * - Random challenge tokens and profile icons
 *
 * Usage:
 *   npx lcu-loot-tools
 *
 * Or add to an MCP client config:
 *   {
 *     "mcpServers": {
 *       "lcu-loot": {
 *         "command": "npx",
 *         "args": ["lcu-loot-tools"]
 *       }
 *     }
 *   }
 */

import { LootToolsServer } from './mcp/server.js';

async function main(): Promise<void> {
  const server = new LootToolsServer();
  await server.run();
}

main().catch((error) => {
  console.error('Fatal error:', error);
  process.exit(1);
});
