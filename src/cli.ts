#!/usr/bin/env node
/**
 * Command-line runner for the loot tools
 *
 * Usage:
 *   npx lcu-loot shard-stats
 *   npx lcu-loot disenchant --keep-unowned=1 --execute
 */

import { runCli } from './cli/commands.js';
import { LootToolsServer } from './mcp/server.js';

async function main(): Promise<void> {
  const server = new LootToolsServer();
  process.exitCode = await runCli(process.argv.slice(2), server);
}

main().catch((error) => {
  console.error('Fatal error:', error);
  process.exit(1);
});
