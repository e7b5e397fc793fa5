/**
 * CLI command mapping
 * Each command runs one or more MCP tools and prints their text output
 */

import { toolSchemas } from '../mcp/tools.js';
import { errorMessage } from '../utils/errors.js';

export interface ParsedArguments {
  command?: string;
  flags: Set<string>;
  options: Map<string, string>;
}

export interface ToolCall {
  tool: string;
  args: Record<string, unknown>;
}

export interface ToolRunner {
  callTool(name: string, args: Record<string, unknown>): Promise<string>;
}

export class UsageError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'UsageError';
  }
}

export const USAGE = `Usage: lcu-loot <command> [options]

Commands:
  connect            [--lockfile=PATH]
  loot-summary
  shard-stats
  collection-stats   [--limit=N]
  plan-disenchant    [--no-champions] [--no-skins] [--no-ward-skins]
                     [--keep-unowned=N] [--protect=ID,ID]
  disenchant         same options as plan-disenchant, plus --execute
  open-chests        [--execute]
  backup-settings    [--dir=PATH]
  restore-settings   [--dir=PATH]
  randomize-tokens
  remove-tokens
  randomize-icon`;

export function parseArguments(argv: string[]): ParsedArguments {
  const parsed: ParsedArguments = { flags: new Set(), options: new Map() };

  for (const arg of argv) {
    if (arg.startsWith('--')) {
      const body = arg.slice(2);
      const eq = body.indexOf('=');
      if (eq >= 0) {
        parsed.options.set(body.slice(0, eq), body.slice(eq + 1));
      } else {
        parsed.flags.add(body);
      }
    } else if (!parsed.command) {
      parsed.command = arg;
    }
  }

  return parsed;
}

function numberOption(parsed: ParsedArguments, key: string): number | undefined {
  const value = parsed.options.get(key);
  return value === undefined ? undefined : Number(value);
}

function disenchantArgs(parsed: ParsedArguments): Record<string, unknown> {
  const protect = parsed.options.get('protect');
  return {
    includeChampionShards: !parsed.flags.has('no-champions'),
    includeSkinShards: !parsed.flags.has('no-skins'),
    includeWardSkinShards: !parsed.flags.has('no-ward-skins'),
    keepUnownedCopies: numberOption(parsed, 'keep-unowned'),
    protectedLootIds: protect ? protect.split(',').filter(Boolean) : undefined,
  };
}

export function buildToolCalls(parsed: ParsedArguments): ToolCall[] {
  const execute = parsed.flags.has('execute');

  switch (parsed.command) {
    case 'connect':
      return [{ tool: toolSchemas.connect.name, args: { lockfilePath: parsed.options.get('lockfile') } }];
    case 'loot-summary':
      return [{ tool: toolSchemas.lootSummary.name, args: {} }];
    case 'shard-stats':
      return [{ tool: toolSchemas.skinShardStats.name, args: {} }];
    case 'collection-stats':
      return [{ tool: toolSchemas.collectionStats.name, args: { limit: numberOption(parsed, 'limit') } }];
    case 'plan-disenchant':
      return [{ tool: toolSchemas.planDisenchant.name, args: disenchantArgs(parsed) }];
    case 'disenchant': {
      const calls: ToolCall[] = [{ tool: toolSchemas.planDisenchant.name, args: disenchantArgs(parsed) }];
      if (execute) {
        calls.push({ tool: toolSchemas.executeDisenchant.name, args: { confirm: true } });
      }
      return calls;
    }
    case 'open-chests':
      return [{ tool: toolSchemas.openChests.name, args: { dryRun: !execute } }];
    case 'backup-settings':
      return [{ tool: toolSchemas.backupSettings.name, args: { backupDir: parsed.options.get('dir') } }];
    case 'restore-settings':
      return [{ tool: toolSchemas.restoreSettings.name, args: { backupDir: parsed.options.get('dir') } }];
    case 'randomize-tokens':
      return [{ tool: toolSchemas.randomizeTokens.name, args: {} }];
    case 'remove-tokens':
      return [{ tool: toolSchemas.removeTokens.name, args: {} }];
    case 'randomize-icon':
      return [{ tool: toolSchemas.randomizeIcon.name, args: {} }];
    default:
      throw new UsageError(
        parsed.command ? `Unknown command: ${parsed.command}` : 'No command given'
      );
  }
}

/**
 * Run a command line and return the process exit code
 */
export async function runCli(
  argv: string[],
  runner: ToolRunner,
  out: (text: string) => void = console.log,
  err: (text: string) => void = console.error
): Promise<number> {
  let calls: ToolCall[];
  try {
    calls = buildToolCalls(parseArguments(argv));
  } catch (error) {
    if (!(error instanceof UsageError)) throw error;
    err(`${error.message}\n\n${USAGE}`);
    return 1;
  }

  for (const call of calls) {
    try {
      out(await runner.callTool(call.tool, call.args));
    } catch (error) {
      err(`Error: ${errorMessage(error)}`);
      return 1;
    }
  }

  return 0;
}
