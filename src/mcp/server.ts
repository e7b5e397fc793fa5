/**
 * MCP Server Implementation
 * Main server that exposes the loot bookkeeping tools
 */

import { Server } from '@modelcontextprotocol/sdk/server/index.js';
import { StdioServerTransport } from '@modelcontextprotocol/sdk/server/stdio.js';
import {
  CallToolRequestSchema,
  ListToolsRequestSchema,
  type Tool,
} from '@modelcontextprotocol/sdk/types.js';
import { z } from 'zod';

import { loadConfig, type AppConfig } from '../config.js';
import { ChampionDataService, LcuClient, createLcuClient, type PlayerLootItem } from '../lcu/index.js';
import {
  computeCollectionStats,
  computeSkinShardStats,
  formatCollectionStats,
  formatSkinShardStats,
  summarizeLoot,
} from '../analysis/index.js';
import {
  DEFAULT_DISENCHANT_RULES,
  DisenchantPlanner,
  formatOpenReport,
  openContainers,
} from '../planner/index.js';
import {
  randomizeChallengeTokens,
  randomizeProfileIcon,
  removeChallengeTokens,
  type RandomSource,
} from '../cosmetics/randomizer.js';
import { exportSettings, formatRestoreResults, importSettings } from '../settings/backup.js';
import type { DisenchantPlan, LootSummary } from '../types.js';
import { errorMessage } from '../utils/errors.js';
import { toolSchemas, type ToolArgs } from './tools.js';

export interface LootToolsServerOptions {
  config?: AppConfig;
  client?: LcuClient;
  random?: RandomSource;
}

type JsonSchemaObject = {
  type: 'object';
  properties: Record<string, Record<string, unknown>>;
  required?: string[];
};

export class LootToolsServer {
  private server: Server;
  private config: AppConfig;
  private client: LcuClient | null;
  private random: RandomSource;
  private championData: ChampionDataService;
  private planner: DisenchantPlanner;

  // Cached data
  private currentPlan: DisenchantPlan | null = null;
  private executing = false;

  constructor(options: LootToolsServerOptions = {}) {
    this.server = new Server(
      {
        name: 'lcu-loot-tools',
        version: '0.1.0',
      },
      {
        capabilities: {
          tools: {},
        },
      }
    );

    this.config = options.config ?? loadConfig();
    this.client = options.client ?? null;
    this.random = options.random ?? Math.random;
    this.championData = new ChampionDataService(this.config.championDataUrl);
    this.planner = new DisenchantPlanner();

    this.setupHandlers();
  }

  private setupHandlers(): void {
    // List available tools
    this.server.setRequestHandler(ListToolsRequestSchema, async () => ({
      tools: this.listTools(),
    }));

    // Handle tool calls
    this.server.setRequestHandler(CallToolRequestSchema, async (request) => {
      const { name, arguments: args } = request.params;

      try {
        const text = await this.callTool(name, args ?? {});
        return {
          content: [{ type: 'text', text }],
        };
      } catch (error) {
        return {
          content: [
            {
              type: 'text',
              text: `Error: ${errorMessage(error)}`,
            },
          ],
          isError: true,
        };
      }
    });
  }

  listTools(): Tool[] {
    return Object.values(toolSchemas).map((schema) => ({
      name: schema.name,
      description: schema.description,
      inputSchema: this.zodToJsonSchema(schema.inputSchema),
    }));
  }

  /**
   * Run a tool and render its result as text
   */
  async callTool(name: string, args: Record<string, unknown>): Promise<string> {
    const result = await this.handleToolCall(name, args);
    return typeof result === 'string' ? result : JSON.stringify(result, null, 2);
  }

  private async handleToolCall(name: string, args: Record<string, unknown>): Promise<unknown> {
    switch (name) {
      case toolSchemas.connect.name:
        return this.connect(toolSchemas.connect.inputSchema.parse(args));

      case toolSchemas.lootSummary.name:
        return this.getLootSummary();

      case toolSchemas.skinShardStats.name:
        return this.getSkinShardStats();

      case toolSchemas.collectionStats.name:
        return this.getCollectionStats(toolSchemas.collectionStats.inputSchema.parse(args));

      case toolSchemas.planDisenchant.name:
        return this.planDisenchant(toolSchemas.planDisenchant.inputSchema.parse(args));

      case toolSchemas.executeDisenchant.name:
        return this.executeDisenchant(toolSchemas.executeDisenchant.inputSchema.parse(args));

      case toolSchemas.openChests.name:
        return this.openChests(toolSchemas.openChests.inputSchema.parse(args));

      case toolSchemas.backupSettings.name:
        return this.backupSettings(toolSchemas.backupSettings.inputSchema.parse(args));

      case toolSchemas.restoreSettings.name:
        return this.restoreSettings(toolSchemas.restoreSettings.inputSchema.parse(args));

      case toolSchemas.randomizeTokens.name:
        return this.randomizeTokens();

      case toolSchemas.removeTokens.name:
        return this.removeTokens();

      case toolSchemas.randomizeIcon.name:
        return this.randomizeIcon();

      default:
        throw new Error(`Unknown tool: ${name}`);
    }
  }

  // Tool implementations

  private async connect(args: ToolArgs<'connect'>): Promise<string> {
    this.client = await createLcuClient({
      ...this.config,
      lockfilePath: args.lockfilePath ?? this.config.lockfilePath,
    });
    this.currentPlan = null;

    const summoner = await this.client.getCurrentSummoner();
    if (!summoner.success || !summoner.data) {
      this.client = null;
      throw new Error(summoner.error ?? 'Failed to fetch current summoner');
    }

    const name = summoner.data.gameName || summoner.data.displayName;
    return `Connected to League client as ${name} (level ${summoner.data.summonerLevel})`;
  }

  private async ensureClient(): Promise<LcuClient> {
    if (!this.client) {
      this.client = await createLcuClient(this.config);
    }
    return this.client;
  }

  private async fetchLoot(): Promise<PlayerLootItem[]> {
    const client = await this.ensureClient();
    const result = await client.getPlayerLoot();
    if (!result.success || !result.data) {
      throw new Error(result.error ?? 'Failed to fetch player loot');
    }
    return result.data;
  }

  private async getLootSummary(): Promise<LootSummary> {
    return summarizeLoot(await this.fetchLoot());
  }

  private async getSkinShardStats(): Promise<string> {
    return formatSkinShardStats(computeSkinShardStats(await this.fetchLoot()));
  }

  private async getCollectionStats(args: ToolArgs<'collectionStats'>): Promise<string> {
    const champions = await this.championData.load();
    if (!champions.success || !champions.data) {
      throw new Error(champions.error ?? 'Failed to load champion data');
    }

    const loot = await this.fetchLoot();
    const client = await this.ensureClient();
    const ownedSkins = await client.getInventory('CHAMPION_SKIN');
    if (!ownedSkins.success || !ownedSkins.data) {
      throw new Error(ownedSkins.error ?? 'Failed to fetch owned skins');
    }

    const stats = computeCollectionStats(
      champions.data,
      loot,
      ownedSkins.data.map((skin) => skin.itemId)
    );

    return formatCollectionStats(
      args.limit ? { ...stats, rows: stats.rows.slice(0, args.limit) } : stats
    );
  }

  private async planDisenchant(args: ToolArgs<'planDisenchant'>): Promise<string> {
    this.planner.updateRules({
      includeChampionShards: args.includeChampionShards ?? DEFAULT_DISENCHANT_RULES.includeChampionShards,
      includeSkinShards: args.includeSkinShards ?? DEFAULT_DISENCHANT_RULES.includeSkinShards,
      includeWardSkinShards: args.includeWardSkinShards ?? DEFAULT_DISENCHANT_RULES.includeWardSkinShards,
      keepUnownedCopies: args.keepUnownedCopies ?? DEFAULT_DISENCHANT_RULES.keepUnownedCopies,
      protectedLootIds: args.protectedLootIds ?? DEFAULT_DISENCHANT_RULES.protectedLootIds,
    });

    this.assertNotExecuting();
    const loot = await this.fetchLoot();
    // Loot read before a disenchant started is stale
    this.assertNotExecuting();

    const plan = this.planner.generatePlan(loot);
    this.currentPlan = plan;
    return this.planner.formatPlan(plan);
  }

  private async executeDisenchant(args: ToolArgs<'executeDisenchant'>): Promise<unknown> {
    const plan = this.currentPlan;
    if (!plan) {
      throw new Error('No disenchant plan generated. Call lol_plan_disenchant first.');
    }
    if (!args.confirm) {
      throw new Error('Disenchanting cannot be undone. Pass confirm: true to proceed.');
    }

    // A plan runs at most once; loot changes as soon as it starts
    this.currentPlan = null;
    this.executing = true;
    try {
      const client = await this.ensureClient();
      return await this.planner.executePlan(plan, client, {
        delayMs: this.config.requestDelayMs,
      });
    } finally {
      this.executing = false;
    }
  }

  private assertNotExecuting(): void {
    if (this.executing) {
      throw new Error('A disenchant is in progress. Plan again once it has finished.');
    }
  }

  private async openChests(args: ToolArgs<'openChests'>): Promise<string> {
    const loot = await this.fetchLoot();
    const client = await this.ensureClient();
    const report = await openContainers(client, loot, {
      dryRun: args.dryRun ?? true,
      delayMs: this.config.requestDelayMs,
    });
    return formatOpenReport(report);
  }

  private async backupSettings(args: ToolArgs<'backupSettings'>): Promise<string> {
    const client = await this.ensureClient();
    const paths = await exportSettings(client, args.backupDir ?? this.config.backupDir);
    return `Settings saved:\n${paths.map((p) => `- ${p}`).join('\n')}`;
  }

  private async restoreSettings(args: ToolArgs<'restoreSettings'>): Promise<string> {
    const client = await this.ensureClient();
    const results = await importSettings(client, args.backupDir ?? this.config.backupDir);
    return formatRestoreResults(results);
  }

  private async randomizeTokens(): Promise<string> {
    const client = await this.ensureClient();
    const picked = await randomizeChallengeTokens(client, this.random);
    return `Challenge tokens set: ${picked.map((c) => `${c.name} (${c.currentLevel})`).join(', ')}`;
  }

  private async removeTokens(): Promise<string> {
    const client = await this.ensureClient();
    await removeChallengeTokens(client);
    return 'Challenge tokens removed';
  }

  private async randomizeIcon(): Promise<string> {
    const client = await this.ensureClient();
    const { previousIconId, profileIconId } = await randomizeProfileIcon(client, this.random);
    return `Profile icon changed from ${previousIconId} to ${profileIconId}`;
  }

  // Utility methods

  private zodToJsonSchema(schema: z.AnyZodObject): JsonSchemaObject {
    const properties: Record<string, Record<string, unknown>> = {};
    const required: string[] = [];

    for (const [key, zodType] of Object.entries<z.ZodTypeAny>(schema.shape)) {
      const isOptional = zodType.isOptional();

      if (!isOptional) {
        required.push(key);
      }

      // Extract inner type if optional
      const innerType = zodType instanceof z.ZodOptional ? zodType.unwrap() : zodType;

      properties[key] = {
        ...this.zodTypeToJsonSchema(innerType),
        description: zodType.description ?? innerType.description,
      };
    }

    return {
      type: 'object',
      properties,
      required: required.length > 0 ? required : undefined,
    };
  }

  private zodTypeToJsonSchema(zodType: z.ZodTypeAny): Record<string, unknown> {
    if (zodType instanceof z.ZodString) {
      return { type: 'string' };
    }
    if (zodType instanceof z.ZodNumber) {
      return { type: zodType.isInt ? 'integer' : 'number' };
    }
    if (zodType instanceof z.ZodBoolean) {
      return { type: 'boolean' };
    }
    if (zodType instanceof z.ZodEnum) {
      return { type: 'string', enum: zodType.options };
    }
    if (zodType instanceof z.ZodArray) {
      return { type: 'array', items: this.zodTypeToJsonSchema(zodType.element) };
    }
    return { type: 'string' };
  }

  async run(): Promise<void> {
    const transport = new StdioServerTransport();
    await this.server.connect(transport);
    console.error('LCU Loot Tools MCP server running on stdio');
  }
}
