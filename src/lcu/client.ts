/**
 * LCU API Client
 * Handles authenticated requests to the League client's local API
 */

import axios, { type AxiosAdapter, type AxiosInstance, type Method } from 'axios';
import { Agent } from 'https';
import { z } from 'zod';

import type { AppConfig } from '../config.js';
import type { ApiResult, InventoryType, LcuCredentials, SettingsSection } from '../types.js';
import { errorMessage } from '../utils/errors.js';
import { readLockfile, resolveLockfilePath, toCredentials } from './lockfile.js';
import {
  challengeSchema,
  inventoryItemSchema,
  lootRecipeSchema,
  playerLootItemSchema,
  settingsDataSchema,
  summonerSchema,
  type Challenge,
  type LcuInventoryItem,
  type LootRecipe,
  type PlayerLootItem,
  type SettingsData,
  type Summoner,
} from './schemas.js';

const lcuErrorSchema = z.object({ message: z.string() });

interface RequestOptions {
  data?: unknown;
  params?: Record<string, string | number>;
}

export class LcuClient {
  private http: AxiosInstance;

  constructor(credentials: LcuCredentials, adapter?: AxiosAdapter) {
    this.http = axios.create({
      baseURL: credentials.baseUrl,
      headers: {
        Authorization: credentials.authorization,
        Accept: 'application/json',
        'Content-Type': 'application/json',
      },
      // The client serves a self-signed certificate on 127.0.0.1
      httpsAgent: new Agent({ rejectUnauthorized: false }),
      validateStatus: () => true,
      adapter,
    });
  }

  private async request<S extends z.ZodTypeAny>(
    method: Method,
    endpoint: string,
    schema: S,
    options: RequestOptions = {}
  ): Promise<ApiResult<z.output<S>>> {
    try {
      const response = await this.http.request<unknown>({
        method,
        url: endpoint,
        data: options.data,
        params: options.params,
      });

      if (response.status < 200 || response.status >= 300) {
        const body = lcuErrorSchema.safeParse(response.data);
        const message = body.success ? body.data.message : response.statusText;
        return {
          success: false,
          status: response.status,
          error: `LCU API Error: ${response.status} ${message}`.trim(),
        };
      }

      const parsed = schema.safeParse(response.data);
      if (!parsed.success) {
        return {
          success: false,
          status: response.status,
          error: `Unexpected response from ${endpoint}: ${parsed.error.issues[0]?.message ?? 'invalid data'}`,
        };
      }

      return { success: true, status: response.status, data: parsed.data };
    } catch (error) {
      return {
        success: false,
        error: `Network error: ${errorMessage(error)}`,
      };
    }
  }

  /**
   * Get the logged-in summoner
   */
  async getCurrentSummoner(): Promise<ApiResult<Summoner>> {
    return this.request('get', '/lol-summoner/v1/current-summoner', summonerSchema);
  }

  /**
   * Get every entry of the loot tab
   */
  async getPlayerLoot(): Promise<ApiResult<PlayerLootItem[]>> {
    return this.request('get', '/lol-loot/v1/player-loot', z.array(playerLootItemSchema));
  }

  /**
   * Get the recipes that take the given loot item as input
   */
  async getRecipesForItem(lootId: string): Promise<ApiResult<LootRecipe[]>> {
    return this.request(
      'get',
      `/lol-loot/v1/recipes/initial-item/${encodeURIComponent(lootId)}`,
      z.array(lootRecipeSchema)
    );
  }

  /**
   * Craft a recipe (disenchant, open, ...) `repeat` times
   */
  async craft(recipeName: string, lootIds: string[], repeat = 1): Promise<ApiResult<unknown>> {
    return this.request(
      'post',
      `/lol-loot/v1/recipes/${encodeURIComponent(recipeName)}/craft`,
      z.unknown(),
      { data: lootIds, params: { repeat } }
    );
  }

  /**
   * Get owned inventory entries of one type
   */
  async getInventory(type: InventoryType): Promise<ApiResult<LcuInventoryItem[]>> {
    return this.request(
      'get',
      `/lol-inventory/v2/inventory/${type}`,
      z.array(inventoryItemSchema)
    );
  }

  /**
   * Get all challenges of the local player
   */
  async getChallenges(): Promise<ApiResult<Challenge[]>> {
    const result = await this.request(
      'get',
      '/lol-challenges/v1/challenges/local-player',
      z.record(challengeSchema)
    );

    if (!result.success || !result.data) {
      return { success: false, status: result.status, error: result.error };
    }

    return { success: true, status: result.status, data: Object.values(result.data) };
  }

  /**
   * Replace the challenge tokens shown on the profile
   */
  async setChallengeTokens(challengeIds: number[]): Promise<ApiResult<unknown>> {
    return this.request(
      'post',
      '/lol-challenges/v1/update-player-preferences/',
      z.unknown(),
      { data: { challengeIds } }
    );
  }

  async setProfileIcon(profileIconId: number): Promise<ApiResult<unknown>> {
    return this.request('put', '/lol-summoner/v1/current-summoner/icon', z.unknown(), {
      data: { profileIconId },
    });
  }

  async getSettings(section: SettingsSection): Promise<ApiResult<SettingsData>> {
    return this.request('get', `/lol-game-settings/v1/${section}`, settingsDataSchema);
  }

  async patchSettings(section: SettingsSection, data: SettingsData): Promise<ApiResult<unknown>> {
    return this.request('patch', `/lol-game-settings/v1/${section}`, z.unknown(), { data });
  }
}

/**
 * Discover the running client through its lockfile and build a client for it
 */
export async function createLcuClient(
  config: Pick<AppConfig, 'lockfilePath' | 'installDir'>
): Promise<LcuClient> {
  const path = await resolveLockfilePath(config);
  const lockfile = await readLockfile(path);
  return new LcuClient(toCredentials(lockfile));
}
