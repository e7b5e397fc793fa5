/**
 * Champion Data Service
 * Loads public champion and skin definitions used by the collection statistics
 */

import { z } from 'zod';

import type { ApiResult } from '../types.js';
import { errorMessage } from '../utils/errors.js';
import { championSchema, type Champion } from './schemas.js';

const championDataSchema = z.record(championSchema);

export class ChampionDataService {
  private url: string;
  private champions: Champion[] = [];
  private isLoaded = false;

  constructor(url: string) {
    this.url = url;
  }

  /**
   * Fetch the champion data (once per session)
   */
  async load(): Promise<ApiResult<Champion[]>> {
    if (this.isLoaded) {
      return { success: true, data: this.champions };
    }

    try {
      const response = await fetch(this.url);
      if (!response.ok) {
        return {
          success: false,
          status: response.status,
          error: `Failed to load champion data: HTTP ${response.status}`,
        };
      }

      const parsed = championDataSchema.safeParse(await response.json());
      if (!parsed.success) {
        return {
          success: false,
          error: `Failed to load champion data: ${parsed.error.issues[0]?.message ?? 'invalid data'}`,
        };
      }

      this.champions = Object.values(parsed.data);
      this.isLoaded = true;
      return { success: true, data: this.champions };
    } catch (error) {
      return {
        success: false,
        error: `Failed to load champion data: ${errorMessage(error)}`,
      };
    }
  }
}
