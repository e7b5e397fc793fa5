/**
 * LCU module exports
 */

export { LcuClient, createLcuClient } from './client.js';
export { ChampionDataService } from './champion-data.js';
export {
  LockfileError,
  parseLockfile,
  readLockfile,
  resolveLockfilePath,
  defaultLockfilePaths,
  toCredentials,
  type LockfileData,
} from './lockfile.js';
export type {
  Challenge,
  Champion,
  ChampionSkin,
  LcuInventoryItem,
  LootRecipe,
  PlayerLootItem,
  SettingsData,
  Summoner,
} from './schemas.js';
