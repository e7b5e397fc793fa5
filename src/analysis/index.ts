/**
 * Analysis module exports
 */

export { computeSkinShardStats, formatSkinShardStats } from './shard-stats.js';
export {
  computeCollectionStats,
  formatCollectionStats,
  ownedSkinsByChampion,
  skinsByChampion,
  unownedShardsByChampion,
} from './collection-stats.js';
export { summarizeLoot } from './loot-summary.js';
