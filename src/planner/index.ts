/**
 * Planner module exports
 */

export { DisenchantPlanner, DEFAULT_DISENCHANT_RULES, type ExecutionReport } from './disenchant-planner.js';
export {
  findOpenableItems,
  formatOpenReport,
  openContainers,
  selectOpenRecipe,
  type OpenReport,
} from './chest-opener.js';
