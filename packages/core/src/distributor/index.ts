// © 2026 LearnHubPlay BV. All rights reserved.
// Licensed under BUSL 1.1 — see LICENSE for details.

export {
  TaskDistributor,
  BASE_IMPORTANCE,
  CATEGORY_RULES,
  calculateImportance,
  classifyTaskText,
  estimateTokens,
  generateTaskId,
  type DistributorSettings,
  type DistributorStatus,
  type TaskDistributorOptions,
} from "./distributor.js";
export { ResourcePool, type ResourceUsage } from "./resource-pool.js";
