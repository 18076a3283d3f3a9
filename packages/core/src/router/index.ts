// © 2026 LearnHubPlay BV. All rights reserved.
// Licensed under BUSL 1.1 — see LICENSE for details.

export {
  ComplexityClassifier,
  DESCRIPTION_RULES,
  TYPE_RULES,
  escalate,
  type ClassificationResult,
  type ClassificationRule,
  type ClassifierOptions,
} from "./classifier.js";
export { ContextState, type ContextCeilings } from "./context.js";
export {
  DelegationEngine,
  validateTask,
  type Contribution,
  type DecideOptions,
  type DelegationEngineOptions,
  type DelegationRecord,
  type DelegationSettings,
  type ExecuteTaskOptions,
  type HybridSynthesis,
} from "./delegation.js";
