// © 2026 LearnHubPlay BV. All rights reserved.
// Licensed under BUSL 1.1 — see LICENSE for details.

/**
 * ComplexityClassifier — assigns a coarse ComplexityClass to a task.
 *
 * Pipeline (pure, first match wins at every step):
 *   1. Preset     — task.complexity is returned unchanged
 *   2. Type table — substrings of task.type
 *   3. Description table — phrases in task.description
 *   4. Default    — ANALYTICAL
 *   5. Escalation — estimatedTokens above the threshold raises the class one rank
 */

import { COMPLEXITY_ORDER, ComplexityClass, complexityRank, type TaskRequest } from "../types.js";

export interface ClassificationRule {
  pattern: RegExp;
  complexity: ComplexityClass;
}

export interface ClassificationResult {
  complexity: ComplexityClass;
  source: "preset" | "type" | "description" | "default";
  /** The text the winning rule matched, if any. */
  matched?: string;
  escalated: boolean;
}

export interface ClassifierOptions {
  escalationTokenThreshold?: number;
  typeRules?: readonly ClassificationRule[];
  descriptionRules?: readonly ClassificationRule[];
}

// ── Rule tables ───────────────────────────────────────────────────────────────

const { MECHANICAL, ANALYTICAL, CREATIVE, STRATEGIC } = ComplexityClass;

/** Matched against task.type. "algorithm_design" is CREATIVE, so CREATIVE precedes the generic "design". */
export const TYPE_RULES: readonly ClassificationRule[] = [
  { pattern: /architecture|roadmap|strategy|system_design|security_audit/, complexity: STRATEGIC },
  {
    pattern: /novel|creative|invent|algorithm|api_design|prototype|brainstorm|code_generation|refactor/,
    complexity: CREATIVE,
  },
  { pattern: /design/, complexity: STRATEGIC },
  {
    pattern: /analysis|analy[sz]e|review|debug|investigat|diagnos|test|pattern|metric|log|documentation/,
    complexity: ANALYTICAL,
  },
  { pattern: /search|list|format|copy|move|rename|run|lint|count|fetch/, complexity: MECHANICAL },
];

export const DESCRIPTION_RULES: readonly ClassificationRule[] = [
  {
    pattern: /architecture|design system|roadmap|long-term|strategy|scalability|future-proof/,
    complexity: STRATEGIC,
  },
  {
    pattern: /novel|invent|innovative|new approach|from scratch|original|creative/,
    complexity: CREATIVE,
  },
  {
    pattern: /\bwhy\b|debug|analy[sz]e|investigate|diagnose|root cause|explain|review|compare|pattern/,
    complexity: ANALYTICAL,
  },
  { pattern: /search|\blist\b|copy|rename|format|\bfind\b|count/, complexity: MECHANICAL },
];

const DEFAULT_ESCALATION_TOKENS = 50_000;

function firstMatch(
  text: string,
  rules: readonly ClassificationRule[],
): { complexity: ComplexityClass; matched: string } | undefined {
  const lower = text.toLowerCase();
  for (const rule of rules) {
    const m = rule.pattern.exec(lower);
    if (m) return { complexity: rule.complexity, matched: m[0] };
  }
  return undefined;
}

/** One rank up, capped at the top. */
export function escalate(complexity: ComplexityClass): ComplexityClass {
  const next = COMPLEXITY_ORDER[complexityRank(complexity) + 1];
  return next ?? complexity;
}

// ── Classifier ────────────────────────────────────────────────────────────────

export class ComplexityClassifier {
  private readonly escalationTokenThreshold: number;
  private readonly typeRules: readonly ClassificationRule[];
  private readonly descriptionRules: readonly ClassificationRule[];

  constructor(options: ClassifierOptions = {}) {
    this.escalationTokenThreshold = options.escalationTokenThreshold ?? DEFAULT_ESCALATION_TOKENS;
    this.typeRules = options.typeRules ?? TYPE_RULES;
    this.descriptionRules = options.descriptionRules ?? DESCRIPTION_RULES;
  }

  classify(task: TaskRequest): ComplexityClass {
    return this.explain(task).complexity;
  }

  /** Full classification with the rule that fired. */
  explain(task: TaskRequest): ClassificationResult {
    if (task.complexity !== undefined) {
      return { complexity: task.complexity, source: "preset", escalated: false };
    }

    const byType = firstMatch(task.type, this.typeRules);
    const byDescription = byType ? undefined : firstMatch(task.description, this.descriptionRules);

    let result: ClassificationResult;
    if (byType) {
      result = { complexity: byType.complexity, source: "type", matched: byType.matched, escalated: false };
    } else if (byDescription) {
      result = {
        complexity: byDescription.complexity,
        source: "description",
        matched: byDescription.matched,
        escalated: false,
      };
    } else {
      result = { complexity: ANALYTICAL, source: "default", escalated: false };
    }

    if (task.estimatedTokens > this.escalationTokenThreshold) {
      const escalated = escalate(result.complexity);
      result = { ...result, complexity: escalated, escalated: escalated !== result.complexity };
    }

    return result;
  }
}
