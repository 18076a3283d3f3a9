// © 2026 LearnHubPlay BV. All rights reserved.
// Licensed under BUSL 1.1 — see LICENSE for details.

import { ComplexityClass, complexityRank, type TaskRequest } from "../types.js";

export const SYSTEM_PROMPT = `You are a software engineering assistant working on delegated tasks.
Prefer mechanical precision and thorough analysis.
Use tools when they are available to gather accurate information.
Return JSON-structured output when possible.`;

/** User prompt for a delegated task. */
export function formatTaskPrompt(task: TaskRequest): string {
  const parts = [
    `Task ID: ${task.id}`,
    `Task Type: ${task.type}`,
    `Priority: ${task.priority ?? "normal"}`,
    "",
    "Description:",
    task.description,
    "",
  ];

  if (task.requiredTools.length > 0) {
    parts.push("Required Tools:", ...task.requiredTools.map((t) => `- ${t}`), "");
  }

  if (task.context && Object.keys(task.context).length > 0) {
    parts.push("Context:", JSON.stringify(task.context, null, 2), "");
  }

  parts.push(
    "Instructions:",
    "1. Analyze the task thoroughly",
    "2. Use the required tools effectively",
    "3. Provide structured output",
    "4. Report any issues encountered",
  );

  return parts.join("\n");
}

/**
 * Heuristic confidence for a model answer.
 * Base by class, +0.1 when tools were called, +0.1 for substantial content; capped at 1.
 */
export function estimateConfidence(
  complexity: ComplexityClass | undefined,
  content: string,
  toolCallCount = 0,
): number {
  let confidence = 0.5;
  if (complexity !== undefined) {
    if (complexityRank(complexity) <= complexityRank(ComplexityClass.ANALYTICAL)) confidence = 0.9;
    else if (complexity === ComplexityClass.CREATIVE) confidence = 0.6;
    else confidence = 0.5;
  }
  if (toolCallCount > 0) confidence += 0.1;
  if (content.length > 100) confidence += 0.1;
  return Math.min(confidence, 1);
}
