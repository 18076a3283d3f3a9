// © 2026 LearnHubPlay BV. All rights reserved.
// Licensed under BUSL 1.1 — see LICENSE for details.

import type { TandemConfig } from "../types.js";
import { HostedExecutor } from "./hosted.js";
import { LocalExecutor } from "./local.js";

export { BaseExecutor, type ExecuteOptions, type ExecutorOutput } from "./base.js";
export { LocalExecutor, type LocalExecutorOptions, type LocalResult, type LocalToolCall } from "./local.js";
export { HostedExecutor, type HostedExecutorOptions, type HostedResult } from "./hosted.js";
export { AvailabilityMonitor, type AvailabilityStatus } from "./availability.js";
export { SYSTEM_PROMPT, estimateConfidence, formatTaskPrompt } from "./prompt.js";

export interface ExecutorPair {
  local: LocalExecutor;
  hosted: HostedExecutor;
}

/** Build both executors from the `executors` config section. */
export function createExecutors(config: TandemConfig): ExecutorPair {
  const { local, hosted } = config.executors;
  return {
    local: new LocalExecutor({
      baseUrl: local.baseUrl,
      model: local.model,
      tools: local.tools,
      temperature: local.temperature,
      maxTokens: local.maxTokens,
    }),
    hosted: new HostedExecutor({
      model: hosted.model,
      tools: hosted.tools,
      maxTokens: hosted.maxTokens,
    }),
  };
}
