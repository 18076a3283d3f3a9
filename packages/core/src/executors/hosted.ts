// © 2026 LearnHubPlay BV. All rights reserved.
// Licensed under BUSL 1.1 — see LICENSE for details.

/**
 * HostedExecutor — the hosted assistant via the Anthropic Messages API.
 * Requires ANTHROPIC_API_KEY unless an apiKey or client is passed in.
 */

import Anthropic from "@anthropic-ai/sdk";

import { ExecutorUnavailableError } from "../exceptions.js";
import type { TaskRequest } from "../types.js";
import { envVar, requireEnvVar } from "../utils/security.js";
import { BaseExecutor, type ExecuteOptions, type ExecutorOutput } from "./base.js";
import { SYSTEM_PROMPT, estimateConfidence, formatTaskPrompt } from "./prompt.js";

export interface HostedExecutorOptions {
  model: string;
  tools: readonly string[];
  maxTokens?: number;
  apiKey?: string;
  client?: Anthropic;
}

export interface HostedResult {
  content: string;
  model: string;
  stopReason: string | null;
}

export class HostedExecutor extends BaseExecutor {
  readonly name = "hosted";
  readonly kind = "hosted" as const;
  readonly tools: ReadonlySet<string>;
  private readonly model: string;
  private readonly maxTokens: number;
  private readonly apiKey: string | undefined;
  private clientInstance: Anthropic | undefined;

  constructor(options: HostedExecutorOptions) {
    super();
    this.model = options.model;
    this.tools = new Set(options.tools);
    this.maxTokens = options.maxTokens ?? 4096;
    this.apiKey = options.apiKey;
    this.clientInstance = options.client;
  }

  /** Created on first use so that decision-only callers need no key. */
  private get client(): Anthropic {
    this.clientInstance ??= new Anthropic({
      apiKey: this.apiKey ?? requireEnvVar("ANTHROPIC_API_KEY"),
    });
    return this.clientInstance;
  }

  private get configured(): boolean {
    return this.clientInstance !== undefined || this.apiKey !== undefined || envVar("ANTHROPIC_API_KEY") !== undefined;
  }

  async checkHealth(signal?: AbortSignal): Promise<boolean> {
    if (!this.configured) return false;
    try {
      await this.client.models.list({ limit: 1 }, { signal });
      return true;
    } catch {
      return false;
    }
  }

  async execute(task: TaskRequest, options: ExecuteOptions = {}): Promise<ExecutorOutput> {
    try {
      const response = await this.client.messages.create(
        {
          model: this.model,
          max_tokens: this.maxTokens,
          system: SYSTEM_PROMPT,
          messages: [{ role: "user", content: formatTaskPrompt(task) }],
        },
        { signal: options.signal },
      );

      const content = response.content
        .map((block) => (block.type === "text" ? block.text : ""))
        .join("");
      const toolCalls = response.content.filter((block) => block.type === "tool_use").length;

      const result: HostedResult = { content, model: response.model, stopReason: response.stop_reason };
      return {
        result,
        tokensUsed: response.usage.input_tokens + response.usage.output_tokens,
        confidence: estimateConfidence(options.complexity, content, toolCalls),
      };
    } catch (err) {
      throw new ExecutorUnavailableError(this.kind, String(err));
    }
  }
}
