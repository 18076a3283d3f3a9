// © 2026 LearnHubPlay BV. All rights reserved.
// Licensed under BUSL 1.1 — see LICENSE for details.

/**
 * LocalExecutor — locally-run model behind an OpenAI-compatible HTTP API
 * (LM Studio, Ollama's /v1 shim, llama.cpp server, vLLM).
 * Optional bearer key from LOCAL_LLM_API_KEY.
 */

import { z } from "zod";

import { ExecutorError, ExecutorUnavailableError } from "../exceptions.js";
import type { TaskRequest } from "../types.js";
import { envVar } from "../utils/security.js";
import { BaseExecutor, type ExecuteOptions, type ExecutorOutput } from "./base.js";
import { SYSTEM_PROMPT, estimateConfidence, formatTaskPrompt } from "./prompt.js";

export interface LocalExecutorOptions {
  baseUrl: string;
  model: string;
  tools: readonly string[];
  temperature?: number;
  maxTokens?: number;
  apiKey?: string;
  /** Injected for tests; defaults to global fetch. */
  fetch?: typeof fetch;
}

const ToolCallSchema = z.object({
  id: z.string().optional(),
  function: z.object({
    name: z.string(),
    arguments: z.string().default("{}"),
  }),
});

const ChatCompletionSchema = z.object({
  choices: z
    .array(
      z.object({
        message: z.object({
          content: z.string().nullable().default(""),
          tool_calls: z.array(ToolCallSchema).optional(),
        }),
      }),
    )
    .default([]),
  usage: z.object({ total_tokens: z.number().int().nonnegative() }).optional(),
});

export interface LocalToolCall {
  id?: string;
  function: string;
  arguments: unknown;
}

export interface LocalResult {
  content: string;
  toolCalls: LocalToolCall[];
}

function parseArguments(raw: string): unknown {
  try {
    return JSON.parse(raw);
  } catch {
    return raw;
  }
}

export class LocalExecutor extends BaseExecutor {
  readonly name: string;
  readonly kind = "local" as const;
  readonly tools: ReadonlySet<string>;
  private readonly baseUrl: string;
  private readonly model: string;
  private readonly temperature: number;
  private readonly maxTokens: number;
  private readonly apiKey: string | undefined;
  private readonly fetchImpl: typeof fetch;
  private readonly inFlight = new Set<AbortController>();

  constructor(options: LocalExecutorOptions) {
    super();
    this.baseUrl = options.baseUrl.endsWith("/") ? options.baseUrl.slice(0, -1) : options.baseUrl;
    this.model = options.model;
    this.tools = new Set(options.tools);
    this.temperature = options.temperature ?? 0.3;
    this.maxTokens = options.maxTokens ?? 4096;
    this.apiKey = options.apiKey ?? envVar("LOCAL_LLM_API_KEY");
    this.fetchImpl = options.fetch ?? fetch;
    let host: string;
    try {
      host = new URL(this.baseUrl).host;
    } catch {
      host = "unknown-host";
    }
    this.name = `local[${this.model}@${host}]`;
  }

  private headers(): Record<string, string> {
    const headers: Record<string, string> = { "Content-Type": "application/json" };
    if (this.apiKey) headers["Authorization"] = `Bearer ${this.apiKey}`;
    return headers;
  }

  async checkHealth(signal?: AbortSignal): Promise<boolean> {
    try {
      const resp = await this.fetchImpl(`${this.baseUrl}/models`, {
        headers: this.headers(),
        signal: signal ?? AbortSignal.timeout(3000),
      });
      return resp.ok;
    } catch {
      return false;
    }
  }

  async execute(task: TaskRequest, options: ExecuteOptions = {}): Promise<ExecutorOutput> {
    const controller = new AbortController();
    const onAbort = (): void => controller.abort(options.signal?.reason);
    if (options.signal?.aborted) controller.abort(options.signal.reason);
    else options.signal?.addEventListener("abort", onAbort, { once: true });
    this.inFlight.add(controller);

    try {
      let resp: Response;
      try {
        resp = await this.fetchImpl(`${this.baseUrl}/chat/completions`, {
          method: "POST",
          headers: this.headers(),
          body: JSON.stringify({
            model: this.model,
            messages: [
              { role: "system", content: SYSTEM_PROMPT },
              { role: "user", content: formatTaskPrompt(task) },
            ],
            temperature: this.temperature,
            max_tokens: this.maxTokens,
          }),
          signal: controller.signal,
        });
      } catch (err) {
        throw new ExecutorUnavailableError(this.kind, String(err));
      }

      if (!resp.ok) {
        const text = await resp.text();
        throw new ExecutorError(`API error: ${resp.status} - ${text}`, this.kind);
      }

      const parsed = ChatCompletionSchema.safeParse(await resp.json());
      if (!parsed.success) {
        throw new ExecutorError(`Malformed completion: ${parsed.error.message}`, this.kind);
      }

      const message = parsed.data.choices[0]?.message;
      if (!message) {
        throw new ExecutorError("No response generated", this.kind);
      }

      const result: LocalResult = {
        content: message.content ?? "",
        toolCalls: (message.tool_calls ?? []).map((call) => ({
          id: call.id,
          function: call.function.name,
          arguments: parseArguments(call.function.arguments),
        })),
      };

      return {
        result,
        tokensUsed: parsed.data.usage?.total_tokens ?? 0,
        confidence: estimateConfidence(options.complexity, result.content, result.toolCalls.length),
      };
    } finally {
      this.inFlight.delete(controller);
      options.signal?.removeEventListener("abort", onAbort);
    }
  }

  /** Abort every request still in flight. */
  async cleanup(): Promise<void> {
    for (const controller of this.inFlight) controller.abort(new Error("executor cleanup"));
    this.inFlight.clear();
  }
}
