// © 2026 LearnHubPlay BV. All rights reserved.
// Licensed under BUSL 1.1 — see LICENSE for details.

import {
    BaseExecutor,
    MemoryCacheBackend,
    ResultCache,
    createLogger,
    createRuntime,
    parseConfig,
    type ConcreteExecutorType,
    type ExecutorOutput,
    type TandemRuntime,
    type TaskRequest,
} from "@tandem/core";

/** Executor that answers instantly with a canned result. */
export class StubExecutor extends BaseExecutor {
    readonly name: string;
    readonly tools: ReadonlySet<string>;
    healthy = true;
    failWith: Error | undefined;

    constructor(
        readonly kind: ConcreteExecutorType,
        tools: readonly string[],
    ) {
        super();
        this.name = kind;
        this.tools = new Set(tools);
    }

    async checkHealth(): Promise<boolean> {
        return this.healthy;
    }

    async execute(task: TaskRequest): Promise<ExecutorOutput> {
        if (this.failWith) throw this.failWith;
        return { result: { by: this.kind, taskId: task.id }, tokensUsed: 250, confidence: 0.9 };
    }
}

export interface TestRuntime {
    runtime: TandemRuntime;
    local: StubExecutor;
    hosted: StubExecutor;
}

export async function testRuntime(): Promise<TestRuntime> {
    const logger = createLogger({ level: "SILENT" });
    const config = parseConfig({
        distributor: { max_concurrent_local: 1 },
        logging: { level: "SILENT" },
    });
    const local = new StubExecutor("local", ["file_operations", "bash"]);
    const hosted = new StubExecutor("hosted", ["file_operations", "bash", "web_search"]);
    const runtime = await createRuntime(config, {
        logger,
        executors: { local, hosted },
        cache: new ResultCache({ backend: new MemoryCacheBackend(), logger }),
    });
    return { runtime, local, hosted };
}

export function taskBody(overrides: Record<string, unknown> = {}): Record<string, unknown> {
    return {
        id: "api-1",
        type: "file_search",
        description: "Find every config file in the repository",
        estimatedTokens: 1000,
        requiredTools: [],
        ...overrides,
    };
}
