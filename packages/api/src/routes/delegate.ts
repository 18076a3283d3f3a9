// © 2026 LearnHubPlay BV. All rights reserved.
// Licensed under BUSL 1.1 — see LICENSE for details.
//
// packages/api/src/routes/delegate.ts
// POST /v1/delegate — explain where a task would run (no execution).
// POST /v1/execute  — decide and run; failures come back inside the response, not as HTTP errors.

import type { FastifyPluginAsync } from "fastify";
import type { DelegationEngine, ExecutionResult } from "@tandem/core";

import { DelegateBodySchema, ExecuteBodySchema, parseBody } from "../schemas.js";
import type { DelegateResponse } from "../types.js";

interface DelegateRouteOptions {
    engine: DelegationEngine;
}

const delegateRoute: FastifyPluginAsync<DelegateRouteOptions> = async (fastify, opts) => {
    fastify.post(
        "/v1/delegate",
        {
            schema: {
                summary: "Explain delegation decision",
                description:
                    "Returns the executor (local, hosted or hybrid), reason, confidence and " +
                    "complexity class for a task. Does NOT execute it.",
                tags: ["Delegation"],
            },
        },
        async (request, reply) => {
            const { task, force } = parseBody(DelegateBodySchema, request.body);
            const decision = opts.engine.decideDelegation(task, { force });
            return reply.send({ taskId: task.id, decision } satisfies DelegateResponse);
        },
    );

    fastify.post(
        "/v1/execute",
        {
            schema: {
                summary: "Execute a task",
                description:
                    "Decides where the task runs and runs it. Executor failures are reported " +
                    "in response.errors with status 200.",
                tags: ["Delegation"],
            },
        },
        async (request, reply) => {
            const { task, force, timeoutMs } = parseBody(ExecuteBodySchema, request.body);
            const result = await opts.engine.executeTask(task, undefined, { force, timeoutMs });
            return reply.send(result satisfies ExecutionResult);
        },
    );
};

export default delegateRoute;
