// © 2026 LearnHubPlay BV. All rights reserved.
// Licensed under BUSL 1.1 — see LICENSE for details.
//
// packages/api/src/routes/distribute.ts
// POST   /v1/distribute          — main or local? Holds a local slot when it says local.
// DELETE /v1/distribute/:taskId  — give the slot back.

import type { FastifyPluginAsync } from "fastify";
import type { TaskDistribution, TaskDistributor } from "@tandem/core";

import { DistributeBodySchema, parseBody } from "../schemas.js";
import type { ReleaseResponse } from "../types.js";

interface DistributeRouteOptions {
    distributor: TaskDistributor;
}

const distributeRoute: FastifyPluginAsync<DistributeRouteOptions> = async (fastify, opts) => {
    fastify.post(
        "/v1/distribute",
        {
            schema: {
                summary: "Evaluate a task for local processing",
                description:
                    "Scores the task text and either grants a local slot or keeps the task on the " +
                    "main assistant. A granted slot stays held until released.",
                tags: ["Distribution"],
            },
        },
        async (request, reply) => {
            const { text, ...context } = parseBody(DistributeBodySchema, request.body);
            const distribution = opts.distributor.evaluateTask(text, context);
            return reply.send(distribution satisfies TaskDistribution);
        },
    );

    fastify.delete<{ Params: { taskId: string } }>(
        "/v1/distribute/:taskId",
        {
            schema: {
                summary: "Release a local slot",
                tags: ["Distribution"],
                params: {
                    type: "object",
                    required: ["taskId"],
                    properties: { taskId: { type: "string" } },
                },
            },
        },
        async (request, reply) => {
            const { taskId } = request.params;
            const released = opts.distributor.releaseTask(taskId);
            return reply.send({ taskId, released } satisfies ReleaseResponse);
        },
    );
};

export default distributeRoute;
