// © 2026 LearnHubPlay BV. All rights reserved.
// Licensed under BUSL 1.1 — see LICENSE for details.
//
// packages/api/src/routes/stats.ts
// GET  /v1/stats       — delegation counters, context pressure, distributor slots
// POST /v1/stats/reset — zero the delegation counters and context usage

import type { FastifyPluginAsync } from "fastify";
import type { DelegationEngine, TaskDistributor } from "@tandem/core";

import type { StatsResponse } from "../types.js";

interface StatsRouteOptions {
    engine: DelegationEngine;
    distributor: TaskDistributor;
}

const statsRoute: FastifyPluginAsync<StatsRouteOptions> = async (fastify, opts) => {
    fastify.get(
        "/v1/stats",
        {
            schema: {
                summary: "Delegation statistics",
                tags: ["Metrics"],
            },
        },
        async (_request, reply) => {
            return reply.send({
                delegation: opts.engine.getDelegationStats(),
                distributor: opts.distributor.getStatus(),
                history: opts.engine.getHistory(),
            } satisfies StatsResponse);
        },
    );

    fastify.post(
        "/v1/stats/reset",
        {
            schema: {
                summary: "Reset delegation statistics",
                description: "Held distributor slots are not affected.",
                tags: ["Metrics"],
            },
        },
        async (_request, reply) => {
            opts.engine.resetStats();
            return reply.code(204).send();
        },
    );
};

export default statsRoute;
