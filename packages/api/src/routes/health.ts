// © 2026 LearnHubPlay BV. All rights reserved.
// Licensed under BUSL 1.1 — see LICENSE for details.
//
// packages/api/src/routes/health.ts
// GET /v1/health — executor availability check

import type { FastifyPluginAsync } from "fastify";
import { VERSION, type DelegationEngine } from "@tandem/core";

import type { HealthResponse } from "../types.js";

const startedAt = Date.now();

interface HealthRouteOptions {
    engine: DelegationEngine;
}

const healthRoute: FastifyPluginAsync<HealthRouteOptions> = async (fastify, opts) => {
    fastify.get(
        "/v1/health",
        {
            schema: {
                summary: "Executor health check",
                description: "Probes the local and hosted executors. Always public.",
                tags: ["System"],
            },
        },
        async (_request, reply) => {
            const executors = await opts.engine.checkHealth();
            return reply.send({
                status: executors.some((e) => e.available) ? "ok" : "degraded",
                version: VERSION,
                uptime: Math.floor((Date.now() - startedAt) / 1000),
                executors,
            } satisfies HealthResponse);
        },
    );
};

export default healthRoute;
