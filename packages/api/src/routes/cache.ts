// © 2026 LearnHubPlay BV. All rights reserved.
// Licensed under BUSL 1.1 — see LICENSE for details.
//
// packages/api/src/routes/cache.ts
// GET  /v1/cache/stats         — entry counts, size, hit rate
// POST /v1/cache/clear-expired — drop entries past their TTL

import type { FastifyPluginAsync } from "fastify";
import type { CacheStats, ResultCache } from "@tandem/core";

interface CacheRouteOptions {
    cache: ResultCache;
}

const cacheRoute: FastifyPluginAsync<CacheRouteOptions> = async (fastify, opts) => {
    fastify.get(
        "/v1/cache/stats",
        { schema: { summary: "Result cache statistics", tags: ["Cache"] } },
        async (_request, reply) => reply.send(opts.cache.getStats() satisfies CacheStats),
    );

    fastify.post(
        "/v1/cache/clear-expired",
        { schema: { summary: "Remove expired cache entries", tags: ["Cache"] } },
        async (_request, reply) => reply.send({ removed: opts.cache.clearExpired() }),
    );
};

export default cacheRoute;
