// © 2026 LearnHubPlay BV. All rights reserved.
// Licensed under BUSL 1.1 — see LICENSE for details.
//
// packages/api/src/server.ts
// The Tandem REST API server at localhost:4242.
//
// Endpoints:
//   POST   /v1/delegate               ← explain delegation decision (no execution)
//   POST   /v1/execute                ← decide and run a task
//   POST   /v1/distribute             ← main vs local evaluation
//   DELETE /v1/distribute/:taskId     ← release a local slot
//   GET    /v1/stats                  ← delegation counters + distributor status
//   POST   /v1/stats/reset
//   GET    /v1/cache/stats
//   POST   /v1/cache/clear-expired
//   GET    /v1/health                 ← executor availability
//   GET    /docs                      ← Swagger UI (if enabled)

import Fastify, { type FastifyBaseLogger, type FastifyInstance } from "fastify";
import cors from "@fastify/cors";
import swagger from "@fastify/swagger";
import swaggerUi from "@fastify/swagger-ui";
import { VERSION } from "@tandem/core";

import type { ApiServerOptions } from "./types.js";
import authPlugin from "./middleware/auth.js";
import errorPlugin from "./middleware/errors.js";
import cacheRoute from "./routes/cache.js";
import delegateRoute from "./routes/delegate.js";
import distributeRoute from "./routes/distribute.js";
import healthRoute from "./routes/health.js";
import statsRoute from "./routes/stats.js";

export const DEFAULT_PORT = 4242;
export const DEFAULT_HOST = "127.0.0.1";

const LOCAL_ORIGIN = /^https?:\/\/(localhost|127\.0\.0\.1)(:\d+)?$/;

export interface ApiServer {
    fastify: FastifyInstance;
    port: number;
    host: string;
}

export async function createServer(opts: ApiServerOptions): Promise<ApiServer> {
    const { runtime, port = DEFAULT_PORT, host = DEFAULT_HOST, apiKey, swagger: enableSwagger = true } = opts;

    const logger: FastifyBaseLogger = runtime.logger.child({ component: "api" });
    const fastify = Fastify({ logger });

    await fastify.register(errorPlugin);

    // ── CORS (local apps only) ──────────────────────────────────────────────────
    await fastify.register(cors, {
        origin: (origin, cb) => {
            // No origin: curl and other non-browser clients.
            if (!origin || LOCAL_ORIGIN.test(origin)) {
                cb(null, true);
            } else {
                cb(new Error("CORS: origin not allowed"), false);
            }
        },
        methods: ["GET", "POST", "DELETE", "OPTIONS"],
    });

    // ── Swagger / OpenAPI docs ──────────────────────────────────────────────────
    if (enableSwagger) {
        await fastify.register(swagger, {
            openapi: {
                openapi: "3.0.0",
                info: {
                    title: "Tandem REST API",
                    description:
                        "Delegation between a local model and a hosted assistant, " +
                        "plus main-vs-local task distribution and a result cache.",
                    version: VERSION,
                    license: { name: "BUSL 1.1" },
                },
                servers: [{ url: `http://${host}:${port}`, description: "Tandem local server" }],
                tags: [
                    { name: "Delegation", description: "Delegation decisions and execution" },
                    { name: "Distribution", description: "Local slot allocation" },
                    { name: "Metrics", description: "Delegation statistics" },
                    { name: "Cache", description: "Result cache maintenance" },
                    { name: "System", description: "Health and status" },
                ],
            },
        });

        await fastify.register(swaggerUi, {
            routePrefix: "/docs",
            uiConfig: { docExpansion: "list" },
        });

        fastify.get("/", { schema: { hide: true } }, async (_req, reply) => {
            return reply.redirect("/docs");
        });
    }

    // ── Authentication (optional) ────────────────────────────────────────────────
    await fastify.register(authPlugin, { apiKey });

    // ── Routes ───────────────────────────────────────────────────────────────────
    await fastify.register(healthRoute, { engine: runtime.engine });
    await fastify.register(delegateRoute, { engine: runtime.engine });
    await fastify.register(distributeRoute, { distributor: runtime.distributor });
    await fastify.register(statsRoute, { engine: runtime.engine, distributor: runtime.distributor });
    await fastify.register(cacheRoute, { cache: runtime.cache });

    fastify.addHook("onClose", async () => {
        await runtime.close();
    });

    return { fastify, port, host };
}

/** Listen until the process is told to stop, then close the runtime with the server. */
export async function startServer(opts: ApiServerOptions): Promise<ApiServer> {
    const server = await createServer(opts);
    const { fastify, port, host } = server;

    await fastify.listen({ port, host });
    fastify.log.info({ url: `http://${host}:${port}/v1`, docs: `http://${host}:${port}/docs` }, "Tandem API listening");

    const shutdown = (): void => {
        fastify.close().then(
            () => process.exit(0),
            (err: unknown) => {
                fastify.log.error({ err }, "shutdown failed");
                process.exit(1);
            },
        );
    };
    process.once("SIGINT", shutdown);
    process.once("SIGTERM", shutdown);

    return server;
}
