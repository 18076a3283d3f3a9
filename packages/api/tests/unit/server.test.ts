// © 2026 LearnHubPlay BV. All rights reserved.
// Licensed under BUSL 1.1 — see LICENSE for details.

import { afterEach, beforeEach, describe, expect, it } from "vitest";
import type { FastifyInstance } from "fastify";
import { VERSION } from "@tandem/core";

import { createServer } from "../../src/server.js";
import { type TestRuntime, taskBody, testRuntime } from "../helpers/runtime.js";

let ctx: TestRuntime;
let app: FastifyInstance;

async function start(apiKey?: string): Promise<void> {
    ctx = await testRuntime();
    ({ fastify: app } = await createServer({ runtime: ctx.runtime, swagger: false, apiKey }));
    await app.ready();
}

afterEach(async () => {
    await app.close();
});

describe("Tandem API", () => {
    beforeEach(async () => {
        await start();
    });

    describe("GET /v1/health", () => {
        it("reports both executors", async () => {
            const res = await app.inject({ method: "GET", url: "/v1/health" });
            expect(res.statusCode).toBe(200);
            const body = res.json();
            expect(body.status).toBe("ok");
            expect(body.version).toBe(VERSION);
            expect(body.executors.map((e: { executor: string }) => e.executor)).toEqual(["local", "hosted"]);
        });

        it("is degraded when nothing answers", async () => {
            ctx.local.healthy = false;
            ctx.hosted.healthy = false;
            const res = await app.inject({ method: "GET", url: "/v1/health" });
            expect(res.json().status).toBe("degraded");
        });
    });

    describe("POST /v1/delegate", () => {
        it("returns the decision without running the task", async () => {
            const res = await app.inject({ method: "POST", url: "/v1/delegate", payload: { task: taskBody() } });
            expect(res.statusCode).toBe(200);
            const body = res.json();
            expect(body.taskId).toBe("api-1");
            expect(body.decision).toMatchObject({
                executor: "local",
                reason: "mechanical work runs locally",
                complexity: "MECHANICAL",
                factor: "complexity",
            });
            expect(ctx.runtime.engine.getDelegationStats().totalTasks).toBe(0);
        });

        it("rejects a malformed task with 400", async () => {
            const { description: _omit, ...rest } = taskBody();
            const res = await app.inject({ method: "POST", url: "/v1/delegate", payload: { task: rest } });
            expect(res.statusCode).toBe(400);
            expect(res.json()).toEqual({
                error: { type: "invalid_request", message: "Invalid request body: task.description: Required" },
            });
        });

        it("reports an impossible force as 400 with the task id", async () => {
            const res = await app.inject({
                method: "POST",
                url: "/v1/delegate",
                payload: { task: taskBody({ requiredTools: ["web_search"] }), force: "local" },
            });
            expect(res.statusCode).toBe(400);
            expect(res.json()).toEqual({
                error: {
                    type: "invalid_request",
                    message: "cannot force local: it lacks required tools web_search",
                    taskId: "api-1",
                },
            });
        });

        it("rejects malformed JSON", async () => {
            const res = await app.inject({
                method: "POST",
                url: "/v1/delegate",
                headers: { "content-type": "application/json" },
                payload: "{not json",
            });
            expect(res.statusCode).toBe(400);
            expect(res.json().error.type).toBe("invalid_request");
        });
    });

    describe("POST /v1/execute", () => {
        it("runs mechanical work locally", async () => {
            const res = await app.inject({ method: "POST", url: "/v1/execute", payload: { task: taskBody() } });
            expect(res.statusCode).toBe(200);
            const { decision, response } = res.json();
            expect(decision.executor).toBe("local");
            expect(response).toMatchObject({
                taskId: "api-1",
                executor: "local",
                result: { by: "local", taskId: "api-1" },
                tokensUsed: 250,
                errors: [],
            });
        });

        it("falls back to hosted when local is down", async () => {
            ctx.local.healthy = false;
            const res = await app.inject({ method: "POST", url: "/v1/execute", payload: { task: taskBody() } });
            const { response } = res.json();
            expect(response.executor).toBe("hosted");
            expect(response.metadata.fallback).toEqual({
                from: "local",
                to: "hosted",
                reason: "local executor unavailable: health check failed",
            });
        });

        it("returns executor failures in the body with status 200", async () => {
            ctx.hosted.failWith = new Error("upstream exploded");
            const res = await app.inject({
                method: "POST",
                url: "/v1/execute",
                payload: { task: taskBody({ type: "code_generation", description: "Write a parser" }) },
            });
            expect(res.statusCode).toBe(200);
            const { decision, response } = res.json();
            expect(decision.executor).toBe("hosted");
            expect(response.errors).toEqual(["upstream exploded"]);
            expect(response.result).toBeNull();
        });
    });

    describe("distribution", () => {
        it("grants a slot, refuses at capacity and releases", async () => {
            const first = await app.inject({
                method: "POST",
                url: "/v1/distribute",
                payload: { text: "Update the README", taskId: "d1" },
            });
            expect(first.json()).toMatchObject({
                taskId: "d1",
                sendToLocal: true,
                assignedProcessor: "local",
                priority: 0.2,
                estimatedTokens: 6,
                reason: "low importance (0.20) and local capacity available (1/1)",
            });

            const second = await app.inject({
                method: "POST",
                url: "/v1/distribute",
                payload: { text: "Reformat the changelog", taskId: "d2" },
            });
            expect(second.json()).toMatchObject({ sendToLocal: false, reason: "local task slots full (1/1)" });

            const released = await app.inject({ method: "DELETE", url: "/v1/distribute/d1" });
            expect(released.json()).toEqual({ taskId: "d1", released: true });
            const again = await app.inject({ method: "DELETE", url: "/v1/distribute/d1" });
            expect(again.json()).toEqual({ taskId: "d1", released: false });
        });

        it("rejects empty text with 400", async () => {
            const res = await app.inject({ method: "POST", url: "/v1/distribute", payload: { text: "   " } });
            expect(res.statusCode).toBe(400);
            expect(res.json().error.message).toBe("task text must be non-empty");
        });
    });

    describe("stats", () => {
        it("counts executions and resets", async () => {
            await app.inject({ method: "POST", url: "/v1/execute", payload: { task: taskBody() } });

            const stats = (await app.inject({ method: "GET", url: "/v1/stats" })).json();
            expect(stats.delegation.totalTasks).toBe(1);
            expect(stats.delegation.byExecutor.local).toBe(1);
            expect(stats.delegation.tokens.local).toBe(250);
            expect(stats.history).toHaveLength(1);
            expect(stats.distributor.localSlots).toBe("0/1");

            const reset = await app.inject({ method: "POST", url: "/v1/stats/reset" });
            expect(reset.statusCode).toBe(204);
            const after = (await app.inject({ method: "GET", url: "/v1/stats" })).json();
            expect(after.delegation.totalTasks).toBe(0);
            expect(after.history).toEqual([]);
        });
    });

    describe("cache", () => {
        it("reports and clears", async () => {
            ctx.runtime.cache.set("search", { q: "pino" }, { hits: 1 });

            const stats = (await app.inject({ method: "GET", url: "/v1/cache/stats" })).json();
            expect(stats).toMatchObject({ totalEntries: 1, activeEntries: 1, byType: { search: 1 }, ttlHours: 24 });

            const cleared = await app.inject({ method: "POST", url: "/v1/cache/clear-expired" });
            expect(cleared.json()).toEqual({ removed: 0 });
        });
    });

    it("answers unknown routes with a typed 404", async () => {
        const res = await app.inject({ method: "GET", url: "/v1/nope" });
        expect(res.statusCode).toBe(404);
        expect(res.json().error.type).toBe("not_found");
    });

    it("allows localhost origins", async () => {
        const res = await app.inject({
            method: "GET",
            url: "/v1/health",
            headers: { origin: "http://localhost:5173" },
        });
        expect(res.headers["access-control-allow-origin"]).toBe("http://localhost:5173");
    });
});

describe("Tandem API with an API key", () => {
    beforeEach(async () => {
        await start("test-secret");
    });

    it("rejects requests without the key", async () => {
        const res = await app.inject({ method: "GET", url: "/v1/stats" });
        expect(res.statusCode).toBe(401);
        expect(res.json().error.type).toBe("authentication_error");
    });

    it("accepts a bearer token or x-api-key", async () => {
        const bearer = await app.inject({
            method: "GET",
            url: "/v1/stats",
            headers: { authorization: "Bearer test-secret" },
        });
        expect(bearer.statusCode).toBe(200);

        const header = await app.inject({ method: "GET", url: "/v1/stats", headers: { "x-api-key": "test-secret" } });
        expect(header.statusCode).toBe(200);
    });

    it("rejects a wrong key", async () => {
        const res = await app.inject({ method: "GET", url: "/v1/stats", headers: { "x-api-key": "wrong" } });
        expect(res.statusCode).toBe(401);
    });

    it("keeps health public", async () => {
        const res = await app.inject({ method: "GET", url: "/v1/health" });
        expect(res.statusCode).toBe(200);
    });
});
