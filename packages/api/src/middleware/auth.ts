// © 2026 LearnHubPlay BV. All rights reserved.
// Licensed under BUSL 1.1 — see LICENSE for details.
//
// packages/api/src/middleware/auth.ts
// Optional API key authentication for the Tandem REST API.
// If no API key is configured, all requests are allowed.

import { timingSafeEqual } from "crypto";
import type { FastifyPluginAsync, FastifyReply, FastifyRequest } from "fastify";
import fp from "fastify-plugin";

import type { ApiErrorBody } from "../types.js";

export interface AuthOptions {
    /** Required API key — if undefined, auth is disabled */
    apiKey?: string;
}

const PUBLIC_PATHS = ["/", "/v1/health"];

function isPublic(url: string): boolean {
    const path = url.split("?")[0] ?? url;
    return PUBLIC_PATHS.includes(path) || path === "/docs" || path.startsWith("/docs/");
}

function presentedKey(request: FastifyRequest): string | undefined {
    const authHeader = request.headers["authorization"];
    if (authHeader?.startsWith("Bearer ")) return authHeader.slice(7);
    const keyHeader = request.headers["x-api-key"];
    return typeof keyHeader === "string" ? keyHeader : undefined;
}

function keysMatch(presented: string, expected: string): boolean {
    const a = Buffer.from(presented);
    const b = Buffer.from(expected);
    return a.length === b.length && timingSafeEqual(a, b);
}

const authPlugin: FastifyPluginAsync<AuthOptions> = async (fastify, opts) => {
    const expected = opts.apiKey;
    if (!expected) return;

    fastify.addHook("onRequest", async (request: FastifyRequest, reply: FastifyReply) => {
        if (isPublic(request.url)) return;

        const token = presentedKey(request);
        if (token === undefined || !keysMatch(token, expected)) {
            const body: ApiErrorBody = {
                error: {
                    type: "authentication_error",
                    message: "Invalid API key. Pass your key via 'Authorization: Bearer <key>' or 'x-api-key: <key>'.",
                },
            };
            return reply.code(401).send(body);
        }
    });
};

export default fp(authPlugin, { name: "tandem-auth" });
