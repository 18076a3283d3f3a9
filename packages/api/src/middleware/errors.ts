// © 2026 LearnHubPlay BV. All rights reserved.
// Licensed under BUSL 1.1 — see LICENSE for details.
//
// packages/api/src/middleware/errors.ts
// Maps Tandem errors onto HTTP status codes with a typed error body.

import type { FastifyError, FastifyPluginAsync } from "fastify";
import fp from "fastify-plugin";
import { ConfigurationError, ExecutorError, InvalidTaskError } from "@tandem/core";

import type { ApiErrorBody, ApiErrorType } from "../types.js";

interface Mapped {
    status: number;
    type: ApiErrorType;
}

function mapError(error: FastifyError): Mapped {
    if (error instanceof InvalidTaskError) return { status: 400, type: "invalid_request" };
    if (error instanceof ConfigurationError) return { status: 500, type: "configuration_error" };
    if (error instanceof ExecutorError) return { status: 502, type: "executor_error" };
    // Fastify's own errors (malformed JSON, wrong content type) carry a status.
    if (error.statusCode !== undefined && error.statusCode < 500) {
        return { status: error.statusCode, type: "invalid_request" };
    }
    return { status: 500, type: "internal_error" };
}

const errorPlugin: FastifyPluginAsync = async (fastify) => {
    fastify.setErrorHandler((error, request, reply) => {
        const { status, type } = mapError(error);
        if (status >= 500) {
            request.log.error({ err: error }, "request failed");
        } else {
            request.log.debug({ err: error.message }, "request rejected");
        }

        const body: ApiErrorBody = { error: { type, message: error.message } };
        // FastifyError is structurally assignable to InvalidTaskError, so narrow from Error.
        const cause: Error = error;
        if (cause instanceof InvalidTaskError && cause.taskId !== undefined) {
            body.error.taskId = cause.taskId;
        }
        return reply.code(status).send(body);
    });

    fastify.setNotFoundHandler((request, reply) => {
        const body: ApiErrorBody = {
            error: { type: "not_found", message: `Route ${request.method} ${request.url} not found` },
        };
        return reply.code(404).send(body);
    });
};

export default fp(errorPlugin, { name: "tandem-errors" });
