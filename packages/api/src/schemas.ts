// © 2026 LearnHubPlay BV. All rights reserved.
// Licensed under BUSL 1.1 — see LICENSE for details.
//
// packages/api/src/schemas.ts
// Zod schemas for request bodies. A body that fails to parse becomes an InvalidTaskError (400).

import { z } from "zod";
import { ComplexityClass, InvalidTaskError, MAX_TIMER_MS } from "@tandem/core";

export const TaskSchema = z.object({
    id: z.string().trim().min(1),
    type: z.string().trim().min(1),
    description: z.string().trim().min(1),
    estimatedTokens: z.number().int().nonnegative(),
    requiredTools: z.array(z.string().trim().min(1)).default([]),
    complexity: z.nativeEnum(ComplexityClass).optional(),
    priority: z.enum(["low", "normal", "high"]).optional(),
    context: z.record(z.unknown()).optional(),
});

const ForceSchema = z.enum(["local", "hosted"]).optional();

export const DelegateBodySchema = z.object({
    task: TaskSchema,
    force: ForceSchema,
});

export const ExecuteBodySchema = z.object({
    task: TaskSchema,
    force: ForceSchema,
    timeoutMs: z.number().int().positive().max(MAX_TIMER_MS).optional(),
});

export const DistributeBodySchema = z.object({
    text: z.string(),
    taskId: z.string().trim().min(1).optional(),
    urgent: z.boolean().optional(),
    userRequested: z.boolean().optional(),
    automated: z.boolean().optional(),
});

export type DelegateBody = z.infer<typeof DelegateBodySchema>;
export type ExecuteBody = z.infer<typeof ExecuteBodySchema>;
export type DistributeBody = z.infer<typeof DistributeBodySchema>;

/** Parse `body` or throw an InvalidTaskError naming every failing path. */
export function parseBody<T>(schema: z.ZodType<T, z.ZodTypeDef, unknown>, body: unknown): T {
    const parsed = schema.safeParse(body);
    if (!parsed.success) {
        const detail = parsed.error.issues
            .map((issue) => `${issue.path.join(".") || "body"}: ${issue.message}`)
            .join("; ");
        throw new InvalidTaskError(`Invalid request body: ${detail}`);
    }
    return parsed.data;
}
