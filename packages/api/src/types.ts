// © 2026 LearnHubPlay BV. All rights reserved.
// Licensed under BUSL 1.1 — see LICENSE for details.
//
// packages/api/src/types.ts
// Request and response shapes for the Tandem REST API.

import type {
    AvailabilityStatus,
    Decision,
    DelegationRecord,
    DistributorStatus,
    ExecutionStats,
    TandemRuntime,
} from "@tandem/core";

// ── Errors ───────────────────────────────────────────────────────────────────

export type ApiErrorType =
    | "invalid_request"
    | "authentication_error"
    | "configuration_error"
    | "executor_error"
    | "not_found"
    | "internal_error";

export interface ApiErrorBody {
    error: {
        type: ApiErrorType;
        message: string;
        taskId?: string;
    };
}

// ── Delegation ───────────────────────────────────────────────────────────────

export interface DelegateResponse {
    taskId: string;
    decision: Decision;
}

// ── Distribution ─────────────────────────────────────────────────────────────

export interface ReleaseResponse {
    taskId: string;
    released: boolean;
}

// ── Stats ────────────────────────────────────────────────────────────────────

export interface StatsResponse {
    delegation: ExecutionStats;
    distributor: DistributorStatus;
    history: DelegationRecord[];
}

// ── Health ───────────────────────────────────────────────────────────────────

export interface HealthResponse {
    status: "ok" | "degraded";
    version: string;
    uptime: number;
    executors: AvailabilityStatus[];
}

// ── Server options ────────────────────────────────────────────────────────────

export interface ApiServerOptions {
    runtime: TandemRuntime;
    port?: number;
    host?: string;
    /** API key for authentication (optional — if not set, no auth required) */
    apiKey?: string;
    /** Enable Swagger UI at /docs */
    swagger?: boolean;
}
