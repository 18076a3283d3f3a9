// © 2026 LearnHubPlay BV. All rights reserved.
// Licensed under BUSL 1.1 — see LICENSE for details.

export { createServer, startServer, DEFAULT_HOST, DEFAULT_PORT, type ApiServer } from "./server.js";
export { TaskSchema, DelegateBodySchema, ExecuteBodySchema, DistributeBodySchema, parseBody } from "./schemas.js";
export type * from "./types.js";
