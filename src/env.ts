/**
 * Centralized environment configuration.
 *
 * This is the ONLY place in the codebase that reads `process.env`.
 * Every other module imports the constants it needs from here.
 *
 * Copy `.env.example` to `.env` and adjust the values for your setup.
 */

import * as dotenv from "dotenv";

// Load .env file as early as possible so all subsequent reads see the values.
dotenv.config();

// ── Graph engine connection ───────────────────────────────────────────────────

/**
 * Bolt endpoint of the graph engine.
 * Env: NEO4J_URI
 * Default: undefined (callers must supply a URI through StoreOptions)
 */
export const NEO4J_URI: string | undefined = process.env.NEO4J_URI || undefined;

/**
 * Basic-auth principal. When unset the driver connects without credentials.
 * Env: NEO4J_USERNAME
 */
export const NEO4J_USERNAME: string | undefined =
  process.env.NEO4J_USERNAME || undefined;

/**
 * Env: NEO4J_PASSWORD
 */
export const NEO4J_PASSWORD: string = process.env.NEO4J_PASSWORD || "";

/**
 * Target database. Undefined lets the server pick its default database.
 * Env: NEO4J_DATABASE
 */
export const NEO4J_DATABASE: string | undefined =
  process.env.NEO4J_DATABASE || undefined;

// ── Driver pool tuning ────────────────────────────────────────────────────────

/**
 * Maximum number of pooled Bolt connections.
 * Env: GRAPH_IDENTITY_MAX_POOL_SIZE
 * Default: 50
 */
export const GRAPH_IDENTITY_MAX_POOL_SIZE: number = parseInt(
  process.env.GRAPH_IDENTITY_MAX_POOL_SIZE || "50",
  10,
);

/**
 * Milliseconds to wait for a pooled connection before failing.
 * Env: GRAPH_IDENTITY_CONNECTION_TIMEOUT_MS
 * Default: 10000
 */
export const GRAPH_IDENTITY_CONNECTION_TIMEOUT_MS: number = parseInt(
  process.env.GRAPH_IDENTITY_CONNECTION_TIMEOUT_MS || "10000",
  10,
);

/**
 * Idle time after which a pooled connection is pinged before reuse.
 * Env: GRAPH_IDENTITY_LIVENESS_TIMEOUT_MS
 * Default: 30000
 */
export const GRAPH_IDENTITY_LIVENESS_TIMEOUT_MS: number = parseInt(
  process.env.GRAPH_IDENTITY_LIVENESS_TIMEOUT_MS || "30000",
  10,
);

// ── Logging ───────────────────────────────────────────────────────────────────

/**
 * Minimum log level: debug | info | warn | error.
 * Env: GRAPH_IDENTITY_LOG_LEVEL
 * Default: "info"
 */
export const GRAPH_IDENTITY_LOG_LEVEL: string = (
  process.env.GRAPH_IDENTITY_LOG_LEVEL || "info"
).toLowerCase();
