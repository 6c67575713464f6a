/**
 * Store options: where the graph engine lives and how to reach it.
 *
 * Options are an explicit value handed to `GraphDriverProvider`; nothing here
 * holds a connection.
 */

import * as z from "zod";
import * as env from "./env.js";
import { PreconditionError } from "./errors.js";

export const StoreOptionsSchema = z.object({
  /** Bolt endpoint, e.g. `bolt://localhost:7687` or `neo4j+s://host`. */
  uri: z.string().trim().min(1, "uri is required"),
  /** Basic credentials; omit to connect without authentication. */
  auth: z
    .object({
      username: z.string().min(1, "auth.username is required"),
      password: z.string(),
    })
    .optional(),
  /** Target database; omitted means the server default. */
  database: z.string().min(1).optional(),
  driver: z
    .object({
      maxConnectionPoolSize: z.number().int().positive().optional(),
      connectionAcquisitionTimeout: z.number().int().positive().optional(),
      connectionLivenessCheckTimeout: z.number().int().nonnegative().optional(),
    })
    .default({}),
});

/** Options as callers write them. */
export type StoreOptionsInput = z.input<typeof StoreOptionsSchema>;

/** Options after validation and defaults. */
export type StoreOptions = z.output<typeof StoreOptionsSchema>;

/**
 * Validate caller-supplied options.
 * @throws PreconditionError listing every invalid option
 */
export function parseStoreOptions(input: unknown): StoreOptions {
  const parsed = StoreOptionsSchema.safeParse(input);
  if (!parsed.success) {
    const problems = parsed.error.issues.map(
      (issue) => `${issue.path.join(".") || "options"}: ${issue.message}`,
    );
    throw new PreconditionError(`Invalid store options: ${problems.join("; ")}`, {
      problems,
    });
  }
  return parsed.data;
}

/**
 * Build options from `NEO4J_*` and `GRAPH_IDENTITY_*` environment variables.
 * @throws PreconditionError when NEO4J_URI is missing
 */
export function loadStoreOptionsFromEnv(): StoreOptions {
  return parseStoreOptions({
    uri: env.NEO4J_URI ?? "",
    auth:
      env.NEO4J_USERNAME === undefined
        ? undefined
        : { username: env.NEO4J_USERNAME, password: env.NEO4J_PASSWORD },
    database: env.NEO4J_DATABASE,
    driver: {
      maxConnectionPoolSize: env.GRAPH_IDENTITY_MAX_POOL_SIZE,
      connectionAcquisitionTimeout: env.GRAPH_IDENTITY_CONNECTION_TIMEOUT_MS,
      connectionLivenessCheckTimeout: env.GRAPH_IDENTITY_LIVENESS_TIMEOUT_MS,
    },
  });
}
