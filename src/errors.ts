/**
 * @file errors
 * @description Error hierarchy raised by the mapping layer and the identity stores.
 * @remarks Failures raised by the graph engine are never wrapped; they reach the
 * caller as the driver threw them and can be recognized with `isEngineError`.
 */

import { Neo4jError } from "neo4j-driver";

export type GraphIdentityErrorCode = "PRECONDITION" | "CANCELLED" | "MATERIALIZATION";

export interface GraphIdentityErrorOptions {
  details?: Record<string, unknown>;
  cause?: unknown;
}

export class GraphIdentityError extends Error {
  readonly code: GraphIdentityErrorCode;
  readonly details: Record<string, unknown>;

  constructor(code: GraphIdentityErrorCode, message: string, options: GraphIdentityErrorOptions = {}) {
    super(message, options.cause === undefined ? undefined : { cause: options.cause });
    this.name = "GraphIdentityError";
    this.code = code;
    this.details = options.details ?? {};
  }
}

/**
 * A required argument was absent or malformed. Never retried.
 */
export class PreconditionError extends GraphIdentityError {
  constructor(message: string, details?: Record<string, unknown>) {
    super("PRECONDITION", message, { details });
    this.name = "PreconditionError";
  }
}

/**
 * The cancellation signal was already aborted at a dispatch gate, so nothing
 * was sent to the engine.
 */
export class CancelledError extends GraphIdentityError {
  constructor(reason?: unknown) {
    super("CANCELLED", "Operation was cancelled before dispatch", {
      cause: reason,
    });
    this.name = "CancelledError";
  }
}

/**
 * A returned value could not be converted to the declared kind of the target field.
 */
export class MaterializationError extends GraphIdentityError {
  readonly typeName: string;
  readonly field: string;

  constructor(typeName: string, field: string, reason: string, cause?: unknown) {
    super("MATERIALIZATION", `Cannot materialize ${typeName}.${field}: ${reason}`, {
      details: { typeName, field },
      cause,
    });
    this.name = "MaterializationError";
    this.typeName = typeName;
    this.field = field;
  }
}

export function isGraphIdentityError(error: unknown): error is GraphIdentityError {
  return error instanceof GraphIdentityError;
}

/**
 * True for failures reported by the graph engine or its driver
 * (connectivity, malformed statement, constraint violation).
 */
export function isEngineError(error: unknown): error is Neo4jError {
  return error instanceof Neo4jError;
}
