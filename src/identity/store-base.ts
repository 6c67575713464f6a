import { PreconditionError } from "../errors.js";
import { throwIfCancelled } from "../graph/cancellation.js";
import { QueryExecutor } from "../graph/query-executor.js";
import type { SessionSource } from "../graph/session.js";
import { logger } from "../utils/logger.js";
import { requireValue } from "../utils/validation.js";

/**
 * Shared lifecycle for the graph-backed stores: one executor over the
 * caller's session source, and a disposed flag checked on every call.
 */
export abstract class GraphStoreBase {
  protected readonly executor: QueryExecutor;
  private disposed = false;

  protected constructor(source: SessionSource) {
    this.executor = new QueryExecutor(requireValue(source, "source"));
  }

  /** Marks the store unusable. The session source stays open; its owner closes it. */
  dispose(): void {
    if (this.disposed) return;
    this.disposed = true;
    logger.debug(`[${this.constructor.name}] Disposed`);
  }

  get isDisposed(): boolean {
    return this.disposed;
  }

  protected throwIfDisposed(): void {
    if (this.disposed) {
      throw new PreconditionError(`${this.constructor.name} has been disposed`, {
        store: this.constructor.name,
      });
    }
  }

  /** Entry check for graph-touching methods. */
  protected guard(signal: AbortSignal | undefined): void {
    throwIfCancelled(signal);
    this.throwIfDisposed();
  }
}
