/**
 * @file graph/query-executor
 * @description Runs pattern-embedded statements through short-lived sessions.
 * @remarks Cancellation is a pre-flight gate only. An aborted signal stops the
 * call before a session is acquired or before the next statement is sent; a
 * statement already in flight runs to completion, because the session protocol
 * offers no mid-statement abort. Engine failures propagate unchanged.
 */

import { logger } from "../utils/logger.js";
import { materialize } from "../mapping/result-materializer.js";
import type { EntityType } from "../mapping/type-descriptor.js";
import { throwIfCancelled } from "./cancellation.js";
import { QueryResult } from "./query-result.js";
import type {
  CypherStatement,
  GraphQueryOutput,
  GraphRecord,
  GraphSession,
  QueryParams,
  SessionSource,
} from "./session.js";

/**
 * Statement runner bound to one open session. Handed to `withSession` work so
 * a lookup and a dependent write share the session.
 */
export class SessionScope {
  private readonly session: GraphSession;
  private readonly signal: AbortSignal | undefined;

  constructor(session: GraphSession, signal?: AbortSignal) {
    this.session = session;
    this.signal = signal;
  }

  async run(query: string, params: QueryParams = {}): Promise<void> {
    await this.dispatch({ query, params });
  }

  async queryMany<T extends object>(
    type: EntityType<T>,
    query: string,
    params: QueryParams = {},
  ): Promise<QueryResult<T>> {
    const output = await this.dispatch({ query, params });
    const rows = output.records.filter((record) => !isEmptyRow(record));
    return new QueryResult(rows, (record) => materialize(type, record));
  }

  async queryOptional<T extends object>(
    type: EntityType<T>,
    query: string,
    params: QueryParams = {},
  ): Promise<T | undefined> {
    const result = await this.queryMany(type, query, params);
    return result.first();
  }

  private async dispatch(statement: CypherStatement): Promise<GraphQueryOutput> {
    throwIfCancelled(this.signal);
    logger.debug("Dispatching graph statement", {
      query: statement.query.substring(0, 200),
      paramKeys: Object.keys(statement.params),
    });
    return this.session.run(statement.query, statement.params);
  }
}

/** A lone null column, as `OPTIONAL MATCH ... RETURN p` yields when nothing matched. */
function isEmptyRow(record: GraphRecord): boolean {
  if (record.keys.length !== 1) return false;
  const value = record.get(record.keys[0] ?? "");
  return value === null || value === undefined;
}

export class QueryExecutor {
  private readonly source: SessionSource;

  constructor(source: SessionSource) {
    this.source = source;
  }

  /** Execute a statement whose result is not needed. */
  run(query: string, params: QueryParams = {}, signal?: AbortSignal): Promise<void> {
    return this.withSession(signal, (scope) => scope.run(query, params));
  }

  queryMany<T extends object>(
    type: EntityType<T>,
    query: string,
    params: QueryParams = {},
    signal?: AbortSignal,
  ): Promise<QueryResult<T>> {
    return this.withSession(signal, (scope) => scope.queryMany(type, query, params));
  }

  /** First materialized result of `queryMany`, or undefined. */
  queryOptional<T extends object>(
    type: EntityType<T>,
    query: string,
    params: QueryParams = {},
    signal?: AbortSignal,
  ): Promise<T | undefined> {
    return this.withSession(signal, (scope) => scope.queryOptional(type, query, params));
  }

  /**
   * Acquire one session for `work` and close it on every exit path.
   *
   * @throws CancelledError when `signal` is already aborted; no session is acquired
   */
  async withSession<R>(
    signal: AbortSignal | undefined,
    work: (scope: SessionScope) => Promise<R>,
  ): Promise<R> {
    throwIfCancelled(signal);
    const session = this.source.session();
    try {
      return await work(new SessionScope(session, signal));
    } finally {
      await session.close();
    }
  }
}
