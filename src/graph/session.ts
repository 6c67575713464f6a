/**
 * @file graph/session
 * @description Boundary contracts between the mapping layer and a graph engine session.
 * @remarks `GraphDriverProvider` adapts neo4j-driver to these shapes; tests use
 * in-process fakes.
 */

/** Flat payload of scalars, strings and nested maps/lists. */
export type QueryParams = Record<string, unknown>;

export interface CypherStatement {
  query: string;
  params: QueryParams;
}

/** One returned row with named-value access. */
export interface GraphRecord {
  readonly keys: readonly string[];
  get(key: string): unknown;
}

export interface GraphQueryOutput {
  readonly records: readonly GraphRecord[];
}

/**
 * Short-lived handle used for one operation at a time, then closed.
 * Each `run` is an autocommit statement.
 */
export interface GraphSession {
  run(query: string, params: QueryParams): Promise<GraphQueryOutput>;
  close(): Promise<void>;
}

export interface SessionSource {
  session(): GraphSession;
}
