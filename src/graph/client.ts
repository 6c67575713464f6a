/**
 * @file graph/client
 * @description Bolt driver lifecycle and session adaptation for the mapping layer.
 * @remarks One driver per provider, created lazily from explicit options and
 * closed by its owner. Sessions are handed out per operation.
 */

import neo4j, { DateTime, int, type Driver, type Record as Neo4jRecord, type Session } from "neo4j-driver";
import { parseStoreOptions, type StoreOptions, type StoreOptionsInput } from "../config.js";
import { logger } from "../utils/logger.js";
import type { GraphRecord, GraphSession, QueryParams, SessionSource } from "./session.js";

/** What the provider needs from a live driver. */
export interface BoltConnection {
  openSession(database: string | undefined): GraphSession;
  close(): Promise<void>;
}

export type BoltConnector = (options: StoreOptions) => BoltConnection;

/**
 * Convert caller values to types the driver serializes faithfully:
 * `undefined` → `null` (Bolt requires explicit null), safe integers → Integer,
 * `Date` → DateTime. Lists and maps are converted recursively.
 */
export function toDriverValue(value: unknown): unknown {
  if (value === undefined) return null;
  if (typeof value === "number" && Number.isSafeInteger(value)) return int(value);
  if (value instanceof Date) return DateTime.fromStandardDate(value);
  if (Array.isArray(value)) return value.map((item: unknown) => toDriverValue(item));
  if (typeof value === "object" && value !== null) {
    const proto: unknown = Object.getPrototypeOf(value);
    if (proto === Object.prototype || proto === null) {
      const converted: Record<string, unknown> = {};
      for (const [key, item] of Object.entries(value)) {
        converted[key] = toDriverValue(item);
      }
      return converted;
    }
  }
  return value;
}

export function toDriverParams(params: QueryParams): Record<string, unknown> {
  return Object.fromEntries(Object.entries(params).map(([key, value]) => [key, toDriverValue(value)]));
}

function adaptRecord(record: Neo4jRecord): GraphRecord {
  return {
    keys: record.keys.map(String),
    get: (key: string): unknown => record.get(key),
  };
}

function adaptSession(session: Session): GraphSession {
  return {
    async run(query, params) {
      const result = await session.run(query, toDriverParams(params));
      return { records: result.records.map(adaptRecord) };
    },
    close: () => session.close(),
  };
}

/** Default connector backed by neo4j-driver. */
export const connectBolt: BoltConnector = (options) => {
  const authToken = options.auth
    ? neo4j.auth.basic(options.auth.username, options.auth.password)
    : undefined;
  const driver: Driver = neo4j.driver(options.uri, authToken, {
    maxConnectionPoolSize: options.driver.maxConnectionPoolSize,
    connectionAcquisitionTimeout: options.driver.connectionAcquisitionTimeout,
    connectionLivenessCheckTimeout: options.driver.connectionLivenessCheckTimeout,
  });

  return {
    openSession: (database) => adaptSession(driver.session({ database })),
    close: () => driver.close(),
  };
};

/**
 * Session source over a Bolt driver built from explicit options.
 *
 * Replaces any process-wide driver singleton: each provider owns its driver,
 * and stores receive the provider they should use.
 */
export class GraphDriverProvider implements SessionSource {
  private readonly options: StoreOptions;
  private readonly connector: BoltConnector;
  private connection: BoltConnection | null = null;

  constructor(options: StoreOptionsInput, connector: BoltConnector = connectBolt) {
    this.options = parseStoreOptions(options);
    this.connector = connector;
  }

  get database(): string | undefined {
    return this.options.database;
  }

  session(): GraphSession {
    return this.connect().openSession(this.options.database);
  }

  /**
   * Round-trip a trivial statement so configuration errors surface at startup.
   * Engine errors propagate unchanged.
   */
  async verifyConnectivity(): Promise<void> {
    const session = this.session();
    try {
      await session.run("RETURN 1", {});
    } finally {
      await session.close();
    }
    logger.info("[GraphDriverProvider] Connectivity verified", { uri: this.options.uri });
  }

  async close(): Promise<void> {
    if (!this.connection) return;
    const connection = this.connection;
    this.connection = null;
    await connection.close();
    logger.info("[GraphDriverProvider] Driver closed", { uri: this.options.uri });
  }

  isConnected(): boolean {
    return this.connection !== null;
  }

  private connect(): BoltConnection {
    if (!this.connection) {
      this.connection = this.connector(this.options);
      logger.info("[GraphDriverProvider] Driver created", {
        uri: this.options.uri,
        database: this.options.database ?? "(default)",
        authenticated: this.options.auth !== undefined,
      });
    }
    return this.connection;
  }
}
