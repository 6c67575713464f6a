import type { GraphRecord } from "./session.js";

/**
 * Finite, restartable sequence over buffered records.
 *
 * Records are materialized lazily on each pass, so a conversion failure
 * surfaces while iterating rather than when the query returns. An empty result
 * means "not found".
 */
export class QueryResult<T> implements Iterable<T> {
  private readonly records: readonly GraphRecord[];
  private readonly convert: (record: GraphRecord) => T;

  constructor(records: readonly GraphRecord[], convert: (record: GraphRecord) => T) {
    this.records = records;
    this.convert = convert;
  }

  get size(): number {
    return this.records.length;
  }

  isEmpty(): boolean {
    return this.records.length === 0;
  }

  *[Symbol.iterator](): Iterator<T> {
    for (const record of this.records) {
      yield this.convert(record);
    }
  }

  /** First element, or undefined; later records are never materialized. */
  first(): T | undefined {
    const head = this.records[0];
    return head === undefined ? undefined : this.convert(head);
  }

  toArray(): T[] {
    return Array.from(this);
  }

  map<U>(fn: (item: T) => U): U[] {
    return Array.from(this, fn);
  }
}
