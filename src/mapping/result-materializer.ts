/**
 * @file mapping/result-materializer
 * @description Turns returned graph records into entity instances.
 * @remarks Record keys unknown to the target class are ignored. Values that
 * cannot be converted to a field's declared kind raise MaterializationError.
 */

import {
  isDate,
  isDateTime,
  isDuration,
  isInt,
  isLocalDateTime,
  isLocalTime,
  isNode,
  isTime,
} from "neo4j-driver";
import * as z from "zod";
import { MaterializationError } from "../errors.js";
import type { GraphRecord } from "../graph/session.js";
import {
  IDENTIFIER_FIELD,
  describe,
  type EntityType,
  type FieldKind,
} from "./type-descriptor.js";

const KIND_SCHEMAS: Record<FieldKind, z.ZodTypeAny> = {
  string: z.string(),
  number: z.number(),
  boolean: z.boolean(),
  date: z.union([z.date(), z.string(), z.number()]).pipe(z.coerce.date()),
  array: z.array(z.unknown()),
  object: z.record(z.unknown()),
  unknown: z.unknown(),
};

interface RecordValues {
  values: Record<string, unknown>;
  identity: unknown;
}

/**
 * Materialize one record into a fresh `T`.
 *
 * A record whose only column holds a node (or a map) is read through that
 * node's properties, and the node's engine id fills the identifier field.
 * Otherwise each column is matched to a field of the same name.
 */
export function materialize<T extends object>(type: EntityType<T>, record: GraphRecord): T {
  return materializeValues(type, extractValues(record));
}

function materializeValues<T extends object>(type: EntityType<T>, extracted: RecordValues): T {
  const descriptor = describe(type);
  const instance = new type();
  const { values, identity } = extracted;

  for (const field of descriptor.fields) {
    if (!field.readable || !field.writable) continue;
    const raw = values[field.name];
    if (raw === null || raw === undefined) continue;
    Reflect.set(instance, field.name, coerce(descriptor.typeName, field.name, field.kind, raw));
  }

  if (descriptor.identifier !== undefined) {
    const engineId = identity ?? values[descriptor.identifier];
    if (engineId !== null && engineId !== undefined) {
      Reflect.set(
        instance,
        descriptor.identifier,
        coerce(descriptor.typeName, IDENTIFIER_FIELD, "number", engineId),
      );
    }
  }

  return instance;
}

function extractValues(record: GraphRecord): RecordValues {
  if (record.keys.length === 1) {
    const single = fromSingleValue(record.get(record.keys[0] ?? ""));
    if (single) return single;
  }

  const values: Record<string, unknown> = {};
  for (const key of record.keys) {
    values[key] = record.get(key);
  }
  return { values, identity: undefined };
}

function fromSingleValue(value: unknown): RecordValues | undefined {
  if (typeof value !== "object" || value === null) return undefined;
  if (isNode(value)) {
    return { values: value.properties, identity: value.identity };
  }
  if (isPlainMap(value)) {
    return { values: value, identity: undefined };
  }
  return undefined;
}

function isPlainMap(value: object): value is Record<string, unknown> {
  const proto: unknown = Object.getPrototypeOf(value);
  return proto === Object.prototype || proto === null;
}

/**
 * Convert driver-native values to plain JavaScript: Integer → number (or bigint
 * outside the safe range), temporal values → Date, time-of-day and durations → ISO strings.
 */
export function toNativeValue(value: unknown): unknown {
  if (typeof value === "bigint") {
    return Number.isSafeInteger(Number(value)) ? Number(value) : value;
  }
  if (typeof value !== "object" || value === null) return value;

  if (isInt(value)) {
    return value.inSafeRange() ? value.toNumber() : value.toBigInt();
  }
  if (isDateTime(value) || isLocalDateTime(value) || isDate(value)) {
    return value.toStandardDate();
  }
  if (isTime(value) || isLocalTime(value) || isDuration(value)) {
    return value.toString();
  }
  if (Array.isArray(value)) {
    return value.map((item: unknown) => toNativeValue(item));
  }
  if (isPlainMap(value)) {
    const converted: Record<string, unknown> = {};
    for (const [key, item] of Object.entries(value)) {
      converted[key] = toNativeValue(item);
    }
    return converted;
  }
  return value;
}

function coerce(typeName: string, field: string, kind: FieldKind, raw: unknown): unknown {
  const native = toNativeValue(raw);
  // z.number() rejects NaN; a stored float may hold it.
  if (kind === "number" && Number.isNaN(native)) return native;

  const parsed = KIND_SCHEMAS[kind].safeParse(native);
  if (!parsed.success) {
    const reason = parsed.error.issues[0]?.message ?? `expected ${kind}`;
    throw new MaterializationError(typeName, field, reason, parsed.error);
  }
  return parsed.data;
}
