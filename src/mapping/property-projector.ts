/**
 * @file mapping/property-projector
 * @description Projects entity state into flat parameter payloads for `SET x += $p`.
 * @remarks Values are copied verbatim; conversion to driver types happens at the
 * session boundary. The identifier field is never projected.
 */

import { describeConstructor, writableFieldNames, type FieldName } from "./type-descriptor.js";
import { requireValue } from "../utils/validation.js";

export type ProjectionMode = "include" | "exclude";

/** Ordered field name → value payload. */
export type PropertyProjection = Record<string, unknown>;

/**
 * Build a write payload from an instance.
 *
 * In `include` mode only the listed fields are kept; in `exclude` mode every
 * writable field except the listed ones. Output order follows the class
 * declaration order, not the order of `fieldNames`.
 *
 * @throws PreconditionError when `instance` is absent
 */
export function project<T extends object>(
  instance: T | null | undefined,
  mode: ProjectionMode,
  fieldNames: Iterable<FieldName<T>> = [],
): PropertyProjection {
  const target = requireValue(instance, "instance");
  const names = new Set<string>(fieldNames);
  const projection: PropertyProjection = {};

  for (const name of writableFieldNames(describeConstructor(target.constructor))) {
    if (names.has(name) !== (mode === "include")) continue;
    projection[name] = Reflect.get(target, name);
  }

  return projection;
}

/** Project each instance, for `UNWIND $rows AS row` payloads. */
export function projectMany<T extends object>(
  instances: Iterable<T>,
  mode: ProjectionMode,
  fieldNames: Iterable<FieldName<T>> = [],
): PropertyProjection[] {
  const names = [...fieldNames];
  return Array.from(instances, (instance) => project(instance, mode, names));
}
