/**
 * @file mapping/type-descriptor
 * @description Derives the graph labels and mapped fields of an entity class.
 * @remarks Shapes are computed once per constructor and frozen. Two callers
 * racing on a cold cache may both compute a shape; the results are equal and
 * the last write wins, so no lock is taken.
 */

/** Name of the engine-assigned identifier field on mapped entities. */
export const IDENTIFIER_FIELD = "entityId";

export type FieldKind = "string" | "number" | "boolean" | "date" | "array" | "object" | "unknown";

const FIELD_KINDS: readonly FieldKind[] = [
  "string",
  "number",
  "boolean",
  "date",
  "array",
  "object",
  "unknown",
];

/** Labels, property keys and variables must be plain identifiers to be embedded unquoted. */
export const PLAIN_IDENTIFIER = /^[A-Za-z_][A-Za-z0-9_]*$/;

export interface FieldDescriptor {
  readonly name: string;
  readonly readable: boolean;
  readonly writable: boolean;
  readonly kind: FieldKind;
}

/**
 * A class the mapping layer can instantiate without arguments.
 */
export type EntityType<T extends object = object> = new () => T;

/** Data-bearing property names of `T` (methods excluded). */
export type FieldName<T> = {
  [K in keyof T]-?: T[K] extends (...args: never[]) => unknown ? never : K;
}[keyof T] &
  string;

export interface TypeShape {
  readonly typeName: string;
  /** Most-derived class first. */
  readonly labels: readonly string[];
  readonly fields: readonly FieldDescriptor[];
  /** Set when the class carries the engine identifier field. */
  readonly identifier: string | undefined;
}

export interface TypeDescriptor<T extends object = object> extends TypeShape {
  readonly type: EntityType<T>;
}

const EMPTY_SHAPE: TypeShape = Object.freeze({
  typeName: "",
  labels: Object.freeze([]),
  fields: Object.freeze([]),
  identifier: undefined,
});

const shapeCache = new WeakMap<object, TypeShape>();

/**
 * Describes an entity class for pattern building, projection and materialization.
 *
 * Never throws. A value that is not a class, or a class that cannot be
 * constructed without arguments, yields empty labels and/or fields.
 *
 * @example
 * ```ts
 * class Person { name = ""; }
 * describe(Person).labels; // ["Person"]
 * ```
 */
export function describe<T extends object>(type: EntityType<T>): TypeDescriptor<T> {
  return { ...describeConstructor(type), type };
}

/**
 * Untyped entry point used when only an instance's constructor is at hand.
 */
export function describeConstructor(ctor: unknown): TypeShape {
  if (typeof ctor !== "function") {
    return EMPTY_SHAPE;
  }

  const cached = shapeCache.get(ctor);
  if (cached) return cached;

  const shape = computeShape(ctor);
  shapeCache.set(ctor, shape);
  return shape;
}

function computeShape(ctor: Function): TypeShape {
  const labels = collectLabels(ctor);
  const fields = collectFields(ctor);
  const identifier = fields.some((field) => field.name === IDENTIFIER_FIELD)
    ? IDENTIFIER_FIELD
    : undefined;

  return Object.freeze({
    typeName: labels[0] ?? "",
    labels: Object.freeze(labels),
    fields: Object.freeze(fields.map((field) => Object.freeze(field))),
    identifier,
  });
}

function collectLabels(ctor: Function): string[] {
  const labels: string[] = [];
  let current: unknown = ctor;

  while (typeof current === "function" && current !== Object && current !== Function.prototype) {
    if (PLAIN_IDENTIFIER.test(current.name)) {
      labels.push(current.name);
    }
    current = Object.getPrototypeOf(current);
  }

  return labels;
}

function collectFields(ctor: Function): FieldDescriptor[] {
  const instance = instantiate(ctor);
  if (instance === undefined) return [];

  const unmapped = new Set(readStaticStrings(ctor, "unmappedFields"));
  const declaredKinds = readDeclaredKinds(ctor);
  const fields: FieldDescriptor[] = [];
  const seen = new Set<string>();

  const accept = (name: string): boolean =>
    PLAIN_IDENTIFIER.test(name) && !unmapped.has(name) && !seen.has(name);

  for (const name of Object.keys(instance)) {
    const value: unknown = Reflect.get(instance, name);
    if (typeof value === "function" || !accept(name)) continue;
    seen.add(name);
    fields.push({
      name,
      readable: true,
      writable: name !== IDENTIFIER_FIELD,
      kind: declaredKinds.get(name) ?? inferKind(value),
    });
  }

  let proto: unknown = Object.getPrototypeOf(instance);
  while (typeof proto === "object" && proto !== null && proto !== Object.prototype) {
    for (const name of Object.getOwnPropertyNames(proto)) {
      const property = Object.getOwnPropertyDescriptor(proto, name);
      if (!property || (!property.get && !property.set) || !accept(name)) continue;
      seen.add(name);
      fields.push({
        name,
        readable: property.get !== undefined,
        writable: property.set !== undefined && name !== IDENTIFIER_FIELD,
        kind: declaredKinds.get(name) ?? "unknown",
      });
    }
    proto = Object.getPrototypeOf(proto);
  }

  return fields;
}

function instantiate(ctor: Function): object | undefined {
  try {
    const instance: unknown = Reflect.construct(ctor, []);
    return typeof instance === "object" && instance !== null ? instance : undefined;
  } catch {
    // A class that needs constructor arguments describes as field-less.
    return undefined;
  }
}

function inferKind(value: unknown): FieldKind {
  if (value === null || value === undefined) return "unknown";
  if (typeof value === "string") return "string";
  if (typeof value === "number" || typeof value === "bigint") return "number";
  if (typeof value === "boolean") return "boolean";
  if (value instanceof Date) return "date";
  if (Array.isArray(value)) return "array";
  return "object";
}

function readStaticStrings(ctor: Function, key: string): string[] {
  const raw: unknown = Reflect.get(ctor, key);
  if (!Array.isArray(raw)) return [];
  return raw.filter((item): item is string => typeof item === "string");
}

function isFieldKind(value: unknown): value is FieldKind {
  return typeof value === "string" && FIELD_KINDS.some((kind) => kind === value);
}

function readDeclaredKinds(ctor: Function): Map<string, FieldKind> {
  const raw: unknown = Reflect.get(ctor, "fieldKinds");
  const kinds = new Map<string, FieldKind>();
  if (typeof raw !== "object" || raw === null) return kinds;

  for (const [name, kind] of Object.entries(raw)) {
    if (isFieldKind(kind)) kinds.set(name, kind);
  }
  return kinds;
}

/** Names of the fields a write projection may carry. */
export function writableFieldNames(shape: TypeShape): string[] {
  return shape.fields
    .filter((field) => field.readable && field.writable)
    .map((field) => field.name);
}
