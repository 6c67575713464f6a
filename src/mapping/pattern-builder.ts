/**
 * @file mapping/pattern-builder
 * @description Renders node and relationship fragments for Cypher statements.
 * @remarks Labels and relationship types are taken only from type descriptors,
 * which only admit plain identifiers. Caller-supplied variables, filter keys and
 * parameter references are checked to be identifiers too; nothing is quoted.
 */

import { PreconditionError } from "../errors.js";
import {
  describe,
  type EntityType,
  type FieldName,
  type TypeDescriptor,
  type TypeShape,
} from "./type-descriptor.js";
import { validateIdentifier, validateParameterReference } from "../utils/validation.js";

/**
 * Ordered property → parameter reference map rendered as `{key:$ref, ...}`.
 * References are written without the `$` and may be dotted (`user.id`).
 * Keeping parameter names unique within one statement is the caller's job.
 */
export type InlineFilter<T> = Partial<Record<FieldName<T>, string>>;

export type RelationshipDirection = "out" | "in" | "both";

/** `:L1:L2` in descriptor order, or an empty string. */
export function labelsOf(shape: TypeShape): string {
  return shape.labels.map((label) => `:${label}`).join("");
}

/**
 * `(p:User:IdentityUser {id:$userId})`
 */
export function nodePattern<T extends object>(
  descriptor: TypeDescriptor<T>,
  variable?: string,
  inlineFilter?: InlineFilter<T>,
): string {
  const head = `${variable === undefined ? "" : validateIdentifier(variable, "variable")}${labelsOf(descriptor)}`;
  const filter = inlineFilter === undefined ? "" : renderFilter(inlineFilter);

  if (filter.length === 0) return `(${head})`;
  return head.length === 0 ? `(${filter})` : `(${head} ${filter})`;
}

function renderFilter(filter: object): string {
  const pairs: string[] = [];
  for (const [key, reference] of Object.entries(filter)) {
    if (typeof reference !== "string") continue;
    pairs.push(`${validateIdentifier(key, "filter key")}:$${validateParameterReference(reference)}`);
  }
  return pairs.length === 0 ? "" : `{${pairs.join(", ")}}`;
}

/**
 * `-[rel:Has]->`, `<-[rel:Has]-` or `-[rel:Has]-`.
 *
 * @throws PreconditionError when the relationship class has no usable name
 */
export function relationshipPattern<R extends object>(
  relationType: EntityType<R> | TypeDescriptor<R>,
  variable?: string,
  direction: RelationshipDirection = "out",
): string {
  const descriptor = typeof relationType === "function" ? describe(relationType) : relationType;
  if (descriptor.typeName.length === 0) {
    throw new PreconditionError("relationship type must be a named class", {
      direction,
    });
  }

  const body = `[${variable === undefined ? "" : validateIdentifier(variable, "variable")}:${descriptor.typeName}]`;
  switch (direction) {
    case "out":
      return `-${body}->`;
    case "in":
      return `<-${body}-`;
    case "both":
      return `-${body}-`;
  }
}
