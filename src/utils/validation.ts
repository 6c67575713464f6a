/**
 * Argument guards shared by the mapping layer and the stores.
 * Every failure is a PreconditionError: detected locally, never retried.
 */

import { PreconditionError } from "../errors.js";
import { PLAIN_IDENTIFIER } from "../mapping/type-descriptor.js";

/** Dotted parameter reference such as `user` or `user.id`. */
const PARAMETER_REFERENCE = /^[A-Za-z_][A-Za-z0-9_]*(\.[A-Za-z_][A-Za-z0-9_]*)*$/;

/**
 * Require a value to be present
 * @param value Value to check
 * @param name Argument name reported in the error
 * @throws PreconditionError if value is null or undefined
 */
export function requireValue<T>(value: T | null | undefined, name: string): T {
  if (value === null || value === undefined) {
    throw new PreconditionError(`${name} is required`, { argument: name });
  }
  return value;
}

/**
 * Require a non-blank string
 * @throws PreconditionError if value is absent, empty or whitespace only
 */
export function requireText(value: string | null | undefined, name: string): string {
  if (typeof value !== "string" || value.trim().length === 0) {
    throw new PreconditionError(`${name} cannot be null or empty`, { argument: name });
  }
  return value;
}

/**
 * Validate a query variable or property key embedded in a pattern
 * @throws PreconditionError if the name is not a plain identifier
 */
export function validateIdentifier(name: string, role: string): string {
  if (!PLAIN_IDENTIFIER.test(name)) {
    throw new PreconditionError(`${role} must be a plain identifier (received "${name}")`, {
      [role]: name,
    });
  }
  return name;
}

/**
 * Validate a parameter reference embedded in a pattern, without the leading `$`
 * @throws PreconditionError if the reference is not a dotted identifier path
 */
export function validateParameterReference(reference: string): string {
  if (!PARAMETER_REFERENCE.test(reference)) {
    throw new PreconditionError(
      `parameter reference must be a dotted identifier path (received "${reference}")`,
      { reference },
    );
  }
  return reference;
}
