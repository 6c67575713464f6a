import { describe, expect, it } from "vitest";
import { PreconditionError } from "../errors.js";
import {
  requireText,
  requireValue,
  validateIdentifier,
  validateParameterReference,
} from "./validation.js";

describe("validation utils", () => {
  it("requireValue passes present values through and rejects null or undefined", () => {
    expect(requireValue(0, "count")).toBe(0);
    expect(requireValue("", "name")).toBe("");
    expect(() => requireValue(null, "user")).toThrow("user is required");
    expect(() => requireValue(undefined, "role")).toThrow(PreconditionError);
  });

  it("requireText rejects empty and whitespace-only strings", () => {
    expect(requireText("ADMIN", "normalizedRoleName")).toBe("ADMIN");
    expect(() => requireText("", "normalizedRoleName")).toThrow(
      "normalizedRoleName cannot be null or empty",
    );
    expect(() => requireText("   ", "normalizedRoleName")).toThrow(PreconditionError);
    expect(() => requireText(null, "normalizedRoleName")).toThrow(PreconditionError);
  });

  it("validateIdentifier accepts plain identifiers only", () => {
    expect(validateIdentifier("p", "variable")).toBe("p");
    expect(validateIdentifier("_row2", "variable")).toBe("_row2");
    expect(() => validateIdentifier("2p", "variable")).toThrow(
      'variable must be a plain identifier (received "2p")',
    );
    expect(() => validateIdentifier("a b", "filter key")).toThrow(PreconditionError);
  });

  it("validateParameterReference accepts dotted paths", () => {
    expect(validateParameterReference("user.id")).toBe("user.id");
    expect(validateParameterReference("userId")).toBe("userId");
    expect(() => validateParameterReference("user.")).toThrow(PreconditionError);
    expect(() => validateParameterReference("$user")).toThrow(PreconditionError);
  });
});
