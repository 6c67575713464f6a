import { Neo4jError } from "neo4j-driver";
import { describe, expect, it } from "vitest";
import {
  CancelledError,
  GraphIdentityError,
  MaterializationError,
  PreconditionError,
  isEngineError,
  isGraphIdentityError,
} from "./errors.js";

describe("error hierarchy", () => {
  it("tags each failure with its code", () => {
    expect(new PreconditionError("user is required").code).toBe("PRECONDITION");
    expect(new CancelledError().code).toBe("CANCELLED");
    expect(new MaterializationError("User", "email", "Expected string, received number").code).toBe(
      "MATERIALIZATION",
    );
  });

  it("keeps details and names on subclasses", () => {
    const error = new PreconditionError("roleName cannot be null or empty", { argument: "roleName" });
    expect(error).toBeInstanceOf(GraphIdentityError);
    expect(error.name).toBe("PreconditionError");
    expect(error.details).toEqual({ argument: "roleName" });
  });

  it("formats materialization failures with type and field", () => {
    const error = new MaterializationError("User", "email", "Expected string, received number");
    expect(error.message).toBe("Cannot materialize User.email: Expected string, received number");
    expect(error.details).toEqual({ typeName: "User", field: "email" });
  });

  it("carries the abort reason as the cause of a cancellation", () => {
    const error = new CancelledError("shutdown");
    expect(error.message).toBe("Operation was cancelled before dispatch");
    expect(error.cause).toBe("shutdown");
  });
});

describe("error guards", () => {
  it("recognizes errors raised by this package", () => {
    expect(isGraphIdentityError(new CancelledError())).toBe(true);
    expect(isGraphIdentityError(new Error("other"))).toBe(false);
  });

  it("recognizes driver errors only", () => {
    const engineFailure: unknown = Object.setPrototypeOf(new Error("Connection refused"), Neo4jError.prototype);
    expect(isEngineError(engineFailure)).toBe(true);
    expect(isEngineError(new PreconditionError("x is required"))).toBe(false);
  });
});
