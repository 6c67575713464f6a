import { describe as suite, expect, it } from "vitest";
import { PreconditionError } from "../errors.js";
import { labelsOf, nodePattern, relationshipPattern } from "./pattern-builder.js";
import { describe } from "./type-descriptor.js";

class Account {
  id = "";
  email = "";
  entityId: number | null = null;
}

class Admin extends Account {
  level = 1;
}

class Owns {}

suite("labelsOf", () => {
  it("joins labels most-derived first", () => {
    expect(labelsOf(describe(Admin))).toBe(":Admin:Account");
  });
});

suite("nodePattern", () => {
  it("renders labels without a variable", () => {
    expect(nodePattern(describe(Account))).toBe("(:Account)");
  });

  it("renders a variable with labels", () => {
    expect(nodePattern(describe(Admin), "a")).toBe("(a:Admin:Account)");
  });

  it("renders an inline filter in key order", () => {
    expect(nodePattern(describe(Account), "p", { id: "account.id", entityId: "entityId" })).toBe(
      "(p:Account {id:$account.id, entityId:$entityId})",
    );
  });

  it("renders an empty pattern for an empty filter", () => {
    expect(nodePattern(describe(Account), "p", {})).toBe("(p:Account)");
  });

  it("rejects a variable that is not a plain identifier", () => {
    expect(() => nodePattern(describe(Account), "p) DETACH DELETE (x")).toThrow(PreconditionError);
  });

  it("rejects a parameter reference that is not a dotted identifier", () => {
    expect(() => nodePattern(describe(Account), "p", { email: "x}) RETURN 1 //" })).toThrow(
      'parameter reference must be a dotted identifier path (received "x}) RETURN 1 //")',
    );
  });
});

suite("relationshipPattern", () => {
  it("renders an outgoing relationship by default", () => {
    expect(relationshipPattern(Owns)).toBe("-[:Owns]->");
  });

  it("renders incoming and undirected relationships with a variable", () => {
    expect(relationshipPattern(Owns, "rel", "in")).toBe("<-[rel:Owns]-");
    expect(relationshipPattern(describe(Owns), "rel", "both")).toBe("-[rel:Owns]-");
  });

  it("rejects an anonymous relationship class", () => {
    expect(() => relationshipPattern(describe(class {}))).toThrow(
      "relationship type must be a named class",
    );
  });
});
