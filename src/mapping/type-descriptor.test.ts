import { describe as suite, expect, it } from "vitest";
import {
  IDENTIFIER_FIELD,
  describe,
  describeConstructor,
  writableFieldNames,
} from "./type-descriptor.js";

class Person {
  name = "";
  age = 0;
  entityId: number | null = null;
}

class Employee extends Person {
  static readonly fieldKinds = { manager: "string" };
  static readonly unmappedFields = ["scratch"];

  title = "engineer";
  manager: string | null = null;
  scratch = "";

  greet(): string {
    return `hi ${this.name}`;
  }
}

class WithAccessors {
  private _code = "x";

  get code(): string {
    return this._code;
  }

  set code(value: string) {
    this._code = value;
  }

  get computed(): number {
    return 42;
  }
}

class NeedsArgs {
  readonly value: string;

  constructor(value: string) {
    if (value === undefined) throw new Error("value required");
    this.value = value;
  }
}

class Wrapper extends NeedsArgs {}

suite("describe", () => {
  it("labels a plain class with its own name", () => {
    expect(describe(Person).labels).toEqual(["Person"]);
    expect(describe(Person).typeName).toBe("Person");
  });

  it("orders labels from the most-derived class up", () => {
    expect(describe(Employee).labels).toEqual(["Employee", "Person"]);
  });

  it("lists own fields in declaration order with inherited fields first", () => {
    expect(describe(Employee).fields.map((field) => field.name)).toEqual([
      "name",
      "age",
      "entityId",
      "title",
      "manager",
    ]);
  });

  it("marks the identifier field read-only", () => {
    const descriptor = describe(Person);
    const identifier = descriptor.fields.find((field) => field.name === IDENTIFIER_FIELD);
    expect(identifier).toEqual({ name: "entityId", readable: true, writable: false, kind: "unknown" });
    expect(descriptor.identifier).toBe("entityId");
  });

  it("takes declared kinds over inferred ones", () => {
    const manager = describe(Employee).fields.find((field) => field.name === "manager");
    expect(manager?.kind).toBe("string");
    const age = describe(Employee).fields.find((field) => field.name === "age");
    expect(age?.kind).toBe("number");
  });

  it("discovers accessor properties after own fields", () => {
    const fields = describe(WithAccessors).fields;
    expect(fields.map((field) => field.name)).toEqual(["_code", "code", "computed"]);
    expect(fields[1]).toEqual({ name: "code", readable: true, writable: true, kind: "unknown" });
    expect(fields[2]).toEqual({ name: "computed", readable: true, writable: false, kind: "unknown" });
  });

  it("describes a class needing constructor arguments as field-less", () => {
    const descriptor = describeConstructor(Wrapper);
    expect(descriptor.labels).toEqual(["Wrapper", "NeedsArgs"]);
    expect(descriptor.fields).toEqual([]);
    expect(descriptor.identifier).toBeUndefined();
  });

  it("returns the same frozen shape on every call", () => {
    const first = describeConstructor(Person);
    const second = describeConstructor(Person);
    expect(first).toBe(second);
    expect(Object.isFrozen(first.fields)).toBe(true);
  });

  it("returns an empty shape for values that are not classes", () => {
    expect(describeConstructor(undefined)).toEqual({
      typeName: "",
      labels: [],
      fields: [],
      identifier: undefined,
    });
  });
});

suite("writableFieldNames", () => {
  it("excludes the identifier and getter-only properties", () => {
    expect(writableFieldNames(describe(Person))).toEqual(["name", "age"]);
    expect(writableFieldNames(describe(WithAccessors))).toEqual(["_code", "code"]);
  });
});
