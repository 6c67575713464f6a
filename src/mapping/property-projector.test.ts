import { describe, expect, it } from "vitest";
import { PreconditionError } from "../errors.js";
import { nodePattern } from "./pattern-builder.js";
import { project, projectMany } from "./property-projector.js";
import { describe as describeType } from "./type-descriptor.js";

class Role {
  id = "r-1";
  name: string | null = "admin";
  normalizedName: string | null = "ADMIN";
  entityId: number | null = 7;
}

describe("project", () => {
  it("copies every writable field in declaration order when nothing is excluded", () => {
    expect(Object.entries(project(new Role(), "exclude"))).toEqual([
      ["id", "r-1"],
      ["name", "admin"],
      ["normalizedName", "ADMIN"],
    ]);
  });

  it("keeps only the listed fields in include mode", () => {
    expect(project(new Role(), "include", ["normalizedName", "id"])).toEqual({
      id: "r-1",
      normalizedName: "ADMIN",
    });
  });

  it("drops the listed fields in exclude mode", () => {
    expect(project(new Role(), "exclude", ["id"])).toEqual({
      name: "admin",
      normalizedName: "ADMIN",
    });
  });

  it("never projects the identifier, even when asked for", () => {
    expect(project(new Role(), "include", ["entityId"])).toEqual({});
  });

  it("passes null values through unchanged", () => {
    const role = new Role();
    role.name = null;
    expect(project(role, "include", ["name"])).toEqual({ name: null });
  });

  it("rejects an absent instance", () => {
    expect(() => project<Role>(undefined, "exclude")).toThrow(PreconditionError);
    expect(() => project<Role>(null, "exclude")).toThrow("instance is required");
  });
});

class T {
  id = "t-1";
  name = "";
  normalizedName = "";
  entityId: number | null = null;
}

describe("name pair entity", () => {
  it("renders its pattern and drops id from the payload", () => {
    const instance = new T();
    instance.name = "a";
    instance.normalizedName = "A";

    expect(nodePattern(describeType(T), "p")).toBe("(p:T)");
    expect(project(instance, "exclude", ["id"])).toEqual({ name: "a", normalizedName: "A" });
  });
});

describe("projectMany", () => {
  it("projects each instance with the same field list", () => {
    const first = new Role();
    const second = new Role();
    second.id = "r-2";
    expect(projectMany([first, second], "include", ["id"])).toEqual([{ id: "r-1" }, { id: "r-2" }]);
  });
});
