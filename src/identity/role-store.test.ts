import { describe, expect, it } from "vitest";
import { CancelledError, PreconditionError } from "../errors.js";
import { FakeSessionSource, nodeRecord } from "../graph/__tests__/fake-session.js";
import { Claim, IdentityRole } from "./models.js";
import { RoleStore } from "./role-store.js";

class TenantRole extends IdentityRole {
  tenant = "acme";
}

function newRole(): IdentityRole {
  const role = new IdentityRole("Admin");
  role.id = "role-1";
  role.normalizedName = "ADMIN";
  role.concurrencyStamp = "stamp-1";
  return role;
}

describe("RoleStore", () => {
  it("creates a role and copies the engine id back", async () => {
    const source = new FakeSessionSource((_query, params) => [
      nodeRecord("p", 17, ["IdentityRole"], { ...asMap(params.role) }),
    ]);
    const store = new RoleStore(source, IdentityRole);
    const role = newRole();

    const result = await store.create(role);

    expect(result.succeeded).toBe(true);
    expect(role.entityId).toBe(17);
    expect(source.calls).toEqual([
      {
        query: "CREATE (p:IdentityRole) SET p += $role, p.entityId = id(p) RETURN p",
        params: {
          role: {
            id: "role-1",
            name: "Admin",
            normalizedName: "ADMIN",
            concurrencyStamp: "stamp-1",
          },
        },
      },
    ]);
    expect(source.closed).toBe(1);
  });

  it("reports a failed create when no node comes back", async () => {
    const store = new RoleStore(new FakeSessionSource(), IdentityRole);
    const role = newRole();

    const result = await store.create(role);

    expect(result.succeeded).toBe(false);
    expect(result.errors).toEqual([{ code: "DefaultError", description: "An unknown failure has occurred." }]);
    expect(role.entityId).toBeNull();
  });

  it("labels subclass roles with the whole class chain", async () => {
    const source = new FakeSessionSource();
    const store = new RoleStore(source, TenantRole);

    await store.findByName("ADMIN");

    expect(source.calls).toEqual([
      {
        query: "MATCH (p:TenantRole:IdentityRole {normalizedName:$normalizedName}) RETURN p",
        params: { normalizedName: "ADMIN" },
      },
    ]);
  });

  it("regenerates the concurrency stamp on update", async () => {
    const source = new FakeSessionSource();
    const store = new RoleStore(source, IdentityRole);
    const role = newRole();
    role.entityId = 17;

    await store.update(role);

    expect(role.concurrencyStamp).not.toBe("stamp-1");
    expect(source.calls).toEqual([
      {
        query: "MATCH (p:IdentityRole {id:$role.id, entityId:$entityId}) SET p += $role",
        params: {
          role: {
            id: "role-1",
            name: "Admin",
            normalizedName: "ADMIN",
            concurrencyStamp: role.concurrencyStamp,
          },
          entityId: 17,
        },
      },
    ]);
  });

  it("deletes the role together with its claims", async () => {
    const source = new FakeSessionSource();
    const store = new RoleStore(source, IdentityRole);
    const role = newRole();
    role.entityId = 17;

    await store.delete(role);

    expect(source.calls).toEqual([
      {
        query:
          "MATCH (p:IdentityRole {id:$role.id, entityId:$entityId}) " +
          "OPTIONAL MATCH (p)-[:Has]->(c:IdentityClaim) DETACH DELETE c, p",
        params: { role: { id: "role-1" }, entityId: 17 },
      },
    ]);
  });

  it("finds a role by id", async () => {
    const source = new FakeSessionSource(() => [
      nodeRecord("p", 17, ["IdentityRole"], { id: "role-1", name: "Admin", normalizedName: "ADMIN" }),
    ]);
    const store = new RoleStore(source, IdentityRole);

    const found = await store.findById("role-1");

    expect(found?.name).toBe("Admin");
    expect(found?.entityId).toBe(17);
    expect(source.queries).toEqual(["MATCH (p:IdentityRole {id:$roleId}) RETURN p"]);
  });

  it("lists all roles", async () => {
    const source = new FakeSessionSource(() => [
      nodeRecord("p", 1, ["IdentityRole"], { id: "a", name: "A" }),
      nodeRecord("p", 2, ["IdentityRole"], { id: "b", name: "B" }),
    ]);

    const roles = await new RoleStore(source, IdentityRole).roles();

    expect(roles.map((role) => role.name)).toEqual(["A", "B"]);
  });

  it("adds, reads and removes claims", async () => {
    const source = new FakeSessionSource();
    const store = new RoleStore(source, IdentityRole);
    const role = newRole();

    await store.addClaim(role, new Claim("permission", "users.read"));
    source.respondWith(() => [
      nodeRecord("c", 30, ["IdentityClaim"], { claimType: "permission", claimValue: "users.read" }),
    ]);
    const claims = await store.getClaims(role);
    await store.removeClaim(role, new Claim("permission", "users.read"));

    expect(claims).toEqual([new Claim("permission", "users.read")]);
    expect(source.calls).toEqual([
      {
        query:
          "MATCH (p:IdentityRole {id:$roleId}) CREATE (p)-[:Has]->(c:IdentityClaim) " +
          "SET c += $claim, c.entityId = id(c)",
        params: { roleId: "role-1", claim: { claimType: "permission", claimValue: "users.read" } },
      },
      {
        query: "MATCH (p:IdentityRole {id:$roleId})-[:Has]->(c:IdentityClaim) RETURN c",
        params: { roleId: "role-1" },
      },
      {
        query:
          "MATCH (p:IdentityRole {id:$roleId})-[:Has]->" +
          "(c:IdentityClaim {claimType:$claimType, claimValue:$claimValue}) DETACH DELETE c",
        params: { roleId: "role-1", claimType: "permission", claimValue: "users.read" },
      },
    ]);
    expect(source.acquired).toBe(3);
    expect(source.closed).toBe(3);
  });

  it("sends nothing when the signal is already aborted", async () => {
    const source = new FakeSessionSource();
    const store = new RoleStore(source, IdentityRole);
    const controller = new AbortController();
    controller.abort();

    await expect(store.findById("role-1", controller.signal)).rejects.toBeInstanceOf(CancelledError);
    expect(source.acquired).toBe(0);
  });

  it("refuses every call after dispose", async () => {
    const source = new FakeSessionSource();
    const store = new RoleStore(source, IdentityRole);
    store.dispose();

    await expect(store.roles()).rejects.toThrow("RoleStore has been disposed");
    expect(() => store.getRoleName(newRole())).toThrow(PreconditionError);
    expect(source.acquired).toBe(0);
  });

  it("reads and writes names in memory", () => {
    const store = new RoleStore(new FakeSessionSource(), IdentityRole);
    const role = newRole();

    store.setRoleName(role, "Editors");
    store.setNormalizedRoleName(role, "EDITORS");

    expect(store.getRoleId(role)).toBe("role-1");
    expect(store.getRoleName(role)).toBe("Editors");
    expect(store.getNormalizedRoleName(role)).toBe("EDITORS");
  });
});

function asMap(value: unknown): Record<string, unknown> {
  return typeof value === "object" && value !== null ? { ...value } : {};
}
