/**
 * @file identity/role-store
 * @description Role persistence over the graph mapping layer.
 * @remarks Roles are nodes labelled with the role class chain; claims hang off
 * them through `Has`. Every graph-touching method opens one session, runs its
 * statements and closes it.
 */

import { randomUUID } from "node:crypto";
import { nodePattern, relationshipPattern } from "../mapping/pattern-builder.js";
import { project } from "../mapping/property-projector.js";
import { describe, type EntityType, type TypeDescriptor } from "../mapping/type-descriptor.js";
import type { SessionSource } from "../graph/session.js";
import { requireValue } from "../utils/validation.js";
import { IdentityResult } from "./identity-result.js";
import { Claim, IdentityClaim, IdentityRole } from "./models.js";
import { Has } from "./relationships.js";
import { GraphStoreBase } from "./store-base.js";

export class RoleStore<TRole extends IdentityRole = IdentityRole> extends GraphStoreBase {
  private readonly roleType: EntityType<TRole>;
  private readonly roleShape: TypeDescriptor<IdentityRole>;
  private readonly claimShape: TypeDescriptor<IdentityClaim> = describe(IdentityClaim);

  constructor(source: SessionSource, roleType: EntityType<TRole>) {
    super(source);
    this.roleType = requireValue(roleType, "roleType");
    this.roleShape = describe(this.roleType);
  }

  // ── Role CRUD ──────────────────────────────────────────────────────────────

  /**
   * Create the role node and copy the engine id back onto `role.entityId`.
   * Fails (without throwing) when the engine returns no node.
   */
  async create(role: TRole, signal?: AbortSignal): Promise<IdentityResult> {
    this.guard(signal);
    const target = requireValue(role, "role");

    const created = await this.executor.queryOptional(
      this.roleType,
      `CREATE ${nodePattern(this.roleShape, "p")} SET p += $role, p.entityId = id(p) RETURN p`,
      { role: project(target, "exclude") },
      signal,
    );
    if (created === undefined) return IdentityResult.failed();

    target.entityId = created.entityId;
    return IdentityResult.success;
  }

  /** Regenerates `concurrencyStamp`, then overwrites the stored properties. */
  async update(role: TRole, signal?: AbortSignal): Promise<IdentityResult> {
    this.guard(signal);
    const target = requireValue(role, "role");
    target.concurrencyStamp = randomUUID();

    await this.executor.run(
      `MATCH ${nodePattern(this.roleShape, "p", { id: "role.id", entityId: "entityId" })} SET p += $role`,
      { role: project(target, "exclude"), entityId: target.entityId },
      signal,
    );
    return IdentityResult.success;
  }

  /** Deletes the role, its relationships and the claims it owns. */
  async delete(role: TRole, signal?: AbortSignal): Promise<IdentityResult> {
    this.guard(signal);
    const target = requireValue(role, "role");

    await this.executor.run(
      `MATCH ${nodePattern(this.roleShape, "p", { id: "role.id", entityId: "entityId" })} ` +
        `OPTIONAL MATCH (p)${relationshipPattern(Has)}${nodePattern(this.claimShape, "c")} ` +
        `DETACH DELETE c, p`,
      { role: project<IdentityRole>(target, "include", ["id"]), entityId: target.entityId },
      signal,
    );
    return IdentityResult.success;
  }

  async findById(roleId: string, signal?: AbortSignal): Promise<TRole | undefined> {
    this.guard(signal);
    return this.executor.queryOptional(
      this.roleType,
      `MATCH ${nodePattern(this.roleShape, "p", { id: "roleId" })} RETURN p`,
      { roleId },
      signal,
    );
  }

  async findByName(normalizedName: string, signal?: AbortSignal): Promise<TRole | undefined> {
    this.guard(signal);
    return this.executor.queryOptional(
      this.roleType,
      `MATCH ${nodePattern(this.roleShape, "p", { normalizedName: "normalizedName" })} RETURN p`,
      { normalizedName },
      signal,
    );
  }

  /** Every stored role, materialized eagerly. */
  async roles(signal?: AbortSignal): Promise<TRole[]> {
    this.guard(signal);
    const result = await this.executor.queryMany(
      this.roleType,
      `MATCH ${nodePattern(this.roleShape, "p")} RETURN p`,
      {},
      signal,
    );
    return result.toArray();
  }

  // ── Claims ─────────────────────────────────────────────────────────────────

  async getClaims(role: TRole, signal?: AbortSignal): Promise<Claim[]> {
    this.guard(signal);
    const target = requireValue(role, "role");

    const result = await this.executor.queryMany(
      IdentityClaim,
      `MATCH ${nodePattern(this.roleShape, "p", { id: "roleId" })}${relationshipPattern(Has)}${nodePattern(this.claimShape, "c")} RETURN c`,
      { roleId: target.id },
      signal,
    );
    return result.map((claim) => claim.toClaim());
  }

  async addClaim(role: TRole, claim: Claim, signal?: AbortSignal): Promise<void> {
    this.guard(signal);
    const target = requireValue(role, "role");
    const entity = IdentityClaim.fromClaim(requireValue(claim, "claim"));

    await this.executor.run(
      `MATCH ${nodePattern(this.roleShape, "p", { id: "roleId" })} ` +
        `CREATE (p)${relationshipPattern(Has)}${nodePattern(this.claimShape, "c")} ` +
        `SET c += $claim, c.entityId = id(c)`,
      { roleId: target.id, claim: project(entity, "include", ["claimType", "claimValue"]) },
      signal,
    );
  }

  async removeClaim(role: TRole, claim: Claim, signal?: AbortSignal): Promise<void> {
    this.guard(signal);
    const target = requireValue(role, "role");
    const removed = requireValue(claim, "claim");

    await this.executor.run(
      `MATCH ${nodePattern(this.roleShape, "p", { id: "roleId" })}${relationshipPattern(Has)}` +
        `${nodePattern(this.claimShape, "c", { claimType: "claimType", claimValue: "claimValue" })} ` +
        `DETACH DELETE c`,
      { roleId: target.id, claimType: removed.type, claimValue: removed.value },
      signal,
    );
  }

  // ── In-memory accessors ────────────────────────────────────────────────────

  getRoleId(role: TRole): string {
    this.throwIfDisposed();
    return requireValue(role, "role").id;
  }

  getRoleName(role: TRole): string | null {
    this.throwIfDisposed();
    return requireValue(role, "role").name;
  }

  setRoleName(role: TRole, roleName: string | null): void {
    this.throwIfDisposed();
    requireValue(role, "role").name = roleName;
  }

  getNormalizedRoleName(role: TRole): string | null {
    this.throwIfDisposed();
    return requireValue(role, "role").normalizedName;
  }

  setNormalizedRoleName(role: TRole, normalizedName: string | null): void {
    this.throwIfDisposed();
    requireValue(role, "role").normalizedName = normalizedName;
  }
}
