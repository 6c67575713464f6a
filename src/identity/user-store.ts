/**
 * @file identity/user-store
 * @description User persistence over the graph mapping layer.
 * @remarks Users own claims, external logins and tokens through `Has` and
 * belong to roles through `IsIn`. Graph-touching methods take an optional
 * trailing AbortSignal, checked before each statement is sent.
 */

import { randomUUID } from "node:crypto";
import { PreconditionError } from "../errors.js";
import { nodePattern, relationshipPattern } from "../mapping/pattern-builder.js";
import { project, projectMany } from "../mapping/property-projector.js";
import { describe, type EntityType, type TypeDescriptor } from "../mapping/type-descriptor.js";
import type { SessionScope } from "../graph/query-executor.js";
import type { SessionSource } from "../graph/session.js";
import { logger } from "../utils/logger.js";
import { requireText, requireValue } from "../utils/validation.js";
import { IdentityResult } from "./identity-result.js";
import {
  Claim,
  IdentityClaim,
  IdentityRole,
  IdentityUser,
  IdentityUserLogin,
  IdentityUserToken,
  UserLoginInfo,
} from "./models.js";
import { Has, IsIn } from "./relationships.js";
import { GraphStoreBase } from "./store-base.js";

/** Login provider under which the store keeps its own tokens. */
export const INTERNAL_LOGIN_PROVIDER = "[GraphUserStore]";
export const AUTHENTICATOR_KEY_TOKEN = "AuthenticatorKey";
export const RECOVERY_CODES_TOKEN = "RecoveryCodes";

const RECOVERY_CODE_SEPARATOR = ";";

export class UserStore<
  TUser extends IdentityUser = IdentityUser,
  TRole extends IdentityRole = IdentityRole,
> extends GraphStoreBase {
  private readonly userType: EntityType<TUser>;
  private readonly roleType: EntityType<TRole>;
  private readonly userShape: TypeDescriptor<IdentityUser>;
  private readonly roleShape: TypeDescriptor<IdentityRole>;
  private readonly claimShape: TypeDescriptor<IdentityClaim> = describe(IdentityClaim);
  private readonly loginShape: TypeDescriptor<IdentityUserLogin> = describe(IdentityUserLogin);
  private readonly tokenShape: TypeDescriptor<IdentityUserToken> = describe(IdentityUserToken);

  constructor(source: SessionSource, userType: EntityType<TUser>, roleType: EntityType<TRole>) {
    super(source);
    this.userType = requireValue(userType, "userType");
    this.roleType = requireValue(roleType, "roleType");
    this.userShape = describe(this.userType);
    this.roleShape = describe(this.roleType);
  }

  /** `(p:User... {id:$userId})` */
  private userById(): string {
    return nodePattern(this.userShape, "p", { id: "userId" });
  }

  // ── User CRUD ──────────────────────────────────────────────────────────────

  /**
   * Create the user node and copy the engine id back onto `user.entityId`.
   * Fails (without throwing) when the engine returns no node.
   */
  async create(user: TUser, signal?: AbortSignal): Promise<IdentityResult> {
    this.guard(signal);
    const target = requireValue(user, "user");

    const created = await this.executor.queryOptional(
      this.userType,
      `CREATE ${nodePattern(this.userShape, "p")} SET p += $user, p.entityId = id(p) RETURN p`,
      { user: project(target, "exclude") },
      signal,
    );
    if (created === undefined) return IdentityResult.failed();

    target.entityId = created.entityId;
    return IdentityResult.success;
  }

  /** Regenerates `concurrencyStamp`, then overwrites the stored properties. */
  async update(user: TUser, signal?: AbortSignal): Promise<IdentityResult> {
    this.guard(signal);
    const target = requireValue(user, "user");
    target.concurrencyStamp = randomUUID();

    await this.executor.run(
      `MATCH ${nodePattern(this.userShape, "p", { id: "user.id", entityId: "entityId" })} SET p += $user`,
      { user: project(target, "exclude"), entityId: target.entityId },
      signal,
    );
    return IdentityResult.success;
  }

  /** Deletes the user with its claims, logins and tokens. Roles are kept. */
  async delete(user: TUser, signal?: AbortSignal): Promise<IdentityResult> {
    this.guard(signal);
    const target = requireValue(user, "user");

    await this.executor.run(
      `MATCH ${nodePattern(this.userShape, "p", { id: "user.id", entityId: "entityId" })} ` +
        `OPTIONAL MATCH (p)${relationshipPattern(Has)}(o) ` +
        `DETACH DELETE o, p`,
      { user: project<IdentityUser>(target, "include", ["id"]), entityId: target.entityId },
      signal,
    );
    return IdentityResult.success;
  }

  async findById(userId: string, signal?: AbortSignal): Promise<TUser | undefined> {
    this.guard(signal);
    return this.executor.queryOptional(this.userType, `MATCH ${this.userById()} RETURN p`, { userId }, signal);
  }

  async findByName(normalizedUserName: string, signal?: AbortSignal): Promise<TUser | undefined> {
    this.guard(signal);
    return this.executor.queryOptional(
      this.userType,
      `MATCH ${nodePattern(this.userShape, "p", { normalizedUserName: "normalizedUserName" })} RETURN p`,
      { normalizedUserName },
      signal,
    );
  }

  async findByEmail(normalizedEmail: string, signal?: AbortSignal): Promise<TUser | undefined> {
    this.guard(signal);
    return this.executor.queryOptional(
      this.userType,
      `MATCH ${nodePattern(this.userShape, "p", { normalizedEmail: "normalizedEmail" })} RETURN p`,
      { normalizedEmail },
      signal,
    );
  }

  /** Every stored user, materialized eagerly. */
  async users(signal?: AbortSignal): Promise<TUser[]> {
    this.guard(signal);
    const result = await this.executor.queryMany(
      this.userType,
      `MATCH ${nodePattern(this.userShape, "p")} RETURN p`,
      {},
      signal,
    );
    return result.toArray();
  }

  // ── Roles ──────────────────────────────────────────────────────────────────

  /**
   * Links the user to the role with the given normalized name. The lookup and
   * the write share one session.
   *
   * @throws PreconditionError when no role has that name
   */
  async addToRole(user: TUser, normalizedRoleName: string, signal?: AbortSignal): Promise<void> {
    this.guard(signal);
    const target = requireValue(user, "user");
    requireText(normalizedRoleName, "normalizedRoleName");

    await this.executor.withSession(signal, async (scope) => {
      const role = await this.resolveRole(scope, normalizedRoleName);
      await scope.run(
        `MATCH ${this.userById()} ` +
          `MATCH ${nodePattern(this.roleShape, "r", { id: "roleId" })} ` +
          `MERGE (p)${relationshipPattern(IsIn)}(r)`,
        { userId: target.id, roleId: role.id },
      );
    });
  }

  /** @throws PreconditionError when no role has that name */
  async removeFromRole(user: TUser, normalizedRoleName: string, signal?: AbortSignal): Promise<void> {
    this.guard(signal);
    const target = requireValue(user, "user");
    requireText(normalizedRoleName, "normalizedRoleName");

    await this.executor.withSession(signal, async (scope) => {
      const role = await this.resolveRole(scope, normalizedRoleName);
      await scope.run(
        `MATCH ${this.userById()}${relationshipPattern(IsIn, "rel")}` +
          `${nodePattern(this.roleShape, "r", { id: "roleId" })} ` +
          `DELETE rel`,
        { userId: target.id, roleId: role.id },
      );
    });
  }

  private async resolveRole(scope: SessionScope, normalizedRoleName: string): Promise<TRole> {
    const role = await scope.queryOptional(
      this.roleType,
      `MATCH ${nodePattern(this.roleShape, "r", { normalizedName: "normalizedRoleName" })} RETURN r`,
      { normalizedRoleName },
    );
    if (role === undefined) {
      logger.warn("[UserStore] Role lookup failed", { normalizedRoleName });
      throw new PreconditionError(`Role '${normalizedRoleName}' not found`, { normalizedRoleName });
    }
    return role;
  }

  /** Names of the roles the user belongs to. */
  async getRoles(user: TUser, signal?: AbortSignal): Promise<string[]> {
    this.guard(signal);
    const target = requireValue(user, "user");

    const result = await this.executor.queryMany(
      this.roleType,
      `MATCH ${this.userById()}${relationshipPattern(IsIn)}${nodePattern(this.roleShape, "r")} RETURN r`,
      { userId: target.id },
      signal,
    );
    return result.toArray().flatMap((role) => (role.name === null ? [] : [role.name]));
  }

  async isInRole(user: TUser, normalizedRoleName: string, signal?: AbortSignal): Promise<boolean> {
    this.guard(signal);
    const target = requireValue(user, "user");
    requireText(normalizedRoleName, "normalizedRoleName");

    const result = await this.executor.queryMany(
      this.roleType,
      `MATCH ${this.userById()}${relationshipPattern(IsIn)}` +
        `${nodePattern(this.roleShape, "r", { normalizedName: "normalizedRoleName" })} RETURN r`,
      { userId: target.id, normalizedRoleName },
      signal,
    );
    return !result.isEmpty();
  }

  async getUsersInRole(normalizedRoleName: string, signal?: AbortSignal): Promise<TUser[]> {
    this.guard(signal);
    requireText(normalizedRoleName, "normalizedRoleName");

    const result = await this.executor.queryMany(
      this.userType,
      `MATCH ${nodePattern(this.userShape, "p")}${relationshipPattern(IsIn)}` +
        `${nodePattern(this.roleShape, "r", { normalizedName: "normalizedRoleName" })} RETURN p`,
      { normalizedRoleName },
      signal,
    );
    return result.toArray();
  }

  // ── Claims ─────────────────────────────────────────────────────────────────

  async getClaims(user: TUser, signal?: AbortSignal): Promise<Claim[]> {
    this.guard(signal);
    const target = requireValue(user, "user");

    const result = await this.executor.queryMany(
      IdentityClaim,
      `MATCH ${this.userById()}${relationshipPattern(Has)}${nodePattern(this.claimShape, "c")} RETURN c`,
      { userId: target.id },
      signal,
    );
    return result.map((claim) => claim.toClaim());
  }

  /** Adds all claims in one statement; an empty list sends nothing. */
  async addClaims(user: TUser, claims: Iterable<Claim>, signal?: AbortSignal): Promise<void> {
    this.guard(signal);
    const target = requireValue(user, "user");
    const rows = projectMany(
      Array.from(requireValue(claims, "claims"), (claim) => IdentityClaim.fromClaim(claim)),
      "include",
      ["claimType", "claimValue"],
    );
    if (rows.length === 0) return;

    await this.executor.run(
      `MATCH ${this.userById()} ` +
        `UNWIND $claims AS row ` +
        `CREATE (p)${relationshipPattern(Has)}${nodePattern(this.claimShape, "c")} ` +
        `SET c += row, c.entityId = id(c)`,
      { userId: target.id, claims: rows },
      signal,
    );
  }

  /** Rewrites every claim node of the user equal to `claim`. */
  async replaceClaim(user: TUser, claim: Claim, newClaim: Claim, signal?: AbortSignal): Promise<void> {
    this.guard(signal);
    const target = requireValue(user, "user");
    const previous = requireValue(claim, "claim");
    const next = requireValue(newClaim, "newClaim");

    await this.executor.run(
      `MATCH ${this.userById()}${relationshipPattern(Has)}` +
        `${nodePattern(this.claimShape, "c", { claimType: "oldClaimType", claimValue: "oldClaimValue" })} ` +
        `SET c.claimType = $newClaimType, c.claimValue = $newClaimValue`,
      {
        userId: target.id,
        oldClaimType: previous.type,
        oldClaimValue: previous.value,
        newClaimType: next.type,
        newClaimValue: next.value,
      },
      signal,
    );
  }

  /** Removes all claims in one statement; an empty list sends nothing. */
  async removeClaims(user: TUser, claims: Iterable<Claim>, signal?: AbortSignal): Promise<void> {
    this.guard(signal);
    const target = requireValue(user, "user");
    const rows = projectMany(
      Array.from(requireValue(claims, "claims"), (claim) => IdentityClaim.fromClaim(claim)),
      "include",
      ["claimType", "claimValue"],
    );
    if (rows.length === 0) return;

    await this.executor.run(
      `UNWIND $claims AS row ` +
        `MATCH ${this.userById()}${relationshipPattern(Has)}${nodePattern(this.claimShape, "c")} ` +
        `WHERE c.claimType = row.claimType AND c.claimValue = row.claimValue ` +
        `DETACH DELETE c`,
      { userId: target.id, claims: rows },
      signal,
    );
  }

  async getUsersForClaim(claim: Claim, signal?: AbortSignal): Promise<TUser[]> {
    this.guard(signal);
    const wanted = requireValue(claim, "claim");

    const result = await this.executor.queryMany(
      this.userType,
      `MATCH ${nodePattern(this.userShape, "p")}${relationshipPattern(Has, undefined, "both")}` +
        `${nodePattern(this.claimShape, "c", { claimType: "claimType", claimValue: "claimValue" })} ` +
        `RETURN DISTINCT p`,
      { claimType: wanted.type, claimValue: wanted.value },
      signal,
    );
    return result.toArray();
  }

  // ── External logins ────────────────────────────────────────────────────────

  async addLogin(user: TUser, login: UserLoginInfo, signal?: AbortSignal): Promise<void> {
    this.guard(signal);
    const target = requireValue(user, "user");
    const entity = IdentityUserLogin.fromLoginInfo(requireValue(login, "login"));

    await this.executor.run(
      `MATCH ${this.userById()} ` +
        `CREATE (p)${relationshipPattern(Has)}${nodePattern(this.loginShape, "l")} ` +
        `SET l += $login, l.entityId = id(l)`,
      { userId: target.id, login: project(entity, "exclude") },
      signal,
    );
  }

  async removeLogin(
    user: TUser,
    loginProvider: string,
    providerKey: string,
    signal?: AbortSignal,
  ): Promise<void> {
    this.guard(signal);
    const target = requireValue(user, "user");

    await this.executor.run(
      `MATCH ${this.userById()}${relationshipPattern(Has)}${this.loginByKey()} DETACH DELETE l`,
      { userId: target.id, loginProvider, providerKey },
      signal,
    );
  }

  async getLogins(user: TUser, signal?: AbortSignal): Promise<UserLoginInfo[]> {
    this.guard(signal);
    const target = requireValue(user, "user");

    const result = await this.executor.queryMany(
      IdentityUserLogin,
      `MATCH ${this.userById()}${relationshipPattern(Has)}${nodePattern(this.loginShape, "l")} RETURN l`,
      { userId: target.id },
      signal,
    );
    return result.map((login) => login.toLoginInfo());
  }

  async findByLogin(
    loginProvider: string,
    providerKey: string,
    signal?: AbortSignal,
  ): Promise<TUser | undefined> {
    this.guard(signal);
    return this.executor.queryOptional(
      this.userType,
      `MATCH ${nodePattern(this.userShape, "p")}${relationshipPattern(Has)}${this.loginByKey()} RETURN p`,
      { loginProvider, providerKey },
      signal,
    );
  }

  private loginByKey(): string {
    return nodePattern(this.loginShape, "l", {
      loginProvider: "loginProvider",
      providerKey: "providerKey",
    });
  }

  // ── Tokens ─────────────────────────────────────────────────────────────────

  /** Creates the token on first use and overwrites its value afterwards. */
  async setToken(
    user: TUser,
    loginProvider: string,
    name: string,
    value: string | null,
    signal?: AbortSignal,
  ): Promise<void> {
    this.guard(signal);
    const target = requireValue(user, "user");

    await this.executor.withSession(signal, (scope) =>
      this.writeToken(scope, target, loginProvider, name, value),
    );
  }

  async removeToken(user: TUser, loginProvider: string, name: string, signal?: AbortSignal): Promise<void> {
    this.guard(signal);
    const target = requireValue(user, "user");

    await this.executor.run(
      `MATCH ${this.userById()}${relationshipPattern(Has)}${this.tokenByName()} DETACH DELETE t`,
      { userId: target.id, loginProvider, name },
      signal,
    );
  }

  /** Token value, or null when the token does not exist. */
  async getToken(
    user: TUser,
    loginProvider: string,
    name: string,
    signal?: AbortSignal,
  ): Promise<string | null> {
    this.guard(signal);
    const target = requireValue(user, "user");

    return this.executor.withSession(signal, (scope) =>
      this.readToken(scope, target, loginProvider, name),
    );
  }

  private async readToken(
    scope: SessionScope,
    user: TUser,
    loginProvider: string,
    name: string,
  ): Promise<string | null> {
    const token = await scope.queryOptional(
      IdentityUserToken,
      `MATCH ${this.userById()}${relationshipPattern(Has)}${this.tokenByName()} RETURN t`,
      { userId: user.id, loginProvider, name },
    );
    return token?.value ?? null;
  }

  private writeToken(
    scope: SessionScope,
    user: TUser,
    loginProvider: string,
    name: string,
    value: string | null,
  ): Promise<void> {
    return scope.run(
      `MATCH ${this.userById()} ` +
        `MERGE (p)${relationshipPattern(Has)}${this.tokenByName()} ` +
        `ON CREATE SET t.entityId = id(t) ` +
        `SET t.value = $value`,
      { userId: user.id, loginProvider, name, value },
    );
  }

  private tokenByName(): string {
    return nodePattern(this.tokenShape, "t", { loginProvider: "loginProvider", name: "name" });
  }

  // ── Authenticator key and recovery codes ──────────────────────────────────

  setAuthenticatorKey(user: TUser, key: string, signal?: AbortSignal): Promise<void> {
    return this.setToken(user, INTERNAL_LOGIN_PROVIDER, AUTHENTICATOR_KEY_TOKEN, key, signal);
  }

  getAuthenticatorKey(user: TUser, signal?: AbortSignal): Promise<string | null> {
    return this.getToken(user, INTERNAL_LOGIN_PROVIDER, AUTHENTICATOR_KEY_TOKEN, signal);
  }

  /** Replaces the stored recovery codes. */
  replaceCodes(user: TUser, recoveryCodes: Iterable<string>, signal?: AbortSignal): Promise<void> {
    const merged = Array.from(requireValue(recoveryCodes, "recoveryCodes")).join(RECOVERY_CODE_SEPARATOR);
    return this.setToken(user, INTERNAL_LOGIN_PROVIDER, RECOVERY_CODES_TOKEN, merged, signal);
  }

  /**
   * Consumes a recovery code. The codes are read and rewritten in one session.
   * @returns true when the code was valid and has been removed
   */
  async redeemCode(user: TUser, code: string, signal?: AbortSignal): Promise<boolean> {
    this.guard(signal);
    const target = requireValue(user, "user");
    requireValue(code, "code");

    return this.executor.withSession(signal, async (scope) => {
      const codes = await this.readCodes(scope, target);
      if (!codes.includes(code)) return false;

      const remaining = codes.filter((candidate) => candidate !== code);
      await this.writeToken(
        scope,
        target,
        INTERNAL_LOGIN_PROVIDER,
        RECOVERY_CODES_TOKEN,
        remaining.join(RECOVERY_CODE_SEPARATOR),
      );
      return true;
    });
  }

  async countCodes(user: TUser, signal?: AbortSignal): Promise<number> {
    this.guard(signal);
    const target = requireValue(user, "user");
    const codes = await this.executor.withSession(signal, (scope) => this.readCodes(scope, target));
    return codes.length;
  }

  private async readCodes(scope: SessionScope, user: TUser): Promise<string[]> {
    const merged = await this.readToken(scope, user, INTERNAL_LOGIN_PROVIDER, RECOVERY_CODES_TOKEN);
    if (merged === null || merged.length === 0) return [];
    return merged.split(RECOVERY_CODE_SEPARATOR).filter((code) => code.length > 0);
  }

  // ── In-memory accessors ────────────────────────────────────────────────────

  private checked(user: TUser): TUser {
    this.throwIfDisposed();
    return requireValue(user, "user");
  }

  getUserId(user: TUser): string {
    return this.checked(user).id;
  }

  getUserName(user: TUser): string | null {
    return this.checked(user).userName;
  }

  setUserName(user: TUser, userName: string | null): void {
    this.checked(user).userName = userName;
  }

  getNormalizedUserName(user: TUser): string | null {
    return this.checked(user).normalizedUserName;
  }

  setNormalizedUserName(user: TUser, normalizedName: string | null): void {
    this.checked(user).normalizedUserName = normalizedName;
  }

  getEmail(user: TUser): string | null {
    return this.checked(user).email;
  }

  setEmail(user: TUser, email: string | null): void {
    this.checked(user).email = email;
  }

  getNormalizedEmail(user: TUser): string | null {
    return this.checked(user).normalizedEmail;
  }

  setNormalizedEmail(user: TUser, normalizedEmail: string | null): void {
    this.checked(user).normalizedEmail = normalizedEmail;
  }

  getEmailConfirmed(user: TUser): boolean {
    return this.checked(user).emailConfirmed;
  }

  setEmailConfirmed(user: TUser, confirmed: boolean): void {
    this.checked(user).emailConfirmed = confirmed;
  }

  getPhoneNumber(user: TUser): string | null {
    return this.checked(user).phoneNumber;
  }

  setPhoneNumber(user: TUser, phoneNumber: string | null): void {
    this.checked(user).phoneNumber = phoneNumber;
  }

  getPhoneNumberConfirmed(user: TUser): boolean {
    return this.checked(user).phoneNumberConfirmed;
  }

  setPhoneNumberConfirmed(user: TUser, confirmed: boolean): void {
    this.checked(user).phoneNumberConfirmed = confirmed;
  }

  getPasswordHash(user: TUser): string | null {
    return this.checked(user).passwordHash;
  }

  setPasswordHash(user: TUser, passwordHash: string | null): void {
    this.checked(user).passwordHash = passwordHash;
  }

  hasPassword(user: TUser): boolean {
    return this.checked(user).passwordHash !== null;
  }

  getSecurityStamp(user: TUser): string | null {
    return this.checked(user).securityStamp;
  }

  setSecurityStamp(user: TUser, stamp: string): void {
    this.checked(user).securityStamp = requireValue(stamp, "stamp");
  }

  getTwoFactorEnabled(user: TUser): boolean {
    return this.checked(user).twoFactorEnabled;
  }

  setTwoFactorEnabled(user: TUser, enabled: boolean): void {
    this.checked(user).twoFactorEnabled = enabled;
  }

  getLockoutEndDate(user: TUser): Date | null {
    return this.checked(user).lockoutEnd;
  }

  setLockoutEndDate(user: TUser, lockoutEnd: Date | null): void {
    this.checked(user).lockoutEnd = lockoutEnd;
  }

  getLockoutEnabled(user: TUser): boolean {
    return this.checked(user).lockoutEnabled;
  }

  setLockoutEnabled(user: TUser, enabled: boolean): void {
    this.checked(user).lockoutEnabled = enabled;
  }

  getAccessFailedCount(user: TUser): number {
    return this.checked(user).accessFailedCount;
  }

  /** @returns the incremented count */
  incrementAccessFailedCount(user: TUser): number {
    const target = this.checked(user);
    target.accessFailedCount += 1;
    return target.accessFailedCount;
  }

  resetAccessFailedCount(user: TUser): void {
    this.checked(user).accessFailedCount = 0;
  }
}
