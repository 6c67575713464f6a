/**
 * @file identity/models
 * @description Entity classes persisted by the identity stores.
 * @remarks Every class must be constructible without arguments: the mapping
 * layer instantiates it to discover fields. Fields that default to `null`
 * declare their kind in `fieldKinds` so returned values can be checked.
 */

import { randomUUID } from "node:crypto";
import type { FieldKind } from "../mapping/type-descriptor.js";

/**
 * A user of the application. Subclass it to add fields; the subclass name
 * becomes an extra label in front of `IdentityUser`.
 */
export class IdentityUser {
  static readonly fieldKinds: Readonly<Record<string, FieldKind>> = {
    userName: "string",
    normalizedUserName: "string",
    email: "string",
    normalizedEmail: "string",
    passwordHash: "string",
    securityStamp: "string",
    phoneNumber: "string",
    lockoutEnd: "date",
    entityId: "number",
  };

  id: string = randomUUID();
  userName: string | null = null;
  normalizedUserName: string | null = null;
  email: string | null = null;
  normalizedEmail: string | null = null;
  emailConfirmed = false;
  /** Salted and hashed representation of the password; hashing happens outside the store. */
  passwordHash: string | null = null;
  /** Changes whenever credentials change. */
  securityStamp: string | null = null;
  /** Regenerated on every update. Not verified on write. */
  concurrencyStamp: string = randomUUID();
  phoneNumber: string | null = null;
  phoneNumberConfirmed = false;
  twoFactorEnabled = false;
  /** Lockout end in UTC; a past value means the user is not locked out. */
  lockoutEnd: Date | null = null;
  lockoutEnabled = false;
  accessFailedCount = 0;
  /** Engine-assigned node id, set on create. */
  entityId: number | null = null;

  constructor(userName?: string) {
    if (userName !== undefined) {
      this.userName = userName;
    }
  }

  toString(): string {
    return this.userName ?? "";
  }
}

export class IdentityRole {
  static readonly fieldKinds: Readonly<Record<string, FieldKind>> = {
    name: "string",
    normalizedName: "string",
    entityId: "number",
  };

  id: string = randomUUID();
  name: string | null = null;
  normalizedName: string | null = null;
  concurrencyStamp: string = randomUUID();
  entityId: number | null = null;

  constructor(roleName?: string) {
    if (roleName !== undefined) {
      this.name = roleName;
    }
  }

  toString(): string {
    return this.name ?? "";
  }
}

/** A statement about a user or role, as handed to and returned from the stores. */
export class Claim {
  readonly type: string;
  readonly value: string;

  constructor(type: string, value: string) {
    this.type = type;
    this.value = value;
  }
}

/** Claim node attached to a user or role through `Has`. */
export class IdentityClaim {
  static readonly fieldKinds: Readonly<Record<string, FieldKind>> = {
    claimType: "string",
    claimValue: "string",
    entityId: "number",
  };

  claimType: string | null = null;
  claimValue: string | null = null;
  entityId: number | null = null;

  static fromClaim(claim: Claim): IdentityClaim {
    const entity = new IdentityClaim();
    entity.initializeFromClaim(claim);
    return entity;
  }

  initializeFromClaim(claim: Claim): void {
    this.claimType = claim.type;
    this.claimValue = claim.value;
  }

  toClaim(): Claim {
    return new Claim(this.claimType ?? "", this.claimValue ?? "");
  }
}

/** External login as seen by callers. */
export class UserLoginInfo {
  readonly loginProvider: string;
  readonly providerKey: string;
  readonly providerDisplayName: string | null;

  constructor(loginProvider: string, providerKey: string, providerDisplayName: string | null = null) {
    this.loginProvider = loginProvider;
    this.providerKey = providerKey;
    this.providerDisplayName = providerDisplayName;
  }
}

/** Login node attached to a user through `Has`. */
export class IdentityUserLogin {
  static readonly fieldKinds: Readonly<Record<string, FieldKind>> = {
    loginProvider: "string",
    providerKey: "string",
    providerDisplayName: "string",
    entityId: "number",
  };

  loginProvider: string | null = null;
  providerKey: string | null = null;
  providerDisplayName: string | null = null;
  entityId: number | null = null;

  static fromLoginInfo(login: UserLoginInfo): IdentityUserLogin {
    const entity = new IdentityUserLogin();
    entity.loginProvider = login.loginProvider;
    entity.providerKey = login.providerKey;
    entity.providerDisplayName = login.providerDisplayName;
    return entity;
  }

  toLoginInfo(): UserLoginInfo {
    return new UserLoginInfo(this.loginProvider ?? "", this.providerKey ?? "", this.providerDisplayName);
  }
}

/** Authentication token node attached to a user through `Has`. */
export class IdentityUserToken {
  static readonly fieldKinds: Readonly<Record<string, FieldKind>> = {
    loginProvider: "string",
    name: "string",
    value: "string",
    entityId: "number",
  };

  loginProvider: string | null = null;
  name: string | null = null;
  value: string | null = null;
  entityId: number | null = null;
}
