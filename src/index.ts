/**
 * Graph identity store
 *
 * Persists identity users, roles, claims, logins and tokens as nodes and
 * relationships in a Bolt-speaking property graph. The mapping layer
 * (type descriptors, pattern builder, property projector, query executor,
 * result materializer) is exported for stores of other entity types.
 */

import { GraphDriverProvider } from "./graph/client.js";
import type { SessionSource } from "./graph/session.js";
import type { StoreOptionsInput } from "./config.js";
import type { EntityType } from "./mapping/type-descriptor.js";
import { IdentityRole, IdentityUser } from "./identity/models.js";
import { RoleStore } from "./identity/role-store.js";
import { UserStore } from "./identity/user-store.js";

// ── Mapping layer ─────────────────────────────────────────────────────────────
export {
  IDENTIFIER_FIELD,
  describe,
  describeConstructor,
  writableFieldNames,
} from "./mapping/type-descriptor.js";
export type {
  EntityType,
  FieldDescriptor,
  FieldKind,
  FieldName,
  TypeDescriptor,
  TypeShape,
} from "./mapping/type-descriptor.js";
export { labelsOf, nodePattern, relationshipPattern } from "./mapping/pattern-builder.js";
export type { InlineFilter, RelationshipDirection } from "./mapping/pattern-builder.js";
export { project, projectMany } from "./mapping/property-projector.js";
export type { ProjectionMode, PropertyProjection } from "./mapping/property-projector.js";
export { materialize, toNativeValue } from "./mapping/result-materializer.js";

// ── Execution ─────────────────────────────────────────────────────────────────
export { QueryExecutor, SessionScope } from "./graph/query-executor.js";
export { QueryResult } from "./graph/query-result.js";
export { throwIfCancelled } from "./graph/cancellation.js";
export { GraphDriverProvider, connectBolt, toDriverParams, toDriverValue } from "./graph/client.js";
export type { BoltConnection, BoltConnector } from "./graph/client.js";
export type {
  CypherStatement,
  GraphQueryOutput,
  GraphRecord,
  GraphSession,
  QueryParams,
  SessionSource,
} from "./graph/session.js";

// ── Configuration and errors ──────────────────────────────────────────────────
export { StoreOptionsSchema, loadStoreOptionsFromEnv, parseStoreOptions } from "./config.js";
export type { StoreOptions, StoreOptionsInput } from "./config.js";
export {
  CancelledError,
  GraphIdentityError,
  MaterializationError,
  PreconditionError,
  isEngineError,
  isGraphIdentityError,
} from "./errors.js";
export type { GraphIdentityErrorCode } from "./errors.js";

// ── Identity stores ───────────────────────────────────────────────────────────
export {
  Claim,
  IdentityClaim,
  IdentityRole,
  IdentityUser,
  IdentityUserLogin,
  IdentityUserToken,
  UserLoginInfo,
} from "./identity/models.js";
export { Has, IsIn } from "./identity/relationships.js";
export { DEFAULT_IDENTITY_ERROR, IdentityResult } from "./identity/identity-result.js";
export type { IdentityError } from "./identity/identity-result.js";
export { GraphStoreBase } from "./identity/store-base.js";
export { RoleStore } from "./identity/role-store.js";
export {
  AUTHENTICATOR_KEY_TOKEN,
  INTERNAL_LOGIN_PROVIDER,
  RECOVERY_CODES_TOKEN,
  UserStore,
} from "./identity/user-store.js";

export interface IdentityStoresConfig<TUser extends IdentityUser, TRole extends IdentityRole> {
  /** Existing session source, or options for a new `GraphDriverProvider`. */
  connection: SessionSource | StoreOptionsInput;
  userType: EntityType<TUser>;
  roleType: EntityType<TRole>;
}

export interface IdentityStores<TUser extends IdentityUser, TRole extends IdentityRole> {
  source: SessionSource;
  users: UserStore<TUser, TRole>;
  roles: RoleStore<TRole>;
  /** Disposes both stores, then closes the provider if this call created it. */
  close(): Promise<void>;
}

function isSessionSource(value: SessionSource | StoreOptionsInput): value is SessionSource {
  return "session" in value && typeof value.session === "function";
}

/**
 * Wire a user store and a role store over one session source.
 *
 * @example
 * ```ts
 * const stores = createIdentityStores({
 *   connection: loadStoreOptionsFromEnv(),
 *   userType: IdentityUser,
 *   roleType: IdentityRole,
 * });
 * await stores.users.create(new IdentityUser("alice"));
 * await stores.close();
 * ```
 */
export function createIdentityStores<TUser extends IdentityUser, TRole extends IdentityRole>(
  config: IdentityStoresConfig<TUser, TRole>,
): IdentityStores<TUser, TRole> {
  let source: SessionSource;
  let owned: GraphDriverProvider | undefined;
  if (isSessionSource(config.connection)) {
    source = config.connection;
  } else {
    owned = new GraphDriverProvider(config.connection);
    source = owned;
  }

  const users = new UserStore(source, config.userType, config.roleType);
  const roles = new RoleStore(source, config.roleType);

  return {
    source,
    users,
    roles,
    async close() {
      users.dispose();
      roles.dispose();
      await owned?.close();
    },
  };
}
