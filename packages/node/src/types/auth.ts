/**
 * Authentication and authorization types.
 *
 * An API key (X-Api-Key header) carries an HTTP role and the protocol
 * principal the key acts as. The protocol enforces its own principal
 * checks; the role only gates which routes a key may reach.
 *
 * Role hierarchy: admin > operator > viewer
 */

// =============================================================================
// Roles & Permissions
// =============================================================================

export type Role = "admin" | "operator" | "viewer";

export type Permission = "read" | "write" | "admin";

export const ROLE_PERMISSIONS: Record<Role, readonly Permission[]> = {
  viewer: ["read"],
  operator: ["read", "write"],
  admin: ["read", "write", "admin"],
};

export function hasPermission(role: Role, permission: Permission): boolean {
  return ROLE_PERMISSIONS[role].includes(permission);
}

// =============================================================================
// Auth Context
// =============================================================================

/**
 * Resolved caller, set by the auth middleware.
 * "anonymous" only occurs when the node runs without API keys.
 */
export interface AuthContext {
  readonly type: "api-key" | "anonymous";
  readonly role: Role;
  /** Protocol identity used as the caller of every operation */
  readonly principal: string;
}

export interface ApiKeyRecord {
  readonly key: string;
  readonly role: Role;
  readonly principal: string;
}
