// ─────────────────────────────────────────────────────────────
// Access Schema — Users, roles, sessions, operation descriptors
// ─────────────────────────────────────────────────────────────

// ── Roles ────────────────────────────────────────────────────

export const ROLES = ["admin", "teacher", "student"] as const;

export type Role = (typeof ROLES)[number];

export function isRole(value: string): value is Role {
  const roles: readonly string[] = ROLES;
  return roles.includes(value);
}

// ── Users ────────────────────────────────────────────────────

/** A registered user (create-only, never updated) */
export interface UserRecord {
  id: number;
  name: string;
  /** Unique across the credential store */
  email: string;
  role: Role;
  /** Hex SHA-256 of the password */
  passwordHash: string;
  createdAt: string;
}

// ── Sessions ─────────────────────────────────────────────────

/** The identity cached by `login` */
export interface Session {
  userId: number;
  name: string;
  email: string;
  role: Role;
}

export type SessionState =
  | { status: "logged-out" }
  | { status: "logged-in"; session: Session };

export const LOGGED_OUT: SessionState = { status: "logged-out" };

export function loggedIn(session: Session): SessionState {
  return { status: "logged-in", session };
}

// ── Operations ───────────────────────────────────────────────

/**
 * Session-level rule an operation carries on top of its login/role requirement.
 *
 *   any                  — no session constraint beyond requiresLogin / allowedRoles
 *   logged-out-only      — login
 *   logged-in-only       — logout
 *   logged-out-or-admin  — register (self-service, or an admin creating accounts)
 */
export type SessionRule =
  | "any"
  | "logged-out-only"
  | "logged-in-only"
  | "logged-out-or-admin";

export interface OperationDescriptor<Name extends string = string> {
  name: Name;
  requiresLogin: boolean;
  /** null = every role; a non-null set implies requiresLogin */
  allowedRoles: readonly Role[] | null;
  sessionRule: SessionRule;
  /** Argument synopsis shown in help */
  usage: string;
  description: string;
}

export type DenyReason =
  | { kind: "NotLoggedIn" }
  | { kind: "InsufficientRole"; required: readonly Role[]; actual: Role | null }
  | { kind: "NotApplicableInState"; operation: string; state: SessionState["status"] };

export type Authorization =
  | { allowed: true }
  | { allowed: false; reason: DenyReason };
