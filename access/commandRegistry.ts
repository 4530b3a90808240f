// ─────────────────────────────────────────────────────────────
// Command Registry — Operation descriptors & the visibility gate
//
// Each CLI operation is described once in OPERATIONS. A single
// pure predicate (authorize) decides, for a session state,
// whether an operation may run; visibility in help listings is
// that same predicate, so nothing can be hidden yet invocable
// or listed yet refused.
//
// Gate order:
//   1. Session rule   (login / logout / register)
//   2. Login          (requiresLogin, or any allowedRoles)
//   3. Role           (allowedRoles)
// ─────────────────────────────────────────────────────────────

import type {
  Authorization,
  OperationDescriptor,
  Role,
  SessionState,
} from "../schema/accessSchema";

// ── Operation Table ──────────────────────────────────────────

const STAFF: readonly Role[] = ["teacher", "admin"];

export const OPERATIONS = [
  {
    name: "register",
    requiresLogin: false,
    allowedRoles: null,
    sessionRule: "logged-out-or-admin",
    usage: "<name> <email> <role>",
    description: "Register a new user (students may self-register; admins create any role)",
  },
  {
    name: "login",
    requiresLogin: false,
    allowedRoles: null,
    sessionRule: "logged-out-only",
    usage: "<email>",
    description: "Log in as an existing user",
  },
  {
    name: "logout",
    requiresLogin: false,
    allowedRoles: null,
    sessionRule: "logged-in-only",
    usage: "",
    description: "Log out the current user",
  },
  {
    name: "upload",
    requiresLogin: true,
    allowedRoles: STAFF,
    sessionRule: "any",
    usage: "<file>",
    description: "Upload a document (.pdf or .txt)",
  },
  {
    name: "summarize",
    requiresLogin: true,
    allowedRoles: null,
    sessionRule: "any",
    usage: "<docname>",
    description: "Generate a summary of an uploaded document",
  },
  {
    name: "quiz",
    requiresLogin: true,
    allowedRoles: STAFF,
    sessionRule: "any",
    usage: "<docname> [--n N]",
    description: "Generate a multiple-choice quiz and answer key",
  },
  {
    name: "grade",
    requiresLogin: true,
    allowedRoles: STAFF,
    sessionRule: "any",
    usage: "<response_file> <answer_key_file>",
    description: "Grade quiz responses against an answer key",
  },
  {
    name: "list-docs",
    requiresLogin: true,
    allowedRoles: null,
    sessionRule: "any",
    usage: "",
    description: "List uploaded documents",
  },
  {
    name: "list-quizzes",
    requiresLogin: true,
    allowedRoles: null,
    sessionRule: "any",
    usage: "",
    description: "List saved quizzes",
  },
  {
    name: "read-quiz",
    requiresLogin: true,
    allowedRoles: null,
    sessionRule: "any",
    usage: "<filename>",
    description: "Print a saved quiz",
  },
  {
    name: "delete-doc",
    requiresLogin: true,
    allowedRoles: STAFF,
    sessionRule: "any",
    usage: "<name>",
    description: "Delete a document you own (admins: any document)",
  },
] as const satisfies readonly OperationDescriptor[];

export type CommandName = (typeof OPERATIONS)[number]["name"];

// ── Lookup ───────────────────────────────────────────────────

export function findOperation(name: string): OperationDescriptor<CommandName> | null {
  return OPERATIONS.find((op) => op.name === name) ?? null;
}

// ── Gate ─────────────────────────────────────────────────────

const ALLOW: Authorization = { allowed: true };

/**
 * Decide whether `op` may run in `state`.
 */
export function authorize(op: OperationDescriptor, state: SessionState): Authorization {
  const role = state.status === "logged-in" ? state.session.role : null;

  switch (op.sessionRule) {
    case "logged-out-only":
      return role === null ? ALLOW : notApplicable(op, state);
    case "logged-in-only":
      return role !== null ? ALLOW : notApplicable(op, state);
    case "logged-out-or-admin":
      if (role === null || role === "admin") return ALLOW;
      return { allowed: false, reason: { kind: "InsufficientRole", required: ["admin"], actual: role } };
    case "any":
      break;
  }

  // allowedRoles implies login: a role is only known once logged in
  if ((op.requiresLogin || op.allowedRoles !== null) && role === null) {
    return { allowed: false, reason: { kind: "NotLoggedIn" } };
  }

  if (op.allowedRoles !== null && (role === null || !op.allowedRoles.includes(role))) {
    return {
      allowed: false,
      reason: { kind: "InsufficientRole", required: op.allowedRoles, actual: role },
    };
  }

  return ALLOW;
}

/** Whether `op` is listed for `state` */
export function visible(op: OperationDescriptor, state: SessionState): boolean {
  return authorize(op, state).allowed;
}

export function listVisible(state: SessionState): OperationDescriptor<CommandName>[] {
  return OPERATIONS.filter((op) => visible(op, state));
}

function notApplicable(op: OperationDescriptor, state: SessionState): Authorization {
  return {
    allowed: false,
    reason: { kind: "NotApplicableInState", operation: op.name, state: state.status },
  };
}
