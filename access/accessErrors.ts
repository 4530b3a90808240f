// ─────────────────────────────────────────────────────────────
// Access Errors — Error taxonomy for every command
//
// Every failure a user can cause is a DocCliError with a code.
// The runner turns them into a message and a non-zero exit;
// anything else is treated as a fatal error.
// ─────────────────────────────────────────────────────────────

import type { DenyReason } from "../schema/accessSchema";

export type DocCliErrorCode =
  // Gate
  | "NotLoggedIn"
  | "InsufficientRole"
  | "NotApplicableInState"
  // Data-dependent authorization
  | "NotOwner"
  | "AdminOnlyRole"
  | "AdminAlreadyExists"
  // Credentials
  | "DuplicateEmail"
  | "InvalidCredentials"
  | "UserNotFound"
  | "PasswordMismatch"
  // Resources
  | "UnsupportedFileType"
  | "ResourceNotFound"
  | "ExternalServiceFailure"
  | "CorruptStore"
  // Usage
  | "InvalidArguments"
  | "UnknownCommand";

const USAGE_CODES: ReadonlySet<DocCliErrorCode> = new Set<DocCliErrorCode>([
  "InvalidArguments",
  "UnknownCommand",
]);

export class DocCliError extends Error {
  readonly code: DocCliErrorCode;

  constructor(code: DocCliErrorCode, message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = "DocCliError";
    this.code = code;
  }

  /** 2 for usage mistakes, 1 for everything else */
  get exitCode(): number {
    return USAGE_CODES.has(this.code) ? 2 : 1;
  }
}

export function isDocCliError(err: unknown): err is DocCliError {
  return err instanceof DocCliError;
}

/** Convert a gate denial into the error reported to the user */
export function denialError(reason: DenyReason): DocCliError {
  switch (reason.kind) {
    case "NotLoggedIn":
      return new DocCliError("NotLoggedIn", "Not logged in. Please `login` first.");
    case "InsufficientRole":
      return new DocCliError(
        "InsufficientRole",
        `Permission denied: requires one of ${reason.required.join(", ")}` +
          (reason.actual ? ` (you are ${reason.actual}).` : ".")
      );
    case "NotApplicableInState":
      return new DocCliError(
        "NotApplicableInState",
        reason.state === "logged-in"
          ? `Cannot run \`${reason.operation}\` while logged in. Please \`logout\` first.`
          : "Not logged in."
      );
  }
}
