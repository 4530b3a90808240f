// ─────────────────────────────────────────────────────────────
// Command Context — Everything a command may touch
//
// Built once per invocation. The session state is read from the
// session store before dispatch and passed in here; commands
// never re-read the session file.
// ─────────────────────────────────────────────────────────────

import type { Session, SessionState } from "../schema/accessSchema";
import type { CliConfig } from "../config/cliConfig";
import type { SessionStore } from "../access/sessionStore";
import type { CredentialStore } from "../registry/credentialStore";
import type { DocumentStore } from "../registry/documentStore";
import type { TextExtractor } from "../ingest";
import type { TextGenerator } from "../generation/textGenerator";
import { DocCliError } from "../access/accessErrors";
import type { PasswordPrompt } from "./passwordPrompt";
import type { ParsedArgs } from "./argParser";

/** User-facing output */
export interface CommandOutput {
  info(line: string): void;
  error(line: string): void;
}

export const consoleOutput: CommandOutput = {
  info: (line) => console.log(line),
  error: (line) => console.error(line),
};

export interface CommandContext {
  config: CliConfig;
  session: SessionState;
  sessionStore: SessionStore;
  credentials: CredentialStore;
  documents: DocumentStore;
  extractor: TextExtractor;
  generator: TextGenerator;
  prompt: PasswordPrompt;
  out: CommandOutput;
}

export type CommandHandler = (ctx: CommandContext, args: ParsedArgs) => Promise<void>;

/** The logged-in session, for commands the gate only admits when logged in */
export function requireSession(ctx: CommandContext): Session {
  if (ctx.session.status !== "logged-in") {
    throw new DocCliError("NotLoggedIn", "Not logged in. Please `login` first.");
  }
  return ctx.session.session;
}
