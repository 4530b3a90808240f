// ─────────────────────────────────────────────────────────────
// Session Store — The single active identity on this machine
//
// Presence of the session file = logged in. The file holds
// { user_id, name, email, role } and is read once per
// invocation; nothing about the acting user is cached in memory.
// ─────────────────────────────────────────────────────────────

import fs from "fs";
import path from "path";
import {
  LOGGED_OUT,
  isRole,
  loggedIn,
  type Session,
  type SessionState,
} from "../schema/accessSchema";
import { logEvent } from "../config/log";

/** On-disk shape of the session file */
interface SessionFile {
  user_id: number;
  name: string;
  email: string;
  role: string;
}

export class SessionStore {
  readonly sessionPath: string;

  constructor(sessionPath: string) {
    this.sessionPath = sessionPath;
  }

  /** Current session state; an unreadable file counts as logged out */
  read(): SessionState {
    if (!fs.existsSync(this.sessionPath)) return LOGGED_OUT;

    let session: Session | null = null;
    try {
      session = parseSessionFile(JSON.parse(fs.readFileSync(this.sessionPath, "utf-8")));
    } catch {
      session = null;
    }
    if (!session) {
      console.warn(`[SESSION] Corrupt session file ${this.sessionPath} — treating as logged out`);
      return LOGGED_OUT;
    }
    return loggedIn(session);
  }

  /** Persist a new session, replacing any previous one */
  write(session: Session): void {
    const dir = path.dirname(this.sessionPath);
    if (!fs.existsSync(dir)) {
      fs.mkdirSync(dir, { recursive: true });
    }
    const file: SessionFile = {
      user_id: session.userId,
      name: session.name,
      email: session.email,
      role: session.role,
    };
    fs.writeFileSync(this.sessionPath, JSON.stringify(file), "utf-8");
    logEvent("SESSION", `Opened session for ${session.email}`);
  }

  /** Remove the session file. Returns false when there was none. */
  clear(): boolean {
    if (!fs.existsSync(this.sessionPath)) return false;
    fs.rmSync(this.sessionPath);
    logEvent("SESSION", "Session closed");
    return true;
  }
}

function parseSessionFile(raw: unknown): Session | null {
  if (typeof raw !== "object" || raw === null) return null;
  if (!("user_id" in raw && "name" in raw && "email" in raw && "role" in raw)) return null;
  const { user_id, name, email, role } = raw;
  if (
    typeof user_id !== "number" ||
    typeof name !== "string" ||
    typeof email !== "string" ||
    typeof role !== "string" ||
    !isRole(role)
  ) {
    return null;
  }
  return { userId: user_id, name, email, role };
}
