// ─────────────────────────────────────────────────────────────
// Credential Store — Create-only user registry
//
// Email is unique. Users are never updated or deleted; the
// single-admin rule is enforced by the register command with
// countByRole() before createUser().
// ─────────────────────────────────────────────────────────────

import crypto from "crypto";
import CryptoJS from "crypto-js";
import { isRole, type Role, type UserRecord } from "../schema/accessSchema";
import { JsonStore, readNumber, readString } from "./jsonStore";
import { logEvent } from "../config/log";

const USERS_FILE = "users.json";

export type CreateUserResult = { userId: number } | { error: "DuplicateEmail" };

export class CredentialStore extends JsonStore<UserRecord> {
  constructor(storeDir: string) {
    super(storeDir, USERS_FILE, "CREDENTIALS");
  }

  createUser(name: string, email: string, role: Role, passwordHash: string): CreateUserResult {
    if (this.findByEmail(email)) {
      return { error: "DuplicateEmail" };
    }

    const user: UserRecord = {
      id: this.takeId(),
      name,
      email,
      role,
      passwordHash,
      createdAt: new Date().toISOString(),
    };
    this.store.records.push(user);
    this.save();

    logEvent("CREDENTIALS", `Registered ${email} as ${role}`);
    return { userId: user.id };
  }

  findByEmail(email: string): UserRecord | null {
    return this.store.records.find((u) => u.email === email) ?? null;
  }

  countByRole(role: Role): number {
    return this.store.records.filter((u) => u.role === role).length;
  }

  protected acceptRecord(raw: unknown): UserRecord | null {
    if (typeof raw !== "object" || raw === null) return null;
    const id = readNumber(raw, "id");
    const name = readString(raw, "name");
    const email = readString(raw, "email");
    const role = readString(raw, "role");
    const passwordHash = readString(raw, "passwordHash");
    if (id === null || name === null || email === null || passwordHash === null) return null;
    if (role === null || !isRole(role)) return null;
    return { id, name, email, role, passwordHash, createdAt: readString(raw, "createdAt") ?? "" };
  }
}

// ── Password Hashing ─────────────────────────────────────────

/** Hex SHA-256 of the UTF-8 password */
export function hashPassword(password: string): string {
  return CryptoJS.SHA256(password).toString();
}

/** Compare a supplied password against a stored hash in constant time */
export function verifyPassword(password: string, storedHash: string): boolean {
  const supplied = Buffer.from(hashPassword(password), "utf-8");
  const stored = Buffer.from(storedHash, "utf-8");
  if (supplied.length !== stored.length) return false;
  return crypto.timingSafeEqual(supplied, stored);
}
