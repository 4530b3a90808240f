// ─────────────────────────────────────────────────────────────
// Stores — credentials, document metadata, session file
// ─────────────────────────────────────────────────────────────

import { strict as assert } from "assert";
import fs from "fs";
import path from "path";
import { afterEach, beforeEach, describe, it } from "node:test";
import { CredentialStore, hashPassword, verifyPassword } from "../registry/credentialStore";
import { DocumentStore } from "../registry/documentStore";
import { SessionStore } from "../access/sessionStore";
import { DocCliError } from "../access/accessErrors";
import { LOGGED_OUT, loggedIn } from "../schema/accessSchema";
import { STUDENT, createWorkspace, type Workspace } from "./helpers";

let ws: Workspace;

beforeEach(() => {
  ws = createWorkspace();
});

afterEach(() => {
  ws.cleanup();
});

describe("password hashing", () => {
  it("is hex SHA-256 of the password", () => {
    assert.equal(hashPassword("pass123"), "9b8769a4a742959a2d0298c36fb70623f2dfacda8436237df08d8dfd5b37374c");
  });

  it("verifies only the matching password", () => {
    const stored = hashPassword("pass123");
    assert.equal(verifyPassword("pass123", stored), true);
    assert.equal(verifyPassword("pass124", stored), false);
    assert.equal(verifyPassword("pass123", "short"), false);
  });
});

describe("CredentialStore", () => {
  it("assigns sequential ids and rejects duplicate emails", () => {
    const store = new CredentialStore(ws.config.dataDir);
    assert.deepEqual(store.createUser("Alice", "alice@x.com", "student", "h1"), { userId: 1 });
    assert.deepEqual(store.createUser("Bob", "bob@x.com", "teacher", "h2"), { userId: 2 });
    assert.deepEqual(store.createUser("Alice 2", "alice@x.com", "student", "h3"), {
      error: "DuplicateEmail",
    });
  });

  it("counts users by role and survives a reload", () => {
    const store = new CredentialStore(ws.config.dataDir);
    store.createUser("Ada", "ada@x.com", "admin", "h");
    store.createUser("Sam", "sam@x.com", "student", "h");
    store.createUser("Sue", "sue@x.com", "student", "h");

    const reloaded = new CredentialStore(ws.config.dataDir);
    assert.equal(reloaded.countByRole("admin"), 1);
    assert.equal(reloaded.countByRole("student"), 2);
    assert.equal(reloaded.countByRole("teacher"), 0);
    assert.equal(reloaded.findByEmail("sue@x.com")?.name, "Sue");
    assert.equal(reloaded.findByEmail("nobody@x.com"), null);
    assert.deepEqual(reloaded.createUser("Tom", "tom@x.com", "teacher", "h"), { userId: 4 });
  });
});

describe("corrupt store files", () => {
  function isCorrupt(detail: string, file: string) {
    return (err: unknown) =>
      err instanceof DocCliError &&
      err.code === "CorruptStore" &&
      err.message === `Corrupt store file ${file} (${detail}). Repair or restore it before continuing.`;
  }

  it("refuses a user file that is not valid JSON and leaves it alone", () => {
    const store = new CredentialStore(ws.config.dataDir);
    store.createUser("Ada", "ada@x.com", "admin", "h");
    const usersPath = path.join(ws.config.dataDir, "users.json");
    fs.writeFileSync(usersPath, '{"engine": "doccli", "records": [{"id": 1,');

    assert.throws(() => new CredentialStore(ws.config.dataDir), isCorrupt("not valid JSON", usersPath));
    assert.equal(fs.readFileSync(usersPath, "utf-8"), '{"engine": "doccli", "records": [{"id": 1,');
  });

  it("refuses a file without a records list", () => {
    const docsPath = path.join(ws.config.dataDir, "documents.json");
    fs.mkdirSync(ws.config.dataDir, { recursive: true });
    fs.writeFileSync(docsPath, '{"engine": "doccli"}');

    assert.throws(() => new DocumentStore(ws.config.dataDir), isCorrupt("no records list", docsPath));
  });

  it("refuses a file with records it cannot read", () => {
    const docsPath = path.join(ws.config.dataDir, "documents.json");
    fs.mkdirSync(ws.config.dataDir, { recursive: true });
    fs.writeFileSync(
      docsPath,
      JSON.stringify({
        engine: "doccli",
        nextId: 4,
        records: [
          { id: 1, name: "a.txt", owner: "t@x.com", timestamp: "2026-01-01T00:00:00.000Z", type: ".txt" },
          { id: 2, name: "b.txt" },
          { id: "three" },
        ],
      })
    );

    assert.throws(() => new DocumentStore(ws.config.dataDir), isCorrupt("2 unreadable record(s)", docsPath));
  });
});

describe("DocumentStore", () => {
  it("lists records in insertion order", () => {
    const store = new DocumentStore(ws.config.dataDir);
    store.insert("b.txt", "t@x.com", ".txt", "2026-01-01T00:00:00.000Z");
    store.insert("a.pdf", "t@x.com", ".pdf", "2026-01-02T00:00:00.000Z");

    assert.deepEqual(
      new DocumentStore(ws.config.dataDir).listAll().map((d) => `${d.id}:${d.name}`),
      ["1:b.txt", "2:a.pdf"]
    );
  });

  it("finds, summarizes and deletes by name", () => {
    const store = new DocumentStore(ws.config.dataDir);
    store.insert("notes.txt", "t@x.com", ".txt", "2026-01-01T00:00:00.000Z");

    assert.equal(store.setSummary("notes.txt", "About cells."), true);
    assert.equal(store.setSummary("missing.txt", "x"), false);
    assert.deepEqual(new DocumentStore(ws.config.dataDir).findByName("notes.txt"), {
      id: 1,
      name: "notes.txt",
      owner: "t@x.com",
      timestamp: "2026-01-01T00:00:00.000Z",
      type: ".txt",
      summary: "About cells.",
    });

    assert.equal(store.deleteByName("notes.txt"), 1);
    assert.equal(store.findByName("notes.txt"), null);
    assert.equal(new DocumentStore(ws.config.dataDir).listAll().length, 0);
  });
});

describe("SessionStore", () => {
  it("is logged out without a session file", () => {
    assert.deepEqual(new SessionStore(ws.config.sessionFile).read(), LOGGED_OUT);
  });

  it("round-trips the session through the file", () => {
    const store = new SessionStore(ws.config.sessionFile);
    store.write(STUDENT);

    assert.deepEqual(JSON.parse(fs.readFileSync(ws.config.sessionFile, "utf-8")), {
      user_id: 4,
      name: "Sam",
      email: "sam@x.com",
      role: "student",
    });
    assert.deepEqual(new SessionStore(ws.config.sessionFile).read(), loggedIn(STUDENT));
  });

  it("clear reports whether a session existed", () => {
    const store = new SessionStore(ws.config.sessionFile);
    store.write(STUDENT);
    assert.equal(store.clear(), true);
    assert.equal(store.clear(), false);
    assert.deepEqual(store.read(), LOGGED_OUT);
  });

  it("treats a corrupt session file as logged out", () => {
    fs.writeFileSync(ws.config.sessionFile, '{"user_id": 1, "role": "overlord"}');
    assert.deepEqual(new SessionStore(ws.config.sessionFile).read(), LOGGED_OUT);
  });
});
