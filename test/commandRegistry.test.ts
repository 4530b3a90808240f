// ─────────────────────────────────────────────────────────────
// Command Registry — visibility gate & authorization agreement
// ─────────────────────────────────────────────────────────────

import { strict as assert } from "assert";
import { describe, it } from "node:test";
import {
  OPERATIONS,
  authorize,
  findOperation,
  listVisible,
  visible,
} from "../access/commandRegistry";
import { LOGGED_OUT, loggedIn, type OperationDescriptor, type SessionState } from "../schema/accessSchema";
import { ADMIN, STUDENT, TEACHER } from "./helpers";

// ── Fixtures ─────────────────────────────────────────────────

const STATES: Record<string, SessionState> = {
  "logged out": LOGGED_OUT,
  admin: loggedIn(ADMIN),
  teacher: loggedIn(TEACHER),
  student: loggedIn(STUDENT),
};

function op(name: string): OperationDescriptor {
  const found = findOperation(name);
  if (!found) throw new Error(`operation ${name} is not registered`);
  return found;
}

function visibleNames(state: SessionState): string[] {
  return listVisible(state).map((o) => o.name);
}

// ── Tests ────────────────────────────────────────────────────

describe("visibility agrees with authorization", () => {
  for (const [label, state] of Object.entries(STATES)) {
    it(`every operation, ${label}`, () => {
      for (const operation of OPERATIONS) {
        assert.equal(
          visible(operation, state),
          authorize(operation, state).allowed,
          `${operation.name} disagrees for ${label}`
        );
      }
    });
  }
});

describe("visible operations per state", () => {
  it("logged out sees only register and login", () => {
    assert.deepEqual(visibleNames(LOGGED_OUT), ["register", "login"]);
  });

  it("student sees read-only commands and logout", () => {
    assert.deepEqual(visibleNames(loggedIn(STUDENT)), [
      "logout",
      "summarize",
      "list-docs",
      "list-quizzes",
      "read-quiz",
    ]);
  });

  it("teacher sees staff commands but not register", () => {
    assert.deepEqual(visibleNames(loggedIn(TEACHER)), [
      "logout",
      "upload",
      "summarize",
      "quiz",
      "grade",
      "list-docs",
      "list-quizzes",
      "read-quiz",
      "delete-doc",
    ]);
  });

  it("admin sees everything except login", () => {
    assert.deepEqual(
      visibleNames(loggedIn(ADMIN)),
      OPERATIONS.map((o) => o.name).filter((name) => name !== "login")
    );
  });
});

describe("deny reasons", () => {
  it("login while logged in is not applicable", () => {
    assert.deepEqual(authorize(op("login"), loggedIn(STUDENT)), {
      allowed: false,
      reason: { kind: "NotApplicableInState", operation: "login", state: "logged-in" },
    });
  });

  it("logout while logged out is not applicable", () => {
    assert.deepEqual(authorize(op("logout"), LOGGED_OUT), {
      allowed: false,
      reason: { kind: "NotApplicableInState", operation: "logout", state: "logged-out" },
    });
  });

  it("role-gated command while logged out needs login first", () => {
    assert.deepEqual(authorize(op("upload"), LOGGED_OUT), {
      allowed: false,
      reason: { kind: "NotLoggedIn" },
    });
  });

  it("student on a staff command lacks the role", () => {
    assert.deepEqual(authorize(op("delete-doc"), loggedIn(STUDENT)), {
      allowed: false,
      reason: { kind: "InsufficientRole", required: ["teacher", "admin"], actual: "student" },
    });
  });

  it("teacher cannot register users", () => {
    assert.deepEqual(authorize(op("register"), loggedIn(TEACHER)), {
      allowed: false,
      reason: { kind: "InsufficientRole", required: ["admin"], actual: "teacher" },
    });
  });

  it("a role set implies login even when requiresLogin is false", () => {
    const staffOnly: OperationDescriptor = {
      name: "staff-only",
      requiresLogin: false,
      allowedRoles: ["teacher"],
      sessionRule: "any",
      usage: "",
      description: "",
    };
    assert.deepEqual(authorize(staffOnly, LOGGED_OUT), {
      allowed: false,
      reason: { kind: "NotLoggedIn" },
    });
    assert.equal(authorize(staffOnly, loggedIn(TEACHER)).allowed, true);
  });
});

describe("operation table", () => {
  it("every role-gated descriptor also requires login", () => {
    for (const operation of OPERATIONS) {
      if (operation.allowedRoles !== null) {
        assert.equal(operation.requiresLogin, true, operation.name);
      }
    }
  });

  it("unknown names are not found", () => {
    assert.equal(findOperation("format-disk"), null);
  });
});
