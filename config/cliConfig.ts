// ─────────────────────────────────────────────────────────────
// CLI Configuration — Paths, generation endpoint, feature flags
//
// Everything comes from environment variables with defaults
// rooted in the working directory (stores, documents, quizzes)
// and the home directory (session file).
// ─────────────────────────────────────────────────────────────

import os from "os";
import path from "path";

export interface GenerationConfig {
  /** Absent key is reported when a command calls the service, not at startup */
  apiKey: string;
  apiUrl: string;
  model: string;
}

export interface CliConfig {
  /** users.json and documents.json */
  dataDir: string;
  docsDir: string;
  quizDir: string;
  answerKeyDir: string;
  sessionFile: string;
  generation: GenerationConfig;
  /** Lets the very first admin register while logged out */
  allowAdminBootstrap: boolean;
  verbose: boolean;
}

export const DEFAULT_MODEL = "gpt-4o-mini";
export const DEFAULT_API_URL = "https://api.openai.com/v1/responses";
export const SESSION_FILE_NAME = ".doccli_session";

type Env = Record<string, string | undefined>;

export function loadConfig(
  env: Env = process.env,
  cwd: string = process.cwd(),
  home: string = os.homedir()
): CliConfig {
  return {
    dataDir: env.DOCCLI_DATA_DIR || path.join(cwd, ".doccli"),
    docsDir: env.DOCCLI_DOCS_DIR || path.join(cwd, "docs"),
    quizDir: env.DOCCLI_QUIZ_DIR || path.join(cwd, "quizzes"),
    answerKeyDir: env.DOCCLI_ANSWER_KEY_DIR || path.join(cwd, "answer_keys"),
    sessionFile: env.DOCCLI_SESSION_FILE || path.join(home, SESSION_FILE_NAME),
    generation: {
      apiKey: env.OPENAI_API_KEY || "",
      apiUrl: env.DOCCLI_API_URL || DEFAULT_API_URL,
      model: env.DOCCLI_MODEL || DEFAULT_MODEL,
    },
    allowAdminBootstrap: isTruthy(env.DOCCLI_ALLOW_ADMIN_BOOTSTRAP),
    verbose: isTruthy(env.DOCCLI_VERBOSE),
  };
}

function isTruthy(value: string | undefined): boolean {
  return value !== undefined && ["1", "true", "yes", "on"].includes(value.trim().toLowerCase());
}
