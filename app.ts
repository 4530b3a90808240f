#!/usr/bin/env node
// ─────────────────────────────────────────────────────────────
// doccli — Document Analyzer CLI
// ─────────────────────────────────────────────────────────────
//
// Usage:
//   doccli <command> [arguments]
//   npx tsx app.ts <command> [arguments]
//
// Examples:
//   doccli register "Alice" alice@example.com student
//   doccli login alice@example.com
//   doccli upload ./lecture-notes.pdf
//   doccli summarize lecture-notes.pdf
//   doccli quiz lecture-notes.pdf --n 10
//   doccli grade ./responses.txt ./answer_keys/lecture-notes.pdf_answer_key.txt
//   doccli list-docs
//   doccli logout
//
// Environment:
//   OPENAI_API_KEY                 generation service key (summarize, quiz)
//   DOCCLI_MODEL / DOCCLI_API_URL  generation model and endpoint
//   DOCCLI_DATA_DIR                user & document stores   (./.doccli)
//   DOCCLI_DOCS_DIR                uploaded documents       (./docs)
//   DOCCLI_QUIZ_DIR                generated quizzes        (./quizzes)
//   DOCCLI_ANSWER_KEY_DIR          generated answer keys    (./answer_keys)
//   DOCCLI_SESSION_FILE            session file             (~/.doccli_session)
//   DOCCLI_ALLOW_ADMIN_BOOTSTRAP   let the first admin self-register
//   DOCCLI_VERBOSE                 tagged diagnostics on stderr
//
// ─────────────────────────────────────────────────────────────

import { loadConfig } from "./config/cliConfig";
import { setVerbose } from "./config/log";
import { runCli } from "./cli/runner";
import { TerminalPasswordPrompt } from "./cli/passwordPrompt";

async function main(): Promise<number> {
  const config = loadConfig();
  setVerbose(config.verbose);

  const prompt = new TerminalPasswordPrompt();
  try {
    return await runCli(process.argv.slice(2), { config, prompt });
  } finally {
    prompt.close();
  }
}

// ── Run ──────────────────────────────────────────────────────

main()
  .then((code) => {
    process.exitCode = code;
  })
  .catch((err: unknown) => {
    console.error("\n[FATAL ERROR]", err instanceof Error ? err.message : err);
    process.exit(1);
  });
