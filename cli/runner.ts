// ─────────────────────────────────────────────────────────────
// CLI Runner — session → gate → command
//
//   1. Parse argv
//   2. Read the session file once
//   3. Look up the operation and authorize it for that session
//   4. Build the command context and run the handler
//
// Returns the process exit code: 0 success, 1 denial or
// domain error, 2 usage error.
// ─────────────────────────────────────────────────────────────

import type { CliConfig } from "../config/cliConfig";
import { SessionStore } from "../access/sessionStore";
import { authorize, findOperation, type CommandName } from "../access/commandRegistry";
import { DocCliError, denialError, isDocCliError } from "../access/accessErrors";
import { CredentialStore } from "../registry/credentialStore";
import { DocumentStore } from "../registry/documentStore";
import { fileTextExtractor, type TextExtractor } from "../ingest";
import { OpenAIResponsesClient, type TextGenerator } from "../generation/textGenerator";
import { register, login, logout } from "../commands/authCommands";
import { upload, summarize, listDocs, deleteDoc } from "../commands/documentCommands";
import { quiz, grade, listQuizzes, readQuiz } from "../commands/quizCommands";
import { consoleOutput, type CommandHandler, type CommandOutput } from "./commandContext";
import type { PasswordPrompt } from "./passwordPrompt";
import { parseArgs } from "./argParser";
import { PROGRAM, printCommandHelp, printHelp } from "./help";

const HANDLERS: Record<CommandName, CommandHandler> = {
  "register": register,
  "login": login,
  "logout": logout,
  "upload": upload,
  "summarize": summarize,
  "quiz": quiz,
  "grade": grade,
  "list-docs": listDocs,
  "list-quizzes": listQuizzes,
  "read-quiz": readQuiz,
  "delete-doc": deleteDoc,
};

export interface CliDependencies {
  config: CliConfig;
  prompt: PasswordPrompt;
  out?: CommandOutput;
  extractor?: TextExtractor;
  generator?: TextGenerator;
}

export async function runCli(argv: string[], deps: CliDependencies): Promise<number> {
  const out = deps.out ?? consoleOutput;
  const { config } = deps;

  try {
    const args = parseArgs(argv);
    const sessionStore = new SessionStore(config.sessionFile);
    const session = sessionStore.read();

    if (args.command === null || args.command === "help") {
      printHelp(out, session);
      return 0;
    }

    const op = findOperation(args.command);
    if (!op) {
      throw new DocCliError(
        "UnknownCommand",
        `No such command "${args.command}". Run \`${PROGRAM} help\` to see available commands.`
      );
    }

    const decision = authorize(op, session);
    if (!decision.allowed) {
      throw denialError(decision.reason);
    }

    if (args.help) {
      printCommandHelp(out, op);
      return 0;
    }

    await HANDLERS[op.name](
      {
        config,
        session,
        sessionStore,
        credentials: new CredentialStore(config.dataDir),
        documents: new DocumentStore(config.dataDir),
        extractor: deps.extractor ?? fileTextExtractor,
        generator: deps.generator ?? new OpenAIResponsesClient(config.generation),
        prompt: deps.prompt,
        out,
      },
      args
    );
    return 0;
  } catch (err) {
    if (isDocCliError(err)) {
      out.error(err.message);
      return err.exitCode;
    }
    out.error(`[FATAL ERROR] ${err instanceof Error ? err.message : String(err)}`);
    return 1;
  }
}
