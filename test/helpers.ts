// ─────────────────────────────────────────────────────────────
// Test Fixtures — temp workspaces, scripted prompts, fakes
// ─────────────────────────────────────────────────────────────

import fs from "fs";
import os from "os";
import path from "path";
import { loadConfig, type CliConfig } from "../config/cliConfig";
import type { Session } from "../schema/accessSchema";
import { SessionStore } from "../access/sessionStore";
import type { CommandOutput } from "../cli/commandContext";
import type { PasswordPrompt } from "../cli/passwordPrompt";
import type { TextGenerator } from "../generation/textGenerator";
import { runCli } from "../cli/runner";

export interface Workspace {
  root: string;
  config: CliConfig;
  cleanup(): void;
}

export function createWorkspace(env: Record<string, string> = {}): Workspace {
  const root = fs.mkdtempSync(path.join(os.tmpdir(), "doccli-test-"));
  return {
    root,
    config: loadConfig({ ...env }, root, root),
    cleanup: () => fs.rmSync(root, { recursive: true, force: true }),
  };
}

/** Answers questions from a fixed list; records every label asked */
export class ScriptedPrompt implements PasswordPrompt {
  readonly asked: string[] = [];
  private readonly answers: string[];

  constructor(answers: string[] = []) {
    this.answers = [...answers];
  }

  async ask(label: string): Promise<string> {
    this.asked.push(label);
    const answer = this.answers.shift();
    if (answer === undefined) {
      throw new Error(`Unexpected prompt: ${label}`);
    }
    return answer;
  }

  close(): void {}
}

export class CapturedOutput implements CommandOutput {
  readonly lines: string[] = [];
  readonly errors: string[] = [];

  info(line: string): void {
    this.lines.push(line);
  }

  error(line: string): void {
    this.errors.push(line);
  }
}

/** Returns canned text and keeps the prompts it was given */
export class FakeGenerator implements TextGenerator {
  readonly prompts: string[] = [];
  private readonly reply: string | Error;

  constructor(reply: string | Error) {
    this.reply = reply;
  }

  async generate(prompt: string): Promise<string> {
    this.prompts.push(prompt);
    if (this.reply instanceof Error) throw this.reply;
    return this.reply;
  }
}

export function signIn(ws: Workspace, session: Session): void {
  new SessionStore(ws.config.sessionFile).write(session);
}

export const ADMIN: Session = { userId: 1, name: "Ada", email: "admin@x.com", role: "admin" };
export const TEACHER: Session = { userId: 2, name: "Tom", email: "teacher@x.com", role: "teacher" };
export const OTHER_TEACHER: Session = { userId: 3, name: "Tia", email: "tia@x.com", role: "teacher" };
export const STUDENT: Session = { userId: 4, name: "Sam", email: "sam@x.com", role: "student" };

export interface RunResult {
  code: number;
  out: CapturedOutput;
  prompt: ScriptedPrompt;
}

export async function run(
  ws: Workspace,
  argv: string[],
  options: { answers?: string[]; generator?: TextGenerator } = {}
): Promise<RunResult> {
  const out = new CapturedOutput();
  const prompt = new ScriptedPrompt(options.answers);
  const code = await runCli(argv, {
    config: ws.config,
    prompt,
    out,
    generator: options.generator ?? new FakeGenerator(new Error("generator not expected")),
  });
  return { code, out, prompt };
}
