// ─────────────────────────────────────────────────────────────
// Password Prompt — hidden terminal input
// ─────────────────────────────────────────────────────────────

import readline from "readline";
import { Writable, type Readable } from "stream";
import { DocCliError } from "../access/accessErrors";

export interface PasswordPrompt {
  ask(label: string): Promise<string>;
  close(): void;
}

interface PendingAnswer {
  resolve(answer: string): void;
  reject(err: Error): void;
}

/**
 * Reads answers from stdin without echoing them.
 * Lines are queued as readline emits them, so piped input ("pw\npw\n")
 * that arrives in one chunk still answers every question in turn.
 */
export class TerminalPasswordPrompt implements PasswordPrompt {
  private rl: readline.Interface | null = null;
  private readonly lines: string[] = [];
  private pending: PendingAnswer | null = null;
  private ended = false;

  constructor(
    private readonly input: Readable & { isTTY?: boolean } = process.stdin,
    private readonly output: Writable = process.stdout
  ) {}

  ask(label: string): Promise<string> {
    this.listen();
    this.output.write(label);

    const queued = this.lines.shift();
    if (queued !== undefined) {
      this.output.write("\n");
      return Promise.resolve(queued);
    }
    if (this.ended) {
      return Promise.reject(inputClosed());
    }
    return new Promise((resolve, reject) => {
      this.pending = { resolve, reject };
    });
  }

  close(): void {
    this.rl?.close();
    this.rl = null;
  }

  private listen(): void {
    if (!this.rl && !this.ended) {
      // Typed characters are never echoed; labels go straight to the output
      const silent = new Writable({
        write: (_chunk: Buffer | string, _encoding: BufferEncoding, callback: (error?: Error | null) => void) =>
          callback(),
      });
      const rl = readline.createInterface({
        input: this.input,
        output: silent,
        terminal: this.input.isTTY === true,
      });
      rl.on("line", (line) => this.onLine(line));
      rl.on("close", () => this.onClose());
      this.rl = rl;
    }
  }

  private onLine(line: string): void {
    const pending = this.pending;
    if (pending) {
      this.pending = null;
      this.output.write("\n");
      pending.resolve(line);
    } else {
      this.lines.push(line);
    }
  }

  private onClose(): void {
    this.ended = true;
    this.rl = null;
    const pending = this.pending;
    if (pending) {
      this.pending = null;
      pending.reject(inputClosed());
    }
  }
}

function inputClosed(): DocCliError {
  return new DocCliError("InvalidArguments", "Input closed before a password was entered.");
}
