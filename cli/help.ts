// ─────────────────────────────────────────────────────────────
// Help — lists only what the current session may run
// ─────────────────────────────────────────────────────────────

import type { OperationDescriptor, SessionState } from "../schema/accessSchema";
import { listVisible } from "../access/commandRegistry";
import type { CommandOutput } from "./commandContext";

export const PROGRAM = "doccli";

function synopsis(op: OperationDescriptor): string {
  return op.usage ? `${op.name} ${op.usage}` : op.name;
}

export function printHelp(out: CommandOutput, state: SessionState): void {
  const ops = listVisible(state);
  const width = Math.max(...ops.map((op) => synopsis(op).length));

  out.info("Document Analyzer CLI");
  out.info("");
  out.info(`Usage: ${PROGRAM} <command> [arguments]`);
  out.info(
    state.status === "logged-in"
      ? `Logged in as ${state.session.name} (${state.session.role}).`
      : "Not logged in."
  );
  out.info("");
  out.info("Commands:");
  for (const op of ops) {
    out.info(`  ${synopsis(op).padEnd(width)}  ${op.description}`);
  }
}

export function printCommandHelp(out: CommandOutput, op: OperationDescriptor): void {
  out.info(`Usage: ${PROGRAM} ${synopsis(op)}`);
  out.info("");
  out.info(`  ${op.description}`);
}
