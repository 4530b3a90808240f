// ─────────────────────────────────────────────────────────────
// Diagnostic log — tagged traces on stderr
// ─────────────────────────────────────────────────────────────

let verbose = false;

export function setVerbose(enabled: boolean): void {
  verbose = enabled;
}

/** `[TAG] message` on stderr when verbose output is enabled */
export function logEvent(tag: string, message: string): void {
  if (verbose) {
    console.error(`[${tag}] ${message}`);
  }
}
