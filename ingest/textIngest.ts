// ─────────────────────────────────────────────────────────────
// TXT Ingest — Plain text, returned verbatim
// ─────────────────────────────────────────────────────────────

import fs from "fs";

export async function ingestTXT(filePath: string): Promise<string> {
  return fs.promises.readFile(filePath, "utf-8");
}
