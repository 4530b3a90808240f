// ─────────────────────────────────────────────────────────────
// Ingest Index — Text extraction dispatcher
// ─────────────────────────────────────────────────────────────

import path from "path";
import { UPLOAD_EXTENSIONS, isUploadExtension, type UploadExtension } from "../schema/documentSchema";
import { DocCliError } from "../access/accessErrors";
import { logEvent } from "../config/log";
import { ingestPDF } from "./pdfIngest";
import { ingestTXT } from "./textIngest";

/** Text extraction capability handed to commands */
export interface TextExtractor {
  extract(filePath: string): Promise<string>;
}

/**
 * Validate a file's extension against the supported upload formats.
 * Runs before any extraction is attempted.
 */
export function requireSupportedExtension(filePath: string): UploadExtension {
  const ext = path.extname(filePath).toLowerCase();
  if (!isUploadExtension(ext)) {
    throw new DocCliError(
      "UnsupportedFileType",
      `Unsupported file type${ext ? ` "${ext}"` : ""}. Only ${UPLOAD_EXTENSIONS.join(" and ")} are allowed.`
    );
  }
  return ext;
}

/**
 * Extract text from any supported document.
 * Routes on the file extension.
 */
export async function extractText(filePath: string): Promise<string> {
  const ext = requireSupportedExtension(filePath);
  logEvent("INGEST", `Extracting ${path.basename(filePath)} as ${ext.slice(1).toUpperCase()}`);

  switch (ext) {
    case ".pdf":
      return ingestPDF(filePath);
    case ".txt":
      return ingestTXT(filePath);
  }
}

export const fileTextExtractor: TextExtractor = { extract: extractText };
