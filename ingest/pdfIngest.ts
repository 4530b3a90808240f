// ─────────────────────────────────────────────────────────────
// PDF Ingest — Extract plain text from PDF files
// ─────────────────────────────────────────────────────────────

import fs from "fs";

// pdf-parse v2 exports a class-based API
const { PDFParse } = require("pdf-parse") as {
  PDFParse: new (opts: { data: Buffer | Uint8Array; verbosity?: number }) => {
    getText(opts?: Record<string, unknown>): Promise<{ text: string; total: number }>;
    destroy(): Promise<void>;
  };
};

/**
 * Extract the text layer of a PDF.
 */
export async function ingestPDF(filePath: string): Promise<string> {
  const buffer = fs.readFileSync(filePath);
  const parser = new PDFParse({ data: buffer });

  try {
    const result = await parser.getText();
    return result.text;
  } finally {
    await parser.destroy();
  }
}
