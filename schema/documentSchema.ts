// ─────────────────────────────────────────────────────────────
// Document Schema — Uploaded document metadata
// ─────────────────────────────────────────────────────────────

/** File extensions accepted by `upload` */
export const UPLOAD_EXTENSIONS = [".pdf", ".txt"] as const;

export type UploadExtension = (typeof UPLOAD_EXTENSIONS)[number];

export function isUploadExtension(ext: string): ext is UploadExtension {
  const extensions: readonly string[] = UPLOAD_EXTENSIONS;
  return extensions.includes(ext);
}

/** A document metadata record */
export interface DocumentRecord {
  id: number;
  /** Base file name inside the documents directory */
  name: string;
  /** Email of the uploading user */
  owner: string;
  /** ISO timestamp of upload */
  timestamp: string;
  /** Extension including the dot (".pdf", ".txt") */
  type: string;
  /** Last generated summary, if any */
  summary: string | null;
}
