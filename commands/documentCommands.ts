// ─────────────────────────────────────────────────────────────
// Document Commands — upload, summarize, list-docs, delete-doc
// ─────────────────────────────────────────────────────────────

import fs from "fs";
import path from "path";
import { DocCliError } from "../access/accessErrors";
import { requireSupportedExtension } from "../ingest";
import { summaryPrompt } from "../generation/prompts";
import { requireSession, type CommandContext, type CommandHandler } from "../cli/commandContext";
import { expectPositionals } from "../cli/argParser";
import { logEvent } from "../config/log";
import type { Session } from "../schema/accessSchema";
import type { DocumentRecord } from "../schema/documentSchema";

/** Path of an uploaded document; the name is reduced to its base name */
export function documentPath(ctx: CommandContext, docname: string): string {
  return path.join(ctx.config.docsDir, path.basename(docname));
}

/** Path of an uploaded document that must exist on disk */
export function requireDocument(ctx: CommandContext, docname: string): string {
  const docPath = documentPath(ctx, docname);
  if (!fs.existsSync(docPath)) {
    throw new DocCliError("ResourceNotFound", "Document not found.");
  }
  return docPath;
}

export function requireFile(filePath: string): void {
  if (!fs.existsSync(filePath) || !fs.statSync(filePath).isFile()) {
    throw new DocCliError("ResourceNotFound", `File not found: ${filePath}`);
  }
}

/** A record with this name owned by someone else; admins own everything */
function foreignRecord(ctx: CommandContext, session: Session, name: string): DocumentRecord | undefined {
  if (session.role === "admin") return undefined;
  return ctx.documents.listAll().find((doc) => doc.name === name && doc.owner !== session.email);
}

export const upload: CommandHandler = async (ctx, args) => {
  const session = requireSession(ctx);
  const [file] = expectPositionals(args, "upload <file>", 1);

  requireFile(file);
  const ext = requireSupportedExtension(file);

  const name = path.basename(file);
  const foreign = foreignRecord(ctx, session, name);
  if (foreign) {
    throw new DocCliError(
      "NotOwner",
      `Permission denied: ${name} belongs to ${foreign.owner}. Only its owner or an admin can replace it.`
    );
  }

  const dest = documentPath(ctx, name);
  fs.mkdirSync(ctx.config.docsDir, { recursive: true });
  if (path.resolve(file) !== path.resolve(dest)) {
    fs.copyFileSync(file, dest);
  }

  ctx.documents.insert(name, session.email, ext, new Date().toISOString());
  ctx.out.info(`Uploaded ${dest} and metadata recorded.`);
};

export const summarize: CommandHandler = async (ctx, args) => {
  const [docname] = expectPositionals(args, "summarize <docname>", 1);
  const docPath = requireDocument(ctx, docname);

  const text = await ctx.extractor.extract(docPath);
  const summary = await ctx.generator.generate(summaryPrompt(text));
  ctx.out.info(summary);

  const name = path.basename(docPath);
  if (!ctx.documents.setSummary(name, summary)) {
    logEvent("DOCUMENTS", `No record for ${name}; summary not stored`);
  }
};

export const listDocs: CommandHandler = async (ctx, args) => {
  expectPositionals(args, "list-docs", 0);
  for (const doc of ctx.documents.listAll()) {
    ctx.out.info(`${doc.id} | ${doc.name} | ${doc.owner} | ${doc.type} @ ${doc.timestamp}`);
  }
};

export const deleteDoc: CommandHandler = async (ctx, args) => {
  const session = requireSession(ctx);
  const [name] = expectPositionals(args, "delete-doc <name>", 1);

  const record = ctx.documents.findByName(name);
  if (!record) {
    throw new DocCliError("ResourceNotFound", `Document not found: ${name}`);
  }

  // Ownership is checked against every record that the delete would remove
  const foreign = foreignRecord(ctx, session, name);
  if (foreign) {
    throw new DocCliError(
      "NotOwner",
      `Permission denied: ${name} belongs to ${foreign.owner}. Only its owner or an admin can delete it.`
    );
  }

  const docPath = documentPath(ctx, name);
  if (fs.existsSync(docPath)) {
    fs.rmSync(docPath);
  }
  ctx.documents.deleteByName(name);
  ctx.out.info(`Deleted ${name}.`);
};
