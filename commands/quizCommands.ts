// ─────────────────────────────────────────────────────────────
// Quiz Commands — quiz, grade, list-quizzes, read-quiz
// ─────────────────────────────────────────────────────────────

import fs from "fs";
import path from "path";
import { DocCliError } from "../access/accessErrors";
import { DEFAULT_QUESTION_COUNT, generateQuiz } from "../quiz/quizGenerator";
import { formatGradeReport, gradeResponses } from "../quiz/quizGrader";
import type { CommandHandler } from "../cli/commandContext";
import { expectPositionals, positiveIntFlag } from "../cli/argParser";
import { requireDocument, requireFile } from "./documentCommands";

export function quizFileName(docname: string): string {
  return `${docname}_quiz.txt`;
}

export function answerKeyFileName(docname: string): string {
  return `${docname}_answer_key.txt`;
}

export const quiz: CommandHandler = async (ctx, args) => {
  const [docname] = expectPositionals(args, "quiz <docname> [--n N]", 1);
  const questionCount = positiveIntFlag(args, "--n", DEFAULT_QUESTION_COUNT);
  const docPath = requireDocument(ctx, docname);
  const name = path.basename(docPath);

  ctx.out.info(`Generating ${questionCount} quiz questions for ${name}...`);
  const text = await ctx.extractor.extract(docPath);
  const { questions, answerKey } = await generateQuiz(ctx.generator, text, questionCount);
  ctx.out.info(questions);

  fs.mkdirSync(ctx.config.quizDir, { recursive: true });
  const quizFile = path.join(ctx.config.quizDir, quizFileName(name));
  fs.writeFileSync(quizFile, questions, "utf-8");
  ctx.out.info(`Quiz saved to ${quizFile}`);

  if (answerKey.length === 0) {
    ctx.out.info("No answer key section found in the generated quiz.");
    return;
  }
  fs.mkdirSync(ctx.config.answerKeyDir, { recursive: true });
  const keyFile = path.join(ctx.config.answerKeyDir, answerKeyFileName(name));
  fs.writeFileSync(keyFile, answerKey, "utf-8");
  ctx.out.info(`Answer key saved to ${keyFile}`);
};

export const grade: CommandHandler = async (ctx, args) => {
  const [responseFile, answerKeyFile] = expectPositionals(
    args,
    "grade <response_file> <answer_key_file>",
    2
  );
  requireFile(responseFile);
  requireFile(answerKeyFile);

  const results = gradeResponses(
    fs.readFileSync(answerKeyFile, "utf-8"),
    fs.readFileSync(responseFile, "utf-8")
  );
  for (const result of results) {
    for (const line of formatGradeReport(result)) {
      ctx.out.info(line);
    }
  }
};

export const listQuizzes: CommandHandler = async (ctx, args) => {
  expectPositionals(args, "list-quizzes", 0);
  if (!fs.existsSync(ctx.config.quizDir)) return;

  const files = fs
    .readdirSync(ctx.config.quizDir)
    .filter((f) => f.endsWith(".txt"))
    .sort();
  for (const file of files) {
    ctx.out.info(file);
  }
};

export const readQuiz: CommandHandler = async (ctx, args) => {
  const [filename] = expectPositionals(args, "read-quiz <filename>", 1);
  const name = path.basename(filename);
  const quizPath = path.join(ctx.config.quizDir, name);
  if (!fs.existsSync(quizPath)) {
    throw new DocCliError("ResourceNotFound", `Quiz not found: ${name}`);
  }
  ctx.out.info(fs.readFileSync(quizPath, "utf-8"));
};
