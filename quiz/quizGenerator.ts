// ─────────────────────────────────────────────────────────────
// Quiz Generator — Prompt the generator, split at "Answer Key"
//
// The split is a literal marker search, not a parser: quiz and
// answer-key files written by earlier versions rely on it.
// ─────────────────────────────────────────────────────────────

import type { QuizParts } from "../schema/quizSchema";
import type { TextGenerator } from "../generation/textGenerator";
import { quizPrompt } from "../generation/prompts";

export const ANSWER_KEY_MARKER = "Answer Key";
export const DEFAULT_QUESTION_COUNT = 5;

/**
 * Split generated quiz text into questions and answer key.
 * Without the marker, everything is questions and the key is empty.
 */
export function splitQuiz(output: string): QuizParts {
  const at = output.indexOf(ANSWER_KEY_MARKER);
  if (at === -1) {
    return { questions: output, answerKey: "" };
  }

  const before = output.slice(0, at);
  const after = output.slice(at + ANSWER_KEY_MARKER.length);
  return {
    // Heading markup around the marker ("### Answer Key", "**Answer Key:**")
    questions: before.replace(/[#*\s]+$/, ""),
    answerKey: after.replace(/^[*:\s]+/, "").trimEnd(),
  };
}

export async function generateQuiz(
  generator: TextGenerator,
  documentText: string,
  questionCount: number = DEFAULT_QUESTION_COUNT
): Promise<QuizParts> {
  return splitQuiz(await generator.generate(quizPrompt(documentText, questionCount)));
}
