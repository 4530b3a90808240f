// ─────────────────────────────────────────────────────────────
// Quiz Grader — Score response sheets against an answer key
//
// Answer key: one line per question, e.g. "1. B) Paris". The
// token before the first ")" is kept; its last character is the
// expected letter, so "B)", "1. B)" and "B" keys all work.
//
// Responses: "name, ans1, ans2, …" per line.
//
// Scoring zips answers with keys, so a short submission is only
// scored on the questions it answered while the total stays the
// full key length.
// ─────────────────────────────────────────────────────────────

import type { GradeResult, QuestionOutcome, StudentResponse } from "../schema/quizSchema";

const KEY_SECTION_HEADING = "### Answer Key";
/** First ")" on the line is preceded by a letter */
const KEY_LINE = /^[^)]*[A-Za-z]\)/;

function nonEmptyLines(text: string): string[] {
  return text
    .split(/\r?\n/)
    .map((line) => line.trim())
    .filter((line) => line.length > 0);
}

/**
 * Extract answer-key tokens in question order.
 * When the text contains a "### Answer Key" heading, only lines after it count.
 */
export function parseAnswerKey(text: string): string[] {
  const lines = nonEmptyLines(text);
  const heading = lines.indexOf(KEY_SECTION_HEADING);
  const keyLines = heading === -1 ? lines : lines.slice(heading + 1);

  return keyLines
    .filter((line) => KEY_LINE.test(line))
    .map((line) => line.split(")")[0].trim().toUpperCase());
}

export function parseResponses(text: string): StudentResponse[] {
  return nonEmptyLines(text).map((line) => {
    const [student, ...answers] = line.split(",").map((part) => part.trim());
    return { student, answers: answers.map((a) => a.toUpperCase()) };
  });
}

export function gradeResponse(keys: string[], response: StudentResponse): GradeResult {
  const breakdown: QuestionOutcome[] = [];
  const answered = Math.min(keys.length, response.answers.length);

  for (let i = 0; i < answered; i++) {
    const answer = response.answers[i];
    const expected = keys[i].slice(-1);
    breakdown.push({ index: i + 1, answer, expected, correct: answer === expected });
  }

  return {
    student: response.student,
    score: breakdown.filter((q) => q.correct).length,
    total: keys.length,
    breakdown,
  };
}

export function gradeResponses(answerKeyText: string, responseText: string): GradeResult[] {
  const keys = parseAnswerKey(answerKeyText);
  return parseResponses(responseText).map((response) => gradeResponse(keys, response));
}

/** Report lines for one student */
export function formatGradeReport(result: GradeResult): string[] {
  return [
    `Student: ${result.student}`,
    `Score: ${result.score}/${result.total}`,
    "Question breakdown:",
    ...result.breakdown.map(
      (q) =>
        ` ${q.index}. Your: ${q.answer} | ${q.correct ? "Correct" : `Incorrect (Correct: ${q.expected})`}`
    ),
    "-".repeat(40),
  ];
}
