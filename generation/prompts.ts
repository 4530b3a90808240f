// ─────────────────────────────────────────────────────────────
// Prompt templates. Saved quizzes depend on the quiz wording
// producing an "Answer Key" section; keep it stable.
// ─────────────────────────────────────────────────────────────

export function summaryPrompt(text: string): string {
  return `Summarize this for a teacher:\n\n${text}`;
}

export function quizPrompt(text: string, questionCount: number): string {
  return (
    `Create ${questionCount} quiz questions (with multiple‑choice options) ` +
    `based on the following content, along with an easily formatted answer key:\n\n${text}`
  );
}
