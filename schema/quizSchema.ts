// ─────────────────────────────────────────────────────────────
// Quiz Schema — Generated quizzes and grading results
// ─────────────────────────────────────────────────────────────

/** A generated quiz split at the answer-key marker */
export interface QuizParts {
  questions: string;
  /** Empty when the generator omitted the marker */
  answerKey: string;
}

/** One line of a response file: `name, ans1, ans2, …` */
export interface StudentResponse {
  student: string;
  answers: string[];
}

export interface QuestionOutcome {
  /** 1-based question number */
  index: number;
  answer: string;
  expected: string;
  correct: boolean;
}

export interface GradeResult {
  student: string;
  score: number;
  /** Always the full answer-key length, even for short submissions */
  total: number;
  breakdown: QuestionOutcome[];
}
