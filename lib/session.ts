// lib/session.ts
import { nanoid } from "nanoid";
import { IncompleteSubmissionError } from "./errors";
import { findUnanswered } from "./score";
import type { MCQ, QuizSession } from "./types";

// Sessions are values: every change returns a new object, and a reset
// replaces all fields at once.

export function emptyQuizSession(): QuizSession {
  return { id: nanoid(12), mcqs: [], userAnswers: {}, submitted: false };
}

export function createQuizSession(mcqs: MCQ[]): QuizSession {
  return { ...emptyQuizSession(), mcqs };
}

export const resetQuizSession = emptyQuizSession;

/**
 * Puts a finished batch into the session it was generated for. If the session
 * has since been replaced by an upload or a reset, the batch is stale and
 * `session` comes back unchanged.
 */
export function fillQuizSession(session: QuizSession, pendingId: string, mcqs: MCQ[]): QuizSession {
  return session.id === pendingId ? createQuizSession(mcqs) : session;
}

export function answerQuestion(session: QuizSession, index: number, option: string | null): QuizSession {
  const mcq = session.mcqs[index];
  if (session.submitted || !mcq) return session;
  if (option !== null && !mcq.options.includes(option)) return session;
  return { ...session, userAnswers: { ...session.userAnswers, [index]: option } };
}

export function checkSubmission(session: QuizSession): IncompleteSubmissionError | null {
  const missing = findUnanswered(session.mcqs.length, session.userAnswers);
  return missing.length ? new IncompleteSubmissionError(missing) : null;
}

export function markSubmitted(session: QuizSession): QuizSession {
  return { ...session, submitted: true };
}
