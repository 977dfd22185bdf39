// lib/score.ts
import type { MCQ, ScoreReport, UserAnswers, WrongQuestion } from "./types";

export const NOT_ANSWERED = "Not answered";
export const NO_EXPLANATION = "N/A";

export function scoreQuiz(mcqs: readonly MCQ[], userAnswers: UserAnswers): ScoreReport {
  let correct = 0;
  const wrong_questions: WrongQuestion[] = [];

  mcqs.forEach((mcq, i) => {
    const answer = userAnswers[i];
    if (answer === mcq.correct_answer) {
      correct++;
      return;
    }
    wrong_questions.push({
      question_num: i + 1,
      question: mcq.question,
      user_answer: answer ? answer : NOT_ANSWERED,
      correct_answer: mcq.correct_answer,
      explanation: mcq.explanation ?? NO_EXPLANATION,
    });
  });

  const total = mcqs.length;
  return {
    total,
    correct,
    wrong: total - correct,
    percentage: total > 0 ? Math.floor((correct * 100) / total) : 0,
    wrong_questions,
  };
}

/** 1-based numbers of the questions that have no selection yet. */
export function findUnanswered(questionCount: number, userAnswers: UserAnswers): number[] {
  const missing: number[] = [];
  for (let i = 0; i < questionCount; i++) {
    const answer = userAnswers[i];
    if (answer === undefined || answer === null) missing.push(i + 1);
  }
  return missing;
}

export type PerformanceTier = "excellent" | "good" | "review";

export const TIER_MESSAGES: Record<PerformanceTier, string> = {
  excellent: "Excellent! You've mastered this material!",
  good: "Good job! A bit more practice will make you perfect!",
  review: "Keep studying! Review the weak areas below.",
};

export function performanceTier(percentage: number): PerformanceTier {
  if (percentage >= 80) return "excellent";
  if (percentage >= 60) return "good";
  return "review";
}
