import { describe, expect, it } from "vitest";
import { findUnanswered, performanceTier, scoreQuiz } from "./score";
import { sampleMcq } from "./testing";
import type { MCQ } from "./types";

function quiz(count: number): MCQ[] {
  return Array.from({ length: count }, (_, i) =>
    sampleMcq({
      question: `Question ${i + 1}?`,
      options: ["A", "B", "C", "D"],
      correct_answer: "B",
      explanation: `Because of fact ${i + 1}.`,
    })
  );
}

describe("scoreQuiz", () => {
  it("scores 3 of 5 as 60%", () => {
    const report = scoreQuiz(quiz(5), { 0: "B", 1: "B", 2: "A", 3: "B", 4: "D" });
    expect(report.total).toBe(5);
    expect(report.correct).toBe(3);
    expect(report.wrong).toBe(2);
    expect(report.percentage).toBe(60);
    expect(report.wrong_questions.map(w => w.question_num)).toEqual([3, 5]);
  });

  it("scores an empty quiz as zero", () => {
    expect(scoreQuiz([], {})).toEqual({ total: 0, correct: 0, wrong: 0, percentage: 0, wrong_questions: [] });
  });

  it("rounds the percentage down", () => {
    expect(scoreQuiz(quiz(3), { 0: "B", 1: "A", 2: "A" }).percentage).toBe(33);
    expect(scoreQuiz(quiz(3), { 0: "B", 1: "B", 2: "A" }).percentage).toBe(66);
    expect(scoreQuiz(quiz(7), { 0: "B", 1: "B", 2: "B", 3: "B" }).percentage).toBe(57);
  });

  it("records unanswered questions and missing explanations", () => {
    const [first, second] = quiz(2);
    const { explanation: _, ...bare } = second;
    const report = scoreQuiz([first, bare], { 0: null });

    expect(report.wrong_questions).toEqual([
      {
        question_num: 1,
        question: "Question 1?",
        user_answer: "Not answered",
        correct_answer: "B",
        explanation: "Because of fact 1.",
      },
      {
        question_num: 2,
        question: "Question 2?",
        user_answer: "Not answered",
        correct_answer: "B",
        explanation: "N/A",
      },
    ]);
    expect(report.correct + report.wrong).toBe(report.total);
  });

  it("compares answers exactly", () => {
    const mcqs = [sampleMcq()];
    expect(scoreQuiz(mcqs, { 0: "glucose and oxygen" }).correct).toBe(0);
    expect(scoreQuiz(mcqs, { 0: "Glucose and oxygen" }).correct).toBe(1);
  });
});

describe("findUnanswered", () => {
  it("lists missing question numbers, 1-based", () => {
    expect(findUnanswered(4, { 0: "B", 2: "C" })).toEqual([2, 4]);
  });

  it("treats a cleared selection as missing", () => {
    expect(findUnanswered(2, { 0: "A", 1: null })).toEqual([2]);
  });

  it("returns nothing when every question is answered", () => {
    expect(findUnanswered(2, { 0: "A", 1: "B" })).toEqual([]);
  });
});

describe("performanceTier", () => {
  it("splits at 80 and 60", () => {
    expect(performanceTier(100)).toBe("excellent");
    expect(performanceTier(80)).toBe("excellent");
    expect(performanceTier(79)).toBe("good");
    expect(performanceTier(60)).toBe("good");
    expect(performanceTier(59)).toBe("review");
    expect(performanceTier(0)).toBe("review");
  });
});
