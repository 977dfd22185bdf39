import { describe, expect, it } from "vitest";
import { IncompleteSubmissionError } from "./errors";
import { answerQuestion, checkSubmission, createQuizSession, emptyQuizSession, fillQuizSession, markSubmitted, resetQuizSession } from "./session";
import { sampleMcq } from "./testing";

const mcqs = [
  sampleMcq({ question: "Q1?", options: ["A", "B", "C", "D"], correct_answer: "B" }),
  sampleMcq({ question: "Q2?", options: ["A", "B", "C", "D"], correct_answer: "C" }),
  sampleMcq({ question: "Q3?", options: ["A", "B", "C", "D"], correct_answer: "A" }),
  sampleMcq({ question: "Q4?", options: ["A", "B", "C", "D"], correct_answer: "D" }),
];

describe("quiz session", () => {
  it("starts with no answers", () => {
    const session = createQuizSession(mcqs);
    expect(session.mcqs).toBe(mcqs);
    expect(session.userAnswers).toEqual({});
    expect(session.submitted).toBe(false);
    expect(session.id).toMatch(/^[\w-]{12}$/);
  });

  it("records answers without touching the previous session", () => {
    const before = createQuizSession(mcqs);
    const after = answerQuestion(before, 0, "B");
    expect(after.userAnswers).toEqual({ 0: "B" });
    expect(before.userAnswers).toEqual({});
    expect(answerQuestion(after, 0, "C").userAnswers).toEqual({ 0: "C" });
  });

  it("ignores out-of-range questions and unknown options", () => {
    const session = createQuizSession(mcqs);
    expect(answerQuestion(session, 4, "A")).toBe(session);
    expect(answerQuestion(session, -1, "A")).toBe(session);
    expect(answerQuestion(session, 0, "E")).toBe(session);
  });

  it("rejects a submission with missing answers", () => {
    let session = createQuizSession(mcqs);
    session = answerQuestion(session, 0, "B");
    session = answerQuestion(session, 2, "C");

    const error = checkSubmission(session);
    expect(error).toBeInstanceOf(IncompleteSubmissionError);
    expect(error?.missing).toEqual([2, 4]);
    expect(error?.message).toBe("Please answer all questions. Missing: 2, 4");
  });

  it("accepts a complete submission and then freezes answers", () => {
    let session = createQuizSession(mcqs);
    ["B", "C", "A", "D"].forEach((opt, i) => { session = answerQuestion(session, i, opt); });
    expect(checkSubmission(session)).toBeNull();

    const submitted = markSubmitted(session);
    expect(submitted.submitted).toBe(true);
    expect(answerQuestion(submitted, 0, "A")).toBe(submitted);
  });

  it("resets every field at once", () => {
    const used = markSubmitted(answerQuestion(createQuizSession(mcqs), 0, "B"));
    const fresh = resetQuizSession();
    expect(fresh).toMatchObject({ mcqs: [], userAnswers: {}, submitted: false });
    expect(fresh.id).not.toBe(used.id);
    expect(emptyQuizSession().mcqs).toEqual([]);
  });

  it("gives every new quiz its own id", () => {
    const ids = new Set([createQuizSession(mcqs).id, createQuizSession(mcqs).id, resetQuizSession().id]);
    expect(ids.size).toBe(3);
  });

  it("fills the session a batch was generated for", () => {
    const pending = resetQuizSession();
    const filled = fillQuizSession(pending, pending.id, mcqs);
    expect(filled.mcqs).toBe(mcqs);
    expect(filled.userAnswers).toEqual({});
    expect(filled.id).not.toBe(pending.id);
  });

  it("drops a batch whose session was replaced meanwhile", () => {
    const pending = resetQuizSession();
    const newer = resetQuizSession();
    expect(fillQuizSession(newer, pending.id, mcqs)).toBe(newer);
  });
});
