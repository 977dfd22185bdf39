import { NextRequest, NextResponse } from "next/server";
import { IncompleteSubmissionError } from "@/lib/errors";
import { errorResponse } from "@/lib/http";
import { isMcq } from "@/lib/mcq";
import { findUnanswered, scoreQuiz } from "@/lib/score";
import type { MCQ, UserAnswers } from "@/lib/types";

function parseMcqs(value: unknown): MCQ[] | null {
  return Array.isArray(value) && value.every(isMcq) ? value : null;
}

function parseAnswers(value: unknown, count: number): UserAnswers | null {
  if (typeof value !== "object" || value === null || Array.isArray(value)) return null;
  const answers: UserAnswers = {};
  for (const [key, answer] of Object.entries(value)) {
    if (!/^\d+$/.test(key)) return null;
    const index = Number(key);
    if (index >= count) return null;
    if (answer !== null && typeof answer !== "string") return null;
    answers[index] = answer;
  }
  return answers;
}

export async function POST(req: NextRequest) {
  try {
    const body: unknown = await req.json();
    if (typeof body !== "object" || body === null) {
      return NextResponse.json({ error: "Invalid request" }, { status: 400 });
    }

    const mcqs = parseMcqs("mcqs" in body ? body.mcqs : undefined);
    if (!mcqs) return NextResponse.json({ error: "Invalid quiz" }, { status: 400 });

    const answers = parseAnswers("answers" in body ? body.answers : {}, mcqs.length);
    if (!answers) return NextResponse.json({ error: "Invalid answers" }, { status: 400 });

    const missing = findUnanswered(mcqs.length, answers);
    if (missing.length) return errorResponse(new IncompleteSubmissionError(missing), 422);

    return NextResponse.json(scoreQuiz(mcqs, answers));
  } catch (error) {
    console.error(error);
    return NextResponse.json({ error: "Failed to grade quiz" }, { status: 500 });
  }
}
