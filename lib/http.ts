// lib/http.ts
import { NextResponse } from "next/server";
import { IncompleteSubmissionError, type QuizError, type QuizErrorCode } from "./errors";

export function errorResponse(error: QuizError, status: number) {
  const body: { error: string; code: QuizErrorCode; missing?: number[] } = {
    error: error.message,
    code: error.code,
  };
  if (error instanceof IncompleteSubmissionError) body.missing = error.missing;
  return NextResponse.json(body, { status });
}
