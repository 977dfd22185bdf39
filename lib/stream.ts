// lib/stream.ts
import { isMcq } from "./mcq";
import type { QuizStreamResult } from "./types";

// Quiz generation streams plain text: one "PROGRESS i/n" line per attempt,
// then DONE_MARKER followed by the JSON result.
export const DONE_MARKER = "\n\n__DONE__";

const PROGRESS_LINE = /^PROGRESS (\d+)\/(\d+)$/;

export function formatProgress(current: number, total: number): string {
  return `PROGRESS ${current}/${total}\n`;
}

export function formatDone(result: QuizStreamResult): string {
  return DONE_MARKER + JSON.stringify(result);
}

function isQuizStreamResult(value: unknown): value is QuizStreamResult {
  if (typeof value !== "object" || value === null) return false;
  if (!("mcqs" in value && "requested" in value && "failed" in value)) return false;
  const { mcqs, requested, failed } = value;
  const error = "error" in value ? value.error : undefined;
  return (
    Array.isArray(mcqs) && mcqs.every(isMcq) &&
    typeof requested === "number" &&
    typeof failed === "number" &&
    (error === undefined || typeof error === "string")
  );
}

export interface QuizStreamState {
  progress: { current: number; total: number } | null;
  result: QuizStreamResult | null;
}

/** Reads whatever has arrived so far. `result` stays null until the stream is complete and valid. */
export function parseQuizStream(accumulated: string): QuizStreamState {
  const doneIdx = accumulated.indexOf(DONE_MARKER);
  const head = doneIdx === -1 ? accumulated : accumulated.slice(0, doneIdx);

  let progress: QuizStreamState["progress"] = null;
  for (const line of head.split("\n")) {
    const m = line.match(PROGRESS_LINE);
    if (m) progress = { current: Number(m[1]), total: Number(m[2]) };
  }

  if (doneIdx === -1) return { progress, result: null };

  let payload: unknown;
  try {
    payload = JSON.parse(accumulated.slice(doneIdx + DONE_MARKER.length));
  } catch {
    return { progress, result: null };
  }
  return { progress, result: isQuizStreamResult(payload) ? payload : null };
}
