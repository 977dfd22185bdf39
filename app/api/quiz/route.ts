import { NextRequest, NextResponse } from "next/server";
import { buildQuizBatch } from "@/lib/batch";
import { clampQuestionCount, getServerApiKey } from "@/lib/config";
import { requireClient } from "@/lib/openai";
import { formatDone, formatProgress } from "@/lib/stream";
import type { QuizStreamResult } from "@/lib/types";

export async function POST(req: NextRequest) {
  let body: unknown;
  try {
    body = await req.json();
  } catch {
    return NextResponse.json({ error: "Invalid JSON body" }, { status: 400 });
  }
  if (typeof body !== "object" || body === null) {
    return NextResponse.json({ error: "Invalid request" }, { status: 400 });
  }

  const learningPoints = "learningPoints" in body && Array.isArray(body.learningPoints)
    ? body.learningPoints.filter((p): p is string => typeof p === "string" && p.trim() !== "")
    : [];
  if (!learningPoints.length) {
    return NextResponse.json({ error: "No learning points provided" }, { status: 400 });
  }

  const auth = requireClient("apiKey" in body ? body.apiKey : undefined);
  if (!auth.ok) return auth.response;
  const { client } = auth;

  const questionCount = clampQuestionCount("questionCount" in body ? body.questionCount : undefined);
  const requested = Math.min(questionCount, learningPoints.length);
  const encoder = new TextEncoder();

  const stream = new ReadableStream<Uint8Array>({
    async start(controller) {
      let failed = 0;
      try {
        const mcqs = await buildQuizBatch(client, learningPoints, requested, {
          onProgress: (current, total) => controller.enqueue(encoder.encode(formatProgress(current, total))),
          onFailure: () => { failed++; },
        });
        const result: QuizStreamResult = { mcqs, requested, failed };
        if (!mcqs.length) result.error = "Failed to generate quiz. Please try again.";
        controller.enqueue(encoder.encode(formatDone(result)));
      } catch (error) {
        console.error("Quiz stream error:", error);
        controller.enqueue(encoder.encode(formatDone({ mcqs: [], requested, failed, error: "Something went wrong" })));
      } finally {
        controller.close();
      }
    },
  });

  return new Response(stream, {
    headers: { "Content-Type": "text/plain; charset=utf-8", "Cache-Control": "no-store" },
  });
}

export async function GET() {
  return NextResponse.json({ hasServerKey: getServerApiKey() !== null });
}
