import { afterEach, beforeEach, describe, expect, it, vi } from "vitest";
import { NextRequest } from "next/server";
import { parseQuizStream } from "@/lib/stream";
import { GET, POST } from "./route";

const openai = vi.hoisted(() => {
  const constructed: unknown[] = [];
  const replies: string[] = [];
  return { constructed, replies };
});

const VALID_REPLY = JSON.stringify({
  question: "Which process stores light energy as glucose?",
  options: ["Photosynthesis", "Respiration", "Fermentation", "Digestion"],
  correct_answer: "Photosynthesis",
  explanation: "Plants store light energy in glucose.",
});

// Queued replies are used first; every later call gets VALID_REPLY
vi.mock("openai", () => {
  class OpenAI {
    constructor(options: unknown) {
      openai.constructed.push(options);
    }

    chat = {
      completions: {
        create: async () => ({
          choices: [{ message: { content: openai.replies.shift() ?? VALID_REPLY } }],
        }),
      },
    };
  }
  return { default: OpenAI };
});

const POINTS = [
  "Photosynthesis converts light energy into chemical energy.",
  "Mitochondria produce most of the cell's supply of ATP.",
  "DNA carries the genetic instructions of living organisms.",
];

function generate(body: unknown) {
  return POST(new NextRequest("http://localhost/api/quiz", {
    method: "POST",
    headers: { "Content-Type": "application/json" },
    body: JSON.stringify(body),
  }));
}

beforeEach(() => {
  vi.stubEnv("OPENAI_API_KEY", "");
  vi.spyOn(console, "info").mockImplementation(() => {});
  vi.spyOn(console, "warn").mockImplementation(() => {});
  openai.constructed.length = 0;
  openai.replies.length = 0;
});

afterEach(() => {
  vi.unstubAllEnvs();
  vi.restoreAllMocks();
});

describe("/api/quiz", () => {
  it("reports whether the server has a key", async () => {
    expect(await (await GET()).json()).toEqual({ hasServerKey: false });
    vi.stubEnv("OPENAI_API_KEY", "test-server-key");
    expect(await (await GET()).json()).toEqual({ hasServerKey: true });
  });

  it("needs a key before generating", async () => {
    const res = await generate({ learningPoints: POINTS, questionCount: 5 });
    expect(res.status).toBe(401);
    expect((await res.json()).code).toBe("MISSING_CREDENTIAL");
  });

  it("needs learning points", async () => {
    const res = await generate({ learningPoints: [], apiKey: "test-key" });
    expect(res.status).toBe(400);
  });

  it("streams progress and then the generated quiz", async () => {
    const res = await generate({ learningPoints: POINTS, questionCount: 5, apiKey: "test-key" });
    expect(res.status).toBe(200);

    const { progress, result } = parseQuizStream(await res.text());
    expect(progress).toEqual({ current: 3, total: 3 });
    expect(result?.requested).toBe(3);
    expect(result?.failed).toBe(0);
    expect(result?.mcqs).toHaveLength(3);
    expect(result?.mcqs[0].correct_answer).toBe("Photosynthesis");
    expect(result?.error).toBeUndefined();
  });

  it("builds a client that never retries", async () => {
    const res = await generate({ learningPoints: POINTS, questionCount: 3, apiKey: "test-key" });
    await res.text();
    expect(openai.constructed).toEqual([{ apiKey: "test-key", maxRetries: 0 }]);
  });

  it("reports an error when every reply is unusable", async () => {
    openai.replies.push("not json", "{}");
    const res = await generate({ learningPoints: POINTS.slice(0, 2), questionCount: 5, apiKey: "test-key" });
    expect(res.status).toBe(200);

    const { progress, result } = parseQuizStream(await res.text());
    expect(progress).toEqual({ current: 2, total: 2 });
    expect(result).toEqual({
      mcqs: [],
      requested: 2,
      failed: 2,
      error: "Failed to generate quiz. Please try again.",
    });
  });

  it("keeps the questions that did generate", async () => {
    openai.replies.push("```\nnot a question\n```");
    const res = await generate({ learningPoints: POINTS, questionCount: 3, apiKey: "test-key" });

    const { result } = parseQuizStream(await res.text());
    expect(result?.requested).toBe(3);
    expect(result?.failed).toBe(1);
    expect(result?.mcqs).toHaveLength(2);
    expect(result?.error).toBeUndefined();
  });
});
