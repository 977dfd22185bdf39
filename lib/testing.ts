// lib/testing.ts
// Stand-ins for the OpenAI client, shared by the test suites.
import type { ChatCompletionCreateParamsNonStreaming } from "openai/resources/chat/completions";
import { vi } from "vitest";
import type { MCQ } from "./types";

export type Reply = string | null | Error;

export function sampleMcq(overrides: Partial<MCQ> = {}): MCQ {
  return {
    question: "What does photosynthesis produce?",
    options: ["Glucose and oxygen", "Carbon dioxide", "Nitrogen", "Methane"],
    correct_answer: "Glucose and oxygen",
    explanation: "Plants turn light, water and CO2 into glucose and release oxygen.",
    ...overrides,
  };
}

/** A client whose replies are produced per call; `reply(n)` gets the 0-based call number. */
export function stubClient(reply: (call: number, body: ChatCompletionCreateParamsNonStreaming) => Reply) {
  let calls = 0;
  const create = vi.fn(async (body: ChatCompletionCreateParamsNonStreaming) => {
    const next = reply(calls++, body);
    if (next instanceof Error) throw next;
    return { choices: [{ message: { content: next } }] };
  });
  return { client: { chat: { completions: { create } } }, create };
}

/** Replies in order, then empty responses once the list runs out. */
export function scriptedClient(...replies: Reply[]) {
  return stubClient(call => (call < replies.length ? replies[call] : null));
}

export function userPrompt(body: ChatCompletionCreateParamsNonStreaming): string {
  const message = body.messages.find(m => m.role === "user");
  return typeof message?.content === "string" ? message.content : "";
}
