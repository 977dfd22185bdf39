// lib/mcq.ts
import type { ChatCompletionCreateParamsNonStreaming } from "openai/resources/chat/completions";
import { DEFAULT_TEMPERATURE, MAX_OUTPUT_TOKENS, MODEL } from "./config";
import {
  GenerationError,
  InvalidMcqShapeError,
  MalformedResponseError,
  describeError,
  type McqFailure,
} from "./errors";
import type { LearningPoint, MCQ, McqOptions } from "./types";

/** The slice of the OpenAI SDK this module calls. An `OpenAI` instance satisfies it. */
export interface CompletionClient {
  chat: {
    completions: {
      create(body: ChatCompletionCreateParamsNonStreaming): Promise<{
        choices: Array<{ message: { content: string | null } }>;
      }>;
    };
  };
}

export type McqResult = { ok: true; mcq: MCQ } | { ok: false; error: McqFailure };

const SYSTEM_PROMPT = "You are a helpful quiz generator that outputs only valid JSON.";

export function buildMcqPrompt(learningPoint: LearningPoint): string {
  return `You are an expert quiz creator. Generate ONE multiple-choice question based on the following text:

"${learningPoint}"

Return ONLY valid JSON in this exact format (no other text):
{
  "question": "Your question here?",
  "options": ["Option A", "Option B", "Option C", "Option D"],
  "correct_answer": "Option A",
  "explanation": "Brief explanation of why this is correct"
}

Rules:
- Question must test understanding of the key concept
- All 4 options must be plausible
- Only ONE option is correct
- Options should be concise (under 100 characters each)
- The correct_answer must exactly match one of the options`;
}

// Models sometimes wrap JSON in ```json ... ``` despite being told not to
export function stripCodeFence(content: string): string {
  return content
    .trim()
    .replace(/^```[\w-]*[ \t]*\n?/, "")
    .replace(/\n?[ \t]*```$/, "")
    .trim();
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

function isMcqOptions(value: unknown): value is McqOptions {
  return Array.isArray(value) && value.length === 4 && value.every(o => typeof o === "string");
}

/** Checks a parsed model reply and narrows it to an MCQ, or returns why it isn't one. */
export function parseMcq(value: unknown): MCQ | InvalidMcqShapeError {
  if (!isRecord(value)) return new InvalidMcqShapeError("not a JSON object");

  const missing = ["question", "options", "correct_answer"].filter(k => !(k in value));
  if (missing.length) return new InvalidMcqShapeError(`missing ${missing.join(", ")}`);

  const { question, options, correct_answer, explanation } = value;
  if (typeof question !== "string") return new InvalidMcqShapeError("question is not a string");
  if (!Array.isArray(options) || options.length !== 4) {
    return new InvalidMcqShapeError("expected exactly 4 options");
  }
  if (!isMcqOptions(options)) return new InvalidMcqShapeError("options must be strings");
  if (new Set(options).size !== 4) return new InvalidMcqShapeError("options are not distinct");
  if (typeof correct_answer !== "string" || !options.includes(correct_answer)) {
    return new InvalidMcqShapeError("correct_answer is not one of the options");
  }

  const mcq: MCQ = { question, options: [...options], correct_answer };
  if (typeof explanation === "string") mcq.explanation = explanation;
  return mcq;
}

export function isMcq(value: unknown): value is MCQ {
  return !(parseMcq(value) instanceof InvalidMcqShapeError);
}

/** Turns the raw completion text into an MCQ result. */
export function interpretCompletion(content: string | null): McqResult {
  const body = stripCodeFence(content ?? "");
  if (!body) {
    return { ok: false, error: new MalformedResponseError("Model returned an empty response", content ?? "") };
  }

  let parsed: unknown;
  try {
    parsed = JSON.parse(body);
  } catch (e) {
    return {
      ok: false,
      error: new MalformedResponseError(`Failed to parse AI response as JSON: ${describeError(e)}`, body, e),
    };
  }

  const mcq = parseMcq(parsed);
  return mcq instanceof InvalidMcqShapeError ? { ok: false, error: mcq } : { ok: true, mcq };
}

/**
 * Asks the model for one multiple-choice question about `learningPoint`.
 *
 * Exactly one request is made, with no retry. Every failure is returned
 * rather than thrown so a batch can skip the item and carry on.
 */
export async function generateMcq(
  client: CompletionClient,
  learningPoint: LearningPoint,
  temperature = DEFAULT_TEMPERATURE
): Promise<McqResult> {
  let content: string | null;
  try {
    const response = await client.chat.completions.create({
      model: MODEL,
      messages: [
        { role: "system", content: SYSTEM_PROMPT },
        { role: "user", content: buildMcqPrompt(learningPoint) },
      ],
      temperature,
      max_tokens: MAX_OUTPUT_TOKENS,
    });
    content = response.choices[0]?.message.content ?? null;
  } catch (e) {
    const error = new GenerationError(e);
    console.error(error.message);
    return { ok: false, error };
  }

  const result = interpretCompletion(content);
  if (!result.ok) console.warn(result.error.message);
  return result;
}
