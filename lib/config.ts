// lib/config.ts

export const MODEL = "gpt-4o-mini";
export const DEFAULT_TEMPERATURE = 0.7;
export const MAX_OUTPUT_TOKENS = 300;

export const MIN_POINT_LENGTH = 30;
export const MAX_POINT_LENGTH = 300;
export const PREVIEW_LIMIT = 20;

export const QUESTION_COUNT = { min: 3, max: 15, default: 5 } as const;

export const API_KEY_ENV = "OPENAI_API_KEY";

export function clampQuestionCount(value: unknown): number {
  const n = typeof value === "string" ? Number(value) : value;
  if (typeof n !== "number" || !Number.isFinite(n)) return QUESTION_COUNT.default;
  return Math.min(QUESTION_COUNT.max, Math.max(QUESTION_COUNT.min, Math.round(n)));
}

export function getServerApiKey(): string | null {
  const key = process.env[API_KEY_ENV]?.trim();
  return key ? key : null;
}
