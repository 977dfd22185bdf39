// lib/openai.ts
import OpenAI from "openai";
import { getServerApiKey } from "./config";
import { MissingCredentialError } from "./errors";
import { errorResponse } from "./http";

/** Server key first, then whatever the user typed into the page. */
export function resolveApiKey(provided?: unknown): string | null {
  const serverKey = getServerApiKey();
  if (serverKey) return serverKey;
  return typeof provided === "string" && provided.trim() ? provided.trim() : null;
}

export function createClient(apiKey: string) {
  // One attempt per question; the SDK would otherwise retry twice
  return new OpenAI({ apiKey, maxRetries: 0 });
}

export type ClientResult =
  | { ok: true; client: OpenAI }
  | { ok: false; response: ReturnType<typeof errorResponse> };

export function requireClient(provided?: unknown): ClientResult {
  const apiKey = resolveApiKey(provided);
  if (!apiKey) return { ok: false, response: errorResponse(new MissingCredentialError(), 401) };
  return { ok: true, client: createClient(apiKey) };
}
