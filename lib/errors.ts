// lib/errors.ts

export type QuizErrorCode =
  | "UNSUPPORTED_FORMAT"
  | "EXTRACTION_ERROR"
  | "MALFORMED_RESPONSE"
  | "INVALID_MCQ_SHAPE"
  | "GENERATION_ERROR"
  | "MISSING_CREDENTIAL"
  | "INCOMPLETE_SUBMISSION";

export class QuizError extends Error {
  constructor(
    readonly code: QuizErrorCode,
    message: string,
    options?: { cause?: unknown }
  ) {
    super(message, options);
    this.name = new.target.name;
  }
}

export class UnsupportedFormatError extends QuizError {
  constructor(readonly mediaType: string) {
    super("UNSUPPORTED_FORMAT", `Unsupported file type: ${mediaType || "unknown"}`);
  }
}

export class ExtractionError extends QuizError {
  constructor(message: string, cause?: unknown) {
    super("EXTRACTION_ERROR", message, { cause });
  }
}

export class MalformedResponseError extends QuizError {
  constructor(message: string, readonly content: string, cause?: unknown) {
    super("MALFORMED_RESPONSE", message, { cause });
  }
}

export class InvalidMcqShapeError extends QuizError {
  constructor(reason: string) {
    super("INVALID_MCQ_SHAPE", `Generated MCQ did not match expected format: ${reason}`);
  }
}

export class GenerationError extends QuizError {
  constructor(cause: unknown) {
    super("GENERATION_ERROR", `Error generating MCQ: ${describeError(cause)}`, { cause });
  }
}

export class MissingCredentialError extends QuizError {
  constructor() {
    super("MISSING_CREDENTIAL", "OpenAI API key not found. Enter a key to generate a quiz.");
  }
}

export class IncompleteSubmissionError extends QuizError {
  constructor(readonly missing: number[]) {
    super("INCOMPLETE_SUBMISSION", `Please answer all questions. Missing: ${missing.join(", ")}`);
  }
}

export type McqFailure = MalformedResponseError | InvalidMcqShapeError | GenerationError;

export function describeError(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
