// lib/types.ts

export type DocumentKind = "pdf" | "docx" | "plain-text" | "unsupported";

export interface RawDocument {
  kind: DocumentKind;
  bytes: Uint8Array;
  name?: string;
}

export interface ExtractedText {
  text: string;
  /** Pages, non-empty paragraphs or non-empty lines, depending on the source. */
  unitCount: number;
}

export type LearningPoint = string;

export type McqOptions = [string, string, string, string];

export interface MCQ {
  question: string;
  options: McqOptions;
  correct_answer: string;
  explanation?: string;
}

// Keys are question indices. null means the selection was cleared.
export type UserAnswers = Record<number, string | null>;

export interface QuizSession {
  id: string;
  mcqs: MCQ[];
  userAnswers: UserAnswers;
  submitted: boolean;
}

export interface WrongQuestion {
  question_num: number;
  question: string;
  user_answer: string;
  correct_answer: string;
  explanation: string;
}

export interface ScoreReport {
  total: number;
  correct: number;
  wrong: number;
  percentage: number;
  wrong_questions: WrongQuestion[];
}

// Shared API payloads
export interface UploadResult {
  fileName: string;
  kind: DocumentKind;
  unitCount: number;
  learningPoints: LearningPoint[];
}

export interface QuizStreamResult {
  mcqs: MCQ[];
  requested: number;
  failed: number;
  error?: string;
}

export interface ApiError {
  error: string;
  code?: string;
  missing?: number[];
}
