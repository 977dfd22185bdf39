// lib/extract.ts
import { ExtractionError, UnsupportedFormatError, describeError } from "./errors";
import type { DocumentKind, ExtractedText, RawDocument } from "./types";

export const MEDIA_TYPES: Record<Exclude<DocumentKind, "unsupported">, string> = {
  pdf: "application/pdf",
  docx: "application/vnd.openxmlformats-officedocument.wordprocessingml.document",
  "plain-text": "text/plain",
};

const EXTENSIONS: Record<string, DocumentKind> = {
  ".pdf": "pdf",
  ".docx": "docx",
  ".txt": "plain-text",
};

export function resolveDocumentKind(mediaType: string, fileName = ""): DocumentKind {
  const type = mediaType.split(";")[0].trim().toLowerCase();
  if (type === MEDIA_TYPES.pdf) return "pdf";
  if (type === MEDIA_TYPES.docx) return "docx";
  if (type === MEDIA_TYPES["plain-text"]) return "plain-text";

  // Some browsers send an empty type for files they don't recognise
  if (!type) {
    const dot = fileName.lastIndexOf(".");
    const ext = dot === -1 ? "" : fileName.slice(dot).toLowerCase();
    return EXTENSIONS[ext] ?? "unsupported";
  }
  return "unsupported";
}

function joinUnits(units: string[]): string {
  return units.map(u => u + "\n").join("");
}

function countNonBlank(lines: string[]): number {
  return lines.filter(l => l.trim()).length;
}

async function extractPdf(bytes: Uint8Array): Promise<ExtractedText> {
  const { extractText: extractPdfText } = await import("unpdf");
  // pdf.js may detach the buffer it is given
  const { totalPages, text } = await extractPdfText(bytes.slice(), { mergePages: false });
  const pages = Array.isArray(text) ? text : [text];
  return { text: joinUnits(pages.filter(Boolean)), unitCount: totalPages };
}

async function extractDocx(bytes: Uint8Array): Promise<ExtractedText> {
  const { default: mammoth } = await import("mammoth");
  const { value } = await mammoth.extractRawText({ buffer: Buffer.from(bytes) });
  // mammoth ends every paragraph with a blank line; a single "\n" is a line break inside one
  const paragraphs = value.split("\n\n").filter(p => p.trim());
  return { text: joinUnits(paragraphs), unitCount: paragraphs.length };
}

function extractPlainText(bytes: Uint8Array): ExtractedText {
  const text = new TextDecoder("utf-8", { fatal: true }).decode(bytes);
  return { text, unitCount: countNonBlank(text.split("\n")) };
}

type Extractor = (bytes: Uint8Array) => Promise<ExtractedText> | ExtractedText;

const HANDLERS: Record<Exclude<DocumentKind, "unsupported">, Extractor> = {
  pdf: extractPdf,
  docx: extractDocx,
  "plain-text": extractPlainText,
};

const LABELS: Record<Exclude<DocumentKind, "unsupported">, string> = {
  pdf: "PDF",
  docx: "DOCX",
  "plain-text": "TXT",
};

export type ExtractionOutcome = ExtractedText & {
  error: UnsupportedFormatError | ExtractionError | null;
};

/**
 * Pulls raw text out of an uploaded document. Never throws: a failure comes
 * back as empty text, a zero count and the error, and callers must not go on
 * to sentence filtering when `text` is empty.
 */
export async function extractText(document: RawDocument, mediaType = ""): Promise<ExtractionOutcome> {
  if (document.kind === "unsupported") {
    const error = new UnsupportedFormatError(mediaType);
    console.error(error.message);
    return { text: "", unitCount: 0, error };
  }

  const kind = document.kind;
  const label = document.name ? `${LABELS[kind]} ${document.name}` : LABELS[kind];
  try {
    const result = await HANDLERS[kind](document.bytes);
    return { ...result, error: null };
  } catch (e) {
    const error = e instanceof ExtractionError
      ? e
      : new ExtractionError(`Error reading ${label}: ${describeError(e)}`, e);
    console.error(error.message);
    return { text: "", unitCount: 0, error };
  }
}
