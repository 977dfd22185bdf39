// lib/sentences.ts
import { MAX_POINT_LENGTH, MIN_POINT_LENGTH, PREVIEW_LIMIT } from "./config";
import type { LearningPoint } from "./types";

const ELLIPSIS = "...";
const HEADER_MAX_LENGTH = 50;
const MAX_SPECIAL_RATIO = 0.3;

const WORD_OR_SPACE = /[\p{L}\p{N}\s]/u;

function isAllCaps(line: string): boolean {
  return line === line.toUpperCase() && line !== line.toLowerCase();
}

function specialCharRatio(chars: string[]): number {
  const special = chars.filter(c => !WORD_OR_SPACE.test(c)).length;
  return special / chars.length;
}

/**
 * Splits extracted document text into candidate learning points.
 *
 * Lines are broken after every ". ", trimmed, and dropped when they are too
 * short, look like an all-caps header or footer, or are mostly symbols
 * (tables, page furniture). Long lines are cut to `maxLength` characters with
 * a trailing "...". Order of appearance is kept and duplicates are not removed.
 */
export function cleanAndSplit(
  text: string,
  minLength = MIN_POINT_LENGTH,
  maxLength = MAX_POINT_LENGTH
): LearningPoint[] {
  const points: LearningPoint[] = [];

  for (const raw of text.replaceAll(". ", ".\n").split("\n")) {
    const line = raw.trim();
    // Lengths count code points, not UTF-16 units
    const chars = Array.from(line);

    if (chars.length === 0 || chars.length < minLength) continue;
    if (isAllCaps(line) && chars.length < HEADER_MAX_LENGTH) continue;
    if (specialCharRatio(chars) > MAX_SPECIAL_RATIO) continue;

    points.push(chars.length > maxLength ? chars.slice(0, maxLength).join("") + ELLIPSIS : line);
  }

  return points;
}

export function previewLearningPoints(points: LearningPoint[], limit = PREVIEW_LIMIT) {
  return {
    shown: points.slice(0, limit),
    remaining: Math.max(0, points.length - limit),
  };
}
