// lib/batch.ts
import { DEFAULT_TEMPERATURE } from "./config";
import type { McqFailure } from "./errors";
import { generateMcq, type CompletionClient } from "./mcq";
import type { LearningPoint, MCQ } from "./types";

export interface BatchOptions {
  /** Called after every attempt, success or not. `current` is 1-based. */
  onProgress?: (current: number, total: number) => void;
  onFailure?: (error: McqFailure, learningPoint: LearningPoint) => void;
  /** Uniform [0, 1) source, `Math.random` by default. */
  random?: () => number;
  temperature?: number;
}

/** Picks up to `count` distinct points uniformly at random, in the order drawn. */
export function sampleLearningPoints(
  points: readonly LearningPoint[],
  count: number,
  random: () => number = Math.random
): LearningPoint[] {
  const pool = [...points];
  const n = Math.max(0, Math.min(Math.floor(count), pool.length));

  // Partial Fisher-Yates: the first n slots end up holding the sample
  for (let i = 0; i < n; i++) {
    const j = i + Math.floor(random() * (pool.length - i));
    [pool[i], pool[j]] = [pool[j], pool[i]];
  }
  return pool.slice(0, n);
}

/**
 * Generates one MCQ per sampled learning point, strictly one request at a
 * time. Failed items are dropped, so the result can be shorter than
 * `targetCount`, or empty.
 */
export async function buildQuizBatch(
  client: CompletionClient,
  learningPoints: readonly LearningPoint[],
  targetCount: number,
  options: BatchOptions = {}
): Promise<MCQ[]> {
  const { onProgress, onFailure, random, temperature = DEFAULT_TEMPERATURE } = options;
  const selected = sampleLearningPoints(learningPoints, targetCount, random);
  const mcqs: MCQ[] = [];

  for (const [i, point] of selected.entries()) {
    const result = await generateMcq(client, point, temperature);
    if (result.ok) mcqs.push(result.mcq);
    else onFailure?.(result.error, point);
    onProgress?.(i + 1, selected.length);
  }

  console.info(`Generated ${mcqs.length}/${selected.length} questions`);
  return mcqs;
}
