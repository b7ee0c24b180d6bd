import type { EntityMap } from "../types.js";

/** One document category: how strongly a text looks like it, and what to pull out of it. */
export interface CategoryDetector {
  readonly name: string;
  /** Confidence in [0, 1]. */
  match(text: string): number;
  extract(text: string): EntityMap;
}

export interface CategorizationOptions {
  /** Suggestions must score above this; also the confidence of the "general" fallback. */
  floor: number;
  /** Detector names that win ties, in order. Unlisted detectors follow in declaration order. */
  tieBreak: string[];
}
