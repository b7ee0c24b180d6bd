import type { CategoryResult, CategoryScore } from "../types.js";
import { GeneralDetector } from "./detectors.js";
import type { CategorizationOptions, CategoryDetector } from "./types.js";

/**
 * Runs every detector over the text. The highest confidence wins; equal
 * confidences go to the detector that comes first in the tie-break order
 * (the configured `tieBreak` names, then declaration order).
 */
export class CategorizationEngine {
  private readonly detectors: CategoryDetector[];
  private readonly fallback: CategoryDetector;

  constructor(
    detectors: CategoryDetector[],
    private readonly options: CategorizationOptions,
  ) {
    const rank = (d: CategoryDetector) => {
      const i = options.tieBreak.indexOf(d.name);
      return i === -1 ? options.tieBreak.length : i;
    };
    // Array.prototype.sort is stable, so unlisted detectors keep declaration order.
    this.detectors = [...detectors].sort((a, b) => rank(a) - rank(b));
    this.fallback = detectors.find((d) => d.name === GeneralDetector.NAME) ?? new GeneralDetector();
  }

  get categories(): string[] {
    return this.detectors.map((d) => d.name);
  }

  /** Every detector's confidence, best first, ties in tie-break order. */
  score(text: string): CategoryScore[] {
    return this.detectors
      .map((d) => ({ category: d.name, confidence: d.match(text) }))
      .sort((a, b) => b.confidence - a.confidence);
  }

  categorize(text: string): CategoryResult {
    const ranked = this.score(text).filter((s) => s.confidence > this.options.floor);
    const primary = ranked[0];

    if (!primary) {
      return {
        category: this.fallback.name,
        confidence: this.options.floor,
        entities: this.fallback.extract(text),
        suggestions: [],
      };
    }

    return {
      category: primary.category,
      confidence: primary.confidence,
      entities: this.detector(primary.category).extract(text),
      suggestions: ranked.slice(1),
    };
  }

  /**
   * Manual assignment. The chosen category gets full confidence; the
   * automatic ranking is kept as suggestions.
   */
  categorizeAs(text: string, category: string): CategoryResult {
    return {
      category,
      confidence: 1,
      entities: this.detector(category).extract(text),
      suggestions: this.score(text).filter(
        (s) => s.category !== category && s.confidence > this.options.floor,
      ),
    };
  }

  private detector(name: string): CategoryDetector {
    return this.detectors.find((d) => d.name === name) ?? this.fallback;
  }
}
