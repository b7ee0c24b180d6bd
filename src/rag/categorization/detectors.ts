import { readFileSync } from "node:fs";
import { z } from "zod";
import type { EntityMap } from "../types.js";
import type { CategoryDetector } from "./types.js";

const PATTERNS_FILE = new URL("../../../data/category-patterns.json", import.meta.url);

const entityPatternSchema = z.union([
  z.string(),
  z.object({ regex: z.string(), ignoreCase: z.boolean().default(true) }),
]);

const definitionSchema = z.object({
  name: z.string().min(1),
  /** Number of distinct signals that saturates confidence at 1.0. */
  saturation: z.number().int().positive(),
  signals: z.array(z.string()).min(1),
  entities: z.record(z.array(entityPatternSchema)),
});

const patternsFileSchema = z.object({ detectors: z.array(definitionSchema) });

export type DetectorDefinition = z.input<typeof definitionSchema>;

/**
 * Keyword detector: confidence is the fraction of `saturation` signals
 * present, capped at 1. Each entity takes the first capture group of the
 * first pattern that matches.
 */
export class PatternDetector implements CategoryDetector {
  readonly name: string;
  private readonly saturation: number;
  private readonly signals: RegExp[];
  private readonly entities: Array<[string, RegExp[]]>;

  constructor(definition: DetectorDefinition) {
    const def = definitionSchema.parse(definition);
    this.name = def.name;
    this.saturation = def.saturation;
    this.signals = def.signals.map((s) => new RegExp(s, "iu"));
    this.entities = Object.entries(def.entities).map(([key, patterns]): [string, RegExp[]] => [
      key,
      patterns.map((p) =>
        typeof p === "string" ? new RegExp(p, "imu") : new RegExp(p.regex, p.ignoreCase ? "imu" : "mu"),
      ),
    ]);
  }

  match(text: string): number {
    const hits = this.signals.filter((re) => re.test(text)).length;
    return Math.min(1, hits / this.saturation);
  }

  extract(text: string): EntityMap {
    const found: EntityMap = {};
    for (const [key, patterns] of this.entities) {
      for (const re of patterns) {
        const value = re.exec(text)?.[1]?.trim();
        if (value) {
          found[key] = value;
          break;
        }
      }
    }
    return found;
  }
}

const DATE_RE = /\b(\d{1,2}\.\d{1,2}\.\d{4}|\d{4}-\d{2}-\d{2})\b/;
const AMOUNT_RE = /(\d[\d.,]*)\s*(?:€|EUR\b)/i;

/** Never claims a document; collects the first date and amount it sees. */
export class GeneralDetector implements CategoryDetector {
  static readonly NAME = "general";
  readonly name = GeneralDetector.NAME;

  match(): number {
    return 0;
  }

  extract(text: string): EntityMap {
    const found: EntityMap = {};
    const date = DATE_RE.exec(text)?.[1];
    if (date) found["date"] = date;
    const amount = AMOUNT_RE.exec(text)?.[1];
    if (amount) found["amount"] = amount;
    return found;
  }
}

export function loadDetectorDefinitions(file: URL | string = PATTERNS_FILE): DetectorDefinition[] {
  const raw: unknown = JSON.parse(readFileSync(file, "utf-8"));
  return patternsFileSchema.parse(raw).detectors;
}

/** invoice, bank-statement, contract from the bundled patterns, then general. */
export function defaultDetectors(): CategoryDetector[] {
  return [...loadDetectorDefinitions().map((d) => new PatternDetector(d)), new GeneralDetector()];
}
