import path from "node:path";
import type { SearchResult, Source } from "./types.js";

export interface RagContext {
  /** Citation blocks, best result first. */
  text: string;
  /** Results that made it into `text`, in order. */
  used: SearchResult[];
  sources: Source[];
}

const EXCERPT_CHARS = 200;

export function citation(result: SearchResult): string {
  return `[Source: ${path.basename(result.documentPath)}, Page ${result.page}]`;
}

export function excerpt(content: string, max = EXCERPT_CHARS): string {
  const flat = content.replace(/\s+/g, " ").trim();
  return flat.length > max ? `${flat.slice(0, max).trimEnd()}…` : flat;
}

/**
 * Concatenates results in order until `budget` characters are used. The
 * first block is truncated if it alone is too long; any later block that
 * does not fit is dropped together with everything ranked below it.
 */
export function buildContext(results: SearchResult[], budget: number): RagContext | null {
  if (results.length === 0) return null;

  const parts: string[] = [];
  const used: SearchResult[] = [];
  let size = 0;

  for (const result of results) {
    const block = `${citation(result)}\n${result.content}`;
    const separator = parts.length > 0 ? 2 : 0;
    if (size + separator + block.length > budget) {
      if (parts.length === 0) {
        parts.push(block.slice(0, budget));
        used.push(result);
      }
      break;
    }
    parts.push(block);
    used.push(result);
    size += separator + block.length;
  }

  // One source per (document, page), in context order
  const sources: Source[] = [];
  const seen = new Set<string>();
  for (const result of used) {
    const key = `${result.documentPath}\u0000${result.page}`;
    if (seen.has(key)) continue;
    seen.add(key);
    sources.push({
      documentPath: result.documentPath,
      page: result.page,
      directory: result.directory,
      excerpt: excerpt(result.content),
    });
  }

  return { text: parts.join("\n\n"), used, sources };
}

/** "a.pdf p.1, p.3 | b.pdf p.2" */
export function formatSourcesForUI(sources: Source[]): string {
  const byDocument = new Map<string, number[]>();
  for (const s of sources) {
    const pages = byDocument.get(s.documentPath) ?? [];
    pages.push(s.page);
    byDocument.set(s.documentPath, pages);
  }
  return [...byDocument]
    .map(([documentPath, pages]) => {
      const pageRefs = [...pages]
        .sort((a, b) => a - b)
        .map((p) => `p.${p}`)
        .join(", ");
      return `${path.basename(documentPath)} ${pageRefs}`;
    })
    .join(" | ");
}
