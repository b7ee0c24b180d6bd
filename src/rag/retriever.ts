import { describeError } from "./errors.js";
import type { Logger } from "./logger.js";
import type { SearchFilters, SearchResult } from "./types.js";
import type { FieldCondition, MetadataFilter, VectorMatch, VectorStore } from "./vector-store.js";

/** "\\2024\\03\\" and "2024//03" both become "2024/03". */
export function normalizeDirectory(directory: string): string {
  return directory.split(/[\\/]+/).filter(Boolean).join("/");
}

/**
 * Caller filters to the store's metadata shape. A directory matches by
 * prefix through the dirN field of its depth: "2024/03" → dir2.
 */
export function translateFilters(filters: SearchFilters = {}): MetadataFilter | undefined {
  const clauses: MetadataFilter[] = [];

  if (filters.category) {
    clauses.push({ category: { $eq: filters.category } });
  }

  const directory = filters.directory ? normalizeDirectory(filters.directory) : "";
  if (directory) {
    const depth = directory.split("/").length;
    clauses.push({ [`dir${depth}`]: { $eq: directory } });
  }

  const importedAt: FieldCondition = {};
  if (filters.importedFrom) importedAt.$gte = filters.importedFrom.getTime();
  if (filters.importedTo) importedAt.$lte = filters.importedTo.getTime();
  if (importedAt.$gte !== undefined || importedAt.$lte !== undefined) {
    clauses.push({ importedAt });
  }

  if (clauses.length === 0) return undefined;
  if (clauses.length === 1) return clauses[0];
  return { $and: clauses };
}

export function queryTerms(query: string): string[] {
  const words = query.toLowerCase().split(/[^\p{L}\p{N}]+/u).filter((w) => w.length > 1);
  return [...new Set(words)];
}

/** Share of distinct query terms that occur in the text, in [0, 1]. */
export function keywordScore(text: string, terms: string[]): number {
  if (terms.length === 0) return 0;
  const body = text.toLowerCase();
  const hits = terms.filter((t) => body.includes(t)).length;
  return hits / terms.length;
}

/** Score descending, then shorter path, then path, then page, then chunk. */
export function compareResults(a: SearchResult, b: SearchResult): number {
  return (
    b.score - a.score ||
    a.documentPath.length - b.documentPath.length ||
    (a.documentPath < b.documentPath ? -1 : a.documentPath > b.documentPath ? 1 : 0) ||
    a.page - b.page ||
    a.chunkIndex - b.chunkIndex
  );
}

function toSearchResult(match: VectorMatch, score: number): SearchResult {
  const m = match.metadata;
  return {
    chunkId: match.id,
    documentId: m.documentId,
    chunkIndex: m.chunkIndex,
    score,
    documentPath: m.documentPath,
    page: m.pageNumber,
    directory: m.directory,
    category: m.category,
    content: m.text,
  };
}

export class RetrievalAggregator {
  constructor(
    private readonly store: VectorStore,
    private readonly logger: Logger,
  ) {}

  async search(query: string, filters: SearchFilters = {}, limit = 5): Promise<SearchResult[]> {
    const filter = translateFilters(filters);

    let results: SearchResult[];
    try {
      const matches = await this.store.query(query, filter, limit);
      results = matches.map((m) => toSearchResult(m, m.score));
    } catch (err) {
      this.logger.warn(
        { code: "RETRIEVAL_STORE_UNAVAILABLE", err: describeError(err) },
        "vector search failed, falling back to keyword search",
      );
      results = await this.keywordSearch(query, filter);
    }

    return results.sort(compareResults).slice(0, limit);
  }

  private async keywordSearch(query: string, filter: MetadataFilter | undefined): Promise<SearchResult[]> {
    let candidates: VectorMatch[];
    try {
      candidates = await this.store.scan(filter);
    } catch (err) {
      this.logger.error({ err: describeError(err) }, "keyword fallback failed, returning no results");
      return [];
    }

    const terms = queryTerms(query);
    return candidates
      .map((c) => toSearchResult(c, keywordScore(c.metadata.text, terms)))
      .filter((r) => r.score > 0);
  }
}
