import { LocalIndex, type MetadataFilter as VectraFilter } from "vectra";
import { z } from "zod";
import type { Embedder } from "./embedding-service.js";
import { RetrievalStoreUnavailableError } from "./errors.js";
import type { Logger } from "./logger.js";

export interface FieldCondition {
  $eq?: string | number;
  $gte?: number;
  $lte?: number;
  $in?: Array<string | number>;
}

/** Same shape vectra evaluates: field conditions, or `$and` of filters. */
export type MetadataFilter = { $and: MetadataFilter[] } | { [field: string]: FieldCondition };

export interface ChunkMetadata {
  documentId: string;
  documentPath: string;
  directory: string;
  category: string;
  pageNumber: number;
  chunkIndex: number;
  /** Epoch milliseconds. */
  importedAt: number;
  text: string;
}

export interface StoredChunk {
  id: string;
  vector: number[];
  metadata: ChunkMetadata;
}

export interface VectorMatch {
  id: string;
  score: number;
  metadata: ChunkMetadata;
}

export interface StoreStats {
  chunks: number;
  documents: number;
}

/** Every operation fails with `RetrievalStoreUnavailableError`. */
export interface VectorStore {
  upsert(chunks: StoredChunk[]): Promise<void>;
  query(text: string, filter: MetadataFilter | undefined, limit: number): Promise<VectorMatch[]>;
  /** Stored chunks matching the filter, unranked (score 0). */
  scan(filter?: MetadataFilter): Promise<VectorMatch[]>;
  /** Relabels every chunk of a document. Returns the number of chunks changed. */
  setCategory(documentId: string, category: string): Promise<number>;
  /** Returns the number of chunks removed. */
  delete(documentId: string): Promise<number>;
  stats(): Promise<StoreStats>;
}

export function isAndFilter(filter: MetadataFilter): filter is { $and: MetadataFilter[] } {
  return "$and" in filter;
}

/** "2024/03/tax" → { dir1: "2024", dir2: "2024/03", dir3: "2024/03/tax" } */
export function directoryPrefixes(directory: string): Record<string, string> {
  const parts = directory.split("/").filter(Boolean);
  const out: Record<string, string> = {};
  parts.forEach((_, i) => {
    out[`dir${i + 1}`] = parts.slice(0, i + 1).join("/");
  });
  return out;
}

function toVectraFilter(filter: MetadataFilter): VectraFilter {
  if (isAndFilter(filter)) return { $and: filter.$and.map(toVectraFilter) };
  const out: VectraFilter = {};
  for (const [field, condition] of Object.entries(filter)) {
    out[field] = condition;
  }
  return out;
}

export function flattenMetadata(meta: ChunkMetadata): Record<string, string | number> {
  return { ...meta, ...directoryPrefixes(meta.directory) };
}

const chunkMetadataSchema = z.object({
  documentId: z.string(),
  documentPath: z.string(),
  directory: z.string(),
  category: z.string(),
  pageNumber: z.number(),
  chunkIndex: z.number(),
  importedAt: z.number(),
  text: z.string(),
});

export function parseMetadata(raw: unknown): ChunkMetadata {
  return chunkMetadataSchema.parse(raw);
}

export class VectraVectorStore implements VectorStore {
  private readonly index: LocalIndex;
  private ready: Promise<void> | null = null;

  constructor(
    indexDir: string,
    private readonly embedder: Embedder,
    private readonly logger: Logger,
  ) {
    this.index = new LocalIndex(indexDir);
  }

  async upsert(chunks: StoredChunk[]): Promise<void> {
    if (chunks.length === 0) return;
    await this.guard("upsert", async () => {
      await this.ensureIndex();
      await this.index.beginUpdate();
      try {
        for (const chunk of chunks) {
          await this.index.upsertItem({
            id: chunk.id,
            vector: chunk.vector,
            metadata: flattenMetadata(chunk.metadata),
          });
        }
        await this.index.endUpdate();
      } catch (err) {
        this.index.cancelUpdate();
        throw err;
      }
      this.logger.debug({ chunks: chunks.length }, "vectors upserted");
    });
  }

  async query(text: string, filter: MetadataFilter | undefined, limit: number): Promise<VectorMatch[]> {
    return this.guard("query", async () => {
      await this.ensureIndex();
      const vector = await this.embedder.embedQuery(text);
      const results = await this.index.queryItems(
        vector,
        limit,
        filter ? toVectraFilter(filter) : undefined,
      );
      return results.map((r) => ({
        id: r.item.id,
        score: r.score,
        metadata: parseMetadata(r.item.metadata),
      }));
    });
  }

  async scan(filter?: MetadataFilter): Promise<VectorMatch[]> {
    return this.guard("scan", async () => {
      await this.ensureIndex();
      const items = filter
        ? await this.index.listItemsByMetadata(toVectraFilter(filter))
        : await this.index.listItems();
      return items.map((item) => ({ id: item.id, score: 0, metadata: parseMetadata(item.metadata) }));
    });
  }

  async setCategory(documentId: string, category: string): Promise<number> {
    return this.guard("update", async () => {
      await this.ensureIndex();
      const items = await this.index.listItemsByMetadata({ documentId: { $eq: documentId } });
      if (items.length === 0) return 0;
      await this.index.beginUpdate();
      try {
        for (const item of items) {
          await this.index.upsertItem({
            id: item.id,
            vector: item.vector,
            metadata: { ...item.metadata, category },
          });
        }
        await this.index.endUpdate();
      } catch (err) {
        this.index.cancelUpdate();
        throw err;
      }
      return items.length;
    });
  }

  async delete(documentId: string): Promise<number> {
    return this.guard("delete", async () => {
      await this.ensureIndex();
      const items = await this.index.listItemsByMetadata({ documentId: { $eq: documentId } });
      if (items.length === 0) return 0;
      await this.index.beginUpdate();
      try {
        for (const item of items) {
          await this.index.deleteItem(item.id);
        }
        await this.index.endUpdate();
      } catch (err) {
        this.index.cancelUpdate();
        throw err;
      }
      return items.length;
    });
  }

  async stats(): Promise<StoreStats> {
    return this.guard("stats", async () => {
      await this.ensureIndex();
      const items = await this.index.listItems();
      const documents = new Set(items.map((i) => i.metadata["documentId"]));
      return { chunks: items.length, documents: documents.size };
    });
  }

  private ensureIndex(): Promise<void> {
    this.ready ??= (async () => {
      if (!(await this.index.isIndexCreated())) {
        await this.index.createIndex();
      }
    })();
    return this.ready;
  }

  private async guard<T>(operation: string, fn: () => Promise<T>): Promise<T> {
    try {
      return await fn();
    } catch (err) {
      if (err instanceof RetrievalStoreUnavailableError) throw err;
      this.ready = null;
      throw new RetrievalStoreUnavailableError(operation, err);
    }
  }
}
