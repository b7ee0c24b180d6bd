import path from "node:path";
import type { CategorizationEngine } from "./categorization/index.js";
import { chunkText, type ChunkingOptions } from "./chunking/index.js";
import type { Embedder } from "./embedding-service.js";
import { OperationCancelledError, UnprocessableDocumentError, describeError } from "./errors.js";
import { directoryLabel, hashFile, isPdf, scanPdfFiles } from "./file-scanner.js";
import type { Logger } from "./logger.js";
import type { MetadataStore } from "./metadata-store.js";
import type { ContentExtractor } from "./pdf-extractor.js";
import type { DocumentRecord } from "./types.js";
import type { StoredChunk, VectorStore } from "./vector-store.js";

export interface ImportFileOptions {
  /** Re-import even when the content hash is unchanged. */
  force?: boolean;
  /** Manual category; skips detection. */
  category?: string;
  directory?: string;
  signal?: AbortSignal;
}

export interface ImportDirectoryOptions {
  recursive?: boolean;
  force?: boolean;
  category?: string;
  signal?: AbortSignal;
  onProgress?: (done: number, total: number, filePath: string) => void;
}

export type ImportOutcome =
  | { status: "imported"; record: DocumentRecord }
  | { status: "skipped"; filePath: string; reason: string };

export interface BatchSummary {
  total: number;
  imported: DocumentRecord[];
  skipped: Array<{ filePath: string; reason: string }>;
  failed: Array<{ filePath: string; error: string }>;
}

export interface IngestionDeps {
  extractor: ContentExtractor;
  categorizer: CategorizationEngine;
  embedder: Embedder;
  store: VectorStore;
  metadata: MetadataStore;
  chunking: ChunkingOptions;
  logger: Logger;
}

/**
 * Extract → categorize → chunk → embed → store, one document at a time.
 * Vectors are written before the metadata record, so a document only shows
 * up in listings once it is searchable.
 */
export class IngestionPipeline {
  constructor(private readonly deps: IngestionDeps) {}

  async importFile(filePath: string, options: ImportFileOptions = {}): Promise<ImportOutcome> {
    const { extractor, categorizer, embedder, store, metadata, chunking, logger } = this.deps;
    const absPath = path.resolve(filePath);
    const fileName = path.basename(absPath);
    const log = logger.child({ file: fileName });

    if (!isPdf(absPath)) {
      throw new UnprocessableDocumentError(absPath, "not a PDF file");
    }

    const existing = await metadata.getByPath(absPath);
    if (existing && !options.force) {
      const hash = await hashFile(absPath).catch((err: unknown) => {
        throw new UnprocessableDocumentError(absPath, `cannot read file (${describeError(err)})`, err);
      });
      if (hash === existing.contentHash) {
        log.info("unchanged, skipping");
        return { status: "skipped", filePath: absPath, reason: "unchanged since last import" };
      }
    }

    log.info("extracting");
    const content = await extractor.extract(absPath, {
      directory: options.directory ?? existing?.directory ?? "",
      signal: options.signal,
    });

    const category = options.category
      ? categorizer.categorizeAs(content.text, options.category)
      : categorizer.categorize(content.text);

    const chunks = chunkText(
      { documentId: content.id, text: content.text, pageOffsets: content.pageOffsets },
      chunking,
    );

    log.info({ chunks: chunks.length, method: content.method }, "embedding");
    const vectors = await embedder.embed(
      chunks.map((c) => c.text),
      (done, total) => log.debug({ done, total }, "embedding progress"),
    );

    const stored: StoredChunk[] = chunks.map((chunk, i) => ({
      id: chunk.id,
      vector: vectors[i] ?? [],
      metadata: {
        documentId: content.id,
        documentPath: content.filePath,
        directory: content.directory,
        category: category.category,
        pageNumber: chunk.page,
        chunkIndex: chunk.index,
        importedAt: content.importedAt.getTime(),
        text: chunk.text,
      },
    }));

    if (existing) {
      const removed = await store.delete(existing.id);
      log.debug({ removed }, "old vectors removed");
    }
    try {
      await store.upsert(stored);
    } catch (err) {
      // The old vectors are gone; a record left behind would be listed but never found.
      if (existing) await metadata.delete(existing.id);
      throw err;
    }

    const record: DocumentRecord = {
      id: content.id,
      filePath: content.filePath,
      fileName,
      pageCount: content.pageCount,
      byteSize: content.byteSize,
      contentHash: content.contentHash,
      importedAt: content.importedAt.toISOString(),
      directory: content.directory,
      method: content.method,
      ocrUsed: content.ocrUsed,
      durationMs: content.durationMs,
      degradedPages: content.degradedPages,
      chunkCount: chunks.length,
      category,
    };
    await metadata.upsert(record);

    log.info(
      { category: category.category, confidence: category.confidence, chunks: chunks.length },
      "imported",
    );
    return { status: "imported", record };
  }

  /** Continues past every per-file failure; only cancellation stops the batch. */
  async importDirectory(root: string, options: ImportDirectoryOptions = {}): Promise<BatchSummary> {
    const absRoot = path.resolve(root);
    const files = await scanPdfFiles(absRoot, { recursive: options.recursive });
    const summary: BatchSummary = { total: files.length, imported: [], skipped: [], failed: [] };
    this.deps.logger.info({ root: absRoot, files: files.length }, "importing directory");

    let done = 0;
    for (const filePath of files) {
      if (options.signal?.aborted) throw new OperationCancelledError("Import");
      try {
        const outcome = await this.importFile(filePath, {
          force: options.force,
          category: options.category,
          directory: directoryLabel(filePath, absRoot),
          signal: options.signal,
        });
        if (outcome.status === "imported") summary.imported.push(outcome.record);
        else summary.skipped.push({ filePath: outcome.filePath, reason: outcome.reason });
      } catch (err) {
        if (err instanceof OperationCancelledError || options.signal?.aborted) throw err;
        this.deps.logger.error({ file: filePath, err: describeError(err) }, "import failed, continuing");
        summary.failed.push({ filePath, error: describeError(err) });
      }
      done++;
      options.onProgress?.(done, files.length, filePath);
    }

    this.deps.logger.info(
      {
        imported: summary.imported.length,
        skipped: summary.skipped.length,
        failed: summary.failed.length,
      },
      "directory import finished",
    );
    return summary;
  }

  /**
   * Assigns `category` to an imported document. The stored chunks are
   * relabelled first so category filters and listings agree; entities are
   * extracted again from the stored chunk text.
   */
  async recategorize(filePath: string, category: string): Promise<DocumentRecord> {
    const { categorizer, store, metadata, chunking, logger } = this.deps;
    const absPath = path.resolve(filePath);
    const record = await metadata.getByPath(absPath);
    if (!record) throw new UnprocessableDocumentError(absPath, "not imported");

    const chunks = await store.scan({ documentId: { $eq: record.id } });
    const text = rebuildText(
      chunks.sort((a, b) => a.metadata.chunkIndex - b.metadata.chunkIndex).map((c) => c.metadata.text),
      chunking.overlap,
    );
    const result = categorizer.categorizeAs(text, category);

    const relabelled = await store.setCategory(record.id, result.category);
    const updated = await metadata.updateCategory(record.id, result);
    if (!updated) throw new UnprocessableDocumentError(absPath, "not imported");
    logger.info(
      { file: record.fileName, from: record.category.category, to: category, chunks: relabelled },
      "recategorized",
    );
    return updated;
  }

  /** Removes vectors and record. Returns false when the path was never imported. */
  async deleteDocument(filePath: string): Promise<boolean> {
    const record = await this.deps.metadata.getByPath(filePath);
    if (!record) return false;
    await this.deps.store.delete(record.id);
    await this.deps.metadata.delete(record.id);
    this.deps.logger.info({ file: record.filePath }, "document deleted");
    return true;
  }
}

/** Undoes the chunk overlap where consecutive chunks still share it. */
export function rebuildText(chunkTexts: string[], overlap: number): string {
  let text = "";
  chunkTexts.forEach((chunk, i) => {
    const shared = i > 0 && overlap > 0 && text.endsWith(chunk.slice(0, overlap));
    text += shared ? chunk.slice(overlap) : chunk;
  });
  return text;
}
