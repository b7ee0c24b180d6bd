import { mkdir, readFile, rename, writeFile } from "node:fs/promises";
import path from "node:path";
import { z } from "zod";
import type { Logger } from "./logger.js";
import type { CategoryResult, DocumentRecord } from "./types.js";

export interface ListOptions {
  category?: string;
  /** Directory-label prefix, matched on whole segments. */
  directory?: string;
  limit?: number;
}

export interface CategorySummary {
  category: string;
  documents: number;
}

export interface DirectorySummary {
  directory: string;
  documents: number;
  pages: number;
}

export interface MetadataStore {
  upsert(record: DocumentRecord): Promise<void>;
  /** Replaces the category result; undefined when `id` is unknown. */
  updateCategory(id: string, category: CategoryResult): Promise<DocumentRecord | undefined>;
  getByPath(filePath: string): Promise<DocumentRecord | undefined>;
  /** Newest import first. */
  list(options?: ListOptions): Promise<DocumentRecord[]>;
  delete(id: string): Promise<boolean>;
  categoriesSummary(): Promise<CategorySummary[]>;
  directorySummary(): Promise<DirectorySummary[]>;
}

const categoryResultSchema = z.object({
  category: z.string(),
  confidence: z.number(),
  entities: z.record(z.string()),
  suggestions: z.array(z.object({ category: z.string(), confidence: z.number() })),
});

const documentRecordSchema = z.object({
  id: z.string(),
  filePath: z.string(),
  fileName: z.string(),
  pageCount: z.number().int(),
  byteSize: z.number().int(),
  contentHash: z.string(),
  importedAt: z.string(),
  directory: z.string(),
  method: z.enum(["direct", "ocr", "hybrid"]),
  ocrUsed: z.boolean(),
  durationMs: z.number(),
  degradedPages: z.array(z.number().int()),
  chunkCount: z.number().int(),
  category: categoryResultSchema,
});

const storeFileSchema = z.object({
  version: z.literal(1),
  documents: z.record(documentRecordSchema),
});

type StoreFile = z.infer<typeof storeFileSchema>;

export function isUnderDirectory(directory: string, prefix: string): boolean {
  const p = prefix.split("/").filter(Boolean).join("/");
  return p === "" || directory === p || directory.startsWith(`${p}/`);
}

/**
 * All records in one JSON file, rewritten on every change through a
 * temp file and rename. Writes are serialized, and the cached copy only
 * changes once the file on disk has.
 */
export class JsonMetadataStore implements MetadataStore {
  private cache: StoreFile | null = null;
  private queue: Promise<unknown> = Promise.resolve();

  constructor(
    private readonly filePath: string,
    private readonly logger: Logger,
  ) {}

  async upsert(record: DocumentRecord): Promise<void> {
    await this.mutate((data) => {
      data.documents[record.id] = record;
    });
  }

  async updateCategory(id: string, category: CategoryResult): Promise<DocumentRecord | undefined> {
    let updated: DocumentRecord | undefined;
    await this.mutate((data) => {
      const current = data.documents[id];
      if (!current) return;
      updated = { ...current, category };
      data.documents[id] = updated;
    });
    return updated;
  }

  async getByPath(filePath: string): Promise<DocumentRecord | undefined> {
    const abs = path.resolve(filePath);
    const data = await this.load();
    return Object.values(data.documents).find((d) => d.filePath === abs);
  }

  async list(options: ListOptions = {}): Promise<DocumentRecord[]> {
    const data = await this.load();
    const rows = Object.values(data.documents)
      .filter((d) => !options.category || d.category.category === options.category)
      .filter((d) => !options.directory || isUnderDirectory(d.directory, options.directory))
      .sort((a, b) => b.importedAt.localeCompare(a.importedAt) || a.filePath.localeCompare(b.filePath));
    return options.limit === undefined ? rows : rows.slice(0, options.limit);
  }

  async delete(id: string): Promise<boolean> {
    let removed = false;
    await this.mutate((data) => {
      removed = id in data.documents;
      delete data.documents[id];
    });
    return removed;
  }

  async categoriesSummary(): Promise<CategorySummary[]> {
    const counts = new Map<string, number>();
    for (const d of Object.values((await this.load()).documents)) {
      counts.set(d.category.category, (counts.get(d.category.category) ?? 0) + 1);
    }
    return [...counts]
      .map(([category, documents]) => ({ category, documents }))
      .sort((a, b) => b.documents - a.documents || a.category.localeCompare(b.category));
  }

  async directorySummary(): Promise<DirectorySummary[]> {
    const byDir = new Map<string, DirectorySummary>();
    for (const d of Object.values((await this.load()).documents)) {
      const entry = byDir.get(d.directory) ?? { directory: d.directory, documents: 0, pages: 0 };
      entry.documents++;
      entry.pages += d.pageCount;
      byDir.set(d.directory, entry);
    }
    return [...byDir.values()].sort((a, b) => a.directory.localeCompare(b.directory));
  }

  private async load(): Promise<StoreFile> {
    if (this.cache) return this.cache;
    let raw: string;
    try {
      raw = await readFile(this.filePath, "utf-8");
    } catch (err) {
      if (err instanceof Error && "code" in err && err.code === "ENOENT") {
        this.cache = { version: 1, documents: {} };
        return this.cache;
      }
      throw err;
    }
    this.cache = storeFileSchema.parse(JSON.parse(raw));
    this.logger.debug({ documents: Object.keys(this.cache.documents).length }, "metadata loaded");
    return this.cache;
  }

  private mutate(change: (data: StoreFile) => void): Promise<void> {
    const run = async () => {
      const data = structuredClone(await this.load());
      change(data);
      await mkdir(path.dirname(this.filePath), { recursive: true });
      const tmp = `${this.filePath}.tmp`;
      await writeFile(tmp, JSON.stringify(data, null, 2));
      await rename(tmp, this.filePath);
      this.cache = data;
    };
    const next = this.queue.then(run, run);
    this.queue = next.catch(() => undefined);
    return next;
  }
}
