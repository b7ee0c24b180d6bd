import { mkdir, mkdtemp, readFile, rm, writeFile } from "node:fs/promises";
import os from "node:os";
import path from "node:path";
import { afterEach, beforeEach, describe, it, expect } from "vitest";
import { silentLogger } from "./logger.js";
import { JsonMetadataStore, isUnderDirectory } from "./metadata-store.js";
import type { DocumentRecord } from "./types.js";

function record(id: string, overrides: Partial<DocumentRecord> = {}): DocumentRecord {
  return {
    id,
    filePath: `/docs/${id}.pdf`,
    fileName: `${id}.pdf`,
    pageCount: 2,
    byteSize: 1024,
    contentHash: `hash-${id}`,
    importedAt: "2024-03-01T10:00:00.000Z",
    directory: "",
    method: "direct",
    ocrUsed: false,
    durationMs: 12,
    degradedPages: [],
    chunkCount: 3,
    category: { category: "general", confidence: 0.1, entities: {}, suggestions: [] },
    ...overrides,
  };
}

describe("JsonMetadataStore", () => {
  let dir: string;
  let file: string;

  beforeEach(async () => {
    dir = await mkdtemp(path.join(os.tmpdir(), "metadata-"));
    file = path.join(dir, "nested", "metadata.json");
  });

  afterEach(async () => {
    await rm(dir, { recursive: true, force: true });
  });

  it("starts empty when the file does not exist", async () => {
    const store = new JsonMetadataStore(file, silentLogger());
    expect(await store.list()).toEqual([]);
    expect(await store.getByPath("/docs/missing.pdf")).toBeUndefined();
  });

  it("persists records and reads them back in a new instance", async () => {
    const first = new JsonMetadataStore(file, silentLogger());
    await first.upsert(record("a"));

    const second = new JsonMetadataStore(file, silentLogger());
    expect(await second.getByPath("/docs/a.pdf")).toEqual(record("a"));

    const onDisk: unknown = JSON.parse(await readFile(file, "utf-8"));
    expect(onDisk).toEqual({ version: 1, documents: { a: record("a") } });
  });

  it("keeps every record when writes overlap", async () => {
    const store = new JsonMetadataStore(file, silentLogger());
    await Promise.all(["a", "b", "c", "d"].map((id) => store.upsert(record(id))));

    const reread = new JsonMetadataStore(file, silentLogger());
    expect((await reread.list()).map((r) => r.id)).toEqual(["a", "b", "c", "d"]);
  });

  it("lists newest first with category, directory and limit filters", async () => {
    const store = new JsonMetadataStore(file, silentLogger());
    const invoice = { category: "invoice", confidence: 0.5, entities: {}, suggestions: [] };
    await store.upsert(record("old", { importedAt: "2024-01-01T00:00:00.000Z", directory: "2024/01" }));
    await store.upsert(record("new", { importedAt: "2024-05-01T00:00:00.000Z", directory: "2024/03", category: invoice }));
    await store.upsert(record("mid", { importedAt: "2024-03-01T00:00:00.000Z", directory: "20245", category: invoice }));

    expect((await store.list()).map((r) => r.id)).toEqual(["new", "mid", "old"]);
    expect((await store.list({ category: "invoice" })).map((r) => r.id)).toEqual(["new", "mid"]);
    expect((await store.list({ directory: "2024" })).map((r) => r.id)).toEqual(["new", "old"]);
    expect((await store.list({ limit: 1 })).map((r) => r.id)).toEqual(["new"]);
  });

  it("deletes records", async () => {
    const store = new JsonMetadataStore(file, silentLogger());
    await store.upsert(record("a"));

    expect(await store.delete("a")).toBe(true);
    expect(await store.delete("a")).toBe(false);
    expect(await new JsonMetadataStore(file, silentLogger()).list()).toEqual([]);
  });

  it("summarizes categories by count and directories by label", async () => {
    const store = new JsonMetadataStore(file, silentLogger());
    const invoice = { category: "invoice", confidence: 0.5, entities: {}, suggestions: [] };
    await store.upsert(record("a", { category: invoice, directory: "2024/03", pageCount: 1 }));
    await store.upsert(record("b", { category: invoice, directory: "2024/03", pageCount: 4 }));
    await store.upsert(record("c", { directory: "" }));

    expect(await store.categoriesSummary()).toEqual([
      { category: "invoice", documents: 2 },
      { category: "general", documents: 1 },
    ]);
    expect(await store.directorySummary()).toEqual([
      { directory: "", documents: 1, pages: 2 },
      { directory: "2024/03", documents: 2, pages: 5 },
    ]);
  });

  it("replaces the category of one record", async () => {
    const store = new JsonMetadataStore(file, silentLogger());
    await store.upsert(record("a"));
    const contract = {
      category: "contract",
      confidence: 1,
      entities: { term: "24 Monate" },
      suggestions: [{ category: "invoice", confidence: 0.25 }],
    };

    expect(await store.updateCategory("a", contract)).toEqual(record("a", { category: contract }));
    expect(await store.updateCategory("missing", contract)).toBeUndefined();
    expect(await new JsonMetadataStore(file, silentLogger()).list({ category: "contract" })).toEqual([
      record("a", { category: contract }),
    ]);
  });

  it("keeps memory and disk in step when a write fails", async () => {
    const store = new JsonMetadataStore(file, silentLogger());
    await store.upsert(record("a"));
    await mkdir(`${file}.tmp`);

    await expect(store.upsert(record("b"))).rejects.toThrow();
    expect((await store.list()).map((r) => r.id)).toEqual(["a"]);

    await rm(`${file}.tmp`, { recursive: true });
    await store.upsert(record("c"));
    expect((await new JsonMetadataStore(file, silentLogger()).list()).map((r) => r.id)).toEqual(["a", "c"]);
  });

  it("rejects a file with records of the wrong shape", async () => {
    const bad = path.join(dir, "bad.json");
    await writeFile(bad, JSON.stringify({ version: 1, documents: { a: { id: 1 } } }));
    const store = new JsonMetadataStore(bad, silentLogger());

    await expect(store.list()).rejects.toThrow();
  });
});

describe("isUnderDirectory", () => {
  it("matches whole path segments", () => {
    expect(isUnderDirectory("2024/03", "2024")).toBe(true);
    expect(isUnderDirectory("2024/03", "2024/03/")).toBe(true);
    expect(isUnderDirectory("20245", "2024")).toBe(false);
    expect(isUnderDirectory("", "")).toBe(true);
    expect(isUnderDirectory("", "2024")).toBe(false);
  });
});
