import { mkdtemp, rm, writeFile } from "node:fs/promises";
import os from "node:os";
import path from "node:path";
import { afterEach, beforeEach, describe, it, expect } from "vitest";
import type { OcrConfig } from "./config.js";
import { UnprocessableDocumentError } from "./errors.js";
import { silentLogger } from "./logger.js";
import type { OcrEngine } from "./ocr.js";
import type { PageRenderer } from "./page-renderer.js";
import {
  ContentExtractor,
  joinPages,
  mergePageTexts,
  textDensity,
  type PdfBackend,
} from "./pdf-extractor.js";

const ocrConfig: OcrConfig = {
  enabled: true,
  threshold: 50,
  language: "deu",
  model: "vision/model",
  renderScale: 1,
};

function fakeBackend(pages: string[] | Error): PdfBackend {
  return {
    async readPageTexts() {
      if (pages instanceof Error) throw pages;
      return pages;
    },
    async openRenderer(): Promise<PageRenderer> {
      return {
        render: async (n) => Buffer.from(`page-${n}`),
        close: async () => {},
      };
    },
  };
}

/** Returns the mapped text for each rendered page, or throws for pages in `failing`. */
function fakeOcr(texts: Record<number, string>, failing: number[] = []) {
  const languages: string[] = [];
  const engine: OcrEngine = {
    async recognize(image, options) {
      languages.push(options.language);
      const page = Number(image.toString().replace("page-", ""));
      if (failing.includes(page)) throw new Error(`ocr failed on ${page}`);
      return texts[page] ?? "";
    },
  };
  return { engine, languages };
}

const FIXED_DATE = new Date("2024-03-15T10:00:00Z");

describe("ContentExtractor", () => {
  let dir: string;
  let pdfPath: string;

  beforeEach(async () => {
    dir = await mkdtemp(path.join(os.tmpdir(), "extractor-"));
    pdfPath = path.join(dir, "scan.pdf");
    await writeFile(pdfPath, "%PDF-1.4 fake");
  });

  afterEach(async () => {
    await rm(dir, { recursive: true, force: true });
  });

  function extractor(backend: PdfBackend, ocr: OcrEngine | null, config: OcrConfig = ocrConfig) {
    return new ContentExtractor(backend, ocr, config, silentLogger(), () => FIXED_DATE);
  }

  it("uses direct text when density reaches the threshold", async () => {
    const page = "x".repeat(60);
    const { engine, languages } = fakeOcr({});
    const content = await extractor(fakeBackend([page, page]), engine).extract(pdfPath, {
      directory: "2024/03",
    });

    expect(content.method).toBe("direct");
    expect(content.ocrUsed).toBe(false);
    expect(content.text).toBe(`${page}\n${page}`);
    expect(content.pageOffsets).toEqual([0, 61]);
    expect(content.pageCount).toBe(2);
    expect(content.directory).toBe("2024/03");
    expect(content.importedAt).toBe(FIXED_DATE);
    expect(content.byteSize).toBe(13);
    expect(content.id).toMatch(/^[0-9a-f]{16}$/);
    expect(languages).toEqual([]);
  });

  it("runs OCR on a three-page document with ten characters per page", async () => {
    const direct = ["0123456789", "abcdefghij", "ABCDEFGHIJ"];
    const { engine, languages } = fakeOcr({
      1: "Rechnung Nr. 42 vom 01.03.2024",
      2: "short",
      3: "Gesamtbetrag 119,00 EUR",
    });

    const content = await extractor(fakeBackend(direct), engine).extract(pdfPath);

    expect(content.ocrUsed).toBe(true);
    expect(content.method).toBe("hybrid");
    expect(content.text).toBe("Rechnung Nr. 42 vom 01.03.2024\nabcdefghij\nGesamtbetrag 119,00 EUR");
    expect(languages).toEqual(["deu", "deu", "deu"]);
  });

  it("reports method ocr when no page had direct text", async () => {
    const { engine } = fakeOcr({ 1: "scanned page one", 2: "scanned page two" });
    const content = await extractor(fakeBackend(["", "  "]), engine).extract(pdfPath);

    expect(content.method).toBe("ocr");
    expect(content.text).toBe("scanned page one\nscanned page two");
  });

  it("keeps direct text for pages whose OCR fails", async () => {
    const { engine } = fakeOcr({ 1: "recognized first page" }, [2]);
    const content = await extractor(fakeBackend(["", "tiny"]), engine).extract(pdfPath);

    expect(content.text).toBe("recognized first page\ntiny");
    expect(content.degradedPages).toEqual([2]);
    expect(content.method).toBe("hybrid");
  });

  it("stays direct when OCR is disabled", async () => {
    const { engine, languages } = fakeOcr({ 1: "never used" });
    const content = await extractor(fakeBackend(["tiny"]), engine, { ...ocrConfig, enabled: false }).extract(
      pdfPath,
    );

    expect(content.method).toBe("direct");
    expect(content.text).toBe("tiny");
    expect(languages).toEqual([]);
  });

  it("rejects a document without pages", async () => {
    await expect(extractor(fakeBackend([]), null).extract(pdfPath)).rejects.toBeInstanceOf(
      UnprocessableDocumentError,
    );
  });

  it("rejects a corrupt document", async () => {
    await expect(
      extractor(fakeBackend(new Error("Invalid PDF structure")), null).extract(pdfPath),
    ).rejects.toThrow("corrupt or encrypted PDF (Invalid PDF structure)");
  });

  it("rejects a document with no text even after OCR", async () => {
    const { engine } = fakeOcr({});
    await expect(extractor(fakeBackend(["", ""]), engine).extract(pdfPath)).rejects.toThrow(
      "no extractable text",
    );
  });

  it("rejects a missing file", async () => {
    await expect(
      extractor(fakeBackend(["text"]), null).extract(path.join(dir, "missing.pdf")),
    ).rejects.toBeInstanceOf(UnprocessableDocumentError);
  });
});

describe("textDensity", () => {
  it("averages characters over pages", () => {
    expect(textDensity(["aaaa", "bb"])).toBe(3);
  });

  it("is undefined for zero pages", () => {
    expect(() => textDensity([])).toThrow(RangeError);
  });
});

describe("mergePageTexts", () => {
  it("prefers the longer text per page", () => {
    expect(mergePageTexts(["long direct text", "ab", "keep"], ["short", "abc", null])).toEqual([
      "long direct text",
      "abc",
      "keep",
    ]);
  });
});

describe("joinPages", () => {
  it("records the start of every page", () => {
    expect(joinPages(["ab", "", "cde"])).toEqual({ text: "ab\n\ncde", pageOffsets: [0, 3, 4] });
  });
});
