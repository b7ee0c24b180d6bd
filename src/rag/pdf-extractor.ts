import { createHash } from "node:crypto";
import { readFile } from "node:fs/promises";
import path from "node:path";
import { performance } from "node:perf_hooks";
import { getDocumentProxy } from "unpdf";
import type { OcrConfig } from "./config.js";
import { UnprocessableDocumentError, describeError } from "./errors.js";
import type { Logger } from "./logger.js";
import type { OcrEngine } from "./ocr.js";
import { openPageRenderer, type PageRenderer } from "./page-renderer.js";
import type { DocumentContent, ExtractionMethod } from "./types.js";

/** Low-level PDF access: the text layer and page rasterization. */
export interface PdfBackend {
  readPageTexts(data: Uint8Array): Promise<string[]>;
  openRenderer(data: Uint8Array): Promise<PageRenderer>;
}

export class PdfjsBackend implements PdfBackend {
  constructor(
    private readonly renderScale: number,
    private readonly logger: Logger,
  ) {}

  async readPageTexts(data: Uint8Array): Promise<string[]> {
    const pdf = await getDocumentProxy(new Uint8Array(data));
    try {
      const pages: string[] = [];
      for (let i = 1; i <= pdf.numPages; i++) {
        try {
          const page = await pdf.getPage(i);
          const textContent = await page.getTextContent();
          const text = textContent.items
            .map((item) => ("str" in item ? item.str + (item.hasEOL ? "\n" : " ") : ""))
            .join("");
          pages.push(text);
        } catch (err) {
          this.logger.warn({ page: i, err: describeError(err) }, "text layer unreadable");
          pages.push("");
        }
      }
      return pages;
    } finally {
      await pdf.destroy();
    }
  }

  openRenderer(data: Uint8Array): Promise<PageRenderer> {
    return openPageRenderer(data, this.renderScale);
  }
}

/** Characters per page. A document without pages has no density. */
export function textDensity(pageTexts: string[]): number {
  if (pageTexts.length === 0) {
    throw new RangeError("text density is undefined for a document without pages");
  }
  const chars = pageTexts.reduce((sum, t) => sum + t.length, 0);
  return chars / pageTexts.length;
}

/** Per page, the longer of the two texts; a failed OCR page keeps its direct text. */
export function mergePageTexts(direct: string[], ocr: Array<string | null>): string[] {
  return direct.map((d, i) => {
    const o = ocr[i] ?? null;
    if (o === null) return d;
    return o.length > d.length ? o : d;
  });
}

export function joinPages(pages: string[]): { text: string; pageOffsets: number[] } {
  const pageOffsets: number[] = [];
  let offset = 0;
  for (const page of pages) {
    pageOffsets.push(offset);
    offset += page.length + 1;
  }
  return { text: pages.join("\n"), pageOffsets };
}

export function documentId(filePath: string): string {
  return createHash("sha256").update(path.resolve(filePath)).digest("hex").slice(0, 16);
}

export interface ExtractOptions {
  /** Directory label; defaults to "". */
  directory?: string;
  signal?: AbortSignal;
}

export class ContentExtractor {
  constructor(
    private readonly backend: PdfBackend,
    private readonly ocr: OcrEngine | null,
    private readonly config: OcrConfig,
    private readonly logger: Logger,
    private readonly now: () => Date = () => new Date(),
  ) {}

  async extract(filePath: string, options: ExtractOptions = {}): Promise<DocumentContent> {
    const started = performance.now();
    const absPath = path.resolve(filePath);
    const log = this.logger.child({ file: absPath });

    let data: Buffer;
    try {
      data = await readFile(absPath);
    } catch (err) {
      throw new UnprocessableDocumentError(absPath, `cannot read file (${describeError(err)})`, err);
    }

    let rawPages: string[];
    try {
      rawPages = await this.backend.readPageTexts(new Uint8Array(data));
    } catch (err) {
      throw new UnprocessableDocumentError(
        absPath,
        `corrupt or encrypted PDF (${describeError(err)})`,
        err,
      );
    }
    if (rawPages.length === 0) {
      throw new UnprocessableDocumentError(absPath, "document has no pages");
    }

    const direct = rawPages.map((t) => t.trim());
    const density = textDensity(direct);
    let pages = direct;
    let method: ExtractionMethod = "direct";
    let ocrUsed = false;
    let degradedPages: number[] = [];

    if (density < this.config.threshold) {
      if (this.config.enabled && this.ocr) {
        log.info({ density, threshold: this.config.threshold }, "low text density, running OCR");
        const recognized = await this.recognizePages(data, direct.length, this.ocr, log, options.signal);
        degradedPages = recognized.degradedPages;
        ocrUsed = true;
        pages = mergePageTexts(direct, recognized.texts);
        method = direct.some((t) => t.length > 0) ? "hybrid" : "ocr";
      } else {
        log.warn({ density }, "low text density but OCR is disabled");
      }
    }

    const { text, pageOffsets } = joinPages(pages);
    if (text.trim().length === 0) {
      throw new UnprocessableDocumentError(absPath, "no extractable text");
    }

    return {
      id: documentId(absPath),
      filePath: absPath,
      text,
      pageOffsets,
      pageCount: pages.length,
      byteSize: data.byteLength,
      contentHash: createHash("sha256").update(data).digest("hex"),
      importedAt: this.now(),
      directory: options.directory ?? "",
      method,
      ocrUsed,
      durationMs: Math.round(performance.now() - started),
      degradedPages,
    };
  }

  private async recognizePages(
    data: Buffer,
    pageCount: number,
    ocr: OcrEngine,
    log: Logger,
    signal: AbortSignal | undefined,
  ): Promise<{ texts: Array<string | null>; degradedPages: number[] }> {
    const allPages = Array.from({ length: pageCount }, (_, i) => i + 1);

    let renderer: PageRenderer;
    try {
      renderer = await this.backend.openRenderer(new Uint8Array(data));
    } catch (err) {
      log.warn(
        { code: "EXTRACTION_DEGRADED", pages: allPages, err: describeError(err) },
        "cannot render pages for OCR, keeping direct text",
      );
      return { texts: allPages.map(() => null), degradedPages: allPages };
    }

    const texts: Array<string | null> = [];
    const degradedPages: number[] = [];
    try {
      for (const pageNumber of allPages) {
        signal?.throwIfAborted();
        try {
          const image = await renderer.render(pageNumber);
          texts.push(await ocr.recognize(image, { language: this.config.language, signal }));
        } catch (err) {
          if (signal?.aborted) throw err;
          log.warn(
            { code: "EXTRACTION_DEGRADED", page: pageNumber, err: describeError(err) },
            "OCR failed for page, keeping direct text",
          );
          texts.push(null);
          degradedPages.push(pageNumber);
        }
      }
    } finally {
      await renderer.close();
    }
    return { texts, degradedPages };
  }
}
