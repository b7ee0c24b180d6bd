import { createCanvas, DOMMatrix, DOMPoint, ImageData, Path2D } from "@napi-rs/canvas";

// Polyfill DOM globals that pdfjs-dist needs in Node.js
const g = globalThis as Record<string, unknown>;
if (!g.DOMMatrix) g.DOMMatrix = DOMMatrix;
if (!g.DOMPoint) g.DOMPoint = DOMPoint;
if (!g.ImageData) g.ImageData = ImageData;
if (!g.Path2D) g.Path2D = Path2D;

// Dynamic import, after the polyfills are in place
let _pdfjs: typeof import("pdfjs-dist/legacy/build/pdf.mjs") | null = null;

async function getPdfjs() {
  if (!_pdfjs) {
    _pdfjs = await import("pdfjs-dist/legacy/build/pdf.mjs");
  }
  return _pdfjs;
}

export interface PageRenderer {
  /** PNG bytes of a 1-based page. */
  render(pageNumber: number): Promise<Buffer>;
  close(): Promise<void>;
}

export async function openPageRenderer(data: Uint8Array, scale: number): Promise<PageRenderer> {
  const pdfjs = await getPdfjs();
  const pdf = await pdfjs.getDocument({
    // pdfjs takes ownership of the buffer it is given
    data: new Uint8Array(data),
    useSystemFonts: true,
    isEvalSupported: false,
    verbosity: 0,
  }).promise;

  return {
    async render(pageNumber: number): Promise<Buffer> {
      const page = await pdf.getPage(pageNumber);
      const viewport = page.getViewport({ scale });
      const canvas = createCanvas(Math.floor(viewport.width), Math.floor(viewport.height));
      const ctx = canvas.getContext("2d");

      await page.render({
        canvasContext: ctx,
        viewport,
        canvas: null,
      }).promise;

      page.cleanup();
      return canvas.encode("png");
    },

    async close(): Promise<void> {
      await pdf.destroy();
    },
  };
}
