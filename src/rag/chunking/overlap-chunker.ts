import type { TextChunk } from "../types.js";
import type { ChunkingOptions, ChunkSource } from "./types.js";

export function validateChunkingOptions({ chunkSize, overlap }: ChunkingOptions): void {
  if (!Number.isInteger(chunkSize) || chunkSize <= 0) {
    throw new RangeError(`chunkSize must be a positive integer, got ${chunkSize}`);
  }
  if (!Number.isInteger(overlap) || overlap < 0 || overlap >= chunkSize) {
    throw new RangeError(`overlap must be an integer in [0, ${chunkSize}), got ${overlap}`);
  }
}

/**
 * Fixed-width windows stepping by `chunkSize - overlap`. Chunks are verbatim
 * slices, so the tail of chunk n equals the head of chunk n+1 character for
 * character. Only the final chunk may be shorter than `chunkSize`.
 */
export function chunkText(source: ChunkSource, options: ChunkingOptions): TextChunk[] {
  validateChunkingOptions(options);
  const { text, documentId } = source;
  const offsets = source.pageOffsets && source.pageOffsets.length > 0 ? source.pageOffsets : [0];
  const chunks: TextChunk[] = [];

  let start = 0;
  while (start < text.length) {
    const end = Math.min(start + options.chunkSize, text.length);
    const index = chunks.length;
    chunks.push({
      id: `${documentId}:${index}`,
      documentId,
      text: text.slice(start, end),
      page: pageAt(offsets, start),
      index,
    });
    if (end === text.length) break;
    // end - start === chunkSize here, which is always larger than overlap
    start = end - options.overlap;
  }

  return chunks;
}

/** 1-based page containing `position`. */
export function pageAt(pageOffsets: number[], position: number): number {
  let lo = 0;
  let hi = pageOffsets.length - 1;
  let page = 0;
  while (lo <= hi) {
    const mid = (lo + hi) >> 1;
    const offset = pageOffsets[mid] ?? 0;
    if (offset <= position) {
      page = mid;
      lo = mid + 1;
    } else {
      hi = mid - 1;
    }
  }
  return page + 1;
}
