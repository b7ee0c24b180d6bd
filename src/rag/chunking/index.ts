export { chunkText, pageAt, validateChunkingOptions } from "./overlap-chunker.js";
export type { ChunkingOptions, ChunkSource } from "./types.js";
