export interface ChunkingOptions {
  /** Target chunk length in characters. */
  chunkSize: number;
  /** Characters shared by consecutive chunks; must be smaller than `chunkSize`. */
  overlap: number;
}

export interface ChunkSource {
  documentId: string;
  text: string;
  /** Start offset of each page in `text`, ascending. Omitted means a single page. */
  pageOffsets?: number[];
}
