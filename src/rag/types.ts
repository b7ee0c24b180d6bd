export type ExtractionMethod = "direct" | "ocr" | "hybrid";

export interface DocumentContent {
  id: string;
  filePath: string;
  text: string;
  /** Start offset of each page inside `text`; pages are joined with "\n". */
  pageOffsets: number[];
  pageCount: number;
  byteSize: number;
  contentHash: string;
  importedAt: Date;
  directory: string;
  method: ExtractionMethod;
  ocrUsed: boolean;
  durationMs: number;
  degradedPages: number[];
}

export interface TextChunk {
  id: string;
  documentId: string;
  text: string;
  page: number;
  index: number;
  embedding?: number[];
}

export type EntityMap = Record<string, string>;

export interface CategoryScore {
  category: string;
  confidence: number;
}

export interface CategoryResult {
  category: string;
  confidence: number;
  entities: EntityMap;
  /** Descending by confidence, never contains `category`. */
  suggestions: CategoryScore[];
}

export interface SearchResult {
  chunkId: string;
  documentId: string;
  chunkIndex: number;
  score: number;
  documentPath: string;
  page: number;
  directory: string;
  category: string;
  content: string;
}

export interface Source {
  documentPath: string;
  page: number;
  directory: string;
  excerpt: string;
}

export interface RAGResponse {
  answer: string;
  sources: Source[];
  confidence: number;
  searchResultsCount: number;
  model: string | null;
}

export interface SearchFilters {
  category?: string;
  /** Directory-label prefix such as "2024/03". */
  directory?: string;
  importedFrom?: Date;
  importedTo?: Date;
}

export interface DocumentRecord {
  id: string;
  filePath: string;
  fileName: string;
  pageCount: number;
  byteSize: number;
  contentHash: string;
  importedAt: string;
  directory: string;
  method: ExtractionMethod;
  ocrUsed: boolean;
  durationMs: number;
  degradedPages: number[];
  chunkCount: number;
  category: CategoryResult;
}
