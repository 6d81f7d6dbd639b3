import type { PdfType } from "./document.js";

export interface SearchRequest {
  query: string;
  topK?: number;
  scoreThreshold?: number;
  filter?: SearchFilter;
  includeMetadata?: boolean;
}

export interface SearchFilter {
  documentIds?: string[];
  pdfTypes?: PdfType[];
}

// Allowed filter fields; anything else is rejected before reaching the vector store
export const SEARCH_FILTER_ALLOWLIST = ["documentIds", "pdfTypes"] as const;

export interface ScoredChunk {
  documentId: string;
  chunkIndex: number;
  content: string;
  score: number;
  metadata: Record<string, unknown>;
}

export interface SearchResult {
  chunks: ScoredChunk[];
  metadata: {
    retrievalTimeMs: number;
    tokensUsed: number;
  };
}
