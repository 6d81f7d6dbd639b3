import type { PdfType } from "./document.js";

export interface ParseResult {
  text: string;
  pageCount: number;
  /** Offset in `text` where each page starts. */
  pageOffsets: number[];
  metadata: Record<string, unknown>;
}

export type ChunkStrategy = "fixed" | "boundary";

export interface ChunkingConfig {
  strategy: ChunkStrategy;
  /** Maximum characters per chunk. */
  chunkSize: number;
  /** Characters shared between consecutive chunks. Must be below chunkSize. */
  overlap: number;
}

export interface ChunkResult {
  content: string;
  index: number;
  metadata: {
    startChar: number;
    endChar: number;
    /** Characters at the head of this chunk repeated from the previous one. */
    overlap: number;
  };
}

export interface EmbeddingResult {
  embeddings: number[][];
  model: string;
  tokensUsed: number;
  dimensions: number;
}

export interface EmbeddingRecord {
  documentId: string;
  chunkIndex: number;
  vector: number[];
  content: string;
  metadata: EmbeddingMetadata;
}

export interface EmbeddingMetadata extends Record<string, unknown> {
  documentId: string;
  chunkIndex: number;
  pdfType: PdfType;
  pdfName: string;
  pageNumber: number;
  startChar: number;
  endChar: number;
}

export interface VectorRecord {
  id: string;
  documentId: string;
  chunkIndex: number;
  vector: number[];
  payload: Record<string, unknown>;
}
