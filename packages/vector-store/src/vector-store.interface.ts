import type { PdfType, VectorRecord } from "@sitedocs/types";

export interface VectorSearchParams {
  vector: number[];
  topK: number;
  scoreThreshold?: number;
  filter?: VectorFilter;
}

export interface VectorFilter {
  documentIds?: string[];
  pdfTypes?: PdfType[];
}

export interface VectorSearchResult {
  id: string;
  score: number;
  payload: Record<string, unknown>;
}

/**
 * Vector store keyed by point id. `upsert` overwrites points with the same
 * id, so writing a document's chunks twice leaves one point per chunk.
 */
export interface IVectorStore {
  upsert(collectionName: string, records: VectorRecord[]): Promise<void>;
  search(collectionName: string, params: VectorSearchParams): Promise<VectorSearchResult[]>;
  countByDocument(collectionName: string, documentId: string): Promise<number>;
  ensureCollection(collectionName: string, dimensions: number): Promise<void>;
  healthCheck(): Promise<boolean>;
}
