import { ConfigurationError, ValidationError } from "@sitedocs/errors";
import type { VectorRecord } from "@sitedocs/types";
import type {
  IVectorStore,
  VectorFilter,
  VectorSearchParams,
  VectorSearchResult,
} from "./vector-store.interface.js";

interface StoredPoint {
  vector: number[];
  payload: Record<string, unknown>;
}

interface Collection {
  dimensions: number;
  points: Map<string, StoredPoint>;
}

export function cosineSimilarity(a: number[], b: number[]): number {
  if (a.length !== b.length) {
    throw new ValidationError("Vectors must have the same length", {
      vector: `expected ${String(a.length)} dimensions, got ${String(b.length)}`,
    });
  }

  let dot = 0;
  let normA = 0;
  let normB = 0;
  for (let i = 0; i < a.length; i++) {
    const x = a[i]!;
    const y = b[i]!;
    dot += x * y;
    normA += x * x;
    normB += y * y;
  }

  if (normA === 0 || normB === 0) return 0;
  return dot / (Math.sqrt(normA) * Math.sqrt(normB));
}

function matches(payload: Record<string, unknown>, filter: VectorFilter | undefined): boolean {
  const documentId = payload["documentId"];
  const pdfType = payload["pdfType"];
  if (filter?.documentIds && filter.documentIds.length > 0) {
    if (typeof documentId !== "string" || !filter.documentIds.includes(documentId)) return false;
  }
  if (filter?.pdfTypes && filter.pdfTypes.length > 0) {
    if (!filter.pdfTypes.some((t) => t === pdfType)) return false;
  }
  return true;
}

/**
 * Process-local vector store with exact cosine search. Used for local runs
 * (`VECTOR_STORE=memory`) and tests.
 */
export class InMemoryVectorStore implements IVectorStore {
  private collections = new Map<string, Collection>();

  async upsert(collectionName: string, records: VectorRecord[]): Promise<void> {
    const collection = this.getCollection(collectionName);
    for (const r of records) {
      if (r.vector.length !== collection.dimensions) {
        throw new ValidationError("Vector dimension mismatch", {
          vector: `expected ${String(collection.dimensions)}, got ${String(r.vector.length)}`,
        });
      }
      collection.points.set(r.id, {
        vector: [...r.vector],
        payload: { ...r.payload, documentId: r.documentId, chunkIndex: r.chunkIndex },
      });
    }
  }

  async search(collectionName: string, params: VectorSearchParams): Promise<VectorSearchResult[]> {
    const collection = this.getCollection(collectionName);
    const results: VectorSearchResult[] = [];

    for (const [id, point] of collection.points) {
      if (!matches(point.payload, params.filter)) continue;
      const score = cosineSimilarity(params.vector, point.vector);
      if (params.scoreThreshold !== undefined && score < params.scoreThreshold) continue;
      results.push({ id, score, payload: { ...point.payload } });
    }

    return results
      .sort((a, b) => b.score - a.score || a.id.localeCompare(b.id))
      .slice(0, params.topK);
  }

  async countByDocument(collectionName: string, documentId: string): Promise<number> {
    let count = 0;
    for (const point of this.getCollection(collectionName).points.values()) {
      if (point.payload["documentId"] === documentId) count++;
    }
    return count;
  }

  async ensureCollection(collectionName: string, dimensions: number): Promise<void> {
    const existing = this.collections.get(collectionName);
    if (!existing) {
      this.collections.set(collectionName, { dimensions, points: new Map() });
      return;
    }
    if (existing.dimensions !== dimensions) {
      throw new ConfigurationError(`Collection ${collectionName} has a different vector size`, {
        dimensions: `collection has ${String(existing.dimensions)}, provider has ${String(dimensions)}`,
      });
    }
  }

  async healthCheck(): Promise<boolean> {
    return true;
  }

  private getCollection(collectionName: string): Collection {
    const collection = this.collections.get(collectionName);
    if (!collection) {
      throw new ValidationError(`Collection ${collectionName} does not exist`, {
        collectionName: "call ensureCollection first",
      });
    }
    return collection;
  }
}
