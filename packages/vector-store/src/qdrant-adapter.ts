import { QdrantClient } from "@qdrant/js-client-rest";
import { ConfigurationError, mapExternalError } from "@sitedocs/errors";
import type { VectorRecord } from "@sitedocs/types";
import type {
  IVectorStore,
  VectorFilter,
  VectorSearchParams,
  VectorSearchResult,
} from "./vector-store.interface.js";

const BATCH_SIZE = 100;
const SERVICE = "qdrant";

type FieldCondition =
  | { key: string; match: { value: string } }
  | { key: string; match: { any: string[] } };

function buildMust(filter: VectorFilter | undefined): FieldCondition[] {
  const must: FieldCondition[] = [];
  if (filter?.documentIds && filter.documentIds.length > 0) {
    must.push({ key: "documentId", match: { any: filter.documentIds } });
  }
  if (filter?.pdfTypes && filter.pdfTypes.length > 0) {
    must.push({ key: "pdfType", match: { any: filter.pdfTypes } });
  }
  return must;
}

/** Size of the collection's unnamed vector; undefined for named-vector collections. */
function vectorSize(vectors: unknown): number | undefined {
  if (typeof vectors === "object" && vectors !== null && "size" in vectors) {
    return typeof vectors.size === "number" ? vectors.size : undefined;
  }
  return undefined;
}

export class QdrantVectorStore implements IVectorStore {
  private client: QdrantClient;

  constructor(url: string, apiKey?: string) {
    this.client = new QdrantClient({ url, apiKey });
  }

  async upsert(collectionName: string, records: VectorRecord[]): Promise<void> {
    // Process in batches
    for (let i = 0; i < records.length; i += BATCH_SIZE) {
      const batch = records.slice(i, i + BATCH_SIZE);

      try {
        await this.client.upsert(collectionName, {
          wait: true,
          points: batch.map((r) => ({
            id: r.id,
            vector: r.vector,
            payload: {
              ...r.payload,
              documentId: r.documentId,
              chunkIndex: r.chunkIndex,
            },
          })),
        });
      } catch (error: unknown) {
        throw mapExternalError(error, SERVICE, "upsert");
      }
    }
  }

  async search(collectionName: string, params: VectorSearchParams): Promise<VectorSearchResult[]> {
    const must = buildMust(params.filter);

    try {
      const results = await this.client.search(collectionName, {
        vector: params.vector,
        limit: params.topK,
        score_threshold: params.scoreThreshold,
        filter: must.length > 0 ? { must } : undefined,
        with_payload: true,
      });

      return results.map((r) => ({
        id: typeof r.id === "string" ? r.id : String(r.id),
        score: r.score,
        payload: r.payload ?? {},
      }));
    } catch (error: unknown) {
      throw mapExternalError(error, SERVICE, "search");
    }
  }

  async countByDocument(collectionName: string, documentId: string): Promise<number> {
    try {
      const result = await this.client.count(collectionName, {
        filter: { must: [{ key: "documentId", match: { value: documentId } }] },
        exact: true,
      });
      return result.count;
    } catch (error: unknown) {
      throw mapExternalError(error, SERVICE, "count");
    }
  }

  async ensureCollection(collectionName: string, dimensions: number): Promise<void> {
    try {
      const { exists } = await this.client.collectionExists(collectionName);
      if (exists) {
        const info = await this.client.getCollection(collectionName);
        const size = vectorSize(info.config.params.vectors);
        if (size !== undefined && size !== dimensions) {
          throw new ConfigurationError(`Collection ${collectionName} has a different vector size`, {
            dimensions: `collection has ${String(size)}, provider has ${String(dimensions)}`,
          });
        }
        return;
      }

      await this.client.createCollection(collectionName, {
        vectors: {
          size: dimensions,
          distance: "Cosine",
        },
      });

      // Payload indexes for search filters
      await this.client.createPayloadIndex(collectionName, {
        field_name: "documentId",
        field_schema: "keyword",
      });
      await this.client.createPayloadIndex(collectionName, {
        field_name: "pdfType",
        field_schema: "keyword",
      });
    } catch (error: unknown) {
      throw mapExternalError(error, SERVICE, "collection setup");
    }
  }

  async healthCheck(): Promise<boolean> {
    try {
      await this.client.getCollections();
      return true;
    } catch {
      return false;
    }
  }
}
