import OpenAI from "openai";
import type { EmbeddingResult } from "@sitedocs/types";
import type { EmbedOptions, IEmbeddingProvider } from "./embedding-provider.interface.js";
import { mapProviderError } from "./provider-errors.js";

const DEFAULT_MODEL = "text-embedding-3-small";
const DEFAULT_DIMENSIONS = 1536;
const BATCH_SIZE = 2048; // OpenAI input array limit

/** The slice of the OpenAI client this provider calls. */
export interface OpenAIEmbeddingsClient {
  embeddings: {
    create(
      body: OpenAI.EmbeddingCreateParams,
      options?: { signal?: AbortSignal },
    ): Promise<OpenAI.CreateEmbeddingResponse>;
  };
}

export interface OpenAIProviderConfig {
  apiKey: string;
  model?: string;
  /** Shortened output size; only text-embedding-3 models accept it. */
  dimensions?: number;
  client?: OpenAIEmbeddingsClient;
}

export class OpenAIEmbeddingProvider implements IEmbeddingProvider {
  readonly name = "openai";
  readonly model: string;
  readonly dimensions: number;
  private client: OpenAIEmbeddingsClient;
  private requestDimensions: number | undefined;

  constructor(config: OpenAIProviderConfig) {
    // Retries belong to the ingestion pipeline, not the SDK.
    this.client = config.client ?? new OpenAI({ apiKey: config.apiKey, maxRetries: 0 });
    this.model = config.model ?? DEFAULT_MODEL;
    this.dimensions = config.dimensions ?? DEFAULT_DIMENSIONS;
    this.requestDimensions = config.dimensions;
  }

  async embed(text: string, options?: EmbedOptions): Promise<EmbeddingResult> {
    return this.batchEmbed([text], options);
  }

  async batchEmbed(texts: string[], options?: EmbedOptions): Promise<EmbeddingResult> {
    const allEmbeddings: number[][] = [];
    let totalTokens = 0;

    for (let i = 0; i < texts.length; i += BATCH_SIZE) {
      const batch = texts.slice(i, i + BATCH_SIZE);

      let response: OpenAI.CreateEmbeddingResponse;
      try {
        response = await this.client.embeddings.create(
          {
            model: this.model,
            input: batch,
            encoding_format: "float",
            ...(this.requestDimensions !== undefined ? { dimensions: this.requestDimensions } : {}),
          },
          { signal: options?.signal },
        );
      } catch (error: unknown) {
        throw mapProviderError(error, this.name);
      }

      // The API documents `index`; do not rely on response order.
      const ordered = [...response.data].sort((a, b) => a.index - b.index);
      allEmbeddings.push(...ordered.map((d) => d.embedding));
      totalTokens += response.usage.total_tokens;
    }

    return {
      embeddings: allEmbeddings,
      model: this.model,
      tokensUsed: totalTokens,
      dimensions: this.dimensions,
    };
  }

  async healthCheck(): Promise<boolean> {
    try {
      await this.embed("health check");
      return true;
    } catch {
      return false;
    }
  }
}
