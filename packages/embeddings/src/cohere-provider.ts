import { CohereClient, type Cohere } from "cohere-ai";
import type { EmbeddingResult } from "@sitedocs/types";
import type { EmbedOptions, IEmbeddingProvider } from "./embedding-provider.interface.js";
import { mapProviderError } from "./provider-errors.js";

const DEFAULT_MODEL = "embed-v4.0";
const DEFAULT_DIMENSIONS = 1024;
const BATCH_SIZE = 96; // Cohere limit

export interface CohereProviderConfig {
  apiKey: string;
  model?: string;
  dimensions?: number;
}

export class CohereEmbeddingProvider implements IEmbeddingProvider {
  readonly name = "cohere";
  readonly model: string;
  readonly dimensions: number;
  private client: CohereClient;

  constructor(config: CohereProviderConfig) {
    this.client = new CohereClient({ token: config.apiKey });
    this.model = config.model ?? DEFAULT_MODEL;
    this.dimensions = config.dimensions ?? DEFAULT_DIMENSIONS;
  }

  async embed(text: string, options?: EmbedOptions): Promise<EmbeddingResult> {
    return this.embedAs([text], "search_query", options);
  }

  async batchEmbed(texts: string[], options?: EmbedOptions): Promise<EmbeddingResult> {
    return this.embedAs(texts, "search_document", options);
  }

  async healthCheck(): Promise<boolean> {
    try {
      await this.embed("health check");
      return true;
    } catch {
      return false;
    }
  }

  private async embedAs(
    texts: string[],
    inputType: Cohere.EmbedInputType,
    options?: EmbedOptions,
  ): Promise<EmbeddingResult> {
    const allEmbeddings: number[][] = [];
    let totalTokens = 0;

    // Process in batches of BATCH_SIZE
    for (let i = 0; i < texts.length; i += BATCH_SIZE) {
      const batch = texts.slice(i, i + BATCH_SIZE);

      let response: Cohere.EmbedByTypeResponse;
      try {
        response = await this.client.v2.embed(
          {
            texts: batch,
            model: this.model,
            inputType,
            embeddingTypes: ["float"],
            ...(this.dimensions !== DEFAULT_DIMENSIONS ? { outputDimension: this.dimensions } : {}),
          },
          // The orchestrator owns retries; the SDK would otherwise retry 429/5xx twice.
          { abortSignal: options?.signal, maxRetries: 0 },
        );
      } catch (error: unknown) {
        throw mapProviderError(error, this.name);
      }

      if (response.embeddings.float) {
        allEmbeddings.push(...response.embeddings.float);
      }

      // Use actual tokensUsed from Cohere response for billing accuracy
      if (response.meta?.billedUnits?.inputTokens) {
        totalTokens += response.meta.billedUnits.inputTokens;
      }
    }

    return {
      embeddings: allEmbeddings,
      model: this.model,
      tokensUsed: totalTokens,
      dimensions: this.dimensions,
    };
  }
}
