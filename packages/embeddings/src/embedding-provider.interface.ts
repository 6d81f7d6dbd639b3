import type { EmbeddingResult } from "@sitedocs/types";

export interface EmbedOptions {
  /** Aborts the in-flight vendor request. */
  signal?: AbortSignal;
}

/**
 * Produces fixed-dimension vectors. `batchEmbed` returns one vector per
 * input, in input order. Vendor failures surface as `@sitedocs/errors`
 * classes; providers never retry on their own.
 */
export interface IEmbeddingProvider {
  readonly name: string;
  readonly model: string;
  readonly dimensions: number;

  /** Embed a search query. */
  embed(text: string, options?: EmbedOptions): Promise<EmbeddingResult>;
  /** Embed document chunks. */
  batchEmbed(texts: string[], options?: EmbedOptions): Promise<EmbeddingResult>;
  healthCheck(): Promise<boolean>;
}
