import type { EmbeddingProviderType } from "@sitedocs/types";
import { ConfigurationError } from "@sitedocs/errors";
import type { IEmbeddingProvider } from "./embedding-provider.interface.js";
import { OpenAIEmbeddingProvider } from "./openai-provider.js";
import type { OpenAIProviderConfig } from "./openai-provider.js";
import { CohereEmbeddingProvider } from "./cohere-provider.js";
import type { CohereProviderConfig } from "./cohere-provider.js";

export interface EmbeddingFactoryConfig {
  provider: EmbeddingProviderType;
  openai?: OpenAIProviderConfig;
  cohere?: CohereProviderConfig;
}

export function createEmbeddingProvider(config: EmbeddingFactoryConfig): IEmbeddingProvider {
  switch (config.provider) {
    case "openai":
      if (!config.openai?.apiKey) {
        throw new ConfigurationError("OpenAI config is required when provider is 'openai'", {
          openai: "apiKey is required",
        });
      }
      return new OpenAIEmbeddingProvider(config.openai);
    case "cohere":
      if (!config.cohere?.apiKey) {
        throw new ConfigurationError("Cohere config is required when provider is 'cohere'", {
          cohere: "apiKey is required",
        });
      }
      return new CohereEmbeddingProvider(config.cohere);
    default:
      throw new ConfigurationError(`Unknown embedding provider: ${String(config.provider)}`);
  }
}
