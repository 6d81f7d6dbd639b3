export type { IEmbeddingProvider, EmbedOptions } from "./embedding-provider.interface.js";
export { OpenAIEmbeddingProvider } from "./openai-provider.js";
export type { OpenAIProviderConfig, OpenAIEmbeddingsClient } from "./openai-provider.js";
export { CohereEmbeddingProvider } from "./cohere-provider.js";
export type { CohereProviderConfig } from "./cohere-provider.js";
export { createEmbeddingProvider } from "./factory.js";
export type { EmbeddingFactoryConfig } from "./factory.js";
export { mapProviderError } from "./provider-errors.js";
