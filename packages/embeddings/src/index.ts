export type { IEmbeddingProvider } from "./embedding-provider.interface.js";
export { MistralEmbeddingProvider } from "./mistral-provider.js";
export type { MistralProviderConfig } from "./mistral-provider.js";
export { CohereEmbeddingProvider } from "./cohere-provider.js";
export type { CohereProviderConfig } from "./cohere-provider.js";
export { createEmbeddingProvider } from "./factory.js";
export type { EmbeddingFactoryConfig, ProviderFactory } from "./factory.js";
export { EmbeddingClient } from "./embedding-client.js";
export type {
  EmbeddingClientOptions,
  EmbeddingPolicy,
  EmbedOptions,
  ProviderCredential,
} from "./embedding-client.js";
export { errorForStatus, errorForFailure } from "./provider-errors.js";
