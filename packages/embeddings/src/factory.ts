import type { EmbeddingProviderName } from "@vectorbridge/types";
import type { IEmbeddingProvider } from "./embedding-provider.interface.js";
import { CohereEmbeddingProvider } from "./cohere-provider.js";
import { MistralEmbeddingProvider } from "./mistral-provider.js";

export interface EmbeddingFactoryConfig {
  provider: EmbeddingProviderName;
  apiKey: string;
  model?: string;
  dimensions?: number;
  timeoutMs?: number;
}

export type ProviderFactory = (config: EmbeddingFactoryConfig) => IEmbeddingProvider;

export const createEmbeddingProvider: ProviderFactory = (config) => {
  const { provider, ...rest } = config;
  switch (provider) {
    case "mistral":
      return new MistralEmbeddingProvider(rest);
    case "cohere":
      return new CohereEmbeddingProvider(rest);
    default:
      throw new Error(`Unknown embedding provider: ${String(provider)}`);
  }
};
