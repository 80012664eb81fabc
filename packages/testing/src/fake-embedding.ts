import type { EmbeddingFactoryConfig, IEmbeddingProvider } from "@vectorbridge/embeddings";
import type { EmbeddingResult } from "@vectorbridge/types";

/**
 * Deterministic provider: the vector of a text is its length repeated
 * `dimensions` times. `failWith` makes every request throw.
 */
export class FakeEmbeddingProvider implements IEmbeddingProvider {
  readonly name = "fake";
  readonly requests: string[][] = [];
  failWith?: Error;

  constructor(
    readonly model: string,
    readonly dimensions: number,
  ) {}

  async embed(text: string): Promise<EmbeddingResult> {
    return this.batchEmbed([text]);
  }

  async batchEmbed(texts: string[]): Promise<EmbeddingResult> {
    this.requests.push(texts);
    if (this.failWith) throw this.failWith;
    return {
      embeddings: texts.map((text) => vectorFor(text, this.dimensions)),
      model: this.model,
      tokensUsed: 0,
      dimensions: this.dimensions,
    };
  }

  async healthCheck(): Promise<boolean> {
    return this.failWith === undefined;
  }
}

export function vectorFor(text: string, dimensions: number): number[] {
  return Array<number>(dimensions).fill(text.length);
}

/**
 * Factory handing out one shared fake per API key, so tests can inspect
 * what a tenant's key was used for.
 */
export class FakeEmbeddingService {
  readonly providers = new Map<string, FakeEmbeddingProvider>();
  /** Errors thrown by every request made with the given key. */
  readonly failures = new Map<string, Error>();

  providerFor(apiKey: string): FakeEmbeddingProvider | undefined {
    return this.providers.get(apiKey);
  }

  readonly createProvider = (config: EmbeddingFactoryConfig): IEmbeddingProvider => {
    const existing = this.providers.get(config.apiKey);
    if (existing) return existing;
    const provider = new FakeEmbeddingProvider(config.model ?? `${config.provider}-fake`, config.dimensions ?? 4);
    provider.failWith = this.failures.get(config.apiKey);
    this.providers.set(config.apiKey, provider);
    return provider;
  };
}
