import type { EmbeddingResult } from "@vectorbridge/types";

export interface IEmbeddingProvider {
  readonly name: string;
  readonly model: string;
  readonly dimensions: number;

  embed(text: string): Promise<EmbeddingResult>;
  /** One provider request. Vectors come back in input order. */
  batchEmbed(texts: string[]): Promise<EmbeddingResult>;
  healthCheck(): Promise<boolean>;
}
