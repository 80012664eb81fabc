import { CohereClient, CohereError, CohereTimeoutError } from "cohere-ai";
import { FatalProviderError } from "@vectorbridge/errors";
import type { EmbeddingResult } from "@vectorbridge/types";
import type { IEmbeddingProvider } from "./embedding-provider.interface.js";
import { errorForFailure, errorForStatus } from "./provider-errors.js";

const DEFAULT_MODEL = "embed-v4.0";
const DEFAULT_DIMENSIONS = 1024;
const DEFAULT_TIMEOUT_MS = 30_000;

export interface CohereProviderConfig {
  apiKey: string;
  model?: string;
  dimensions?: number;
  timeoutMs?: number;
}

export class CohereEmbeddingProvider implements IEmbeddingProvider {
  readonly name = "cohere";
  readonly model: string;
  readonly dimensions: number;
  private readonly client: CohereClient;
  private readonly timeoutMs: number;

  constructor(config: CohereProviderConfig) {
    this.client = new CohereClient({ token: config.apiKey });
    this.model = config.model ?? DEFAULT_MODEL;
    this.dimensions = config.dimensions ?? DEFAULT_DIMENSIONS;
    this.timeoutMs = config.timeoutMs ?? DEFAULT_TIMEOUT_MS;
  }

  async embed(text: string): Promise<EmbeddingResult> {
    return this.batchEmbed([text]);
  }

  async batchEmbed(texts: string[]): Promise<EmbeddingResult> {
    const response = await this.client.v2
      .embed(
        {
          texts,
          model: this.model,
          inputType: "search_document",
          embeddingTypes: ["float"],
        },
        // Retries belong to the embedding client.
        { timeoutInSeconds: Math.ceil(this.timeoutMs / 1000), maxRetries: 0 },
      )
      .catch((err: unknown): never => {
        throw this.toProviderError(err);
      });

    const vectors = response.embeddings.float;
    if (!vectors) {
      throw new FatalProviderError("cohere response has no float embeddings", this.name);
    }

    return {
      embeddings: vectors,
      model: this.model,
      tokensUsed: response.meta?.billedUnits?.inputTokens ?? 0,
      dimensions: this.dimensions,
    };
  }

  private toProviderError(err: unknown): Error {
    if (err instanceof CohereTimeoutError) {
      return errorForFailure(this.name, err, true);
    }
    if (err instanceof CohereError && err.statusCode !== undefined) {
      return errorForStatus(this.name, err.statusCode, err.message);
    }
    return errorForFailure(this.name, err);
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
