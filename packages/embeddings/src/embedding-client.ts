import {
  AppError,
  CancelledError,
  EmbeddingProviderError,
  FatalProviderError,
  InvalidKeyError,
  RateLimitedError,
  RetryExhaustedError,
  TransientProviderError,
  sleep as defaultSleep,
  withRetry,
} from "@vectorbridge/errors";
import type { Logger } from "@vectorbridge/logger";
import type { EmbeddingConfig, ProviderSettings } from "@vectorbridge/types";
import type { IEmbeddingProvider } from "./embedding-provider.interface.js";
import { createEmbeddingProvider, type ProviderFactory } from "./factory.js";
import { statusOf } from "./provider-errors.js";

export type EmbeddingPolicy = Pick<
  EmbeddingConfig,
  | "batchSize"
  | "maxAttempts"
  | "retryBaseDelayMs"
  | "retryMaxDelayMs"
  | "requestDelayMs"
  | "requestTimeoutMs"
>;

export type ProviderCredential = ProviderSettings & { apiKey: string };

export interface EmbedOptions {
  /** Checked before each batch. An in-flight request is never interrupted. */
  signal?: AbortSignal;
}

export interface EmbeddingClientOptions {
  policy: EmbeddingPolicy;
  logger?: Logger;
  createProvider?: ProviderFactory;
  sleep?: (ms: number) => Promise<void>;
  now?: () => number;
}

const PROBE_TEXT = "vectorbridge key check";

/**
 * Turns an ordered list of segment texts into the same number of vectors.
 *
 * Batches of `batchSize` go out one at a time, spaced at least
 * `requestDelayMs` apart. Transient provider failures are retried with
 * backoff up to `maxAttempts` per batch; anything else fails the batch on
 * the spot. A failed batch fails the whole call: no partial result.
 */
export class EmbeddingClient {
  private readonly policy: EmbeddingPolicy;
  private readonly logger?: Logger;
  private readonly createProvider: ProviderFactory;
  private readonly sleep: (ms: number) => Promise<void>;
  private readonly now: () => number;

  constructor(options: EmbeddingClientOptions) {
    if (options.policy.batchSize < 1 || options.policy.maxAttempts < 1) {
      throw new RangeError("batchSize and maxAttempts must be positive");
    }
    this.policy = options.policy;
    this.logger = options.logger;
    this.createProvider = options.createProvider ?? createEmbeddingProvider;
    this.sleep = options.sleep ?? defaultSleep;
    this.now = options.now ?? Date.now;
  }

  async embed(
    credential: ProviderCredential,
    segments: readonly string[],
    options?: EmbedOptions,
  ): Promise<number[][]> {
    if (segments.length === 0) return [];

    const provider = this.providerFor(credential);
    const { batchSize } = this.policy;
    const signal = options?.signal;
    const vectors: number[][] = [];
    let lastRequestAt: number | undefined;

    const pace = async (): Promise<void> => {
      if (lastRequestAt !== undefined) {
        const wait = lastRequestAt + this.policy.requestDelayMs - this.now();
        if (wait > 0) await this.sleep(wait);
      }
      lastRequestAt = this.now();
    };

    for (let start = 0, batchIndex = 0; start < segments.length; start += batchSize, batchIndex++) {
      if (signal?.aborted) {
        throw new CancelledError("Embedding cancelled", { details: { batchIndex } });
      }
      const batch = segments.slice(start, start + batchSize);

      try {
        const batchVectors = await withRetry(
          async () => {
            await pace();
            const result = await provider.batchEmbed(batch);
            this.checkBatch(provider, batch.length, result.embeddings);
            return result.embeddings;
          },
          {
            maxAttempts: this.policy.maxAttempts,
            baseDelayMs: this.policy.retryBaseDelayMs,
            maxDelayMs: this.policy.retryMaxDelayMs,
            shouldRetry: (err) => err instanceof TransientProviderError,
            onRetry: ({ attempt, maxAttempts, delayMs, error }) => {
              this.logger?.warn(
                { provider: provider.name, batchIndex, attempt, maxAttempts, delayMs, code: codeOf(error) },
                "Embedding batch failed, retrying",
              );
            },
            signal,
            sleep: this.sleep,
          },
        );
        vectors.push(...batchVectors);
      } catch (err: unknown) {
        if (err instanceof RetryExhaustedError) {
          throw new EmbeddingProviderError(
            `Embedding batch ${String(batchIndex)} failed after ${String(err.attempts)} attempt(s): ${err.message}`,
            batchIndex,
            err.attempts,
            { cause: err.cause },
          );
        }
        throw err;
      }
    }

    this.logger?.debug(
      { provider: provider.name, segments: segments.length, batches: Math.ceil(segments.length / batchSize) },
      "Embedded segments",
    );
    return vectors;
  }

  /**
   * One minimal request with the tenant's key. Auth failures become
   * InvalidKeyError, rate limiting becomes RateLimitedError, a wrong vector
   * width is fatal.
   */
  async probe(credential: ProviderCredential): Promise<void> {
    const provider = this.providerFor(credential);
    try {
      const result = await provider.embed(PROBE_TEXT);
      this.checkBatch(provider, 1, result.embeddings);
    } catch (err: unknown) {
      if (!AppError.isAppError(err)) throw err;
      const status = statusOf(err);
      if (err instanceof FatalProviderError && (status === 401 || status === 403)) {
        throw new InvalidKeyError(undefined, provider.name, { cause: err });
      }
      if (err instanceof TransientProviderError && status === 429) {
        const retryAfter = err.details?.["retryAfter"];
        throw new RateLimitedError(
          "Provider is rate limiting this key, try again shortly",
          typeof retryAfter === "number" ? retryAfter : 0,
          { cause: err },
        );
      }
      throw err;
    }
  }

  private providerFor(credential: ProviderCredential): IEmbeddingProvider {
    return this.createProvider({
      provider: credential.provider,
      apiKey: credential.apiKey,
      model: credential.model,
      dimensions: credential.dimensions,
      timeoutMs: this.policy.requestTimeoutMs,
    });
  }

  private checkBatch(provider: IEmbeddingProvider, expected: number, vectors: number[][]): void {
    if (vectors.length !== expected) {
      throw new FatalProviderError(
        `Provider returned ${String(vectors.length)} vectors for ${String(expected)} inputs`,
        provider.name,
      );
    }
    for (const vector of vectors) {
      if (vector.length !== provider.dimensions) {
        throw new FatalProviderError(
          `Provider returned ${String(vector.length)}-dimensional vectors, expected ${String(provider.dimensions)}`,
          provider.name,
          { details: { reason: "dimension_mismatch" } },
        );
      }
    }
  }
}

function codeOf(error: unknown): string {
  return AppError.isAppError(error) ? error.code : "UNKNOWN";
}
