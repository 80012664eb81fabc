import { z } from "zod";
import { FatalProviderError } from "@vectorbridge/errors";
import type { EmbeddingResult } from "@vectorbridge/types";
import type { IEmbeddingProvider } from "./embedding-provider.interface.js";
import { errorForFailure, errorForStatus, parseRetryAfter } from "./provider-errors.js";

const DEFAULT_MODEL = "mistral-embed";
const DEFAULT_DIMENSIONS = 1024;
const DEFAULT_BASE_URL = "https://api.mistral.ai/v1";
const DEFAULT_TIMEOUT_MS = 30_000;

export interface MistralProviderConfig {
  apiKey: string;
  model?: string;
  dimensions?: number;
  baseUrl?: string;
  timeoutMs?: number;
  fetch?: typeof fetch;
}

const embeddingResponseSchema = z.object({
  model: z.string().optional(),
  data: z.array(
    z.object({
      index: z.number().int().nonnegative(),
      embedding: z.array(z.number()),
    }),
  ),
  usage: z
    .object({
      prompt_tokens: z.number().optional(),
      total_tokens: z.number().optional(),
    })
    .optional(),
});

/**
 * Mistral `/v1/embeddings` over HTTPS. Requests are not retried here; the
 * embedding client owns the retry policy.
 */
export class MistralEmbeddingProvider implements IEmbeddingProvider {
  readonly name = "mistral";
  readonly model: string;
  readonly dimensions: number;
  private readonly apiKey: string;
  private readonly baseUrl: string;
  private readonly timeoutMs: number;
  private readonly fetchFn: typeof fetch;

  constructor(config: MistralProviderConfig) {
    this.apiKey = config.apiKey;
    this.model = config.model ?? DEFAULT_MODEL;
    this.dimensions = config.dimensions ?? DEFAULT_DIMENSIONS;
    this.baseUrl = (config.baseUrl ?? DEFAULT_BASE_URL).replace(/\/$/, "");
    this.timeoutMs = config.timeoutMs ?? DEFAULT_TIMEOUT_MS;
    this.fetchFn = config.fetch ?? fetch;
  }

  async embed(text: string): Promise<EmbeddingResult> {
    return this.batchEmbed([text]);
  }

  async batchEmbed(texts: string[]): Promise<EmbeddingResult> {
    let response: Response;
    try {
      response = await this.fetchFn(`${this.baseUrl}/embeddings`, {
        method: "POST",
        headers: {
          "Content-Type": "application/json",
          Accept: "application/json",
          Authorization: `Bearer ${this.apiKey}`,
        },
        body: JSON.stringify({ model: this.model, input: texts }),
        signal: AbortSignal.timeout(this.timeoutMs),
      });
    } catch (err: unknown) {
      throw errorForFailure(this.name, err);
    }

    if (!response.ok) {
      const body = await response.text().catch(() => "");
      throw errorForStatus(
        this.name,
        response.status,
        body,
        parseRetryAfter(response.headers.get("retry-after")),
      );
    }

    let payload: unknown;
    try {
      payload = await response.json();
    } catch (err: unknown) {
      throw new FatalProviderError("mistral returned invalid JSON", this.name, { cause: err });
    }

    const parsed = embeddingResponseSchema.safeParse(payload);
    if (!parsed.success) {
      throw new FatalProviderError("mistral returned an unexpected response shape", this.name, {
        details: { issues: parsed.error.issues.length },
      });
    }

    const ordered = [...parsed.data.data].sort((a, b) => a.index - b.index);
    return {
      embeddings: ordered.map((d) => d.embedding),
      model: parsed.data.model ?? this.model,
      tokensUsed: parsed.data.usage?.total_tokens ?? parsed.data.usage?.prompt_tokens ?? 0,
      dimensions: this.dimensions,
    };
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
