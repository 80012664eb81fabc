import { describe, it, expect, vi } from "vitest";
import {
  CancelledError,
  EmbeddingProviderError,
  FatalProviderError,
  InvalidKeyError,
  RateLimitedError,
  TransientProviderError,
} from "@vectorbridge/errors";
import type { EmbeddingResult } from "@vectorbridge/types";
import type { IEmbeddingProvider } from "./embedding-provider.interface.js";
import { EmbeddingClient, type EmbeddingPolicy, type ProviderCredential } from "./embedding-client.js";
import { createEmbeddingProvider, type EmbeddingFactoryConfig } from "./factory.js";
import { MistralEmbeddingProvider } from "./mistral-provider.js";
import { CohereEmbeddingProvider } from "./cohere-provider.js";

const DIMS = 4;

const credential: ProviderCredential = {
  provider: "mistral",
  model: "mistral-embed",
  dimensions: DIMS,
  apiKey: "test-key",
};

const policy: EmbeddingPolicy = {
  batchSize: 10,
  maxAttempts: 6,
  retryBaseDelayMs: 1,
  retryMaxDelayMs: 1,
  requestDelayMs: 0,
  requestTimeoutMs: 1000,
};

const noSleep = (): Promise<void> => Promise.resolve();

/** Vector for "s<n>" is [n, n, n, n]. */
class ScriptedProvider implements IEmbeddingProvider {
  readonly name = "scripted";
  readonly model = "scripted-model";
  readonly dimensions = DIMS;
  readonly calls: string[][] = [];
  private readonly behaviour: (call: number, texts: string[]) => number[][] | Error;

  constructor(behaviour?: (call: number, texts: string[]) => number[][] | Error) {
    this.behaviour =
      behaviour ?? ((_call, texts) => texts.map((t) => Array<number>(DIMS).fill(Number(t.slice(1)))));
  }

  async embed(text: string): Promise<EmbeddingResult> {
    return this.batchEmbed([text]);
  }

  async batchEmbed(texts: string[]): Promise<EmbeddingResult> {
    this.calls.push(texts);
    const out = this.behaviour(this.calls.length, texts);
    if (out instanceof Error) throw out;
    return { embeddings: out, model: this.model, tokensUsed: 0, dimensions: DIMS };
  }

  async healthCheck(): Promise<boolean> {
    return true;
  }
}

function segments(n: number): string[] {
  return Array.from({ length: n }, (_, i) => `s${String(i)}`);
}

function clientWith(provider: IEmbeddingProvider, overrides: Partial<EmbeddingPolicy> = {}) {
  return new EmbeddingClient({
    policy: { ...policy, ...overrides },
    createProvider: () => provider,
    sleep: noSleep,
  });
}

const transient = () => new TransientProviderError("429", "scripted", { details: { status: 429 } });

describe("EmbeddingClient.embed", () => {
  it("returns one vector per segment in input order across batches", async () => {
    const provider = new ScriptedProvider();

    const vectors = await clientWith(provider).embed(credential, segments(25));

    expect(provider.calls.map((c) => c.length)).toEqual([10, 10, 5]);
    expect(vectors).toHaveLength(25);
    expect(vectors.map((v) => v[0])).toEqual(Array.from({ length: 25 }, (_, i) => i));
    for (const v of vectors) expect(v).toHaveLength(DIMS);
  });

  it("returns an empty list without calling the provider", async () => {
    const createProvider = vi.fn();
    const client = new EmbeddingClient({ policy, createProvider, sleep: noSleep });

    expect(await client.embed(credential, [])).toEqual([]);
    expect(createProvider).not.toHaveBeenCalled();
  });

  it("passes tenant settings to the provider factory", async () => {
    const seen: EmbeddingFactoryConfig[] = [];
    const client = new EmbeddingClient({
      policy,
      sleep: noSleep,
      createProvider: (config) => {
        seen.push(config);
        return new ScriptedProvider();
      },
    });

    await client.embed(credential, ["s1"]);

    expect(seen).toEqual([
      { provider: "mistral", apiKey: "test-key", model: "mistral-embed", dimensions: DIMS, timeoutMs: 1000 },
    ]);
  });

  it("makes exactly maxAttempts calls when every attempt is transient", async () => {
    const provider = new ScriptedProvider(() => transient());

    const err = await clientWith(provider).embed(credential, segments(3)).catch((e: unknown) => e);

    expect(provider.calls).toHaveLength(6);
    expect(err).toBeInstanceOf(EmbeddingProviderError);
    if (err instanceof EmbeddingProviderError) {
      expect(err.batchIndex).toBe(0);
      expect(err.attempts).toBe(6);
      expect(err.cause).toBeInstanceOf(TransientProviderError);
    }
  });

  it("fails the whole call when a later batch is exhausted", async () => {
    const provider = new ScriptedProvider((call, texts) =>
      call === 1 ? texts.map(() => [0, 0, 0, 0]) : transient(),
    );

    const err = await clientWith(provider, { batchSize: 2, maxAttempts: 3 })
      .embed(credential, segments(4))
      .catch((e: unknown) => e);

    expect(provider.calls).toHaveLength(4);
    expect(err).toBeInstanceOf(EmbeddingProviderError);
    if (err instanceof EmbeddingProviderError) {
      expect(err.batchIndex).toBe(1);
      expect(err.attempts).toBe(3);
    }
  });

  it("recovers when a retry succeeds", async () => {
    const provider = new ScriptedProvider((call, texts) =>
      call === 1 ? transient() : texts.map(() => [1, 2, 3, 4]),
    );

    const vectors = await clientWith(provider).embed(credential, ["a", "b"]);

    expect(provider.calls).toHaveLength(2);
    expect(vectors).toEqual([
      [1, 2, 3, 4],
      [1, 2, 3, 4],
    ]);
  });

  it("does not retry fatal errors", async () => {
    const provider = new ScriptedProvider(
      () => new FatalProviderError("401", "scripted", { details: { status: 401 } }),
    );

    const err = await clientWith(provider).embed(credential, segments(3)).catch((e: unknown) => e);

    expect(provider.calls).toHaveLength(1);
    expect(err).toBeInstanceOf(EmbeddingProviderError);
    if (err instanceof EmbeddingProviderError) {
      expect(err.attempts).toBe(1);
      expect(err.cause).toBeInstanceOf(FatalProviderError);
    }
  });

  it("treats a dimension mismatch as fatal", async () => {
    const provider = new ScriptedProvider((_call, texts) => texts.map(() => [1, 2]));

    const err = await clientWith(provider).embed(credential, ["a"]).catch((e: unknown) => e);

    expect(provider.calls).toHaveLength(1);
    expect(err).toBeInstanceOf(EmbeddingProviderError);
    if (err instanceof EmbeddingProviderError) {
      expect(err.cause).toBeInstanceOf(FatalProviderError);
      expect(err.message).toContain("2-dimensional vectors, expected 4");
    }
  });

  it("treats a vector count mismatch as fatal", async () => {
    const provider = new ScriptedProvider(() => [[1, 2, 3, 4]]);

    await expect(clientWith(provider).embed(credential, ["a", "b"])).rejects.toThrow(
      "Provider returned 1 vectors for 2 inputs",
    );
    expect(provider.calls).toHaveLength(1);
  });

  it("stops before the next batch once cancelled", async () => {
    const controller = new AbortController();
    const provider = new ScriptedProvider((_call, texts) => {
      controller.abort();
      return texts.map(() => [0, 0, 0, 0]);
    });

    await expect(
      clientWith(provider, { batchSize: 1 }).embed(credential, segments(3), {
        signal: controller.signal,
      }),
    ).rejects.toBeInstanceOf(CancelledError);
    expect(provider.calls).toHaveLength(1);
  });

  it("spaces requests by requestDelayMs", async () => {
    let clock = 0;
    const waits: number[] = [];
    const client = new EmbeddingClient({
      policy: { ...policy, batchSize: 1, requestDelayMs: 1000 },
      createProvider: () => new ScriptedProvider(),
      now: () => clock,
      sleep: (ms) => {
        waits.push(ms);
        clock += ms;
        return Promise.resolve();
      },
    });

    await client.embed(credential, segments(3));

    expect(waits).toEqual([1000, 1000]);
  });

  it("rejects a non-positive batch size", () => {
    expect(() => new EmbeddingClient({ policy: { ...policy, batchSize: 0 } })).toThrow(RangeError);
  });
});

describe("EmbeddingClient.probe", () => {
  it("passes with a working key", async () => {
    await expect(clientWith(new ScriptedProvider(() => [[1, 2, 3, 4]])).probe(credential)).resolves.toBeUndefined();
  });

  it("maps auth failures to InvalidKeyError", async () => {
    const provider = new ScriptedProvider(
      () => new FatalProviderError("401", "scripted", { details: { status: 401, reason: "auth" } }),
    );
    await expect(clientWith(provider).probe(credential)).rejects.toBeInstanceOf(InvalidKeyError);
  });

  it("maps 429 to RateLimitedError", async () => {
    const provider = new ScriptedProvider(
      () => new TransientProviderError("429", "scripted", { details: { status: 429, retryAfter: 7 } }),
    );
    const err = await clientWith(provider).probe(credential).catch((e: unknown) => e);
    expect(err).toBeInstanceOf(RateLimitedError);
    if (err instanceof RateLimitedError) expect(err.retryAfter).toBe(7);
  });

  it("rejects a key whose model has the wrong width", async () => {
    const provider = new ScriptedProvider(() => [[1, 2, 3]]);
    await expect(clientWith(provider).probe(credential)).rejects.toBeInstanceOf(FatalProviderError);
  });
});

describe("MistralEmbeddingProvider", () => {
  function jsonResponse(body: unknown, status = 200, headers: Record<string, string> = {}): Response {
    return new Response(JSON.stringify(body), {
      status,
      headers: { "Content-Type": "application/json", ...headers },
    });
  }

  function providerWith(response: Response | Error) {
    const fetchFn = vi.fn<typeof fetch>(() =>
      response instanceof Error ? Promise.reject(response) : Promise.resolve(response),
    );
    const provider = new MistralEmbeddingProvider({
      apiKey: "test-key",
      dimensions: 2,
      baseUrl: "https://mistral.test/v1/",
      fetch: fetchFn,
    });
    return { provider, fetchFn };
  }

  it("posts model and inputs and orders the result by index", async () => {
    const { provider, fetchFn } = providerWith(
      jsonResponse({
        model: "mistral-embed",
        data: [
          { index: 1, embedding: [2, 2] },
          { index: 0, embedding: [1, 1] },
        ],
        usage: { prompt_tokens: 5, total_tokens: 5 },
      }),
    );

    const result = await provider.batchEmbed(["a", "b"]);

    expect(result).toEqual({
      embeddings: [
        [1, 1],
        [2, 2],
      ],
      model: "mistral-embed",
      tokensUsed: 5,
      dimensions: 2,
    });
    const call = fetchFn.mock.calls[0];
    const url = call?.[0];
    const init = call?.[1];
    expect(url).toBe("https://mistral.test/v1/embeddings");
    expect(JSON.parse(String(init?.body))).toEqual({ model: "mistral-embed", input: ["a", "b"] });
    expect(new Headers(init?.headers).get("authorization")).toBe("Bearer test-key");
  });

  it("classifies 401 as a fatal auth failure", async () => {
    const { provider } = providerWith(jsonResponse({ message: "Unauthorized" }, 401));
    const err = await provider.batchEmbed(["a"]).catch((e: unknown) => e);
    expect(err).toBeInstanceOf(FatalProviderError);
    if (err instanceof FatalProviderError) {
      expect(err.details).toEqual({ status: 401, reason: "auth" });
    }
  });

  it("classifies 429 as transient and keeps retry-after", async () => {
    const { provider } = providerWith(jsonResponse({}, 429, { "retry-after": "3" }));
    const err = await provider.batchEmbed(["a"]).catch((e: unknown) => e);
    expect(err).toBeInstanceOf(TransientProviderError);
    if (err instanceof TransientProviderError) {
      expect(err.details).toEqual({ status: 429, retryAfter: 3 });
    }
  });

  it("classifies 5xx as transient and other 4xx as fatal", async () => {
    expect(
      await providerWith(jsonResponse({}, 503)).provider.batchEmbed(["a"]).catch((e: unknown) => e),
    ).toBeInstanceOf(TransientProviderError);
    expect(
      await providerWith(jsonResponse({}, 400)).provider.batchEmbed(["a"]).catch((e: unknown) => e),
    ).toBeInstanceOf(FatalProviderError);
  });

  it("classifies network errors and timeouts as transient", async () => {
    const network = await providerWith(new TypeError("fetch failed"))
      .provider.batchEmbed(["a"])
      .catch((e: unknown) => e);
    expect(network).toBeInstanceOf(TransientProviderError);
    if (network instanceof TransientProviderError) expect(network.details).toEqual({ reason: "network" });

    const timeout = Object.assign(new Error("The operation was aborted due to timeout"), {
      name: "TimeoutError",
    });
    const timedOut = await providerWith(timeout).provider.batchEmbed(["a"]).catch((e: unknown) => e);
    expect(timedOut).toBeInstanceOf(TransientProviderError);
    if (timedOut instanceof TransientProviderError) expect(timedOut.message).toBe("mistral request timed out");
  });

  it("rejects malformed payloads as fatal", async () => {
    const { provider } = providerWith(jsonResponse({ data: "nope" }));
    await expect(provider.batchEmbed(["a"])).rejects.toBeInstanceOf(FatalProviderError);
  });

  it("healthCheck reports failures as false", async () => {
    const { provider } = providerWith(jsonResponse({}, 500));
    expect(await provider.healthCheck()).toBe(false);
  });
});

describe("createEmbeddingProvider", () => {
  it("creates a Mistral provider with defaults", () => {
    const provider = createEmbeddingProvider({ provider: "mistral", apiKey: "test-key" });
    expect(provider).toBeInstanceOf(MistralEmbeddingProvider);
    expect(provider.model).toBe("mistral-embed");
    expect(provider.dimensions).toBe(1024);
  });

  it("creates a Cohere provider with custom dimensions", () => {
    const provider = createEmbeddingProvider({ provider: "cohere", apiKey: "test-key", dimensions: 256 });
    expect(provider).toBeInstanceOf(CohereEmbeddingProvider);
    expect(provider.name).toBe("cohere");
    expect(provider.dimensions).toBe(256);
  });
});
