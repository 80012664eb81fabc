import { z } from "zod";
import type { AppConfig, StoreConnectionParams } from "@vectorbridge/types";

const positiveInt = (fallback: string) =>
  z.string().default(fallback).transform(Number).pipe(z.number().int().positive());

const nonNegativeInt = (fallback: string) =>
  z.string().default(fallback).transform(Number).pipe(z.number().int().nonnegative());

/** Blank values in .env files mean "unset". */
const optionalString = <T extends z.ZodTypeAny>(schema: T) =>
  z.preprocess((v) => (v === "" ? undefined : v), schema.optional());

/**
 * Zod schema for all environment variables defined in .env.example.
 */
export const envSchema = z.object({
  // ---------- Core ----------
  NODE_ENV: z.enum(["development", "test", "production"]),
  PORT: positiveInt("3000"),
  LOG_LEVEL: z.enum(["debug", "info", "warn", "error"]),

  // ---------- Database ----------
  DATABASE_URL: z
    .string()
    .min(1, "DATABASE_URL is required")
    .refine((url) => url.startsWith("postgresql://") || url.startsWith("postgres://"), {
      message: "DATABASE_URL must start with postgresql:// or postgres://",
    }),
  DATABASE_POOL_MAX: positiveInt("10"),

  // ---------- Queue ----------
  REDIS_URL: z.string().min(1, "REDIS_URL is required"),
  WORKER_CONCURRENCY: positiveInt("4"),
  WORKER_CANCEL_POLL_MS: positiveInt("2000"),

  // ---------- Secrets ----------
  ENCRYPTION_KEY: z.string().length(32, "ENCRYPTION_KEY must be exactly 32 characters"),
  WEBHOOK_SECRET: z.string().min(16, "WEBHOOK_SECRET must be at least 16 characters"),
  OUTBOUND_WEBHOOK_URL: optionalString(z.string().url()),

  // ---------- Fallbacks before onboarding completes ----------
  DEFAULT_STORE_URL: optionalString(
    z
      .string()
      .refine((url) => url.startsWith("postgresql://") || url.startsWith("postgres://"), {
        message: "DEFAULT_STORE_URL must be a postgres URL",
      }),
  ),
  DEFAULT_PROVIDER_API_KEY: optionalString(z.string()),

  // ---------- Embeddings ----------
  EMBEDDING_PROVIDER: z.enum(["mistral", "cohere"]).default("mistral"),
  EMBEDDING_MODEL: z.string().default("mistral-embed"),
  EMBEDDING_DIMENSIONS: positiveInt("1024"),
  EMBED_BATCH_SIZE: positiveInt("10"),
  EMBED_MAX_ATTEMPTS: positiveInt("6"),
  EMBED_RETRY_BASE_DELAY_MS: nonNegativeInt("1000"),
  EMBED_RETRY_MAX_DELAY_MS: nonNegativeInt("30000"),
  EMBED_REQUEST_DELAY_MS: nonNegativeInt("1000"),
  EMBED_REQUEST_TIMEOUT_MS: positiveInt("30000"),

  // ---------- Segmenter ----------
  SEGMENT_MAX_CHARACTERS: positiveInt("1000"),
  SEGMENT_MAX_SENTENCES: positiveInt("3"),

  // ---------- Onboarding ----------
  STORE_PROBE_TIMEOUT_MS: positiveInt("5000"),
  ONBOARDING_SESSION_TTL_MS: positiveInt("1800000"),

  // ---------- Uploads ----------
  UPLOADS_DIR: z.string().default("./uploads"),
  MAX_UPLOAD_MB: positiveInt("15"),
  ALLOWED_EXTENSIONS: z
    .string()
    .default(".txt,.md,.csv,.docx")
    .transform((val) =>
      val
        .split(",")
        .map((ext) => ext.trim().toLowerCase())
        .filter((ext) => ext.length > 0),
    )
    .refine((exts) => exts.length > 0 && exts.every((ext) => ext.startsWith(".")), {
      message: 'ALLOWED_EXTENSIONS entries must start with "."',
    }),
});

/**
 * Split a postgres URL into the connection fields a tenant would otherwise
 * answer one by one.
 */
export function parseStoreUrl(url: string): StoreConnectionParams {
  const parsed = new URL(url);
  return {
    host: parsed.hostname,
    port: parsed.port ? Number(parsed.port) : 5432,
    database: decodeURIComponent(parsed.pathname.replace(/^\//, "")) || "postgres",
    user: decodeURIComponent(parsed.username),
    password: decodeURIComponent(parsed.password),
  };
}

/**
 * Parse and validate process.env (or any compatible record) against
 * the envSchema and return a strongly-typed {@link AppConfig}.
 *
 * Throws a ZodError with detailed messages when validation fails.
 */
export function parseEnv(env: Record<string, string | undefined> = process.env): AppConfig {
  const parsed = envSchema.parse(env);

  return {
    nodeEnv: parsed.NODE_ENV,
    port: parsed.PORT,
    logLevel: parsed.LOG_LEVEL,

    database: {
      url: parsed.DATABASE_URL,
      poolMax: parsed.DATABASE_POOL_MAX,
    },

    redis: {
      url: parsed.REDIS_URL,
    },

    worker: {
      concurrency: parsed.WORKER_CONCURRENCY,
      cancelPollMs: parsed.WORKER_CANCEL_POLL_MS,
    },

    secrets: {
      encryptionKey: parsed.ENCRYPTION_KEY,
      webhookSecret: parsed.WEBHOOK_SECRET,
      outboundWebhookUrl: parsed.OUTBOUND_WEBHOOK_URL,
    },

    fallback: {
      store: parsed.DEFAULT_STORE_URL ? parseStoreUrl(parsed.DEFAULT_STORE_URL) : undefined,
      providerApiKey: parsed.DEFAULT_PROVIDER_API_KEY,
    },

    embedding: {
      provider: parsed.EMBEDDING_PROVIDER,
      model: parsed.EMBEDDING_MODEL,
      dimensions: parsed.EMBEDDING_DIMENSIONS,
      batchSize: parsed.EMBED_BATCH_SIZE,
      maxAttempts: parsed.EMBED_MAX_ATTEMPTS,
      retryBaseDelayMs: parsed.EMBED_RETRY_BASE_DELAY_MS,
      retryMaxDelayMs: parsed.EMBED_RETRY_MAX_DELAY_MS,
      requestDelayMs: parsed.EMBED_REQUEST_DELAY_MS,
      requestTimeoutMs: parsed.EMBED_REQUEST_TIMEOUT_MS,
    },

    segmenter: {
      maxCharacters: parsed.SEGMENT_MAX_CHARACTERS,
      maxSentences: parsed.SEGMENT_MAX_SENTENCES,
    },

    onboarding: {
      probeTimeoutMs: parsed.STORE_PROBE_TIMEOUT_MS,
      sessionTtlMs: parsed.ONBOARDING_SESSION_TTL_MS,
    },

    uploads: {
      dir: parsed.UPLOADS_DIR,
      maxBytes: parsed.MAX_UPLOAD_MB * 1024 * 1024,
      allowedExtensions: parsed.ALLOWED_EXTENSIONS,
    },
  };
}
