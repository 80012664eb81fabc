import type { EmbeddingProviderName, StoreConnectionParams } from "./credential.js";

export interface AppConfig {
  nodeEnv: "development" | "test" | "production";
  port: number;
  logLevel: "debug" | "info" | "warn" | "error";
  database: DatabaseConfig;
  redis: RedisConfig;
  worker: WorkerConfig;
  secrets: SecretsConfig;
  fallback: FallbackConfig;
  embedding: EmbeddingConfig;
  segmenter: SegmenterConfig;
  onboarding: OnboardingConfig;
  uploads: UploadConfig;
}

export interface DatabaseConfig {
  url: string;
  poolMax: number;
}

export interface RedisConfig {
  url: string;
}

export interface WorkerConfig {
  concurrency: number;
  /** How often a running job checks for a cancel request. */
  cancelPollMs: number;
}

export interface SecretsConfig {
  encryptionKey: string;
  webhookSecret: string;
  outboundWebhookUrl?: string;
}

export interface FallbackConfig {
  store?: StoreConnectionParams;
  providerApiKey?: string;
}

export interface EmbeddingConfig {
  provider: EmbeddingProviderName;
  model: string;
  dimensions: number;
  batchSize: number;
  maxAttempts: number;
  retryBaseDelayMs: number;
  retryMaxDelayMs: number;
  requestDelayMs: number;
  requestTimeoutMs: number;
}

export interface SegmenterConfig {
  maxCharacters: number;
  maxSentences: number;
}

export interface OnboardingConfig {
  probeTimeoutMs: number;
  sessionTtlMs: number;
}

export interface UploadConfig {
  dir: string;
  maxBytes: number;
  allowedExtensions: string[];
}
