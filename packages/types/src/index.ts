export { ONBOARDING_STATES } from "./tenant.js";
export type { OnboardingState, Tenant, TenantIdentity, ValidationEvent } from "./tenant.js";

export type {
  EmbeddingProviderName,
  StoreConnectionParams,
  ProviderSettings,
  CredentialBundle,
  Credential,
  DecryptedCredential,
} from "./credential.js";

export { UPLOAD_STATUSES } from "./upload.js";
export type { UploadStatus, UploadedFile, NewUploadedFile, UploadStatusUpdate } from "./upload.js";

export type { SegmentRecord, StoredSegment } from "./segment.js";
export type { ParseResult, ParseFn, EmbeddingResult, IngestOutcome } from "./pipeline.js";
export type { IngestJobData, NotificationJobData } from "./job.js";
export type {
  ChatUser,
  ChatDocument,
  ChatEvent,
  ChatAction,
  ChatAttachment,
  ChatReply,
} from "./chat.js";
export type {
  AppConfig,
  DatabaseConfig,
  RedisConfig,
  WorkerConfig,
  SecretsConfig,
  FallbackConfig,
  EmbeddingConfig,
  SegmenterConfig,
  OnboardingConfig,
  UploadConfig,
} from "./config.js";
