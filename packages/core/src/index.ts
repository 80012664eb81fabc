export { IngestionCoordinator, formatHistoryLine, STORE_RESET_REASON } from "./coordinator.js";
export type {
  IngestionCoordinatorOptions,
  ProcessOptions,
  SegmentEmbedder,
  SegmentStore,
  UploadLimits,
} from "./coordinator.js";
export { ExportBuilder, archiveEntryName, readExportArchive } from "./export-builder.js";
export type { ExportArchive, ExportPayload, ImportedExport, SegmentReader } from "./export-builder.js";
export { LocalBlobStorage, safeFileName, storageKeyFor } from "./blob-storage.js";
export type { IBlobStorage, LocalBlobStorageOptions } from "./blob-storage.js";
export { DrizzleUploadRepository, InMemoryUploadRepository } from "./upload-repository.js";
export type { IUploadRepository } from "./upload-repository.js";
export { KeyedMutex } from "./keyed-mutex.js";
export { AdvisoryTenantLock, pgLockSessions } from "./tenant-lock.js";
export type { LockSession, LockSessionFactory, TenantLock } from "./tenant-lock.js";
export { createServices } from "./services.js";
export type { Services } from "./services.js";
