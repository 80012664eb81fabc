import {
  AppError,
  CancelledError,
  ConflictError,
  FileTooLargeError,
  NotFoundError,
  UnsupportedFormatError,
  errorMessage,
} from "@vectorbridge/errors";
import { createChildLogger, type Logger } from "@vectorbridge/logger";
import { extensionOf } from "@vectorbridge/parser";
import { Segmenter, type SegmenterOptions } from "@vectorbridge/segmenter";
import type {
  ChatDocument,
  IngestOutcome,
  ParseFn,
  ProviderSettings,
  SegmentRecord,
  StoredSegment,
  Tenant,
  UploadStatus,
  UploadedFile,
} from "@vectorbridge/types";
import type { CredentialSource } from "@vectorbridge/vector-store";
import type { IBlobStorage } from "./blob-storage.js";
import { ExportBuilder, type ExportArchive } from "./export-builder.js";
import { KeyedMutex } from "./keyed-mutex.js";
import type { TenantLock } from "./tenant-lock.js";
import type { IUploadRepository } from "./upload-repository.js";

export interface SegmentEmbedder {
  embed(
    credential: ProviderSettings & { apiKey: string },
    segments: readonly string[],
    options?: { signal?: AbortSignal },
  ): Promise<number[][]>;
}

export interface SegmentStore {
  write(
    tenantId: string,
    fileId: string,
    records: readonly SegmentRecord[],
    vectors: readonly number[][],
  ): Promise<void>;
  read(tenantId: string, fileId: string): Promise<StoredSegment[]>;
  resetSchema(tenantId: string): Promise<void>;
}

export interface UploadLimits {
  maxBytes: number;
  allowedExtensions: readonly string[];
}

export interface IngestionCoordinatorOptions {
  credentials: CredentialSource;
  uploads: IUploadRepository;
  blobs: IBlobStorage;
  parse: ParseFn;
  embeddings: SegmentEmbedder;
  store: SegmentStore;
  segmenter?: Partial<SegmenterOptions>;
  limits: UploadLimits;
  /** Shared with every process touching the same tenants. Defaults to an in-process mutex. */
  lock?: TenantLock;
  logger?: Logger;
  now?: () => Date;
}

export interface ProcessOptions {
  signal?: AbortSignal;
}

const IN_FLIGHT: readonly UploadStatus[] = ["parsing", "segmenting", "embedding"];
const CANCELLABLE: readonly UploadStatus[] = ["pending", ...IN_FLIGHT];
const SETTLED: readonly UploadStatus[] = ["pending", "stored", "failed", "exported"];
const EXPORTABLE: readonly UploadStatus[] = ["stored", "exported"];
const HISTORY_LIMIT = 10;
export const STORE_RESET_REASON = "vector store was reset";

/**
 * Drives uploads through parse, segment, embed and store.
 *
 * Work for one tenant is serialized through the tenant lock; different
 * tenants proceed in parallel. Any stage failure marks the file failed with
 * a readable reason and ends the run. Nothing is retried here.
 */
export class IngestionCoordinator {
  private readonly lock: TenantLock;
  private readonly running = new Map<string, AbortController>();
  private readonly credentials: CredentialSource;
  private readonly uploads: IUploadRepository;
  private readonly blobs: IBlobStorage;
  private readonly parse: ParseFn;
  private readonly embeddings: SegmentEmbedder;
  private readonly store: SegmentStore;
  private readonly segmenter: Segmenter;
  private readonly limits: UploadLimits;
  private readonly exporter: ExportBuilder;
  private readonly logger?: Logger;
  private readonly now: () => Date;

  constructor(options: IngestionCoordinatorOptions) {
    this.credentials = options.credentials;
    this.uploads = options.uploads;
    this.blobs = options.blobs;
    this.parse = options.parse;
    this.embeddings = options.embeddings;
    this.store = options.store;
    this.segmenter = new Segmenter(options.segmenter);
    this.limits = options.limits;
    this.exporter = new ExportBuilder(options.store, options.blobs);
    this.lock = options.lock ?? new KeyedMutex();
    this.logger = options.logger && createChildLogger(options.logger, { component: "coordinator" });
    this.now = options.now ?? (() => new Date());
  }

  /**
   * Intake: check the tenant and the file, store the blob and record the
   * upload as pending. Processing is started separately.
   */
  async accept(tenant: Tenant, document: ChatDocument): Promise<UploadedFile> {
    if (tenant.onboardingState !== "Complete") {
      throw new ConflictError("Finish setup with /start before uploading files");
    }
    const extension = extensionOf(document.fileName);
    if (!this.limits.allowedExtensions.includes(extension)) {
      throw new UnsupportedFormatError(extension);
    }
    if (document.content.byteLength > this.limits.maxBytes) {
      throw new FileTooLargeError(this.limits.maxBytes);
    }

    const existing = await this.uploads.findByName(tenant.id, document.fileName);
    if (existing && IN_FLIGHT.includes(existing.status)) {
      throw new ConflictError(`${document.fileName} is still being processed`);
    }

    const storageKey = await this.blobs.put(tenant.id, document.fileName, document.content);
    const file = await this.uploads.upsert({
      tenantId: tenant.id,
      fileName: document.fileName,
      storageKey,
      mimeType: document.mimeType,
      sizeBytes: document.content.byteLength,
    });
    if (existing && existing.storageKey !== storageKey) {
      await this.blobs.delete(existing.storageKey);
    }
    this.logger?.info(
      { tenantId: tenant.id, fileId: file.id, sizeBytes: file.sizeBytes, replaced: existing !== undefined },
      "Upload accepted",
    );
    return file;
  }

  file(tenantId: string, fileId: string): Promise<UploadedFile> {
    return this.requireFile(tenantId, fileId);
  }

  /** Explicit re-processing request: back to pending. */
  async requestReprocess(tenantId: string, fileId: string): Promise<UploadedFile> {
    const file = await this.requireFile(tenantId, fileId);
    const updated = await this.uploads.transition(tenantId, fileId, SETTLED, {
      status: "pending",
      errorMessage: null,
      cancelRequested: false,
    });
    if (!updated) throw new ConflictError(`${file.fileName} is still being processed`);
    return updated;
  }

  /**
   * Ask for a pending or running job to stop. The request is recorded on
   * the file so a worker in another process sees it at its next stage.
   */
  async requestCancel(tenantId: string, fileId: string): Promise<UploadedFile> {
    const file = await this.requireFile(tenantId, fileId);
    const updated = await this.uploads.requestCancel(tenantId, fileId, CANCELLABLE);
    if (!updated) throw new ConflictError(`${file.fileName} is not being processed`);
    this.cancel(fileId);
    this.logger?.info({ tenantId, fileId }, "Cancel requested");
    return updated;
  }

  async isCancelRequested(tenantId: string, fileId: string): Promise<boolean> {
    const file = await this.uploads.findById(tenantId, fileId);
    return file?.cancelRequested ?? false;
  }

  /**
   * Run the pipeline for one file. Never throws for stage failures; the
   * outcome says how it ended.
   */
  async process(tenantId: string, fileId: string, options: ProcessOptions = {}): Promise<IngestOutcome> {
    const controller = new AbortController();
    const signal = options.signal ? AbortSignal.any([controller.signal, options.signal]) : controller.signal;
    this.running.set(fileId, controller);
    try {
      return await this.lock.run(tenantId, () => this.run(tenantId, fileId, signal));
    } finally {
      this.running.delete(fileId);
    }
  }

  /**
   * Stop a job running in this process before its next stage or embedding
   * batch. An in-flight provider request is not interrupted.
   */
  cancel(fileId: string): boolean {
    const controller = this.running.get(fileId);
    if (!controller) return false;
    controller.abort();
    return true;
  }

  async history(tenantId: string): Promise<string[]> {
    const files = await this.uploads.listRecent(tenantId, HISTORY_LIMIT);
    return files.map(formatHistoryLine);
  }

  /**
   * Archive the original and its stored segments, then mark the file
   * exported. Only a file whose current version is stored can be exported.
   */
  async export(tenantId: string, fileId: string): Promise<ExportArchive> {
    return this.lock.run(tenantId, async () => {
      const file = await this.requireFile(tenantId, fileId);
      if (!EXPORTABLE.includes(file.status)) {
        throw new NotFoundError(
          `${file.fileName} has no stored segments to export (status: ${STATUS_LABELS[file.status]}).`,
        );
      }
      const archive = await this.exporter.build(tenantId, file);
      await this.uploads.updateStatus(tenantId, fileId, { status: "exported" });
      this.logger?.info({ tenantId, fileId, segments: archive.segmentCount }, "Export built");
      return archive;
    });
  }

  /**
   * Destructive: empty the tenant's vector table. Files whose vectors were
   * stored are marked failed so they can be re-processed.
   */
  async resetStore(tenantId: string): Promise<number> {
    return this.lock.run(tenantId, async () => {
      await this.store.resetSchema(tenantId);
      const affected = await this.uploads.failAll(tenantId, ["stored", "exported"], STORE_RESET_REASON);
      this.logger?.warn({ tenantId, affected }, "Vector store reset");
      return affected;
    });
  }

  private async run(tenantId: string, fileId: string, signal: AbortSignal): Promise<IngestOutcome> {
    const file = await this.requireFile(tenantId, fileId);
    const log = this.logger && createChildLogger(this.logger, { tenantId, fileId });
    const started = this.now().getTime();

    try {
      if (file.cancelRequested) throw new CancelledError("Processing was cancelled");
      throwIfCancelled(signal);
      await this.setStatus(file, "parsing");
      const blob = await this.blobs.get(file.storageKey);
      const parsed = await this.parse(blob, file.fileName);

      await this.setStatus(file, "segmenting");
      const records = this.segmenter.segment(parsed.text).toRecords(file.fileName, file.id);

      await this.checkpoint(file, signal);
      await this.setStatus(file, "embedding");
      const vectors = await this.credentials.withSecrets(tenantId, (credential) =>
        this.embeddings.embed(
          credential.provider,
          records.map((record) => record.body),
          { signal },
        ),
      );

      await this.checkpoint(file, signal);
      await this.store.write(tenantId, fileId, records, vectors);
      const stored = await this.uploads.transition(tenantId, fileId, ["embedding"], {
        status: "stored",
        errorMessage: null,
        segmentCount: records.length,
        processedAt: this.now(),
        cancelRequested: false,
      });
      if (!stored) {
        log?.warn("File changed while storing; leaving its status alone");
        return {
          fileId,
          status: "failed",
          reason: "CONFLICT",
          message: `${file.fileName} changed while it was being stored.`,
        };
      }
      log?.info(
        { segments: records.length, durationMs: this.now().getTime() - started },
        "File stored",
      );
      return { fileId, status: "stored", segmentCount: records.length };
    } catch (err: unknown) {
      const reason = AppError.isAppError(err) ? err.code : "INTERNAL_ERROR";
      const message = describeFailure(file.fileName, err);
      log?.warn({ reason, err }, "File processing failed");
      try {
        await this.uploads.updateStatus(tenantId, fileId, {
          status: "failed",
          errorMessage: message,
          segmentCount: 0,
          processedAt: this.now(),
          cancelRequested: false,
        });
      } catch (recordErr: unknown) {
        log?.error({ err: recordErr }, "Could not record the failure");
      }
      return { fileId, status: "failed", reason, message };
    }
  }

  /** Stops the run when this process or any other asked for cancellation. */
  private async checkpoint(file: UploadedFile, signal: AbortSignal): Promise<void> {
    throwIfCancelled(signal);
    if (await this.isCancelRequested(file.tenantId, file.id)) {
      throw new CancelledError("Processing was cancelled");
    }
  }

  private async setStatus(file: UploadedFile, status: UploadStatus): Promise<void> {
    await this.uploads.updateStatus(file.tenantId, file.id, { status });
  }

  private async requireFile(tenantId: string, fileId: string): Promise<UploadedFile> {
    const file = await this.uploads.findById(tenantId, fileId);
    if (!file) throw new NotFoundError(`File ${fileId} not found`);
    return file;
  }
}

function throwIfCancelled(signal: AbortSignal): void {
  if (signal.aborted) throw new CancelledError("Processing was cancelled");
}

function describeFailure(fileName: string, err: unknown): string {
  if (!AppError.isAppError(err)) return `Processing ${fileName} failed unexpectedly.`;
  switch (err.code) {
    case "PARSING_ERROR":
    case "UNSUPPORTED_FORMAT":
      return `Could not read ${fileName}: ${err.message}`;
    case "EMPTY_INPUT":
      return `${fileName} contains no text to index.`;
    case "EMBEDDING_PROVIDER_ERROR":
    case "FATAL_PROVIDER_ERROR":
    case "TRANSIENT_PROVIDER_ERROR":
      return `The embedding provider failed: ${err.message}`;
    case "SCHEMA_ERROR":
    case "PERSISTENCE_ERROR":
      return `Could not save segments to your vector store: ${err.message}`;
    case "CANCELLED":
      return "Processing was cancelled.";
    default:
      return errorMessage(err);
  }
}

const STATUS_LABELS: Record<UploadStatus, string> = {
  pending: "Pending",
  parsing: "Parsing",
  segmenting: "Segmenting",
  embedding: "Embedding",
  stored: "Stored",
  failed: "Failed",
  exported: "Exported",
};

/** `YYYY-MM-DD HH:mm · name · Status · id`, UTC. */
export function formatHistoryLine(file: UploadedFile): string {
  const iso = file.createdAt.toISOString();
  const when = `${iso.slice(0, 10)} ${iso.slice(11, 16)}`;
  return `${when} · ${file.fileName} · ${STATUS_LABELS[file.status]} · ${file.id}`;
}
