import { randomUUID } from "node:crypto";
import { and, desc, eq, inArray } from "drizzle-orm";
import { uploadedFiles, type DbClient } from "@vectorbridge/db";
import { NotFoundError, PersistenceError } from "@vectorbridge/errors";
import type {
  NewUploadedFile,
  UploadStatus,
  UploadStatusUpdate,
  UploadedFile,
} from "@vectorbridge/types";

export interface IUploadRepository {
  /**
   * Record an upload. A tenant re-uploading a file under the same name gets
   * the existing row back, reset to pending with the new blob.
   */
  upsert(file: NewUploadedFile): Promise<UploadedFile>;
  findById(tenantId: string, fileId: string): Promise<UploadedFile | undefined>;
  findByName(tenantId: string, fileName: string): Promise<UploadedFile | undefined>;
  updateStatus(tenantId: string, fileId: string, update: UploadStatusUpdate): Promise<UploadedFile>;
  /**
   * Apply `update` only while the file is still in one of `from`. Returns
   * undefined when another writer moved it first.
   */
  transition(
    tenantId: string,
    fileId: string,
    from: readonly UploadStatus[],
    update: UploadStatusUpdate,
  ): Promise<UploadedFile | undefined>;
  /** Flag a file in one of `statuses` for cancellation. */
  requestCancel(
    tenantId: string,
    fileId: string,
    statuses: readonly UploadStatus[],
  ): Promise<UploadedFile | undefined>;
  /** Newest first. */
  listRecent(tenantId: string, limit: number): Promise<UploadedFile[]>;
  /** Fail every upload in `statuses`; returns how many changed. */
  failAll(tenantId: string, statuses: readonly UploadStatus[], reason: string): Promise<number>;
}

export class DrizzleUploadRepository implements IUploadRepository {
  constructor(private readonly db: DbClient) {}

  async upsert(file: NewUploadedFile): Promise<UploadedFile> {
    const reset = {
      storageKey: file.storageKey,
      mimeType: file.mimeType,
      sizeBytes: file.sizeBytes,
      status: "pending" as const,
      errorMessage: null,
      segmentCount: 0,
      processedAt: null,
      cancelRequested: false,
      updatedAt: new Date(),
    };
    const [row] = await this.db
      .insert(uploadedFiles)
      .values(file)
      .onConflictDoUpdate({ target: [uploadedFiles.tenantId, uploadedFiles.fileName], set: reset })
      .returning();
    if (!row) throw new PersistenceError("Upload insert returned no row");
    return row;
  }

  async findById(tenantId: string, fileId: string): Promise<UploadedFile | undefined> {
    const [row] = await this.db
      .select()
      .from(uploadedFiles)
      .where(and(eq(uploadedFiles.tenantId, tenantId), eq(uploadedFiles.id, fileId)))
      .limit(1);
    return row;
  }

  async findByName(tenantId: string, fileName: string): Promise<UploadedFile | undefined> {
    const [row] = await this.db
      .select()
      .from(uploadedFiles)
      .where(and(eq(uploadedFiles.tenantId, tenantId), eq(uploadedFiles.fileName, fileName)))
      .limit(1);
    return row;
  }

  async updateStatus(
    tenantId: string,
    fileId: string,
    update: UploadStatusUpdate,
  ): Promise<UploadedFile> {
    const [row] = await this.db
      .update(uploadedFiles)
      .set({ ...update, updatedAt: new Date() })
      .where(and(eq(uploadedFiles.tenantId, tenantId), eq(uploadedFiles.id, fileId)))
      .returning();
    if (!row) throw new NotFoundError(`File ${fileId} not found`);
    return row;
  }

  async transition(
    tenantId: string,
    fileId: string,
    from: readonly UploadStatus[],
    update: UploadStatusUpdate,
  ): Promise<UploadedFile | undefined> {
    const [row] = await this.db
      .update(uploadedFiles)
      .set({ ...update, updatedAt: new Date() })
      .where(
        and(
          eq(uploadedFiles.tenantId, tenantId),
          eq(uploadedFiles.id, fileId),
          inArray(uploadedFiles.status, [...from]),
        ),
      )
      .returning();
    return row;
  }

  async requestCancel(
    tenantId: string,
    fileId: string,
    statuses: readonly UploadStatus[],
  ): Promise<UploadedFile | undefined> {
    const [row] = await this.db
      .update(uploadedFiles)
      .set({ cancelRequested: true, updatedAt: new Date() })
      .where(
        and(
          eq(uploadedFiles.tenantId, tenantId),
          eq(uploadedFiles.id, fileId),
          inArray(uploadedFiles.status, [...statuses]),
        ),
      )
      .returning();
    return row;
  }

  async listRecent(tenantId: string, limit: number): Promise<UploadedFile[]> {
    return this.db
      .select()
      .from(uploadedFiles)
      .where(eq(uploadedFiles.tenantId, tenantId))
      .orderBy(desc(uploadedFiles.createdAt))
      .limit(limit);
  }

  async failAll(tenantId: string, statuses: readonly UploadStatus[], reason: string): Promise<number> {
    const rows = await this.db
      .update(uploadedFiles)
      .set({ status: "failed", errorMessage: reason, segmentCount: 0, updatedAt: new Date() })
      .where(and(eq(uploadedFiles.tenantId, tenantId), inArray(uploadedFiles.status, [...statuses])))
      .returning({ id: uploadedFiles.id });
    return rows.length;
  }
}

/** Process-local uploads table for tests and development runs. */
export class InMemoryUploadRepository implements IUploadRepository {
  readonly files = new Map<string, UploadedFile>();

  constructor(private readonly now: () => Date = () => new Date()) {}

  async upsert(file: NewUploadedFile): Promise<UploadedFile> {
    const at = this.now();
    const existing = await this.findByName(file.tenantId, file.fileName);
    const row: UploadedFile = existing
      ? {
          ...existing,
          storageKey: file.storageKey,
          mimeType: file.mimeType,
          sizeBytes: file.sizeBytes,
          status: "pending",
          errorMessage: null,
          segmentCount: 0,
          processedAt: null,
          cancelRequested: false,
          updatedAt: at,
        }
      : {
          ...file,
          id: randomUUID(),
          status: "pending",
          errorMessage: null,
          segmentCount: 0,
          createdAt: at,
          updatedAt: at,
          processedAt: null,
          cancelRequested: false,
        };
    this.files.set(row.id, row);
    return { ...row };
  }

  async findById(tenantId: string, fileId: string): Promise<UploadedFile | undefined> {
    const file = this.files.get(fileId);
    return file && file.tenantId === tenantId ? { ...file } : undefined;
  }

  async findByName(tenantId: string, fileName: string): Promise<UploadedFile | undefined> {
    for (const file of this.files.values()) {
      if (file.tenantId === tenantId && file.fileName === fileName) return { ...file };
    }
    return undefined;
  }

  async updateStatus(
    tenantId: string,
    fileId: string,
    update: UploadStatusUpdate,
  ): Promise<UploadedFile> {
    const file = this.files.get(fileId);
    if (!file || file.tenantId !== tenantId) throw new NotFoundError(`File ${fileId} not found`);
    const next: UploadedFile = {
      ...file,
      status: update.status,
      errorMessage: update.errorMessage === undefined ? file.errorMessage : update.errorMessage,
      segmentCount: update.segmentCount ?? file.segmentCount,
      processedAt: update.processedAt === undefined ? file.processedAt : update.processedAt,
      cancelRequested: update.cancelRequested ?? file.cancelRequested,
      updatedAt: this.now(),
    };
    this.files.set(fileId, next);
    return { ...next };
  }

  async transition(
    tenantId: string,
    fileId: string,
    from: readonly UploadStatus[],
    update: UploadStatusUpdate,
  ): Promise<UploadedFile | undefined> {
    const file = this.files.get(fileId);
    if (!file || file.tenantId !== tenantId || !from.includes(file.status)) return undefined;
    return this.updateStatus(tenantId, fileId, update);
  }

  async requestCancel(
    tenantId: string,
    fileId: string,
    statuses: readonly UploadStatus[],
  ): Promise<UploadedFile | undefined> {
    const file = this.files.get(fileId);
    if (!file || file.tenantId !== tenantId || !statuses.includes(file.status)) return undefined;
    const next: UploadedFile = { ...file, cancelRequested: true, updatedAt: this.now() };
    this.files.set(fileId, next);
    return { ...next };
  }

  async listRecent(tenantId: string, limit: number): Promise<UploadedFile[]> {
    return [...this.files.values()]
      .filter((file) => file.tenantId === tenantId)
      .sort((a, b) => b.createdAt.getTime() - a.createdAt.getTime())
      .slice(0, limit)
      .map((file) => ({ ...file }));
  }

  async failAll(tenantId: string, statuses: readonly UploadStatus[], reason: string): Promise<number> {
    let changed = 0;
    for (const file of this.files.values()) {
      if (file.tenantId === tenantId && statuses.includes(file.status)) {
        this.files.set(file.id, {
          ...file,
          status: "failed",
          errorMessage: reason,
          segmentCount: 0,
          updatedAt: this.now(),
        });
        changed += 1;
      }
    }
    return changed;
  }
}
