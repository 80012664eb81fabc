export const UPLOAD_STATUSES = [
  "pending",
  "parsing",
  "segmenting",
  "embedding",
  "stored",
  "failed",
  "exported",
] as const;

export type UploadStatus = (typeof UPLOAD_STATUSES)[number];

export interface UploadedFile {
  id: string;
  tenantId: string;
  fileName: string;
  storageKey: string;
  mimeType: string;
  sizeBytes: number;
  status: UploadStatus;
  errorMessage: string | null;
  segmentCount: number;
  createdAt: Date;
  updatedAt: Date;
  processedAt: Date | null;
  /** Set by a cancel request; the worker checks it between stages. */
  cancelRequested: boolean;
}

export interface NewUploadedFile {
  tenantId: string;
  fileName: string;
  storageKey: string;
  mimeType: string;
  sizeBytes: number;
}

export interface UploadStatusUpdate {
  status: UploadStatus;
  errorMessage?: string | null;
  segmentCount?: number;
  processedAt?: Date | null;
  cancelRequested?: boolean;
}
