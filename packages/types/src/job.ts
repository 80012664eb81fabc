export interface IngestJobData {
  tenantId: string;
  fileId: string;
  chatSessionId: string;
  /** True when the tenant explicitly asked for re-processing. */
  reprocess: boolean;
}

export interface NotificationJobData {
  chatSessionId: string;
  text: string;
}
