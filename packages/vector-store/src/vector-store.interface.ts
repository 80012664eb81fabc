import type { StoreConnectionParams } from "@vectorbridge/types";

export interface TenantTable {
  name: string;
  dimensions: number;
}

export interface NewSegmentRow {
  fileId: string;
  segmentIndex: number;
  title: string;
  body: string;
  vector: number[];
}

export interface SegmentRow extends NewSegmentRow {
  id: number;
}

/**
 * Connection to one tenant's own store. Never shared between tenants.
 *
 * Operations against a missing table reject with the driver's native
 * error (Postgres code 42P01); the router recognizes and recovers from it.
 */
export interface ITenantStoreClient {
  ping(): Promise<void>;
  /** True when the store can provide vector columns. */
  hasVectorCapability(): Promise<boolean>;
  /** Idempotent: extension, table and (file_id, segment_index) index. */
  provision(table: TenantTable): Promise<void>;
  drop(table: TenantTable): Promise<void>;
  /** Delete every row of `fileId`, then insert `rows`, in one transaction. */
  replaceFileRows(table: TenantTable, fileId: string, rows: NewSegmentRow[]): Promise<void>;
  /** Rows of `fileId` ordered by segment index. */
  readFileRows(table: TenantTable, fileId: string): Promise<SegmentRow[]>;
  close(): Promise<void>;
}

export interface TenantStoreClientOptions {
  connectTimeoutMs?: number;
  maxConnections?: number;
}

export type TenantStoreClientFactory = (
  params: StoreConnectionParams,
  options?: TenantStoreClientOptions,
) => ITenantStoreClient;
