export type {
  ITenantStoreClient,
  NewSegmentRow,
  SegmentRow,
  TenantStoreClientFactory,
  TenantStoreClientOptions,
  TenantTable,
} from "./vector-store.interface.js";
export { PgTenantStoreClient, createPgTenantStoreClient, indexNameFor } from "./pg-tenant-client.js";
export { VectorStoreRouter } from "./router.js";
export type { CredentialSource, ProbeOptions, VectorStoreRouterOptions } from "./router.js";
export { isUndefinedTableError } from "./pg-errors.js";
export { withTimeout } from "./timeout.js";
