import {
  AppError,
  MissingCapabilityError,
  PersistenceError,
  SchemaError,
  StoreConnectionError,
} from "@vectorbridge/errors";
import { createChildLogger, type Logger } from "@vectorbridge/logger";
import type {
  DecryptedCredential,
  SegmentRecord,
  StoreConnectionParams,
  StoredSegment,
} from "@vectorbridge/types";
import type {
  ITenantStoreClient,
  TenantStoreClientFactory,
  TenantTable,
} from "./vector-store.interface.js";
import { isUndefinedTableError } from "./pg-errors.js";
import { withTimeout } from "./timeout.js";

/**
 * Source of decrypted tenant credentials. The value handed to `fn` must not
 * outlive the call.
 */
export interface CredentialSource {
  withSecrets<T>(tenantId: string, fn: (credential: DecryptedCredential) => Promise<T>): Promise<T>;
  /** Current credential version, without decrypting anything. */
  credentialVersion(tenantId: string): Promise<string | undefined>;
}

export interface VectorStoreRouterOptions {
  credentials: CredentialSource;
  createClient: TenantStoreClientFactory;
  logger?: Logger;
}

export interface ProbeOptions {
  timeoutMs: number;
}

interface PoolEntry {
  version: string;
  client: ITenantStoreClient;
  table: TenantTable;
  schemaReady?: Promise<void>;
}

/**
 * Routes each tenant to its own store.
 *
 * The pool maps tenant id to a lazily created client. Creation is memoized
 * per tenant as a promise, so concurrent first calls share one client and
 * no caller can reach an entry under another tenant's id.
 *
 * Each use re-reads the credential version. A credential replaced by
 * another process retires the pooled client before anything touches it.
 */
export class VectorStoreRouter {
  private readonly pool = new Map<string, Promise<PoolEntry>>();
  private readonly credentials: CredentialSource;
  private readonly createClient: TenantStoreClientFactory;
  private readonly logger?: Logger;

  constructor(options: VectorStoreRouterOptions) {
    this.credentials = options.credentials;
    this.createClient = options.createClient;
    this.logger = options.logger && createChildLogger(options.logger, { component: "vector-router" });
  }

  /**
   * Idempotent. Provisioning runs once per pooled client; later calls await
   * the same result.
   */
  async ensureSchema(tenantId: string): Promise<void> {
    const entry = await this.entryFor(tenantId);
    await this.provisionOnce(tenantId, entry);
  }

  /**
   * Replace every stored row of `fileId` with `records` and their vectors.
   */
  async write(
    tenantId: string,
    fileId: string,
    records: readonly SegmentRecord[],
    vectors: readonly number[][],
  ): Promise<void> {
    if (records.length !== vectors.length) {
      throw new PersistenceError(
        `Refusing to store ${String(records.length)} segments with ${String(vectors.length)} vectors`,
      );
    }
    const rows = records.map((record, i) => ({
      fileId,
      segmentIndex: record.index,
      title: record.title,
      body: record.body,
      vector: vectors[i] ?? [],
    }));

    await this.withRecovery(tenantId, "write", (entry) =>
      entry.client.replaceFileRows(entry.table, fileId, rows),
    );
    this.logger?.info({ tenantId, fileId, rows: rows.length }, "Stored segments");
  }

  async read(tenantId: string, fileId: string): Promise<StoredSegment[]> {
    const rows = await this.withRecovery(tenantId, "read", (entry) =>
      entry.client.readFileRows(entry.table, fileId),
    );
    return rows.map((row) => ({
      id: row.id,
      fileId: row.fileId,
      index: row.segmentIndex,
      title: row.title,
      body: row.body,
      vector: row.vector,
    }));
  }

  /**
   * Destructive: drops the tenant's table and provisions an empty one.
   */
  async resetSchema(tenantId: string): Promise<void> {
    const entry = await this.entryFor(tenantId);
    try {
      await entry.client.drop(entry.table);
    } catch (err: unknown) {
      throw new SchemaError("Could not drop the vector table", { cause: err });
    }
    entry.schemaReady = undefined;
    await this.provisionOnce(tenantId, entry);
    this.logger?.warn({ tenantId, table: entry.table.name }, "Vector table reset");
  }

  /**
   * Drop the pooled client for a tenant. The next call reconnects with
   * whatever credentials the registry then holds.
   */
  async invalidate(tenantId: string): Promise<void> {
    const pending = this.pool.get(tenantId);
    if (!pending) return;
    this.pool.delete(tenantId);
    const entry = await pending.catch(() => undefined);
    if (entry) {
      await entry.client.close();
      this.logger?.info({ tenantId }, "Tenant connection invalidated");
    }
  }

  async closeAll(): Promise<void> {
    const tenants = [...this.pool.keys()];
    await Promise.all(tenants.map((tenantId) => this.invalidate(tenantId)));
  }

  /**
   * Onboarding check against not-yet-persisted parameters: connect within
   * `timeoutMs`, then require vector support. The client is always closed.
   */
  async probe(params: StoreConnectionParams, options: ProbeOptions): Promise<void> {
    const client = this.createClient(params, {
      connectTimeoutMs: options.timeoutMs,
      maxConnections: 1,
    });
    const check = async (): Promise<boolean> => {
      try {
        await client.ping();
        return await client.hasVectorCapability();
      } catch (err: unknown) {
        throw new StoreConnectionError(undefined, { cause: err });
      }
    };
    try {
      const capable = await withTimeout(
        check(),
        options.timeoutMs,
        () => new StoreConnectionError("Vector store did not answer in time"),
      );
      if (!capable) {
        throw new MissingCapabilityError(
          'The "vector" extension is not available on this database. Enable pgvector and try again.',
        );
      }
    } finally {
      await client.close();
    }
  }

  private async entryFor(tenantId: string): Promise<PoolEntry> {
    const pending = this.pool.get(tenantId);
    if (pending) {
      const [entry, current] = await Promise.all([pending, this.credentials.credentialVersion(tenantId)]);
      if (entry.version === current) return entry;
      if (this.pool.get(tenantId) === pending) {
        this.logger?.info({ tenantId }, "Credential replaced, reconnecting");
        await this.invalidate(tenantId);
      }
    }
    return this.pool.get(tenantId) ?? this.createEntry(tenantId);
  }

  private createEntry(tenantId: string): Promise<PoolEntry> {
    const created = this.credentials.withSecrets(tenantId, async (credential) => {
      if (credential.tenantId !== tenantId) {
        throw new AppError({
          message: "Credential does not belong to the requested tenant",
          statusCode: 500,
          code: "TENANT_MISMATCH",
          isOperational: false,
        });
      }
      const entry: PoolEntry = {
        version: credential.version,
        client: this.createClient(credential.store),
        table: { name: credential.schemaName, dimensions: credential.provider.dimensions },
      };
      return entry;
    });
    this.pool.set(tenantId, created);
    created.catch(() => {
      if (this.pool.get(tenantId) === created) this.pool.delete(tenantId);
    });
    return created;
  }

  private provisionOnce(tenantId: string, entry: PoolEntry): Promise<void> {
    if (!entry.schemaReady) {
      const ready = entry.client.provision(entry.table).catch((err: unknown): never => {
        if (entry.schemaReady === ready) entry.schemaReady = undefined;
        throw new SchemaError("Could not provision the vector table", { cause: err });
      });
      entry.schemaReady = ready;
      this.logger?.debug({ tenantId, table: entry.table.name }, "Provisioning vector table");
    }
    return entry.schemaReady;
  }

  /**
   * Run `op`; on a missing relation re-provision once and retry once.
   */
  private async withRecovery<T>(
    tenantId: string,
    operation: string,
    op: (entry: PoolEntry) => Promise<T>,
  ): Promise<T> {
    const entry = await this.entryFor(tenantId);
    try {
      return await op(entry);
    } catch (err: unknown) {
      if (!isUndefinedTableError(err)) {
        throw toPersistenceError(operation, err);
      }
      this.logger?.warn({ tenantId, operation }, "Vector table missing, re-provisioning");
    }

    entry.schemaReady = undefined;
    await this.provisionOnce(tenantId, entry);

    try {
      return await op(entry);
    } catch (err: unknown) {
      if (isUndefinedTableError(err)) {
        throw new SchemaError(`Vector table still missing after re-provisioning (${operation})`, {
          cause: err,
        });
      }
      throw toPersistenceError(operation, err);
    }
  }
}

function toPersistenceError(operation: string, err: unknown): AppError {
  if (AppError.isAppError(err)) return err;
  return new PersistenceError(`Vector store ${operation} failed`, { cause: err });
}
