import { asc, eq, sql } from "drizzle-orm";
import { drizzle, type PostgresJsDatabase } from "drizzle-orm/postgres-js";
import { bigserial, integer, pgTable, text, vector } from "drizzle-orm/pg-core";
import postgres from "postgres";
import type { StoreConnectionParams } from "@vectorbridge/types";
import type {
  ITenantStoreClient,
  NewSegmentRow,
  SegmentRow,
  TenantStoreClientOptions,
  TenantTable,
} from "./vector-store.interface.js";

const DEFAULT_CONNECT_TIMEOUT_MS = 10_000;
const DEFAULT_MAX_CONNECTIONS = 5;

// DDL lives in provision(); this mapping only drives typed queries.
function segmentsTable(table: TenantTable) {
  return pgTable(table.name, {
    id: bigserial("id", { mode: "number" }).primaryKey(),
    fileId: text("file_id").notNull(),
    segmentIndex: integer("segment_index").notNull(),
    title: text("title").notNull(),
    body: text("body").notNull(),
    embedding: vector("embedding", { dimensions: table.dimensions }).notNull(),
  });
}

export function indexNameFor(table: TenantTable): string {
  return `${table.name}_fs_idx`;
}

/**
 * pgvector-backed tenant store over postgres.js + drizzle.
 */
export class PgTenantStoreClient implements ITenantStoreClient {
  private readonly connection: postgres.Sql;
  private readonly db: PostgresJsDatabase;

  constructor(params: StoreConnectionParams, options?: TenantStoreClientOptions) {
    this.connection = postgres({
      host: params.host,
      port: params.port,
      database: params.database,
      username: params.user,
      password: params.password,
      max: options?.maxConnections ?? DEFAULT_MAX_CONNECTIONS,
      idle_timeout: 30,
      connect_timeout: Math.max(1, Math.ceil((options?.connectTimeoutMs ?? DEFAULT_CONNECT_TIMEOUT_MS) / 1000)),
      ssl: "prefer",
      onnotice: () => undefined,
    });
    this.db = drizzle(this.connection);
  }

  async ping(): Promise<void> {
    await this.db.execute(sql`SELECT 1`);
  }

  async hasVectorCapability(): Promise<boolean> {
    const rows = await this.connection<{ available: boolean }[]>`
      SELECT EXISTS (SELECT 1 FROM pg_available_extensions WHERE name = 'vector') AS available
    `;
    return rows[0]?.available === true;
  }

  async provision(table: TenantTable): Promise<void> {
    if (!Number.isInteger(table.dimensions) || table.dimensions < 1) {
      throw new RangeError(`Invalid vector width: ${String(table.dimensions)}`);
    }
    await this.db.execute(sql`CREATE EXTENSION IF NOT EXISTS vector`);
    await this.db.execute(sql`
      CREATE TABLE IF NOT EXISTS ${sql.identifier(table.name)} (
        id bigserial PRIMARY KEY,
        file_id text NOT NULL,
        segment_index integer NOT NULL,
        title text NOT NULL,
        body text NOT NULL,
        embedding vector(${sql.raw(String(table.dimensions))}) NOT NULL
      )
    `);
    await this.db.execute(sql`
      CREATE UNIQUE INDEX IF NOT EXISTS ${sql.identifier(indexNameFor(table))}
      ON ${sql.identifier(table.name)} (file_id, segment_index)
    `);
  }

  async drop(table: TenantTable): Promise<void> {
    await this.db.execute(sql`DROP TABLE IF EXISTS ${sql.identifier(table.name)}`);
  }

  async replaceFileRows(table: TenantTable, fileId: string, rows: NewSegmentRow[]): Promise<void> {
    const t = segmentsTable(table);
    await this.db.transaction(async (tx) => {
      await tx.delete(t).where(eq(t.fileId, fileId));
      if (rows.length > 0) {
        await tx.insert(t).values(
          rows.map((row) => ({
            fileId: row.fileId,
            segmentIndex: row.segmentIndex,
            title: row.title,
            body: row.body,
            embedding: row.vector,
          })),
        );
      }
    });
  }

  async readFileRows(table: TenantTable, fileId: string): Promise<SegmentRow[]> {
    const t = segmentsTable(table);
    const rows = await this.db
      .select()
      .from(t)
      .where(eq(t.fileId, fileId))
      .orderBy(asc(t.segmentIndex));
    return rows.map((row) => ({
      id: row.id,
      fileId: row.fileId,
      segmentIndex: row.segmentIndex,
      title: row.title,
      body: row.body,
      vector: row.embedding,
    }));
  }

  async close(): Promise<void> {
    await this.connection.end({ timeout: 5 });
  }
}

export const createPgTenantStoreClient = (
  params: StoreConnectionParams,
  options?: TenantStoreClientOptions,
): ITenantStoreClient => new PgTenantStoreClient(params, options);
