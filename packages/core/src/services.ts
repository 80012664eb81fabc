import { SecretBox } from "@vectorbridge/crypto";
import { closeDbClient, createDbClient, type DbClient } from "@vectorbridge/db";
import { EmbeddingClient } from "@vectorbridge/embeddings";
import type { Logger } from "@vectorbridge/logger";
import { parseDocument } from "@vectorbridge/parser";
import { DrizzleTenantRepository, TenantRegistry } from "@vectorbridge/registry";
import type { AppConfig } from "@vectorbridge/types";
import { VectorStoreRouter, createPgTenantStoreClient } from "@vectorbridge/vector-store";
import { LocalBlobStorage } from "./blob-storage.js";
import { IngestionCoordinator } from "./coordinator.js";
import { AdvisoryTenantLock, pgLockSessions } from "./tenant-lock.js";
import { DrizzleUploadRepository } from "./upload-repository.js";

export interface Services {
  db: DbClient;
  registry: TenantRegistry;
  router: VectorStoreRouter;
  embeddings: EmbeddingClient;
  coordinator: IngestionCoordinator;
  close(): Promise<void>;
}

/**
 * Wire the production graph shared by the bot and the worker.
 */
export function createServices(config: AppConfig, logger: Logger): Services {
  const db = createDbClient({ url: config.database.url, maxConnections: config.database.poolMax });

  const registry = new TenantRegistry({
    repository: new DrizzleTenantRepository(db),
    cipher: new SecretBox(config.secrets.encryptionKey),
    fingerprintSecret: config.secrets.encryptionKey,
    logger,
  });

  const router = new VectorStoreRouter({
    credentials: registry,
    createClient: createPgTenantStoreClient,
    logger,
  });
  registry.onRotate((tenantId) => router.invalidate(tenantId));

  const embeddings = new EmbeddingClient({ policy: config.embedding, logger });

  const coordinator = new IngestionCoordinator({
    credentials: registry,
    uploads: new DrizzleUploadRepository(db),
    blobs: new LocalBlobStorage({ rootDir: config.uploads.dir }),
    parse: parseDocument,
    embeddings,
    store: router,
    segmenter: config.segmenter,
    limits: config.uploads,
    lock: new AdvisoryTenantLock(pgLockSessions(db)),
    logger,
  });

  return {
    db,
    registry,
    router,
    embeddings,
    coordinator,
    async close() {
      await router.closeAll();
      await closeDbClient(db);
    },
  };
}
