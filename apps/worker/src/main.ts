import { Worker } from "bullmq";
import { parseEnv } from "@vectorbridge/config";
import { createServices } from "@vectorbridge/core";
import { createLogger } from "@vectorbridge/logger";
import { QUEUE_NAMES, closeQueues, createQueues, parseRedisConnection } from "@vectorbridge/queue";
import type { IngestJobData } from "@vectorbridge/types";
import { createIngestProcessor } from "./processors/ingest.js";

async function main(): Promise<void> {
  const config = parseEnv();
  const logger = createLogger({ level: config.logLevel, service: "vectorbridge-worker" });
  const connection = parseRedisConnection(config.redis.url);
  const services = createServices(config, logger);
  const queues = createQueues({ connection });

  const processIngest = createIngestProcessor({
    coordinator: services.coordinator,
    notify: async (notification) => {
      await queues.notificationQueue.add("notify", notification);
    },
    logger,
    cancelPollMs: config.worker.cancelPollMs,
  });
  const stopping = new AbortController();

  // Concurrency spans tenants; the coordinator serializes within one.
  const worker = new Worker<IngestJobData>(
    QUEUE_NAMES.INGEST,
    async (job) => processIngest(job.data, stopping.signal),
    { connection, concurrency: config.worker.concurrency },
  );

  worker.on("failed", (job, err) => {
    logger.error({ jobId: job?.id, err }, "Ingest job crashed");
  });

  logger.info(
    { queue: QUEUE_NAMES.INGEST, concurrency: config.worker.concurrency },
    "Worker started",
  );

  const shutdown = async (): Promise<void> => {
    logger.info("Shutting down");
    // Running jobs end at their next checkpoint and tell the user to reprocess.
    stopping.abort();
    await worker.close();
    await closeQueues(queues);
    await services.close();
    logger.info("Worker closed");
    process.exit(0);
  };

  process.on("SIGTERM", () => void shutdown());
  process.on("SIGINT", () => void shutdown());
}

main().catch((err: unknown) => {
  console.error("[worker] Fatal error:", err);
  process.exit(1);
});
