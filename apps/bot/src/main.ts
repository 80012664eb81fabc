import { Worker } from "bullmq";
import { parseEnv } from "@vectorbridge/config";
import { createServices } from "@vectorbridge/core";
import { createLogger } from "@vectorbridge/logger";
import { OnboardingValidator } from "@vectorbridge/onboarding";
import { QUEUE_NAMES, closeQueues, createQueues, parseRedisConnection } from "@vectorbridge/queue";
import type { NotificationJobData } from "@vectorbridge/types";
import { BotController } from "./controller.js";
import { HttpReplySink, createNotificationProcessor } from "./reply-sink.js";
import { createWebhookApp } from "./webhook.js";

async function main(): Promise<void> {
  const config = parseEnv();
  const logger = createLogger({ level: config.logLevel, service: "vectorbridge-bot" });
  const connection = parseRedisConnection(config.redis.url);
  const services = createServices(config, logger);
  const queues = createQueues({ connection });

  const onboarding = new OnboardingValidator({
    registry: services.registry,
    store: services.router,
    keys: services.embeddings,
    provider: {
      provider: config.embedding.provider,
      model: config.embedding.model,
      dimensions: config.embedding.dimensions,
    },
    fallback: config.fallback,
    probeTimeoutMs: config.onboarding.probeTimeoutMs,
    sessionTtlMs: config.onboarding.sessionTtlMs,
    logger,
  });

  const controller = new BotController({
    registry: services.registry,
    onboarding,
    coordinator: services.coordinator,
    enqueue: async (job) => {
      await queues.ingestQueue.add("ingest", job);
    },
    acceptedExtensions: config.uploads.allowedExtensions,
    logger,
  });

  const app = createWebhookApp({
    handler: controller,
    secret: config.secrets.webhookSecret,
    logger,
    // base64 inflates by 4/3; leave room for the envelope.
    bodyLimitBytes: Math.ceil((config.uploads.maxBytes * 4) / 3) + 64 * 1024,
  });
  const server = app.listen(config.port, () => {
    logger.info({ port: config.port }, "Webhook listening");
  });

  let notifications: Worker<NotificationJobData> | undefined;
  if (config.secrets.outboundWebhookUrl) {
    const sink = new HttpReplySink({ url: config.secrets.outboundWebhookUrl, secret: config.secrets.webhookSecret });
    const deliver = createNotificationProcessor(sink, logger);
    notifications = new Worker<NotificationJobData>(
      QUEUE_NAMES.NOTIFICATIONS,
      async (job) => deliver(job.data),
      { connection },
    );
    notifications.on("failed", (job, err) => {
      logger.warn({ jobId: job?.id, attempts: job?.attemptsMade, err }, "Notification delivery failed");
    });
  } else {
    logger.warn("OUTBOUND_WEBHOOK_URL is not set; ingest notifications stay queued");
  }

  const shutdown = async (): Promise<void> => {
    logger.info("Shutting down");
    await new Promise<void>((resolve, reject) => {
      server.close((err) => (err ? reject(err) : resolve()));
    });
    await notifications?.close();
    await closeQueues(queues);
    await services.close();
    logger.info("Bot closed");
    process.exit(0);
  };

  process.on("SIGTERM", () => void shutdown());
  process.on("SIGINT", () => void shutdown());
}

main().catch((err: unknown) => {
  console.error("[bot] Fatal error:", err);
  process.exit(1);
});
