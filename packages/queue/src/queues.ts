import { Queue } from "bullmq";
import type { ConnectionOptions } from "bullmq";
import type { IngestJobData, NotificationJobData } from "@vectorbridge/types";

export const QUEUE_NAMES = {
  INGEST: "vectorbridge:ingest",
  NOTIFICATIONS: "vectorbridge:notifications",
} as const;

export interface QueueConfig {
  connection: ConnectionOptions;
}

export function parseRedisConnection(url: string): ConnectionOptions {
  const parsed = new URL(url);
  return {
    host: parsed.hostname,
    port: Number(parsed.port) || 6379,
    username: parsed.username || undefined,
    password: parsed.password ? decodeURIComponent(parsed.password) : undefined,
    // Workers block on Redis; BullMQ requires this to be null for them.
    maxRetriesPerRequest: null,
  };
}

export function createQueues(config: QueueConfig) {
  const defaultOpts = {
    connection: config.connection,
    defaultJobOptions: {
      removeOnComplete: { count: 1000 },
      removeOnFail: { count: 5000 },
    },
  };

  // One attempt: a failed file is re-processed only on request.
  const ingestQueue = new Queue<IngestJobData>(QUEUE_NAMES.INGEST, {
    ...defaultOpts,
    defaultJobOptions: { ...defaultOpts.defaultJobOptions, attempts: 1 },
  });

  const notificationQueue = new Queue<NotificationJobData>(QUEUE_NAMES.NOTIFICATIONS, {
    ...defaultOpts,
    defaultJobOptions: {
      ...defaultOpts.defaultJobOptions,
      attempts: 5,
      backoff: {
        type: "exponential" as const,
        delay: 1000,
      },
    },
  });

  return { ingestQueue, notificationQueue };
}

export type Queues = ReturnType<typeof createQueues>;

export async function closeQueues(queues: Queues): Promise<void> {
  await Promise.all([queues.ingestQueue.close(), queues.notificationQueue.close()]);
}
