export { QUEUE_NAMES, createQueues, closeQueues, parseRedisConnection } from "./queues.js";
export type { QueueConfig, Queues } from "./queues.js";
