import { generateHmac } from "@vectorbridge/crypto";
import { TransientProviderError } from "@vectorbridge/errors";
import type { Logger } from "@vectorbridge/logger";
import type { ChatReply, NotificationJobData } from "@vectorbridge/types";
import { SIGNATURE_HEADER, serializeReply } from "./events.js";

export interface ReplySink {
  send(reply: ChatReply): Promise<void>;
}

export interface HttpReplySinkOptions {
  url: string;
  secret: string;
  timeoutMs?: number;
  fetch?: typeof fetch;
}

/**
 * Pushes replies to the chat front-end, signed the same way inbound
 * events are.
 */
export class HttpReplySink implements ReplySink {
  private readonly url: string;
  private readonly secret: string;
  private readonly timeoutMs: number;
  private readonly fetch: typeof fetch;

  constructor(options: HttpReplySinkOptions) {
    this.url = options.url;
    this.secret = options.secret;
    this.timeoutMs = options.timeoutMs ?? 10_000;
    this.fetch = options.fetch ?? fetch;
  }

  async send(reply: ChatReply): Promise<void> {
    const body = JSON.stringify(serializeReply(reply));
    const response = await this.fetch(this.url, {
      method: "POST",
      headers: {
        "Content-Type": "application/json",
        [SIGNATURE_HEADER]: generateHmac(body, this.secret),
      },
      body,
      signal: AbortSignal.timeout(this.timeoutMs),
    });
    if (!response.ok) {
      throw new TransientProviderError(
        `Chat front-end answered ${String(response.status)}`,
        "chat",
      );
    }
  }
}

/**
 * Notification job processor. A thrown error leaves the job to the
 * queue's backoff.
 */
export function createNotificationProcessor(sink: ReplySink, logger: Logger) {
  return async (data: NotificationJobData): Promise<void> => {
    await sink.send({ sessionId: data.chatSessionId, text: data.text });
    logger.debug({ chatSessionId: data.chatSessionId }, "Notification delivered");
  };
}
