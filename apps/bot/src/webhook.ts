import { randomUUID } from "node:crypto";
import express, { type NextFunction, type Request, type Response } from "express";
import { verifyHmac } from "@vectorbridge/crypto";
import { AppError, UnauthorizedError, ValidationError } from "@vectorbridge/errors";
import type { Logger } from "@vectorbridge/logger";
import type { ChatEvent, ChatReply } from "@vectorbridge/types";
import {
  SIGNATURE_HEADER,
  chatEventSchema,
  serializeReply,
  toChatEvent,
  type ChatReplyPayload,
} from "./events.js";

export interface EventHandler {
  handle(event: ChatEvent): Promise<ChatReply>;
}

export interface WebhookOptions {
  handler: EventHandler;
  secret: string;
  logger: Logger;
  /** Largest accepted request body; documents arrive base64-encoded inside it. */
  bodyLimitBytes: number;
}

export type WebhookResponse =
  | { success: true; data: { reply: ChatReplyPayload } }
  | { success: false; error: { code: string; message: string; requestId: string } };

/**
 * Verify, validate and dispatch one signed event. Throws AppError for
 * rejected requests.
 */
export async function receiveEvent(
  options: Pick<WebhookOptions, "handler" | "secret">,
  rawBody: Uint8Array,
  signature: string | undefined,
): Promise<ChatReplyPayload> {
  if (!signature || !verifyHmac(rawBody, options.secret, signature)) {
    throw new UnauthorizedError("Invalid or missing signature");
  }

  let json: unknown;
  try {
    json = JSON.parse(Buffer.from(rawBody).toString("utf8"));
  } catch (err) {
    throw new ValidationError("Body is not valid JSON", {}, { cause: err });
  }

  const parsed = chatEventSchema.safeParse(json);
  if (!parsed.success) {
    const fields: Record<string, string> = {};
    for (const issue of parsed.error.issues) {
      fields[issue.path.join(".") || "body"] = issue.message;
    }
    throw new ValidationError("Invalid event payload", fields);
  }

  const reply = await options.handler.handle(toChatEvent(parsed.data));
  return serializeReply(reply);
}

export function createWebhookApp(options: WebhookOptions): express.Express {
  const app = express();
  const log = options.logger.child({ component: "webhook" });

  app.use((req: Request, res: Response, next: NextFunction) => {
    req.requestId = randomUUID();
    res.setHeader("x-request-id", req.requestId);
    next();
  });

  app.get("/health", (_req: Request, res: Response) => {
    res.json({ status: "ok", timestamp: new Date().toISOString() });
  });

  app.post(
    "/v1/events",
    express.raw({ type: "*/*", limit: options.bodyLimitBytes }),
    (req: Request, res: Response, next: NextFunction) => {
      const body: unknown = req.body;
      const rawBody = Buffer.isBuffer(body) ? body : Buffer.alloc(0);
      receiveEvent(options, rawBody, req.header(SIGNATURE_HEADER))
        .then((reply) => {
          const payload: WebhookResponse = { success: true, data: { reply } };
          res.json(payload);
        })
        .catch(next);
    },
  );

  app.use((err: unknown, req: Request, res: Response, _next: NextFunction) => {
    const requestId = req.requestId ?? "unknown";
    const known = err instanceof AppError ? err : undefined;
    if (known?.isOperational) {
      log.info({ requestId, code: known.code }, known.message);
    } else {
      log.error({ requestId, err }, "Unhandled webhook error");
    }
    const payload: WebhookResponse = {
      success: false,
      error: {
        code: known?.code ?? "INTERNAL_ERROR",
        message: known?.isOperational ? known.message : "Internal server error",
        requestId,
      },
    };
    res.status(known?.statusCode ?? 500).json(payload);
  });

  return app;
}

declare global {
  // eslint-disable-next-line @typescript-eslint/no-namespace
  namespace Express {
    interface Request {
      requestId?: string;
    }
  }
}
