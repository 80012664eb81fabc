import { z } from "zod";
import type { ChatEvent, ChatReply } from "@vectorbridge/types";

export const SIGNATURE_HEADER = "x-vectorbridge-signature";

const userSchema = z
  .object({
    username: z.string().max(64).nullish(),
    displayName: z.string().max(128).nullish(),
  })
  .optional();

const sessionId = z.string().min(1).max(128);

export const chatEventSchema = z.discriminatedUnion("kind", [
  z.object({
    kind: z.literal("command"),
    sessionId,
    command: z.string().min(1).max(64),
    args: z.array(z.string()).default([]),
    user: userSchema,
  }),
  z.object({
    kind: z.literal("text"),
    sessionId,
    text: z.string().max(4096),
    user: userSchema,
  }),
  z.object({
    kind: z.literal("document"),
    sessionId,
    document: z.object({
      fileName: z.string().min(1).max(255),
      mimeType: z.string().default("application/octet-stream"),
      contentBase64: z.string().base64(),
    }),
    user: userSchema,
  }),
]);

export type ChatEventPayload = z.infer<typeof chatEventSchema>;

/**
 * Map the wire payload onto a ChatEvent. Text that starts with "/" is a
 * command; "/export@somebot abc" becomes command "export" with args ["abc"].
 */
export function toChatEvent(payload: ChatEventPayload): ChatEvent {
  switch (payload.kind) {
    case "command":
      return { ...payload, command: commandName(payload.command) };
    case "text": {
      const text = payload.text.trim();
      if (!text.startsWith("/")) return payload;
      const [head = "", ...args] = text.split(/\s+/);
      return { kind: "command", sessionId: payload.sessionId, command: commandName(head), args, user: payload.user };
    }
    case "document":
      return {
        kind: "document",
        sessionId: payload.sessionId,
        user: payload.user,
        document: {
          fileName: payload.document.fileName,
          mimeType: payload.document.mimeType,
          content: new Uint8Array(Buffer.from(payload.document.contentBase64, "base64")),
        },
      };
  }
}

function commandName(raw: string): string {
  const name = raw.startsWith("/") ? raw.slice(1) : raw;
  return (name.split("@")[0] ?? name).toLowerCase();
}

export interface ChatReplyPayload {
  sessionId: string;
  text: string;
  actions?: ChatReply["actions"];
  attachment?: { fileName: string; mimeType: string; contentBase64: string };
}

export function serializeReply(reply: ChatReply): ChatReplyPayload {
  const { attachment, ...rest } = reply;
  if (!attachment) return rest;
  return {
    ...rest,
    attachment: {
      fileName: attachment.fileName,
      mimeType: attachment.mimeType,
      contentBase64: Buffer.from(attachment.content).toString("base64"),
    },
  };
}
