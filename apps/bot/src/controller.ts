import { AppError } from "@vectorbridge/errors";
import { createChildLogger, type Logger } from "@vectorbridge/logger";
import type { IngestionCoordinator } from "@vectorbridge/core";
import type { OnboardingReply, OnboardingValidator } from "@vectorbridge/onboarding";
import type { TenantRegistry } from "@vectorbridge/registry";
import type {
  ChatAction,
  ChatDocument,
  ChatEvent,
  ChatReply,
  IngestJobData,
  Tenant,
} from "@vectorbridge/types";

export type BotRegistry = Pick<TenantRegistry, "ensureTenant">;

export type BotOnboarding = Pick<
  OnboardingValidator,
  "isActive" | "start" | "restart" | "startRotation" | "abandon" | "answer"
>;

export type BotCoordinator = Pick<
  IngestionCoordinator,
  "accept" | "requestReprocess" | "requestCancel" | "history" | "export" | "resetStore"
>;

export interface BotControllerOptions {
  registry: BotRegistry;
  onboarding: BotOnboarding;
  coordinator: BotCoordinator;
  enqueue: (job: IngestJobData) => Promise<void>;
  /** Extensions named in the /upload reply; keep in step with the coordinator's limits. */
  acceptedExtensions: readonly string[];
  logger?: Logger;
}

const MENU: ChatAction[] = [
  { label: "Upload a file", command: "/upload" },
  { label: "History", command: "/history" },
  { label: "Rotate keys", command: "/rotate_keys" },
];

const HELP =
  "Commands: /upload, /history, /export <fileId>, /reprocess <fileId>, " +
  "/rotate_keys, /retry_setup, /reset_store, /cancel [fileId].";

/**
 * Routes one chat event to onboarding or the ingestion coordinator and
 * produces the reply for the chat session.
 */
export class BotController {
  private readonly registry: BotRegistry;
  private readonly onboarding: BotOnboarding;
  private readonly coordinator: BotCoordinator;
  private readonly enqueue: (job: IngestJobData) => Promise<void>;
  private readonly acceptedExtensions: readonly string[];
  private readonly logger?: Logger;

  constructor(options: BotControllerOptions) {
    this.registry = options.registry;
    this.onboarding = options.onboarding;
    this.coordinator = options.coordinator;
    this.enqueue = options.enqueue;
    this.acceptedExtensions = options.acceptedExtensions;
    this.logger = options.logger && createChildLogger(options.logger, { component: "bot" });
  }

  async handle(event: ChatEvent): Promise<ChatReply> {
    const tenant = await this.registry.ensureTenant({
      chatSessionId: event.sessionId,
      username: event.user?.username,
      displayName: event.user?.displayName,
    });
    try {
      switch (event.kind) {
        case "command":
          return await this.command(tenant, event.command, event.args);
        case "text":
          return await this.text(tenant, event.text);
        case "document":
          return await this.document(tenant, event.document);
      }
    } catch (err) {
      // Operational failures become chat replies; the rest reach the adapter.
      if (err instanceof AppError && err.isOperational) {
        this.logger?.info({ tenantId: tenant.id, code: err.code }, "Request rejected");
        return reply(tenant, err.message);
      }
      throw err;
    }
  }

  private async command(tenant: Tenant, command: string, args: string[]): Promise<ChatReply> {
    switch (command) {
      case "start":
        return this.onboardingReply(tenant, await this.onboarding.start(tenant));
      case "retry_setup":
        return this.onboardingReply(tenant, await this.onboarding.restart(tenant));
      case "rotate_keys":
        return this.onboardingReply(tenant, await this.onboarding.startRotation(tenant));
      case "cancel":
        // With a file id it stops processing; bare, it leaves the setup flow.
        if (args[0]) return this.cancelFile(tenant, args[0]);
        return this.onboardingReply(tenant, await this.onboarding.abandon(tenant));
      case "upload":
        return (
          this.ready(tenant) ??
          reply(tenant, `Send the file as a document. Accepted: ${this.acceptedExtensions.join(", ")}.`)
        );
      case "history":
        return this.history(tenant);
      case "export":
        return this.withFileId(tenant, command, args, (fileId) => this.exportFile(tenant, fileId));
      case "reprocess":
        return this.withFileId(tenant, command, args, (fileId) => this.reprocess(tenant, fileId));
      case "reset_store":
        return this.resetStore(tenant, args);
      default:
        return reply(tenant, `Unknown command /${command}. ${HELP}`);
    }
  }

  private async text(tenant: Tenant, text: string): Promise<ChatReply> {
    if (this.onboarding.isActive(tenant.id) || tenant.onboardingState !== "Complete") {
      return this.onboardingReply(tenant, await this.onboarding.answer(tenant, text));
    }
    return reply(tenant, HELP, MENU);
  }

  private async document(tenant: Tenant, document: ChatDocument): Promise<ChatReply> {
    const blocked = this.ready(tenant);
    if (blocked) return blocked;

    const file = await this.coordinator.accept(tenant, document);
    await this.enqueue({ tenantId: tenant.id, fileId: file.id, chatSessionId: tenant.chatSessionId, reprocess: false });
    return reply(tenant, `Received ${file.fileName}. Indexing started; you will get a message when it finishes.`);
  }

  private async history(tenant: Tenant): Promise<ChatReply> {
    const lines = await this.coordinator.history(tenant.id);
    return reply(tenant, lines.length > 0 ? lines.join("\n") : "No files yet.");
  }

  private async exportFile(tenant: Tenant, fileId: string): Promise<ChatReply> {
    const archive = await this.coordinator.export(tenant.id, fileId);
    return {
      sessionId: tenant.chatSessionId,
      text: `Export ready: ${String(archive.segmentCount)} ${archive.segmentCount === 1 ? "segment" : "segments"}.`,
      attachment: { fileName: archive.fileName, mimeType: archive.mimeType, content: archive.content },
    };
  }

  private async reprocess(tenant: Tenant, fileId: string): Promise<ChatReply> {
    const blocked = this.ready(tenant);
    if (blocked) return blocked;

    const file = await this.coordinator.requestReprocess(tenant.id, fileId);
    await this.enqueue({ tenantId: tenant.id, fileId: file.id, chatSessionId: tenant.chatSessionId, reprocess: true });
    return reply(tenant, `Re-processing ${file.fileName}.`);
  }

  private async cancelFile(tenant: Tenant, fileId: string): Promise<ChatReply> {
    const file = await this.coordinator.requestCancel(tenant.id, fileId);
    return reply(tenant, `Cancelling ${file.fileName}. You will get a message when it stops.`);
  }

  private async resetStore(tenant: Tenant, args: string[]): Promise<ChatReply> {
    const blocked = this.ready(tenant);
    if (blocked) return blocked;

    if (args[0] !== "confirm") {
      return reply(
        tenant,
        "This deletes every stored vector and re-creates your table. Files must be re-processed afterwards.",
        [{ label: "Yes, reset", command: "/reset_store confirm" }],
      );
    }
    const affected = await this.coordinator.resetStore(tenant.id);
    this.logger?.warn({ tenantId: tenant.id, affected }, "Store reset requested");
    return reply(tenant, `Vector store reset. ${String(affected)} file(s) need /reprocess.`);
  }

  private withFileId(
    tenant: Tenant,
    command: string,
    args: string[],
    fn: (fileId: string) => Promise<ChatReply>,
  ): Promise<ChatReply> {
    const fileId = args[0];
    if (!fileId) return Promise.resolve(reply(tenant, `Usage: /${command} <fileId>. See /history for ids.`));
    return fn(fileId);
  }

  /** A reply when the tenant cannot use the pipeline yet, otherwise undefined. */
  private ready(tenant: Tenant): ChatReply | undefined {
    if (this.onboarding.isActive(tenant.id)) {
      return reply(tenant, "Finish the current setup first, or send /cancel.");
    }
    if (tenant.onboardingState !== "Complete") {
      return reply(tenant, "Finish setup with /start first.");
    }
    return undefined;
  }

  private onboardingReply(tenant: Tenant, result: OnboardingReply): ChatReply {
    return reply(tenant, result.text, result.state === "Complete" && !result.awaiting ? MENU : undefined);
  }
}

function reply(tenant: Tenant, text: string, actions?: ChatAction[]): ChatReply {
  return actions ? { sessionId: tenant.chatSessionId, text, actions } : { sessionId: tenant.chatSessionId, text };
}
