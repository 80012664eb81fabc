import { describe, it, expect, vi } from "vitest";
import { silentLogger } from "@vectorbridge/testing";
import type { IngestOutcome, NotificationJobData, UploadedFile } from "@vectorbridge/types";
import type { ProcessOptions } from "@vectorbridge/core";
import { createIngestProcessor, outcomeMessage } from "./ingest.js";

function fileNamed(fileName: string): UploadedFile {
  const at = new Date("2026-01-01T00:00:00Z");
  return {
    id: "f1",
    tenantId: "t1",
    fileName,
    storageKey: "t1/notes.txt",
    mimeType: "text/plain",
    sizeBytes: 10,
    status: "stored",
    errorMessage: null,
    segmentCount: 1,
    createdAt: at,
    updatedAt: at,
    processedAt: at,
    cancelRequested: false,
  };
}

/** Settles as a cancelled run once `signal` aborts. */
function cancelledOnAbort(signal: AbortSignal | undefined): Promise<IngestOutcome> {
  const cancelled: IngestOutcome = {
    fileId: "f1",
    status: "failed",
    reason: "CANCELLED",
    message: "Processing was cancelled.",
  };
  return new Promise((resolve) => {
    if (signal?.aborted) resolve(cancelled);
    signal?.addEventListener("abort", () => resolve(cancelled), { once: true });
  });
}

describe("outcomeMessage", () => {
  it("reports stored segments", () => {
    expect(outcomeMessage("notes.txt", { fileId: "f1", status: "stored", segmentCount: 1 })).toBe(
      "notes.txt is indexed: 1 segment stored. Send /export f1 to download them.",
    );
  });

  it("reports failures with a reprocess hint", () => {
    const outcome: IngestOutcome = {
      fileId: "f1",
      status: "failed",
      reason: "EMPTY_INPUT",
      message: "notes.txt contains no text to index.",
    };
    expect(outcomeMessage("notes.txt", outcome)).toBe(
      "notes.txt contains no text to index. Send /reprocess f1 to try again.",
    );
  });
});

describe("createIngestProcessor", () => {
  it("processes the file and notifies the chat session", async () => {
    const sent: NotificationJobData[] = [];
    const process = vi.fn(async (): Promise<IngestOutcome> => ({ fileId: "f1", status: "stored", segmentCount: 2 }));
    const processor = createIngestProcessor({
      coordinator: { process, file: async () => fileNamed("notes.txt"), isCancelRequested: async () => false },
      notify: async (n) => {
        sent.push(n);
      },
      logger: silentLogger(),
    });

    const outcome = await processor({ tenantId: "t1", fileId: "f1", chatSessionId: "chat-1", reprocess: false });

    expect(outcome.status).toBe("stored");
    expect(process).toHaveBeenCalledWith("t1", "f1", { signal: expect.any(AbortSignal) });
    expect(sent).toEqual([
      { chatSessionId: "chat-1", text: "notes.txt is indexed: 2 segments stored. Send /export f1 to download them." },
    ]);
  });

  it("stops the job once a cancel request is recorded", async () => {
    const sent: NotificationJobData[] = [];
    let checks = 0;
    const processor = createIngestProcessor({
      coordinator: {
        process: (_tenantId: string, _fileId: string, options?: ProcessOptions) => cancelledOnAbort(options?.signal),
        file: async () => fileNamed("notes.txt"),
        isCancelRequested: async () => {
          checks += 1;
          return checks >= 2;
        },
      },
      notify: async (n) => {
        sent.push(n);
      },
      logger: silentLogger(),
      cancelPollMs: 1,
    });

    const outcome = await processor({ tenantId: "t1", fileId: "f1", chatSessionId: "chat-1", reprocess: false });

    expect(outcome.status === "failed" && outcome.reason).toBe("CANCELLED");
    expect(checks).toBe(2);
    expect(sent).toEqual([
      { chatSessionId: "chat-1", text: "Processing was cancelled. Send /reprocess f1 to try again." },
    ]);
  });

  it("stops the job when the worker shuts down", async () => {
    const shutdown = new AbortController();
    const isCancelRequested = vi.fn(async () => false);
    const processor = createIngestProcessor({
      coordinator: {
        process: (_tenantId: string, _fileId: string, options?: ProcessOptions) => cancelledOnAbort(options?.signal),
        file: async () => fileNamed("notes.txt"),
        isCancelRequested,
      },
      notify: async () => undefined,
      logger: silentLogger(),
      cancelPollMs: 60_000,
    });

    const running = processor(
      { tenantId: "t1", fileId: "f1", chatSessionId: "chat-1", reprocess: false },
      shutdown.signal,
    );
    shutdown.abort();

    expect((await running).status).toBe("failed");
    expect(isCancelRequested).not.toHaveBeenCalled();
  });
});
