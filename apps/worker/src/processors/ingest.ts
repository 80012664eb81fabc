import type { Logger } from "@vectorbridge/logger";
import type { IngestJobData, IngestOutcome, NotificationJobData } from "@vectorbridge/types";
import type { IngestionCoordinator } from "@vectorbridge/core";

export interface IngestProcessorDeps {
  coordinator: Pick<IngestionCoordinator, "process" | "file" | "isCancelRequested">;
  notify: (notification: NotificationJobData) => Promise<void>;
  logger: Logger;
  /** Interval between cancel-request checks while a job runs. */
  cancelPollMs?: number;
}

const DEFAULT_CANCEL_POLL_MS = 2000;

/**
 * Ingest job processor.
 *
 * Runs the pipeline for one uploaded file and tells the chat session how
 * it ended. A failed file is a completed job: BullMQ never retries it.
 * Each job gets its own abort signal, tripped by a `/cancel` recorded
 * from any process or by `shutdown`.
 */
export function createIngestProcessor(deps: IngestProcessorDeps) {
  return async (data: IngestJobData, shutdown?: AbortSignal): Promise<IngestOutcome> => {
    const { tenantId, fileId, chatSessionId } = data;
    const log = deps.logger.child({ tenantId, fileId, reprocess: data.reprocess });
    log.info("Ingest job started");

    const job = new AbortController();
    const stop = () => job.abort();
    if (shutdown?.aborted) stop();
    shutdown?.addEventListener("abort", stop, { once: true });
    const poll = setInterval(() => {
      void deps.coordinator.isCancelRequested(tenantId, fileId).then(
        (requested) => {
          if (requested && !job.signal.aborted) {
            log.info("Cancel requested, stopping job");
            stop();
          }
        },
        (err: unknown) => {
          log.warn({ err }, "Could not check for a cancel request");
        },
      );
    }, deps.cancelPollMs ?? DEFAULT_CANCEL_POLL_MS);

    let outcome: IngestOutcome;
    try {
      outcome = await deps.coordinator.process(tenantId, fileId, { signal: job.signal });
    } finally {
      clearInterval(poll);
      shutdown?.removeEventListener("abort", stop);
    }
    const file = await deps.coordinator.file(tenantId, fileId);

    await deps.notify({ chatSessionId, text: outcomeMessage(file.fileName, outcome) });
    log.info({ status: outcome.status }, "Ingest job finished");
    return outcome;
  };
}

export function outcomeMessage(fileName: string, outcome: IngestOutcome): string {
  if (outcome.status === "stored") {
    const noun = outcome.segmentCount === 1 ? "segment" : "segments";
    return `${fileName} is indexed: ${String(outcome.segmentCount)} ${noun} stored. Send /export ${outcome.fileId} to download them.`;
  }
  return `${outcome.message} Send /reprocess ${outcome.fileId} to try again.`;
}
