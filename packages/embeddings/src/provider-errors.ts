import { AppError, FatalProviderError, TransientProviderError } from "@vectorbridge/errors";

const MAX_BODY_IN_MESSAGE = 200;

/**
 * 429, 408 and 5xx are worth retrying. Everything else is permanent; 401
 * and 403 are tagged as auth failures.
 */
export function errorForStatus(
  provider: string,
  status: number,
  body = "",
  retryAfterSeconds?: number,
): AppError {
  const snippet = body.trim().slice(0, MAX_BODY_IN_MESSAGE);
  const message = `${provider} responded ${String(status)}${snippet ? `: ${snippet}` : ""}`;

  if (status === 429 || status === 408 || status >= 500) {
    return new TransientProviderError(message, provider, {
      details: { status, ...(retryAfterSeconds !== undefined ? { retryAfter: retryAfterSeconds } : {}) },
    });
  }
  return new FatalProviderError(message, provider, {
    details: { status, reason: status === 401 || status === 403 ? "auth" : "rejected" },
  });
}

/**
 * Anything thrown below the HTTP layer (DNS, reset socket, timeout) is transient.
 */
export function errorForFailure(
  provider: string,
  err: unknown,
  isTimeout = err instanceof Error && (err.name === "TimeoutError" || err.name === "AbortError"),
): AppError {
  if (AppError.isAppError(err)) return err;
  return new TransientProviderError(
    isTimeout ? `${provider} request timed out` : `${provider} request failed`,
    provider,
    { cause: err, details: { reason: isTimeout ? "timeout" : "network" } },
  );
}

export function parseRetryAfter(header: string | null): number | undefined {
  if (header === null) return undefined;
  const seconds = Number(header);
  return Number.isFinite(seconds) && seconds >= 0 ? seconds : undefined;
}

export function statusOf(err: AppError): number | undefined {
  const status = err.details?.["status"];
  return typeof status === "number" ? status : undefined;
}
