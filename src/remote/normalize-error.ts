import { MinerError, remoteError } from "../core/errors.js";
import type { RemoteResource } from "../core/types.js";
import { asNumber, isRecord, toErrorMessage } from "../core/utils.js";

export type RemoteErrorClass = "rate-limited" | "transient" | "permanent" | "aborted";

export interface NormalizedRemoteError {
  classification: RemoteErrorClass;
  error: MinerError;
}

/**
 * Converts whatever a fetcher threw into a `MinerError` and decides whether
 * retrying can help. Rate limits and transient failures (network, 5xx,
 * timeouts) are retried; aborts and everything else are not.
 */
export function normalizeRemoteError(
  error: unknown,
  context: { resource: RemoteResource; page: number; attempt?: number },
): NormalizedRemoteError {
  const { resource, page } = context;
  const message = toErrorMessage(error);
  const ctx: Record<string, unknown> = { resource, page, message };
  if (context.attempt !== undefined) ctx.attempt = context.attempt;

  if (error instanceof MinerError) {
    return { classification: classifyCode(error.code), error };
  }

  if (isRecord(error) && error.name === "AbortError") {
    return {
      classification: "aborted",
      error: remoteError("DEADLINE_EXCEEDED", `Fetching ${resource} page ${page} was aborted.`, {
        context: ctx,
        cause: error,
      }),
    };
  }

  const status = isRecord(error) ? asNumber(error.status) : undefined;
  if (status !== undefined) ctx.status = status;

  if (status === 429) {
    return {
      classification: "rate-limited",
      error: remoteError("RATE_LIMIT_EXCEEDED", `Rate limited on ${resource} page ${page}.`, {
        context: ctx,
        cause: error,
      }),
    };
  }

  if ((status !== undefined && status >= 500) || status === 408) {
    return {
      classification: "transient",
      error: remoteError("REMOTE_REQUEST_FAILED", `Server error ${status} on ${resource} page ${page}.`, {
        context: ctx,
        cause: error,
      }),
    };
  }

  if (status === undefined && /network|ECONN|ENOTFOUND|EAI_AGAIN|ETIMEDOUT|socket hang up|timed? ?out/i.test(message)) {
    return {
      classification: "transient",
      error: new MinerError(
        `Network error on ${resource} page ${page}.`,
        "NETWORK_ERROR",
        "recoverable",
        ctx,
        error,
      ),
    };
  }

  return {
    classification: "permanent",
    error: remoteError("REMOTE_REQUEST_FAILED", `Request for ${resource} page ${page} failed.`, {
      context: ctx,
      cause: error,
    }),
  };
}

function classifyCode(code: MinerError["code"]): RemoteErrorClass {
  switch (code) {
    case "RATE_LIMIT_EXCEEDED":
      return "rate-limited";
    case "NETWORK_ERROR":
      return "transient";
    case "DEADLINE_EXCEEDED":
      return "aborted";
    default:
      return "permanent";
  }
}
