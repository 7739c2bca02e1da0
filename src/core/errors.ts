export type MinerErrorSeverity = "fatal" | "recoverable" | "warning";

export const HISTORY_ERROR_CODES = ["REPOSITORY_UNAVAILABLE", "COMMIT_UNREADABLE"] as const;

export const REMOTE_ERROR_CODES = [
  "RATE_LIMIT_EXCEEDED",
  "REMOTE_REQUEST_FAILED",
  "DEADLINE_EXCEEDED",
] as const;

export const ANALYSIS_ERROR_CODES = ["PARSE_FAILED"] as const;

export const CACHE_ERROR_CODES = ["CACHE_MISS", "CACHE_CORRUPT"] as const;

export const AGGREGATION_ERROR_CODES = ["AGGREGATION_INCONSISTENCY"] as const;

export const CONFIG_ERROR_CODES = ["CONFIG_INVALID", "CONFIG_SECRET_MISSING"] as const;

export const SYSTEM_ERROR_CODES = ["NETWORK_ERROR"] as const;

export const MINER_ERROR_CODES = [
  ...HISTORY_ERROR_CODES,
  ...REMOTE_ERROR_CODES,
  ...ANALYSIS_ERROR_CODES,
  ...CACHE_ERROR_CODES,
  ...AGGREGATION_ERROR_CODES,
  ...CONFIG_ERROR_CODES,
  ...SYSTEM_ERROR_CODES,
] as const;

export type HistoryErrorCode = (typeof HISTORY_ERROR_CODES)[number];
export type RemoteErrorCode = (typeof REMOTE_ERROR_CODES)[number];
export type AnalysisErrorCode = (typeof ANALYSIS_ERROR_CODES)[number];
export type CacheErrorCode = (typeof CACHE_ERROR_CODES)[number];
export type AggregationErrorCode = (typeof AGGREGATION_ERROR_CODES)[number];
export type ConfigErrorCode = (typeof CONFIG_ERROR_CODES)[number];
export type SystemErrorCode = (typeof SYSTEM_ERROR_CODES)[number];
export type MinerErrorCode = (typeof MINER_ERROR_CODES)[number];

export interface MinerErrorOptions {
  severity?: MinerErrorSeverity;
  context?: Record<string, unknown>;
  cause?: unknown;
}

export class MinerError extends Error {
  public readonly code: MinerErrorCode;
  public readonly severity: MinerErrorSeverity;
  public readonly context?: Record<string, unknown>;
  public override readonly cause?: unknown;

  public constructor(
    message: string,
    code: MinerErrorCode,
    severity: MinerErrorSeverity,
    context?: Record<string, unknown>,
    cause?: unknown,
  ) {
    super(message);
    this.name = "MinerError";
    this.code = code;
    this.severity = severity;
    this.context = context;
    this.cause = cause;
  }
}

function createError(
  code: MinerErrorCode,
  message: string,
  defaultSeverity: MinerErrorSeverity,
  options: MinerErrorOptions = {},
): MinerError {
  return new MinerError(
    message,
    code,
    options.severity ?? defaultSeverity,
    options.context,
    options.cause,
  );
}

/**
 * `REPOSITORY_UNAVAILABLE` is fatal; a single unreadable commit is not.
 */
export function historyError(
  code: HistoryErrorCode,
  message: string,
  options: MinerErrorOptions = {},
): MinerError {
  return createError(code, message, code === "REPOSITORY_UNAVAILABLE" ? "fatal" : "recoverable", options);
}

export function remoteError(
  code: RemoteErrorCode,
  message: string,
  options: MinerErrorOptions = {},
): MinerError {
  return createError(code, message, "recoverable", options);
}

export function analysisError(
  code: AnalysisErrorCode,
  message: string,
  options: MinerErrorOptions = {},
): MinerError {
  return createError(code, message, "recoverable", options);
}

export function cacheError(
  code: CacheErrorCode,
  message: string,
  options: MinerErrorOptions = {},
): MinerError {
  return createError(code, message, "warning", options);
}

export function aggregationError(
  code: AggregationErrorCode,
  message: string,
  options: MinerErrorOptions = {},
): MinerError {
  return createError(code, message, "recoverable", options);
}

export function configError(
  code: ConfigErrorCode,
  message: string,
  options: MinerErrorOptions = {},
): MinerError {
  return createError(code, message, "fatal", options);
}

export function isFatal(error: unknown): boolean {
  return error instanceof MinerError && error.severity === "fatal";
}
