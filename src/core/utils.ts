/**
 * Shared utility functions used across the codebase.
 */

/**
 * Type guard: returns `true` when `value` is a non-null object
 * (i.e.\ a `Record<string, unknown>`).
 */
export function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null;
}

export function isMissingFileError(error: unknown): boolean {
  return isRecord(error) && error.code === "ENOENT";
}

export function toErrorMessage(error: unknown): string {
  if (error instanceof Error) {
    return error.message;
  }
  return String(error);
}

export function asString(value: unknown): string | undefined {
  return typeof value === "string" ? value : undefined;
}

export function asNumber(value: unknown): number | undefined {
  return typeof value === "number" && Number.isFinite(value) ? value : undefined;
}

/** Converts any parseable date string to a UTC ISO-8601 timestamp. */
export function toUtcIso(value: string): string | undefined {
  const time = Date.parse(value);
  if (Number.isNaN(time)) {
    return undefined;
  }
  return new Date(time).toISOString();
}

/** Normalizes Windows separators and strips a leading `./`. */
export function toPosixPath(path: string): string {
  return path.replace(/\\/g, "/").replace(/^\.\//, "");
}

export function compareStrings(a: string, b: string): number {
  if (a < b) return -1;
  if (a > b) return 1;
  return 0;
}

export function uniqueSorted(values: Iterable<string>): string[] {
  return Array.from(new Set(values)).sort(compareStrings);
}
