import { compareStrings, isRecord } from "../core/utils.js";
import type { AggregatedDataset } from "./types.js";

/**
 * JSON with object keys sorted at every depth. Array order is kept, so
 * equal datasets always serialize to identical bytes.
 */
export function serializeDataset(dataset: AggregatedDataset): string {
  return `${stableStringify(dataset)}\n`;
}

export function stableStringify(value: unknown, indent = 2): string {
  return JSON.stringify(sortKeys(value), null, indent);
}

function sortKeys(value: unknown): unknown {
  if (Array.isArray(value)) {
    return value.map(sortKeys);
  }
  if (!isRecord(value)) {
    return value;
  }

  const sorted: Record<string, unknown> = {};
  for (const key of Object.keys(value).sort(compareStrings)) {
    const entry = value[key];
    if (entry !== undefined) {
      sorted[key] = sortKeys(entry);
    }
  }
  return sorted;
}
