import { randomUUID } from "node:crypto";
import { mkdir, rename, rm, writeFile } from "node:fs/promises";
import { dirname, resolve } from "node:path";

import { serializeDataset } from "../aggregate/serialize.js";
import type { AggregatedDataset } from "../aggregate/types.js";

/** Writes the serialized dataset through a temp file so readers never see a partial file. */
export async function writeDataset(path: string, dataset: AggregatedDataset): Promise<string> {
  const target = resolve(path);
  await mkdir(dirname(target), { recursive: true });

  const tempPath = `${target}.${process.pid}.${randomUUID()}.tmp`;
  try {
    await writeFile(tempPath, serializeDataset(dataset), "utf8");
    await rename(tempPath, target);
  } finally {
    await rm(tempPath, { force: true });
  }
  return target;
}
