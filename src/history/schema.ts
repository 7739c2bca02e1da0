import { z } from "zod";

export const FileDeltaSchema = z.object({
  path: z.string(),
  oldPath: z.string().optional(),
  linesAdded: z.number().int().min(0),
  linesRemoved: z.number().int().min(0),
  changeType: z.enum(["added", "modified", "deleted", "renamed"]),
  binary: z.boolean(),
});

export const CommitRecordSchema = z.object({
  hash: z.string().min(1),
  parents: z.array(z.string()),
  author: z.object({ name: z.string(), email: z.string() }),
  timestamp: z.string(),
  message: z.string(),
  deltas: z.array(FileDeltaSchema),
  stats: z.object({
    filesChanged: z.number().int().min(0),
    linesAdded: z.number().int().min(0),
    linesRemoved: z.number().int().min(0),
    netLines: z.number().int(),
  }),
});

export const CachedHistorySchema = z.object({
  headHash: z.string().min(1),
  commits: z.array(CommitRecordSchema),
  skipped: z.array(z.object({ hash: z.string(), reason: z.string() })),
});

export type CachedHistory = z.infer<typeof CachedHistorySchema>;
