import { z } from "zod";

const TimestampSchema = z.string().min(1);

export const IssueItemSchema = z.object({
  kind: z.literal("issue"),
  id: z.number().int(),
  title: z.string(),
  state: z.enum(["open", "closed"]),
  author: z.string(),
  createdAt: TimestampSchema,
  closedAt: TimestampSchema.nullable(),
  labels: z.array(z.string()),
});

export const PullItemSchema = z.object({
  kind: z.literal("pull"),
  id: z.number().int(),
  title: z.string(),
  state: z.enum(["open", "closed", "merged"]),
  author: z.string(),
  createdAt: TimestampSchema,
  closedAt: TimestampSchema.nullable(),
  mergedAt: TimestampSchema.nullable(),
  labels: z.array(z.string()),
});

export const ContributorItemSchema = z.object({
  kind: z.literal("contributor"),
  id: z.number().int(),
  login: z.string(),
  contributions: z.number().int().min(0),
});

export const RemoteItemSchema = z.discriminatedUnion("kind", [
  IssueItemSchema,
  PullItemSchema,
  ContributorItemSchema,
]);

export const CachedPageSchema = z.object({
  items: z.array(RemoteItemSchema),
  hasMore: z.boolean(),
});

export type CachedPage = z.infer<typeof CachedPageSchema>;
