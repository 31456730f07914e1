import { z } from "zod";

export const IndexRecordSchema = z.object({
  id: z.string(),
  title: z.string(),
  address: z.string(),
  category: z.string(),
  wordCount: z.number().int().nonnegative(),
  retrievedAt: z.string(),
});

export const IndexSchema = z.array(IndexRecordSchema);

export const CorpusEntrySchema = z.object({
  id: z.string(),
  title: z.string().min(1),
  address: z.string(),
  body: z.string(),
  category: z.string().optional(),
  tags: z.array(z.string()).default([]),
  metadata: z
    .object({
      date: z.string().optional(),
      author: z.string().optional(),
      category: z.string().optional(),
    })
    .default({}),
  wordCount: z.number().int().nonnegative(),
  retrievedAt: z.string(),
  persistedAt: z.string(),
});
