import { z } from 'zod';
import type { Json } from '../stacker.query-builder';

export const jsonSchema: z.ZodType<Json> = z.lazy(() =>
  z.union([z.string(), z.number(), z.boolean(), z.null(), z.array(jsonSchema), z.record(jsonSchema)]),
);

const hitSchema = z.object({
  _id: z.string().optional(),
  _source: z.record(z.unknown()).default({}),
  sort: z.array(jsonSchema).optional(),
});

export const searchResponseSchema = z.object({
  _scroll_id: z.string().optional(),
  hits: z.object({
    total: z.object({ value: z.number() }).optional(),
    hits: z.array(hitSchema),
  }),
  aggregations: z.record(jsonSchema).optional(),
});

export type SearchResponseBody = z.infer<typeof searchResponseSchema>;

export const countResponseSchema = z.object({
  count: z.number(),
});

export const updateByQueryResponseSchema = z.object({
  total: z.number().default(0),
  updated: z.number().default(0),
  version_conflicts: z.number().default(0),
  failures: z.array(z.unknown()).default([]),
});

export type UpdateByQueryResult = z.infer<typeof updateByQueryResponseSchema>;

const bulkItemResultSchema = z.object({
  _id: z.string().optional(),
  status: z.number(),
  error: z.unknown().optional(),
});

export const bulkResponseSchema = z.object({
  errors: z.boolean(),
  items: z.array(z.record(bulkItemResultSchema)),
});

export type BulkResponseBody = z.infer<typeof bulkResponseSchema>;
