/**
 * Zod schemas for upstream API responses.
 *
 * These validate the envelope of JSON payloads at the system boundary before
 * records propagate into the normalizer. Unlike a dashboard, a sync job must
 * not persist half-understood data, so a mismatch is a hard `SchemaError`.
 */

import { z } from 'zod';
import { SchemaError } from './errors.js';

// ---------------------------------------------------------------------------
// Bybit v5 envelope  { retCode, retMsg, result: { list, nextPageCursor? } }
// ---------------------------------------------------------------------------

const ScalarSchema = z.union([z.string(), z.number()]);

/** A record is either a named object (open interest, funding) or a positional tuple (kline). */
export const BybitRecordSchema = z.union([z.record(ScalarSchema), z.array(ScalarSchema)]);

/** Error envelopes may omit `result` or send `{}`; only the codes are required. */
export const BybitStatusSchema = z
  .object({
    retCode: z.number(),
    retMsg: z.string().default(''),
  })
  .passthrough();

export const BybitResultSchema = z
  .object({
    list: z.array(BybitRecordSchema),
    nextPageCursor: z.string().optional().nullable(),
  })
  .passthrough();

export type BybitRecord = z.infer<typeof BybitRecordSchema>;

// ---------------------------------------------------------------------------
// alternative.me Fear & Greed  { data: [...], metadata: { error } }
// ---------------------------------------------------------------------------

const FearGreedEntrySchema = z
  .object({
    value: ScalarSchema,
    value_classification: z.string().optional(),
    timestamp: ScalarSchema,
  })
  .passthrough();

export const FearGreedResponseSchema = z
  .object({
    data: z.array(FearGreedEntrySchema),
    metadata: z
      .object({
        error: z.string().nullable().optional(),
      })
      .passthrough()
      .optional(),
  })
  .passthrough();

// ---------------------------------------------------------------------------
// Validation helper
// ---------------------------------------------------------------------------

/**
 * Validate a parsed JSON payload against a Zod schema, throwing a
 * `SchemaError` that names the first few offending paths.
 */
export function parseApiResponse<T>(schema: z.ZodType<T, z.ZodTypeDef, unknown>, payload: unknown, label: string): T {
  const result = schema.safeParse(payload);
  if (result.success) return result.data;
  const issues = result.error.issues
    .slice(0, 3)
    .map((issue) => `${issue.path.join('.') || '(root)'}: ${issue.message}`)
    .join('; ');
  console.warn(`[zod] ${label}: API response failed validation: ${issues}`);
  throw new SchemaError(`${label} response failed validation: ${issues}`);
}
