/**
 * Zod schemas for external market-data responses.
 *
 * These validate the shape of JSON payloads at the system boundary before
 * they propagate into the rest of the application, catching upstream API
 * contract changes early with clear diagnostics.
 */

import { z } from 'zod';
import { moduleLogger } from '../logger.js';

const log = moduleLogger('apiSchemas');

/** Numbers sometimes arrive as strings with thousands separators. */
const UpstreamNumberSchema = z.union([z.number(), z.string()]).transform((value, ctx) => {
  const numeric = typeof value === 'number' ? value : Number(value.replace(/,/g, '').trim());
  if (!Number.isFinite(numeric)) {
    ctx.addIssue({ code: z.ZodIssueCode.custom, message: `not a number: ${String(value)}` });
    return z.NEVER;
  }
  return numeric;
});

// ---------------------------------------------------------------------------
// Historical daily bars  (/api/historical/cm/equity)
// ---------------------------------------------------------------------------

/** A single daily row as returned by the equity history endpoint. */
const HistoryRowSchema = z
  .object({
    CH_TIMESTAMP: z.string(),
    CH_OPENING_PRICE: UpstreamNumberSchema,
    CH_TRADE_HIGH_PRICE: UpstreamNumberSchema,
    CH_TRADE_LOW_PRICE: UpstreamNumberSchema,
    CH_CLOSING_PRICE: UpstreamNumberSchema,
    CH_TOT_TRADED_QTY: UpstreamNumberSchema.optional(),
    CH_SERIES: z.string().optional(),
  })
  .passthrough();

/** Top-level wrapper for history responses. */
export const HistoryResponseSchema = z
  .object({
    data: z.array(HistoryRowSchema),
  })
  .passthrough();

export type HistoryRow = z.infer<typeof HistoryRowSchema>;
export type HistoryResponse = z.infer<typeof HistoryResponseSchema>;

// ---------------------------------------------------------------------------
// Validation helper
// ---------------------------------------------------------------------------

/**
 * Validate a parsed JSON payload against a Zod schema.
 * Returns the validated data on success, or `null` on failure (with a
 * warning).
 */
export function validateApiResponse<T>(schema: z.ZodType<T, z.ZodTypeDef, unknown>, payload: unknown, label: string): T | null {
  const result = schema.safeParse(payload);
  if (result.success) return result.data;
  log.warn({ issues: result.error.issues.slice(0, 3) }, `${label}: API response failed validation`);
  return null;
}
