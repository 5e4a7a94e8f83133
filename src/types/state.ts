/**
 * DealRelay — Persisted State Types
 *
 * Schemas double as validators when state is read back from disk or
 * from the database.
 */

import { z } from 'zod';

export const DedupOutcomeSchema = z.enum(['published', 'rejected']);
export type DedupOutcome = z.infer<typeof DedupOutcomeSchema>;

export const CursorSchema = z.object({
  sourceChatId: z.string().min(1),
  lastProcessedMessageId: z.number().int(),
});
export type Cursor = z.infer<typeof CursorSchema>;

/**
 * Written once per identity when a terminal decision is reached.
 */
export const DedupEntrySchema = z.object({
  sourceChatId: z.string().min(1),
  messageId: z.number().int(),
  outcome: DedupOutcomeSchema,
  publishedTargetMessageId: z.string().optional(),
  /** ISO 8601 */
  decidedAt: z.string(),
  reason: z.string().optional(),
  /** SHA-256 of the normalized text, when the message had text */
  fingerprint: z.string().optional(),
});
export type DedupEntry = z.infer<typeof DedupEntrySchema>;
