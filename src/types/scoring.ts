/**
 * DealRelay — Scoring Types
 *
 * The rule set is validated with zod wherever it enters the process
 * (environment or rules file). ScoreResult is derived, never persisted.
 */

import { z } from 'zod';

// ============================================================
// RULE SET
// ============================================================

export const KeywordWeightsSchema = z.record(z.string().min(1), z.number().int());

export const RuleSetSchema = z
  .object({
    /** Include keyword → weight */
    include: KeywordWeightsSchema.default({}),
    exclude: z.array(z.string().min(1)).default([]),
    minScore: z.number().int().default(2),
    lowPriceThreshold: z.number().nonnegative().default(990),
    midPriceThreshold: z.number().nonnegative().default(1490),
    highDiscountThreshold: z.number().min(0).max(100).default(40),
    lowDiscountThreshold: z.number().min(0).max(100).default(25),
  })
  .refine(r => r.lowPriceThreshold <= r.midPriceThreshold, {
    message: 'lowPriceThreshold must not exceed midPriceThreshold',
    path: ['lowPriceThreshold'],
  })
  .refine(r => r.lowDiscountThreshold <= r.highDiscountThreshold, {
    message: 'lowDiscountThreshold must not exceed highDiscountThreshold',
    path: ['lowDiscountThreshold'],
  });

export type RuleSet = z.infer<typeof RuleSetSchema>;

export const DEFAULT_INCLUDE_WEIGHT = 1;

// ============================================================
// SCORE RESULT
// ============================================================

export interface ScoreResult {
  accepted: boolean;
  score: number;
  matchedIncludeTerms: ReadonlySet<string>;
  excludeHit?: string;
  /** Lowest price found, if any */
  price?: number;
  /** Highest discount found, if any */
  discount?: number;
  reasons: string[];
}
