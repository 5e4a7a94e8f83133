/**
 * DealRelay — Scoring
 */

export { evaluate } from './engine';
export { extractPrice, extractDiscount, parseAmount } from './extract';
export type { ExtractionResult } from './extract';
