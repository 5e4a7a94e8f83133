/**
 * DealRelay — Scoring Engine
 *
 * Deterministic, zero I/O. Maps a message to accept/reject plus a score:
 * - any exclude keyword rejects outright
 * - include keywords add their weight
 * - lowest price adds +2 / +1 against the low / mid thresholds
 * - highest discount adds +2 / +1 against the high / low thresholds
 */

import type { CanonicalMessage, RuleSet, ScoreResult } from '../types';
import { extractDiscount, extractPrice } from './extract';

interface PreparedRules {
  include: Array<{ term: string; needle: string; weight: number }>;
  exclude: Array<{ term: string; needle: string }>;
}

function prepare(rules: RuleSet): PreparedRules {
  return {
    include: Object.entries(rules.include)
      .map(([term, weight]) => ({
        term,
        needle: term.trim().toLowerCase(),
        weight,
      }))
      .filter(k => k.needle.length > 0),
    exclude: rules.exclude
      .map(term => ({ term, needle: term.trim().toLowerCase() }))
      .filter(k => k.needle.length > 0),
  };
}

function priceBonus(price: number | null, rules: RuleSet): { points: number; reason?: string } {
  if (price === null) return { points: 0 };
  if (price <= rules.lowPriceThreshold) return { points: 2, reason: `low_price:${price}` };
  if (price <= rules.midPriceThreshold) return { points: 1, reason: `mid_price:${price}` };
  return { points: 0 };
}

function discountBonus(discount: number | null, rules: RuleSet): { points: number; reason?: string } {
  if (discount === null) return { points: 0 };
  if (discount >= rules.highDiscountThreshold) return { points: 2, reason: `big_discount:${discount}` };
  if (discount >= rules.lowDiscountThreshold) return { points: 1, reason: `discount:${discount}` };
  return { points: 0 };
}

/**
 * Score a message against a rule set.
 */
export function evaluate(message: Pick<CanonicalMessage, 'text'>, rules: RuleSet): ScoreResult {
  const text = message.text;
  const normalized = text.toLowerCase();
  const prepared = prepare(rules);

  const excluded = prepared.exclude.find(k => normalized.includes(k.needle));
  if (excluded) {
    return {
      accepted: false,
      score: 0,
      matchedIncludeTerms: new Set(),
      excludeHit: excluded.term,
      reasons: [`exclude_keyword:${excluded.term}`],
    };
  }

  const reasons: string[] = [];
  let score = 0;

  if (text.trim().length === 0) {
    reasons.push('empty_text');
  }

  const matched = new Set<string>();
  for (const keyword of prepared.include) {
    if (normalized.includes(keyword.needle)) {
      matched.add(keyword.term);
      score += keyword.weight;
    }
  }
  if (matched.size > 0) {
    reasons.push(`include_keywords:${[...matched].sort().join(',')}`);
  }

  const price = extractPrice(text).value;
  const priceResult = priceBonus(price, rules);
  score += priceResult.points;
  if (priceResult.reason) reasons.push(priceResult.reason);

  const discount = extractDiscount(text).value;
  const discountResult = discountBonus(discount, rules);
  score += discountResult.points;
  if (discountResult.reason) reasons.push(discountResult.reason);

  return {
    accepted: score >= rules.minScore,
    score,
    matchedIncludeTerms: matched,
    price: price ?? undefined,
    discount: discount ?? undefined,
    reasons,
  };
}
