/**
 * Tests for the Scoring Engine
 */

import { describe, it, expect } from 'vitest';
import { evaluate } from '../../src/scoring';
import { RuleSetSchema } from '../../src/types';
import type { RuleSet } from '../../src/types';

function rules(overrides: Partial<RuleSet> = {}): RuleSet {
  return RuleSetSchema.parse(overrides);
}

describe('Scoring Engine', () => {
  describe('evaluate', () => {
    it('should score keywords, price and discount together', () => {
      const result = evaluate(
        { text: 'Скидка 50%! Цена 890₽ #include_term' },
        rules({ include: { '#include_term': 1 }, minScore: 3 })
      );

      expect(result.score).toBe(5);
      expect(result.accepted).toBe(true);
      expect(result.price).toBe(890);
      expect(result.discount).toBe(50);
      expect([...result.matchedIncludeTerms]).toEqual(['#include_term']);
      expect(result.reasons).toEqual([
        'include_keywords:#include_term',
        'low_price:890',
        'big_discount:50',
      ]);
    });

    it('should reject on an exclude keyword regardless of score', () => {
      const result = evaluate(
        { text: 'Скидка 50%! Цена 890₽ #include_term #реклама' },
        rules({ include: { '#include_term': 1 }, exclude: ['#реклама'], minScore: 3 })
      );

      expect(result.accepted).toBe(false);
      expect(result.score).toBe(0);
      expect(result.excludeHit).toBe('#реклама');
      expect(result.reasons).toEqual(['exclude_keyword:#реклама']);
    });

    it('should match keywords case-insensitively', () => {
      const result = evaluate({ text: 'Новый IPHONE в наличии' }, rules({ include: { iPhone: 2 } }));

      expect(result.score).toBe(2);
      expect(result.accepted).toBe(true);
    });

    it('should use the lowest price for the price bonus', () => {
      const result = evaluate({ text: 'Было 1200₽, сейчас 890₽' }, rules());

      expect(result.price).toBe(890);
      expect(result.score).toBe(2);
      expect(result.reasons).toEqual(['low_price:890']);
    });

    it('should give the mid-price bonus between thresholds', () => {
      const result = evaluate({ text: 'Рюкзак 1 290 ₽' }, rules());

      expect(result.score).toBe(1);
      expect(result.reasons).toEqual(['mid_price:1290']);
      expect(result.accepted).toBe(false);
    });

    it('should give no price bonus above the mid threshold', () => {
      const result = evaluate({ text: 'Куртка 4990₽' }, rules());

      expect(result.score).toBe(0);
      expect(result.price).toBe(4990);
      expect(result.reasons).toEqual([]);
    });

    it('should give the small discount bonus between thresholds', () => {
      const result = evaluate({ text: 'Скидка 30% на кеды' }, rules());

      expect(result.score).toBe(1);
      expect(result.reasons).toEqual(['discount:30']);
    });

    it('should give no discount bonus below the low threshold', () => {
      const result = evaluate({ text: 'Скидка 10% на кеды' }, rules());

      expect(result.score).toBe(0);
      expect(result.discount).toBe(10);
    });

    it('should add weights of every matched include keyword', () => {
      const result = evaluate(
        { text: 'Nike Air Max со скидкой' },
        rules({ include: { nike: 2, 'air max': 3, adidas: 5 } })
      );

      expect(result.score).toBe(5);
      expect(result.reasons).toEqual(['include_keywords:air max,nike']);
    });

    it('should flag empty text and still score it', () => {
      const result = evaluate({ text: '   ' }, rules({ minScore: 0 }));

      expect(result.reasons).toEqual(['empty_text']);
      expect(result.score).toBe(0);
      expect(result.accepted).toBe(true);
    });

    it('should compare the score against minScore inclusively', () => {
      const text = 'Цена 890₽';

      expect(evaluate({ text }, rules({ minScore: 2 })).accepted).toBe(true);
      expect(evaluate({ text }, rules({ minScore: 3 })).accepted).toBe(false);
    });

    it('should be deterministic', () => {
      const ruleSet = rules({ include: { iphone: 2 }, exclude: ['б/у'] });
      const message = { text: 'iPhone 15 за 890₽, скидка 45%' };

      const first = evaluate(message, ruleSet);
      const second = evaluate(message, ruleSet);

      expect(second).toEqual(first);
      expect(first.score).toBe(6);
    });
  });
});
