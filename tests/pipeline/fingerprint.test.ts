/**
 * Tests for Content Fingerprints
 */

import { describe, it, expect } from 'vitest';
import { contentFingerprint, normalizeForFingerprint } from '../../src/pipeline/fingerprint';

describe('Content Fingerprint', () => {
  it('should collapse whitespace and case', () => {
    expect(normalizeForFingerprint('  Кеды\n\n990₽   СЕГОДНЯ ')).toBe('кеды 990₽ сегодня');
  });

  it('should give equal fingerprints for cosmetic differences', () => {
    expect(contentFingerprint('Кеды 990₽')).toBe(contentFingerprint(' кеды\t990₽\n'));
  });

  it('should give a SHA-256 hex digest', () => {
    expect(contentFingerprint('abc')).toBe('ba7816bf8f01cfea414140de5dae2223b00361a396177a9cb410ff61f20015ad');
  });

  it('should have no fingerprint for empty text', () => {
    expect(contentFingerprint(' \n ')).toBeUndefined();
  });
});
