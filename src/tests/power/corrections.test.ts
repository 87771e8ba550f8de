import { describe, it, expect } from 'vitest';
import { applyCorrection } from '../../power/Corrections';
import { SampleSizeError } from '../../core/errors';

describe('applyCorrection', () => {
  it('should divide alpha for Bonferroni', () => {
    expect(applyCorrection(0.05, 3, 'bonferroni')).toBeCloseTo(0.0166667, 7);
    expect(applyCorrection(0.05, 6, 'bonferroni')).toBeCloseTo(0.05 / 6, 12);
  });

  it('should apply the Sidak formula', () => {
    expect(applyCorrection(0.05, 3, 'sidak')).toBeCloseTo(0.0169524, 7);
  });

  it('should be less strict with Sidak than Bonferroni', () => {
    expect(applyCorrection(0.05, 4, 'sidak')).toBeGreaterThan(
      applyCorrection(0.05, 4, 'bonferroni')
    );
  });

  it('should leave alpha untouched without a correction or with one comparison', () => {
    expect(applyCorrection(0.05, 5, 'none')).toBe(0.05);
    expect(applyCorrection(0.05, 1, 'bonferroni')).toBe(0.05);
    expect(applyCorrection(0.05, 1, 'sidak')).toBeCloseTo(0.05, 12);
  });

  it('should reject fewer than one comparison', () => {
    expect(() => applyCorrection(0.05, 0, 'bonferroni')).toThrow(
      'n_comparisons must be at least 1, got 0'
    );
    expect(() => applyCorrection(0.05, 1.5, 'sidak')).toThrow(SampleSizeError);
  });

  it('should reject alpha outside (0, 1)', () => {
    expect(() => applyCorrection(1.2, 2, 'bonferroni')).toThrow(SampleSizeError);
  });
});
