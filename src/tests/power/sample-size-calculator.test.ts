import { describe, it, expect } from 'vitest';
import pino from 'pino';
import {
  SampleSizeCalculator,
  calculateMdeForSample,
  calculateSampleSize,
  resolveDesign,
} from '../../power/SampleSizeCalculator';
import { ErrorCode, SampleSizeError } from '../../core/errors';

const logger = pino({ level: 'silent' });
const calculator = new SampleSizeCalculator({ logger });

describe('resolveDesign', () => {
  it('should apply defaults', () => {
    expect(resolveDesign({ baseline: 0.1, mde: 0.02 })).toEqual({
      baseline: 0.1,
      mde: 0.02,
      mdeType: 'absolute',
      delta: 0.02,
      metricType: 'proportion',
      stdDev: null,
      stdDev2: null,
      power: 0.8,
      alpha: 0.05,
      sides: 2,
      testType: 'z',
      ratio: 1,
      correction: 'none',
      nComparisons: 1,
      nControls: 1,
      nTreatments: 1,
      weights: null,
      nullVariance: 'baseline',
    });
  });

  it('should convert a relative effect to raw units', () => {
    expect(resolveDesign({ baseline: 0.2, mde: 0.1, mdeType: 'relative' }).delta).toBeCloseTo(
      0.02,
      12
    );
  });

  it('should default the comparison count to controls x treatments', () => {
    expect(resolveDesign({ baseline: 0.1, mde: 0.02, nControls: 2, nTreatments: 3 }).nComparisons).toBe(6);
  });
});

describe('calculateSampleSize', () => {
  describe('standard designs', () => {
    it('should size a conversion test from 10% to 12%', () => {
      const result = calculator.calculateSampleSize({ baseline: 0.1, mde: 0.02 });

      expect(result.design).toBe('standard');
      expect(result.sampleSizePerVariant).toBe(3623);
      expect(result.sampleSizeControl).toBe(3623);
      expect(result.sampleSizeTreatment).toBe(3623);
      expect(result.totalSampleSize).toBe(7246);
      expect(result.absoluteEffect).toBe(0.02);
      expect(result.relativeEffect).toBeCloseTo(0.2, 12);
      expect(result.targetValue).toBeCloseTo(0.12, 12);
      expect(result.alphaCorrected).toBe(0.05);
      expect(result.bottleneck).toBeNull();
      expect(result.weights).toBeNull();
      expect(result.warnings).toEqual([]);
      expect(result.pairs).toHaveLength(1);
    });

    it('should size a conversion test from 20% to 25%', () => {
      expect(calculator.calculateSampleSize({ baseline: 0.2, mde: 0.05 }).sampleSizePerVariant).toBe(
        1031
      );
    });

    it('should give the same answer for an equivalent relative effect', () => {
      const relative = calculator.calculateSampleSize({
        baseline: 0.1,
        mde: 0.2,
        mdeType: 'relative',
      });
      expect(relative.sampleSizePerVariant).toBe(3623);
      expect(relative.mde).toBe(0.2);
      expect(relative.absoluteEffect).toBeCloseTo(0.02, 12);
    });

    it('should size means with z, t and Welch tests', () => {
      const base = { metricType: 'mean' as const, baseline: 100, mde: 2, stdDev: 20 };

      expect(calculator.calculateSampleSize(base).sampleSizePerVariant).toBe(1570);
      expect(calculator.calculateSampleSize({ ...base, testType: 't' }).sampleSizePerVariant).toBe(
        1571
      );

      const welch = calculator.calculateSampleSize({ ...base, testType: 't', stdDev2: 30 });
      expect(welch.welch).toBe(true);
      expect(welch.stdDevControl).toBe(20);
      expect(welch.stdDevTreatment).toBe(30);
      expect(welch.sampleSizePerVariant).toBeGreaterThanOrEqual(2552);
      expect(welch.sampleSizePerVariant).toBeLessThanOrEqual(2554);
    });

    it('should scale the treatment group by the ratio', () => {
      const result = calculator.calculateSampleSize({ baseline: 0.1, mde: 0.02, ratio: 2 });
      expect(result.sampleSizeControl).toBe(2695);
      expect(result.sampleSizeTreatment).toBe(5390);
      expect(result.totalSampleSize).toBe(8085);
    });

    it('should multiply group sizes across several arms', () => {
      const result = calculator.calculateSampleSize({
        baseline: 0.5,
        mde: 0.05,
        nTreatments: 3,
        correction: 'bonferroni',
      });

      expect(result.nComparisons).toBe(3);
      expect(result.alphaCorrected).toBeCloseTo(0.05 / 3, 12);
      expect(result.sampleSizePerVariant).toBe(2092);
      expect(result.groups).toHaveLength(4);
      expect(result.totalSampleSize).toBe(2092 * 4);
      expect(result.controlSampleSizeTotal).toBe(2092);
      expect(result.treatmentSampleSizeTotal).toBe(2092 * 3);
    });

    it('should apply Sidak and explicit comparison counts', () => {
      expect(
        calculator.calculateSampleSize({
          baseline: 0.5,
          mde: 0.05,
          nComparisons: 3,
          correction: 'sidak',
        }).sampleSizePerVariant
      ).toBe(2084);
      expect(
        calculator.calculateSampleSize({
          baseline: 0.5,
          mde: 0.05,
          nComparisons: 2,
          correction: 'bonferroni',
        }).sampleSizePerVariant
      ).toBe(1899);
    });

    it('should need fewer samples one-sided', () => {
      expect(
        calculator.calculateSampleSize({ baseline: 0.5, mde: 0.05, sides: 1 }).sampleSizePerVariant
      ).toBe(1235);
    });

    it('should use the pooled null variance on request', () => {
      const result = calculator.calculateSampleSize({
        baseline: 0.1,
        mde: 0.02,
        nullVariance: 'pooled',
      });
      expect(result.sampleSizePerVariant).toBe(3841);
      expect(result.nullVariance).toBe('pooled');
    });

    it('should match the z-test when a t-test needs tens of millions of samples', () => {
      const mean = { metricType: 'mean', baseline: 100, mde: 0.01, stdDev: 20 } as const;
      const z = calculator.calculateSampleSize({ ...mean, testType: 'z' });
      const t = calculator.calculateSampleSize({ ...mean, testType: 't' });

      expect(z.sampleSizePerVariant).toBeGreaterThan(60_000_000);
      expect(t.sampleSizePerVariant).toBe(z.sampleSizePerVariant);
      expect(t.warnings).toEqual([]);
      expect(t.pairs[0].converged).toBe(true);

      const rate = { baseline: 0.1, mde: 0.0001 };
      const zRate = calculator.calculateSampleSize({ ...rate, testType: 'z' });
      const tRate = calculator.calculateSampleSize({ ...rate, testType: 't' });
      expect(tRate.sampleSizePerVariant).toBe(zRate.sampleSizePerVariant);
      expect(tRate.warnings).toEqual([]);
    });
  });

  describe('weighted designs', () => {
    const result = calculator.calculateSampleSize({
      baseline: 0.2,
      mde: 0.03,
      nControls: 2,
      nTreatments: 3,
      weights: [35, 15, 20, 18, 12],
      correction: 'bonferroni',
    });

    it('should report the bottleneck pair and group sizes', () => {
      if (result.design !== 'weighted') {
        throw new Error('expected a weighted result');
      }
      expect(result.bottleneck.label).toBe('C2 vs T3');
      expect(result.alphaCorrected).toBeCloseTo(0.05 / 6, 12);
      expect(result.groups.map((g) => g.sampleSize)).toEqual([11464, 4913, 6551, 5896, 3931]);
      expect(result.totalSampleSize).toBe(32755);
      expect(result.controlSampleSizeTotal).toBe(11464 + 4913);
      expect(result.treatmentSampleSizeTotal).toBe(6551 + 5896 + 3931);
      expect(result.weights).toEqual([35, 15, 20, 18, 12]);
      expect(result.ratio).toBeCloseTo(0.8, 12);
    });

    it('should average group sizes by role', () => {
      // requiredTotal = 4913 / 0.15
      expect(result.sampleSizePerVariant).toBe(6551);
      expect(result.sampleSizeControl).toBe(8189);
      expect(result.sampleSizeTreatment).toBe(5459);
    });

    it('should not mutate the caller weights', () => {
      const weights = [50, 50];
      calculateSampleSize({ baseline: 0.1, mde: 0.02, weights }, { logger });
      expect(weights).toEqual([50, 50]);
    });
  });

  describe('monotonic behaviour', () => {
    const size = (overrides: { mde?: number; power?: number; alpha?: number }) =>
      calculator.calculateSampleSize({ baseline: 0.1, mde: 0.02, ...overrides })
        .sampleSizePerVariant;

    it('should need more samples for smaller effects', () => {
      expect(size({ mde: 0.01 })).toBeGreaterThan(size({ mde: 0.02 }));
      expect(size({ mde: 0.02 })).toBeGreaterThan(size({ mde: 0.04 }));
    });

    it('should need more samples for higher power and lower alpha', () => {
      expect(size({ power: 0.9 })).toBeGreaterThan(size({ power: 0.8 }));
      expect(size({ alpha: 0.01 })).toBeGreaterThan(size({ alpha: 0.05 }));
    });
  });

  describe('validation', () => {
    it('should collect every violated rule in one error', () => {
      try {
        calculator.calculateSampleSize({ baseline: 1.5, mde: 0, power: 1.2 });
        expect.unreachable('invalid design should be rejected');
      } catch (error) {
        expect(error).toBeInstanceOf(SampleSizeError);
        if (error instanceof SampleSizeError) {
          expect(error.code).toBe(ErrorCode.INVALID_PARAMETER);
          expect(error.message).toBe(
            [
              'power must be between 0 and 1, got 1.2',
              'For proportions, baseline must be between 0 and 1, got 1.5',
              'mde cannot be zero',
            ].join('\n')
          );
        }
      }
    });

    it('should reject chi2 for means', () => {
      expect(() =>
        calculator.calculateSampleSize({
          metricType: 'mean',
          baseline: 100,
          mde: 5,
          stdDev: 20,
          testType: 'chi2',
        })
      ).toThrow("Chi-square test is only valid for proportions, not means. Use 'z' or 't' instead.");
    });

    it('should report out-of-range targets as a domain error', () => {
      try {
        calculator.calculateSampleSize({ baseline: 0.95, mde: 0.1 });
        expect.unreachable('target above 100% should be rejected');
      } catch (error) {
        expect(error).toBeInstanceOf(SampleSizeError);
        if (error instanceof SampleSizeError) {
          expect(error.code).toBe(ErrorCode.DOMAIN_ERROR);
          expect(error.message).toBe(
            'Target rate 1.0500 is out of bounds (0, 1). Check your MDE value.'
          );
        }
      }
    });
  });
});

describe('calculateMdeForSample', () => {
  it('should return the smallest detectable lift', () => {
    const result = calculateMdeForSample({ baseline: 0.1, sampleSizePerGroup: 5000 }, { logger });

    expect(result.absoluteMde).toBeCloseTo(0.0169928, 6);
    expect(result.direction).toBe('increase');
    expect(result.sampleSizeTreatment).toBe(5000);
    expect(result.totalSampleSize).toBe(10000);
    expect(result.alphaCorrected).toBe(0.05);
  });

  it('should correct alpha before solving', () => {
    const corrected = calculator.calculateMdeForSample({
      baseline: 0.1,
      sampleSizePerGroup: 5000,
      nComparisons: 3,
      correction: 'bonferroni',
    });
    expect(corrected.alphaCorrected).toBeCloseTo(0.05 / 3, 12);
    expect(corrected.absoluteMde).toBeGreaterThan(0.0169928);
  });

  it('should round-trip with forward sizing', () => {
    const forward = calculator.calculateSampleSize({ metricType: 'mean', baseline: 100, mde: 5, stdDev: 20 });
    const reverse = calculator.calculateMdeForSample({
      metricType: 'mean',
      baseline: 100,
      stdDev: 20,
      sampleSizePerGroup: forward.sampleSizePerVariant,
    });

    expect(forward.sampleSizePerVariant).toBe(252);
    expect(reverse.absoluteMde).toBeLessThanOrEqual(5);
    expect(reverse.absoluteMde).toBeCloseTo(4.9917, 3);
  });

  it('should validate the sample size', () => {
    expect(() => calculator.calculateMdeForSample({ baseline: 0.1, sampleSizePerGroup: 1 })).toThrow(
      'sample_size_per_group must be an integer of at least 2, got 1'
    );
  });
});
