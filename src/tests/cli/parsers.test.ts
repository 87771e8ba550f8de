import { describe, it, expect } from 'vitest';
import {
  parseMdeOptions,
  parseSizeOptions,
  parseWeights,
  toDesignSpecification,
  toFlag,
  toMdeSpecification,
} from '../../cli/parsers';
import { loadConfig } from '../../config';
import { ErrorCode, SampleSizeError } from '../../core/errors';

const config = loadConfig({});

describe('toFlag', () => {
  it('should turn option keys back into flags', () => {
    expect(toFlag('baseline')).toBe('--baseline');
    expect(toFlag('metricType')).toBe('--metric-type');
    expect(toFlag('stdDev2')).toBe('--std-dev-2');
    expect(toFlag('nComparisons')).toBe('--n-comparisons');
  });
});

describe('parseWeights', () => {
  it('should split on commas and whitespace', () => {
    expect(parseWeights('35,15,20,18,12')).toEqual([35, 15, 20, 18, 12]);
    expect(parseWeights('50 50')).toEqual([50, 50]);
    expect(parseWeights(' 20, 40  40 ')).toEqual([20, 40, 40]);
  });

  it('should reject non-numeric entries', () => {
    expect(() => parseWeights('50,abc')).toThrow('Invalid weights format: 50,abc');
    expect(() => parseWeights('  ')).toThrow(SampleSizeError);
  });
});

describe('parseSizeOptions', () => {
  it('should coerce option strings', () => {
    expect(
      parseSizeOptions({
        baseline: '0.1',
        mde: '0.02',
        sides: '1',
        nTreatments: '3',
        testType: 't',
        pooled: true,
      })
    ).toEqual({
      baseline: 0.1,
      mde: 0.02,
      sides: 1,
      nTreatments: 3,
      testType: 't',
      pooled: true,
    });
  });

  it('should name the offending flag', () => {
    try {
      parseSizeOptions({ baseline: 'abc', sides: '3' });
      expect.unreachable('bad options should be rejected');
    } catch (error) {
      expect(error).toBeInstanceOf(SampleSizeError);
      if (error instanceof SampleSizeError) {
        expect(error.code).toBe(ErrorCode.INVALID_INPUT);
        const lines = error.message.split('\n');
        expect(lines).toHaveLength(2);
        expect(lines[0]).toBe('--baseline: Expected number, received nan');
        expect(lines[1]).toMatch(/^--sides: /);
      }
    }
  });

  it('should reject fractional group counts', () => {
    expect(() => parseSizeOptions({ nControls: '1.5' })).toThrow(/^--n-controls: /);
  });
});

describe('toDesignSpecification', () => {
  it('should fill unset statistical parameters from the configuration', () => {
    const spec = toDesignSpecification(
      parseSizeOptions({ baseline: '0.1', mde: '0.02' }),
      loadConfig({ SAMPLE_SIZE_DEFAULT_POWER: '0.9', SAMPLE_SIZE_DEFAULT_TEST_TYPE: 't' })
    );
    expect(spec.power).toBe(0.9);
    expect(spec.testType).toBe('t');
    expect(spec.alpha).toBe(0.05);
    expect(spec.nullVariance).toBe('baseline');
  });

  it('should give the groups after the controls to treatments', () => {
    const spec = toDesignSpecification(
      parseSizeOptions({ baseline: '0.2', mde: '0.03', weights: '35,15,20,18,12', nControls: '2' }),
      config
    );
    expect(spec.weights).toEqual([35, 15, 20, 18, 12]);
    expect(spec.nControls).toBe(2);
    expect(spec.nTreatments).toBe(3);
  });

  it('should map --pooled to the pooled null variance', () => {
    const spec = toDesignSpecification(
      parseSizeOptions({ baseline: '0.1', mde: '0.02', pooled: true }),
      config
    );
    expect(spec.nullVariance).toBe('pooled');
  });

  it('should require both baseline and mde', () => {
    expect(() => toDesignSpecification(parseSizeOptions({ baseline: '0.1' }), config)).toThrow(
      '--baseline and --mde are required (or use --interactive)'
    );
  });
});

describe('toMdeSpecification', () => {
  it('should build a reverse-sizing input', () => {
    const spec = toMdeSpecification(
      parseMdeOptions({ baseline: '0.1', sampleSize: '5000', direction: 'decrease' }),
      config
    );
    expect(spec.sampleSizePerGroup).toBe(5000);
    expect(spec.direction).toBe('decrease');
  });

  it('should require a sample size', () => {
    expect(() => toMdeSpecification(parseMdeOptions({ baseline: '0.1' }), config)).toThrow(
      '--baseline and --sample-size are required'
    );
  });
});
