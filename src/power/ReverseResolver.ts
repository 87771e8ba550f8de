/**
 * Reverse Resolver
 *
 * Smallest effect a fixed control group of size n detects at the requested
 * power. Degrees of freedom depend on n alone, so t-tests need no iteration.
 *
 *   means:        δ = (cα + cβ) · sqrt((σ1² + σ2²/k) / n)
 *   proportions:  (√n·m - cα·A)² = cβ² (p1q1 + p2q2/k),  p2 = p1 ± m
 *
 * The proportion equation is a quadratic in m when the null term A uses the
 * baseline variance. With pooled null variance A depends on m as well, and the
 * effect is found by bisection on the forward requirement instead.
 */

import type { Logger } from 'pino';
import { REVERSE_SEARCH } from '../config/defaults';
import { SampleSizeError, ErrorCode } from '../core/errors';
import type { EffectDirection, MetricType, NullVariance, Sides, TestType } from '../domain/types';
import {
  pairCriticalValues,
  pairDegreesOfFreedom,
  proportionTerms,
} from './SinglePairCalculator';

export interface ReverseParameters {
  baseline: number;
  /** Control group size, integer >= 2 */
  sampleSize: number;
  power: number;
  /** Alpha after multiple-comparison correction */
  alpha: number;
  ratio: number;
  metricType: MetricType;
  stdDev: number | null;
  stdDev2: number | null;
  testType: TestType;
  sides: Sides;
  nullVariance: NullVariance;
  direction: EffectDirection;
}

export interface ReverseResolution {
  /** Signed effect in raw units */
  absoluteMde: number;
  relativeMde: number;
  targetValue: number;
  degreesOfFreedom: number | null;
}

function checkParameters(params: ReverseParameters): void {
  const { baseline, sampleSize, ratio, metricType, stdDev, stdDev2 } = params;

  if (!Number.isInteger(sampleSize) || sampleSize < 2) {
    throw new SampleSizeError(
      ErrorCode.INVALID_PARAMETER,
      `sample_size_per_group must be an integer of at least 2, got ${sampleSize}`,
      { sampleSize }
    );
  }
  if (!(ratio > 0) || !Number.isFinite(ratio)) {
    throw new SampleSizeError(ErrorCode.INVALID_PARAMETER, `ratio must be positive, got ${ratio}`, {
      ratio,
    });
  }

  if (metricType === 'proportion') {
    if (!(baseline > 0 && baseline < 1)) {
      throw new SampleSizeError(
        ErrorCode.INVALID_PARAMETER,
        `For proportions, baseline must be between 0 and 1, got ${baseline}`,
        { baseline }
      );
    }
    return;
  }

  if (!(baseline > 0) || !Number.isFinite(baseline)) {
    throw new SampleSizeError(
      ErrorCode.INVALID_PARAMETER,
      `baseline must be positive, got ${baseline}`,
      { baseline }
    );
  }
  if (stdDev === null || !(stdDev > 0)) {
    throw new SampleSizeError(
      ErrorCode.INVALID_PARAMETER,
      stdDev === null
        ? "std_dev is required for metric_type='mean'"
        : `std_dev must be positive, got ${stdDev}`,
      { stdDev }
    );
  }
  if (stdDev2 !== null && !(stdDev2 > 0)) {
    throw new SampleSizeError(
      ErrorCode.INVALID_PARAMETER,
      `std_dev_2 must be positive, got ${stdDev2}`,
      { stdDev2 }
    );
  }
}

/**
 * Effect magnitude solving the baseline-variance proportion quadratic
 *
 *   (s² + b²/k)m² - (2as + d·b²(q1 - p1)/k)m + (a² - b²p1q1(1 + 1/k)) = 0
 *
 * The root is the one with sign(s·m - a) = sign(b).
 */
function solveProportionQuadratic(
  p1: number,
  n: number,
  ratio: number,
  sign: number,
  cAlpha: number,
  cPower: number
): number {
  const q1 = 1 - p1;
  const s = Math.sqrt(n);
  const a = cAlpha * proportionTerms(p1, 0, ratio, 'baseline').nullTerm;
  const b = cPower;

  const qa = s * s + (b * b) / ratio;
  const qb = -(2 * a * s + (sign * b * b * (q1 - p1)) / ratio);
  const qc = a * a - b * b * p1 * q1 * (1 + 1 / ratio);

  const discriminant = qb * qb - 4 * qa * qc;
  if (discriminant < 0) {
    throw new SampleSizeError(
      ErrorCode.DOMAIN_ERROR,
      'No detectable effect exists for this sample size and power',
      { baseline: p1, sampleSize: n }
    );
  }

  const root = Math.sqrt(discriminant);
  return b >= 0 ? (-qb + root) / (2 * qa) : (-qb - root) / (2 * qa);
}

/**
 * Effect magnitude for pooled null variance: bisection on the monotone
 * requirement n(m) = (cα·A(m) + cβ·B(m))² / m² over the room left in (0, 1)
 */
function searchPooledProportion(
  p1: number,
  n: number,
  ratio: number,
  sign: number,
  cAlpha: number,
  cPower: number
): number {
  const required = (m: number): number => {
    const { nullTerm, alternativeTerm } = proportionTerms(p1, sign * m, ratio, 'pooled');
    return (cAlpha * nullTerm + cPower * alternativeTerm) ** 2 / (m * m);
  };

  let low = 0;
  let high = sign > 0 ? 1 - p1 : p1;

  if (required(high * (1 - 1e-12)) > n) {
    throw new SampleSizeError(
      ErrorCode.DOMAIN_ERROR,
      'No detectable effect within (0, 1) reaches the requested power for this sample size',
      { baseline: p1, sampleSize: n }
    );
  }

  for (let step = 0; step < REVERSE_SEARCH.MAX_STEPS && high - low > REVERSE_SEARCH.TOLERANCE; step++) {
    const mid = (low + high) / 2;
    if (required(mid) > n) {
      low = mid;
    } else {
      high = mid;
    }
  }

  return high;
}

/**
 * Minimum detectable effect for a fixed control group size
 *
 * @throws SampleSizeError INVALID_PARAMETER for bad sizes or variability,
 * DOMAIN_ERROR when the implied proportion target leaves (0, 1)
 */
export function resolveMde(params: ReverseParameters, logger?: Logger): ReverseResolution {
  checkParameters(params);

  const { baseline, sampleSize, ratio, metricType, testType, direction } = params;
  const sign = direction === 'decrease' ? -1 : 1;

  const df = testType === 't' ? pairDegreesOfFreedom(params, sampleSize) : undefined;
  const critical = pairCriticalValues(params, df);

  let magnitude: number;
  if (metricType === 'mean') {
    const sigma1 = params.stdDev ?? 0;
    const sigma2 = params.stdDev2 ?? sigma1;
    const varianceFactor = sigma1 * sigma1 + (sigma2 * sigma2) / ratio;
    magnitude = (critical.alpha + critical.power) * Math.sqrt(varianceFactor / sampleSize);
  } else if (params.nullVariance === 'pooled') {
    magnitude = searchPooledProportion(
      baseline,
      sampleSize,
      ratio,
      sign,
      critical.alpha,
      critical.power
    );
  } else {
    magnitude = solveProportionQuadratic(
      baseline,
      sampleSize,
      ratio,
      sign,
      critical.alpha,
      critical.power
    );
  }

  const absoluteMde = sign * magnitude;
  const targetValue = baseline + absoluteMde;

  if (metricType === 'proportion' && !(targetValue > 0 && targetValue < 1)) {
    throw new SampleSizeError(
      ErrorCode.DOMAIN_ERROR,
      `Target rate ${targetValue.toFixed(4)} is out of bounds (0, 1). Increase the sample size.`,
      { baseline, absoluteMde, targetValue }
    );
  }

  logger?.debug({ sampleSize, absoluteMde, df }, 'minimum detectable effect resolved');

  return {
    absoluteMde,
    relativeMde: absoluteMde / baseline,
    targetValue,
    degreesOfFreedom: df ?? null,
  };
}
