/**
 * Single-Pair Sample Size Calculator
 *
 * Minimum control-group size for one control/treatment pair:
 *
 *   proportions:  n = (cα·A + cβ·B)² / δ²
 *     A = sqrt(p̃(1 - p̃)(1 + 1/k))          null-hypothesis term
 *     B = sqrt(p1(1 - p1) + p2(1 - p2)/k)   alternative term
 *
 *   means:        n = (σ1² + σ2²/k)(cα + cβ)² / δ²
 *
 * with k the treatment / control ratio. T-tests feed the estimate back into
 * the degrees of freedom until it settles.
 */

import type { Logger } from 'pino';
import { CEILING_EPSILON, T_TEST_CONVERGENCE } from '../config/defaults';
import { SampleSizeError, ErrorCode } from '../core/errors';
import type { ConvergenceWarning } from '../domain/results';
import type { MetricType, NullVariance, Sides, TestType } from '../domain/types';
import { criticalValue, powerQuantile } from './CriticalValues';

export interface PairParameters {
  baseline: number;
  /** Effect in raw units, non-zero */
  delta: number;
  power: number;
  /** Alpha after multiple-comparison correction */
  alpha: number;
  /** Treatment / control size ratio */
  ratio: number;
  metricType: MetricType;
  stdDev: number | null;
  stdDev2: number | null;
  testType: TestType;
  sides: Sides;
  nullVariance: NullVariance;
  /** Pair label attached to warnings and log lines */
  label?: string;
}

export interface PairSampleSize {
  /** Rounded-up control group size */
  controlSampleSize: number;
  /** Unrounded final estimate */
  rawSampleSize: number;
  degreesOfFreedom: number | null;
  iterations: number;
  converged: boolean;
  warning: ConvergenceWarning | null;
}

/**
 * Round a sample size up to a whole unit, ignoring floating-point noise
 */
export function ceilSamples(value: number): number {
  return Math.ceil(value - CEILING_EPSILON);
}

/**
 * Welch–Satterthwaite degrees of freedom for group sizes n1, n2
 */
export function welchDegreesOfFreedom(
  stdDev1: number,
  stdDev2: number,
  n1: number,
  n2: number
): number {
  const v1 = (stdDev1 * stdDev1) / n1;
  const v2 = (stdDev2 * stdDev2) / n2;
  if (v1 + v2 < 1e-12) {
    return Math.max(1, n1 + n2 - 2);
  }
  return (v1 + v2) ** 2 / ((v1 * v1) / (n1 - 1) + (v2 * v2) / (n2 - 1));
}

/**
 * Degrees of freedom of the pair at control size n.
 * Group sizes are floored at 2 so the Welch denominators stay positive.
 */
export function pairDegreesOfFreedom(
  params: Pick<PairParameters, 'metricType' | 'stdDev' | 'stdDev2' | 'ratio'>,
  n: number
): number {
  const n1 = Math.max(n, 2);
  const n2 = Math.max(params.ratio * n, 2);

  if (params.metricType === 'mean' && params.stdDev !== null && params.stdDev2 !== null) {
    return welchDegreesOfFreedom(params.stdDev, params.stdDev2, n1, n2);
  }
  return Math.max(1, n1 + n2 - 2);
}

/**
 * Critical values of the pair: cα at the corrected alpha, cβ at the power
 */
export function pairCriticalValues(
  params: Pick<PairParameters, 'alpha' | 'power' | 'sides' | 'testType'>,
  df?: number
): { alpha: number; power: number } {
  return {
    alpha: criticalValue(params.alpha, params.sides, params.testType, df),
    power: powerQuantile(params.power, params.testType, df),
  };
}

/**
 * Null and alternative variance terms for a proportion pair
 */
export function proportionTerms(
  baseline: number,
  delta: number,
  ratio: number,
  nullVariance: NullVariance
): { nullTerm: number; alternativeTerm: number } {
  const p1 = baseline;
  const p2 = baseline + delta;
  const nullRate = nullVariance === 'pooled' ? (p1 + ratio * p2) / (1 + ratio) : p1;

  return {
    nullTerm: Math.sqrt(nullRate * (1 - nullRate) * (1 + 1 / ratio)),
    alternativeTerm: Math.sqrt(p1 * (1 - p1) + (p2 * (1 - p2)) / ratio),
  };
}

function checkParameters(params: PairParameters): void {
  const { baseline, delta, metricType, stdDev, stdDev2, ratio } = params;

  if (delta === 0 || !Number.isFinite(delta)) {
    throw new SampleSizeError(
      ErrorCode.INVALID_PARAMETER,
      'mde cannot be zero',
      { delta }
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
    const target = baseline + delta;
    if (!(target > 0 && target < 1)) {
      throw new SampleSizeError(
        ErrorCode.DOMAIN_ERROR,
        `Target rate ${target.toFixed(4)} is out of bounds (0, 1). Check your MDE value.`,
        { baseline, delta, target }
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
  if (stdDev === null) {
    throw new SampleSizeError(
      ErrorCode.INVALID_PARAMETER,
      "std_dev is required for metric_type='mean'",
      { metricType }
    );
  }
  if (!(stdDev > 0)) {
    throw new SampleSizeError(
      ErrorCode.INVALID_PARAMETER,
      `std_dev must be positive, got ${stdDev}`,
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
 * Control group size for one pair
 *
 * @throws SampleSizeError INVALID_PARAMETER for a zero effect, non-positive
 * ratio or standard deviation; DOMAIN_ERROR when a proportion target leaves (0, 1)
 */
export function calculatePairSampleSize(
  params: PairParameters,
  logger?: Logger
): PairSampleSize {
  checkParameters(params);

  const { baseline, delta, ratio, metricType, testType } = params;
  const deltaSquared = delta * delta;

  const solve = (cAlpha: number, cPower: number): number => {
    if (metricType === 'proportion') {
      const { nullTerm, alternativeTerm } = proportionTerms(
        baseline,
        delta,
        ratio,
        params.nullVariance
      );
      return (cAlpha * nullTerm + cPower * alternativeTerm) ** 2 / deltaSquared;
    }

    // Validated non-null above
    const sigma1 = params.stdDev ?? 0;
    const sigma2 = params.stdDev2 ?? sigma1;
    const varianceFactor = sigma1 * sigma1 + (sigma2 * sigma2) / ratio;
    return (varianceFactor * (cAlpha + cPower) ** 2) / deltaSquared;
  };

  // Normal approximation; final answer for z and chi2, starting point for t
  const normal = pairCriticalValues({ ...params, testType: 'z' });
  let estimate = solve(normal.alpha, normal.power);

  if (testType !== 't') {
    return finish(estimate, null, 0, true, null);
  }

  let df = pairDegreesOfFreedom(params, estimate);
  let previous = estimate;
  let lastChange = Infinity;
  let iterations = 0;

  while (iterations < T_TEST_CONVERGENCE.MAX_ITERATIONS) {
    iterations++;
    df = pairDegreesOfFreedom(params, estimate);
    const critical = pairCriticalValues(params, df);
    const next = solve(critical.alpha, critical.power);

    lastChange = Math.abs(next - estimate);
    previous = estimate;
    estimate = next;

    if (lastChange < T_TEST_CONVERGENCE.THRESHOLD) {
      break;
    }
  }

  const converged = lastChange < T_TEST_CONVERGENCE.THRESHOLD;

  logger?.debug(
    { pair: params.label, iterations, df, estimate, converged },
    't-test sample size iteration finished'
  );

  if (converged) {
    return finish(estimate, df, iterations, true, null);
  }

  // Small samples can alternate between two estimates; never return the lower one
  if (previous > estimate) {
    estimate = previous;
    df = pairDegreesOfFreedom(params, estimate);
  }

  const warning: ConvergenceWarning = {
    code: 'CONVERGENCE_WARNING',
    message:
      `t-test sample size did not settle within ${T_TEST_CONVERGENCE.MAX_ITERATIONS} iterations ` +
      `(last change ${lastChange.toFixed(3)}); using the larger of the last two estimates`,
    iterations,
    lastChange,
    estimate,
    ...(params.label !== undefined ? { pair: params.label } : {}),
  };
  logger?.warn({ warning }, warning.message);

  return finish(estimate, df, iterations, false, warning);
}

function finish(
  estimate: number,
  df: number | null,
  iterations: number,
  converged: boolean,
  warning: ConvergenceWarning | null
): PairSampleSize {
  if (!Number.isFinite(estimate)) {
    throw new SampleSizeError(
      ErrorCode.DOMAIN_ERROR,
      'Sample size is not finite for these inputs',
      { estimate }
    );
  }

  return {
    controlSampleSize: ceilSamples(estimate),
    rawSampleSize: estimate,
    degreesOfFreedom: df,
    iterations,
    converged,
    warning,
  };
}
