/**
 * Critical Value Resolver
 *
 * Thresholds for the significance and power terms of the sizing formulas.
 * z and chi2 read the standard normal; t reads Student's t at the given
 * degrees of freedom, or the standard normal once df is past
 * NORMAL_APPROXIMATION_DF.
 */

import { NORMAL_APPROXIMATION_DF } from '../config/defaults';
import { STANDARD_NORMAL, StudentTDistribution } from '../core/distributions';
import type { Distribution } from '../core/distributions';
import { SampleSizeError, ErrorCode } from '../core/errors';
import type { Sides, TestType } from '../domain/types';

function distributionFor(testType: TestType, df?: number): Distribution {
  if (testType !== 't') {
    return STANDARD_NORMAL;
  }

  if (df === undefined || !(df > 0)) {
    throw new SampleSizeError(
      ErrorCode.INVALID_PARAMETER,
      `degrees of freedom must be positive for a t-test, got ${df}`,
      { df }
    );
  }

  if (df >= NORMAL_APPROXIMATION_DF) {
    return STANDARD_NORMAL;
  }

  return new StudentTDistribution(df);
}

/**
 * Upper critical value with tail probability alpha / sides beyond it
 *
 * @param alpha - Significance level, already corrected for multiple comparisons
 * @param df - Degrees of freedom, required for the t family
 */
export function criticalValue(alpha: number, sides: Sides, testType: TestType, df?: number): number {
  if (!(alpha > 0 && alpha < 1)) {
    throw new SampleSizeError(
      ErrorCode.INVALID_PARAMETER,
      `alpha must be between 0 and 1, got ${alpha}`,
      { alpha }
    );
  }
  if (sides !== 1 && sides !== 2) {
    throw new SampleSizeError(ErrorCode.INVALID_PARAMETER, `sides must be 1 or 2, got ${sides}`, {
      sides,
    });
  }

  const alphaTail = sides === 2 ? alpha / 2 : alpha;
  return distributionFor(testType, df).quantile(1 - alphaTail);
}

/**
 * Quantile at the requested power (negative when power < 0.5)
 */
export function powerQuantile(power: number, testType: TestType, df?: number): number {
  if (!(power > 0 && power < 1)) {
    throw new SampleSizeError(
      ErrorCode.INVALID_PARAMETER,
      `power must be between 0 and 1, got ${power}`,
      { power }
    );
  }

  return distributionFor(testType, df).quantile(power);
}
