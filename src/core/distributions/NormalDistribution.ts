/**
 * Normal Distribution
 * Quantile lookups backed by jstat
 */

import jStat from 'jstat';
import { SampleSizeError, ErrorCode } from '../errors';
import type { Distribution } from './Distribution';

export class NormalDistribution implements Distribution {
  constructor(
    private readonly meanValue: number = 0,
    private readonly stdDevValue: number = 1
  ) {
    if (!(stdDevValue > 0) || !Number.isFinite(stdDevValue)) {
      throw new SampleSizeError(
        ErrorCode.INVALID_PARAMETER,
        `Invalid Normal parameters: stdDev=${stdDevValue}. Standard deviation must be positive.`,
        { mean: meanValue, stdDev: stdDevValue }
      );
    }
  }

  quantile(p: number): number {
    if (p <= 0) return -Infinity;
    if (p >= 1) return Infinity;
    if (p === 0.5) return this.meanValue;

    return jStat.normal.inv(p, this.meanValue, this.stdDevValue);
  }
}

/**
 * Standard normal N(0, 1), shared by the critical value lookups
 */
export const STANDARD_NORMAL = new NormalDistribution(0, 1);
