/**
 * Student's t Distribution
 *
 * Central t with real-valued degrees of freedom. Welch–Satterthwaite degrees
 * of freedom are rarely integers, so non-integer values are accepted.
 */

import jStat from 'jstat';
import { SampleSizeError, ErrorCode } from '../errors';
import type { Distribution } from './Distribution';

export class StudentTDistribution implements Distribution {
  constructor(private readonly dofValue: number) {
    if (!(dofValue > 0) || Number.isNaN(dofValue)) {
      throw new SampleSizeError(
        ErrorCode.INVALID_PARAMETER,
        `Invalid Student t parameters: df=${dofValue}. Degrees of freedom must be positive.`,
        { df: dofValue }
      );
    }
  }

  quantile(p: number): number {
    if (p <= 0) return -Infinity;
    if (p >= 1) return Infinity;
    if (p === 0.5) return 0;

    return jStat.studentt.inv(p, this.dofValue);
  }
}
