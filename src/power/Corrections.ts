/**
 * Multiple-comparison corrections for alpha
 */

import { SampleSizeError, ErrorCode } from '../core/errors';
import type { CorrectionMethod } from '../domain/types';

/**
 * Family-wise alpha shrunk for nComparisons simultaneous tests
 *
 * - bonferroni: alpha / n
 * - sidak: 1 - (1 - alpha)^(1 / n)
 * - none: alpha
 *
 * The result lies in (0, alpha].
 */
export function applyCorrection(
  alpha: number,
  nComparisons: number,
  method: CorrectionMethod
): number {
  if (!(alpha > 0 && alpha < 1)) {
    throw new SampleSizeError(
      ErrorCode.INVALID_PARAMETER,
      `alpha must be between 0 and 1, got ${alpha}`,
      { alpha }
    );
  }
  if (!Number.isInteger(nComparisons) || nComparisons < 1) {
    throw new SampleSizeError(
      ErrorCode.INVALID_PARAMETER,
      `n_comparisons must be at least 1, got ${nComparisons}`,
      { nComparisons }
    );
  }

  switch (method) {
    case 'bonferroni':
      return alpha / nComparisons;
    case 'sidak':
      return 1 - Math.pow(1 - alpha, 1 / nComparisons);
    case 'none':
      return alpha;
  }
}
