/**
 * Design Validator
 *
 * Checks a resolved design before any calculation starts. Every violated
 * rule is collected and reported in a single error, one message per line.
 */

import { SampleSizeError, ErrorCode } from '../../core/errors';
import type { ResolvedDesign, ResolvedMdeDesign } from '../types/design';

type CommonFields = Omit<ResolvedMdeDesign, 'sampleSizePerGroup' | 'direction'>;

export class DesignValidator {
  /**
   * Validate a forward-sizing design
   *
   * @throws SampleSizeError INVALID_PARAMETER listing every violated rule, or
   * DOMAIN_ERROR when the proportion target leaves (0, 1)
   */
  static validateDesign(design: ResolvedDesign): void {
    const errors = this.collectCommonErrors(design);

    if (design.mde === 0 || !Number.isFinite(design.mde)) {
      errors.push('mde cannot be zero');
    }

    if (!Number.isInteger(design.nControls) || design.nControls < 1) {
      errors.push(`n_controls must be at least 1, got ${design.nControls}`);
    }
    if (!Number.isInteger(design.nTreatments) || design.nTreatments < 1) {
      errors.push(`n_treatments must be at least 1, got ${design.nTreatments}`);
    }

    if (design.weights !== null) {
      const expected = design.nControls + design.nTreatments;
      if (design.weights.length !== expected) {
        errors.push(
          `weights length (${design.weights.length}) must match ` +
            `n_controls + n_treatments (${expected})`
        );
      }
      if (design.weights.some((w) => !(w > 0) || !Number.isFinite(w))) {
        errors.push('All weights must be positive');
      }
    }

    this.throwIfAny(errors, design);
    this.checkTarget(design);
  }

  /**
   * Validate a reverse-sizing design
   *
   * @throws SampleSizeError INVALID_PARAMETER listing every violated rule
   */
  static validateMdeDesign(design: ResolvedMdeDesign): void {
    const errors = this.collectCommonErrors(design);

    if (!Number.isInteger(design.sampleSizePerGroup) || design.sampleSizePerGroup < 2) {
      errors.push(
        `sample_size_per_group must be an integer of at least 2, got ${design.sampleSizePerGroup}`
      );
    }
    if (design.direction !== 'increase' && design.direction !== 'decrease') {
      errors.push(`direction must be 'increase' or 'decrease', got '${design.direction}'`);
    }

    this.throwIfAny(errors, design);
  }

  /**
   * Proportion targets must stay inside (0, 1)
   *
   * @throws SampleSizeError DOMAIN_ERROR
   */
  static checkTarget(design: ResolvedDesign): void {
    if (design.metricType !== 'proportion') {
      return;
    }

    const target = design.baseline + design.delta;
    if (!(target > 0 && target < 1)) {
      throw new SampleSizeError(
        ErrorCode.DOMAIN_ERROR,
        `Target rate ${target.toFixed(4)} is out of bounds (0, 1). Check your MDE value.`,
        { baseline: design.baseline, mde: design.mde, mdeType: design.mdeType, target }
      );
    }
  }

  /**
   * Rules shared by forward and reverse sizing
   */
  private static collectCommonErrors(design: CommonFields): string[] {
    const errors: string[] = [];

    if (!(design.alpha > 0 && design.alpha < 1)) {
      errors.push(`alpha must be between 0 and 1, got ${design.alpha}`);
    }
    if (!(design.power > 0 && design.power < 1)) {
      errors.push(`power must be between 0 and 1, got ${design.power}`);
    }
    if (design.sides !== 1 && design.sides !== 2) {
      errors.push(`sides must be 1 or 2, got ${design.sides}`);
    }

    if (design.metricType !== 'proportion' && design.metricType !== 'mean') {
      errors.push(`metric_type must be 'proportion' or 'mean', got '${design.metricType}'`);
    }
    if (!['z', 't', 'chi2'].includes(design.testType)) {
      errors.push(`test_type must be 'z', 't', or 'chi2', got '${design.testType}'`);
    }
    if (design.testType === 'chi2' && design.metricType === 'mean') {
      errors.push(
        "Chi-square test is only valid for proportions, not means. Use 'z' or 't' instead."
      );
    }

    if (design.metricType === 'proportion') {
      if (!(design.baseline > 0 && design.baseline < 1)) {
        errors.push(`For proportions, baseline must be between 0 and 1, got ${design.baseline}`);
      }
    } else if (!(design.baseline > 0) || !Number.isFinite(design.baseline)) {
      errors.push(`baseline must be positive, got ${design.baseline}`);
    }

    if (!(design.ratio > 0) || !Number.isFinite(design.ratio)) {
      errors.push(`ratio must be positive, got ${design.ratio}`);
    }

    if (design.metricType === 'mean') {
      if (design.stdDev === null) {
        errors.push("std_dev is required for metric_type='mean'");
      } else if (!(design.stdDev > 0)) {
        errors.push(`std_dev must be positive, got ${design.stdDev}`);
      }
      if (design.stdDev2 !== null && !(design.stdDev2 > 0)) {
        errors.push(`std_dev_2 must be positive, got ${design.stdDev2}`);
      }
    }

    if (!Number.isInteger(design.nComparisons) || design.nComparisons < 1) {
      errors.push(`n_comparisons must be at least 1, got ${design.nComparisons}`);
    }
    if (!['none', 'bonferroni', 'sidak'].includes(design.correction)) {
      errors.push(
        `correction must be 'bonferroni', 'sidak', or 'none', got '${design.correction}'`
      );
    }
    if (design.nullVariance !== 'baseline' && design.nullVariance !== 'pooled') {
      errors.push(`null_variance must be 'baseline' or 'pooled', got '${design.nullVariance}'`);
    }

    return errors;
  }

  private static throwIfAny(errors: string[], design: CommonFields): void {
    if (errors.length === 0) {
      return;
    }

    throw new SampleSizeError(ErrorCode.INVALID_PARAMETER, errors.join('\n'), {
      errors,
      metricType: design.metricType,
      testType: design.testType,
    });
  }
}
