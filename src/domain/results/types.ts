/**
 * Result structures returned by the calculation engine
 *
 * Plain value objects built once per call. The report formatter reads them
 * verbatim and never recomputes a size.
 */

import type {
  CorrectionMethod,
  EffectDirection,
  MdeType,
  MetricType,
  NullVariance,
  Sides,
  TestType,
} from '../types/design';

/**
 * Non-fatal notice that the t-test iteration hit its cap.
 * The accompanying estimate is the larger of the last two computed.
 */
export interface ConvergenceWarning {
  readonly code: 'CONVERGENCE_WARNING';
  readonly message: string;
  /** Iterations performed */
  readonly iterations: number;
  /** Movement of the estimate in the final iteration */
  readonly lastChange: number;
  /** Unrounded estimate returned */
  readonly estimate: number;
  /** Pair label for multi-pair designs */
  readonly pair?: string;
}

/**
 * Requirement of one control/treatment pair
 */
export interface PairRequirement {
  /** 0-based index among the controls */
  readonly controlIndex: number;
  /** 0-based index among the treatments */
  readonly treatmentIndex: number;
  /** "C1 vs T1" */
  readonly label: string;
  /** Treatment / control size ratio of this pair */
  readonly ratio: number;
  /** Normalized traffic shares, null for unweighted designs */
  readonly controlWeight: number | null;
  readonly treatmentWeight: number | null;
  /** Rounded-up control size this pair needs on its own */
  readonly controlSampleSize: number;
  /** Rounded-up treatment size this pair needs on its own */
  readonly treatmentSampleSize: number;
  /**
   * Total enrolment at which this pair's control reaches controlSampleSize
   * (controlSampleSize / controlWeight); null for unweighted designs
   */
  readonly baseUnitRequirement: number | null;
  /** Final degrees of freedom for t-tests, null otherwise */
  readonly degreesOfFreedom: number | null;
  readonly iterations: number;
  readonly converged: boolean;
}

export interface GroupAllocation {
  readonly role: 'control' | 'treatment';
  /** 0-based index within the role */
  readonly index: number;
  /** "Control 1", "Treatment 2" */
  readonly label: string;
  /** Normalized traffic share, null for unweighted designs */
  readonly share: number | null;
  readonly sampleSize: number;
}

interface SampleSizeResultBase {
  /** Control group size (standard) or total / group count (weighted) */
  readonly sampleSizePerVariant: number;
  /** Size of each control group (weighted: mean over controls) */
  readonly sampleSizeControl: number;
  /** Size of each treatment group (weighted: mean over treatments) */
  readonly sampleSizeTreatment: number;
  readonly totalSampleSize: number;
  readonly controlSampleSizeTotal: number;
  readonly treatmentSampleSizeTotal: number;
  readonly groups: GroupAllocation[];
  readonly pairs: PairRequirement[];

  readonly nControls: number;
  readonly nTreatments: number;
  readonly baseline: number;
  readonly mde: number;
  readonly mdeType: MdeType;
  /** Effect in raw units */
  readonly absoluteEffect: number;
  /** Effect as a fraction of baseline */
  readonly relativeEffect: number;
  /** baseline + absoluteEffect */
  readonly targetValue: number;
  readonly alpha: number;
  readonly alphaCorrected: number;
  readonly correction: CorrectionMethod;
  readonly nComparisons: number;
  readonly power: number;
  readonly sides: Sides;
  readonly metricType: MetricType;
  readonly testType: TestType;
  /** True when a t-test runs with two standard deviations */
  readonly welch: boolean;
  readonly stdDevControl: number | null;
  readonly stdDevTreatment: number | null;
  /** Design ratio (standard) or the bottleneck pair's ratio (weighted) */
  readonly ratio: number;
  readonly nullVariance: NullVariance;
  readonly warnings: ConvergenceWarning[];
}

export interface StandardSampleSizeResult extends SampleSizeResultBase {
  readonly design: 'standard';
  readonly weights: null;
  readonly bottleneck: null;
}

export interface WeightedSampleSizeResult extends SampleSizeResultBase {
  readonly design: 'weighted';
  /** Weights as supplied */
  readonly weights: number[];
  /** Pair with the largest base-unit requirement */
  readonly bottleneck: PairRequirement;
}

export type SampleSizeResult = StandardSampleSizeResult | WeightedSampleSizeResult;

/**
 * Reverse sizing result: the smallest effect the fixed sample can detect
 */
export interface MdeResult {
  /** Signed effect in raw units (negative for direction 'decrease') */
  readonly absoluteMde: number;
  /** absoluteMde / baseline */
  readonly relativeMde: number;
  /** baseline + absoluteMde */
  readonly targetValue: number;
  readonly baseline: number;
  readonly direction: EffectDirection;
  /** Control group size, as supplied */
  readonly sampleSizePerGroup: number;
  readonly sampleSizeTreatment: number;
  readonly totalSampleSize: number;
  readonly ratio: number;
  readonly alpha: number;
  readonly alphaCorrected: number;
  readonly correction: CorrectionMethod;
  readonly nComparisons: number;
  readonly power: number;
  readonly sides: Sides;
  readonly metricType: MetricType;
  readonly testType: TestType;
  readonly welch: boolean;
  readonly stdDevControl: number | null;
  readonly stdDevTreatment: number | null;
  readonly nullVariance: NullVariance;
  readonly degreesOfFreedom: number | null;
}
