/**
 * Design Specification
 *
 * Inputs to the forward (sample size) and reverse (MDE) calculations.
 */

export type MetricType = 'proportion' | 'mean';

/**
 * z: normal approximation
 * t: Student t with sample size / degrees of freedom iteration
 * chi2: accepted for proportions and computed with the normal approximation
 */
export type TestType = 'z' | 't' | 'chi2';

export type MdeType = 'absolute' | 'relative';

export type CorrectionMethod = 'none' | 'bonferroni' | 'sidak';

export type Sides = 1 | 2;

/**
 * Null-hypothesis variance of the two-proportion test
 * - baseline: p1(1 - p1), both groups at the baseline rate
 * - pooled: p̄(1 - p̄) with p̄ the size-weighted mean of both rates
 */
export type NullVariance = 'baseline' | 'pooled';

/**
 * Direction of the effect solved for in reverse sizing
 */
export type EffectDirection = 'increase' | 'decrease';

/**
 * Fields shared by forward and reverse sizing
 */
interface DesignCommon {
  /** Current value of the metric (a rate in (0, 1) for proportions) */
  baseline: number;
  metricType?: MetricType;
  /** Control group standard deviation, required for means */
  stdDev?: number;
  /** Treatment group standard deviation; selects Welch's test for t-tests */
  stdDev2?: number;
  power?: number;
  alpha?: number;
  sides?: Sides;
  testType?: TestType;
  /** Treatment / control size ratio */
  ratio?: number;
  correction?: CorrectionMethod;
  /** Simultaneous comparisons for the correction; defaults to controls × treatments */
  nComparisons?: number;
  nullVariance?: NullVariance;
}

/**
 * Forward sizing input: effect size in, sample size out
 */
export interface DesignSpecification extends DesignCommon {
  /** Minimum detectable effect, raw units or fraction of baseline */
  mde: number;
  mdeType?: MdeType;
  nControls?: number;
  nTreatments?: number;
  /** Traffic weights for every group, controls first: [C1, C2, ..., T1, T2, ...] */
  weights?: number[];
}

/**
 * Reverse sizing input: sample size in, detectable effect out
 */
export interface MdeSpecification extends DesignCommon {
  /** Control group size, an integer >= 2 */
  sampleSizePerGroup: number;
  direction?: EffectDirection;
}

/**
 * DesignSpecification with every default applied and the effect in raw units
 */
export interface ResolvedDesign {
  baseline: number;
  mde: number;
  mdeType: MdeType;
  /** Effect in raw units: mde, or baseline × mde when relative */
  delta: number;
  metricType: MetricType;
  stdDev: number | null;
  stdDev2: number | null;
  power: number;
  alpha: number;
  sides: Sides;
  testType: TestType;
  ratio: number;
  correction: CorrectionMethod;
  nComparisons: number;
  nControls: number;
  nTreatments: number;
  weights: number[] | null;
  nullVariance: NullVariance;
}

/**
 * MdeSpecification with every default applied
 */
export interface ResolvedMdeDesign {
  baseline: number;
  sampleSizePerGroup: number;
  direction: EffectDirection;
  metricType: MetricType;
  stdDev: number | null;
  stdDev2: number | null;
  power: number;
  alpha: number;
  sides: Sides;
  testType: TestType;
  ratio: number;
  correction: CorrectionMethod;
  nComparisons: number;
  nullVariance: NullVariance;
}
