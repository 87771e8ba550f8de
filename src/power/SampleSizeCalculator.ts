/**
 * Sample Size Calculator
 *
 * Entry points of the engine:
 * - calculateSampleSize: effect size in, sample size out
 * - calculateMdeForSample: sample size in, minimum detectable effect out
 *
 * Both fill defaults, validate the whole design before computing anything,
 * correct alpha for multiple comparisons and dispatch to the pair, weighted
 * or reverse resolvers.
 */

import type { Logger } from 'pino';
import { SIZING_DEFAULTS } from '../config/defaults';
import { getDefaultLogger } from '../core/utils/logger';
import type {
  ConvergenceWarning,
  GroupAllocation,
  MdeResult,
  PairRequirement,
  SampleSizeResult,
  StandardSampleSizeResult,
  WeightedSampleSizeResult,
} from '../domain/results';
import type {
  DesignSpecification,
  MdeSpecification,
  ResolvedDesign,
  ResolvedMdeDesign,
} from '../domain/types';
import { DesignValidator } from '../domain/validation';
import { applyCorrection } from './Corrections';
import { resolveMde } from './ReverseResolver';
import { calculatePairSampleSize, ceilSamples } from './SinglePairCalculator';
import { pairLabel, resolveWeightedDesign } from './WeightedDesignResolver';

export interface CalculatorDependencies {
  logger?: Logger;
}

/**
 * Apply defaults and convert the effect to raw units
 */
export function resolveDesign(spec: DesignSpecification): ResolvedDesign {
  const nControls = spec.nControls ?? SIZING_DEFAULTS.N_CONTROLS;
  const nTreatments = spec.nTreatments ?? SIZING_DEFAULTS.N_TREATMENTS;
  const mdeType = spec.mdeType ?? SIZING_DEFAULTS.MDE_TYPE;

  return {
    baseline: spec.baseline,
    mde: spec.mde,
    mdeType,
    delta: mdeType === 'relative' ? spec.baseline * spec.mde : spec.mde,
    metricType: spec.metricType ?? SIZING_DEFAULTS.METRIC_TYPE,
    stdDev: spec.stdDev ?? null,
    stdDev2: spec.stdDev2 ?? null,
    power: spec.power ?? SIZING_DEFAULTS.POWER,
    alpha: spec.alpha ?? SIZING_DEFAULTS.ALPHA,
    sides: spec.sides ?? SIZING_DEFAULTS.SIDES,
    testType: spec.testType ?? SIZING_DEFAULTS.TEST_TYPE,
    ratio: spec.ratio ?? SIZING_DEFAULTS.RATIO,
    correction: spec.correction ?? SIZING_DEFAULTS.CORRECTION,
    nComparisons: spec.nComparisons ?? nControls * nTreatments,
    nControls,
    nTreatments,
    weights: spec.weights ? [...spec.weights] : null,
    nullVariance: spec.nullVariance ?? SIZING_DEFAULTS.NULL_VARIANCE,
  };
}

/**
 * Apply defaults to a reverse-sizing specification
 */
export function resolveMdeDesign(spec: MdeSpecification): ResolvedMdeDesign {
  return {
    baseline: spec.baseline,
    sampleSizePerGroup: spec.sampleSizePerGroup,
    direction: spec.direction ?? 'increase',
    metricType: spec.metricType ?? SIZING_DEFAULTS.METRIC_TYPE,
    stdDev: spec.stdDev ?? null,
    stdDev2: spec.stdDev2 ?? null,
    power: spec.power ?? SIZING_DEFAULTS.POWER,
    alpha: spec.alpha ?? SIZING_DEFAULTS.ALPHA,
    sides: spec.sides ?? SIZING_DEFAULTS.SIDES,
    testType: spec.testType ?? SIZING_DEFAULTS.TEST_TYPE,
    ratio: spec.ratio ?? SIZING_DEFAULTS.RATIO,
    correction: spec.correction ?? SIZING_DEFAULTS.CORRECTION,
    nComparisons: spec.nComparisons ?? 1,
    nullVariance: spec.nullVariance ?? SIZING_DEFAULTS.NULL_VARIANCE,
  };
}

export class SampleSizeCalculator {
  private readonly logger: Logger;

  constructor(dependencies: CalculatorDependencies = {}) {
    this.logger = dependencies.logger ?? getDefaultLogger();
  }

  /**
   * Required sample size for the design
   *
   * @example
   * ```typescript
   * const result = new SampleSizeCalculator().calculateSampleSize({ baseline: 0.1, mde: 0.02 });
   * result.sampleSizePerVariant; // 3623
   * ```
   */
  calculateSampleSize(spec: DesignSpecification): SampleSizeResult {
    const design = resolveDesign(spec);
    DesignValidator.validateDesign(design);

    const alphaCorrected = applyCorrection(design.alpha, design.nComparisons, design.correction);

    this.logger.debug(
      {
        metricType: design.metricType,
        testType: design.testType,
        delta: design.delta,
        alphaCorrected,
        groups: design.nControls + design.nTreatments,
      },
      'sizing design'
    );

    if (design.weights !== null) {
      return this.sizeWeightedDesign(design, design.weights, alphaCorrected);
    }
    return this.sizeStandardDesign(design, alphaCorrected);
  }

  /**
   * Minimum detectable effect for a fixed control group size
   */
  calculateMdeForSample(spec: MdeSpecification): MdeResult {
    const design = resolveMdeDesign(spec);
    DesignValidator.validateMdeDesign(design);

    const alphaCorrected = applyCorrection(design.alpha, design.nComparisons, design.correction);
    const resolution = resolveMde(
      {
        baseline: design.baseline,
        sampleSize: design.sampleSizePerGroup,
        power: design.power,
        alpha: alphaCorrected,
        ratio: design.ratio,
        metricType: design.metricType,
        stdDev: design.stdDev,
        stdDev2: design.stdDev2,
        testType: design.testType,
        sides: design.sides,
        nullVariance: design.nullVariance,
        direction: design.direction,
      },
      this.logger
    );

    const sampleSizeTreatment = ceilSamples(design.sampleSizePerGroup * design.ratio);

    return {
      ...resolution,
      baseline: design.baseline,
      direction: design.direction,
      sampleSizePerGroup: design.sampleSizePerGroup,
      sampleSizeTreatment,
      totalSampleSize: design.sampleSizePerGroup + sampleSizeTreatment,
      ratio: design.ratio,
      alpha: design.alpha,
      alphaCorrected,
      correction: design.correction,
      nComparisons: design.nComparisons,
      power: design.power,
      sides: design.sides,
      metricType: design.metricType,
      testType: design.testType,
      welch: isWelch(design),
      stdDevControl: design.metricType === 'mean' ? design.stdDev : null,
      stdDevTreatment: design.metricType === 'mean' ? design.stdDev2 ?? design.stdDev : null,
      nullVariance: design.nullVariance,
    };
  }

  private sizeStandardDesign(
    design: ResolvedDesign,
    alphaCorrected: number
  ): StandardSampleSizeResult {
    const label = pairLabel(0, 0);
    const sized = calculatePairSampleSize(
      { ...design, alpha: alphaCorrected, label },
      this.logger
    );

    const n1 = sized.controlSampleSize;
    const n2 = ceilSamples(n1 * design.ratio);

    const pair: PairRequirement = {
      controlIndex: 0,
      treatmentIndex: 0,
      label,
      ratio: design.ratio,
      controlWeight: null,
      treatmentWeight: null,
      controlSampleSize: n1,
      treatmentSampleSize: n2,
      baseUnitRequirement: null,
      degreesOfFreedom: sized.degreesOfFreedom,
      iterations: sized.iterations,
      converged: sized.converged,
    };

    const groups: GroupAllocation[] = [
      ...roleGroups('control', design.nControls, n1),
      ...roleGroups('treatment', design.nTreatments, n2),
    ];
    const warnings: ConvergenceWarning[] = sized.warning ? [sized.warning] : [];

    return {
      design: 'standard',
      ...this.commonFields(design, alphaCorrected, warnings),
      sampleSizePerVariant: n1,
      sampleSizeControl: n1,
      sampleSizeTreatment: n2,
      totalSampleSize: n1 * design.nControls + n2 * design.nTreatments,
      controlSampleSizeTotal: n1 * design.nControls,
      treatmentSampleSizeTotal: n2 * design.nTreatments,
      groups,
      pairs: [pair],
      ratio: design.ratio,
      weights: null,
      bottleneck: null,
    };
  }

  private sizeWeightedDesign(
    design: ResolvedDesign,
    weights: number[],
    alphaCorrected: number
  ): WeightedSampleSizeResult {
    const resolution = resolveWeightedDesign(
      { ...design, weights, alpha: alphaCorrected },
      this.logger
    );

    const { requiredTotal, shares } = resolution;
    const controlShare = shares.slice(0, design.nControls).reduce((sum, s) => sum + s, 0);
    const treatmentShare = shares.slice(design.nControls).reduce((sum, s) => sum + s, 0);
    const controlTotal = sumSizes(resolution.groups, 'control');
    const treatmentTotal = sumSizes(resolution.groups, 'treatment');

    return {
      design: 'weighted',
      ...this.commonFields(design, alphaCorrected, resolution.warnings),
      sampleSizePerVariant: ceilSamples(requiredTotal / (design.nControls + design.nTreatments)),
      sampleSizeControl: ceilSamples((requiredTotal * controlShare) / design.nControls),
      sampleSizeTreatment: ceilSamples((requiredTotal * treatmentShare) / design.nTreatments),
      totalSampleSize: resolution.totalSampleSize,
      controlSampleSizeTotal: controlTotal,
      treatmentSampleSizeTotal: treatmentTotal,
      groups: resolution.groups,
      pairs: resolution.pairs,
      ratio: resolution.bottleneck.ratio,
      weights: [...weights],
      bottleneck: resolution.bottleneck,
    };
  }

  private commonFields(
    design: ResolvedDesign,
    alphaCorrected: number,
    warnings: ConvergenceWarning[]
  ) {
    return {
      nControls: design.nControls,
      nTreatments: design.nTreatments,
      baseline: design.baseline,
      mde: design.mde,
      mdeType: design.mdeType,
      absoluteEffect: design.delta,
      relativeEffect: design.delta / design.baseline,
      targetValue: design.baseline + design.delta,
      alpha: design.alpha,
      alphaCorrected,
      correction: design.correction,
      nComparisons: design.nComparisons,
      power: design.power,
      sides: design.sides,
      metricType: design.metricType,
      testType: design.testType,
      welch: isWelch(design),
      stdDevControl: design.metricType === 'mean' ? design.stdDev : null,
      stdDevTreatment: design.metricType === 'mean' ? design.stdDev2 ?? design.stdDev : null,
      nullVariance: design.nullVariance,
      warnings,
    };
  }
}

function isWelch(design: Pick<ResolvedDesign, 'metricType' | 'testType' | 'stdDev2'>): boolean {
  return design.metricType === 'mean' && design.testType === 't' && design.stdDev2 !== null;
}

function roleGroups(
  role: GroupAllocation['role'],
  count: number,
  sampleSize: number
): GroupAllocation[] {
  const name = role === 'control' ? 'Control' : 'Treatment';
  return Array.from({ length: count }, (_, index) => ({
    role,
    index,
    label: `${name} ${index + 1}`,
    share: null,
    sampleSize,
  }));
}

function sumSizes(groups: GroupAllocation[], role: GroupAllocation['role']): number {
  return groups
    .filter((group) => group.role === role)
    .reduce((sum, group) => sum + group.sampleSize, 0);
}

/**
 * Required sample size for the design
 */
export function calculateSampleSize(
  spec: DesignSpecification,
  dependencies: CalculatorDependencies = {}
): SampleSizeResult {
  return new SampleSizeCalculator(dependencies).calculateSampleSize(spec);
}

/**
 * Minimum detectable effect for a fixed control group size
 */
export function calculateMdeForSample(
  spec: MdeSpecification,
  dependencies: CalculatorDependencies = {}
): MdeResult {
  return new SampleSizeCalculator(dependencies).calculateMdeForSample(spec);
}
