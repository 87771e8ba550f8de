/**
 * Weighted Multi-Group Design Resolver
 *
 * Crosses every control with every treatment, sizes each pair at its own
 * traffic ratio and scales the whole design from the pair that needs the
 * most total traffic (the bottleneck). Every pair then meets the power target.
 */

import type { Logger } from 'pino';
import { SampleSizeError, ErrorCode } from '../core/errors';
import type {
  ConvergenceWarning,
  GroupAllocation,
  PairRequirement,
} from '../domain/results';
import { calculatePairSampleSize, ceilSamples } from './SinglePairCalculator';
import type { PairParameters } from './SinglePairCalculator';

export interface WeightedDesignParameters extends Omit<PairParameters, 'ratio' | 'label'> {
  nControls: number;
  nTreatments: number;
  /** One positive weight per group, controls first */
  weights: number[];
}

export interface WeightedDesignResolution {
  bottleneck: PairRequirement;
  pairs: PairRequirement[];
  groups: GroupAllocation[];
  /** Bottleneck base-unit requirement before per-group rounding */
  requiredTotal: number;
  totalSampleSize: number;
  shares: number[];
  warnings: ConvergenceWarning[];
}

export function pairLabel(controlIndex: number, treatmentIndex: number): string {
  return `C${controlIndex + 1} vs T${treatmentIndex + 1}`;
}

/**
 * Weights scaled to sum to 1
 */
export function normalizeWeights(weights: number[]): number[] {
  const total = weights.reduce((sum, w) => sum + w, 0);
  return weights.map((w) => w / total);
}

export function resolveWeightedDesign(
  params: WeightedDesignParameters,
  logger?: Logger
): WeightedDesignResolution {
  const { nControls, nTreatments, weights } = params;

  if (weights.length !== nControls + nTreatments) {
    throw new SampleSizeError(
      ErrorCode.INVALID_PARAMETER,
      `weights length (${weights.length}) must match n_controls + n_treatments (${nControls + nTreatments})`,
      { weights, nControls, nTreatments }
    );
  }
  if (weights.some((w) => !(w > 0) || !Number.isFinite(w))) {
    throw new SampleSizeError(ErrorCode.INVALID_PARAMETER, 'All weights must be positive', {
      weights,
    });
  }

  const shares = normalizeWeights(weights);
  const controlShares = shares.slice(0, nControls);
  const treatmentShares = shares.slice(nControls);

  const pairs: PairRequirement[] = [];
  const warnings: ConvergenceWarning[] = [];
  let bottleneck: PairRequirement | null = null;
  let requiredTotal = 0;

  for (let i = 0; i < controlShares.length; i++) {
    for (let j = 0; j < treatmentShares.length; j++) {
      const controlShare = controlShares[i];
      const treatmentShare = treatmentShares[j];
      const ratio = treatmentShare / controlShare;
      const label = pairLabel(i, j);
      const sized = calculatePairSampleSize({ ...params, ratio, label }, logger);
      const baseUnitRequirement = sized.controlSampleSize / controlShare;

      const requirement: PairRequirement = {
        controlIndex: i,
        treatmentIndex: j,
        label,
        ratio,
        controlWeight: controlShare,
        treatmentWeight: treatmentShare,
        controlSampleSize: sized.controlSampleSize,
        treatmentSampleSize: ceilSamples(sized.controlSampleSize * ratio),
        baseUnitRequirement,
        degreesOfFreedom: sized.degreesOfFreedom,
        iterations: sized.iterations,
        converged: sized.converged,
      };

      logger?.debug(
        { pair: label, ratio, controlSampleSize: requirement.controlSampleSize },
        'pair sized'
      );

      pairs.push(requirement);
      if (sized.warning) {
        warnings.push(sized.warning);
      }

      // Strict comparison keeps the earlier pair on ties
      if (bottleneck === null || baseUnitRequirement > requiredTotal) {
        bottleneck = requirement;
        requiredTotal = baseUnitRequirement;
      }
    }
  }

  if (bottleneck === null) {
    throw new SampleSizeError(ErrorCode.INTERNAL_ERROR, 'Weighted design produced no pairs', {
      nControls,
      nTreatments,
    });
  }

  const groups = shares.map((share, index): GroupAllocation => {
    const isControl = index < nControls;
    const roleIndex = isControl ? index : index - nControls;
    return {
      role: isControl ? 'control' : 'treatment',
      index: roleIndex,
      label: `${isControl ? 'Control' : 'Treatment'} ${roleIndex + 1}`,
      share,
      sampleSize: ceilSamples(requiredTotal * share),
    };
  });

  logger?.debug(
    { bottleneck: bottleneck.label, requiredTotal, pairs: pairs.length },
    'weighted design bottleneck selected'
  );

  return {
    bottleneck,
    pairs,
    groups,
    requiredTotal,
    totalSampleSize: groups.reduce((sum, group) => sum + group.sampleSize, 0),
    shares,
    warnings,
  };
}
