export { criticalValue, powerQuantile } from './CriticalValues';
export { applyCorrection } from './Corrections';
export {
  calculatePairSampleSize,
  ceilSamples,
  welchDegreesOfFreedom,
  pairDegreesOfFreedom,
  pairCriticalValues,
  proportionTerms,
} from './SinglePairCalculator';
export type { PairParameters, PairSampleSize } from './SinglePairCalculator';
export { resolveWeightedDesign, normalizeWeights, pairLabel } from './WeightedDesignResolver';
export type {
  WeightedDesignParameters,
  WeightedDesignResolution,
} from './WeightedDesignResolver';
export { resolveMde } from './ReverseResolver';
export type { ReverseParameters, ReverseResolution } from './ReverseResolver';
export {
  SampleSizeCalculator,
  calculateSampleSize,
  calculateMdeForSample,
  resolveDesign,
  resolveMdeDesign,
} from './SampleSizeCalculator';
export type { CalculatorDependencies } from './SampleSizeCalculator';
