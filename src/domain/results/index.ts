export type {
  ConvergenceWarning,
  PairRequirement,
  GroupAllocation,
  StandardSampleSizeResult,
  WeightedSampleSizeResult,
  SampleSizeResult,
  MdeResult,
} from './types';
