/**
 * ab-sample-size - sample size and minimum detectable effect planning for
 * A/B experiments
 *
 * Sizes proportion and mean metrics with z, t (including Welch) and
 * chi-square tests, multiple-comparison corrections, and weighted designs
 * with several controls and treatments.
 */

// Engine
export {
  SampleSizeCalculator,
  calculateSampleSize,
  calculateMdeForSample,
  resolveDesign,
  resolveMdeDesign,
  criticalValue,
  powerQuantile,
  applyCorrection,
  calculatePairSampleSize,
  ceilSamples,
  welchDegreesOfFreedom,
  resolveWeightedDesign,
  normalizeWeights,
  resolveMde,
} from './power';
export type {
  CalculatorDependencies,
  PairParameters,
  PairSampleSize,
  WeightedDesignParameters,
  WeightedDesignResolution,
  ReverseParameters,
  ReverseResolution,
} from './power';

// Distributions
export { NormalDistribution, StudentTDistribution, STANDARD_NORMAL } from './core/distributions';
export type { Distribution } from './core/distributions';

// Error handling
export { SampleSizeError, ErrorCode, isSampleSizeError, wrapError } from './core/errors';

// Validation
export { DesignValidator } from './domain/validation';

// Reports
export { formatReport, formatMdeReport, formatResultSummary } from './report';

// Configuration and logging
export { loadConfig, getConfig, resetConfig, SIZING_DEFAULTS } from './config';
export type { RuntimeConfig, LogLevel } from './config';
export { createLogger } from './core/utils/logger';
export type { Logger, LoggerOptions } from './core/utils/logger';

// Types
export type * from './domain/types';
export type * from './domain/results';

export { VERSION } from './version';
