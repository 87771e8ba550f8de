/**
 * Default Configuration Constants
 *
 * Every default and iteration bound used by the engine and the front ends.
 */

/**
 * Design defaults applied when a caller leaves a field out
 */
export const SIZING_DEFAULTS = {
  /** Statistical power (1 - beta) */
  POWER: 0.8,

  /** Significance level before correction */
  ALPHA: 0.05,

  MDE_TYPE: 'absolute',
  METRIC_TYPE: 'proportion',
  TEST_TYPE: 'z',

  /** Two-sided tests split alpha across both tails */
  SIDES: 2,

  /** Treatment / control size ratio for unweighted designs */
  RATIO: 1,

  N_CONTROLS: 1,
  N_TREATMENTS: 1,
  CORRECTION: 'none',

  /** Null-hypothesis variance of the two-proportion test */
  NULL_VARIANCE: 'baseline',
} as const;

/**
 * T-test fixed-point iteration between sample size and degrees of freedom
 */
export const T_TEST_CONVERGENCE = {
  /** Stop once the estimate moves by less than this many samples */
  THRESHOLD: 0.1,

  /** Hard cap; reaching it yields a convergence warning, not an error */
  MAX_ITERATIONS: 50,
} as const;

/**
 * Degrees of freedom above which t critical values are read from the standard
 * normal. The two agree to about 1e-7 here, and jstat's t quantile loses
 * accuracy further out.
 */
export const NORMAL_APPROXIMATION_DF = 1e7;

/**
 * Bisection used when inverting the pooled-variance proportion formula
 */
export const REVERSE_SEARCH = {
  MAX_STEPS: 200,

  /** Stop once the bracket is narrower than this absolute effect */
  TOLERANCE: 1e-12,
} as const;

/**
 * Slack subtracted before rounding up, so that a value such as
 * 4913.000000000001 produced by weight scaling stays 4913
 */
export const CEILING_EPSILON = 1e-9;

export const DEFAULT_LOG_LEVEL = 'warn';
