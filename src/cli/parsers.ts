/**
 * Option parsing
 *
 * Commander hands every option over as a string; these schemas coerce them
 * to engine inputs and report bad values by flag name.
 */

import { z } from 'zod';
import { SampleSizeError, ErrorCode } from '../core/errors';
import type { RuntimeConfig } from '../config';
import type { DesignSpecification, MdeSpecification, Sides } from '../domain/types';

const numeric = z.coerce.number().finite();
const integer = z.coerce.number().int();

const SharedOptionsSchema = z.object({
  baseline: numeric.optional(),
  metricType: z.enum(['proportion', 'mean']).optional(),
  power: numeric.optional(),
  alpha: numeric.optional(),
  sides: z
    .enum(['1', '2'])
    .transform((value): Sides => (value === '1' ? 1 : 2))
    .optional(),
  testType: z.enum(['z', 't', 'chi2']).optional(),
  stdDev: numeric.optional(),
  stdDev2: numeric.optional(),
  ratio: numeric.optional(),
  nComparisons: integer.optional(),
  correction: z.enum(['none', 'bonferroni', 'sidak']).optional(),
  pooled: z.boolean().optional(),
  json: z.boolean().optional(),
});

export const SizeOptionsSchema = SharedOptionsSchema.extend({
  mde: numeric.optional(),
  type: z.enum(['absolute', 'relative']).optional(),
  nControls: integer.optional(),
  nTreatments: integer.optional(),
  weights: z.string().optional(),
  interactive: z.boolean().optional(),
});

export const MdeOptionsSchema = SharedOptionsSchema.extend({
  sampleSize: integer.optional(),
  direction: z.enum(['increase', 'decrease']).optional(),
});

export type SizeOptions = z.infer<typeof SizeOptionsSchema>;
export type MdeOptions = z.infer<typeof MdeOptionsSchema>;

/**
 * camelCase option key back to its flag: stdDev2 -> --std-dev-2
 */
export function toFlag(key: string): string {
  const kebab = key
    .replace(/([A-Z])/g, '-$1')
    .replace(/([a-z])(\d)/g, '$1-$2')
    .toLowerCase();
  return `--${kebab}`;
}

function parseWith<T extends z.ZodTypeAny>(schema: T, raw: unknown): z.output<T> {
  const parsed = schema.safeParse(raw);
  if (parsed.success) {
    return parsed.data;
  }

  const errors = parsed.error.issues.map(
    (issue) => `${toFlag(String(issue.path[0]))}: ${issue.message}`
  );
  throw new SampleSizeError(ErrorCode.INVALID_INPUT, errors.join('\n'), { errors });
}

export function parseSizeOptions(raw: unknown): SizeOptions {
  return parseWith(SizeOptionsSchema, raw);
}

export function parseMdeOptions(raw: unknown): MdeOptions {
  return parseWith(MdeOptionsSchema, raw);
}

/**
 * Traffic weights separated by commas and/or whitespace: "35,15,20" or "50 50"
 *
 * @throws SampleSizeError INVALID_INPUT for empty or non-numeric entries
 */
export function parseWeights(input: string): number[] {
  const parts = input
    .trim()
    .split(/[\s,]+/)
    .filter((part) => part.length > 0);
  const weights = parts.map(Number);

  if (weights.length === 0 || weights.some((w) => !Number.isFinite(w))) {
    throw new SampleSizeError(ErrorCode.INVALID_INPUT, `Invalid weights format: ${input}`, {
      input,
    });
  }
  return weights;
}

function requireValue(value: number | undefined, message: string): number {
  if (value === undefined) {
    throw new SampleSizeError(ErrorCode.INVALID_INPUT, message);
  }
  return value;
}

/**
 * Forward-sizing input from parsed options; unset statistical parameters
 * take the configured defaults
 */
export function toDesignSpecification(
  options: SizeOptions,
  config: RuntimeConfig
): DesignSpecification {
  const message = '--baseline and --mde are required (or use --interactive)';
  const weights = options.weights !== undefined ? parseWeights(options.weights) : undefined;
  const nControls = options.nControls ?? 1;
  // Weights without a treatment count give every group after the controls to treatments
  const nTreatments =
    options.nTreatments ?? (weights ? Math.max(weights.length - nControls, 1) : 1);

  const spec: DesignSpecification = {
    baseline: requireValue(options.baseline, message),
    mde: requireValue(options.mde, message),
    mdeType: options.type ?? 'absolute',
    metricType: options.metricType ?? 'proportion',
    power: options.power ?? config.defaultPower,
    alpha: options.alpha ?? config.defaultAlpha,
    sides: options.sides ?? config.defaultSides,
    testType: options.testType ?? config.defaultTestType,
    ratio: options.ratio ?? 1,
    nControls,
    nTreatments,
    correction: options.correction ?? 'none',
    nullVariance: options.pooled ? 'pooled' : 'baseline',
  };

  if (options.stdDev !== undefined) spec.stdDev = options.stdDev;
  if (options.stdDev2 !== undefined) spec.stdDev2 = options.stdDev2;
  if (options.nComparisons !== undefined) spec.nComparisons = options.nComparisons;
  if (weights !== undefined) spec.weights = weights;

  return spec;
}

/**
 * Reverse-sizing input from parsed options
 */
export function toMdeSpecification(options: MdeOptions, config: RuntimeConfig): MdeSpecification {
  const message = '--baseline and --sample-size are required';
  const spec: MdeSpecification = {
    baseline: requireValue(options.baseline, message),
    sampleSizePerGroup: requireValue(options.sampleSize, message),
    direction: options.direction ?? 'increase',
    metricType: options.metricType ?? 'proportion',
    power: options.power ?? config.defaultPower,
    alpha: options.alpha ?? config.defaultAlpha,
    sides: options.sides ?? config.defaultSides,
    testType: options.testType ?? config.defaultTestType,
    ratio: options.ratio ?? 1,
    correction: options.correction ?? 'none',
    nullVariance: options.pooled ? 'pooled' : 'baseline',
  };

  if (options.stdDev !== undefined) spec.stdDev = options.stdDev;
  if (options.stdDev2 !== undefined) spec.stdDev2 = options.stdDev2;
  if (options.nComparisons !== undefined) spec.nComparisons = options.nComparisons;

  return spec;
}
