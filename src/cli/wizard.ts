/**
 * Interactive wizard
 *
 * Walks through a test design one question at a time. Enter accepts the
 * [default]; invalid answers are asked again.
 */

import { ErrorCode, SampleSizeError, isSampleSizeError } from '../core/errors';
import type { RuntimeConfig } from '../config';
import type {
  CorrectionMethod,
  DesignSpecification,
  MdeType,
  MetricType,
  Sides,
} from '../domain/types';
import { Formatters } from '../report';
import { parseWeights } from './parsers';
import type { Prompter } from './prompter';

interface QuestionOptions {
  defaultValue?: string;
  example?: string;
  required?: boolean;
}

class Wizard {
  constructor(private readonly prompter: Prompter) {}

  private async ask(text: string, options: QuestionOptions = {}): Promise<string | null> {
    const hint =
      options.defaultValue !== undefined
        ? ` [default: ${options.defaultValue}]`
        : options.example !== undefined
          ? ` [e.g. ${options.example}]`
          : '';

    for (;;) {
      const answer = await this.prompter.ask(`${text}${hint}: `);
      if (answer === null) {
        throw new SampleSizeError(ErrorCode.CANCELLED, 'Cancelled.');
      }

      const trimmed = answer.trim();
      if (trimmed) {
        return trimmed;
      }
      if (options.defaultValue !== undefined) {
        return options.defaultValue;
      }
      if (options.required === false) {
        return null;
      }
      this.prompter.print('   This field is required.');
    }
  }

  async choice<T extends string>(
    text: string,
    choices: readonly T[],
    defaultValue: T,
    aliases: Record<string, T> = {}
  ): Promise<T> {
    for (;;) {
      const raw = (await this.ask(text, { defaultValue })) ?? defaultValue;
      const normalized = raw.toLowerCase();
      const value = aliases[normalized] ?? normalized;
      const match = choices.find((candidate) => candidate === value);
      if (match !== undefined) {
        return match;
      }
      this.prompter.print(`   Invalid choice. Options: ${choices.join(', ')}`);
    }
  }

  async number(
    text: string,
    options: QuestionOptions & { integer?: boolean } = {}
  ): Promise<number> {
    const value = await this.optionalNumber(text, { ...options, required: true });
    if (value === null) {
      throw new SampleSizeError(ErrorCode.INTERNAL_ERROR, `No value for required field: ${text}`);
    }
    return value;
  }

  async optionalNumber(
    text: string,
    options: QuestionOptions & { integer?: boolean } = {}
  ): Promise<number | null> {
    for (;;) {
      const raw = await this.ask(text, options);
      if (raw === null) {
        return null;
      }
      // Comma decimal separator: "0,05"
      const value = Number(raw.replace(',', '.'));
      if (Number.isFinite(value) && (!options.integer || Number.isInteger(value))) {
        return value;
      }
      this.prompter.print(`   Invalid format. Expected ${options.integer ? 'integer' : 'number'}.`);
    }
  }

  async text(text: string, options: QuestionOptions = {}): Promise<string> {
    const value = await this.ask(text, { ...options, required: true });
    if (value === null) {
      throw new SampleSizeError(ErrorCode.INTERNAL_ERROR, `No value for required field: ${text}`);
    }
    return value;
  }

  print(...lines: string[]): void {
    for (const line of lines) {
      this.prompter.print(line);
    }
  }
}

/**
 * Run the wizard and return the design it collected
 *
 * @throws SampleSizeError CANCELLED when input ends before the last answer
 */
export async function runWizard(
  prompter: Prompter,
  config: RuntimeConfig
): Promise<DesignSpecification> {
  const w = new Wizard(prompter);

  w.print('='.repeat(50), '       A/B Test Sample Size Calculator', '='.repeat(50));
  w.print('Press Enter to accept [default] values.', '');

  w.print(
    'STEP 1: What metric are you testing?',
    '   - proportion: Conversion rate, CTR, signup rate (values 0-1)',
    '   - mean: Revenue, time on page, order value (any number)'
  );
  const metricType: MetricType = await w.choice(
    'Metric type (proportion/mean)',
    ['proportion', 'mean'],
    'proportion',
    { p: 'proportion', m: 'mean' }
  );
  const proportion = metricType === 'proportion';

  w.print('', 'STEP 2: What is your current metric value?');
  if (proportion) {
    w.print('   Enter as decimal (0.10 = 10%, 0.05 = 5%)');
  }
  const baseline = await w.number(proportion ? 'Current conversion rate' : 'Current average value', {
    example: proportion ? '0.10' : '100',
  });

  w.print('', 'STEP 3: What is the minimum change you want to detect (MDE)?');
  w.print(
    proportion
      ? '   Absolute: Enter the percentage point difference (10% -> 12% is 0.02)'
      : '   Enter the absolute difference you want to detect'
  );
  const mde = await w.number('Minimum detectable effect', { example: proportion ? '0.02' : '5' });

  w.print(
    '',
    'MDE type:',
    '   - absolute: Change in units (e.g., +2 percentage points)',
    '   - relative: Change in percent (e.g., +10% of baseline)'
  );
  const mdeType: MdeType = await w.choice(
    'MDE type (absolute/relative)',
    ['absolute', 'relative'],
    'absolute',
    { a: 'absolute', r: 'relative' }
  );

  let step = 4;
  let stdDev: number | null = null;
  let stdDev2: number | null = null;
  if (!proportion) {
    w.print('', `STEP ${step}: What is the variability in your data?`);
    stdDev = await w.number('Standard deviation (control group)', { example: '20' });
    w.print('   Press Enter to use the same value for the treatment group.');
    stdDev2 = await w.optionalNumber('Standard deviation (treatment)', { required: false });
    step++;
  }

  w.print('', `STEP ${step}: Statistical parameters`);
  const power = await w.number('Statistical power (0.8 = 80%)', {
    defaultValue: String(config.defaultPower),
  });
  const alpha = await w.number('Significance level (0.05 = 5%)', {
    defaultValue: String(config.defaultAlpha),
  });
  const sidesAnswer = await w.choice(
    'Test type (1=one-sided, 2=two-sided)',
    ['1', '2'],
    config.defaultSides === 1 ? '1' : '2'
  );
  const sides: Sides = sidesAnswer === '1' ? 1 : 2;
  const testType = await w.choice('Test statistic (z/t)', ['z', 't'], config.defaultTestType);

  step++;
  w.print('', `STEP ${step}: Experimental design`);
  const useWeights = await w.choice('Use custom traffic allocation? (y/n)', ['y', 'n'], 'n', {
    yes: 'y',
    no: 'n',
  });

  let weights: number[] | null = null;
  let nControls = 1;
  let nTreatments = 1;
  let ratio = 1;

  if (useWeights === 'y') {
    w.print(
      '   Enter traffic weights as space or comma-separated numbers.',
      '   First number(s) = control group(s), rest = treatment group(s)'
    );
    weights = await askWeights(w);
    if (weights !== null) {
      nControls = await w.number(`How many of these ${weights.length} groups are controls?`, {
        defaultValue: '1',
        integer: true,
      });
      if (nControls < 1 || nControls >= weights.length) {
        w.print('   Invalid. Using 1 control.');
        nControls = 1;
      }
      nTreatments = weights.length - nControls;

      const total = weights.reduce((sum, v) => sum + v, 0);
      const shares = weights.map((v) => Formatters.percentage(0)(v / total));
      w.print(
        `   -> ${nControls} control(s): ${shares.slice(0, nControls).join(', ')}`,
        `   -> ${nTreatments} treatment(s): ${shares.slice(nControls).join(', ')}`
      );
    }
  } else {
    nControls = await w.number('Number of control groups', { defaultValue: '1', integer: true });
    nTreatments = await w.number('Number of treatment groups', {
      defaultValue: '1',
      integer: true,
    });
    if (nControls > 1 || nTreatments > 1) {
      ratio = await w.number('Size ratio (treatment/control)', { defaultValue: '1' });
    }
  }

  let nComparisons = 1;
  let correction: CorrectionMethod = 'none';
  if (nControls > 1 || nTreatments > 1) {
    const comparisons = nControls * nTreatments;
    step++;
    w.print(
      '',
      `STEP ${step}: Multiple comparisons correction`,
      `   You have ${comparisons} comparison(s) by default.`
    );
    nComparisons = await w.number('Number of comparisons', {
      defaultValue: String(comparisons),
      integer: true,
    });
    if (nComparisons > 1) {
      correction = await w.choice(
        'Correction method (none/bonferroni/sidak)',
        ['none', 'bonferroni', 'sidak'],
        'none',
        { n: 'none', b: 'bonferroni', s: 'sidak' }
      );
    }
  }

  const spec: DesignSpecification = {
    baseline,
    mde,
    mdeType,
    metricType,
    power,
    alpha,
    sides,
    testType,
    ratio,
    nControls,
    nTreatments,
    nComparisons,
    correction,
  };
  if (stdDev !== null) spec.stdDev = stdDev;
  if (stdDev2 !== null) spec.stdDev2 = stdDev2;
  if (weights !== null) spec.weights = weights;

  return spec;
}

async function askWeights(w: Wizard): Promise<number[] | null> {
  const raw = await w.text('Traffic weights', { example: '50 50' });
  try {
    const weights = parseWeights(raw);
    if (weights.length < 2) {
      w.print('   Need at least 2 groups. Using default 50/50 split.');
      return null;
    }
    return weights;
  } catch (error) {
    if (isSampleSizeError(error) && error.is(ErrorCode.INVALID_INPUT)) {
      w.print('   Could not parse. Using default 50/50 split.');
      return null;
    }
    throw error;
  }
}
