/**
 * Report Formatter
 *
 * Plain-text reports for sizing results. Everything is read from the result;
 * nothing is recomputed here.
 */

import type { MdeResult, SampleSizeResult, WeightedSampleSizeResult } from '../domain/results';
import type { MetricType, Sides, TestType } from '../domain/types';
import { Formatters } from './formatters';

const WIDTH = 40;
const RULE = '='.repeat(WIDTH);
const DIVIDER = '-'.repeat(WIDTH);

const percent2 = Formatters.percentage(2);
const percent1 = Formatters.percentage(1);
const wholePercent = Formatters.percentage(0);
const count = Formatters.count();
const plain = Formatters.number();

function label(text: string, width: number = 17): string {
  return text.padEnd(width);
}

function title(metricType: MetricType): string {
  return metricType === 'proportion' ? 'Proportion' : 'Mean';
}

function testTypeLine(testType: TestType, sides: Sides, welch: boolean): string {
  const name = testType === 't' ? 'T-Test' : testType === 'chi2' ? 'Chi-Square Test' : 'Z-Test';
  return `${label('Test Type:')}${welch ? "Welch's " : ''}${name}, ${sides}-Sided`;
}

function alphaLine(alpha: number, alphaCorrected: number, correction: string): string {
  if (alphaCorrected !== alpha) {
    return `${label('Alpha (Adj):')}${Formatters.fixed(5)(alphaCorrected)} (${correction})`;
  }
  return `${label('Alpha:')}${plain(alpha)}`;
}

function differsFromControl(control: number | null, treatment: number | null): boolean {
  return control !== null && treatment !== null && control !== treatment;
}

/**
 * Full multi-line report for a sample size result
 *
 * @example
 * ```typescript
 * console.log(formatReport(calculateSampleSize({ baseline: 0.2, mde: 0.05 })));
 * ```
 */
export function formatReport(result: SampleSizeResult): string {
  const lines: string[] = [RULE, '             RESULTS', RULE];

  lines.push(`${label('Metric:')}${title(result.metricType)}`);
  lines.push(
    `${label('Design:')}${result.nControls} Control(s) vs ${result.nTreatments} Treatment(s)`
  );
  lines.push(
    testTypeLine(
      result.testType,
      result.sides,
      result.welch || differsFromControl(result.stdDevControl, result.stdDevTreatment)
    )
  );

  if (result.design === 'weighted') {
    lines.push(`${label('Bottleneck:')}${result.bottleneck.label} (Requires most samples)`);
  }

  if (result.metricType === 'proportion') {
    lines.push(`${label('Baseline:')}${percent2(result.baseline)}`);
    lines.push(`${label('Target:')}${percent2(result.targetValue)}`);
    lines.push(`${label('Lift (Abs):')}${Formatters.signedPercentage(2)(result.absoluteEffect)}`);
  } else {
    lines.push(`${label('Baseline:')}${plain(result.baseline)}`);
    lines.push(`${label('MDE (Abs):')}${plain(result.absoluteEffect)}`);
    if (result.stdDevControl !== null) {
      lines.push(`${label('Std Dev (Ctrl):')}${plain(result.stdDevControl)}`);
    }
    if (
      result.stdDevTreatment !== null &&
      differsFromControl(result.stdDevControl, result.stdDevTreatment)
    ) {
      lines.push(`${label('Std Dev (Trt):')}${plain(result.stdDevTreatment)}`);
    }
  }

  lines.push(alphaLine(result.alpha, result.alphaCorrected, result.correction));
  lines.push(`${label('Power:')}${wholePercent(result.power)}`);
  lines.push(DIVIDER);

  if (result.design === 'weighted') {
    lines.push(...weightedBreakdown(result));
  } else {
    if (Math.abs(result.ratio - 1) > 1e-5) {
      lines.push(`Ratio (Trt/Ctrl): ${Formatters.fixed(2)(result.ratio)}`);
      lines.push(`${label('N (Control):', 23)}${count(result.sampleSizeControl)}`);
      lines.push(`${label('N (Treatment):', 23)}${count(result.sampleSizeTreatment)}`);
    } else {
      lines.push(`Sample Size Per Group: ${count(result.sampleSizePerVariant)}`);
    }
    lines.push(`${label('TOTAL Sample Size:', 23)}${count(result.totalSampleSize)}`);
  }

  for (const warning of result.warnings) {
    lines.push(`Warning: ${warning.message}`);
  }

  lines.push(RULE);
  return lines.join('\n');
}

function weightedBreakdown(result: WeightedSampleSizeResult): string[] {
  const lines = [
    `${label('Total Sample Size:', 26)}${count(result.totalSampleSize)}`,
    DIVIDER,
    'Group Breakdown:',
  ];

  for (const group of result.groups) {
    const share = group.share === null ? '' : ` (${percent1(group.share)})`;
    lines.push(`   ${`${group.label}${share}:`.padEnd(22)}${count(group.sampleSize)}`);
  }

  return lines;
}

/**
 * Multi-line report for a minimum detectable effect result
 */
export function formatMdeReport(result: MdeResult): string {
  const proportion = result.metricType === 'proportion';
  const lines: string[] = [RULE, '       MINIMUM DETECTABLE EFFECT', RULE];

  lines.push(`${label('Metric:')}${title(result.metricType)}`);
  lines.push(
    testTypeLine(
      result.testType,
      result.sides,
      result.welch || differsFromControl(result.stdDevControl, result.stdDevTreatment)
    )
  );
  lines.push(`${label('Baseline:')}${proportion ? percent2(result.baseline) : plain(result.baseline)}`);
  if (result.stdDevControl !== null) {
    lines.push(`${label('Std Dev (Ctrl):')}${plain(result.stdDevControl)}`);
  }
  if (
    result.stdDevTreatment !== null &&
    differsFromControl(result.stdDevControl, result.stdDevTreatment)
  ) {
    lines.push(`${label('Std Dev (Trt):')}${plain(result.stdDevTreatment)}`);
  }
  lines.push(`${label('N (Control):')}${count(result.sampleSizePerGroup)}`);
  lines.push(`${label('N (Treatment):')}${count(result.sampleSizeTreatment)}`);
  lines.push(alphaLine(result.alpha, result.alphaCorrected, result.correction));
  lines.push(`${label('Power:')}${wholePercent(result.power)}`);
  lines.push(DIVIDER);

  lines.push(
    `${label('MDE (Abs):')}${
      proportion
        ? Formatters.signedPercentage(2)(result.absoluteMde)
        : Formatters.signedNumber(4)(result.absoluteMde)
    }`
  );
  lines.push(`${label('MDE (Rel):')}${Formatters.signedPercentage(2)(result.relativeMde)}`);
  lines.push(
    `${label('Target:')}${proportion ? percent2(result.targetValue) : plain(result.targetValue)}`
  );
  lines.push(RULE);

  return lines.join('\n');
}

/**
 * One-line summary of a sample size result
 */
export function formatResultSummary(result: SampleSizeResult): string {
  const total = count(result.totalSampleSize);
  const perVariant = count(result.sampleSizePerVariant);
  const groups = `${result.nControls}C + ${result.nTreatments}T`;

  if (result.design === 'weighted') {
    return `Total: ${total} (weighted across ${groups} groups)`;
  }
  if (result.nControls === 1 && result.nTreatments === 1) {
    return `${perVariant} per group, ${total} total`;
  }
  return `${perVariant} per variant, ${total} total (${groups})`;
}
