/**
 * Sizing examples
 *
 * Typical planning questions answered with the engine.
 */

import {
  calculateMdeForSample,
  calculateSampleSize,
  formatMdeReport,
  formatReport,
  formatResultSummary,
} from '../src';

// Conversion rate: 10% -> 12%
const conversion = calculateSampleSize({ baseline: 0.1, mde: 0.02 });
console.log(formatResultSummary(conversion));

// Revenue per user with unequal variance (Welch's t-test)
const revenue = calculateSampleSize({
  metricType: 'mean',
  baseline: 100,
  mde: 2,
  stdDev: 20,
  stdDev2: 30,
  testType: 't',
});
console.log(formatReport(revenue));

// Two controls, three treatments, uneven traffic
const weighted = calculateSampleSize({
  baseline: 0.2,
  mde: 0.03,
  nControls: 2,
  nTreatments: 3,
  weights: [35, 15, 20, 18, 12],
  correction: 'bonferroni',
  nComparisons: 6,
});
console.log(formatReport(weighted));
console.log(`Bottleneck: ${weighted.design === 'weighted' ? weighted.bottleneck.label : 'n/a'}`);

// What can 5,000 users per group detect?
console.log(formatMdeReport(calculateMdeForSample({ baseline: 0.1, sampleSizePerGroup: 5000 })));
