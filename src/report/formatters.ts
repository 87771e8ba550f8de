import { format } from 'd3-format';

// d3-format writes negatives with U+2212; reports use the ASCII hyphen
function formatter(specifier: string): (value: number) => string {
  const fmt = format(specifier);
  return (value: number) => fmt(value).replace(/−/g, '-');
}

/**
 * Common value formatters
 */
export const Formatters = {
  percentage: (decimals: number = 1) => formatter(`.${decimals}%`),

  signedPercentage: (decimals: number = 2) => formatter(`+.${decimals}%`),

  /** Thousands-grouped integer */
  count: () => formatter(',d'),

  fixed: (decimals: number = 2) => formatter(`.${decimals}f`),

  /** Up to `digits` significant digits, trailing zeros dropped */
  number: (digits: number = 6) => formatter(`.${digits}~g`),

  signedNumber: (digits: number = 4) => formatter(`+.${digits}~g`),
};
