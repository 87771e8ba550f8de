/**
 * Distribution read by the critical value lookups
 */
export interface Distribution {
  /**
   * Inverse CDF; returns -Infinity / Infinity at p <= 0 / p >= 1
   */
  quantile(p: number): number;
}
