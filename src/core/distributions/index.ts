/**
 * Distributions used by the critical value resolver
 */

export type { Distribution } from './Distribution';
export { NormalDistribution, STANDARD_NORMAL } from './NormalDistribution';
export { StudentTDistribution } from './StudentTDistribution';
