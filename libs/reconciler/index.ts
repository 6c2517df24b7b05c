export { Reconciler, linkTier } from './Reconciler.js';
export type { MatchOptions } from './Reconciler.js';
export { parseDecimal, decimalEquals, withinPercent } from './decimalAmount.js';
export type { ScaledDecimal } from './decimalAmount.js';
