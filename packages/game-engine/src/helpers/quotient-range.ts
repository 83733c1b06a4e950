import { Config } from '@cookie-division/shared-types';

export interface QuotientRange {
  min: number;
  max: number;
}

/**
 * Quotients that keep `quotient * divisor` inside [minDividend, maxDividend],
 * capped at the gameplay maximum. `null` when the divisor cannot produce any.
 */
export function quotientRange(divisor: number, minDividend: number, maxDividend: number): QuotientRange | null {
  if (divisor < 1) return null;
  const min = Math.max(1, Math.ceil(minDividend / divisor));
  const max = Math.min(Config.generation.maxQuotient, Math.floor(maxDividend / divisor));
  return min <= max ? { min, max } : null;
}

/** Key used to track which (dividend, divisor) pairs a session has already asked. */
export function questionKey(dividend: number, divisor: number): string {
  return `${dividend}/${divisor}`;
}
