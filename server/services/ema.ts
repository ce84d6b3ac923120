/**
 * Pure EMA math. No I/O; the cache and the screener build on these.
 */

export type EmaPosition = 'above' | 'below';

/** Smoothing factor α = 2 / (period + 1). */
export function emaAlpha(period: number): number {
  return 2 / (period + 1);
}

/** One recursive step: ema[t] = α·close[t] + (1 − α)·ema[t−1]. */
export function foldEma(previous: number, close: number, alpha: number): number {
  return close * alpha + previous * (1 - alpha);
}

/** Folds `closes` onto `previous` in order. */
export function foldEmaSeries(previous: number, closes: readonly number[], period: number): number {
  const alpha = emaAlpha(period);
  let value = previous;
  for (const close of closes) {
    value = foldEma(value, close, alpha);
  }
  return value;
}

/**
 * Seeds with the simple average of the first `period` closes, then folds the
 * rest. Returns null when fewer than `period` closes are given.
 */
export function emaFromScratch(closes: readonly number[], period: number): number | null {
  if (closes.length < period || period < 1) return null;
  let sum = 0;
  for (let i = 0; i < period; i++) sum += closes[i];
  return foldEmaSeries(sum / period, closes.slice(period), period);
}

/** Percentage distance of `close` from `ema`, signed. */
export function distancePct(close: number, ema: number): number {
  return ((close - ema) / ema) * 100;
}

export function positionOf(close: number, ema: number): EmaPosition {
  return close > ema ? 'above' : 'below';
}
