import { Bar, SupportResistance } from './types';

/**
 * Classic floor pivots from the previous completed daily bar.
 *
 * `bars` is a daily series, oldest first. The last bar is usually the
 * session still in progress, so the second-to-last one is used; a single
 * bar is used as-is. Returns null when there is nothing to derive levels
 * from (no bars, or a flat bar where high equals low).
 */
export function computePivotLevels(bars: Bar[]): SupportResistance | null {
  if (bars.length === 0) {
    return null;
  }

  const bar = bars.length > 1 ? bars[bars.length - 2] : bars[0];
  const { high, low, close } = bar;

  if (high <= low) {
    return null;
  }

  const pivot = (high + low + close) / 3;
  const range = high - low;

  return {
    s1: 2 * pivot - high,
    s2: pivot - range,
    s3: low - 2 * (high - pivot),
    r1: 2 * pivot - low,
    r2: pivot + range,
    r3: high + 2 * (pivot - low),
    basis: bar.time,
  };
}
