import { computePivotLevels } from '../levels';
import { Bar } from '../types';

const bar = (day: number, high: number, low: number, close: number): Bar => ({
  time: new Date(Date.UTC(2025, 0, day)),
  open: close,
  high,
  low,
  close,
  volume: 1000,
});

describe('computePivotLevels', () => {
  it('should use the previous completed bar', () => {
    const levels = computePivotLevels([bar(8, 7450, 7250, 7400), bar(9, 7600, 7400, 7500), bar(10, 7550, 7525, 7525)]);

    expect(levels).toEqual({
      s1: 7400,
      s2: 7300,
      s3: 7200,
      r1: 7600,
      r2: 7700,
      r3: 7800,
      basis: new Date(Date.UTC(2025, 0, 9)),
    });
  });

  it('should use the only bar when there is one', () => {
    const levels = computePivotLevels([bar(9, 7600, 7400, 7500)]);

    expect(levels?.s1).toBe(7400);
    expect(levels?.basis).toEqual(new Date(Date.UTC(2025, 0, 9)));
  });

  it('should order supports below and resistances above the pivot', () => {
    const levels = computePivotLevels([bar(1, 1040, 985, 1010), bar(2, 1020, 1000, 1015)]);

    expect(levels).not.toBeNull();
    if (levels) {
      const pivot = (1040 + 985 + 1010) / 3;
      expect(levels.s3).toBeLessThan(levels.s2);
      expect(levels.s2).toBeLessThan(levels.s1);
      expect(levels.s1).toBeLessThan(pivot);
      expect(levels.r1).toBeGreaterThan(pivot);
      expect(levels.r2).toBeGreaterThan(levels.r1);
      expect(levels.r3).toBeGreaterThan(levels.r2);
    }
  });

  it('should return null for a flat bar', () => {
    expect(computePivotLevels([bar(9, 500, 500, 500), bar(10, 510, 500, 505)])).toBeNull();
  });

  it('should return null without bars', () => {
    expect(computePivotLevels([])).toBeNull();
  });
});
