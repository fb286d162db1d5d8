import { describe, expect, it } from 'vitest';
import { mean, standardDeviation, summarize } from '../analyzers/StatsAnalyzer';

describe('StatsAnalyzer', () => {
  it('averages two values', () => {
    expect(mean([3, 5])).toBe(4);
    expect(mean([50, 52])).toBe(51);
  });

  it('uses the N - 1 divisor for the standard deviation', () => {
    expect(standardDeviation([2, 6])).toBeCloseTo(Math.abs(2 - 6) / Math.SQRT2, 12);
    expect(standardDeviation([9, 8])).toBeCloseTo(1 / Math.SQRT2, 12);
    expect(standardDeviation([1, 2, 3, 4])).toBeCloseTo(Math.sqrt(5 / 3), 12);
  });

  it('reports no spread for a single value', () => {
    expect(standardDeviation([42])).toBe(0);
  });

  it('rejects empty input', () => {
    expect(() => mean([])).toThrow(RangeError);
    expect(() => standardDeviation([])).toThrow(RangeError);
  });

  it('summarizes every metric of the samples', () => {
    const summary = summarize([
      { pingMs: 10, downloadMbps: 50, uploadMbps: 8 },
      { pingMs: 12, downloadMbps: 52, uploadMbps: 9 }
    ]);

    expect(summary.rounds).toBe(2);
    expect(summary.ping.mean).toBe(11);
    expect(summary.download.mean).toBe(51);
    expect(summary.upload.mean).toBe(8.5);
    expect(summary.ping.stdDev).toBeCloseTo(Math.SQRT2, 12);
    expect(summary.download.stdDev).toBeCloseTo(Math.SQRT2, 12);
    expect(summary.upload.stdDev).toBeCloseTo(Math.SQRT1_2, 12);
  });
});
