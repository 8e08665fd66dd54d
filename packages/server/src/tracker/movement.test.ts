import { describe, it, expect } from 'vitest';
import type { DistanceSample } from '@tagwatch/shared';
import { analyze, fitLine } from './movement.js';

const series = (distances: number[], stepMs = 1000): DistanceSample[] =>
  distances.map((distance, i) => ({ timestamp: i * stepMs, distance }));

describe('analyze', () => {
  it('returns stationary with zero confidence below three samples', () => {
    expect(analyze([])).toEqual({ trend: 'stationary', confidence: 0 });
    expect(analyze(series([5]))).toEqual({ trend: 'stationary', confidence: 0 });
    expect(analyze(series([9, 1]))).toEqual({ trend: 'stationary', confidence: 0 });
  });

  it('detects a clean approach', () => {
    const result = analyze(series([10, 9, 8, 7, 6, 5, 4, 3, 2, 1], 2000));
    expect(result.trend).toBe('approaching');
    expect(result.confidence).toBeGreaterThan(0.8);
  });

  it('detects an approach through small noise', () => {
    const result = analyze(series([10, 8.95, 8.05, 6.95, 6.05, 4.95]));
    expect(result.trend).toBe('approaching');
    expect(result.confidence).toBeGreaterThan(0.8);
  });

  it('detects a receding device', () => {
    expect(analyze(series([1, 2, 3, 4, 5])).trend).toBe('receding');
  });

  it('treats a flat or slowly drifting history as stationary', () => {
    expect(analyze(series([5, 5, 5, 5]))).toEqual({ trend: 'stationary', confidence: 1 });
    expect(analyze(series([5, 5.01, 5.02, 5.03, 5.04])).trend).toBe('stationary');
  });

  it('flags a noisy history as erratic regardless of slope', () => {
    const result = analyze(series([1, 6, 1, 6, 1, 6]));
    expect(result.trend).toBe('erratic');
    expect(result.confidence).toBeGreaterThan(0.5);
    expect(result.confidence).toBeLessThan(1);
  });

  it('cannot fit samples that share one timestamp', () => {
    const same = [1, 2, 3].map(distance => ({ timestamp: 500, distance }));
    expect(analyze(same)).toEqual({ trend: 'stationary', confidence: 0 });
  });
});

describe('fitLine', () => {
  it('fits slope in metres per second', () => {
    const fit = fitLine(series([0, 1, 2], 2000));
    expect(fit?.slope).toBeCloseTo(0.5, 9);
    expect(fit?.intercept).toBeCloseTo(0, 9);
    expect(fit?.residualStdDev).toBeCloseTo(0, 9);
  });
});
