import type { DistanceSample, MovementAnalysis, MovementPolicy } from '@tagwatch/shared';

export const DEFAULT_MOVEMENT_POLICY: MovementPolicy = {
  minSamples: 3,
  slopeThreshold: 0.05,
  dispersionThreshold: 1.0,
};

const NO_TREND: MovementAnalysis = { trend: 'stationary', confidence: 0 };

export interface LinearFit {
  /** m/s */
  slope: number;
  intercept: number;
  /** Standard deviation of residuals around the fitted line, m */
  residualStdDev: number;
}

/** Least-squares fit of distance against time in seconds since the first sample */
export function fitLine(history: DistanceSample[]): LinearFit | undefined {
  const n = history.length;
  if (n < 2) return undefined;
  const t0 = history[0].timestamp;
  const xs = history.map(s => (s.timestamp - t0) / 1000);
  const ys = history.map(s => s.distance);
  const meanX = xs.reduce((a, b) => a + b, 0) / n;
  const meanY = ys.reduce((a, b) => a + b, 0) / n;

  let sxx = 0;
  let sxy = 0;
  for (let i = 0; i < n; i++) {
    sxx += (xs[i] - meanX) ** 2;
    sxy += (xs[i] - meanX) * (ys[i] - meanY);
  }
  if (sxx === 0) return undefined;

  const slope = sxy / sxx;
  const intercept = meanY - slope * meanX;
  let ssRes = 0;
  for (let i = 0; i < n; i++) ssRes += (ys[i] - (intercept + slope * xs[i])) ** 2;
  return { slope, intercept, residualStdDev: Math.sqrt(ssRes / n) };
}

const clamp01 = (v: number) => Math.max(0, Math.min(1, v));

/**
 * Classifies the proximity trend of an ordered distance history.
 * A noisy history overrides the slope with `erratic`.
 */
export function analyze(history: DistanceSample[], policy: MovementPolicy = DEFAULT_MOVEMENT_POLICY): MovementAnalysis {
  if (history.length < Math.max(3, policy.minSamples)) return NO_TREND;
  const fit = fitLine(history);
  if (!fit || !Number.isFinite(fit.slope) || !Number.isFinite(fit.residualStdDev)) return NO_TREND;

  const sigma = fit.residualStdDev;
  if (sigma > policy.dispersionThreshold) {
    return { trend: 'erratic', confidence: clamp01(1 - policy.dispersionThreshold / sigma) };
  }

  const confidence = clamp01(1 - sigma / policy.dispersionThreshold);
  if (fit.slope < -policy.slopeThreshold) return { trend: 'approaching', confidence };
  if (fit.slope > policy.slopeThreshold) return { trend: 'receding', confidence };
  return { trend: 'stationary', confidence };
}
