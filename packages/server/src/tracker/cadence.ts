import type { CadencePolicy, CadenceStats } from '@tagwatch/shared';
import { RingBuffer } from './ring-buffer.js';

/** AirTags advertise roughly every 2 s while separated from their owner */
export const DEFAULT_CADENCE_POLICY: CadencePolicy = {
  expectedIntervalMs: 2000,
  toleranceMs: 500,
};

interface CadenceHistory {
  arrivals: RingBuffer<number>;
  lastKey?: string;
  rotations: number[];
  rotationCount: number;
}

export function intervalStats(timestamps: number[]): { mean: number; stdDev: number } | undefined {
  if (timestamps.length < 2) return undefined;
  const gaps: number[] = [];
  for (let i = 1; i < timestamps.length; i++) gaps.push(timestamps[i] - timestamps[i - 1]);
  const mean = gaps.reduce((a, b) => a + b, 0) / gaps.length;
  const variance = gaps.reduce((a, g) => a + (g - mean) ** 2, 0) / gaps.length;
  return { mean, stdDev: Math.sqrt(variance) };
}

/**
 * Per-address arrival history. Derives advertising-interval statistics and
 * notices rotation-key epoch boundaries.
 */
export class CadenceTracker {
  private histories = new Map<string, CadenceHistory>();

  constructor(
    private capacity = 20,
    private window = 10,
    private policy: CadencePolicy = DEFAULT_CADENCE_POLICY,
  ) {
    this.window = Math.max(1, Math.min(window, capacity - 1));
  }

  observe(address: string, timestamp: number, rotationKeyFragment?: string): CadenceStats {
    let history = this.histories.get(address);
    if (!history) {
      history = { arrivals: new RingBuffer<number>(this.capacity), rotations: [], rotationCount: 0 };
      this.histories.set(address, history);
    }
    history.arrivals.push(timestamp);

    let changed = false;
    if (rotationKeyFragment !== undefined) {
      if (history.lastKey !== undefined && history.lastKey !== rotationKeyFragment) {
        changed = true;
        history.rotationCount++;
        history.rotations.push(timestamp);
        if (history.rotations.length > 2) history.rotations.shift();
      }
      history.lastKey = rotationKeyFragment;
    }

    // K gaps need K + 1 arrivals
    const stats = intervalStats(history.arrivals.tail(this.window + 1));
    const lastRotationAt = history.rotations[history.rotations.length - 1];
    const matches = stats !== undefined
      && Math.abs(stats.mean - this.policy.expectedIntervalMs) <= this.policy.toleranceMs;

    return {
      sampleCount: history.arrivals.size,
      meanIntervalMs: stats?.mean,
      stdDevIntervalMs: stats?.stdDev,
      matchesExpectedAirTagCadence: matches,
      rotationKeyChangedRecently: changed,
      rotationObserved: history.rotationCount > 0,
      rotationCount: history.rotationCount,
      lastRotationAt,
      msSinceLastRotation: lastRotationAt !== undefined ? timestamp - lastRotationAt : undefined,
      lastRotationIntervalMs: history.rotations.length === 2 ? history.rotations[1] - history.rotations[0] : undefined,
    };
  }

  /** Arrival timestamps currently retained for an address, oldest first */
  arrivals(address: string): number[] {
    return this.histories.get(address)?.arrivals.toArray() ?? [];
  }

  forget(address: string): void { this.histories.delete(address); }

  clear(): void { this.histories.clear(); }
}
