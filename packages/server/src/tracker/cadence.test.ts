import { describe, it, expect } from 'vitest';
import { CadenceTracker, intervalStats } from './cadence.js';

describe('intervalStats', () => {
  it('needs two timestamps', () => {
    expect(intervalStats([])).toBeUndefined();
    expect(intervalStats([1000])).toBeUndefined();
  });

  it('computes mean and population standard deviation of gaps', () => {
    expect(intervalStats([0, 1000, 4000])).toEqual({ mean: 2000, stdDev: 1000 });
  });
});

describe('CadenceTracker', () => {
  it('reports no statistics on the first observation', () => {
    const stats = new CadenceTracker().observe('aa', 0, 'k1');
    expect(stats.sampleCount).toBe(1);
    expect(stats.meanIntervalMs).toBeUndefined();
    expect(stats.stdDevIntervalMs).toBeUndefined();
    expect(stats.matchesExpectedAirTagCadence).toBe(false);
    expect(stats.rotationKeyChangedRecently).toBe(false);
  });

  it('matches the AirTag cadence from the second sample', () => {
    const tracker = new CadenceTracker();
    tracker.observe('aa', 0);
    const stats = tracker.observe('aa', 2000);
    expect(stats.meanIntervalMs).toBe(2000);
    expect(stats.stdDevIntervalMs).toBe(0);
    expect(stats.matchesExpectedAirTagCadence).toBe(true);
  });

  it('applies the tolerance band inclusively', () => {
    const at = (gap: number) => {
      const tracker = new CadenceTracker();
      tracker.observe('aa', 0);
      return tracker.observe('aa', gap).matchesExpectedAirTagCadence;
    };
    expect(at(2500)).toBe(true);
    expect(at(1500)).toBe(true);
    expect(at(1499)).toBe(false);
    expect(at(3000)).toBe(false);
  });

  it('only uses the last K gaps', () => {
    const tracker = new CadenceTracker(20, 3);
    [0, 10000, 12000, 14000].forEach(t => tracker.observe('aa', t));
    const stats = tracker.observe('aa', 16000);
    expect(stats.meanIntervalMs).toBe(2000);
    expect(stats.matchesExpectedAirTagCadence).toBe(true);
  });

  it('keeps addresses independent', () => {
    const tracker = new CadenceTracker();
    tracker.observe('aa', 0);
    expect(tracker.observe('bb', 2000).sampleCount).toBe(1);
  });

  it('detects rotation-key changes and records their timing', () => {
    const tracker = new CadenceTracker();
    tracker.observe('aa', 0, 'k1');
    expect(tracker.observe('aa', 2000, 'k1').rotationKeyChangedRecently).toBe(false);

    const rotated = tracker.observe('aa', 4000, 'k2');
    expect(rotated.rotationKeyChangedRecently).toBe(true);
    expect(rotated.rotationObserved).toBe(true);
    expect(rotated.rotationCount).toBe(1);
    expect(rotated.lastRotationAt).toBe(4000);
    expect(rotated.msSinceLastRotation).toBe(0);
    expect(rotated.lastRotationIntervalMs).toBeUndefined();

    const after = tracker.observe('aa', 6000, 'k2');
    expect(after.rotationKeyChangedRecently).toBe(false);
    expect(after.rotationObserved).toBe(true);
    expect(after.msSinceLastRotation).toBe(2000);

    const second = tracker.observe('aa', 906000, 'k3');
    expect(second.rotationCount).toBe(2);
    expect(second.lastRotationIntervalMs).toBe(902000);
  });

  it('ignores observations without a key fragment for rotation purposes', () => {
    const tracker = new CadenceTracker();
    tracker.observe('aa', 0, 'k1');
    expect(tracker.observe('aa', 2000).rotationKeyChangedRecently).toBe(false);
    expect(tracker.observe('aa', 4000, 'k1').rotationKeyChangedRecently).toBe(false);
  });

  it('bounds the arrival history and evicts oldest first', () => {
    const tracker = new CadenceTracker(5, 4);
    let last = tracker.observe('aa', 0);
    for (let i = 1; i < 12; i++) last = tracker.observe('aa', i * 1000);
    expect(last.sampleCount).toBe(5);
    expect(tracker.arrivals('aa')).toEqual([7000, 8000, 9000, 10000, 11000]);
  });

  it('forgets an address', () => {
    const tracker = new CadenceTracker();
    tracker.observe('aa', 0);
    tracker.forget('aa');
    expect(tracker.arrivals('aa')).toEqual([]);
    expect(tracker.observe('aa', 2000).sampleCount).toBe(1);
  });
});
