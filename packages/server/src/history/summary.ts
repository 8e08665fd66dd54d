import type { DeviceHistoryEntry, ScanSummary } from '@tagwatch/shared';

/** Estimates at or beyond this are too weak to be meaningful */
export const SUMMARY_DISTANCE_LIMIT_M = 100;

/**
 * Summarises the current scan together with stored history.
 * Entries are deduplicated by address; the most recently seen one wins.
 */
export function summarize(current: DeviceHistoryEntry[], history: DeviceHistoryEntry[], now: number): ScanSummary {
  const unique = new Map<string, DeviceHistoryEntry>();
  for (const e of [...current, ...history]) {
    const seen = unique.get(e.address);
    if (!seen || e.lastSeen > seen.lastSeen) unique.set(e.address, e);
  }

  const entries = Array.from(unique.values());
  if (entries.length === 0) {
    return { totalDevices: 0, trackerCount: 0, averageDistanceM: 0, minDistanceM: 0, maxDistanceM: 0, scanDurationMs: 0 };
  }

  let strongest: DeviceHistoryEntry | undefined;
  for (const e of entries) {
    if (Number.isFinite(e.rssi) && (!strongest || e.rssi > strongest.rssi)) strongest = e;
  }

  const distances = entries.map(e => e.estimatedDistanceMeters).filter(d => d < SUMMARY_DISTANCE_LIMIT_M);
  const firstSeen = Math.min(...entries.map(e => e.firstSeen));

  return {
    totalDevices: entries.length,
    trackerCount: entries.filter(e => e.classification !== 'not-a-tracker').length,
    strongest: strongest && {
      address: strongest.address, name: strongest.name,
      rssi: strongest.rssi, estimatedDistanceMeters: strongest.estimatedDistanceMeters,
    },
    averageDistanceM: distances.length ? distances.reduce((a, b) => a + b, 0) / distances.length : 0,
    minDistanceM: distances.length ? Math.min(...distances) : 0,
    maxDistanceM: distances.length ? Math.max(...distances) : 0,
    scanDurationMs: Math.max(0, now - firstSeen),
  };
}
