import { z } from 'zod';
import type { DeviceHistoryEntry, DeviceSnapshot } from '@tagwatch/shared';
import type { StoredCalibration } from '../tracker/session.js';
import { DEFAULT_PATH_LOSS_EXPONENT } from '../tracker/distance.js';
import { readJson, writeJson } from '../services/store.js';

// A missing RSSI is written as null by JSON.stringify
const entrySchema = z.object({
  address: z.string(),
  name: z.string().optional(),
  kind: z.enum(['unknown', 'airtag-registered', 'airtag-unregistered', 'findmy-generic', 'other-ble']),
  classification: z.enum(['confirmed-airtag', 'likely-findmy', 'unregistered-airtag', 'not-a-tracker']),
  score: z.number(),
  rssi: z.number().nullable().transform(v => v ?? Number.NaN),
  estimatedDistanceMeters: z.number(),
  firstSeen: z.number(),
  lastSeen: z.number(),
  calibrationRssiAt1m: z.number().optional(),
  pathLossExponent: z.number(),
});

const historySchema = z.array(entrySchema);

export function toHistoryEntry(s: DeviceSnapshot): DeviceHistoryEntry {
  return {
    address: s.address, name: s.name, kind: s.kind, classification: s.classification,
    score: s.score, rssi: s.rssi, estimatedDistanceMeters: s.estimatedDistanceMeters,
    firstSeen: s.firstSeen, lastSeen: s.lastSeen,
    calibrationRssiAt1m: s.calibrationRssiAt1m, pathLossExponent: s.pathLossExponent,
  };
}

/**
 * Device history kept in a JSON document, one entry per address. A later save keeps
 * the earliest first-seen time, the latest last-seen time and any known name, and
 * overwrites everything else.
 */
export class DeviceHistoryService {
  private entries = new Map<string, DeviceHistoryEntry>();

  constructor(private file: string) {
    for (const e of readJson(file, historySchema, [])) this.entries.set(e.address, e);
  }

  save(snapshots: DeviceSnapshot[]): number {
    for (const entry of snapshots.map(toHistoryEntry)) {
      const prev = this.entries.get(entry.address);
      this.entries.set(entry.address, prev ? {
        ...entry,
        name: entry.name ?? prev.name,
        firstSeen: Math.min(prev.firstSeen, entry.firstSeen),
        lastSeen: Math.max(prev.lastSeen, entry.lastSeen),
      } : entry);
    }
    this.persist();
    return snapshots.length;
  }

  /** Most recently seen first */
  list(limit = 1000): DeviceHistoryEntry[] {
    return Array.from(this.entries.values())
      .sort((a, b) => b.lastSeen - a.lastSeen)
      .slice(0, limit)
      .map(e => ({ ...e }));
  }

  get(address: string): DeviceHistoryEntry | undefined {
    const entry = this.entries.get(address);
    return entry && { ...entry };
  }

  /** Calibrations that differ from the defaults, keyed by address */
  getCalibrations(): Map<string, StoredCalibration> {
    const result = new Map<string, StoredCalibration>();
    for (const e of this.entries.values()) {
      if (e.calibrationRssiAt1m !== undefined || e.pathLossExponent !== DEFAULT_PATH_LOSS_EXPONENT) {
        result.set(e.address, { calibrationRssiAt1m: e.calibrationRssiAt1m, pathLossExponent: e.pathLossExponent });
      }
    }
    return result;
  }

  prune(olderThan: number): number {
    let removed = 0;
    for (const [address, e] of this.entries) {
      if (e.lastSeen < olderThan) { this.entries.delete(address); removed++; }
    }
    if (removed > 0) this.persist();
    return removed;
  }

  private persist(): void {
    writeJson(this.file, this.list(Infinity));
  }
}
