// ============================================================================
// TagWatch — Scan Session
// ============================================================================
import { EventEmitter } from 'events';
import type {
  AdaptiveScanHint, CadenceStats, CalibrationResult, DecodedPayload, DeviceSnapshot, MovementTrend,
  RangeTestReport, RawAdvertisement, ScanMode, SessionConfig, SignalSample, TrackerClassification,
} from '@tagwatch/shared';
import { RingBuffer } from './ring-buffer.js';
import { DEFAULT_STATUS_BITS, decode, isFindMyKind } from './decoder.js';
import { CadenceTracker, DEFAULT_CADENCE_POLICY } from './cadence.js';
import { DEFAULT_SCORING_POLICY, score } from './scorer.js';
import {
  DEFAULT_PATH_LOSS_EXPONENT, DEFAULT_REFERENCE_RSSI, MAX_DISTANCE_M,
  derivePathLossExponent, estimate, signalStability, smoothRssi, validateCalibrationRssi,
} from './distance.js';
import { DEFAULT_MOVEMENT_POLICY, analyze } from './movement.js';

export const DEFAULT_SESSION_CONFIG: SessionConfig = {
  detectionThreshold: 50,
  historyCapacity: 20,
  cadenceWindow: 10,
  movementWindow: 10,
  rssiSmoothingWindow: 5,
  referenceRssi: DEFAULT_REFERENCE_RSSI,
  pathLossExponent: DEFAULT_PATH_LOSS_EXPONENT,
  rangeTest: { knownDistanceM: 1 },
  statusBits: DEFAULT_STATUS_BITS,
  scoring: DEFAULT_SCORING_POLICY,
  movement: DEFAULT_MOVEMENT_POLICY,
  cadence: DEFAULT_CADENCE_POLICY,
};

const RANGE_TEST_CAPACITY = 200;
const CALIBRATION_CAPACITY = 50;
const MAX_FOCUSED_DEVICES = 3;

const UNKNOWN_PAYLOAD: DecodedPayload = { kind: 'unknown', batteryTier: 'unknown' };

const ADAPTIVE_PROFILES: Record<AdaptiveScanHint['profile'], Omit<AdaptiveScanHint, 'profile' | 'highConfidenceCount'>> = {
  survey: { dutyCycle: 0.3, scanWindowMs: 300, scanIntervalMs: 1000, appleOnlyFilter: false },
  focus: { dutyCycle: 1, scanWindowMs: 1000, scanIntervalMs: 1000, appleOnlyFilter: true },
  crowded: { dutyCycle: 0.6, scanWindowMs: 600, scanIntervalMs: 1000, appleOnlyFilter: true },
};

export type RuntimeConfig = Pick<SessionConfig, 'detectionThreshold' | 'rangeTest' | 'calibrationTarget'>;

function cloneConfig(c: SessionConfig): SessionConfig {
  return {
    ...c,
    rangeTest: { ...c.rangeTest },
    statusBits: { ...c.statusBits },
    scoring: { ...c.scoring },
    movement: { ...c.movement },
    cadence: { ...c.cadence },
  };
}

export interface StoredCalibration {
  calibrationRssiAt1m?: number;
  pathLossExponent: number;
}

interface DeviceRecord {
  address: string;
  name?: string;
  payloads: RingBuffer<DecodedPayload>;
  samples: RingBuffer<SignalSample>;
  firstSeen: number;
  lastSeen: number;
  seenCount: number;
  rssi: number;
  smoothedRssi: number;
  distance: number;
  stability: number;
  score: number;
  classification: TrackerClassification;
  trend: MovementTrend;
  trendConfidence: number;
  cadence: CadenceStats;
  calibrationRssiAt1m?: number;
  pathLossExponent: number;
  alerted: boolean;
}

/**
 * Owns every tracked device and runs each advertisement through
 * decode → cadence → score → distance → movement.
 *
 * Events: `device` (snapshot), `tracker_detected` (snapshot, once per device),
 * `mode` (ScanMode), `scan_hint` (AdaptiveScanHint).
 */
export class ScanSession extends EventEmitter {
  private devices = new Map<string, DeviceRecord>();
  private pendingCalibrations = new Map<string, StoredCalibration>();
  private cadence: CadenceTracker;
  private config: SessionConfig;
  private mode: ScanMode = 'normal';
  private rangeSamples = new RingBuffer<SignalSample & { address: string }>(RANGE_TEST_CAPACITY);
  private calibrationSamples = new RingBuffer<number>(CALIBRATION_CAPACITY);
  private lastHint: AdaptiveScanHint | null = null;
  /** Latest advertisement timestamp processed; the session's notion of "now" */
  private clock = 0;

  constructor(config: Partial<SessionConfig> = {}) {
    super();
    this.config = cloneConfig({ ...DEFAULT_SESSION_CONFIG, ...config });
    this.cadence = new CadenceTracker(this.config.historyCapacity, this.config.cadenceWindow, this.config.cadence);
  }

  onAdvertisement(raw: RawAdvertisement): DeviceSnapshot {
    const existing = this.devices.get(raw.address);
    const fallbackTime = existing?.lastSeen ?? 0;
    const arrival = Number.isFinite(raw.timestamp) ? raw.timestamp : fallbackTime;
    // per-address order is the caller's contract; late arrivals count as simultaneous
    const timestamp = existing ? Math.max(arrival, existing.lastSeen) : arrival;
    const record = existing ?? this.createRecord(raw.address, timestamp);

    const payload = decode(raw.manufacturerData, raw.companyId, this.config.statusBits);
    const cadence = this.cadence.observe(raw.address, timestamp,
      payload.kind === 'airtag-registered' ? payload.rotationKeyFragment : undefined);
    const verdict = score(payload, cadence, this.config.scoring, this.config.statusBits);

    record.payloads.push(payload);
    record.lastSeen = timestamp;
    record.seenCount++;
    this.clock = Math.max(this.clock, timestamp);
    record.cadence = cadence;
    record.score = verdict.score;
    record.classification = verdict.classification;
    if (raw.name) record.name = raw.name;

    if (Number.isFinite(raw.rssi)) {
      const window = record.samples.tail(this.config.rssiSmoothingWindow - 1).map(s => s.rssi);
      window.push(raw.rssi);
      record.rssi = raw.rssi;
      record.smoothedRssi = smoothRssi(window);
      record.stability = signalStability(window);
      record.distance = this.estimateFor(record, record.smoothedRssi);
      const sample: SignalSample = { timestamp, rssi: raw.rssi, smoothedRssi: record.smoothedRssi, distance: record.distance };
      record.samples.push(sample);

      this.reanalyze(record);
      this.collectModeSamples(record, sample);
    }

    const snapshot = this.toSnapshot(record);
    this.emit('device', snapshot);
    if (!record.alerted && record.score >= this.config.detectionThreshold) {
      record.alerted = true;
      this.emit('tracker_detected', snapshot);
    }
    this.refreshScanHint();
    return snapshot;
  }

  // ── Commands ──

  calibrate(address: string, measuredRssiAt1m: number): CalibrationResult {
    const check = validateCalibrationRssi(measuredRssiAt1m);
    if (!check.ok) return this.reject(address, check.reason);
    const record = this.devices.get(address);
    if (!record) return this.reject(address, `unknown device ${address}`);
    record.calibrationRssiAt1m = check.value;
    this.reestimate(record);
    return { ok: true, address, calibrationRssiAt1m: check.value, pathLossExponent: record.pathLossExponent };
  }

  /** Derives the device's path-loss exponent from its smoothed RSSI at a known distance */
  calibrateAtDistance(address: string, knownDistanceM: number): CalibrationResult {
    const record = this.devices.get(address);
    if (!record) return this.reject(address, `unknown device ${address}`);
    const derived = derivePathLossExponent(record.smoothedRssi, knownDistanceM, this.referenceFor(record));
    if (!derived.ok) return this.reject(address, derived.reason);
    record.pathLossExponent = derived.value;
    this.reestimate(record);
    return { ok: true, address, calibrationRssiAt1m: record.calibrationRssiAt1m, pathLossExponent: derived.value };
  }

  /** Applies the mean RSSI collected in calibration mode as the target's 1 m reference */
  finishCalibration(): CalibrationResult {
    const target = this.config.calibrationTarget;
    if (!target) return this.reject('-', 'no calibration target configured');
    if (this.calibrationSamples.size === 0) return this.reject(target, 'no samples collected for calibration target');
    const mean = Math.round(smoothRssi(this.calibrationSamples.toArray()));
    const result = this.calibrate(target, mean);
    if (result.ok) this.calibrationSamples.clear();
    return result;
  }

  /** Calibration carried over from an earlier session; applied when the address appears */
  restoreCalibration(address: string, calibration: StoredCalibration): void {
    const record = this.devices.get(address);
    if (!record) { this.pendingCalibrations.set(address, calibration); return; }
    record.calibrationRssiAt1m = calibration.calibrationRssiAt1m;
    record.pathLossExponent = calibration.pathLossExponent;
    this.reestimate(record);
  }

  setMode(mode: ScanMode): void {
    this.mode = mode;
    if (mode === 'range-test') this.rangeSamples.clear();
    if (mode === 'calibration') this.calibrationSamples.clear();
    this.emit('mode', mode);
    this.refreshScanHint();
  }

  getMode(): ScanMode { return this.mode; }

  getConfig(): SessionConfig { return cloneConfig(this.config); }

  /** Timestamp of the newest advertisement seen, in the caller's clock */
  now(): number { return this.clock; }

  updateConfig(cfg: Partial<RuntimeConfig>): SessionConfig {
    Object.assign(this.config, cfg);
    if (cfg.rangeTest) this.config.rangeTest = { ...cfg.rangeTest };
    this.refreshScanHint();
    return this.getConfig();
  }

  clearStale(olderThanMs: number, now = this.clock): number {
    const cutoff = now - olderThanMs;
    let removed = 0;
    for (const [address, record] of this.devices) {
      if (record.lastSeen < cutoff) {
        this.devices.delete(address);
        this.cadence.forget(address);
        removed++;
      }
    }
    if (removed > 0) this.refreshScanHint();
    return removed;
  }

  reset(): void {
    this.devices.clear();
    this.cadence.clear();
    this.rangeSamples.clear();
    this.calibrationSamples.clear();
    this.lastHint = null;
    this.clock = 0;
  }

  // ── Views ──

  getSnapshot(address: string): DeviceSnapshot | undefined {
    const record = this.devices.get(address);
    return record ? this.toSnapshot(record) : undefined;
  }

  getSnapshots(): DeviceSnapshot[] {
    return Array.from(this.devices.values(), r => this.toSnapshot(r));
  }

  getInterestingDevices(): DeviceSnapshot[] {
    return this.getSnapshots().filter(s => this.mode === 'findmy-only'
      ? isFindMyKind(s.kind)
      : s.score >= this.config.detectionThreshold);
  }

  getScanHint(): AdaptiveScanHint | null {
    if (this.mode !== 'adaptive') return null;
    let count = 0;
    for (const r of this.devices.values()) if (r.score >= this.config.detectionThreshold) count++;
    const profile: AdaptiveScanHint['profile'] = count === 0 ? 'survey' : count <= MAX_FOCUSED_DEVICES ? 'focus' : 'crowded';
    return { profile, highConfidenceCount: count, ...ADAPTIVE_PROFILES[profile] };
  }

  getRangeTestReport(): RangeTestReport {
    const { address, knownDistanceM } = this.config.rangeTest;
    const samples = this.rangeSamples.toArray();
    const report: RangeTestReport = { address, knownDistanceM, sampleCount: samples.length };
    if (samples.length === 0) return report;

    const meanRssi = smoothRssi(samples.map(s => s.rssi));
    const meanDistance = samples.reduce((a, s) => a + s.distance, 0) / samples.length;
    const record = address ? this.devices.get(address) : undefined;
    const exponent = derivePathLossExponent(meanRssi, knownDistanceM, record ? this.referenceFor(record) : this.config.referenceRssi);
    return {
      ...report,
      meanRssi,
      meanEstimatedDistanceM: meanDistance,
      absoluteErrorM: Math.abs(meanDistance - knownDistanceM),
      relativeError: Math.abs(meanDistance - knownDistanceM) / knownDistanceM,
      suggestedPathLossExponent: exponent.ok ? exponent.value : undefined,
    };
  }

  // ── Internals ──

  private createRecord(address: string, timestamp: number): DeviceRecord {
    const capacity = this.config.historyCapacity;
    const restored = this.pendingCalibrations.get(address);
    this.pendingCalibrations.delete(address);
    const record: DeviceRecord = {
      address,
      payloads: new RingBuffer<DecodedPayload>(capacity),
      samples: new RingBuffer<SignalSample>(capacity),
      firstSeen: timestamp,
      lastSeen: timestamp,
      seenCount: 0,
      rssi: NaN,
      smoothedRssi: NaN,
      distance: MAX_DISTANCE_M,
      stability: 0,
      score: 0,
      classification: 'not-a-tracker',
      trend: 'stationary',
      trendConfidence: 0,
      cadence: { sampleCount: 0, matchesExpectedAirTagCadence: false, rotationKeyChangedRecently: false, rotationObserved: false, rotationCount: 0 },
      calibrationRssiAt1m: restored?.calibrationRssiAt1m,
      pathLossExponent: restored?.pathLossExponent ?? this.config.pathLossExponent,
      alerted: false,
    };
    this.devices.set(address, record);
    return record;
  }

  private referenceFor(record: DeviceRecord): number {
    return record.calibrationRssiAt1m ?? this.config.referenceRssi;
  }

  private estimateFor(record: DeviceRecord, rssi: number): number {
    return estimate(rssi, this.referenceFor(record), record.pathLossExponent);
  }

  /** Re-derives current and retained distances after the device's reference changes */
  private reestimate(record: DeviceRecord): void {
    if (!Number.isFinite(record.smoothedRssi)) return;
    record.distance = this.estimateFor(record, record.smoothedRssi);
    for (const sample of record.samples.toArray()) sample.distance = this.estimateFor(record, sample.smoothedRssi);
    this.reanalyze(record);
  }

  private reanalyze(record: DeviceRecord): void {
    const movement = analyze(record.samples.tail(this.config.movementWindow), this.config.movement);
    record.trend = movement.trend;
    record.trendConfidence = movement.confidence;
  }

  private collectModeSamples(record: DeviceRecord, sample: SignalSample): void {
    if (this.mode === 'range-test') {
      const target = this.config.rangeTest.address;
      if (!target || target === record.address) this.rangeSamples.push({ ...sample, address: record.address });
    } else if (this.mode === 'calibration' && this.config.calibrationTarget === record.address) {
      this.calibrationSamples.push(sample.rssi);
    }
  }

  private refreshScanHint(): void {
    const hint = this.getScanHint();
    const prev = this.lastHint;
    this.lastHint = hint;
    if (hint && (!prev || prev.profile !== hint.profile || prev.highConfidenceCount !== hint.highConfidenceCount)) {
      this.emit('scan_hint', hint);
    }
  }

  private reject(address: string, reason: string): CalibrationResult {
    console.warn(`🏷️  Calibration for ${address} had no effect: ${reason}`);
    return { ok: false, reason };
  }

  private toSnapshot(r: DeviceRecord): DeviceSnapshot {
    const latest: DecodedPayload = r.payloads.last() ?? UNKNOWN_PAYLOAD;
    const flags = 'statusByte' in latest
      ? { isSeparated: latest.isSeparated, isPlaySoundActive: latest.isPlaySoundActive, isLostModeHint: latest.isLostModeHint }
      : {};
    return {
      address: r.address,
      name: r.name,
      kind: latest.kind,
      classification: r.classification,
      score: r.score,
      estimatedDistanceMeters: r.distance,
      movementTrend: r.trend,
      trendConfidence: r.trendConfidence,
      batteryTier: latest.batteryTier,
      ...flags,
      rssi: r.rssi,
      smoothedRssi: r.smoothedRssi,
      signalStability: r.stability,
      firstSeen: r.firstSeen,
      lastSeen: r.lastSeen,
      seenCount: r.seenCount,
      calibrationRssiAt1m: r.calibrationRssiAt1m,
      pathLossExponent: r.pathLossExponent,
      cadence: { ...r.cadence },
    };
  }
}
