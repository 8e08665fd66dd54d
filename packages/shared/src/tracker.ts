// Tracker Detection Types

export type PayloadKind =
  | 'unknown'
  | 'airtag-registered'
  | 'airtag-unregistered'
  | 'findmy-generic'
  | 'other-ble';

export type BatteryTier = 'full' | 'medium' | 'low' | 'very-low' | 'unknown';

export type TrackerClassification =
  | 'confirmed-airtag'
  | 'likely-findmy'
  | 'unregistered-airtag'
  | 'not-a-tracker';

export type MovementTrend = 'approaching' | 'receding' | 'stationary' | 'erratic';

export type ScanMode = 'normal' | 'findmy-only' | 'adaptive' | 'calibration' | 'range-test';

export interface RawAdvertisement {
  address: string;
  rssi: number;
  manufacturerData: Uint8Array;
  companyId: number;
  /** Monotonic arrival time, ms */
  timestamp: number;
  name?: string;
}

export interface StatusFlags {
  statusByte: number;
  isSeparated: boolean;
  isPlaySoundActive: boolean;
  isLostModeHint: boolean;
}

export type DecodedPayload =
  | { kind: 'unknown'; batteryTier: 'unknown' }
  | { kind: 'other-ble'; batteryTier: 'unknown'; continuityType: number }
  | { kind: 'airtag-unregistered'; batteryTier: 'unknown'; modelId: number }
  | (StatusFlags & { kind: 'findmy-generic'; batteryTier: 'unknown'; hint: number })
  | (StatusFlags & { kind: 'airtag-registered'; batteryTier: BatteryTier; rotationKeyFragment: string; hint: number });

export interface ManufacturerBlock {
  companyId: number;
  data: Uint8Array;
}

export interface CadenceStats {
  sampleCount: number;
  meanIntervalMs?: number;
  stdDevIntervalMs?: number;
  matchesExpectedAirTagCadence: boolean;
  rotationKeyChangedRecently: boolean;
  rotationObserved: boolean;
  rotationCount: number;
  lastRotationAt?: number;
  msSinceLastRotation?: number;
  lastRotationIntervalMs?: number;
}

export interface TrackerScore {
  score: number;
  classification: TrackerClassification;
}

export interface MovementAnalysis {
  trend: MovementTrend;
  confidence: number;
}

export interface DistanceSample {
  timestamp: number;
  distance: number;
}

export interface SignalSample extends DistanceSample {
  rssi: number;
  smoothedRssi: number;
}

export interface DeviceSnapshot {
  address: string;
  name?: string;
  kind: PayloadKind;
  classification: TrackerClassification;
  score: number;
  estimatedDistanceMeters: number;
  movementTrend: MovementTrend;
  trendConfidence: number;
  batteryTier: BatteryTier;
  isSeparated?: boolean;
  isPlaySoundActive?: boolean;
  isLostModeHint?: boolean;
  rssi: number;
  smoothedRssi: number;
  signalStability: number;
  firstSeen: number;
  lastSeen: number;
  seenCount: number;
  calibrationRssiAt1m?: number;
  pathLossExponent: number;
  cadence: CadenceStats;
}

export type CalibrationResult =
  | { ok: true; address: string; calibrationRssiAt1m?: number; pathLossExponent: number }
  | { ok: false; reason: string };

export interface AdaptiveScanHint {
  profile: 'survey' | 'focus' | 'crowded';
  highConfidenceCount: number;
  /** Fraction of time the radio should listen, 0..1 */
  dutyCycle: number;
  scanWindowMs: number;
  scanIntervalMs: number;
  appleOnlyFilter: boolean;
}

export interface RangeTestConfig {
  address?: string;
  knownDistanceM: number;
}

export interface RangeTestReport {
  address?: string;
  knownDistanceM: number;
  sampleCount: number;
  meanRssi?: number;
  meanEstimatedDistanceM?: number;
  absoluteErrorM?: number;
  relativeError?: number;
  suggestedPathLossExponent?: number;
}

export interface StatusBitTable {
  lostModeHint: number;
  separated: number;
  playSound: number;
  batteryShift: number;
  reservedMask: number;
}

export interface ScoringPolicy {
  registeredBase: number;
  registeredCadenceBonus: number;
  cleanStatusBonus: number;
  rotationBonus: number;
  unregisteredBase: number;
  unregisteredCadenceBonus: number;
  genericBase: number;
  genericCadenceBonus: number;
  confirmedThreshold: number;
  likelyThreshold: number;
  unregisteredThreshold: number;
}

export interface MovementPolicy {
  minSamples: number;
  /** m/s */
  slopeThreshold: number;
  /** Residual standard deviation, m */
  dispersionThreshold: number;
}

export interface CadencePolicy {
  expectedIntervalMs: number;
  toleranceMs: number;
}

export interface SessionConfig {
  detectionThreshold: number;
  historyCapacity: number;
  cadenceWindow: number;
  movementWindow: number;
  rssiSmoothingWindow: number;
  referenceRssi: number;
  pathLossExponent: number;
  rangeTest: RangeTestConfig;
  calibrationTarget?: string;
  statusBits: StatusBitTable;
  scoring: ScoringPolicy;
  movement: MovementPolicy;
  cadence: CadencePolicy;
}

export interface ScanSummary {
  totalDevices: number;
  trackerCount: number;
  strongest?: { address: string; name?: string; rssi: number; estimatedDistanceMeters: number };
  averageDistanceM: number;
  minDistanceM: number;
  maxDistanceM: number;
  scanDurationMs: number;
}

export interface DeviceHistoryEntry {
  address: string;
  name?: string;
  kind: PayloadKind;
  classification: TrackerClassification;
  score: number;
  rssi: number;
  estimatedDistanceMeters: number;
  firstSeen: number;
  lastSeen: number;
  calibrationRssiAt1m?: number;
  pathLossExponent: number;
}
