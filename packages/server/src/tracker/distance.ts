// ============================================================================
// TagWatch — RSSI Distance Estimation (log-distance path loss)
// ============================================================================

/** Typical BLE RSSI at 1 m */
export const DEFAULT_REFERENCE_RSSI = -59;
/** Free-space environmental factor */
export const DEFAULT_PATH_LOSS_EXPONENT = 2.0;

export const MIN_DISTANCE_M = 0.1;
export const MAX_DISTANCE_M = 1000;

/** Plausible 1 m reference readings, dBm */
export const CALIBRATION_RSSI_RANGE = { min: -100, max: -10 } as const;
export const PATH_LOSS_EXPONENT_RANGE = { min: 1, max: 6 } as const;

export type Validation<T> = { ok: true; value: T } | { ok: false; reason: string };

/**
 * `10 ^ ((ref - rssi) / (10 * n))`, held within [MIN_DISTANCE_M, MAX_DISTANCE_M].
 */
export function estimate(
  rssi: number,
  calibrationRssiAt1m?: number,
  pathLossExponent = DEFAULT_PATH_LOSS_EXPONENT,
): number {
  if (!Number.isFinite(rssi)) return MAX_DISTANCE_M;
  const ref = calibrationRssiAt1m ?? DEFAULT_REFERENCE_RSSI;
  const n = Number.isFinite(pathLossExponent) && pathLossExponent > 0 ? pathLossExponent : DEFAULT_PATH_LOSS_EXPONENT;
  const d = 10 ** ((ref - rssi) / (10 * n));
  if (!Number.isFinite(d)) return MAX_DISTANCE_M;
  return Math.min(MAX_DISTANCE_M, Math.max(MIN_DISTANCE_M, d));
}

export function validateCalibrationRssi(value: number): Validation<number> {
  if (!Number.isInteger(value)) return { ok: false, reason: `calibration RSSI must be an integer dBm value, got ${value}` };
  if (value < CALIBRATION_RSSI_RANGE.min || value > CALIBRATION_RSSI_RANGE.max) {
    return { ok: false, reason: `calibration RSSI ${value} dBm outside plausible range [${CALIBRATION_RSSI_RANGE.min}, ${CALIBRATION_RSSI_RANGE.max}]` };
  }
  return { ok: true, value };
}

/**
 * Solves the path-loss model for `n` given a reading taken at a known distance.
 */
export function derivePathLossExponent(
  rssi: number,
  knownDistanceM: number,
  referenceRssi = DEFAULT_REFERENCE_RSSI,
): Validation<number> {
  if (!Number.isFinite(knownDistanceM) || knownDistanceM <= 0) return { ok: false, reason: 'known distance must be positive' };
  if (knownDistanceM === 1) return { ok: false, reason: 'known distance of 1 m cannot determine the exponent; calibrate the 1 m reference instead' };
  if (!Number.isFinite(rssi)) return { ok: false, reason: 'no RSSI reading available' };
  const n = Math.abs((referenceRssi - rssi) / (10 * Math.log10(knownDistanceM)));
  if (n < PATH_LOSS_EXPONENT_RANGE.min || n > PATH_LOSS_EXPONENT_RANGE.max) {
    return { ok: false, reason: `derived path-loss exponent ${n.toFixed(2)} outside [${PATH_LOSS_EXPONENT_RANGE.min}, ${PATH_LOSS_EXPONENT_RANGE.max}]` };
  }
  return { ok: true, value: n };
}

export function smoothRssi(values: number[]): number {
  if (values.length === 0) return NaN;
  return values.reduce((a, b) => a + b, 0) / values.length;
}

/** Population standard deviation of recent RSSI readings */
export function signalStability(values: number[]): number {
  if (values.length < 2) return 0;
  const mean = smoothRssi(values);
  return Math.sqrt(values.reduce((a, v) => a + (v - mean) ** 2, 0) / values.length);
}
