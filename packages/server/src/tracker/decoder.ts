// ============================================================================
// TagWatch — Find My Advertisement Decoder
// ============================================================================
import type { BatteryTier, DecodedPayload, ManufacturerBlock, StatusBitTable, StatusFlags } from '@tagwatch/shared';

export const APPLE_COMPANY_ID = 0x004c;

/** Apple continuity message types */
export const FIND_MY_TYPE = 0x12;
export const PROXIMITY_PAIRING_TYPE = 0x07;

/** Offline-finding body: status, 22-byte key fragment, key bits, hint */
export const FIND_MY_REGISTERED_LENGTH = 0x19;
/** Short offline-finding body: status, hint */
export const FIND_MY_SHORT_LENGTH = 0x02;
export const ROTATION_KEY_LENGTH = 22;

export const AIRTAG_MODEL_ID = 0x0055;
const PROXIMITY_PAIRING_MIN_LENGTH = 3;

const AD_TYPE_MANUFACTURER_SPECIFIC = 0xff;

export const DEFAULT_STATUS_BITS: StatusBitTable = {
  lostModeHint: 0x01,
  separated: 0x04,
  playSound: 0x08,
  batteryShift: 6,
  reservedMask: 0x32,
};

const BATTERY_TIERS: BatteryTier[] = ['full', 'medium', 'low', 'very-low'];

const UNKNOWN: DecodedPayload = { kind: 'unknown', batteryTier: 'unknown' };

export function decodeStatusByte(statusByte: number, bits: StatusBitTable = DEFAULT_STATUS_BITS): StatusFlags {
  return {
    statusByte,
    isSeparated: (statusByte & bits.separated) !== 0,
    isPlaySoundActive: (statusByte & bits.playSound) !== 0,
    isLostModeHint: (statusByte & bits.lostModeHint) !== 0,
  };
}

export function decodeBatteryTier(statusByte: number, bits: StatusBitTable = DEFAULT_STATUS_BITS): BatteryTier {
  return BATTERY_TIERS[(statusByte >> bits.batteryShift) & 0x03] ?? 'unknown';
}

/** True when none of the reserved status bits are set */
export function isCleanStatus(statusByte: number, bits: StatusBitTable = DEFAULT_STATUS_BITS): boolean {
  return (statusByte & bits.reservedMask) === 0;
}

export function toHex(bytes: Uint8Array): string {
  return Array.from(bytes, b => b.toString(16).padStart(2, '0')).join('');
}

/**
 * Decodes the manufacturer-specific block of one advertisement.
 * Anything that is not a recognised Apple continuity message decodes to `unknown`.
 */
export function decode(
  manufacturerData: Uint8Array,
  companyId: number,
  bits: StatusBitTable = DEFAULT_STATUS_BITS,
): DecodedPayload {
  if (companyId !== APPLE_COMPANY_ID || manufacturerData.length < 2) return UNKNOWN;

  const type = manufacturerData[0];
  const length = manufacturerData[1];
  if (manufacturerData.length - 2 < length) return UNKNOWN;
  const body = manufacturerData.subarray(2, 2 + length);

  if (type === FIND_MY_TYPE) {
    if (length === FIND_MY_REGISTERED_LENGTH) {
      const status = body[0];
      return {
        kind: 'airtag-registered',
        ...decodeStatusByte(status, bits),
        batteryTier: decodeBatteryTier(status, bits),
        rotationKeyFragment: toHex(body.subarray(1, 1 + ROTATION_KEY_LENGTH)),
        hint: body[FIND_MY_REGISTERED_LENGTH - 1],
      };
    }
    if (length === FIND_MY_SHORT_LENGTH) {
      return { kind: 'findmy-generic', ...decodeStatusByte(body[0], bits), batteryTier: 'unknown', hint: body[1] };
    }
    return UNKNOWN;
  }

  if (type === PROXIMITY_PAIRING_TYPE) {
    if (length < PROXIMITY_PAIRING_MIN_LENGTH) return UNKNOWN;
    const modelId = (body[1] << 8) | body[2];
    if (modelId === AIRTAG_MODEL_ID) return { kind: 'airtag-unregistered', batteryTier: 'unknown', modelId };
  }

  return { kind: 'other-ble', batteryTier: 'unknown', continuityType: type };
}

/**
 * Walks raw advertising-data structures (`[len, adType, ...data]`) and returns
 * every manufacturer-specific block. A truncated structure ends the walk.
 */
export function extractManufacturerBlocks(adBytes: Uint8Array): ManufacturerBlock[] {
  const blocks: ManufacturerBlock[] = [];
  let offset = 0;
  while (offset < adBytes.length) {
    const len = adBytes[offset];
    if (len === 0) break;
    const end = offset + 1 + len;
    if (end > adBytes.length) break;
    const adType = adBytes[offset + 1];
    // company id is little-endian
    if (adType === AD_TYPE_MANUFACTURER_SPECIFIC && len >= 3) {
      const companyId = adBytes[offset + 2] | (adBytes[offset + 3] << 8);
      blocks.push({ companyId, data: adBytes.slice(offset + 4, end) });
    }
    offset = end;
  }
  return blocks;
}

export function selectManufacturerBlock(blocks: ManufacturerBlock[]): ManufacturerBlock | undefined {
  return blocks.find(b => b.companyId === APPLE_COMPANY_ID) ?? blocks[0];
}

export function isFindMyKind(kind: DecodedPayload['kind']): boolean {
  return kind === 'airtag-registered' || kind === 'airtag-unregistered' || kind === 'findmy-generic';
}
