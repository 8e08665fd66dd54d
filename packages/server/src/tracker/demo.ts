// ============================================================================
// TagWatch — Demo Advertisement Feed
// ============================================================================
import type { RawAdvertisement } from '@tagwatch/shared';
import type { ScanSession } from './session.js';
import {
  APPLE_COMPANY_ID, FIND_MY_REGISTERED_LENGTH, FIND_MY_TYPE, PROXIMITY_PAIRING_TYPE, ROTATION_KEY_LENGTH,
} from './decoder.js';

export const DEMO_TICK_MS = 1000;
export const DEMO_ROTATION_MS = 15 * 60 * 1000;

export const DEMO_REGISTERED_ADDRESS = 'DE:MO:00:00:00:01';
export const DEMO_UNREGISTERED_ADDRESS = 'DE:MO:00:00:00:02';

const BACKGROUND_DEVICES: { address: string; name: string; companyId: number; rssi: number }[] = [
  { address: 'DE:MO:00:00:01:01', name: 'Galaxy Buds', companyId: 0x0075, rssi: -72 },
  { address: 'DE:MO:00:00:01:02', name: 'Surface Pen', companyId: 0x0006, rssi: -80 },
  { address: 'DE:MO:00:00:01:03', name: 'Fitness Band', companyId: 0x0157, rssi: -66 },
];

const START_RSSI = -88;
const END_RSSI = -48;
/** dBm gained per registered-tag advertisement while walking in */
const APPROACH_STEP = 0.5;

/** Registered Find My body with a key fragment that changes once per rotation epoch */
export function registeredPayload(epoch: number, statusByte = 0x04): Uint8Array {
  const key = Array.from({ length: ROTATION_KEY_LENGTH }, (_, i) => (epoch * 31 + i * 7) & 0xff);
  return Uint8Array.from([FIND_MY_TYPE, FIND_MY_REGISTERED_LENGTH, statusByte, ...key, 0x00, 0x00]);
}

export function unregisteredPayload(): Uint8Array {
  return Uint8Array.from([PROXIMITY_PAIRING_TYPE, 0x03, 0x01, 0x00, 0x55]);
}

const jitter = (amplitude: number) => (Math.random() - 0.5) * 2 * amplitude;

/**
 * Feeds the session a synthetic neighbourhood once a second: a registered AirTag
 * walking towards the scanner every other tick, an unregistered AirTag and a few
 * non-Apple devices.
 */
export class DemoFeed {
  private interval: ReturnType<typeof setInterval> | null = null;
  private ticks = 0;
  private startedAt = 0;

  constructor(private session: ScanSession) {}

  get running(): boolean { return this.interval !== null; }

  start(now = Date.now()): void {
    if (this.interval) return;
    this.startedAt = now;
    this.ticks = 0;
    this.interval = setInterval(() => this.tick(Date.now()), DEMO_TICK_MS);
    console.log('🏷️  Demo feed started');
  }

  stop(): void {
    if (!this.interval) return;
    clearInterval(this.interval);
    this.interval = null;
    console.log('🏷️  Demo feed stopped');
  }

  /** One round of advertisements; exposed so callers can drive the feed by hand */
  tick(now: number): RawAdvertisement[] {
    const batch: RawAdvertisement[] = [];

    // AirTags advertise every 2 s
    if (this.ticks % 2 === 0) {
      const step = this.ticks / 2;
      const epoch = Math.floor((now - this.startedAt) / DEMO_ROTATION_MS);
      batch.push({
        address: DEMO_REGISTERED_ADDRESS,
        rssi: Math.round(Math.min(END_RSSI, START_RSSI + step * APPROACH_STEP) + jitter(2)),
        companyId: APPLE_COMPANY_ID,
        manufacturerData: registeredPayload(epoch),
        timestamp: now,
      });
      batch.push({
        address: DEMO_UNREGISTERED_ADDRESS,
        rssi: Math.round(-70 + jitter(3)),
        companyId: APPLE_COMPANY_ID,
        manufacturerData: unregisteredPayload(),
        timestamp: now,
      });
    }

    for (const d of BACKGROUND_DEVICES) {
      batch.push({
        address: d.address,
        name: d.name,
        rssi: Math.round(d.rssi + jitter(4)),
        companyId: d.companyId,
        manufacturerData: Uint8Array.from([0x01, 0x02, 0x03]),
        timestamp: now,
      });
    }

    this.ticks++;
    for (const adv of batch) this.session.onAdvertisement(adv);
    return batch;
  }
}
