import { describe, it, expect, vi, beforeEach, afterEach } from 'vitest';
import express from 'express';
import { createServer } from 'http';
import type { Server } from 'http';
import { mkdtempSync, rmSync } from 'fs';
import { tmpdir } from 'os';
import { join } from 'path';
import { createTrackerRouter, parseAdvertisements } from './api.js';
import { ScanSession } from './session.js';
import { SettingsService } from '../services/settings.js';
import { DeviceHistoryService } from '../history/service.js';
import { HISTORY_FILE, SETTINGS_FILE, dataFile } from '../services/store.js';

const REGISTERED = '1219' + '00' + 'aa'.repeat(22) + '0001';

describe('parseAdvertisements', () => {
  it('accepts a single advertisement with manufacturer data', () => {
    const result = parseAdvertisements({ address: 'AA:BB', rssi: -60, companyId: 76, manufacturerData: '1202' + '0401' }, 5000);
    expect(result).toEqual({
      ok: true,
      advertisements: [{
        address: 'AA:BB', rssi: -60, timestamp: 5000, name: undefined, companyId: 76,
        manufacturerData: new Uint8Array([0x12, 0x02, 0x04, 0x01]),
      }],
    });
  });

  it('keeps a caller-supplied timestamp', () => {
    const result = parseAdvertisements([{ address: 'a', rssi: -70, timestamp: 42, companyId: 6, manufacturerData: '' }], 5000);
    expect(result.ok && result.advertisements[0].timestamp).toBe(42);
  });

  it('extracts the Apple block from raw advertising data', () => {
    // flags structure, then a non-Apple and an Apple manufacturer block
    const ad = '020106' + '05ff7500aabb' + '06ff4c00120201';
    const result = parseAdvertisements({ address: 'a', rssi: -50, advertisingData: ad }, 0);
    expect(result.ok).toBe(true);
    if (!result.ok) return;
    expect(result.advertisements[0].companyId).toBe(0x004c);
    expect(result.advertisements[0].manufacturerData).toEqual(new Uint8Array([0x12, 0x02, 0x01]));
  });

  it('treats advertising data without a manufacturer block as empty', () => {
    const result = parseAdvertisements({ address: 'a', rssi: -50, advertisingData: '020106' }, 0);
    expect(result.ok && result.advertisements[0]).toMatchObject({ companyId: 0, manufacturerData: new Uint8Array() });
  });

  it('rejects manufacturer data without a company id', () => {
    const result = parseAdvertisements({ address: 'a', rssi: -50, manufacturerData: '1202' }, 0);
    expect(result).toEqual({ ok: false, error: 'companyId: companyId is required with manufacturerData' });
  });

  it('rejects both or neither payload forms', () => {
    expect(parseAdvertisements({ address: 'a', rssi: -50 }, 0).ok).toBe(false);
    expect(parseAdvertisements({ address: 'a', rssi: -50, companyId: 1, manufacturerData: '', advertisingData: '' }, 0).ok).toBe(false);
  });

  it('rejects odd-length hex and out-of-range RSSI', () => {
    expect(parseAdvertisements({ address: 'a', rssi: -50, companyId: 1, manufacturerData: 'abc' }, 0).ok).toBe(false);
    expect(parseAdvertisements({ address: 'a', rssi: -200, companyId: 1, manufacturerData: '' }, 0).ok).toBe(false);
  });
});

describe('tracker router', () => {
  let dir: string;
  let server: Server;
  let base: string;
  let session: ScanSession;
  let settings: SettingsService;

  async function call(method: string, path: string, body?: unknown): Promise<{ status: number; body: unknown }> {
    const res = await fetch(base + path, {
      method,
      headers: body === undefined ? undefined : { 'content-type': 'application/json' },
      body: body === undefined ? undefined : JSON.stringify(body),
    });
    return { status: res.status, body: await res.json() };
  }

  const ingest = (address: string, timestamp: number, rssi = -59, manufacturerData = REGISTERED, companyId = 0x004c) =>
    call('POST', '/advertisements', { address, rssi, timestamp, companyId, manufacturerData });

  beforeEach(async () => {
    vi.spyOn(console, 'warn').mockImplementation(() => {});
    dir = mkdtempSync(join(tmpdir(), 'tagwatch-api-'));
    session = new ScanSession();
    settings = new SettingsService(dataFile(dir, SETTINGS_FILE));
    const history = new DeviceHistoryService(dataFile(dir, HISTORY_FILE));

    const app = express();
    app.use(express.json());
    app.use('/api', createTrackerRouter({ session, history, settings }));
    server = createServer(app);
    await new Promise<void>(resolve => server.listen(0, '127.0.0.1', resolve));
    const address = server.address();
    if (!address || typeof address === 'string') throw new Error('server did not bind a TCP port');
    base = `http://127.0.0.1:${address.port}/api`;
  });

  afterEach(async () => {
    server.closeAllConnections();
    await new Promise<void>((resolve, reject) => server.close(err => (err ? reject(err) : resolve())));
    rmSync(dir, { recursive: true, force: true });
    vi.restoreAllMocks();
  });

  it('ingests advertisements and serves the device', async () => {
    const posted = await ingest('tag', 5000);
    expect(posted.status).toBe(200);
    expect(await call('GET', '/devices/tag')).toMatchObject({ status: 200, body: { address: 'tag', kind: 'airtag-registered' } });
  });

  it('answers 404 for an unknown device', async () => {
    expect(await call('GET', '/devices/nope')).toEqual({ status: 404, body: { error: 'Device not found' } });
  });

  it('rejects an invalid ingest body', async () => {
    expect((await call('POST', '/advertisements', { address: 'tag', rssi: -59 })).status).toBe(400);
  });

  it('ages devices on the advertisement clock', async () => {
    await ingest('early', 5000);
    expect(await call('DELETE', '/devices/stale?olderThanMs=60000')).toEqual({ status: 200, body: { removed: 0 } });
    expect(session.getSnapshots()).toHaveLength(1);

    await ingest('late', 100000);
    expect(await call('DELETE', '/devices/stale?olderThanMs=60000')).toEqual({ status: 200, body: { removed: 1 } });
    expect(session.getSnapshots().map(s => s.address)).toEqual(['late']);
  });

  it('requires a non-negative olderThanMs', async () => {
    expect((await call('DELETE', '/devices/stale?olderThanMs=-5')).status).toBe(400);
    expect((await call('DELETE', '/devices/stale')).status).toBe(400);
  });

  it('calibrates the 1 m reference', async () => {
    await ingest('tag', 1000);
    expect(await call('POST', '/devices/tag/calibrate', { rssiAt1m: -62 })).toEqual({
      status: 200,
      body: { ok: true, address: 'tag', calibrationRssiAt1m: -62, pathLossExponent: 2 },
    });
  });

  it('derives the exponent from a known distance', async () => {
    await ingest('tag', 1000, -89);
    expect(await call('POST', '/devices/tag/calibrate', { knownDistanceM: 10 })).toEqual({
      status: 200,
      body: { ok: true, address: 'tag', pathLossExponent: 3 },
    });
  });

  it('answers 422 with the reason for a rejected calibration', async () => {
    expect(await call('POST', '/devices/tag/calibrate', { rssiAt1m: 5 })).toEqual({
      status: 422,
      body: { error: 'calibration RSSI 5 dBm outside plausible range [-100, -10]' },
    });
    expect((await call('POST', '/devices/tag/calibrate', {})).status).toBe(400);
  });

  it('persists the selected mode', async () => {
    expect(await call('PUT', '/mode', { mode: 'adaptive' })).toEqual({ status: 200, body: { mode: 'adaptive' } });
    expect(settings.get('mode')).toBe('adaptive');
    expect(new SettingsService(dataFile(dir, SETTINGS_FILE)).get('mode')).toBe('adaptive');

    expect((await call('PUT', '/mode', { mode: 'loud' })).status).toBe(400);
    expect(session.getMode()).toBe('adaptive');
  });

  it('persists the detection threshold', async () => {
    expect(await call('PUT', '/config', { detectionThreshold: 70 })).toMatchObject({ status: 200, body: { detectionThreshold: 70 } });
    expect(settings.get('detectionThreshold')).toBe(70);
    expect((await call('PUT', '/config', { detectionThreshold: 150 })).status).toBe(400);
    expect(session.getConfig().detectionThreshold).toBe(70);
  });

  it('summarises the scan on the advertisement clock', async () => {
    await ingest('tag', 1000);
    await ingest('band', 4000, -70, '010203', 0x0006);
    expect(await call('GET', '/summary')).toMatchObject({ status: 200, body: { totalDevices: 2, scanDurationMs: 3000 } });
  });

  it('saves, reads and prunes history', async () => {
    await ingest('tag', 5000);
    expect(await call('POST', '/history/save')).toEqual({ status: 200, body: { saved: 1 } });
    expect(await call('GET', '/history/tag')).toMatchObject({ status: 200, body: { address: 'tag', lastSeen: 5000 } });
    expect((await call('GET', '/history/nope')).status).toBe(404);

    await ingest('later', 20000);
    expect(await call('DELETE', '/history?olderThanMs=10000')).toEqual({ status: 200, body: { removed: 1 } });
    expect((await call('GET', '/history/tag')).status).toBe(404);
  });
});
