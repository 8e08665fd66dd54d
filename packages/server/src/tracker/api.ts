// ============================================================================
// Tracker API Routes
// ============================================================================

import { Router } from 'express';
import type { Response } from 'express';
import { z } from 'zod';
import type { CalibrationResult, RawAdvertisement } from '@tagwatch/shared';
import type { ScanSession } from './session.js';
import type { DeviceHistoryService } from '../history/service.js';
import type { SettingsService } from '../services/settings.js';
import { extractManufacturerBlocks, selectManufacturerBlock } from './decoder.js';
import { summarize } from '../history/summary.js';
import { toHistoryEntry } from '../history/service.js';
import { formatIssues, scanModeSchema } from '../config.js';

const hex = z.string()
  .regex(/^(?:[0-9a-fA-F]{2})*$/, 'expected an even-length hex string')
  .transform(v => new Uint8Array(Buffer.from(v, 'hex')));

const advertisementSchema = z.object({
  address: z.string().min(1),
  rssi: z.number().int().min(-127).max(20),
  timestamp: z.number().nonnegative().optional(),
  name: z.string().max(248).optional(),
  companyId: z.number().int().min(0).max(0xffff).optional(),
  manufacturerData: hex.optional(),
  advertisingData: hex.optional(),
}).refine(a => (a.manufacturerData === undefined) !== (a.advertisingData === undefined), {
  message: 'provide exactly one of manufacturerData or advertisingData',
}).refine(a => a.manufacturerData === undefined || a.companyId !== undefined, {
  message: 'companyId is required with manufacturerData',
  path: ['companyId'],
});

const ingestSchema = z.union([advertisementSchema, z.array(advertisementSchema).max(500)]);

const calibrateSchema = z.union([
  z.object({ rssiAt1m: z.number() }),
  z.object({ knownDistanceM: z.number() }),
]);

const configSchema = z.object({
  detectionThreshold: z.number().min(0).max(100).optional(),
  rangeTest: z.object({ address: z.string().min(1).optional(), knownDistanceM: z.number().positive() }).optional(),
  calibrationTarget: z.string().min(1).optional(),
});

const olderThanSchema = z.object({ olderThanMs: z.coerce.number().int().nonnegative() });

export type IngestResult = { ok: true; advertisements: RawAdvertisement[] } | { ok: false; error: string };

/**
 * Validates an ingest body. Raw advertising data is searched for a
 * manufacturer-specific block; with none present the advertisement still counts,
 * it just decodes as unknown.
 */
export function parseAdvertisements(body: unknown, now: number): IngestResult {
  const parsed = ingestSchema.safeParse(body);
  if (!parsed.success) return { ok: false, error: formatIssues(parsed.error) };
  const items = Array.isArray(parsed.data) ? parsed.data : [parsed.data];
  return {
    ok: true,
    advertisements: items.map(a => {
      let companyId = a.companyId ?? 0;
      let manufacturerData: Uint8Array = a.manufacturerData ?? new Uint8Array();
      if (a.advertisingData) {
        const block = selectManufacturerBlock(extractManufacturerBlocks(a.advertisingData));
        companyId = block?.companyId ?? 0;
        manufacturerData = block?.data ?? new Uint8Array();
      }
      return { address: a.address, rssi: a.rssi, timestamp: a.timestamp ?? now, name: a.name, companyId, manufacturerData };
    }),
  };
}

export interface TrackerRouterDeps {
  session: ScanSession;
  history: DeviceHistoryService;
  settings: SettingsService;
}

export function createTrackerRouter({ session, history, settings }: TrackerRouterDeps): Router {
  const router = Router();

  const sendCalibration = (res: Response, result: CalibrationResult) => {
    if (!result.ok) return res.status(422).json({ error: result.reason });
    res.json(result);
  };

  // Devices, strongest signal first
  router.get('/devices', (_req, res) => {
    const strength = (v: number) => (Number.isFinite(v) ? v : -Infinity);
    res.json(session.getSnapshots().sort((a, b) => strength(b.smoothedRssi) - strength(a.smoothedRssi)));
  });

  router.get('/devices/interesting', (_req, res) => {
    res.json(session.getInterestingDevices());
  });

  // Ages are measured on the advertisement clock, not wall time
  router.delete('/devices/stale', (req, res) => {
    const parsed = olderThanSchema.safeParse(req.query);
    if (!parsed.success) return res.status(400).json({ error: formatIssues(parsed.error) });
    res.json({ removed: session.clearStale(parsed.data.olderThanMs) });
  });

  router.get('/devices/:address', (req, res) => {
    const snapshot = session.getSnapshot(req.params.address);
    if (!snapshot) return res.status(404).json({ error: 'Device not found' });
    res.json(snapshot);
  });

  router.post('/devices/:address/calibrate', (req, res) => {
    const parsed = calibrateSchema.safeParse(req.body);
    if (!parsed.success) return res.status(400).json({ error: formatIssues(parsed.error) });
    const body = parsed.data;
    sendCalibration(res, 'rssiAt1m' in body
      ? session.calibrate(req.params.address, body.rssiAt1m)
      : session.calibrateAtDistance(req.params.address, body.knownDistanceM));
  });

  router.post('/calibration/finish', (_req, res) => {
    sendCalibration(res, session.finishCalibration());
  });

  // Ingest from an external adapter bridge
  router.post('/advertisements', (req, res) => {
    const parsed = parseAdvertisements(req.body, Date.now());
    if (!parsed.ok) return res.status(400).json({ error: parsed.error });
    res.json(parsed.advertisements.map(a => session.onAdvertisement(a)));
  });

  router.get('/mode', (_req, res) => {
    res.json({ mode: session.getMode() });
  });

  router.put('/mode', (req, res) => {
    const parsed = z.object({ mode: scanModeSchema }).safeParse(req.body);
    if (!parsed.success) return res.status(400).json({ error: formatIssues(parsed.error) });
    session.setMode(parsed.data.mode);
    settings.set('mode', parsed.data.mode);
    res.json({ mode: session.getMode() });
  });

  router.get('/config', (_req, res) => {
    res.json(session.getConfig());
  });

  router.put('/config', (req, res) => {
    const parsed = configSchema.safeParse(req.body);
    if (!parsed.success) return res.status(400).json({ error: formatIssues(parsed.error) });
    const config = session.updateConfig(parsed.data);
    if (parsed.data.detectionThreshold !== undefined) settings.set('detectionThreshold', config.detectionThreshold);
    res.json(config);
  });

  router.get('/scan-hint', (_req, res) => {
    res.json({ hint: session.getScanHint() });
  });

  router.get('/range-test', (_req, res) => {
    res.json(session.getRangeTestReport());
  });

  router.get('/summary', (_req, res) => {
    res.json(summarize(session.getSnapshots().map(toHistoryEntry), history.list(), session.now()));
  });

  router.get('/history', (req, res) => {
    const limit = parseInt(String(req.query.limit)) || 1000;
    res.json(history.list(limit));
  });

  router.delete('/history', (req, res) => {
    const parsed = olderThanSchema.safeParse(req.query);
    if (!parsed.success) return res.status(400).json({ error: formatIssues(parsed.error) });
    res.json({ removed: history.prune(session.now() - parsed.data.olderThanMs) });
  });

  router.get('/history/:address', (req, res) => {
    const entry = history.get(req.params.address);
    if (!entry) return res.status(404).json({ error: 'Device not found in history' });
    res.json(entry);
  });

  router.post('/history/save', (_req, res) => {
    res.json({ saved: history.save(session.getSnapshots()) });
  });

  return router;
}
