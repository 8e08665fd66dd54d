import express from 'express';
import cors from 'cors';
import { WebSocketServer, WebSocket } from 'ws';
import { createServer } from 'http';
import { z } from 'zod';
import type { AdaptiveScanHint, DeviceSnapshot, ScanMode } from '@tagwatch/shared';
import { loadConfig, scanModeSchema } from './config.js';
import { HISTORY_FILE, SETTINGS_FILE, dataFile } from './services/store.js';
import { SettingsService } from './services/settings.js';
import { DeviceHistoryService } from './history/service.js';
import { ScanSession } from './tracker/session.js';
import { createTrackerRouter } from './tracker/api.js';
import { DemoFeed } from './tracker/demo.js';

const AUTOSAVE_INTERVAL_MS = 60000;

const config = loadConfig();
const settings = new SettingsService(dataFile(config.dataDir, SETTINGS_FILE));
const history = new DeviceHistoryService(dataFile(config.dataDir, HISTORY_FILE));

// Stored operator choices win over environment defaults
const storedMode = scanModeSchema.safeParse(settings.get('mode'));
const storedThreshold = z.number().min(0).max(100).safeParse(settings.get('detectionThreshold'));

const session = new ScanSession({
  detectionThreshold: storedThreshold.success ? storedThreshold.data : config.detectionThreshold,
  historyCapacity: config.historyCapacity,
});
session.setMode(storedMode.success ? storedMode.data : config.mode);

const calibrations = history.getCalibrations();
for (const [address, calibration] of calibrations) session.restoreCalibration(address, calibration);
if (calibrations.size > 0) console.log(`🏷️  Restored ${calibrations.size} device calibration(s)`);

const app = express();
app.use(cors());
app.use(express.json());

const server = createServer(app);
const wss = new WebSocketServer({ server, path: '/ws' });

// Broadcast to all WS clients
function broadcast(data: unknown) {
  const msg = JSON.stringify(data);
  wss.clients.forEach((client) => {
    if (client.readyState === WebSocket.OPEN) client.send(msg);
  });
}

session.on('device', (device: DeviceSnapshot) => broadcast({ type: 'device', device }));
session.on('tracker_detected', (device: DeviceSnapshot) => {
  console.log(`🏷️  Tracker detected: ${device.address} (${device.classification}, score ${device.score})`);
  broadcast({ type: 'tracker_detected', device });
});
session.on('mode', (mode: ScanMode) => broadcast({ type: 'mode', mode }));
session.on('scan_hint', (hint: AdaptiveScanHint) => broadcast({ type: 'scan_hint', hint }));

// ============================================================================
// REST endpoints
// ============================================================================

app.get('/api/health', (_req, res) => {
  res.json({
    name: 'TagWatch',
    version: '0.1.0',
    uptime: process.uptime(),
    status: 'operational',
    mode: session.getMode(),
    devices: session.getSnapshots().length,
  });
});

app.use('/api', createTrackerRouter({ session, history, settings }));

// ============================================================================
// WebSocket handling
// ============================================================================

wss.on('connection', (ws: WebSocket) => {
  console.log('🏷️  Client connected');

  // Send initial state
  ws.send(JSON.stringify({ type: 'mode', mode: session.getMode() }));
  ws.send(JSON.stringify({ type: 'devices', devices: session.getSnapshots() }));
  const hint = session.getScanHint();
  if (hint) ws.send(JSON.stringify({ type: 'scan_hint', hint }));

  ws.on('close', () => {
    console.log('🏷️  Client disconnected');
  });
});

// ============================================================================
// Persistence & lifecycle
// ============================================================================

function saveHistory(): void {
  try {
    const saved = history.save(session.getSnapshots());
    if (saved > 0) console.log(`🏷️  Saved ${saved} device(s) to history`);
  } catch (err) {
    console.error('🏷️  Failed to save device history:', err);
  }
}

const autosave = setInterval(saveHistory, AUTOSAVE_INTERVAL_MS);

const demo = new DemoFeed(session);
if (config.demo) demo.start();

function shutdown(signal: string) {
  console.log(`🏷️  ${signal} received, shutting down`);
  clearInterval(autosave);
  demo.stop();
  saveHistory();
  wss.close();
  server.close(() => process.exit(0));
}

process.on('SIGINT', () => shutdown('SIGINT'));
process.on('SIGTERM', () => shutdown('SIGTERM'));

server.listen(config.port, config.host, () => {
  console.log(`
  🏷️  ╔═══════════════════════════════════════╗
  🏷️  ║           T A G W A T C H             ║
  🏷️  ║      Find My Tracker Detection        ║
  🏷️  ╠═══════════════════════════════════════╣
  🏷️  ║  HTTP:  http://${config.host}:${config.port}
  🏷️  ║  WS:    ws://${config.host}:${config.port}/ws
  🏷️  ║  Mode:  ${session.getMode()}${config.demo ? ' (demo feed)' : ''}
  🏷️  ╚═══════════════════════════════════════╝
  `);
});
