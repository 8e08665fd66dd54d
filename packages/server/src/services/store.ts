import { existsSync, mkdirSync, readFileSync, renameSync, writeFileSync } from 'fs';
import { dirname, join } from 'path';
import type { z } from 'zod';

export const SETTINGS_FILE = 'settings.json';
export const HISTORY_FILE = 'devices_history.json';

export function dataFile(dataDir: string, name: string): string {
  return join(dataDir, name);
}

/**
 * Reads and validates a JSON file. A missing file yields the fallback; an unreadable
 * or invalid one is reported and also yields the fallback.
 */
export function readJson<T>(file: string, schema: z.ZodType<T, z.ZodTypeDef, unknown>, fallback: T): T {
  if (!existsSync(file)) return fallback;
  try {
    const parsed = schema.safeParse(JSON.parse(readFileSync(file, 'utf8')));
    if (parsed.success) return parsed.data;
    console.warn(`🏷️  Ignoring invalid ${file}: ${parsed.error.issues[0]?.message ?? 'unknown error'}`);
  } catch (err) {
    console.warn(`🏷️  Ignoring unreadable ${file}:`, err);
  }
  return fallback;
}

/** Writes through a temporary file so a crash never leaves half a document */
export function writeJson(file: string, value: unknown): void {
  const dir = dirname(file);
  if (!existsSync(dir)) mkdirSync(dir, { recursive: true });
  const tmp = `${file}.tmp`;
  writeFileSync(tmp, JSON.stringify(value, null, 2));
  renameSync(tmp, file);
}
