import { z } from 'zod';
import { readJson, writeJson } from './store.js';

const settingsSchema = z.record(z.unknown());

/** Operator settings kept in one JSON document */
export class SettingsService {
  private values: Record<string, unknown>;

  constructor(private file: string) {
    this.values = readJson(file, settingsSchema, {});
  }

  get(key: string): unknown { return this.values[key]; }

  set(key: string, value: unknown): void {
    this.values[key] = value;
    writeJson(this.file, this.values);
  }
}
