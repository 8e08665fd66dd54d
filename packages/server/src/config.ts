import { z } from 'zod';
import * as path from 'path';

export const scanModeSchema = z.enum(['normal', 'findmy-only', 'adaptive', 'calibration', 'range-test']);

const flag = z.union([z.boolean(), z.string()]).transform(v =>
  typeof v === 'boolean' ? v : ['1', 'true', 'yes', 'on'].includes(v.toLowerCase()));

const envSchema = z.object({
  TAGWATCH_PORT: z.coerce.number().int().min(1).max(65535).default(3411),
  TAGWATCH_HOST: z.string().min(1).default('127.0.0.1'),
  TAGWATCH_DATA_DIR: z.string().min(1).default('data'),
  TAGWATCH_DEMO: flag.default(false),
  TAGWATCH_MODE: scanModeSchema.default('normal'),
  TAGWATCH_DETECTION_THRESHOLD: z.coerce.number().min(0).max(100).default(50),
  TAGWATCH_HISTORY_CAPACITY: z.coerce.number().int().min(3).max(1000).default(20),
});

export interface ServerConfig {
  port: number;
  host: string;
  dataDir: string;
  demo: boolean;
  mode: z.infer<typeof scanModeSchema>;
  detectionThreshold: number;
  historyCapacity: number;
}

export function formatIssues(error: z.ZodError): string {
  return error.issues.map(i => `${i.path.join('.') || 'value'}: ${i.message}`).join('; ');
}

export function loadConfig(env: NodeJS.ProcessEnv = process.env, cwd = process.cwd()): ServerConfig {
  const parsed = envSchema.safeParse(env);
  if (!parsed.success) throw new Error(`Invalid TagWatch configuration: ${formatIssues(parsed.error)}`);
  const e = parsed.data;
  return {
    port: e.TAGWATCH_PORT,
    host: e.TAGWATCH_HOST,
    dataDir: path.resolve(cwd, e.TAGWATCH_DATA_DIR),
    demo: e.TAGWATCH_DEMO,
    mode: e.TAGWATCH_MODE,
    detectionThreshold: e.TAGWATCH_DETECTION_THRESHOLD,
    historyCapacity: e.TAGWATCH_HISTORY_CAPACITY,
  };
}
