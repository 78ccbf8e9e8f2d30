import { z } from 'zod';
import fs from 'fs';
import path from 'path';
import dotenv from 'dotenv';

dotenv.config();

export const DEFAULT_CAPTURE_PATTERN = '{l} {t} {m}';
export const DEFAULT_CONSOLE_PATTERN = '{d} {l} {t} - {m}';

const ConfigSchema = z.object({
  logging: z.object({
    level: z.enum(['fatal', 'error', 'warn', 'info', 'debug', 'trace', 'silent']).default('info'),
    json: z.boolean().default(true),
  }),
  guard: z.object({
    // 0 = wait forever
    acquireTimeoutMs: z.number().int().nonnegative().default(0),
  }),
  layouts: z.object({
    capture: z.string().min(1).default(DEFAULT_CAPTURE_PATTERN),
    console: z.string().min(1).default(DEFAULT_CONSOLE_PATTERN),
  }),
});

export type LibraryConfig = z.infer<typeof ConfigSchema>;

export function loadConfig(configPath = 'testlog.config.json'): LibraryConfig {
  const full = path.resolve(process.cwd(), configPath);
  let fileRaw: Record<string, unknown> = {};
  if (fs.existsSync(full)) {
    try {
      fileRaw = JSON.parse(fs.readFileSync(full, 'utf8'));
    } catch (e) {
      throw new Error(`Failed to parse config file ${full}: ${e instanceof Error ? e.message : String(e)}`);
    }
  }
  const merged = {
    logging: {
      level: process.env.TESTLOG_LOG_LEVEL || 'info',
      json: process.env.TESTLOG_LOG_PRETTY === '1' ? false : true,
      ...(isRecord(fileRaw.logging) ? fileRaw.logging : {}),
    },
    guard: {
      acquireTimeoutMs: Number(process.env.TESTLOG_GUARD_TIMEOUT_MS) || 0,
      ...(isRecord(fileRaw.guard) ? fileRaw.guard : {}),
    },
    layouts: {
      ...(isRecord(fileRaw.layouts) ? fileRaw.layouts : {}),
    },
  };
  return ConfigSchema.parse(merged);
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

let cached: LibraryConfig | null = null;

// Loaded once per process from the working directory at first use
export function getLibraryConfig(): LibraryConfig {
  if (!cached) {
    cached = loadConfig();
  }
  return cached;
}

// Test-only helper to force a reload
export function __resetLibraryConfigForTests() {
  cached = null;
}
