import { describe, it, expect } from 'vitest';
import fs from 'fs';
import path from 'path';
import {
  loadConfig,
  getLibraryConfig,
  __resetLibraryConfigForTests,
  DEFAULT_CAPTURE_PATTERN,
  DEFAULT_CONSOLE_PATTERN,
} from '../../src/config/index.js';

describe('config loader', () => {
  it('loads defaults when file missing', () => {
    const cfg = loadConfig('nonexistent-config.json');
    expect(cfg.layouts.capture).toBe(DEFAULT_CAPTURE_PATTERN);
    expect(cfg.layouts.console).toBe(DEFAULT_CONSOLE_PATTERN);
    expect(cfg.logging.json).toBe(true);
  });

  it('merges values from the config file', () => {
    const tmp = path.join(process.cwd(), 'testlog-merge.config.json');
    fs.writeFileSync(
      tmp,
      JSON.stringify({ layouts: { capture: '{m}' }, guard: { acquireTimeoutMs: 250 }, logging: { level: 'debug' } }),
    );
    try {
      const cfg = loadConfig('testlog-merge.config.json');
      expect(cfg.layouts.capture).toBe('{m}');
      expect(cfg.layouts.console).toBe(DEFAULT_CONSOLE_PATTERN);
      expect(cfg.guard.acquireTimeoutMs).toBe(250);
      expect(cfg.logging.level).toBe('debug');
    } finally {
      fs.unlinkSync(tmp);
    }
  });

  it('reads the guard timeout from env', () => {
    process.env.TESTLOG_GUARD_TIMEOUT_MS = '1500';
    try {
      expect(loadConfig('nonexistent-config.json').guard.acquireTimeoutMs).toBe(1500);
    } finally {
      delete process.env.TESTLOG_GUARD_TIMEOUT_MS;
    }
  });

  it('loads the library config once and reuses it', () => {
    __resetLibraryConfigForTests();
    const first = getLibraryConfig();
    process.env.TESTLOG_GUARD_TIMEOUT_MS = '900';
    try {
      expect(getLibraryConfig()).toBe(first);
      expect(getLibraryConfig().guard.acquireTimeoutMs).toBe(first.guard.acquireTimeoutMs);
      __resetLibraryConfigForTests();
      expect(getLibraryConfig().guard.acquireTimeoutMs).toBe(900);
    } finally {
      delete process.env.TESTLOG_GUARD_TIMEOUT_MS;
      __resetLibraryConfigForTests();
    }
  });
});
