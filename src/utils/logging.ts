import pino, { type DestinationStream } from 'pino';
import { loadConfig } from '../config/index.js';

declare global {
  // Exposed for ad-hoc inspection while debugging a test run
  var __LOG_COLLECTOR__: string[] | undefined;
}

// The library's own diagnostics logger, separate from the facility under test
let loggerInstance: pino.Logger | null = null;

function collectorStream(logs: string[]): DestinationStream {
  globalThis.__LOG_COLLECTOR__ = logs;
  return {
    write(chunk: string) {
      logs.push(chunk);
    },
  };
}

export function getLogger() {
  if (!loggerInstance) {
    const cfg = loadConfig();
    const base = { name: 'testlog-kit', level: cfg.logging.level };
    if (process.env.TEST_LOG_COLLECTOR === '1') {
      loggerInstance = pino(base, collectorStream([]));
    } else {
      loggerInstance = pino({
        ...base,
        transport: cfg.logging.json ? undefined : { target: 'pino-pretty' },
      });
    }
  }
  return loggerInstance;
}

// Test-only helper to reset singleton
export function __resetLoggerForTests() {
  loggerInstance = null;
}

// Force-enable in-memory log collection regardless of env timing
export function __enableTestLogCollector(level?: pino.LevelWithSilent) {
  const cfg = loadConfig();
  const logs: string[] = [];
  loggerInstance = pino(
    { name: 'testlog-kit', level: level ?? cfg.logging.level },
    collectorStream(logs),
  );
  return logs;
}
