import type { Layout, LevelFilter, LoggingConfig, SinkSpec } from '../core/types.js';
import { LockPoisonedError } from '../core/errors.js';
import { getLibraryConfig } from '../config/index.js';
import { facility, SILENT_CONFIG } from '../logging/facility.js';
import { PatternLayout } from '../logging/layout.js';
import { CaptureSink, type CapturedLog } from '../sinks/captureSink.js';
import { globalAdmission, globalLock } from '../services/globalState.js';
import { reconfigurationsTotal } from '../metrics/index.js';

export const CAPTURE_SINK_NAME = 'capture';

export interface ExclusiveOptions {
  /** Deadline for getting the guard; defaults to `guard.acquireTimeoutMs` from config. */
  timeoutMs?: number;
}

export interface MockSetupOptions extends ExclusiveOptions {
  /** Minimum level captured. Default trace. */
  level?: LevelFilter;
  /** Layout or pattern for captured lines. Default "{l} {t} {m}". */
  layout?: Layout | string;
  /** Capture only these targets (and their children). Default: every target. */
  targets?: Iterable<string>;
}

async function reconfigure(config: LoggingConfig): Promise<void> {
  await facility.apply(config);
  reconfigurationsTotal.inc();
}

/**
 * Runs `body` with exclusive use of the global logger configured by `config`.
 *
 * Exclusive tests queue behind each other, so records from one cannot leak into
 * another's sinks. The configuration in effect before the guard was taken is
 * put back afterwards, and the guard is released however `body` exits. If that
 * restore fails the lock is poisoned and every later logging test fails fast.
 */
export async function loggingTestSetup<T>(
  config: LoggingConfig,
  body: () => T | Promise<T>,
  opts: ExclusiveOptions = {},
): Promise<Awaited<T>> {
  const lock = globalLock();
  const timeoutMs = opts.timeoutMs ?? getLibraryConfig().guard.acquireTimeoutMs;
  return lock.run(async (): Promise<Awaited<T>> => {
    // Installs the silent base config only if nothing has won initialization yet
    await globalAdmission().initOnce(SILENT_CONFIG);
    const previous = facility.current;
    await reconfigure(config);
    try {
      return await body();
    } finally {
      try {
        await reconfigure(previous);
      } catch (err) {
        lock.poison(err);
        throw new LockPoisonedError(err);
      }
    }
  }, { timeoutMs });
}

/** A config sending every record at `level` or above to a fresh capture sink. */
export function captureConfig(options: Omit<MockSetupOptions, 'timeoutMs'> = {}): [LoggingConfig, CapturedLog] {
  const [sink, logs] = CaptureSink.create();
  const layout =
    typeof options.layout === 'string' || options.layout === undefined
      ? new PatternLayout(options.layout ?? getLibraryConfig().layouts.capture)
      : options.layout;
  const spec: SinkSpec = { name: CAPTURE_SINK_NAME, sink, layout };
  const level = options.level ?? 'trace';
  if (options.targets === undefined) {
    return [{ sinks: [spec], targetLevels: {}, rootLevel: level }, logs];
  }
  const targetLevels: Record<string, LevelFilter> = {};
  for (const target of options.targets) targetLevels[target] = level;
  return [{ sinks: [spec], targetLevels, rootLevel: 'silent' }, logs];
}

/**
 * {@link loggingTestSetup} with a fresh capture sink; `body` receives the
 * captured lines.
 *
 * @example
 * ```typescript
 * await loggingTestSetupMock({}, (logs) => {
 *   loggerFor('app').info('Hello, world!');
 *   expect(logs.snapshot()).toEqual(['INFO app Hello, world!']);
 * });
 * ```
 */
export function loggingTestSetupMock<T>(
  options: MockSetupOptions,
  body: (logs: CapturedLog) => T | Promise<T>,
): Promise<Awaited<T>> {
  const [config, logs] = captureConfig(options);
  return loggingTestSetup(config, () => body(logs), { timeoutMs: options.timeoutMs });
}

/** Wraps a capture test body for direct use as a test function. */
export function withCapturedLogs(
  options: MockSetupOptions,
  body: (logs: CapturedLog) => void | Promise<void>,
): () => Promise<void> {
  return () => loggingTestSetupMock(options, body);
}
