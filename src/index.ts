/**
 * Logging your tests, or testing your logs.
 *
 * - `initLoggingOnce` / `initLoggingOnceFor`: install a global config at most
 *   once, however many concurrent tests ask for it.
 * - `loggingTestSetup` / `loggingTestSetupMock`: serialize logging tests and
 *   capture their output in memory for assertions.
 */
export * from './core/types.js';
export {
  TestLogError,
  ConfigurationError,
  LockPoisonedError,
  GuardTimeoutError,
  type ConfigurationErrorType,
} from './core/errors.js';
export { PatternLayout } from './logging/layout.js';
export { decodePinoLine } from './logging/record.js';
export {
  LoggingFacility,
  facility,
  loggerFor,
  resolveLevel,
  validateConfig,
  SILENT_CONFIG,
  type TargetLogger,
} from './logging/facility.js';
export { CaptureSink, CapturedLog } from './sinks/captureSink.js';
export { TestConsoleSink, type LineWriter } from './sinks/consoleSink.js';
export {
  buildConfig,
  configKey,
  configFingerprint,
  consoleSinkSpec,
  ConfigCache,
  getConfig,
} from './services/configBuilder.js';
export { AdmissionGuard, type ApplyConfig } from './services/admissionGuard.js';
export { ExclusiveLock, SerializationGuard, type AcquireOptions } from './services/exclusiveLock.js';
export {
  loggingTestSetup,
  loggingTestSetupMock,
  withCapturedLogs,
  captureConfig,
  type ExclusiveOptions,
  type MockSetupOptions,
} from './testing/logTesting.js';
export { initLoggingOnce, initLoggingOnceFor, getConfigFor, __resetForTests } from './testing/testLogging.js';
export { loadConfig, type LibraryConfig } from './config/index.js';
export { metricsSummary, registry } from './metrics/index.js';
