import pino, { type DestinationStream } from 'pino';
import { z } from 'zod';
import {
  LEVEL_FILTERS,
  type LevelFilter,
  type Layout,
  type LoggingConfig,
  type Severity,
  type Sink,
  type SinkSpec,
} from '../core/types.js';
import { ConfigurationError, formatZodError } from '../core/errors.js';
import { decodePinoLine } from './record.js';

// Dotted target names: "app", "app.db", "my-crate.sub_mod"
const TARGET_NAME = /^[A-Za-z0-9_-]+(\.[A-Za-z0-9_-]+)*$/;

const isObject = (v: unknown): v is Record<string, unknown> => typeof v === 'object' && v !== null;

const SinkSpecSchema = z.object({
  name: z.string().min(1),
  sink: z.custom<Sink>((v) => isObject(v) && typeof v.record === 'function', {
    message: 'sink must implement record(line)',
  }),
  layout: z.custom<Layout>((v) => isObject(v) && typeof v.format === 'function', {
    message: 'layout must implement format(record)',
  }),
});

const LoggingConfigSchema = z.object({
  sinks: z.array(SinkSpecSchema),
  targetLevels: z.record(
    z.string().regex(TARGET_NAME, { message: 'malformed target name' }),
    z.enum(LEVEL_FILTERS),
  ),
  rootLevel: z.enum(LEVEL_FILTERS),
});

export const SILENT_CONFIG: LoggingConfig = Object.freeze({
  sinks: Object.freeze([]),
  targetLevels: Object.freeze({}),
  rootLevel: 'silent',
});

export function validateConfig(config: LoggingConfig): void {
  const parsed = LoggingConfigSchema.safeParse(config);
  if (!parsed.success) {
    const targetIssue = parsed.error.errors.some((e) => e.path[0] === 'targetLevels');
    throw new ConfigurationError(
      targetIssue ? 'invalid-target' : 'invalid-config',
      formatZodError(parsed.error, 'Invalid logging configuration'),
    );
  }
  const seen = new Set<string>();
  for (const spec of config.sinks) {
    if (seen.has(spec.name)) {
      throw new ConfigurationError('duplicate-sink', `Duplicate sink name "${spec.name}"`);
    }
    seen.add(spec.name);
  }
}

/**
 * Minimum level for a target: the entry for the longest dotted prefix
 * ("app" covers "app.db"), else the root level.
 */
export function resolveLevel(config: LoggingConfig, target: string): LevelFilter {
  const parts = target.split('.');
  for (let n = parts.length; n > 0; n--) {
    const prefix = parts.slice(0, n).join('.');
    if (Object.prototype.hasOwnProperty.call(config.targetLevels, prefix)) {
      return config.targetLevels[prefix];
    }
  }
  return config.rootLevel;
}

function sinkDestination(spec: SinkSpec): DestinationStream {
  return {
    write(chunk: string) {
      const record = decodePinoLine(chunk);
      spec.sink.record(record ? spec.layout.format(record) : chunk.trimEnd());
    },
  };
}

function buildLogger(config: LoggingConfig): pino.Logger {
  if (config.sinks.length === 0) {
    return pino({ level: 'silent', base: null }, { write() {} });
  }
  const streams = config.sinks.map((spec) => ({ level: 'trace' as const, stream: sinkDestination(spec) }));
  return pino({ level: config.rootLevel, base: null }, pino.multistream(streams));
}

function flushLogger(logger: pino.Logger): Promise<void> {
  return new Promise((resolve, reject) => {
    logger.flush((err) => (err ? reject(err) : resolve()));
  });
}

export type TargetLogger = { readonly target: string } & Record<Severity, (message: string) => void>;

/**
 * The process-wide structured logging facility, backed by pino.
 *
 * Records are emitted against a target; the applied configuration decides the
 * minimum level per target and the sinks every accepted record is rendered to.
 * Before any configuration is applied everything is dropped.
 */
export class LoggingFacility {
  private root: pino.Logger;
  private applied: LoggingConfig = SILENT_CONFIG;
  private children = new Map<string, pino.Logger>();

  constructor() {
    this.root = buildLogger(SILENT_CONFIG);
  }

  get current(): LoggingConfig {
    return this.applied;
  }

  /**
   * Validates and installs a configuration. Rejects with ConfigurationError,
   * leaving the previous configuration in place, when the config is malformed.
   */
  async apply(config: LoggingConfig): Promise<void> {
    validateConfig(config);
    const next = buildLogger(config);
    const previous = this.applied;
    await flushLogger(this.root);
    for (const spec of previous.sinks) spec.sink.flush?.();
    this.root = next;
    this.applied = config;
    this.children = new Map();
  }

  emit(level: Severity, target: string, message: string): void {
    this.childFor(target)[level](message);
  }

  logger(target: string): TargetLogger {
    const at = (level: Severity) => (message: string) => this.emit(level, target, message);
    return {
      target,
      trace: at('trace'),
      debug: at('debug'),
      info: at('info'),
      warn: at('warn'),
      error: at('error'),
      fatal: at('fatal'),
    };
  }

  private childFor(target: string): pino.Logger {
    let child = this.children.get(target);
    if (!child) {
      child = this.root.child({ target }, { level: resolveLevel(this.applied, target) });
      this.children.set(target, child);
    }
    return child;
  }
}

export const facility = new LoggingFacility();

export function loggerFor(target: string): TargetLogger {
  return facility.logger(target);
}
