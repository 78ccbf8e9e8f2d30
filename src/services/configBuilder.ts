import { getLibraryConfig } from '../config/index.js';
import type { LevelFilter, LoggingConfig, SinkSpec } from '../core/types.js';
import { PatternLayout } from '../logging/layout.js';
import { TestConsoleSink, type LineWriter } from '../sinks/consoleSink.js';
import { configCacheTotal } from '../metrics/index.js';

export const DEFAULT_SINK_NAME = 'console';
// Everything outside the requested targets only shows warnings and above
export const DEFAULT_ROOT_LEVEL: LevelFilter = 'warn';

const writeToConsole: LineWriter = (line) => console.log(line);

export function consoleSinkSpec(pattern = getLibraryConfig().layouts.console): SinkSpec {
  return Object.freeze({
    name: DEFAULT_SINK_NAME,
    sink: new TestConsoleSink(writeToConsole),
    layout: new PatternLayout(pattern),
  });
}

function normalizeTargets(targets: Iterable<string>): string[] {
  return Array.from(new Set(targets)).sort();
}

/**
 * Builds a config routing the given targets at `level` to a single sink: the
 * supplied one, or a console sink when absent. Pure apart from reading the
 * console layout pattern from the library config.
 */
export function buildConfig(targets: Iterable<string>, level: LevelFilter, sink?: SinkSpec): LoggingConfig {
  const targetLevels: Record<string, LevelFilter> = {};
  for (const target of normalizeTargets(targets)) {
    targetLevels[target] = level;
  }
  return Object.freeze({
    sinks: Object.freeze([sink ?? consoleSinkSpec()]),
    targetLevels: Object.freeze(targetLevels),
    rootLevel: DEFAULT_ROOT_LEVEL,
  });
}

const identities = new WeakMap<object, number>();
let nextIdentity = 1;

function identityOf(value: object): number {
  let id = identities.get(value);
  if (id === undefined) {
    id = nextIdentity++;
    identities.set(value, id);
  }
  return id;
}

/** Normalized cache key: sorted unique targets, level, sink identity or "-". */
export function configKey(targets: Iterable<string>, level: LevelFilter, sink?: SinkSpec): string {
  const sinkPart = sink ? `sink#${identityOf(sink)}` : '-';
  return JSON.stringify([normalizeTargets(targets), level, sinkPart]);
}

/**
 * Structural identity of a config, used to tell whether a later init-once
 * request asked for something other than what was installed.
 */
export function configFingerprint(config: LoggingConfig): string {
  return JSON.stringify({
    sinks: config.sinks.map((s) => [
      s.name,
      s.sink.constructor.name,
      s.layout instanceof PatternLayout ? s.layout.pattern : s.layout.constructor.name,
    ]),
    targetLevels: Object.entries(config.targetLevels).sort(([a], [b]) => a.localeCompare(b)),
    rootLevel: config.rootLevel,
  });
}

/** Append-only memo of built configs; entries live as long as the cache. */
export class ConfigCache {
  private readonly entries = new Map<string, LoggingConfig>();

  get size(): number {
    return this.entries.size;
  }

  getOrBuild(targets: Iterable<string>, level: LevelFilter, sink?: SinkSpec): LoggingConfig {
    const list = Array.from(targets);
    const key = configKey(list, level, sink);
    const cached = this.entries.get(key);
    if (cached) {
      configCacheTotal.inc({ result: 'hit' });
      return cached;
    }
    configCacheTotal.inc({ result: 'miss' });
    const built = buildConfig(list, level, sink);
    this.entries.set(key, built);
    return built;
  }
}

const processCache = new ConfigCache();

export function getConfig(targets: Iterable<string>, level: LevelFilter, sink?: SinkSpec): LoggingConfig {
  return processCache.getOrBuild(targets, level, sink);
}
