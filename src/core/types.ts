// Domain model shared by the facility, the sinks and the setup helpers

export const SEVERITIES = ['trace', 'debug', 'info', 'warn', 'error', 'fatal'] as const;
export type Severity = (typeof SEVERITIES)[number];

// 'silent' lets nothing through (pino's name for an "off" filter)
export const LEVEL_FILTERS = [...SEVERITIES, 'silent'] as const;
export type LevelFilter = (typeof LEVEL_FILTERS)[number];

export interface LogRecord {
  readonly timestamp?: Date;
  readonly level: Severity;
  readonly target: string;
  readonly message: string;
}

/** Consumer of formatted log lines (console, in-memory capture, ...). */
export interface Sink {
  record(line: string): void;
  flush?(): void;
}

/** Renders a record to the single line a sink receives. */
export interface Layout {
  format(record: LogRecord): string;
}

export interface SinkSpec {
  readonly name: string;
  readonly sink: Sink;
  readonly layout: Layout;
}

export interface LoggingConfig {
  readonly sinks: readonly SinkSpec[];
  readonly targetLevels: Readonly<Record<string, LevelFilter>>;
  readonly rootLevel: LevelFilter;
}

export type AdmissionStateName = 'uninitialized' | 'initializing' | 'initialized';
export type InitOutcome = 'applied' | 'skipped';
