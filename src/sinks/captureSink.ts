import type { Sink } from '../core/types.js';

/**
 * Read handle on the lines a {@link CaptureSink} has accepted, in arrival
 * order. Lines are only ever appended.
 */
export class CapturedLog {
  private readonly entries: string[] = [];

  /** @internal appended to by the owning sink only */
  push(line: string): void {
    this.entries.push(line);
  }

  get length(): number {
    return this.entries.length;
  }

  snapshot(): string[] {
    return [...this.entries];
  }

  /** Lines containing `fragment`, or every line when omitted. */
  lines(fragment?: string): string[] {
    return fragment === undefined ? this.snapshot() : this.entries.filter((l) => l.includes(fragment));
  }

  count(fragment: string): number {
    return this.lines(fragment).length;
  }
}

/** Sink that keeps every formatted line in memory for assertions. */
export class CaptureSink implements Sink {
  constructor(readonly logs: CapturedLog = new CapturedLog()) {}

  static create(): [CaptureSink, CapturedLog] {
    const sink = new CaptureSink();
    return [sink, sink.logs];
  }

  record(line: string): void {
    this.logs.push(line);
  }
}
