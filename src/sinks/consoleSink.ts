import type { Sink } from '../core/types.js';

export type LineWriter = (line: string) => void;

/**
 * Writes through console.log so the test runner attributes each line to the
 * test that produced it, rather than streaming straight to the terminal.
 */
export class TestConsoleSink implements Sink {
  constructor(private readonly write: LineWriter = (line) => console.log(line)) {}

  record(line: string): void {
    this.write(line);
  }
}
