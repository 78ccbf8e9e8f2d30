import { describe, it, expect, vi } from 'vitest';
import { TestConsoleSink } from '../../src/sinks/consoleSink.js';

describe('TestConsoleSink', () => {
  it('writes through console.log by default', () => {
    const spy = vi.spyOn(console, 'log').mockImplementation(() => {});
    new TestConsoleSink().record('WARN app careful');
    expect(spy).toHaveBeenCalledWith('WARN app careful');
    spy.mockRestore();
  });

  it('accepts a custom writer', () => {
    const lines: string[] = [];
    const sink = new TestConsoleSink((line) => lines.push(line));
    sink.record('one');
    sink.record('two');
    expect(lines).toEqual(['one', 'two']);
  });
});
