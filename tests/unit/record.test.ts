import { describe, it, expect } from 'vitest';
import { decodePinoLine } from '../../src/logging/record.js';

describe('decodePinoLine', () => {
  it('decodes a pino JSON line', () => {
    const rec = decodePinoLine('{"level":30,"time":0,"target":"app","msg":"hello"}\n');
    expect(rec).toEqual({ timestamp: new Date(0), level: 'info', target: 'app', message: 'hello' });
  });

  it('maps numeric levels to severities', () => {
    expect(decodePinoLine('{"level":10,"msg":"x"}')?.level).toBe('trace');
    expect(decodePinoLine('{"level":60,"msg":"x"}')?.level).toBe('fatal');
  });

  it('defaults missing target and message to empty strings', () => {
    expect(decodePinoLine('{"level":40}')).toEqual({
      timestamp: undefined,
      level: 'warn',
      target: '',
      message: '',
    });
  });

  it('returns null for lines that are not pino records', () => {
    expect(decodePinoLine('not json')).toBeNull();
    expect(decodePinoLine('{"msg":"no level"}')).toBeNull();
    expect(decodePinoLine('{"level":35,"msg":"custom level"}')).toBeNull();
  });
});
