import pino from 'pino';
import { z } from 'zod';
import { SEVERITIES, type LogRecord, type Severity } from '../core/types.js';

const PinoLineSchema = z.object({
  level: z.number(),
  time: z.union([z.number(), z.string()]).optional(),
  target: z.string().optional(),
  msg: z.string().optional(),
});

function isSeverity(label: string | undefined): label is Severity {
  return SEVERITIES.some((s) => s === label);
}

/**
 * Decodes one line written by pino into a record, or returns null when the line
 * is not a pino JSON record.
 */
export function decodePinoLine(line: string): LogRecord | null {
  let raw: unknown;
  try {
    raw = JSON.parse(line);
  } catch {
    return null;
  }
  const parsed = PinoLineSchema.safeParse(raw);
  if (!parsed.success) return null;
  const label = pino.levels.labels[parsed.data.level];
  if (!isSeverity(label)) return null;
  const { time } = parsed.data;
  return Object.freeze({
    timestamp: time === undefined ? undefined : new Date(time),
    level: label,
    target: parsed.data.target ?? '',
    message: parsed.data.msg ?? '',
  });
}
