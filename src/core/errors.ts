import { z, ZodError } from 'zod';

export class TestLogError extends Error {
  type?: string;

  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = this.constructor.name;
  }
}

const ConfigurationErrorTypeSchema = z.enum([
  'invalid-config',
  'invalid-layout',
  'duplicate-sink',
  'invalid-target',
]);
export type ConfigurationErrorType = z.infer<typeof ConfigurationErrorTypeSchema>;

export class ConfigurationError extends TestLogError {
  type: ConfigurationErrorType;

  constructor(type: ConfigurationErrorType, message: string) {
    super(message);
    this.type = ConfigurationErrorTypeSchema.parse(type);
  }
}

export class LockPoisonedError extends TestLogError {
  constructor(cause?: unknown) {
    super(
      'Serialization lock is poisoned: a previous logging test left the global logger in an inconsistent state',
      { cause },
    );
  }
}

export class GuardTimeoutError extends TestLogError {
  readonly timeoutMs: number;

  constructor(timeoutMs: number) {
    super(`Timed out after ${timeoutMs}ms waiting for exclusive use of the global logger`);
    this.timeoutMs = timeoutMs;
  }
}

export const formatZodError = <T>(error: ZodError<T>, label: string): string => {
  const issues = error.errors
    .map((issue) => {
      const path = issue.path.join('.');
      const prefix = path ? `${path}: ` : '';
      return `${prefix}${issue.message}`;
    })
    .join('\n');
  return `${label}\n${issues}`;
};
