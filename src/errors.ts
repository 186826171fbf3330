/**
 * Error taxonomy
 *
 * Every failure the tool expects to happen in normal operation is a
 * MeterError with a `kind`. The dispatcher converts these into Result
 * values; anything that is not a MeterError is a defect and propagates.
 */

export type ErrorKind = 'bad-argument' | 'usage' | 'config' | 'device' | 'interrupted';

export class MeterError extends Error {
  readonly kind: ErrorKind;

  constructor(kind: ErrorKind, message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.kind = kind;
    this.name = 'MeterError';
  }
}

/** Value rejected by a property's domain, or a read-only property targeted by `set` */
export class BadArgumentError extends MeterError {
  constructor(message: string, options?: { cause?: unknown }) {
    super('bad-argument', message, options);
    this.name = 'BadArgumentError';
  }
}

/** Malformed command line or remote request */
export class UsageError extends MeterError {
  constructor(message: string) {
    super('usage', message);
    this.name = 'UsageError';
  }
}

export class ConfigError extends MeterError {
  constructor(message: string, options?: { cause?: unknown }) {
    super('config', message, options);
    this.name = 'ConfigError';
  }
}

/**
 * Communication failure or a fault reported by the instrument.
 * `code` is set only when the device itself answered with an error reply.
 */
export class DeviceError extends MeterError {
  readonly code?: number;

  constructor(message: string, options?: { cause?: unknown; code?: number }) {
    super('device', message, options);
    this.name = 'DeviceError';
    this.code = options?.code;
  }
}

export class InterruptedError extends MeterError {
  constructor(message = 'Interrupted') {
    super('interrupted', message);
    this.name = 'InterruptedError';
  }
}

export function isMeterError(err: unknown): err is MeterError {
  return err instanceof MeterError;
}

// --- Result ---

export type Result<T> =
  | { ok: true; value: T }
  | { ok: false; error: MeterError };

export function ok<T>(value: T): Result<T> {
  return { ok: true, value };
}

export function fail<T = never>(error: MeterError): Result<T> {
  return { ok: false, error };
}

/**
 * Await `work` and fold expected failures into a Result.
 * Errors outside the taxonomy are rethrown untouched.
 */
export async function toResult<T>(work: Promise<T>): Promise<Result<T>> {
  try {
    return ok(await work);
  } catch (err) {
    if (isMeterError(err)) return fail(err);
    throw err;
  }
}

/** Synchronous counterpart of toResult */
export function resultOf<T>(work: () => T): Result<T> {
  try {
    return ok(work());
  } catch (err) {
    if (isMeterError(err)) return fail(err);
    throw err;
  }
}

/** Process exit status for the local entry point */
export function exitCodeFor(error: MeterError): number {
  switch (error.kind) {
    case 'usage':
      return 2;
    case 'interrupted':
      return 130;
    default:
      return 1;
  }
}

export function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}
