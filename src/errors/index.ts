// ============================================================
// Error Taxonomy
// ============================================================
// Transient     → retried at the call site (withRetry)
// Rejected      → owning engine parks the level/entry
// Unrecoverable → supervisor goes to STOPPED
// ============================================================

/**
 * Base application error class
 */
export class AppError extends Error {
  constructor(
    message: string,
    public readonly code: string,
    cause?: unknown,
  ) {
    super(message, cause === undefined ? undefined : { cause });
    this.name = this.constructor.name;
    Error.captureStackTrace(this, this.constructor);
  }
}

/**
 * Configuration error - invalid or missing environment variables
 */
export class ConfigurationError extends AppError {
  constructor(message: string, public readonly issues: string[] = []) {
    super(message, 'CONFIG_ERROR');
  }
}

export type ExchangeErrorKind =
  | 'TIMEOUT'
  | 'RATE_LIMITED'
  | 'NETWORK'
  | 'AUTH'
  | 'REJECTED'
  | 'INSUFFICIENT_BALANCE'
  | 'NOT_FOUND';

/**
 * Exchange error - any failed call to the exchange, classified by kind
 */
export class ExchangeError extends AppError {
  constructor(
    public readonly kind: ExchangeErrorKind,
    message: string,
    public readonly retCode?: number,
    cause?: unknown,
  ) {
    super(message, `EXCHANGE_${kind}`, cause);
  }
}

/**
 * Engine error - a strategy engine threw while deciding; the engine needs a restart
 */
export class EngineError extends AppError {
  constructor(
    public readonly engine: 'GRID' | 'DCA' | 'RISK',
    message: string,
    cause?: unknown,
  ) {
    super(message, 'ENGINE_ERROR', cause);
  }
}

/**
 * Persistence error - the state store could not read or write a checkpoint
 */
export class PersistenceError extends AppError {
  constructor(message: string, cause?: unknown) {
    super(message, 'PERSISTENCE_ERROR', cause);
  }
}

// --------------- Classification ---------------

const TRANSIENT_KINDS: ReadonlySet<ExchangeErrorKind> = new Set(['TIMEOUT', 'RATE_LIMITED', 'NETWORK']);
const REJECTION_KINDS: ReadonlySet<ExchangeErrorKind> = new Set(['REJECTED', 'INSUFFICIENT_BALANCE']);

export function isTransient(err: unknown): boolean {
  return err instanceof ExchangeError && TRANSIENT_KINDS.has(err.kind);
}

export function isRejection(err: unknown): boolean {
  return err instanceof ExchangeError && REJECTION_KINDS.has(err.kind);
}

export function isNotFound(err: unknown): boolean {
  return err instanceof ExchangeError && err.kind === 'NOT_FOUND';
}

/** Errors no automatic restart can fix. */
export function isUnrecoverable(err: unknown): boolean {
  if (err instanceof ConfigurationError) return true;
  return err instanceof ExchangeError && err.kind === 'AUTH';
}

export function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}
