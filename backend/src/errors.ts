/**
 * Error taxonomy for gas-sentinel.
 *
 * Startup errors (ConfigurationError, CorruptQueue, CorruptLedger) are fatal.
 * Everything raised inside a poll cycle is caught per item and leaves the item pending.
 */

export class SentinelError extends Error {
  constructor(message: string, public readonly cause?: unknown) {
    super(message);
    this.name = 'SentinelError';
  }
}

export class ConfigurationError extends SentinelError {
  constructor(message: string) {
    super(message);
    this.name = 'ConfigurationError';
  }
}

export class CorruptQueue extends SentinelError {
  constructor(public readonly path: string, message: string, cause?: unknown) {
    super(`Corrupt queue document ${path}: ${message}`, cause);
    this.name = 'CorruptQueue';
  }
}

export class CorruptLedger extends SentinelError {
  constructor(public readonly path: string, message: string, cause?: unknown) {
    super(`Corrupt ledger document ${path}: ${message}`, cause);
    this.name = 'CorruptLedger';
  }
}

export class OracleUnavailable extends SentinelError {
  constructor(public readonly chain: string, message: string, cause?: unknown) {
    super(`[${chain}] oracle unavailable: ${message}`, cause);
    this.name = 'OracleUnavailable';
  }
}

export class BroadcastRejected extends SentinelError {
  constructor(public readonly chain: string, message: string, cause?: unknown) {
    super(`[${chain}] broadcast rejected: ${message}`, cause);
    this.name = 'BroadcastRejected';
  }
}

export type PersistedDocument = 'queue' | 'ledger';

export class PersistenceWriteError extends SentinelError {
  constructor(
    public readonly document: PersistedDocument,
    public readonly path: string,
    cause?: unknown
  ) {
    super(`Failed to write ${document} document ${path}: ${formatError(cause)}`, cause);
    this.name = 'PersistenceWriteError';
  }
}

export function formatError(err: unknown): string {
  if (!err) return 'Unknown error';
  if (typeof err === 'string') return err;
  if (err instanceof Error) return err.message || err.toString();
  try { return JSON.stringify(err); } catch { return String(err); }
}
