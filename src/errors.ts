/**
 * Error taxonomy
 *
 * Every failure surfaced by the store extends WalletError and carries a
 * stable `code` callers can switch on. "Not ours" outcomes of unblinding are
 * results, not errors.
 */

export type WalletErrorCode =
  | 'TRANSPORT'
  | 'PROTOCOL_VIOLATION'
  | 'NETWORK_MISMATCH'
  | 'POISONED'
  | 'UNSUPPORTED_BLINDING'
  | 'DESCRIPTOR'
  | 'ADDRESS'
  | 'CONFIG'
  | 'STORAGE'
  | 'SYNC_ABORTED'
  | 'ELECTRUM_URL';

export class WalletError extends Error {
  constructor(
    public readonly code: WalletErrorCode,
    message: string,
    options?: { cause?: unknown }
  ) {
    super(message, options);
    this.name = 'WalletError';
  }
}

/**
 * Backend unreachable, timed out or refused the request.
 * Retrying is up to the caller.
 */
export class TransportError extends WalletError {
  constructor(message: string, options?: { cause?: unknown }) {
    super('TRANSPORT', message, options);
    this.name = 'TransportError';
  }
}

/**
 * Backend returned inconsistent or malformed data
 */
export class ProtocolViolationError extends WalletError {
  constructor(message: string, options?: { cause?: unknown }) {
    super('PROTOCOL_VIOLATION', message, options);
    this.name = 'ProtocolViolationError';
  }
}

/**
 * A network-bound collaborator does not match the wallet network
 */
export class NetworkMismatchError extends WalletError {
  constructor(
    public readonly expected: string,
    public readonly actual: string
  ) {
    super('NETWORK_MISMATCH', `Mismatching network, wallet is on ${expected} but received ${actual}`);
    this.name = 'NetworkMismatchError';
  }
}

/**
 * Shared state can no longer be trusted; the wallet instance must be
 * re-opened
 */
export class PoisonedError extends WalletError {
  constructor(message: string, options?: { cause?: unknown }) {
    super('POISONED', message, options);
    this.name = 'PoisonedError';
  }
}

export class UnsupportedBlindingError extends WalletError {
  constructor(message = 'Bare blinding keys cannot derive per-address blinding keys') {
    super('UNSUPPORTED_BLINDING', message);
    this.name = 'UnsupportedBlindingError';
  }
}

export class DescriptorError extends WalletError {
  constructor(message: string, options?: { cause?: unknown }) {
    super('DESCRIPTOR', message, options);
    this.name = 'DescriptorError';
  }
}

export class AddressError extends WalletError {
  constructor(message: string) {
    super('ADDRESS', message);
    this.name = 'AddressError';
  }
}

export class ConfigError extends WalletError {
  constructor(message: string) {
    super('CONFIG', message);
    this.name = 'ConfigError';
  }
}

export class StorageError extends WalletError {
  constructor(message: string, options?: { cause?: unknown }) {
    super('STORAGE', message, options);
    this.name = 'StorageError';
  }
}

export class SyncAbortedError extends WalletError {
  constructor(message = 'Sync aborted before commit') {
    super('SYNC_ABORTED', message);
    this.name = 'SyncAbortedError';
  }
}

export class ElectrumUrlError extends WalletError {
  constructor(message: string, options?: { cause?: unknown }) {
    super('ELECTRUM_URL', message, options);
    this.name = 'ElectrumUrlError';
  }
}

export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
