/**
 * Registry error kinds and the result type returned by recoverable operations
 */

import { RegistryErrorKind } from './types';

export class RegistryError extends Error {
  readonly kind: RegistryErrorKind;

  constructor(kind: RegistryErrorKind, message: string) {
    super(message);
    this.name = 'RegistryError';
    this.kind = kind;
  }
}

export type RegistryResult<T> =
  | { ok: true; value: T }
  | { ok: false; error: RegistryError };

export function ok<T>(value: T): RegistryResult<T> {
  return { ok: true, value };
}

export function fail<T>(kind: RegistryErrorKind, message: string): RegistryResult<T> {
  return { ok: false, error: new RegistryError(kind, message) };
}

/**
 * Read a message from anything thrown by a library call
 */
export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
