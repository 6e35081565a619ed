/**
 * Device error taxonomy.
 * ---------------------------------------------
 * Every failure the simulator surfaces is a `DeviceError` with a stable
 * snake_case `code` (used in log lines) and the process `exitCode` the
 * entrypoint reports for it. Nothing here retries; callers decide.
 */
import type { RegistrationStatus } from './types.js';

export type DeviceErrorCode =
  | 'config_invalid'
  | 'credential_invalid'
  | 'provisioning_failed'
  | 'transport_failed'
  | 'authentication_failed'
  | 'publish_failed'
  | 'session_closed';

export abstract class DeviceError extends Error {
  abstract readonly code: DeviceErrorCode;
  abstract readonly exitCode: number;

  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = new.target.name;
  }
}

/** Missing or malformed configuration. */
export class ConfigError extends DeviceError {
  readonly code = 'config_invalid';
  readonly exitCode = 2;
}

/** The credential bundle cannot be read, decrypted, or holds no usable identity. */
export class CredentialError extends DeviceError {
  readonly code = 'credential_invalid';
  readonly exitCode = 3;
}

/** The registration handshake completed with a status other than Assigned. */
export class ProvisioningError extends DeviceError {
  readonly code = 'provisioning_failed';
  readonly exitCode = 4;

  constructor(
    readonly status: Exclude<RegistrationStatus, 'Assigned'>,
    message?: string,
    options?: { cause?: unknown },
  ) {
    super(message ?? `registration status is ${status}, expected Assigned`, options);
  }
}

/** Network or protocol failure at the provisioning or session layer. */
export class TransportError extends DeviceError {
  readonly code = 'transport_failed';
  readonly exitCode = 5;
}

/** The endpoint rejected the device certificate. */
export class AuthenticationError extends DeviceError {
  readonly code = 'authentication_failed';
  readonly exitCode = 6;
}

export class PublishError extends DeviceError {
  readonly code = 'publish_failed';
  readonly exitCode = 7;
}

export class SessionClosedError extends DeviceError {
  readonly code = 'session_closed';
  readonly exitCode = 7;
}

export function exitCodeFor(err: unknown): number {
  return err instanceof DeviceError ? err.exitCode : 1;
}

export function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}
