/**
 * Provisioning Error Types
 *
 * Error hierarchy for provider calls, request signing, storage collaborators
 * and the orchestration flow. Nothing in this package retries: every error is
 * fatal to the step that raised it.
 *
 * @module error
 */

import type { ProviderKind, ProvisioningStep } from '../types/common.js';

/**
 * Error codes.
 */
export type ProvisioningErrorCode =
  | 'CONFIGURATION' // Invalid configuration, names or settings
  | 'SIGNING' // Request signing failed
  | 'TRANSPORT' // Network/connection failure
  | 'TIMEOUT' // Request timed out
  | 'API' // Non-2xx response from a provider API
  | 'PROTOCOL' // Response shape violates the provider contract
  | 'STORAGE' // Object storage collaborator failure
  | 'STEP'; // A provisioning step failed (wraps one of the above)

/**
 * Base error class.
 */
export class ProvisioningError extends Error {
  public readonly code: ProvisioningErrorCode;

  /**
   * Always false. Kept so callers can treat every error in this package
   * uniformly with other integration errors.
   */
  public readonly retryable: boolean = false;

  constructor(message: string, code: ProvisioningErrorCode, options?: { cause?: unknown }) {
    super(message, options?.cause !== undefined ? { cause: options.cause } : undefined);
    this.name = 'ProvisioningError';
    this.code = code;

    if (Error.captureStackTrace) {
      Error.captureStackTrace(this, new.target);
    }

    Object.setPrototypeOf(this, new.target.prototype);
  }

  override toString(): string {
    return `${this.name} [${this.code}]: ${this.message}`;
  }
}

/**
 * Invalid configuration, app name or settings.
 */
export class ConfigurationError extends ProvisioningError {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, 'CONFIGURATION', options);
    this.name = 'ConfigurationError';
  }
}

/**
 * Key material could not be used to sign a request.
 */
export class SigningError extends ProvisioningError {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, 'SIGNING', options);
    this.name = 'SigningError';
  }
}

/**
 * Network or connection failure before a response was received.
 */
export class TransportError extends ProvisioningError {
  public readonly url?: string;

  constructor(
    message: string,
    options?: { url?: string; timeout?: boolean; cause?: unknown }
  ) {
    super(message, options?.timeout ? 'TIMEOUT' : 'TRANSPORT', options);
    this.name = 'TransportError';
    this.url = options?.url;
  }
}

/**
 * Provider API answered with a non-2xx status.
 */
export class ApiError extends ProvisioningError {
  public readonly status: number;

  constructor(status: number, message: string) {
    super(`API error: ${message} (status: ${status})`, 'API');
    this.name = 'ApiError';
    this.status = status;
  }
}

/**
 * Provider response is malformed or misses a field the contract guarantees
 * (an async operation without `reference`, an API key without its secret).
 */
export class ProtocolError extends ProvisioningError {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, 'PROTOCOL', options);
    this.name = 'ProtocolError';
  }
}

/**
 * Object storage (bucket or bucket policy) operation failed.
 */
export class StorageError extends ProvisioningError {
  public readonly bucket: string;

  constructor(message: string, bucket: string, options?: { cause?: unknown }) {
    super(message, 'STORAGE', options);
    this.name = 'StorageError';
    this.bucket = bucket;
  }
}

/**
 * A provisioning or teardown step failed.
 *
 * Carries the step, the provider and the underlying error so a failure can be
 * diagnosed from the message alone.
 */
export class StepError extends ProvisioningError {
  public readonly step: ProvisioningStep;
  public readonly provider: ProviderKind;

  constructor(step: ProvisioningStep, provider: ProviderKind, cause: unknown) {
    super(`Step '${step}' failed on ${provider}: ${errorMessage(cause)}`, 'STEP', { cause });
    this.name = 'StepError';
    this.step = step;
    this.provider = provider;
  }

  /**
   * Code of the wrapped error, or 'STEP' when it is not a ProvisioningError.
   */
  get causeCode(): ProvisioningErrorCode {
    return this.cause instanceof ProvisioningError ? this.cause.code : 'STEP';
  }
}

/**
 * Extract a message from any thrown value.
 */
export function errorMessage(error: unknown): string {
  if (error instanceof Error) {
    return error.message;
  }
  return String(error);
}
