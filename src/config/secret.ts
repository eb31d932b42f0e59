/**
 * Secret string wrapper to prevent accidental exposure.
 *
 * @module config/secret
 */

import { inspect } from 'node:util';

export class SecretString {
  private readonly value: string;

  constructor(value: string) {
    this.value = value;
  }

  /**
   * Exposes the secret value.
   * Use with caution - avoid logging or displaying.
   */
  expose(): string {
    return this.value;
  }

  /**
   * True when the wrapped value is empty.
   */
  isEmpty(): boolean {
    return this.value.length === 0;
  }

  /**
   * Returns a safe representation for logging.
   */
  toString(): string {
    return '[REDACTED]';
  }

  /**
   * Custom JSON serialization to prevent accidental exposure.
   */
  toJSON(): string {
    return '[REDACTED]';
  }

  [inspect.custom](): string {
    return 'SecretString([REDACTED])';
  }
}
