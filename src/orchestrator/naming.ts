/**
 * Application Naming
 *
 * App names end up inside bucket policy resources and role policy
 * expressions, so they are restricted to a quote-free character set.
 *
 * @module orchestrator/naming
 */

import { ConfigurationError } from '../error/index.js';

export const APP_NAME_PATTERN = /^[a-z0-9][a-z0-9-]{0,62}$/;

/**
 * Prefix of every IAM resource this tool names after an app (signed-request
 * provider). Listings use it to recognise managed roles.
 */
export const MANAGED_NAME_PREFIX = 'bucketward-';

/**
 * @throws {ConfigurationError} if `name` is not a valid app name
 */
export function validateAppName(name: string): string {
  if (!APP_NAME_PATTERN.test(name)) {
    throw new ConfigurationError(
      `Invalid app name '${name}': use 1-63 lowercase letters, digits or hyphens, starting with a letter or digit`
    );
  }
  return name;
}
