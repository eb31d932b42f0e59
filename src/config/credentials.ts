/**
 * Provider Credentials
 *
 * Named credential sets, one per configured provider. Validated with zod on
 * load and on `add-provider`.
 *
 * @module config/credentials
 */

import { z } from 'zod';
import { ConfigurationError } from '../error/index.js';
import type { ProviderKind } from '../types/common.js';

/**
 * S3 bucket naming rule. Bucket names are substituted verbatim into policy
 * expressions, so nothing outside this alphabet may get through.
 */
const bucketSchema = z
  .string()
  .min(3, 'Bucket name must be 3-63 characters')
  .max(63, 'Bucket name must be 3-63 characters')
  .regex(/^[a-z0-9][a-z0-9.-]*[a-z0-9]$/, 'Invalid bucket name format');

const locationSchema = z.string().regex(/^[a-z0-9]+(-[a-z0-9]+)*$/, 'Invalid region/zone format');

const requiredString = z.string().min(1, 'Required');

export const scalewayCredentialsSchema = z.object({
  type: z.literal('scaleway'),
  accessKey: requiredString,
  secretKey: requiredString,
  organizationId: requiredString,
  projectId: requiredString,
  /** Region (e.g., fr-par, nl-ams, pl-waw) */
  region: locationSchema,
  bucket: bucketSchema,
});

export const exoscaleCredentialsSchema = z.object({
  type: z.literal('exoscale'),
  apiKey: requiredString,
  apiSecret: requiredString,
  /** Zone (e.g., ch-gva-2, de-fra-1, ch-dk-2) */
  zone: locationSchema,
  bucket: bucketSchema,
});

export const providerCredentialsSchema = z.discriminatedUnion('type', [
  scalewayCredentialsSchema,
  exoscaleCredentialsSchema,
]);

export type ScalewayCredentials = z.infer<typeof scalewayCredentialsSchema>;
export type ExoscaleCredentials = z.infer<typeof exoscaleCredentialsSchema>;
export type ProviderCredentials = z.infer<typeof providerCredentialsSchema>;

/**
 * Validate a credential set entered by the operator.
 *
 * @throws {ConfigurationError} naming the first invalid field
 */
export function parseCredentials(input: unknown): ProviderCredentials {
  const result = providerCredentialsSchema.safeParse(input);
  if (!result.success) {
    const issue = result.error.issues[0];
    const field = issue && issue.path.length > 0 ? `${issue.path.join('.')}: ` : '';
    throw new ConfigurationError(`Invalid provider configuration: ${field}${issue?.message ?? 'invalid'}`);
  }
  return result.data;
}

/**
 * S3 endpoint URL for a credential set.
 */
export function storageEndpoint(credentials: ProviderCredentials): string {
  switch (credentials.type) {
    case 'scaleway':
      return `https://s3.${credentials.region}.scw.cloud`;
    case 'exoscale':
      return `https://sos-${credentials.zone}.exo.io`;
  }
}

/**
 * Region (Scaleway) or zone (Exoscale) of a credential set.
 */
export function storageLocation(credentials: ProviderCredentials): string {
  return credentials.type === 'scaleway' ? credentials.region : credentials.zone;
}

/**
 * One-line description, e.g. `scaleway (fr-par)`.
 */
export function describeCredentials(credentials: ProviderCredentials): string {
  const kind: ProviderKind = credentials.type;
  return `${kind} (${storageLocation(credentials)})`;
}
