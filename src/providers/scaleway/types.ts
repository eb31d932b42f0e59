/**
 * Scaleway IAM wire types.
 *
 * @module providers/scaleway/types
 */

import { z } from 'zod';

export const applicationSchema = z.object({
  id: z.string(),
  name: z.string(),
  description: z.string().nullish(),
  created_at: z.string().nullish(),
  organization_id: z.string().nullish(),
});

export const applicationsResponseSchema = z.object({
  applications: z.array(applicationSchema),
});

export const policySchema = z.object({
  id: z.string(),
  name: z.string(),
  description: z.string().nullish(),
});

export const policiesResponseSchema = z.object({
  policies: z.array(policySchema),
});

export const apiKeySchema = z.object({
  access_key: z.string(),
  secret_key: z.string().nullish(),
  application_id: z.string().nullish(),
  description: z.string().nullish(),
});

export const apiKeysResponseSchema = z.object({
  api_keys: z.array(apiKeySchema),
});

export type ScalewayApplication = z.infer<typeof applicationSchema>;
export type ScalewayPolicy = z.infer<typeof policySchema>;
export type ScalewayApiKey = z.infer<typeof apiKeySchema>;
