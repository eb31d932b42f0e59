/**
 * Exoscale IAM wire types (kebab-case).
 *
 * @module providers/exoscale/types
 */

import { z } from 'zod';

export const operationSchema = z.object({
  id: z.string(),
  state: z.string(),
  reference: z
    .object({
      id: z.string(),
      link: z.string().nullish(),
      command: z.string().nullish(),
    })
    .nullish(),
});

export const iamRoleSchema = z.object({
  id: z.string(),
  name: z.string().nullish(),
  description: z.string().nullish(),
});

export const iamRolesResponseSchema = z.object({
  'iam-roles': z.array(iamRoleSchema),
});

export const apiKeySchema = z.object({
  name: z.string(),
  key: z.string(),
  secret: z.string().nullish(),
  'role-id': z.string().nullish(),
});

export const apiKeysResponseSchema = z.object({
  'api-keys': z.array(apiKeySchema),
});

export type ExoscaleOperation = z.infer<typeof operationSchema>;
export type ExoscaleIamRole = z.infer<typeof iamRoleSchema>;
export type ExoscaleApiKey = z.infer<typeof apiKeySchema>;
