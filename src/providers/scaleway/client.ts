/**
 * Scaleway IAM Client
 *
 * Static-key provider: applications, policies and API keys, authenticated
 * with the `X-Auth-Token` header.
 *
 * @module providers/scaleway/client
 */

import type { ScalewayCredentials } from '../../config/credentials.js';
import { SecretString } from '../../config/secret.js';
import { SCALEWAY_IAM_API_BASE } from '../../config/settings.js';
import { ProtocolError } from '../../error/index.js';
import type { Logger } from '../../observability/index.js';
import { buildScalewayPolicyRules } from '../../policy/builder.js';
import { StaticKeySigner } from '../../signing/index.js';
import type { HttpTransport } from '../../transport/index.js';
import { JsonApiClient } from '../http.js';
import type {
  ApiKeyCredential,
  ApiKeySummary,
  CreateApiKeyInput,
  CreatePrincipalInput,
  CreateScopedPolicyInput,
  Principal,
  ProviderClient,
  ScopedPolicy,
} from '../types.js';
import {
  apiKeySchema,
  apiKeysResponseSchema,
  applicationSchema,
  applicationsResponseSchema,
  policiesResponseSchema,
  policySchema,
  type ScalewayApplication,
  type ScalewayPolicy,
} from './types.js';

export interface ScalewayClientOptions {
  credentials: ScalewayCredentials;
  transport: HttpTransport;
  logger: Logger;
  /** Defaults to the public IAM endpoint. */
  baseUrl?: string;
}

function toPrincipal(application: ScalewayApplication): Principal {
  return {
    id: application.id,
    name: application.name,
    description: application.description ?? undefined,
  };
}

export class ScalewayClient implements ProviderClient {
  readonly kind = 'scaleway' as const;
  readonly requiresScopedPolicy = true;

  private readonly api: JsonApiClient;
  private readonly organizationId: string;
  private readonly projectId: string;

  constructor(options: ScalewayClientOptions) {
    this.organizationId = options.credentials.organizationId;
    this.projectId = options.credentials.projectId;
    this.api = new JsonApiClient({
      baseUrl: options.baseUrl ?? SCALEWAY_IAM_API_BASE,
      signer: new StaticKeySigner(new SecretString(options.credentials.secretKey)),
      transport: options.transport,
      logger: options.logger.child({ provider: 'scaleway' }),
    });
  }

  async createApplication(name: string, description: string): Promise<ScalewayApplication> {
    return this.api.request('POST', '/applications', applicationSchema, {
      body: { name, description, organization_id: this.organizationId },
    });
  }

  async listApplications(): Promise<ScalewayApplication[]> {
    const response = await this.api.request('GET', '/applications', applicationsResponseSchema, {
      query: { organization_id: this.organizationId },
    });
    return response.applications;
  }

  async deleteApplication(applicationId: string): Promise<void> {
    await this.api.requestVoid('DELETE', `/applications/${encodeURIComponent(applicationId)}`);
  }

  /**
   * Create a policy granting object read, write and delete on the configured
   * project. Bucket management is never granted.
   */
  async createPolicy(name: string, applicationId: string): Promise<ScalewayPolicy> {
    return this.api.request('POST', '/policies', policySchema, {
      body: {
        name,
        organization_id: this.organizationId,
        application_id: applicationId,
        rules: buildScalewayPolicyRules(this.projectId),
      },
    });
  }

  async listPolicies(applicationId: string): Promise<ScalewayPolicy[]> {
    const response = await this.api.request('GET', '/policies', policiesResponseSchema, {
      query: { application_id: applicationId },
    });
    return response.policies;
  }

  async deletePolicy(policyId: string): Promise<void> {
    await this.api.requestVoid('DELETE', `/policies/${encodeURIComponent(policyId)}`);
  }

  // ProviderClient

  async createPrincipal(input: CreatePrincipalInput): Promise<Principal> {
    return toPrincipal(await this.createApplication(input.name, input.description));
  }

  async createScopedPolicy(
    principal: Principal,
    input: CreateScopedPolicyInput
  ): Promise<ScopedPolicy> {
    const policy = await this.createPolicy(input.name, principal.id);
    return { id: policy.id, name: policy.name, principalId: principal.id, embedded: false };
  }

  async createApiKey(principal: Principal, input: CreateApiKeyInput): Promise<ApiKeyCredential> {
    const key = await this.api.request('POST', '/api-keys', apiKeySchema, {
      body: {
        application_id: principal.id,
        description: input.description,
        default_project_id: this.projectId,
      },
    });
    if (!key.secret_key) {
      throw new ProtocolError(`API key ${key.access_key} was created without a secret_key`);
    }
    return {
      accessKey: key.access_key,
      secretKey: new SecretString(key.secret_key),
      principalId: principal.id,
    };
  }

  async listPrincipals(): Promise<Principal[]> {
    return (await this.listApplications()).map(toPrincipal);
  }

  async listApiKeys(principalId?: string): Promise<ApiKeySummary[]> {
    const response = await this.api.request('GET', '/api-keys', apiKeysResponseSchema, {
      query: { application_id: principalId },
    });
    return response.api_keys.map((key) => ({
      accessKey: key.access_key,
      principalId: key.application_id ?? undefined,
      description: key.description ?? undefined,
    }));
  }

  /**
   * Delete an application. Its policies and keys are expected to be removed
   * with it upstream.
   */
  async deletePrincipal(principalId: string): Promise<void> {
    await this.deleteApplication(principalId);
  }

  async deleteApiKey(accessKey: string): Promise<void> {
    await this.api.requestVoid('DELETE', `/api-keys/${encodeURIComponent(accessKey)}`);
  }
}
