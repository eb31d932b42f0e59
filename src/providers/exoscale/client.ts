/**
 * Exoscale IAM Client
 *
 * Signed-request provider: roles carrying an inline policy, and API keys
 * bound to a role. Every request is signed with `EXO2-HMAC-SHA256`.
 *
 * Role creation is asynchronous upstream. The role id is read from the
 * operation's `reference`; the role is usable only after a short delay,
 * which the orchestrator waits out.
 *
 * @module providers/exoscale/client
 */

import type { ExoscaleCredentials } from '../../config/credentials.js';
import { SecretString } from '../../config/secret.js';
import { DEFAULT_SETTINGS, exoscaleApiBase } from '../../config/settings.js';
import { ProtocolError } from '../../error/index.js';
import type { Logger } from '../../observability/index.js';
import { buildExoscaleRolePolicy } from '../../policy/builder.js';
import { HmacRequestSigner, type Clock } from '../../signing/index.js';
import type { HttpTransport } from '../../transport/index.js';
import { JsonApiClient } from '../http.js';
import type {
  ApiKeyCredential,
  ApiKeySummary,
  CreateApiKeyInput,
  CreatePrincipalInput,
  Principal,
  ProviderClient,
  ScopedPolicy,
} from '../types.js';
import {
  apiKeySchema,
  apiKeysResponseSchema,
  iamRolesResponseSchema,
  operationSchema,
  type ExoscaleApiKey,
  type ExoscaleIamRole,
} from './types.js';

export interface ExoscaleClientOptions {
  credentials: ExoscaleCredentials;
  transport: HttpTransport;
  logger: Logger;
  /** Defaults to the public endpoint of the configured zone. */
  baseUrl?: string;
  /** Signing clock. */
  clock?: Clock;
}

const API_PREFIX = '/v2';

export class ExoscaleClient implements ProviderClient {
  readonly kind = 'exoscale' as const;
  readonly requiresScopedPolicy = false;

  private readonly api: JsonApiClient;

  constructor(options: ExoscaleClientOptions) {
    const { credentials } = options;
    this.api = new JsonApiClient({
      baseUrl: options.baseUrl ?? exoscaleApiBase(DEFAULT_SETTINGS, credentials.zone),
      signer: new HmacRequestSigner(
        credentials.apiKey,
        new SecretString(credentials.apiSecret),
        options.clock
      ),
      transport: options.transport,
      logger: options.logger.child({ provider: 'exoscale', zone: credentials.zone }),
    });
  }

  /**
   * Create a role restricted to object operations on `bucket` under `prefix`.
   *
   * @throws {ProtocolError} if the operation response has no reference
   */
  async createRole(
    name: string,
    description: string,
    bucket: string,
    prefix: string
  ): Promise<ExoscaleIamRole> {
    const operation = await this.api.request('POST', `${API_PREFIX}/iam-role`, operationSchema, {
      body: {
        name,
        description,
        editable: false,
        policy: buildExoscaleRolePolicy(bucket, prefix),
      },
    });

    if (!operation.reference) {
      throw new ProtocolError(
        `Operation ${operation.id} (${operation.state}) is missing reference to the created role`
      );
    }
    return { id: operation.reference.id, name, description };
  }

  async listRoles(): Promise<ExoscaleIamRole[]> {
    const response = await this.api.request('GET', `${API_PREFIX}/iam-role`, iamRolesResponseSchema);
    return response['iam-roles'];
  }

  async deleteRole(roleId: string): Promise<void> {
    await this.api.requestVoid('DELETE', `${API_PREFIX}/iam-role/${encodeURIComponent(roleId)}`);
  }

  async createKey(name: string, roleId: string): Promise<ExoscaleApiKey> {
    return this.api.request('POST', `${API_PREFIX}/api-key`, apiKeySchema, {
      body: { name, 'role-id': roleId },
    });
  }

  async listKeys(): Promise<ExoscaleApiKey[]> {
    const response = await this.api.request('GET', `${API_PREFIX}/api-key`, apiKeysResponseSchema);
    return response['api-keys'];
  }

  // ProviderClient

  async createPrincipal(input: CreatePrincipalInput): Promise<Principal> {
    const role = await this.createRole(input.name, input.description, input.bucket, input.prefix);
    return { id: role.id, name: input.name, description: input.description };
  }

  /**
   * The role carries its own policy: nothing to create.
   */
  async createScopedPolicy(principal: Principal): Promise<ScopedPolicy> {
    return { id: principal.id, name: principal.name, principalId: principal.id, embedded: true };
  }

  async createApiKey(principal: Principal, input: CreateApiKeyInput): Promise<ApiKeyCredential> {
    const key = await this.createKey(input.name, principal.id);
    if (!key.secret) {
      throw new ProtocolError(`API key ${key.key} was created without a secret`);
    }
    return {
      accessKey: key.key,
      secretKey: new SecretString(key.secret),
      principalId: principal.id,
    };
  }

  async listPrincipals(): Promise<Principal[]> {
    return (await this.listRoles()).map((role) => ({
      id: role.id,
      name: role.name ?? '',
      description: role.description ?? undefined,
    }));
  }

  /**
   * Keys are listed account-wide; the role filter is applied locally.
   */
  async listApiKeys(principalId?: string): Promise<ApiKeySummary[]> {
    const keys = await this.listKeys();
    return keys
      .filter((key) => principalId === undefined || key['role-id'] === principalId)
      .map((key) => ({
        accessKey: key.key,
        name: key.name,
        principalId: key['role-id'] ?? undefined,
      }));
  }

  /**
   * Delete a role. Keys bound to it are not removed upstream.
   */
  async deletePrincipal(principalId: string): Promise<void> {
    await this.deleteRole(principalId);
  }

  async deleteApiKey(accessKey: string): Promise<void> {
    await this.api.requestVoid('DELETE', `${API_PREFIX}/api-key/${encodeURIComponent(accessKey)}`);
  }
}
