/**
 * SCF API Client
 *
 * Provides a typed interface to the Cloud Foundry REST API with:
 * - Region and project scoping on every path
 * - JSON logging with secret redaction
 * - Caller-supplied cancellation plus a per-request timeout
 *
 * Retries are deliberately absent: a failed call surfaces to the caller.
 */

import type {
  AssignQuotaRequest,
  CallOptions,
  CreateOrganizationRequest,
  CreateOrganizationResponse,
  HttpMethod,
  OrgManager,
  Organization,
  Platform,
  RegionScope,
  ScfClientConfig,
  UpdateOrganizationRequest,
} from './types.js';
import { ApiRequestError } from './errors.js';
import { logger, ApiLogger } from './logger.js';

// =============================================================================
// Types
// =============================================================================

/**
 * Organizations sub-client
 */
export interface OrganizationsClient {
  create(
    scope: RegionScope,
    request: CreateOrganizationRequest,
    options?: CallOptions
  ): Promise<CreateOrganizationResponse>;
  get(scope: RegionScope, orgId: string, options?: CallOptions): Promise<Organization>;
  update(
    scope: RegionScope,
    orgId: string,
    request: UpdateOrganizationRequest,
    options?: CallOptions
  ): Promise<Organization>;
  delete(scope: RegionScope, orgId: string, options?: CallOptions): Promise<void>;
  assignQuota(
    scope: RegionScope,
    orgId: string,
    request: AssignQuotaRequest,
    options?: CallOptions
  ): Promise<Organization>;
}

/**
 * Organization manager sub-client (addressed through the organization)
 */
export interface OrganizationManagersClient {
  create(scope: RegionScope, orgId: string, options?: CallOptions): Promise<OrgManager>;
  get(scope: RegionScope, orgId: string, options?: CallOptions): Promise<OrgManager>;
  delete(scope: RegionScope, orgId: string, options?: CallOptions): Promise<void>;
}

/**
 * Platforms sub-client
 */
export interface PlatformsClient {
  get(scope: RegionScope, platformId: string, options?: CallOptions): Promise<Platform>;
}

/**
 * Main SCF client interface
 */
export interface ScfClient {
  readonly organizations: OrganizationsClient;
  readonly organizationManagers: OrganizationManagersClient;
  readonly platforms: PlatformsClient;

  /** Get current configuration (without secrets) */
  getConfig(): { baseUrl: string; hasToken: boolean };
}

// =============================================================================
// Wire Decoding
// =============================================================================

type WireRecord = Record<string, unknown>;

function asRecord(body: unknown, what: string): WireRecord {
  if (body === null || typeof body !== 'object' || Array.isArray(body)) {
    throw new Error(`Unexpected ${what} response: expected a JSON object`);
  }
  return Object.fromEntries(Object.entries(body));
}

function optString(record: WireRecord, key: string): string | undefined {
  const value = record[key];
  return typeof value === 'string' ? value : undefined;
}

function optBoolean(record: WireRecord, key: string): boolean | undefined {
  const value = record[key];
  return typeof value === 'boolean' ? value : undefined;
}

export function decodeOrganization(body: unknown): Organization {
  const r = asRecord(body, 'organization');
  return {
    guid: optString(r, 'guid'),
    name: optString(r, 'name'),
    platformId: optString(r, 'platformId'),
    projectId: optString(r, 'projectId'),
    quotaId: optString(r, 'quotaId'),
    region: optString(r, 'region'),
    status: optString(r, 'status'),
    suspended: optBoolean(r, 'suspended'),
    createdAt: optString(r, 'createdAt'),
    updatedAt: optString(r, 'updatedAt'),
  };
}

export function decodeOrgManager(body: unknown): OrgManager {
  const r = asRecord(body, 'organization manager');
  return {
    guid: optString(r, 'guid'),
    orgId: optString(r, 'orgId'),
    platformId: optString(r, 'platformId'),
    projectId: optString(r, 'projectId'),
    region: optString(r, 'region'),
    username: optString(r, 'username'),
    password: optString(r, 'password'),
    createdAt: optString(r, 'createdAt'),
    updatedAt: optString(r, 'updatedAt'),
  };
}

export function decodePlatform(body: unknown): Platform {
  const r = asRecord(body, 'platform');
  return {
    guid: optString(r, 'guid'),
    systemId: optString(r, 'systemId'),
    displayName: optString(r, 'displayName'),
    region: optString(r, 'region'),
    api: optString(r, 'api'),
    console: optString(r, 'console'),
  };
}

function decodeCreateOrganization(body: unknown): CreateOrganizationResponse {
  return { guid: optString(asRecord(body, 'create organization'), 'guid') };
}

// =============================================================================
// Client Implementation
// =============================================================================

/**
 * Build the scoped path prefix for a project and region
 */
export function scopePath(scope: RegionScope): string {
  return `/v1/projects/${encodeURIComponent(scope.projectId)}/regions/${encodeURIComponent(scope.region)}`;
}

/**
 * Create an SCF API client
 *
 * @param config - Client configuration options
 * @returns Configured SCF client
 */
export function createClient(config: ScfClientConfig): ScfClient {
  const baseUrl = config.baseUrl.replace(/\/+$/, '');
  const timeout = config.timeout ?? 30000;
  const log = config.logger ?? (config.debug ? logger : new ApiLogger({ level: 'warn' }));

  const defaultHeaders: Record<string, string> = {
    'Content-Type': 'application/json',
    Accept: 'application/json',
  };

  if (config.token) {
    defaultHeaders['Authorization'] = `Bearer ${config.token}`;
  }

  if (config.userAgent) {
    defaultHeaders['User-Agent'] = `scf-reconcile ${config.userAgent}`;
  }

  /**
   * Make an API request; resolves to the parsed JSON body (undefined on 204)
   */
  async function request(
    method: HttpMethod,
    path: string,
    options: { body?: unknown; signal?: AbortSignal } = {}
  ): Promise<unknown> {
    const url = `${baseUrl}${path}`;
    log.request(method, url, defaultHeaders);

    const controller = new AbortController();
    const timeoutId = setTimeout(() => controller.abort(), timeout);
    const forwardAbort = (): void => controller.abort();
    if (options.signal?.aborted) {
      controller.abort();
    } else {
      options.signal?.addEventListener('abort', forwardAbort, { once: true });
    }

    try {
      const startTime = Date.now();
      const response = await fetch(url, {
        method,
        headers: defaultHeaders,
        body: options.body !== undefined ? JSON.stringify(options.body) : undefined,
        signal: controller.signal,
      });

      log.response(response.status, url, Date.now() - startTime);

      if (!response.ok) {
        throw await toRequestError(response);
      }

      if (response.status === 204) {
        return undefined;
      }

      const text = await response.text();
      return text.length > 0 ? JSON.parse(text) : undefined;
    } finally {
      clearTimeout(timeoutId);
      options.signal?.removeEventListener('abort', forwardAbort);
    }
  }

  // ---------------------------------------------------------------------------
  // Organizations Client
  // ---------------------------------------------------------------------------

  const organizations: OrganizationsClient = {
    async create(scope, body, options = {}) {
      const data = await request('POST', `${scopePath(scope)}/organizations`, {
        body,
        signal: options.signal,
      });
      return decodeCreateOrganization(data);
    },

    async get(scope, orgId, options = {}) {
      const data = await request(
        'GET',
        `${scopePath(scope)}/organizations/${encodeURIComponent(orgId)}`,
        { signal: options.signal }
      );
      return decodeOrganization(data);
    },

    async update(scope, orgId, body, options = {}) {
      const data = await request(
        'PATCH',
        `${scopePath(scope)}/organizations/${encodeURIComponent(orgId)}`,
        { body, signal: options.signal }
      );
      return decodeOrganization(data);
    },

    async delete(scope, orgId, options = {}) {
      await request(
        'DELETE',
        `${scopePath(scope)}/organizations/${encodeURIComponent(orgId)}`,
        { signal: options.signal }
      );
    },

    async assignQuota(scope, orgId, body, options = {}) {
      const data = await request(
        'PUT',
        `${scopePath(scope)}/organizations/${encodeURIComponent(orgId)}/quota`,
        { body, signal: options.signal }
      );
      return decodeOrganization(data);
    },
  };

  // ---------------------------------------------------------------------------
  // Organization Managers Client
  // ---------------------------------------------------------------------------

  const organizationManagers: OrganizationManagersClient = {
    async create(scope, orgId, options = {}) {
      const data = await request(
        'POST',
        `${scopePath(scope)}/organizations/${encodeURIComponent(orgId)}/manager`,
        { body: {}, signal: options.signal }
      );
      return decodeOrgManager(data);
    },

    async get(scope, orgId, options = {}) {
      const data = await request(
        'GET',
        `${scopePath(scope)}/organizations/${encodeURIComponent(orgId)}/manager`,
        { signal: options.signal }
      );
      return decodeOrgManager(data);
    },

    async delete(scope, orgId, options = {}) {
      await request(
        'DELETE',
        `${scopePath(scope)}/organizations/${encodeURIComponent(orgId)}/manager`,
        { signal: options.signal }
      );
    },
  };

  // ---------------------------------------------------------------------------
  // Platforms Client
  // ---------------------------------------------------------------------------

  const platforms: PlatformsClient = {
    async get(scope, platformId, options = {}) {
      const data = await request(
        'GET',
        `${scopePath(scope)}/platforms/${encodeURIComponent(platformId)}`,
        { signal: options.signal }
      );
      return decodePlatform(data);
    },
  };

  return {
    organizations,
    organizationManagers,
    platforms,
    getConfig() {
      return { baseUrl, hasToken: Boolean(config.token) };
    },
  };
}

/**
 * Build an ApiRequestError from a failed response, keeping the service message
 */
async function toRequestError(response: Response): Promise<ApiRequestError> {
  let message = `SCF API error (${response.status})`;
  let details: Record<string, unknown> | undefined;

  const body = await response.text().catch(() => '');
  if (body) {
    try {
      details = asRecord(JSON.parse(body), 'error');
      message = optString(details, 'message') ?? optString(details, 'detail') ?? message;
    } catch {
      message = body.substring(0, 200);
    }
  }

  return new ApiRequestError(message, response.status, {
    code: details ? optString(details, 'code') : undefined,
    details,
  });
}
