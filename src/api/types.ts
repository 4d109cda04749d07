/**
 * API response types for the SCF (Cloud Foundry) API client
 *
 * Every property is optional: the service omits fields it has no value for,
 * and the state mapper is responsible for deciding which ones are required.
 */

import type { ApiLogger } from './logger.js';

// =============================================================================
// Common Types
// =============================================================================

/**
 * HTTP methods supported by the API
 */
export type HttpMethod = 'GET' | 'POST' | 'PUT' | 'PATCH' | 'DELETE';

/**
 * Scope of every SCF call: the owning project and the region it lives in
 */
export interface RegionScope {
  projectId: string;
  region: string;
}

/**
 * Per-call options forwarded to fetch
 */
export interface CallOptions {
  /** Cancellation signal from the caller's context */
  signal?: AbortSignal;
}

// =============================================================================
// Entity Types
// =============================================================================

/**
 * Cloud Foundry organization
 */
export interface Organization {
  guid?: string;
  name?: string;
  platformId?: string;
  projectId?: string;
  quotaId?: string;
  region?: string;
  status?: string;
  suspended?: boolean;
  createdAt?: string;
  updatedAt?: string;
}

/**
 * Create organization request
 */
export interface CreateOrganizationRequest {
  name?: string;
  platformId?: string;
}

/**
 * Response of the create organization call (only the identifier)
 */
export interface CreateOrganizationResponse {
  guid?: string;
}

/**
 * Update organization request
 */
export interface UpdateOrganizationRequest {
  name?: string;
  suspended?: boolean;
}

/**
 * Assign quota request
 */
export interface AssignQuotaRequest {
  quotaId?: string;
}

/**
 * Organization manager user
 *
 * `password` is only present in the create response.
 */
export interface OrgManager {
  guid?: string;
  orgId?: string;
  platformId?: string;
  projectId?: string;
  region?: string;
  username?: string;
  password?: string;
  createdAt?: string;
  updatedAt?: string;
}

/**
 * Cloud Foundry platform (read-only)
 */
export interface Platform {
  guid?: string;
  systemId?: string;
  displayName?: string;
  region?: string;
  api?: string;
  console?: string;
}

// =============================================================================
// Configuration Types
// =============================================================================

/**
 * Client configuration options
 */
export interface ScfClientConfig {
  /** API base URL */
  baseUrl: string;
  /** Bearer token; sent as Authorization header when present */
  token?: string;
  /** Request timeout in milliseconds */
  timeout?: number;
  /** Extra User-Agent suffix */
  userAgent?: string;
  /** Log requests and responses at debug level */
  debug?: boolean;
  /** Logger for request and response lines; overrides `debug` */
  logger?: ApiLogger;
}
