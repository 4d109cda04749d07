/**
 * SCF API client module
 *
 * Provides:
 * - ScfClient with organizations, organization managers and platforms sub-clients
 * - JSON logging with secret redaction
 * - Type definitions for API entities
 */

// Main client
export {
  createClient,
  scopePath,
  decodeOrganization,
  decodeOrgManager,
  decodePlatform,
} from './client.js';

export type {
  ScfClient,
  OrganizationsClient,
  OrganizationManagersClient,
  PlatformsClient,
} from './client.js';

// Errors
export { ApiRequestError, NOT_FOUND_STATUS } from './errors.js';

// Logger utilities
export {
  logger,
  createLogger,
  ApiLogger,
  redactString,
  redactPatterns,
  redactValue,
  redactRecord,
} from './logger.js';

export type { LogLevel, LogEntry, LoggerConfig, LogSink } from './logger.js';

// Types
export type {
  HttpMethod,
  RegionScope,
  CallOptions,
  Organization,
  CreateOrganizationRequest,
  CreateOrganizationResponse,
  UpdateOrganizationRequest,
  AssignQuotaRequest,
  OrgManager,
  Platform,
  ScfClientConfig,
} from './types.js';
