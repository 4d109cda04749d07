/**
 * Test helpers: in-memory stand-ins for the SCF client and logger
 */

import { vi } from 'vitest';
import type {
  OrganizationManagersClient,
  OrganizationsClient,
  PlatformsClient,
  ScfClient,
} from '../../src/api/client.js';
import { ApiRequestError } from '../../src/api/errors.js';
import { createLogger, type ApiLogger } from '../../src/api/logger.js';
import type { Organization, OrgManager, Platform } from '../../src/api/types.js';
import type { LifecycleContext } from '../../src/reconcilers/engine/types.js';

// =============================================================================
// Mock Client Factory
// =============================================================================

export interface MockClientOverrides {
  organizations?: Partial<OrganizationsClient>;
  organizationManagers?: Partial<OrganizationManagersClient>;
  platforms?: Partial<PlatformsClient>;
}

function unexpected(name: string) {
  return vi.fn(async () => {
    throw new Error(`unexpected call to ${name}`);
  });
}

export function createMockClient(overrides: MockClientOverrides = {}): ScfClient {
  return {
    organizations: {
      create: overrides.organizations?.create ?? unexpected('organizations.create'),
      get: overrides.organizations?.get ?? unexpected('organizations.get'),
      update: overrides.organizations?.update ?? unexpected('organizations.update'),
      delete: overrides.organizations?.delete ?? unexpected('organizations.delete'),
      assignQuota: overrides.organizations?.assignQuota ?? unexpected('organizations.assignQuota'),
    },
    organizationManagers: {
      create: overrides.organizationManagers?.create ?? unexpected('organizationManagers.create'),
      get: overrides.organizationManagers?.get ?? unexpected('organizationManagers.get'),
      delete: overrides.organizationManagers?.delete ?? unexpected('organizationManagers.delete'),
    },
    platforms: {
      get: overrides.platforms?.get ?? unexpected('platforms.get'),
    },
    getConfig: () => ({ baseUrl: 'https://scf.test', hasToken: false }),
  };
}

// =============================================================================
// Fixtures
// =============================================================================

export function notFound(message = 'organization not found'): ApiRequestError {
  return new ApiRequestError(message, 404);
}

export function organization(overrides: Partial<Organization> = {}): Organization {
  return {
    guid: 'org-9',
    name: 'acme',
    platformId: 'plat-1',
    projectId: 'proj-1',
    quotaId: 'quota-default',
    region: 'eu01',
    status: 'active',
    suspended: false,
    createdAt: '2024-01-01T00:00:00Z',
    updatedAt: '2024-01-02T00:00:00Z',
    ...overrides,
  };
}

export function orgManager(overrides: Partial<OrgManager> = {}): OrgManager {
  return {
    guid: 'user-5',
    orgId: 'org-9',
    platformId: 'plat-1',
    projectId: 'proj-1',
    region: 'eu01',
    username: 'manager-acme',
    createdAt: '2024-01-01T00:00:00Z',
    updatedAt: '2024-01-01T00:00:00Z',
    ...overrides,
  };
}

export function platform(overrides: Partial<Platform> = {}): Platform {
  return {
    guid: 'plat-1',
    systemId: 'sys-1',
    displayName: 'Shared',
    region: 'eu01',
    api: 'https://api.cf.test',
    console: 'https://console.cf.test',
    ...overrides,
  };
}

// =============================================================================
// Logging
// =============================================================================

export interface CapturedLogger {
  logger: ApiLogger;
  lines: string[];
}

/**
 * Logger writing to an array instead of the console
 */
export function captureLogger(): CapturedLogger {
  const lines: string[] = [];
  const logger = createLogger({ level: 'debug', timestamps: false }, (_level, line) => {
    lines.push(line);
  });
  return { logger, lines };
}

export function lifecycleContext(overrides: Partial<LifecycleContext> = {}): LifecycleContext {
  return { region: 'eu01', logger: captureLogger().logger, ...overrides };
}
