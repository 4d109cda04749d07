/**
 * Platform reconciler exports
 */

export type { PlatformField } from './resource.js';

export { PLATFORM_KIND, PLATFORM_FIELDS, platformDescriptions, platformResource } from './resource.js';
