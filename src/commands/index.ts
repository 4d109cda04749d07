/**
 * Command exports
 */

export { applyCommand } from './apply.js';
export type { ApplyCommandOptions, ApplyData } from './apply.js';

export { readCommand } from './read.js';
export type { ReadCommandOptions } from './read.js';

export { importCommand } from './import.js';
export type { ImportCommandOptions } from './import.js';

export { deleteCommand } from './delete.js';
export type { DeleteCommandOptions, DeleteData } from './delete.js';

export { describeCommand } from './describe.js';
export type { DescribeData } from './describe.js';

export type { LifecycleData } from './shared.js';
