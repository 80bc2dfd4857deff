/**
 * Batch Module
 * Sequential split/restore over several inputs
 */

export { splitFiles, restoreFiles } from './batch.js';
export type { SplitFileHooks, RestoreFileHooks } from './batch.js';
