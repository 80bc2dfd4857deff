import { readManifest } from '../manifest/index.js';
import {
  restoreFile,
  type RestoreCallbacks,
  type RestoreOptions,
  type RestoreResult,
} from '../restoring/index.js';
import {
  splitFile,
  type SplitCallbacks,
  type SplitOptions,
  type SplitResult,
} from '../splitting/index.js';

/**
 * Per-file hooks for a batch run: the engine callbacks plus a completion hook
 */
export interface SplitFileHooks extends SplitCallbacks {
  onComplete?: (result: SplitResult) => void;
}

export interface RestoreFileHooks extends RestoreCallbacks {
  onComplete?: (result: RestoreResult) => void;
}

/**
 * Splits several files one after another with the same options
 *
 * Stops at the first failure; files after it are not touched.
 *
 * @param filePaths - Files to split, in order
 * @param options - Shared split options
 * @param hooksFor - Builds the hooks for each file just before it starts
 */
export async function splitFiles(
  filePaths: string[],
  options: SplitOptions,
  hooksFor?: (filePath: string, index: number) => SplitFileHooks
): Promise<SplitResult[]> {
  const results: SplitResult[] = [];
  for (const [index, filePath] of filePaths.entries()) {
    const hooks: SplitFileHooks = hooksFor?.(filePath, index) ?? {};
    const result = await splitFile(filePath, options, hooks);
    hooks.onComplete?.(result);
    results.push(result);
  }
  return results;
}

/**
 * Reads each manifest and restores its file, one after another
 *
 * Stops at the first failure, including a manifest that cannot be read or validated.
 */
export async function restoreFiles(
  manifestPaths: string[],
  options: RestoreOptions,
  hooksFor?: (manifestPath: string, index: number) => RestoreFileHooks
): Promise<RestoreResult[]> {
  const results: RestoreResult[] = [];
  for (const [index, manifestPath] of manifestPaths.entries()) {
    const hooks: RestoreFileHooks = hooksFor?.(manifestPath, index) ?? {};
    const manifest = await readManifest(manifestPath);
    const result = await restoreFile(manifest, options, hooks);
    hooks.onComplete?.(result);
    results.push(result);
  }
  return results;
}
