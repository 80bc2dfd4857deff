/**
 * Restore Command
 * Rebuilds original files from their manifests
 */

import { basename, resolve } from 'path';
import chalk from 'chalk';
import type { Command } from 'commander';
import { restoreFiles } from '../../../core/batch/index.js';
import type { RestoreResult } from '../../../core/restoring/index.js';
import { config as envConfig } from '../../../config.js';
import { formatError } from '../../../utils/errors.js';
import { createLogger, setDebugMode, type Logger } from '../../../utils/logger.js';
import { TransferProgressHandler } from '../../progress.js';
import {
  displayIntegrityWarnings,
  displayRestoreConfiguration,
  displayRestoreSummary,
} from './display.js';

// Integrity warnings are listed after each spinner settles instead of interleaving with it
const restoreLogger: Logger = { ...createLogger('restore'), warn: () => {} };

interface RestoreCommandOptions {
  inputDir: string;
  outputDir: string;
  strict: boolean;
  debug: boolean;
}

/**
 * Register the restore command with the CLI program
 */
export function registerRestoreCommand(program: Command): void {
  program
    .command('restore')
    .description('Restore one or more files from their split manifests')
    .argument('<manifests...>', 'Manifest files (e.g. my_file_parts/my_file.json)')
    .option(
      '-i, --input-dir <directory>',
      'Root directory holding the chunk subdirectories',
      envConfig.inputDir
    )
    .option(
      '-o, --output-dir <directory>',
      'Directory the restored files are written to',
      envConfig.outputDir
    )
    .option('--strict', 'Abort on checksum mismatch instead of warning', envConfig.strict)
    .option('--debug', 'Enable debug logging for verbose output', false)
    .action(async (manifests: string[], options: RestoreCommandOptions) => {
      if (options.debug) {
        setDebugMode(true);
      }

      const chunksRoot = resolve(options.inputDir);
      const outputDir = resolve(options.outputDir);
      displayRestoreConfiguration({
        manifestCount: manifests.length,
        inputDir: chunksRoot,
        outputDir,
        strict: options.strict,
      });

      // Spinners in start order; the last one belongs to the manifest in flight
      const active: { manifestPath: string; progress: TransferProgressHandler }[] = [];
      let results: RestoreResult[];
      try {
        results = await restoreFiles(
          manifests.map((manifest) => resolve(manifest)),
          { chunksRoot, outputDir, strict: options.strict, logger: restoreLogger },
          (manifestPath) => {
            const progress = new TransferProgressHandler(
              `Reading restore info file: ${manifestPath}`
            );
            active.push({ manifestPath, progress });
            return {
              ...progress.getCallbacks(),
              onComplete: (result) => {
                const name = basename(result.outputPath);
                if (result.warnings.length > 0) {
                  progress.warn(`'${name}' restored with integrity warnings`);
                  displayIntegrityWarnings(result.warnings);
                } else {
                  progress.succeed(`'${name}' restoration complete`);
                }
              },
            };
          }
        );
      } catch (error) {
        const failed = active.at(-1);
        if (failed) {
          failed.progress.fail(`Failed to restore from ${failed.manifestPath}`);
        }
        console.error(chalk.red(`\n❌ ${formatError(error)}\n`));
        process.exit(1);
      }

      displayRestoreSummary(results);
    });
}
