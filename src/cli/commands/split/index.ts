/**
 * Split Command
 * Splits one or more files into chunk directories with manifests
 */

import { resolve } from 'path';
import chalk from 'chalk';
import type { Command } from 'commander';
import { splitFiles } from '../../../core/batch/index.js';
import type { SplitResult } from '../../../core/splitting/index.js';
import { config as envConfig } from '../../../config.js';
import { formatError } from '../../../utils/errors.js';
import { setDebugMode } from '../../../utils/logger.js';
import { TransferProgressHandler } from '../../progress.js';
import { parseSizeInput } from '../../utils.js';
import { displaySplitConfiguration, displaySplitSummary } from './display.js';

interface SplitCommandOptions {
  sizeLimit: string;
  outputDir: string;
  compress: boolean;
  debug: boolean;
}

/**
 * Register the split command with the CLI program
 */
export function registerSplitCommand(program: Command): void {
  program
    .command('split')
    .description('Split one or more files into bounded-size chunks')
    .argument('<files...>', 'Files to split')
    .option(
      '-s, --size-limit <size>',
      'Maximum bytes per chunk (accepts K/M/G suffixes)',
      String(envConfig.chunkLimit)
    )
    .option(
      '-o, --output-dir <directory>',
      'Root directory for chunk subdirectories',
      envConfig.outputDir
    )
    .option('-c, --compress', 'Gzip each chunk file', envConfig.compress)
    .option('--debug', 'Enable debug logging for verbose output', false)
    .action(async (files: string[], options: SplitCommandOptions) => {
      if (options.debug) {
        setDebugMode(true);
      }

      let chunkLimit: number;
      try {
        chunkLimit = parseSizeInput(options.sizeLimit);
      } catch (error) {
        console.error(chalk.red(`\n❌ ${formatError(error)}\n`));
        process.exit(1);
      }

      const outputRoot = resolve(options.outputDir);
      displaySplitConfiguration({
        fileCount: files.length,
        chunkLimit,
        outputDir: outputRoot,
        compress: options.compress,
      });

      // Spinners in start order; the last one belongs to the file in flight
      const active: { filePath: string; progress: TransferProgressHandler }[] = [];
      let results: SplitResult[];
      try {
        results = await splitFiles(
          files.map((file) => resolve(file)),
          { chunkLimit, outputRoot, compress: options.compress },
          (filePath) => {
            const progress = new TransferProgressHandler(`Processing ${filePath}`);
            active.push({ filePath, progress });
            return {
              ...progress.getCallbacks(),
              onComplete: (result) =>
                progress.succeed(`'${result.manifest.originalName}' splitting complete`),
            };
          }
        );
      } catch (error) {
        const failed = active.at(-1);
        if (failed) {
          failed.progress.fail(`Failed to split ${failed.filePath}`);
        }
        console.error(chalk.red(`\n❌ ${formatError(error)}\n`));
        process.exit(1);
      }

      displaySplitSummary(results);
    });
}
