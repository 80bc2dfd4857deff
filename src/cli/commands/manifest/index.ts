/**
 * Manifest Commands
 * Inspects split manifests without touching chunk files
 */

import { resolve } from 'path';
import chalk from 'chalk';
import ora from 'ora';
import type { Command } from 'commander';
import { readManifest } from '../../../core/manifest/index.js';
import { formatError } from '../../../utils/errors.js';
import { displayChunkTable, displayManifestSummary } from './display.js';

/**
 * Register manifest-related commands with the CLI program
 */
export function registerManifestCommands(program: Command): void {
  program
    .command('manifest:show')
    .description('Show the contents of a split manifest')
    .argument('<manifest>', 'Manifest file (e.g. my_file_parts/my_file.json)')
    .action(async (manifestArg: string) => {
      const manifestPath = resolve(manifestArg);
      const spinner = ora('Loading manifest...').start();

      try {
        const manifest = await readManifest(manifestPath);
        spinner.succeed(chalk.green(`Loaded ${manifestPath}`));

        displayManifestSummary(manifest);
        displayChunkTable(manifest);
      } catch (error) {
        spinner.fail(chalk.red('Failed to read manifest'));
        console.error(chalk.red(formatError(error)));
        process.exit(1);
      }
    });
}
