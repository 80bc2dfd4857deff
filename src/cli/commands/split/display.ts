/**
 * Display Functions
 * Handles UI output for the split command
 */

import chalk from 'chalk';
import { CLI_CONSTANTS, formatBytes } from '../../utils.js';
import type { SplitResult } from '../../../core/splitting/index.js';

/**
 * Display split configuration
 */
export function displaySplitConfiguration(config: {
  fileCount: number;
  chunkLimit: number;
  outputDir: string;
  compress: boolean;
}): void {
  console.log();
  console.log(chalk.bold.white(`✂️  Splitting ${config.fileCount} file(s)`));
  console.log(chalk.gray('─'.repeat(CLI_CONSTANTS.DIVIDER_LENGTH)));
  console.log(chalk.gray('  Chunk limit:  ') + chalk.cyan(formatBytes(config.chunkLimit)));
  console.log(chalk.gray('  Output root:  ') + chalk.cyan(config.outputDir));
  console.log(chalk.gray('  Compression:  ') + chalk.cyan(config.compress ? 'gzip' : 'none'));
  console.log(chalk.gray('─'.repeat(CLI_CONSTANTS.DIVIDER_LENGTH)));
}

/**
 * Display one line per split file
 */
export function displaySplitSummary(results: SplitResult[]): void {
  console.log();
  for (const { manifest, manifestPath } of results) {
    const stored = manifest.chunks.reduce((sum, chunk) => sum + chunk.storedSize, 0);
    console.log(
      chalk.white(manifest.originalName) +
        chalk.gray(' → ') +
        chalk.yellow(`${manifest.chunks.length} chunk(s)`) +
        chalk.gray(`, ${formatBytes(manifest.originalSize)} → ${formatBytes(stored)} stored`)
    );
    console.log(chalk.gray(`  manifest: ${manifestPath}`));
  }
  console.log();
  console.log(chalk.bold.green('All files split successfully!'));
  console.log(
    chalk.gray(
      "Each original file's split information (e.g. 'filename.json') is saved within its " +
        "dedicated subdirectory (e.g. 'output_dir/filename_parts/')."
    )
  );
}
