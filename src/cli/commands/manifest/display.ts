/**
 * Display Functions
 * Handles UI output for manifest commands
 */

import chalk from 'chalk';
import { CLI_CONSTANTS, formatBytes, truncateFileName } from '../../utils.js';
import type { Manifest } from '../../../core/manifest/index.js';

/**
 * Display manifest summary
 */
export function displayManifestSummary(manifest: Manifest): void {
  console.log(chalk.bold(`\n📦 ${manifest.originalName}\n`));
  console.log(chalk.gray('─'.repeat(CLI_CONSTANTS.DIVIDER_LENGTH)));
  console.log(chalk.gray('  Original size:  ') + chalk.yellow(formatBytes(manifest.originalSize)));
  console.log(chalk.gray('  Chunk limit:    ') + chalk.cyan(formatBytes(manifest.chunkLimit)));
  console.log(chalk.gray('  Chunks dir:     ') + chalk.cyan(manifest.chunksSubdir));
  console.log(chalk.gray('  Compressed:     ') + chalk.cyan(manifest.compressed ? 'yes' : 'no'));
  console.log(chalk.gray('  Checksum:       ') + chalk.white(manifest.originalChecksum));
  console.log(chalk.gray('─'.repeat(CLI_CONSTANTS.DIVIDER_LENGTH)));
}

/**
 * Display chunk table
 */
export function displayChunkTable(manifest: Manifest): void {
  const { FILENAME_MAX_LENGTH, CHECKSUM_DISPLAY_LENGTH, DIVIDER_LENGTH } = CLI_CONSTANTS;

  console.log(
    chalk.gray('#'.padEnd(6)) +
      chalk.gray('Chunk'.padEnd(FILENAME_MAX_LENGTH + 1)) +
      chalk.gray('Stored'.padEnd(12)) +
      chalk.gray('Checksum')
  );
  console.log(chalk.gray('─'.repeat(DIVIDER_LENGTH)));

  manifest.chunks.forEach((chunk, index) => {
    const num = String(index + 1).padEnd(6);
    const name = truncateFileName(chunk.name).padEnd(FILENAME_MAX_LENGTH + 1);
    const size = formatBytes(chunk.storedSize).padEnd(12);
    const checksum =
      chunk.contentChecksum === null
        ? chalk.gray('(none)')
        : chalk.gray(chunk.contentChecksum.slice(0, CHECKSUM_DISPLAY_LENGTH) + '...');

    console.log(chalk.cyan(num) + chalk.white(name) + chalk.yellow(size) + checksum);
  });

  const totalStored = manifest.chunks.reduce((sum, chunk) => sum + chunk.storedSize, 0);
  console.log(chalk.gray('─'.repeat(DIVIDER_LENGTH)));
  console.log(
    chalk.gray(`\nTotal chunks: ${manifest.chunks.length}`) +
      chalk.gray(`, stored: ${formatBytes(totalStored)}\n`)
  );
}
