/**
 * Display Functions
 * Handles UI output for the restore command
 */

import chalk from 'chalk';
import { CLI_CONSTANTS, formatBytes } from '../../utils.js';
import type { IntegrityWarning, RestoreResult } from '../../../core/restoring/index.js';

/**
 * Display restore configuration
 */
export function displayRestoreConfiguration(config: {
  manifestCount: number;
  inputDir: string;
  outputDir: string;
  strict: boolean;
}): void {
  console.log();
  console.log(chalk.bold.white(`🧩 Restoring ${config.manifestCount} file(s)`));
  console.log(chalk.gray('─'.repeat(CLI_CONSTANTS.DIVIDER_LENGTH)));
  console.log(chalk.gray('  Chunks root:  ') + chalk.cyan(config.inputDir));
  console.log(chalk.gray('  Output dir:   ') + chalk.cyan(config.outputDir));
  console.log(
    chalk.gray('  Checksums:    ') +
      chalk.cyan(config.strict ? 'mismatch aborts' : 'mismatch warns')
  );
  console.log(chalk.gray('─'.repeat(CLI_CONSTANTS.DIVIDER_LENGTH)));
}

function describeWarning(warning: IntegrityWarning): string {
  return warning.kind === 'chunk-checksum'
    ? `chunk ${warning.chunkName} checksum mismatch`
    : 'whole-file checksum mismatch';
}

/**
 * Display integrity warnings collected while restoring one file
 */
export function displayIntegrityWarnings(warnings: IntegrityWarning[]): void {
  for (const warning of warnings) {
    console.log(chalk.yellow(`  ⚠️  ${describeWarning(warning)}`));
    console.log(chalk.gray(`     expected ${warning.expected}`));
    console.log(chalk.gray(`     actual   ${warning.actual}`));
  }
}

/**
 * Display restore summary
 */
export function displayRestoreSummary(results: RestoreResult[]): void {
  const suspect = results.filter((result) => result.warnings.length > 0).length;
  const totalBytes = results.reduce((sum, result) => sum + result.bytesWritten, 0);

  console.log();
  console.log(chalk.bold.green('All files restored successfully!'));
  console.log(chalk.gray(`Total restored: ${formatBytes(totalBytes)}`));
  if (suspect > 0) {
    console.log(chalk.yellow(`${suspect} file(s) restored with integrity warnings`));
  }
}
