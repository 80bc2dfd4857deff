/**
 * CLI Utility Functions
 * Shared helpers for CLI commands
 */

// ============================================================================
// Constants
// ============================================================================

export const CLI_CONSTANTS = {
  // Display formatting
  FILENAME_MAX_LENGTH: 35,
  FILENAME_TRUNCATE_SUFFIX: 32,
  DIVIDER_LENGTH: 70,
  CHECKSUM_DISPLAY_LENGTH: 16,
} as const;

const SIZE_UNITS: Record<string, number> = {
  '': 1,
  K: 1024,
  M: 1024 * 1024,
  G: 1024 * 1024 * 1024,
};

// ============================================================================
// Utility Functions
// ============================================================================

/**
 * Format bytes to human-readable string
 */
export function formatBytes(bytes: number): string {
  if (bytes === 0) return '0 B';
  const k = 1024;
  const sizes = ['B', 'KB', 'MB', 'GB', 'TB'];
  const i = Math.min(Math.floor(Math.log(bytes) / Math.log(k)), sizes.length - 1);
  return parseFloat((bytes / Math.pow(k, i)).toFixed(2)) + ' ' + sizes[i];
}

/**
 * Parse size input - a byte count, optionally with a binary unit suffix
 * Examples: "1048576" = 1MB, "512K" = 512KB, "100MB" = 100MB, "1.5G" = 1.5GB
 */
export function parseSizeInput(input: string): number {
  const match = /^(\d+(?:\.\d+)?)\s*([kmg]?)(?:i?b)?$/i.exec(input.trim());
  if (!match) {
    throw new Error(`Invalid size: ${input}`);
  }
  const [, amount, unit] = match;
  return Math.floor(parseFloat(amount) * SIZE_UNITS[unit.toUpperCase()]);
}

/**
 * Shorten a file name for fixed-width columns
 */
export function truncateFileName(fileName: string): string {
  const { FILENAME_MAX_LENGTH, FILENAME_TRUNCATE_SUFFIX } = CLI_CONSTANTS;
  return fileName.length > FILENAME_MAX_LENGTH
    ? '...' + fileName.slice(-FILENAME_TRUNCATE_SUFFIX)
    : fileName;
}

/**
 * Percentage of `done` over `total`, 100 for an empty total
 */
export function percentOf(done: number, total: number): number {
  if (total === 0) return 100;
  return Math.min(100, Math.round((done / total) * 100));
}
