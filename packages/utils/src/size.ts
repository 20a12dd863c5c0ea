/**
 * Size Helpers
 */

const BYTES_PER_MB = 1024 * 1024;

export function bytesToMb(bytes: number): number {
  return bytes / BYTES_PER_MB;
}

export function mbToBytes(mb: number): number {
  return Math.round(mb * BYTES_PER_MB);
}

/**
 * Format a size in MB for humans ("12.34MB", "unknown" for null)
 */
export function formatSizeMb(sizeMb: number | null): string {
  if (sizeMb === null) {
    return 'unknown';
  }
  return `${sizeMb.toFixed(2)}MB`;
}
