/**
 * Time Formatting Utilities
 */

/**
 * Format an instant as "YYYY-MM-DD HH:MM UTC"
 *
 * Used for stored creation timestamps and moon phase samples.
 */
export function formatUtcMinute(date: Date): string {
  return `${date.toISOString().slice(0, 16).replace('T', ' ')} UTC`;
}

/**
 * Compact UTC timestamp used to prefix uploaded filenames: "YYYYMMDDHHMMSS_"
 */
export function uploadPrefix(date: Date): string {
  return date.toISOString().slice(0, 19).replace(/[-T:]/g, '') + '_';
}
