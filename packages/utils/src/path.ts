/**
 * Path Utilities
 */

/**
 * Sanitize a filename to be safe for filesystem
 */
export function sanitizeFilename(filename: string): string {
  return filename
    // Remove null bytes
    .replace(/\0/g, '')
    // Drop Windows reserved characters
    .replace(/[<>:"/\\|?*]/g, '')
    // Drop control characters
    .replace(/[\x00-\x1f\x80-\x9f]/g, '')
    // Trim whitespace and dots
    .trim()
    .replace(/^\.+|\.+$/g, '')
    .substring(0, 200);
}
