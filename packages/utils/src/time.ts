/**
 * Time Utilities
 */

/**
 * Format duration in milliseconds to human-readable string
 */
export function formatDuration(ms: number): string {
  if (ms < 1000) {
    return `${Math.round(ms)}ms`;
  }

  const seconds = Math.floor(ms / 1000);
  const minutes = Math.floor(seconds / 60);
  const hours = Math.floor(minutes / 60);

  if (hours > 0) {
    return `${hours}h ${minutes % 60}m ${seconds % 60}s`;
  }
  if (minutes > 0) {
    return `${minutes}m ${seconds % 60}s`;
  }
  return `${seconds}s`;
}

/**
 * Format seconds as H:MM:SS.ss, or M:SS.ss under one hour
 */
export function formatTimestamp(totalSeconds: number): string {
  // Work in hundredths so rounding never yields "60.00" seconds
  const hundredths = Math.round(totalSeconds * 100);
  const hours = Math.floor(hundredths / 360000);
  const minutes = Math.floor((hundredths % 360000) / 6000);
  const secs = (hundredths % 6000) / 100;
  const secsText = secs.toFixed(2).padStart(5, '0');

  if (hours >= 1) {
    return `${hours}:${minutes.toString().padStart(2, '0')}:${secsText}`;
  }
  return `${minutes}:${secsText}`;
}

/**
 * Parse a duration written as HH:MM:SS.ss or MM:SS.ss into seconds
 */
export function parseTimecode(timecode: string): number {
  const parts = timecode.trim().split(':');
  if (parts.length < 2 || parts.length > 3) {
    throw new Error(`Invalid timecode format: ${timecode}`);
  }

  const [secondsPart = '', minutesPart = '', hoursPart = '0'] = [...parts].reverse();
  if (!/^\d+$/.test(hoursPart) || !/^\d+$/.test(minutesPart) || !/^\d+(\.\d+)?$/.test(secondsPart)) {
    throw new Error(`Invalid timecode format: ${timecode}`);
  }

  return parseInt(hoursPart, 10) * 3600 + parseInt(minutesPart, 10) * 60 + parseFloat(secondsPart);
}

/**
 * Convert seconds to whole milliseconds
 */
export function secondsToMillis(seconds: number): number {
  return Math.round(seconds * 1000);
}
