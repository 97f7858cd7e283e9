/**
 * Formatting helpers for user-facing and log output
 */

const UNITS = ['B', 'KB', 'MB', 'GB', 'TB'];

/**
 * Format a byte count, e.g. 52428800 -> "50.0 MB"
 */
export function formatBytes(bytes: number): string {
  if (!Number.isFinite(bytes) || bytes <= 0) {
    return '0 B';
  }

  let value = bytes;
  let unit = 0;
  while (value >= 1024 && unit < UNITS.length - 1) {
    value /= 1024;
    unit++;
  }

  return unit === 0 ? `${Math.round(value)} B` : `${value.toFixed(1)} ${UNITS[unit]}`;
}

/**
 * Keep only the last `max` characters of a string
 */
export function tail(text: string, max: number): string {
  return text.length > max ? text.slice(text.length - max) : text;
}

/**
 * Replace every occurrence of a secret (e.g. the bot token) before logging
 */
export function redactSecret(text: string, secret: string, mask = '<token>'): string {
  if (!secret) {
    return text;
  }
  return text.split(secret).join(mask);
}
