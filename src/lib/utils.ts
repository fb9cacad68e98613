/**
 * Utility functions shared by services and commands
 */
import { safeLogger as logger } from './safe-logger.js';

/**
 * Formats a number as credits with thousands separators
 * @param amount The amount to format
 * @returns Formatted string like "💳 1,000"
 */
export function formatCredits(amount: number): string {
  return `💳 ${amount.toLocaleString('en-US')}`;
}

/**
 * Formats duration in seconds to human-readable string
 * Examples:
 *   - 90 seconds → "1m 30s"
 *   - 3665 seconds → "1h 1m 5s"
 *   - 90061 seconds → "1d 1h 1m 1s"
 *
 * @param seconds Total duration in seconds
 * @returns Formatted duration string
 */
export function formatDuration(seconds: number): string {
  if (seconds <= 0) return '0s';

  const days = Math.floor(seconds / 86400);
  const hours = Math.floor((seconds % 86400) / 3600);
  const minutes = Math.floor((seconds % 3600) / 60);
  const secs = Math.floor(seconds % 60);

  const parts: string[] = [];
  if (days > 0) parts.push(`${days}d`);
  if (hours > 0) parts.push(`${hours}h`);
  if (minutes > 0) parts.push(`${minutes}m`);
  if (secs > 0 || parts.length === 0) parts.push(`${secs}s`);

  return parts.join(' ');
}

/**
 * Parse an integer stored as text (counters, BIGINT columns)
 *
 * @param value - Raw value (string or number)
 * @returns Parsed number value, 0 when absent or unparseable
 */
export function parseBigInt(value: string | number | null | undefined): number {
  if (value === null || value === undefined) {
    return 0;
  }
  if (typeof value === 'number') {
    return value;
  }
  const parsed = parseInt(value, 10);
  if (isNaN(parsed)) {
    logger.warn(`Failed to parse BIGINT value: ${value}`);
    return 0;
  }
  return parsed;
}
