/**
 * Utility functions
 */

export { getLogger, createLogger, resetLogger } from './logger.js';

/**
 * Largest value an unsigned 64-bit id can take
 */
export const U64_MAX = (1n << 64n) - 1n;

/**
 * Parse a decimal unsigned 64-bit integer
 * Returns null when the text is not one
 */
export function parseU64(text: string): bigint | null {
  if (!/^\d+$/.test(text)) return null;
  const value = BigInt(text);
  return value <= U64_MAX ? value : null;
}

/**
 * Milliseconds elapsed since a performance.now() mark
 */
export function elapsedMs(start: number): number {
  return Math.round(performance.now() - start);
}
