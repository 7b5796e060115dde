/**
 * Shared utility functions
 */

import { v4 as uuidv4 } from 'uuid';

/**
 * Generate a run identifier
 */
export function generateRunId(): string {
  return uuidv4();
}

/**
 * Sleep for a given duration
 */
export function sleep(ms: number): Promise<void> {
  return new Promise(resolve => setTimeout(resolve, ms));
}

/**
 * Ordinal string comparison, independent of locale
 */
export function compareStrings(a: string, b: string): number {
  if (a < b) return -1;
  if (a > b) return 1;
  return 0;
}

/**
 * Check if a value is a plain object
 */
export function isPlainObject(value: unknown): value is Record<string, unknown> {
  if (typeof value !== 'object' || value === null || Array.isArray(value)) {
    return false;
  }
  const proto: unknown = Object.getPrototypeOf(value);
  return proto === Object.prototype || proto === null;
}

/**
 * Recursively freeze an object graph in place
 */
export function deepFreeze<T>(value: T): T {
  if (typeof value !== 'object' || value === null || Object.isFrozen(value)) {
    return value;
  }
  const children: unknown[] = Object.values(value);
  Object.freeze(value);
  for (const child of children) {
    deepFreeze(child);
  }
  return value;
}

/**
 * Remove duplicates while keeping first-seen order
 */
export function unique<T>(items: Iterable<T>): T[] {
  return Array.from(new Set(items));
}

/**
 * Format a millisecond duration for humans (e.g. 950ms, 12.4s, 3m 05s)
 */
export function formatDuration(ms: number): string {
  if (ms < 1000) return `${Math.round(ms)}ms`;
  if (ms < 60_000) return `${(ms / 1000).toFixed(1)}s`;
  const minutes = Math.floor(ms / 60_000);
  const seconds = Math.floor((ms % 60_000) / 1000);
  return `${minutes}m ${String(seconds).padStart(2, '0')}s`;
}
