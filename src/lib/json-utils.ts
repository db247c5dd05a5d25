/**
 * JSON helpers - narrow unknown JSON without casting, read files without throwing
 */

import { existsSync, readFileSync } from 'fs';

export function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/** Finite number or null; numeric strings are accepted. */
export function coerceNumber(value: unknown): number | null {
  if (value === null || value === undefined || value === '') return null;
  if (typeof value !== 'number' && typeof value !== 'string') return null;
  const num = Number(value);
  return Number.isFinite(num) ? num : null;
}

export function numberOr(value: unknown, fallback: number): number {
  return coerceNumber(value) ?? fallback;
}

export function stringOr(value: unknown, fallback: string): string {
  return typeof value === 'string' ? value : fallback;
}

/** Nested record lookup: field(obj, 'cost') → {} when absent or not an object. */
export function field(source: Record<string, unknown>, key: string): Record<string, unknown> {
  const value = source[key];
  return isRecord(value) ? value : {};
}

/**
 * Parse JSON text; null on empty or malformed input.
 */
export function parseJson(text: string): unknown {
  if (!text || text.trim() === '') return null;
  try {
    return JSON.parse(text);
  } catch {
    return null;
  }
}

/**
 * Read and parse a JSON file (never throws).
 * Missing, unreadable, empty and truncated files all read as null.
 */
export function safeReadJson(path: string): unknown {
  try {
    if (!existsSync(path)) return null;
    return parseJson(readFileSync(path, 'utf-8'));
  } catch {
    return null;
  }
}
