// This utility module keeps JSON parse operations safe and explicit.

import { AppError } from './errors.js';

// This helper parses JSON text and emits a controlled error on malformed content.
export function parseJson(value: string, label: string): unknown {
  try {
    const parsed: unknown = JSON.parse(value);
    return parsed;
  } catch (error) {
    throw new AppError('parse_error', `Failed to parse JSON for ${label}.`, {
      originalMessage: error instanceof Error ? error.message : 'unknown'
    });
  }
}

// This helper parses JSON text and returns undefined instead of throwing.
export function tryParseJson(value: string): unknown {
  try {
    const parsed: unknown = JSON.parse(value);
    return parsed;
  } catch {
    return undefined;
  }
}

// This helper narrows a value to a plain JSON object, excluding arrays and null.
export function isPlainObject(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}
