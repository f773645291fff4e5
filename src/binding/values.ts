// This module holds the small lookup and default-value rules shared by the binder and the converters.

import type { TypeDescriptor } from '../types/domain.js';

export type Lookup<T> = { found: true; key: string; value: T } | { found: false };

// This helper finds a key by exact name first, then case-insensitively.
export function lookupKey<T>(entries: Iterable<[string, T]>, name: string): Lookup<T> {
  const lowered = name.toLowerCase();
  let fallback: Lookup<T> = { found: false };

  for (const [key, value] of entries) {
    if (key === name) {
      return { found: true, key, value };
    }

    if (!fallback.found && key.toLowerCase() === lowered) {
      fallback = { found: true, key, value };
    }
  }

  return fallback;
}

// This helper looks up a supplied argument in a plain object bag.
export function lookupArgument(bag: Record<string, unknown> | undefined, name: string): Lookup<unknown> {
  if (!bag) {
    return { found: false };
  }

  return lookupKey(Object.entries(bag), name);
}

// This helper returns the zero value a declared type falls back to when nothing else applies.
export function zeroValue(type: TypeDescriptor): unknown {
  switch (type.kind) {
    case 'integer':
    case 'number':
      return 0;
    case 'boolean':
      return false;
    case 'enum':
      return type.members.length > 0 ? type.members[0].value : null;
    default:
      return null;
  }
}
