// This module provides builders for the parameter types handlers declare alongside their methods.

import type { EnumMember, ParameterDescriptor, TypeDescriptor } from '../types/domain.js';

export interface ParamOptions {
  default?: unknown;
  optional?: boolean;
  description?: string;
}

// This helper extracts symbolic members from a TypeScript enum object, skipping numeric reverse mappings.
function enumMembers(source: Record<string, string | number>): EnumMember[] {
  return Object.keys(source)
    .filter((key) => Number.isNaN(Number(key)))
    .map((key) => ({ name: key, value: source[key] }));
}

export const t = {
  string: (): TypeDescriptor => ({ kind: 'string' }),
  integer: (): TypeDescriptor => ({ kind: 'integer' }),
  number: (): TypeDescriptor => ({ kind: 'number' }),
  boolean: (): TypeDescriptor => ({ kind: 'boolean' }),
  unknown: (): TypeDescriptor => ({ kind: 'unknown' }),
  opaque: (name: string): TypeDescriptor => ({ kind: 'opaque', name }),
  array: (items: TypeDescriptor): TypeDescriptor => ({ kind: 'array', items }),
  enumeration: (name: string, source: Record<string, string | number>): TypeDescriptor => ({
    kind: 'enum',
    name,
    members: enumMembers(source)
  }),
  object: (
    name: string,
    fields: ParameterDescriptor[] = [],
    create?: (fields: Record<string, unknown>) => unknown
  ): TypeDescriptor => ({ kind: 'object', name, fields, create })
};

// This helper declares one formal parameter; a default (even undefined via optional) marks it as defaulted.
export function param(name: string, type: TypeDescriptor, options: ParamOptions = {}): ParameterDescriptor {
  const hasDefault = 'default' in options || options.optional === true;
  return {
    name,
    type,
    hasDefault,
    defaultValue: hasDefault ? options.default : undefined,
    description: options.description
  };
}

// This helper renders a declared type as a short label for error messages and logs.
export function describeType(type: TypeDescriptor): string {
  switch (type.kind) {
    case 'enum':
    case 'object':
    case 'opaque':
      return type.name;
    case 'array':
      return `${describeType(type.items)}[]`;
    default:
      return type.kind;
  }
}
