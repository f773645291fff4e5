// This module converts untyped wire values into declared types through an ordered chain of converters.

import { describeType } from '../handlers/signature.js';
import { describeWireKind, isEnumSchema, shapeSchemaFor } from '../mcp/tool-schemas.js';
import type { EnumMember, ParameterDescriptor, ParameterSchema, TypeDescriptor } from '../types/domain.js';
import { isPlainObject } from '../utils/json.js';
import { lookupArgument, lookupKey, zeroValue } from './values.js';

export type ConversionFailureKind = 'type_mismatch' | 'missing_required';

export type Conversion =
  | { ok: true; value: unknown }
  | { ok: false; kind: ConversionFailureKind; path: string; expected: string; message: string };

export interface ConversionRequest {
  value: unknown;
  type: TypeDescriptor;
  schema?: ParameterSchema;
  path: string;
}

export interface ValueConverter {
  name: string;
  appliesTo(type: TypeDescriptor): boolean;
  convert(request: ConversionRequest, chain: ConversionChain): Conversion;
}

export interface ConversionHooks {
  onDefaultRejected?(path: string, message: string): void;
}

export type EnumStrategy = (value: unknown, members: readonly EnumMember[]) => EnumMember | undefined;

const INTEGER_TEXT = /^[+-]?\d+$/;
const NUMERIC_TEXT = /^[+-]?(\d+\.?\d*|\.\d+)([eE][+-]?\d+)?$/;

function converted(value: unknown): Conversion {
  return { ok: true, value };
}

// A JSON null default publishes nothing; resolution moves on to the declared default.
export function hasSchemaDefault(schema: ParameterSchema | undefined): boolean {
  return schema?.default !== undefined && schema.default !== null;
}

// This helper derives a declared type from a schema tag for properties the handler does not declare itself.
function typeForSchema(schema: ParameterSchema): TypeDescriptor {
  switch (schema.type) {
    case 'array':
      return { kind: 'array', items: schema.items ? typeForSchema(schema.items) : { kind: 'unknown' } };
    case 'object':
      return { kind: 'object', name: schema.name || 'object', fields: [] };
    case 'string':
      return { kind: 'string' };
    case 'integer':
      return { kind: 'integer' };
    case 'number':
      return { kind: 'number' };
    case 'boolean':
      return { kind: 'boolean' };
  }
}

function mismatch(request: ConversionRequest, reason: string): Conversion {
  const expected = describeType(request.type);
  return {
    ok: false,
    kind: 'type_mismatch',
    path: request.path,
    expected,
    message: `Parameter '${request.path}' could not be converted to '${expected}': ${reason}.`
  };
}

const byName: EnumStrategy = (value, members) => {
  if (typeof value !== 'string') {
    return undefined;
  }

  const wanted = value.trim().toLowerCase();
  return members.find((member) => member.name.toLowerCase() === wanted);
};

const byValue: EnumStrategy = (value, members) => {
  if (typeof value !== 'string') {
    return undefined;
  }

  const wanted = value.trim().toLowerCase();
  return members.find((member) => typeof member.value === 'string' && member.value.toLowerCase() === wanted);
};

// A number selects a member by its position in declaration order, not by its numeric value.
const byOrdinal: EnumStrategy = (value, members) => {
  let ordinal: number | undefined;
  if (typeof value === 'number') {
    ordinal = value;
  } else if (typeof value === 'string' && INTEGER_TEXT.test(value.trim())) {
    ordinal = Number(value.trim());
  }

  if (ordinal === undefined || !Number.isInteger(ordinal) || ordinal < 0) {
    return undefined;
  }

  return members[ordinal];
};

// Tried in order; the first strategy that recognises the value wins.
export const ENUM_STRATEGIES: readonly EnumStrategy[] = [byName, byValue, byOrdinal];

const enumConverter: ValueConverter = {
  name: 'enum',
  appliesTo: (type) => type.kind === 'enum',
  convert(request) {
    if (request.type.kind !== 'enum') {
      return mismatch(request, 'not an enumeration');
    }

    for (const strategy of ENUM_STRATEGIES) {
      const member = strategy(request.value, request.type.members);
      if (member) {
        return converted(member.value);
      }
    }

    return mismatch(request, `'${String(request.value)}' matches no member name or ordinal`);
  }
};

const objectConverter: ValueConverter = {
  name: 'object',
  appliesTo: (type) => type.kind === 'object',
  convert(request, chain) {
    const { type, value } = request;
    if (type.kind !== 'object') {
      return mismatch(request, 'not a structured type');
    }

    if (!isPlainObject(value)) {
      return mismatch(request, `expected an object, got '${describeWireKind(value)}'`);
    }

    if (type.fields.length === 0) {
      return bindSchemaProperties(request, value, chain);
    }

    const nestedSchemas = Object.entries(request.schema?.properties ?? {});
    const fields: Record<string, unknown> = {};

    for (const field of type.fields) {
      const nested = lookupKey(nestedSchemas, field.name);
      const nestedSchema = nested.found ? nested.value : undefined;
      const supplied = lookupArgument(value, field.name);
      const path = `${request.path}.${field.name}`;

      const result = supplied.found
        ? chain.convertSupplied(supplied.value, field.type, nestedSchema, path)
        : chain.resolveAbsent(field, nestedSchema, path);

      if (!result.ok) {
        return result;
      }

      fields[field.name] = result.value;
    }

    return converted(type.create ? type.create(fields) : fields);
  }
};

// This helper enforces published nested properties on an object the handler declares without fields.
function bindSchemaProperties(request: ConversionRequest, value: Record<string, unknown>, chain: ConversionChain): Conversion {
  const fields: Record<string, unknown> = { ...value };

  for (const [name, propertySchema] of Object.entries(request.schema?.properties ?? {})) {
    const supplied = lookupArgument(value, name);
    const path = `${request.path}.${name}`;
    const type = typeForSchema(propertySchema);

    if (supplied.found) {
      const result = chain.convertSupplied(supplied.value, type, propertySchema, path);
      if (!result.ok) {
        return result;
      }
      delete fields[supplied.key];
      fields[name] = result.value;
      continue;
    }

    // Optional properties without a default stay absent instead of being zero-filled.
    if (!propertySchema.required && !hasSchemaDefault(propertySchema)) {
      continue;
    }

    const result = chain.resolveAbsent({ name, type, hasDefault: false }, propertySchema, path);
    if (!result.ok) {
      return result;
    }
    fields[name] = result.value;
  }

  return converted(fields);
}

const arrayConverter: ValueConverter = {
  name: 'array',
  appliesTo: (type) => type.kind === 'array',
  convert(request, chain) {
    const { type, value } = request;
    if (type.kind !== 'array') {
      return mismatch(request, 'not a sequence type');
    }

    if (!Array.isArray(value)) {
      return mismatch(request, `expected an array, got '${describeWireKind(value)}'`);
    }

    const items: unknown[] = [];
    for (const [index, item] of value.entries()) {
      const result = chain.convertSupplied(item, type.items, request.schema?.items, `${request.path}[${index}]`);
      if (!result.ok) {
        return result;
      }
      items.push(result.value);
    }

    return converted(items);
  }
};

const scalarConverter: ValueConverter = {
  name: 'scalar',
  appliesTo: (type) => type.kind === 'string' || type.kind === 'integer' || type.kind === 'number' || type.kind === 'boolean',
  convert(request) {
    const { type, value } = request;

    switch (type.kind) {
      case 'string':
        return typeof value === 'string' ? converted(value) : mismatch(request, `got '${describeWireKind(value)}'`);
      case 'integer': {
        const text = typeof value === 'string' ? value.trim() : undefined;
        const parsed = typeof value === 'number' ? value : text !== undefined && INTEGER_TEXT.test(text) ? Number(text) : NaN;
        return Number.isSafeInteger(parsed) ? converted(parsed) : mismatch(request, `'${String(value)}' is not an integer`);
      }
      case 'number': {
        const text = typeof value === 'string' ? value.trim() : undefined;
        const parsed = typeof value === 'number' ? value : text !== undefined && NUMERIC_TEXT.test(text) ? Number(text) : NaN;
        return Number.isFinite(parsed) ? converted(parsed) : mismatch(request, `'${String(value)}' is not a number`);
      }
      case 'boolean': {
        if (typeof value === 'boolean') {
          return converted(value);
        }
        const text = typeof value === 'string' ? value.trim().toLowerCase() : undefined;
        return text === 'true' || text === 'false' ? converted(text === 'true') : mismatch(request, `'${String(value)}' is not a boolean`);
      }
      default:
        return mismatch(request, 'not a scalar type');
    }
  }
};

// Unknown and opaque declarations take the wire value as it is, apart from published nested properties.
const passthroughConverter: ValueConverter = {
  name: 'passthrough',
  appliesTo: () => true,
  convert(request, chain) {
    if (request.schema?.properties && isPlainObject(request.value)) {
      return bindSchemaProperties(request, request.value, chain);
    }

    return converted(request.value);
  }
};

export const DEFAULT_CONVERTERS: readonly ValueConverter[] = [
  enumConverter,
  objectConverter,
  arrayConverter,
  scalarConverter,
  passthroughConverter
];

// This helper treats a string parameter whose schema lists symbols as an enumeration of those symbols.
function effectiveType(type: TypeDescriptor, schema: ParameterSchema | undefined): TypeDescriptor {
  const symbols = schema?.enum ?? [];
  if (type.kind === 'string' && symbols.length > 0) {
    return {
      kind: 'enum',
      name: schema?.name || 'enum',
      members: symbols.map((symbol) => ({ name: symbol, value: symbol }))
    };
  }

  return type;
}

// This class runs the converter chain and the shared default-resolution order for absent values.
export class ConversionChain {
  public constructor(
    private readonly converters: readonly ValueConverter[] = DEFAULT_CONVERTERS,
    private readonly hooks: ConversionHooks = {}
  ) {}

  public convert(request: ConversionRequest): Conversion {
    const type = effectiveType(request.type, request.schema);
    const converter = this.converters.find((candidate) => candidate.appliesTo(type));
    if (!converter) {
      return mismatch({ ...request, type }, 'no converter accepts this type');
    }

    return converter.convert({ ...request, type }, this);
  }

  // This method checks the wire shape against the schema tag and then converts the value.
  public convertSupplied(
    value: unknown,
    type: TypeDescriptor,
    schema: ParameterSchema | undefined,
    path: string
  ): Conversion {
    if (schema && !shapeSchemaFor(schema, type.kind === 'enum').safeParse(value).success) {
      const expected = type.kind === 'enum' || isEnumSchema(schema) ? 'enum' : schema.type;
      return {
        ok: false,
        kind: 'type_mismatch',
        path,
        expected,
        message: `Parameter '${path}' has invalid type. Expected '${expected}', got '${describeWireKind(value)}'.`
      };
    }

    return this.convert({ value, type, schema, path });
  }

  // This method resolves an absent value: schema default, declared default, required failure, then zero value.
  public resolveAbsent(descriptor: ParameterDescriptor, schema: ParameterSchema | undefined, path: string): Conversion {
    if (schema && hasSchemaDefault(schema)) {
      const fromDefault = this.convert({ value: schema.default, type: descriptor.type, schema, path });
      if (fromDefault.ok) {
        return fromDefault;
      }

      this.hooks.onDefaultRejected?.(path, fromDefault.message);
      return converted(zeroValue(descriptor.type));
    }

    if (descriptor.hasDefault) {
      return converted(descriptor.defaultValue);
    }

    if (schema?.required) {
      return {
        ok: false,
        kind: 'missing_required',
        path,
        expected: describeType(descriptor.type),
        message: `Missing required parameter '${path}'.`
      };
    }

    return converted(zeroValue(descriptor.type));
  }
}
