// This module turns parameter schemas into zod contracts, both for publishing input schemas and for wire-shape checks.

import { z } from 'zod';
import { zodToJsonSchema } from 'zod-to-json-schema';
import type { ParameterSchema, SchemaTypeTag, ToolDescriptor } from '../types/domain.js';
import type { McpTool } from '../types/mcp.js';

// Shape checks only look at the JSON kind; integrality and ranges are the converters' concern.
const SHAPE_SCHEMAS: Record<SchemaTypeTag, z.ZodTypeAny> = {
  string: z.string(),
  integer: z.number(),
  number: z.number(),
  boolean: z.boolean(),
  object: z.record(z.string(), z.unknown()),
  array: z.array(z.unknown())
};

// Enumerations travel either by symbolic name or by ordinal, whatever the declared tag says.
const ENUM_SHAPE_SCHEMA = z.union([z.string(), z.number()]);

export function isEnumSchema(schema: ParameterSchema): boolean {
  return schema.format === 'enum' || (schema.enum?.length ?? 0) > 0;
}

// This helper returns the zod contract a supplied wire value must satisfy before conversion.
export function shapeSchemaFor(schema: ParameterSchema, declaredEnum = false): z.ZodTypeAny {
  if (declaredEnum || isEnumSchema(schema)) {
    return ENUM_SHAPE_SCHEMA;
  }

  return SHAPE_SCHEMAS[schema.type];
}

// This helper names the JSON kind of a wire value for mismatch messages.
export function describeWireKind(value: unknown): string {
  if (value === null) {
    return 'null';
  }

  if (Array.isArray(value)) {
    return 'array';
  }

  return typeof value;
}

// This helper maps one parameter schema to the zod type used for catalog publication.
function toPublishedType(schema: ParameterSchema): z.ZodTypeAny {
  const symbols = schema.enum ?? [];
  if (symbols.length > 0) {
    const [first, ...rest] = symbols;
    return z.enum([first, ...rest]);
  }

  switch (schema.type) {
    case 'string':
      return z.string();
    case 'integer':
      return z.number().int();
    case 'number':
      return z.number();
    case 'boolean':
      return z.boolean();
    case 'array':
      return z.array(schema.items ? toPublishedField(schema.items) : z.unknown());
    case 'object':
      return schema.properties ? toPublishedObject(Object.entries(schema.properties)) : z.record(z.string(), z.unknown());
  }
}

function toPublishedField(schema: ParameterSchema): z.ZodTypeAny {
  let field = toPublishedType(schema);

  if (schema.description) {
    field = field.describe(schema.description);
  }

  if (schema.default !== undefined) {
    return field.default(schema.default);
  }

  return schema.required ? field : field.optional();
}

function toPublishedObject(properties: Iterable<[string, ParameterSchema]>): z.ZodTypeAny {
  const shape: Record<string, z.ZodTypeAny> = {};
  for (const [name, property] of properties) {
    shape[name] = toPublishedField(property);
  }
  return z.object(shape);
}

// This function renders one tool's parameter map as a JSON Schema object for tools/list.
export function buildInputSchema(schema: ReadonlyMap<string, ParameterSchema>): Record<string, unknown> {
  const published = zodToJsonSchema(toPublishedObject(schema.entries()), { $refStrategy: 'none' });
  return Object.fromEntries(Object.entries(published).filter(([key]) => key !== '$schema'));
}

// This function builds the catalog snapshot returned by tools/list.
export function buildToolList(tools: readonly ToolDescriptor[]): McpTool[] {
  return tools.map((tool) => ({
    name: tool.name,
    description: tool.description ?? '',
    inputSchema: buildInputSchema(tool.schema)
  }));
}
