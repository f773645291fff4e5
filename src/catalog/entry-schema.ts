// This module defines zod contracts for externally supplied catalog entries and their parameter schemas.

import { z } from 'zod';
import type { CatalogEntry, ParameterSchema } from '../types/domain.js';

export const schemaTypeTagSchema = z.enum(['string', 'integer', 'number', 'boolean', 'object', 'array']);

// This schema validates one parameter schema recursively, including nested properties and item schemas.
export const parameterSchemaSchema: z.ZodType<ParameterSchema, z.ZodTypeDef, unknown> = z.lazy(() =>
  z.object({
    name: z.string().default(''),
    type: schemaTypeTagSchema,
    required: z.boolean().default(false),
    description: z.string().optional(),
    default: z.unknown().optional(),
    enum: z.array(z.string()).optional(),
    format: z.string().optional(),
    properties: z.record(z.string(), parameterSchemaSchema).optional(),
    items: parameterSchemaSchema.optional(),
    annotations: z.record(z.string(), z.unknown()).optional()
  })
);

export const catalogEntrySchema: z.ZodType<CatalogEntry, z.ZodTypeDef, unknown> = z.object({
  name: z.string().trim().min(1),
  description: z.string().optional(),
  handlerIdentity: z.string().trim().min(1),
  methodName: z.string().trim().min(1),
  parameterSchema: z.array(parameterSchemaSchema).default([])
});

export const catalogFileSchema = z.object({
  tools: z.array(z.unknown())
});
