// This module reads process configuration from environment variables and validates it with zod.

import { z } from 'zod';
import type { OutputFormat } from '../types/domain.js';
import { AppError } from '../utils/errors.js';

export interface Settings {
  host: string;
  port: number;
  logLevel: 'fatal' | 'error' | 'warn' | 'info' | 'debug' | 'trace' | 'silent';
  endpoint: string;
  outputFormat: OutputFormat;
  ambientTypes: string[];
  catalogPath?: string;
  includeHandlerName: boolean;
  excludedHandlers: string[];
}

export const DEFAULT_AMBIENT_TYPES = 'AbortSignal,FastifyRequest,FastifyReply';

// This helper splits a comma-separated list, dropping blanks.
function commaList(value: string): string[] {
  return value
    .split(',')
    .map((item) => item.trim())
    .filter((item) => item.length > 0);
}

const booleanFlag = z
  .string()
  .default('true')
  .transform((value) => value.trim().toLowerCase())
  .pipe(z.enum(['true', 'false', '1', '0', 'yes', 'no']))
  .transform((value) => value === 'true' || value === '1' || value === 'yes');

const envSchema = z.object({
  HOST: z.string().trim().min(1).default('0.0.0.0'),
  PORT: z.coerce.number().int().min(1).max(65535).default(8080),
  LOG_LEVEL: z.enum(['fatal', 'error', 'warn', 'info', 'debug', 'trace', 'silent']).default('info'),
  MCP_ENDPOINT: z
    .string()
    .trim()
    .regex(/^\/[A-Za-z0-9/_-]*$/, 'MCP_ENDPOINT must be an absolute path.')
    .default('/mcp'),
  MCP_OUTPUT_FORMAT: z.enum(['raw', 'content']).default('raw'),
  MCP_AMBIENT_TYPES: z.string().default(DEFAULT_AMBIENT_TYPES).transform(commaList),
  MCP_CATALOG_PATH: z
    .string()
    .trim()
    .optional()
    .transform((value) => (value ? value : undefined)),
  MCP_INCLUDE_HANDLER_NAME: booleanFlag,
  MCP_EXCLUDED_HANDLERS: z.string().default('').transform(commaList)
});

// This function builds validated settings; invalid values fail startup with the flattened issues.
export function loadSettings(env: NodeJS.ProcessEnv = process.env): Settings {
  const parsed = envSchema.safeParse(env);
  if (!parsed.success) {
    throw new AppError('invalid_configuration', 'Environment configuration is invalid.', parsed.error.flatten().fieldErrors);
  }

  const values = parsed.data;
  return {
    host: values.HOST,
    port: values.PORT,
    logLevel: values.LOG_LEVEL,
    endpoint: values.MCP_ENDPOINT,
    outputFormat: values.MCP_OUTPUT_FORMAT,
    ambientTypes: values.MCP_AMBIENT_TYPES,
    catalogPath: values.MCP_CATALOG_PATH,
    includeHandlerName: values.MCP_INCLUDE_HANDLER_NAME,
    excludedHandlers: values.MCP_EXCLUDED_HANDLERS
  };
}
