// This module centralizes structured logging configuration and safe payload shaping.

import { createHash } from 'node:crypto';
import pino, { type BaseLogger, type LevelWithSilent, type Logger, type LoggerOptions } from 'pino';
import { SERVER_NAME } from '../version.js';
import { AppError } from './errors.js';

// Core components only need the level methods, so both Fastify request loggers and pino instances fit.
export type AppLogger = BaseLogger;

// Header redaction for request logs; tool arguments are shaped by sanitizeForLog instead.
const REDACT_PATHS = [
  'req.headers.authorization',
  'req.headers.cookie',
  'req.headers["x-api-key"]',
  'headers.authorization',
  'headers.cookie'
];

// This interface bounds how much of a tool argument bag or error detail is copied into one log record.
export interface LogShapeLimits {
  maxDepth: number;
  maxStringLength: number;
  maxItems: number;
}

export const ARGUMENT_LOG_LIMITS: LogShapeLimits = {
  maxDepth: 4,
  maxStringLength: 256,
  maxItems: 20
};

// Argument names containing one of these fragments are fingerprinted rather than logged.
const SENSITIVE_ARGUMENT_FRAGMENTS = [
  'token',
  'password',
  'passphrase',
  'secret',
  'credential',
  'authorization',
  'cookie',
  'apikey',
  'api_key',
  'privatekey',
  'private_key'
];

export function isSensitiveArgument(name: string): boolean {
  const normalized = name.toLowerCase();
  return SENSITIVE_ARGUMENT_FRAGMENTS.some((fragment) => normalized.includes(fragment));
}

// The same value always yields the same fingerprint, so repeated calls stay correlatable.
function fingerprint(value: unknown): string {
  const text = typeof value === 'string' ? value : JSON.stringify(value) ?? '';
  return `[redacted:${createHash('sha256').update(text).digest('hex').slice(0, 12)}]`;
}

function shapeValue(value: unknown, limits: LogShapeLimits, depth: number): unknown {
  if (value === null || value === undefined || typeof value === 'number' || typeof value === 'boolean') {
    return value;
  }

  if (typeof value === 'string') {
    const overflow = value.length - limits.maxStringLength;
    return overflow > 0 ? `${value.slice(0, limits.maxStringLength)}...[+${overflow} chars]` : value;
  }

  if (typeof value === 'bigint') {
    return value.toString();
  }

  if (value instanceof Date) {
    return value.toISOString();
  }

  if (Array.isArray(value)) {
    if (depth >= limits.maxDepth) {
      return `[array:${value.length}]`;
    }

    const shaped = value.slice(0, limits.maxItems).map((item) => shapeValue(item, limits, depth + 1));
    return value.length > limits.maxItems ? [...shaped, `[+${value.length - limits.maxItems} items]`] : shaped;
  }

  if (typeof value === 'object') {
    if (depth >= limits.maxDepth) {
      return '[object]';
    }

    const entries: [string, unknown][] = Object.entries(value);
    const shaped: Record<string, unknown> = {};
    for (const [key, entry] of entries.slice(0, limits.maxItems)) {
      shaped[key] = isSensitiveArgument(key) ? fingerprint(entry) : shapeValue(entry, limits, depth + 1);
    }

    if (entries.length > limits.maxItems) {
      shaped['[omitted-keys]'] = entries.length - limits.maxItems;
    }

    return shaped;
  }

  return String(value);
}

// This helper copies tool arguments, results or error details into a bounded, redacted log shape.
export function sanitizeForLog(value: unknown, limits: LogShapeLimits = ARGUMENT_LOG_LIMITS): unknown {
  return shapeValue(value, limits, 0);
}

export function errorForLog(error: unknown): Record<string, unknown> {
  if (error instanceof AppError) {
    return { name: error.name, code: error.code, message: error.message, stack: error.stack };
  }

  if (error instanceof Error) {
    return { name: error.name, message: error.message, stack: error.stack };
  }

  return { message: String(error) };
}

// This helper builds one Fastify-compatible logger configuration with strict redaction.
export function buildLoggerOptions(level: LevelWithSilent = 'info'): LoggerOptions {
  return {
    level,
    base: {
      service: SERVER_NAME
    },
    redact: {
      paths: REDACT_PATHS,
      remove: true
    },
    timestamp: pino.stdTimeFunctions.isoTime
  };
}

// This helper builds a standalone logger for code paths that run outside a Fastify request.
export function createLogger(level: LevelWithSilent = 'info'): Logger {
  return pino(buildLoggerOptions(level));
}
