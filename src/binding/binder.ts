// This module binds a flat argument bag to a method's ordered formal parameters using the tool's parameter schema.

import { describeType } from '../handlers/signature.js';
import type {
  BindingFailure,
  BindingResult,
  ParameterDescriptor,
  ParameterSchema
} from '../types/domain.js';
import { describeError } from '../utils/errors.js';
import { errorForLog, type AppLogger } from '../utils/logger.js';
import { ConversionChain, DEFAULT_CONVERTERS, type Conversion, type ValueConverter } from './converters.js';
import { lookupArgument, lookupKey, zeroValue } from './values.js';

type BindStep = { ok: true; value: unknown } | { ok: false; failure: BindingFailure };

export interface ParameterBinderOptions {
  logger: AppLogger;
  // Declared type names that are supplied by the host and never bound from client data.
  ambientTypes?: readonly string[];
  converters?: readonly ValueConverter[];
}

// This class produces either a complete argument list or a single failure; partial lists never leave it.
export class ParameterBinder {
  private readonly logger: AppLogger;
  private readonly ambientTypes: ReadonlySet<string>;
  private readonly converters: readonly ValueConverter[];

  public constructor(options: ParameterBinderOptions) {
    this.logger = options.logger;
    this.ambientTypes = new Set(options.ambientTypes ?? []);
    this.converters = options.converters ?? DEFAULT_CONVERTERS;
  }

  public isAmbient(parameter: ParameterDescriptor): boolean {
    return parameter.type.kind === 'opaque' && this.ambientTypes.has(parameter.type.name);
  }

  public bind(
    parameters: readonly ParameterDescriptor[],
    schema: ReadonlyMap<string, ParameterSchema>,
    args: Record<string, unknown> | undefined,
    toolName: string
  ): BindingResult {
    const chain = new ConversionChain(this.converters, {
      onDefaultRejected: (path, message) => {
        this.logger.warn(
          {
            event: 'mcp_schema_default_rejected',
            toolName,
            parameter: path,
            reason: message
          },
          'mcp_schema_default_rejected'
        );
      }
    });

    const bound: unknown[] = [];

    for (const parameter of parameters) {
      let outcome: BindStep;

      try {
        outcome = this.bindOne(parameter, schema, args, toolName, chain);
      } catch (error) {
        this.logger.error(
          {
            event: 'mcp_binding_internal_error',
            toolName,
            parameter: parameter.name,
            error: errorForLog(error)
          },
          'mcp_binding_internal_error'
        );
        return {
          ok: false,
          failure: {
            kind: 'internal',
            parameter: parameter.name,
            message: `Failed to bind parameter '${parameter.name}' for method '${toolName}': ${describeError(error)}`
          }
        };
      }

      if (!outcome.ok) {
        return outcome;
      }

      bound.push(outcome.value);
    }

    return { ok: true, args: bound };
  }

  private bindOne(
    parameter: ParameterDescriptor,
    schemaMap: ReadonlyMap<string, ParameterSchema>,
    args: Record<string, unknown> | undefined,
    toolName: string,
    chain: ConversionChain
  ): BindStep {
    const schemaLookup = lookupKey(schemaMap.entries(), parameter.name);

    if (!schemaLookup.found) {
      if (this.isAmbient(parameter)) {
        return { ok: true, value: zeroValue(parameter.type) };
      }

      if (parameter.hasDefault) {
        return { ok: true, value: parameter.defaultValue };
      }

      return {
        ok: false,
        failure: {
          kind: 'schema_missing',
          parameter: parameter.name,
          message: `No schema is published for parameter '${parameter.name}' of method '${toolName}'.`,
          expectedType: describeType(parameter.type)
        }
      };
    }

    const schema = schemaLookup.value;
    const supplied = lookupArgument(args, parameter.name);

    const conversion = supplied.found
      ? chain.convertSupplied(supplied.value, parameter.type, schema, parameter.name)
      : chain.resolveAbsent(parameter, schema, parameter.name);

    return conversion.ok ? conversion : { ok: false, failure: this.toFailure(conversion, toolName) };
  }

  private toFailure(conversion: Extract<Conversion, { ok: false }>, toolName: string): BindingFailure {
    if (conversion.kind === 'missing_required') {
      return {
        kind: 'missing_required',
        parameter: conversion.path,
        message: `Missing required parameter '${conversion.path}' for method '${toolName}'.`,
        expectedType: conversion.expected
      };
    }

    return {
      kind: 'type_mismatch',
      parameter: conversion.path,
      message: conversion.message,
      expectedType: conversion.expected
    };
  }
}
