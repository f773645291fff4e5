// This module derives catalog entries from declared handler classes and locates those classes by identity.

import type {
  CatalogEntry,
  CatalogProvider,
  HandlerDefinition,
  HandlerLocator,
  HandlerType,
  MethodDefinition,
  ParameterDescriptor,
  ParameterSchema,
  TypeDescriptor
} from '../types/domain.js';
import { AppError } from '../utils/errors.js';

export interface HandlerCatalogOptions {
  includeHandlerName?: boolean;
  excludedHandlers?: readonly string[];
  ambientTypes?: readonly string[];
}

// This helper declares a handler class together with the method signatures it exposes as tools.
export function defineHandler<T>(
  type: HandlerType<T>,
  methods: Record<string, MethodDefinition>,
  name: string = type.name
): HandlerDefinition {
  if (name.trim().length === 0) {
    throw new AppError('invalid_argument', 'Handler name cannot be empty.');
  }

  return { name, type, methods };
}

// This function maps a declared type onto the published schema model.
export function schemaForType(
  name: string,
  type: TypeDescriptor,
  required: boolean,
  description?: string
): ParameterSchema {
  const base = { name, required, description };

  switch (type.kind) {
    case 'string':
    case 'integer':
    case 'number':
    case 'boolean':
      return { ...base, type: type.kind };
    case 'enum':
      return { ...base, type: 'string', enum: type.members.map((member) => member.name), format: 'enum' };
    case 'array':
      return { ...base, type: 'array', items: schemaForType('', type.items, false) };
    case 'object': {
      const properties: Record<string, ParameterSchema> = {};
      for (const field of type.fields) {
        properties[field.name] = toParameterSchema(field);
      }
      return { ...base, type: 'object', properties };
    }
    case 'unknown':
    case 'opaque':
      return { ...base, type: 'object' };
  }
}

// This function publishes one formal parameter; a parameter without a declared default is required.
export function toParameterSchema(parameter: ParameterDescriptor): ParameterSchema {
  const schema = schemaForType(parameter.name, parameter.type, !parameter.hasDefault, parameter.description);
  if (parameter.hasDefault && parameter.defaultValue !== undefined) {
    schema.default = parameter.defaultValue;
  }
  return schema;
}

// This class is both the handler locator for bulk imports and the catalog provider derived from the same handlers.
export class HandlerCatalog implements HandlerLocator, CatalogProvider {
  private readonly definitions = new Map<string, HandlerDefinition>();
  private readonly includeHandlerName: boolean;
  private readonly excludedHandlers: ReadonlySet<string>;
  private readonly ambientTypes: ReadonlySet<string>;

  public constructor(options: HandlerCatalogOptions = {}) {
    this.includeHandlerName = options.includeHandlerName ?? true;
    this.excludedHandlers = new Set(options.excludedHandlers ?? []);
    this.ambientTypes = new Set(options.ambientTypes ?? []);
  }

  public register(definition: HandlerDefinition): this {
    this.definitions.set(definition.name, definition);
    return this;
  }

  public locate(identity: string): HandlerDefinition | undefined {
    return this.definitions.get(identity);
  }

  public listTools(): CatalogEntry[] {
    const entries: CatalogEntry[] = [];

    for (const definition of this.definitions.values()) {
      if (this.excludedHandlers.has(definition.name)) {
        continue;
      }

      for (const [methodName, method] of Object.entries(definition.methods)) {
        if (method.toolName === false) {
          continue;
        }

        entries.push({
          name: this.toolNameFor(definition, methodName, method),
          description: method.description,
          handlerIdentity: definition.name,
          methodName,
          parameterSchema: method.parameters
            .filter((parameter) => !this.isAmbient(parameter))
            .map((parameter) => toParameterSchema(parameter))
        });
      }
    }

    return entries;
  }

  private toolNameFor(definition: HandlerDefinition, methodName: string, method: MethodDefinition): string {
    if (typeof method.toolName === 'string' && method.toolName.trim().length > 0) {
      return method.toolName;
    }

    return this.includeHandlerName ? `${definition.name}_${methodName}` : methodName;
  }

  private isAmbient(parameter: ParameterDescriptor): boolean {
    return parameter.type.kind === 'opaque' && this.ambientTypes.has(parameter.type.name);
  }
}
