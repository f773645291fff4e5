// This module owns the tool registry: the only state shared across requests.

import { catalogEntrySchema } from '../catalog/entry-schema.js';
import type {
  CatalogEntry,
  CatalogProvider,
  HandlerLocator,
  ParameterSchema,
  ToolDescriptor
} from '../types/domain.js';
import { AppError } from '../utils/errors.js';
import { errorForLog, type AppLogger } from '../utils/logger.js';
import { createMethodCallable } from './callable.js';

export interface ToolRegistryOptions {
  locator: HandlerLocator;
  logger: AppLogger;
}

export interface ImportSummary {
  imported: number;
  skipped: number;
}

// This class maps tool names to descriptors; registrations overwrite by name and reads never block.
export class ToolRegistry {
  private readonly tools = new Map<string, ToolDescriptor>();
  private readonly locator: HandlerLocator;
  private readonly logger: AppLogger;

  public constructor(options: ToolRegistryOptions) {
    this.locator = options.locator;
    this.logger = options.logger;
  }

  public get size(): number {
    return this.tools.size;
  }

  // This method inserts or replaces one descriptor; the previous descriptor is never merged.
  public register(descriptor: ToolDescriptor | null | undefined): void {
    if (!descriptor) {
      throw new AppError('invalid_argument', 'Tool descriptor is required.');
    }

    if (typeof descriptor.name !== 'string' || descriptor.name.trim().length === 0) {
      throw new AppError('invalid_argument', 'Tool name cannot be empty.');
    }

    const replaced = this.tools.has(descriptor.name);
    this.tools.set(descriptor.name, descriptor);

    this.logger.info(
      {
        event: 'tool_registered',
        toolName: descriptor.name,
        handler: descriptor.handler.name,
        method: descriptor.method.name,
        replaced
      },
      'tool_registered'
    );
  }

  public lookup(name: string): ToolDescriptor | undefined {
    return this.tools.get(name);
  }

  public list(): ToolDescriptor[] {
    return [...this.tools.values()];
  }

  // This method imports catalog entries one by one; a failing entry is logged and skipped.
  public bulkImport(entries: readonly unknown[]): ImportSummary {
    const summary: ImportSummary = { imported: 0, skipped: 0 };

    for (const raw of entries) {
      try {
        this.register(this.resolveEntry(raw));
        summary.imported += 1;
      } catch (error) {
        summary.skipped += 1;
        this.logger.error(
          {
            event: 'tool_import_skipped',
            toolName: readEntryName(raw),
            error: errorForLog(error)
          },
          'tool_import_skipped'
        );
      }
    }

    this.logger.info({ event: 'tool_import_completed', ...summary }, 'tool_import_completed');
    return summary;
  }

  // This method pulls entries from a provider; a provider failure leaves the registry untouched.
  public async importFrom(provider: CatalogProvider): Promise<ImportSummary> {
    let entries: CatalogEntry[];

    try {
      entries = await provider.listTools();
    } catch (error) {
      this.logger.error(
        {
          event: 'tool_catalog_unavailable',
          error: errorForLog(error)
        },
        'tool_catalog_unavailable'
      );
      return { imported: 0, skipped: 0 };
    }

    return this.bulkImport(entries);
  }

  private resolveEntry(raw: unknown): ToolDescriptor {
    const parsed = catalogEntrySchema.safeParse(raw);
    if (!parsed.success) {
      throw new AppError('invalid_catalog_entry', 'Catalog entry failed validation.', parsed.error.flatten());
    }

    const entry = parsed.data;
    const definition = this.locator.locate(entry.handlerIdentity);
    if (!definition) {
      throw new AppError('handler_unresolved', `Handler '${entry.handlerIdentity}' could not be located.`);
    }

    const methodDefinition = Object.hasOwn(definition.methods, entry.methodName)
      ? definition.methods[entry.methodName]
      : undefined;
    if (!methodDefinition) {
      throw new AppError(
        'method_unavailable',
        `Method '${entry.methodName}' is not defined on handler '${definition.name}'.`
      );
    }

    return {
      name: entry.name,
      description: entry.description,
      handler: { name: definition.name, type: definition.type },
      method: createMethodCallable(definition.type, entry.methodName, methodDefinition),
      schema: this.buildSchemaMap(entry)
    };
  }

  private buildSchemaMap(entry: CatalogEntry): Map<string, ParameterSchema> {
    const schema = new Map<string, ParameterSchema>();

    for (const parameter of entry.parameterSchema) {
      if (parameter.name.trim().length === 0) {
        this.logger.warn(
          {
            event: 'tool_schema_parameter_unnamed',
            toolName: entry.name
          },
          'tool_schema_parameter_unnamed'
        );
        continue;
      }

      schema.set(parameter.name, parameter);
    }

    return schema;
  }
}

// This helper reads the name of a raw catalog entry for diagnostics only.
function readEntryName(raw: unknown): string | null {
  if (typeof raw !== 'object' || raw === null) {
    return null;
  }

  const name: unknown = Reflect.get(raw, 'name');
  return typeof name === 'string' ? name : null;
}
