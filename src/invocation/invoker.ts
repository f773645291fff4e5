// This module invokes a registered tool's target method with bound arguments and shapes the returned value.

import type { HandlerFunction, OutputFormat, ToolDescriptor } from '../types/domain.js';
import type { McpContentResult } from '../types/mcp.js';
import { AppError, describeError } from '../utils/errors.js';
import { isPlainObject } from '../utils/json.js';
import { errorForLog, type AppLogger } from '../utils/logger.js';
import type { HandlerResolver, HandlerScope } from './container.js';
import { ConstructorInjectionStrategy, type InstantiationStrategy } from './instantiation.js';
import { applyResultAdapters, DEFAULT_RESULT_ADAPTERS, type ResultAdapter } from './result-adapters.js';

export interface DynamicInvokerOptions {
  logger: AppLogger;
  resolver?: HandlerResolver;
  instantiation?: readonly InstantiationStrategy[];
  resultAdapters?: readonly ResultAdapter[];
  outputFormat?: OutputFormat;
}

// This helper renders a payload as one text content block, keeping plain objects as structured content too.
export function toContentResult(value: unknown): McpContentResult {
  const text = typeof value === 'string' ? value : JSON.stringify(value ?? null, null, 2);
  const content: McpContentResult = { content: [{ type: 'text', text }] };

  if (isPlainObject(value)) {
    content.structuredContent = value;
  }

  return content;
}

// This class owns one call at a time: scope acquisition, instance resolution, invocation, and unwrapping.
export class DynamicInvoker {
  private readonly logger: AppLogger;
  private readonly resolver?: HandlerResolver;
  private readonly instantiation: readonly InstantiationStrategy[];
  private readonly resultAdapters: readonly ResultAdapter[];
  private readonly outputFormat: OutputFormat;

  public constructor(options: DynamicInvokerOptions) {
    this.logger = options.logger;
    this.resolver = options.resolver;
    this.instantiation = options.instantiation ?? [new ConstructorInjectionStrategy()];
    this.resultAdapters = options.resultAdapters ?? DEFAULT_RESULT_ADAPTERS;
    this.outputFormat = options.outputFormat ?? 'raw';
  }

  public async invoke(tool: ToolDescriptor, args: readonly unknown[]): Promise<unknown> {
    if (tool.method.isStatic) {
      const value = await this.call(tool, tool.method.resolve(undefined), args);
      return this.shape(value);
    }

    if (!this.resolver) {
      throw new AppError('handler_unresolved', `No handler resolver is configured for tool '${tool.name}'.`);
    }

    const scope = this.resolver.createScope();
    try {
      const instance = this.resolveInstance(tool, scope);
      const value = await this.call(tool, tool.method.resolve(instance), args);
      return this.shape(value);
    } finally {
      await this.release(scope, tool);
    }
  }

  private resolveInstance(tool: ToolDescriptor, scope: HandlerScope): unknown {
    const type = tool.handler.type;
    if (!type) {
      throw new AppError('handler_unresolved', `Handler '${tool.handler.name}' has no type to resolve.`);
    }

    const resolved = scope.resolve(type);
    if (resolved !== undefined && resolved !== null) {
      return resolved;
    }

    const strategy = this.instantiation.find((candidate) => candidate.canInstantiate(type));
    if (!strategy) {
      throw new AppError('handler_unresolved', `Handler '${tool.handler.name}' could not be resolved.`);
    }

    this.logger.debug(
      {
        event: 'mcp_handler_instantiated',
        toolName: tool.name,
        handler: tool.handler.name,
        strategy: strategy.name
      },
      'mcp_handler_instantiated'
    );

    return strategy.instantiate(type, scope);
  }

  // Anything thrown or rejected from here on belongs to the handler itself.
  private async call(tool: ToolDescriptor, fn: HandlerFunction, args: readonly unknown[]): Promise<unknown> {
    try {
      return await fn(args);
    } catch (error) {
      throw new AppError('handler_fault', describeError(error), { toolName: tool.name }, { cause: error });
    }
  }

  private shape(value: unknown): unknown {
    const unwrapped = applyResultAdapters(value, this.resultAdapters);
    return this.outputFormat === 'content' ? toContentResult(unwrapped) : unwrapped;
  }

  private async release(scope: HandlerScope, tool: ToolDescriptor): Promise<void> {
    try {
      await scope.dispose();
    } catch (error) {
      this.logger.error(
        {
          event: 'mcp_scope_dispose_failed',
          toolName: tool.name,
          error: errorForLog(error)
        },
        'mcp_scope_dispose_failed'
      );
    }
  }
}
