// This test suite verifies handler resolution, fault classification, scope release, and result shaping.

import pino from 'pino';
import { describe, expect, it, vi } from 'vitest';
import { ActionResult, created, ok, StatusResult } from '../src/handlers/controller.js';
import { param, t } from '../src/handlers/signature.js';
import { ServiceContainer, type HandlerResolver } from '../src/invocation/container.js';
import { ConstructorInjectionStrategy } from '../src/invocation/instantiation.js';
import { DynamicInvoker, toContentResult } from '../src/invocation/invoker.js';
import { applyResultAdapters, DEFAULT_RESULT_ADAPTERS } from '../src/invocation/result-adapters.js';
import { createFunctionCallable, createMethodCallable } from '../src/mcp/callable.js';
import { CLOCK, SampleToolService } from '../src/samples/sample-tools.js';
import type { HandlerType, MethodDefinition, OutputFormat, ToolDescriptor } from '../src/types/domain.js';
import { AppError } from '../src/utils/errors.js';

class Greeter {
  public greet(name: string): string {
    return `Hi ${name}`;
  }

  public async fail(): Promise<never> {
    throw new Error('upstream refused');
  }
}

function methodTool(type: HandlerType, methodName: string, definition: MethodDefinition = { parameters: [] }): ToolDescriptor {
  return {
    name: `${type.name}_${methodName}`,
    handler: { name: type.name, type },
    method: createMethodCallable(type, methodName, definition),
    schema: new Map()
  };
}

function createInvoker(resolver?: HandlerResolver, outputFormat: OutputFormat = 'raw'): DynamicInvoker {
  return new DynamicInvoker({
    logger: pino({ level: 'silent' }),
    resolver,
    instantiation: [new ConstructorInjectionStrategy()],
    outputFormat
  });
}

async function captureError(promise: Promise<unknown>): Promise<AppError> {
  try {
    await promise;
  } catch (error) {
    if (error instanceof AppError) {
      return error;
    }
    throw error;
  }
  throw new Error('Expected the invocation to fail.');
}

const fixedClock = { now: () => new Date('2026-01-02T03:04:05.000Z') };

describe('dynamic invoker', () => {
  it('invokes static callables without a resolver', async () => {
    const tool: ToolDescriptor = {
      name: 'double',
      handler: { name: 'functions' },
      method: createFunctionCallable('double', (value: number) => value * 2, [param('value', t.integer())]),
      schema: new Map()
    };

    await expect(createInvoker().invoke(tool, [21])).resolves.toBe(42);
  });

  it('invokes static class methods without resolving an instance', async () => {
    const tool = methodTool(SampleToolService, 'getVersion', { parameters: [], isStatic: true });

    await expect(createInvoker().invoke(tool, [])).resolves.toEqual({ name: 'toolgate', version: '0.3.0' });
  });

  it('resolves registered handlers through a fresh scope', async () => {
    const container = new ServiceContainer().addScoped(Greeter, () => new Greeter());

    await expect(createInvoker(container).invoke(methodTool(Greeter, 'greet'), ['Ada'])).resolves.toBe('Hi Ada');
  });

  it('constructs controller subclasses from their declared dependencies', async () => {
    const container = new ServiceContainer().addValue(CLOCK, fixedClock);

    const result = await createInvoker(container).invoke(methodTool(SampleToolService, 'getServerTime'), []);

    expect(result).toEqual({ time: '2026-01-02T03:04:05.000Z' });
  });

  it('fails as unresolved when a dependency is missing', async () => {
    const error = await captureError(
      createInvoker(new ServiceContainer()).invoke(methodTool(SampleToolService, 'getServerTime'), [])
    );

    expect(error.code).toBe('dependency_unresolved');
    expect(error.message).toBe("Dependency 'Symbol(clock)' of handler 'SampleToolService' could not be resolved.");
  });

  it('fails as unresolved when no resolver or strategy can produce an instance', async () => {
    const withoutResolver = await captureError(createInvoker().invoke(methodTool(Greeter, 'greet'), ['Ada']));
    const withoutStrategy = await captureError(
      createInvoker(new ServiceContainer()).invoke(methodTool(Greeter, 'greet'), ['Ada'])
    );

    expect(withoutResolver.code).toBe('handler_unresolved');
    expect(withoutStrategy.code).toBe('handler_unresolved');
    expect(withoutStrategy.message).toBe("Handler 'Greeter' could not be resolved.");
  });

  it('classifies thrown and rejected handler errors as handler faults', async () => {
    const container = new ServiceContainer().addScoped(Greeter, () => new Greeter());

    const error = await captureError(createInvoker(container).invoke(methodTool(Greeter, 'fail'), []));

    expect(error.code).toBe('handler_fault');
    expect(error.message).toBe('upstream refused');
  });

  it('releases the scope after success and after a handler fault', async () => {
    const dispose = vi.fn();
    const resolver: HandlerResolver = {
      createScope: () => ({ resolve: () => new Greeter(), dispose })
    };
    const invoker = createInvoker(resolver);

    await invoker.invoke(methodTool(Greeter, 'greet'), ['Ada']);
    await captureError(invoker.invoke(methodTool(Greeter, 'fail'), []));

    expect(dispose).toHaveBeenCalledTimes(2);
  });

  it('wraps results in a text content block when configured', async () => {
    const container = new ServiceContainer().addValue(CLOCK, fixedClock);

    const result = await createInvoker(container, 'content').invoke(methodTool(SampleToolService, 'getServerTime'), []);

    expect(result).toEqual({
      content: [{ type: 'text', text: JSON.stringify({ time: '2026-01-02T03:04:05.000Z' }, null, 2) }],
      structuredContent: { time: '2026-01-02T03:04:05.000Z' }
    });
  });
});

describe('result adapters', () => {
  it('unwraps nested envelopes down to the payload', () => {
    expect(applyResultAdapters(ActionResult.of(ActionResult.from(created('made'))), DEFAULT_RESULT_ADAPTERS)).toBe('made');
    expect(applyResultAdapters(new StatusResult(404, { missing: true }), DEFAULT_RESULT_ADAPTERS)).toEqual({
      missing: true
    });
  });

  it('passes unknown values through unchanged', () => {
    const value = { plain: true };

    expect(applyResultAdapters(value, DEFAULT_RESULT_ADAPTERS)).toBe(value);
    expect(applyResultAdapters(ok(undefined), [])).toBeInstanceOf(StatusResult);
  });

  it('keeps strings verbatim in content blocks', () => {
    expect(toContentResult('hello')).toEqual({ content: [{ type: 'text', text: 'hello' }] });
    expect(toContentResult(undefined)).toEqual({ content: [{ type: 'text', text: 'null' }] });
  });
});
