// This module holds the fallback strategies used when the resolver cannot produce a handler instance.

import { ToolController } from '../handlers/controller.js';
import type { HandlerType } from '../types/domain.js';
import { AppError } from '../utils/errors.js';
import { tokenName, type HandlerScope, type ServiceToken } from './container.js';

export interface InstantiationStrategy {
  readonly name: string;
  canInstantiate(type: HandlerType): boolean;
  instantiate(type: HandlerType, scope: HandlerScope): unknown;
}

export type ControllerBase = abstract new (...args: never[]) => unknown;

function isServiceToken(value: unknown): value is ServiceToken {
  return typeof value === 'function' || typeof value === 'string' || typeof value === 'symbol';
}

// This helper reads the static dependency list a controller declares for its constructor.
export function readDependencies(type: HandlerType): ServiceToken[] {
  const declared: unknown = Reflect.get(type, 'dependencies');
  if (declared === undefined) {
    return [];
  }

  if (!Array.isArray(declared)) {
    throw new AppError('instantiation_failed', `Handler '${type.name}' declares dependencies that are not a list.`);
  }

  return declared.map((token: unknown, index) => {
    if (!isServiceToken(token)) {
      throw new AppError(
        'instantiation_failed',
        `Handler '${type.name}' declares an invalid dependency token at position ${index}.`
      );
    }
    return token;
  });
}

// This strategy builds controller subclasses directly, resolving each declared dependency through the call's scope.
export class ConstructorInjectionStrategy implements InstantiationStrategy {
  public readonly name = 'constructor-injection';

  public constructor(private readonly base: ControllerBase = ToolController) {}

  public canInstantiate(type: HandlerType): boolean {
    return type.prototype instanceof this.base;
  }

  public instantiate(type: HandlerType, scope: HandlerScope): unknown {
    const dependencies = readDependencies(type).map((token) => {
      const resolved = scope.resolve(token);
      if (resolved === undefined) {
        throw new AppError(
          'dependency_unresolved',
          `Dependency '${tokenName(token)}' of handler '${type.name}' could not be resolved.`
        );
      }
      return resolved;
    });

    return Reflect.construct(type, dependencies);
  }
}
