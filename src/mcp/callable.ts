// This module adapts class methods and plain functions to the Callable contract stored in the registry.

import type { Callable, HandlerFunction, HandlerType, MethodDefinition, ParameterDescriptor } from '../types/domain.js';
import { AppError } from '../utils/errors.js';

// This helper reads a callable member from an object without widening it to any.
function readFunction(source: unknown, name: string): ((...args: unknown[]) => unknown) | undefined {
  if ((typeof source !== 'object' && typeof source !== 'function') || source === null) {
    return undefined;
  }

  const member: unknown = Reflect.get(source, name);
  if (typeof member !== 'function') {
    return undefined;
  }

  return (...args: unknown[]): unknown => Reflect.apply(member, source, args);
}

// This function builds a Callable for one method declared on a handler class.
export function createMethodCallable(type: HandlerType, methodName: string, definition: MethodDefinition): Callable {
  const isStatic = definition.isStatic === true;
  const declared = isStatic ? Reflect.get(type, methodName) : Reflect.get(type.prototype, methodName);

  if (typeof declared !== 'function') {
    throw new AppError(
      'method_unavailable',
      `Method '${methodName}' is not declared ${isStatic ? 'statically' : 'on the prototype'} of '${type.name}'.`
    );
  }

  return {
    name: methodName,
    parameters: definition.parameters,
    isStatic,
    resolve(instance: unknown): HandlerFunction {
      const target = isStatic ? type : instance;
      const fn = readFunction(target, methodName);
      if (!fn) {
        throw new AppError('method_unavailable', `Method '${methodName}' is not available on the resolved '${type.name}' instance.`);
      }

      return (args) => fn(...args);
    }
  };
}

// This function wraps a free function as a static Callable.
export function createFunctionCallable(
  name: string,
  fn: (...args: never[]) => unknown,
  parameters: ParameterDescriptor[]
): Callable {
  return {
    name,
    parameters,
    isStatic: true,
    resolve(): HandlerFunction {
      return (args) => Reflect.apply(fn, undefined, args);
    }
  };
}
