// This module implements the handler-resolver capability as a small service container with per-call scopes.

import type { HandlerType } from '../types/domain.js';
import { AppError } from '../utils/errors.js';

export type ServiceToken = HandlerType | string | symbol;

export type ServiceLifetime = 'singleton' | 'scoped' | 'transient';

export type ServiceFactory = (scope: HandlerScope) => unknown;

export interface HandlerScope {
  resolve(token: ServiceToken): unknown;
  dispose(): void | Promise<void>;
}

export interface HandlerResolver {
  createScope(): HandlerScope;
}

export interface Registration {
  lifetime: ServiceLifetime;
  factory: ServiceFactory;
}

// This helper renders a token for diagnostics.
export function tokenName(token: ServiceToken): string {
  if (typeof token === 'function') {
    return token.name || 'anonymous';
  }

  return String(token);
}

// This helper disposes values that follow the dispose() convention and ignores everything else.
async function disposeValue(value: unknown): Promise<void> {
  if (typeof value !== 'object' || value === null) {
    return;
  }

  const dispose: unknown = Reflect.get(value, 'dispose');
  if (typeof dispose === 'function') {
    await Reflect.apply(dispose, value, []);
  }
}

// This class owns one resolution scope: scoped instances live until dispose() is called.
class ContainerScope implements HandlerScope {
  private readonly scoped = new Map<ServiceToken, unknown>();
  private disposed = false;

  public constructor(private readonly container: ServiceContainer) {}

  public resolve(token: ServiceToken): unknown {
    if (this.disposed) {
      throw new AppError('scope_disposed', `Cannot resolve ${tokenName(token)} from a disposed scope.`);
    }

    const registration = this.container.registrationFor(token);
    if (!registration) {
      return undefined;
    }

    switch (registration.lifetime) {
      case 'singleton':
        return this.container.singleton(token, registration, this);
      case 'scoped': {
        if (!this.scoped.has(token)) {
          this.scoped.set(token, registration.factory(this));
        }
        return this.scoped.get(token);
      }
      case 'transient':
        return registration.factory(this);
    }
  }

  public async dispose(): Promise<void> {
    if (this.disposed) {
      return;
    }

    this.disposed = true;
    const instances = [...this.scoped.values()].reverse();
    this.scoped.clear();

    for (const instance of instances) {
      await disposeValue(instance);
    }
  }
}

// This class registers services by token and hands out request-scoped resolution scopes.
export class ServiceContainer implements HandlerResolver {
  private readonly registrations = new Map<ServiceToken, Registration>();
  private readonly singletons = new Map<ServiceToken, unknown>();

  public addSingleton(token: ServiceToken, factory: ServiceFactory): this {
    this.registrations.set(token, { lifetime: 'singleton', factory });
    this.singletons.delete(token);
    return this;
  }

  public addScoped(token: ServiceToken, factory: ServiceFactory): this {
    this.registrations.set(token, { lifetime: 'scoped', factory });
    return this;
  }

  public addTransient(token: ServiceToken, factory: ServiceFactory): this {
    this.registrations.set(token, { lifetime: 'transient', factory });
    return this;
  }

  public addValue(token: ServiceToken, value: unknown): this {
    return this.addSingleton(token, () => value);
  }

  public has(token: ServiceToken): boolean {
    return this.registrations.has(token);
  }

  public createScope(): HandlerScope {
    return new ContainerScope(this);
  }

  public registrationFor(token: ServiceToken): Registration | undefined {
    return this.registrations.get(token);
  }

  public singleton(token: ServiceToken, registration: Registration, scope: HandlerScope): unknown {
    if (!this.singletons.has(token)) {
      this.singletons.set(token, registration.factory(scope));
    }
    return this.singletons.get(token);
  }
}
