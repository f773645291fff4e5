// This module declares the sample handlers shipped with the server so a fresh install exposes a working tool surface.

import { ActionResult, ok, ToolController } from '../handlers/controller.js';
import { param, t } from '../handlers/signature.js';
import { defineHandler } from '../catalog/handler-catalog.js';
import type { ServiceToken } from '../invocation/container.js';
import type { HandlerDefinition } from '../types/domain.js';
import { AppError } from '../utils/errors.js';
import { SERVER_NAME, SERVER_VERSION } from '../version.js';

export interface Clock {
  now(): Date;
}

export const CLOCK = Symbol('clock');

export const systemClock: Clock = {
  now: () => new Date()
};

export enum TestStatus {
  Active = 0,
  Inactive = 1,
  Pending = 2
}

export interface OrderQuery {
  orgId: number;
  userId: number;
  pageSize: number;
  sortBy: string;
}

export class OrderFilter {
  public constructor(
    public readonly orgId: number,
    public readonly statuses: readonly string[]
  ) {}
}

export class SampleToolService extends ToolController {
  public static dependencies: readonly ServiceToken[] = [CLOCK];

  public constructor(private readonly clock: Clock) {
    super();
  }

  public add(a: number, b: number): number {
    return a + b;
  }

  public subtract(a: number, b: number): number {
    return a - b;
  }

  public greet(name: string, greeting: string): string {
    return `${greeting}, ${name}!`;
  }

  public async getServerTime(): Promise<ActionResult<{ time: string }>> {
    return ActionResult.from(ok({ time: this.clock.now().toISOString() }));
  }

  public getUserOrders(orgId: number, userId: number, pageSize: number, sortBy: string): OrderQuery {
    return { orgId, userId, pageSize, sortBy };
  }

  public findOrders(filter: OrderFilter): string {
    return `org ${filter.orgId}: ${filter.statuses.join(', ')}`;
  }

  public describeStatus(status: TestStatus): string {
    return TestStatus[status];
  }

  public testError(message: string): never {
    throw new AppError('sample_failure', message);
  }

  public static getVersion(): { name: string; version: string } {
    return { name: SERVER_NAME, version: SERVER_VERSION };
  }
}

export const sampleToolsDefinition: HandlerDefinition = defineHandler(SampleToolService, {
  add: {
    description: 'Adds two integers.',
    parameters: [param('a', t.integer()), param('b', t.integer())]
  },
  subtract: {
    description: 'Subtracts b from a.',
    parameters: [param('a', t.integer()), param('b', t.integer())]
  },
  greet: {
    description: 'Greets someone by name.',
    parameters: [param('name', t.string()), param('greeting', t.string(), { default: 'Hello' })]
  },
  getServerTime: {
    description: 'Returns the current server time.',
    parameters: []
  },
  getUserOrders: {
    description: 'Echoes an order query after binding.',
    toolName: 'GetUserOrders',
    parameters: [
      param('orgId', t.integer()),
      param('userId', t.integer()),
      param('pageSize', t.integer(), { default: 10 }),
      param('sortBy', t.string(), { default: 'Date' })
    ]
  },
  findOrders: {
    description: 'Describes an order filter after binding its nested fields.',
    parameters: [
      param(
        'filter',
        t.object(
          'OrderFilter',
          [param('orgId', t.integer()), param('statuses', t.array(t.string()), { default: ['open'] })],
          (fields) => new OrderFilter(Number(fields.orgId), Array.isArray(fields.statuses) ? fields.statuses.map(String) : [])
        )
      )
    ]
  },
  describeStatus: {
    description: 'Names a status given by name or ordinal.',
    parameters: [param('status', t.enumeration('TestStatus', TestStatus))]
  },
  testError: {
    description: 'Always fails with the given message.',
    parameters: [param('message', t.string(), { default: 'Sample failure' })]
  },
  getVersion: {
    description: 'Returns the server name and version.',
    isStatic: true,
    parameters: []
  }
});
