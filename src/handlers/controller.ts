// This module defines the controller convention: a base class with declared constructor dependencies and result envelopes.

import type { ServiceToken } from '../invocation/container.js';

// Subclasses list the tokens their constructor takes, in order, so they can be built without a registration.
export abstract class ToolController {
  public static dependencies: readonly ServiceToken[] = [];
}

// This class carries a status code next to the payload a handler produced.
export class StatusResult<T = unknown> {
  public readonly statusCode: number;
  public readonly value: T;

  public constructor(statusCode: number, value: T) {
    this.statusCode = statusCode;
    this.value = value;
  }
}

// This class is the typed result envelope: either a direct value or a status-carrying result.
export class ActionResult<T = unknown> {
  public readonly value?: T;
  public readonly result?: StatusResult;

  private constructor(value: T | undefined, result: StatusResult | undefined) {
    this.value = value;
    this.result = result;
  }

  public static of<T>(value: T): ActionResult<T> {
    return new ActionResult<T>(value, undefined);
  }

  public static from<T>(result: StatusResult<T>): ActionResult<T> {
    return new ActionResult<T>(undefined, result);
  }
}

export function ok<T>(value: T): StatusResult<T> {
  return new StatusResult(200, value);
}

export function created<T>(value: T): StatusResult<T> {
  return new StatusResult(201, value);
}

export function notFound<T>(value: T): StatusResult<T> {
  return new StatusResult(404, value);
}
