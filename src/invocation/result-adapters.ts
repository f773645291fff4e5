// This module strips result envelope layers from handler return values.

import { ActionResult, StatusResult } from '../handlers/controller.js';

export type AdaptedResult = { adapted: true; value: unknown } | { adapted: false };

export interface ResultAdapter {
  readonly name: string;
  adapt(value: unknown): AdaptedResult;
}

// Unwraps the typed envelope to its direct value, or to the status result it carries.
export const actionResultAdapter: ResultAdapter = {
  name: 'action-result',
  adapt(value) {
    if (!(value instanceof ActionResult)) {
      return { adapted: false };
    }

    return { adapted: true, value: value.result ?? value.value };
  }
};

// The status code is dropped; only the payload reaches the caller.
export const statusResultAdapter: ResultAdapter = {
  name: 'status-result',
  adapt(value) {
    if (!(value instanceof StatusResult)) {
      return { adapted: false };
    }

    return { adapted: true, value: value.value };
  }
};

export const DEFAULT_RESULT_ADAPTERS: readonly ResultAdapter[] = [actionResultAdapter, statusResultAdapter];

const MAX_ADAPTER_PASSES = 8;

// This function applies adapters until none recognises the value or the pass limit is reached.
export function applyResultAdapters(value: unknown, adapters: readonly ResultAdapter[]): unknown {
  let current = value;

  for (let pass = 0; pass < MAX_ADAPTER_PASSES; pass += 1) {
    let changed = false;

    for (const adapter of adapters) {
      const outcome = adapter.adapt(current);
      if (outcome.adapted) {
        current = outcome.value;
        changed = true;
        break;
      }
    }

    if (!changed) {
      return current;
    }
  }

  return current;
}
