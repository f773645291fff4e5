// This module turns one raw JSON-RPC envelope into exactly one response envelope for the tool surface.

import { randomUUID } from 'node:crypto';
import type { ParameterBinder } from '../binding/binder.js';
import type { DynamicInvoker } from '../invocation/invoker.js';
import type { BindingFailure } from '../types/domain.js';
import { RPC_ERROR_CODES, type JsonRpcError, type JsonRpcId, type JsonRpcRequest, type JsonRpcResponse } from '../types/mcp.js';
import { AppError, normalizeError } from '../utils/errors.js';
import { isPlainObject, parseJson, tryParseJson } from '../utils/json.js';
import { errorForLog, sanitizeForLog, type AppLogger } from '../utils/logger.js';
import type { ToolRegistry } from './registry.js';
import { buildToolList } from './tool-schemas.js';

export interface McpDispatcherOptions {
  registry: ToolRegistry;
  binder: ParameterBinder;
  invoker: DynamicInvoker;
  logger: AppLogger;
}

interface ToolCall {
  toolName: string;
  args: Record<string, unknown>;
}

// This helper creates a canonical JSON-RPC error payload.
export function rpcError(id: JsonRpcId, code: number, message: string, data?: unknown): JsonRpcResponse {
  const error: JsonRpcError = { code, message };
  if (data !== undefined) {
    error.data = data;
  }

  return { jsonrpc: '2.0', id, error };
}

// An undefined result is sent as null so the result member survives serialization.
export function rpcResult(id: JsonRpcId, result: unknown): JsonRpcResponse {
  return { jsonrpc: '2.0', id, result: result === undefined ? null : result };
}

// This helper maps internal application errors into the fixed JSON-RPC error codes.
export function mapAppErrorToRpc(error: AppError): JsonRpcError {
  switch (error.code) {
    case 'parse_error':
      return { code: RPC_ERROR_CODES.PARSE_ERROR, message: `Parse error: ${error.message}` };
    case 'tool_not_found':
      return { code: RPC_ERROR_CODES.METHOD_NOT_FOUND, message: error.message };
    case 'invalid_params':
      return { code: RPC_ERROR_CODES.INVALID_PARAMS, message: error.message, data: error.details };
    case 'handler_fault':
      return { code: RPC_ERROR_CODES.SERVER_ERROR, message: `Server error: ${error.message}` };
    default:
      return { code: RPC_ERROR_CODES.INTERNAL_ERROR, message: `Internal error: ${error.message}` };
  }
}

// This helper recovers the request id without trusting the rest of the envelope.
export function recoverRequestId(raw: string): JsonRpcId {
  const parsed = tryParseJson(raw);
  if (!isPlainObject(parsed)) {
    return null;
  }

  const id = parsed.id;
  return typeof id === 'string' || typeof id === 'number' ? id : null;
}

// This helper parses the full envelope; anything that is not an object with a string method is a parse failure.
function parseEnvelope(raw: string): JsonRpcRequest {
  const parsed = parseJson(raw, 'JSON-RPC request');
  const method = isPlainObject(parsed) ? parsed.method : undefined;
  if (!isPlainObject(parsed) || typeof method !== 'string') {
    throw new AppError('parse_error', 'Request envelope must be an object with a string method.');
  }

  const id = parsed.id;
  return {
    jsonrpc: '2.0',
    id: typeof id === 'string' || typeof id === 'number' ? id : undefined,
    method,
    params: parsed.params
  };
}

// This helper reads the tools/call parameter object; the argument bag falls back to an empty object.
function readToolCall(params: unknown): ToolCall {
  const name = isPlainObject(params) ? params.name : undefined;
  if (typeof name !== 'string') {
    throw new AppError('invalid_params', 'tools/call requires params.name as string.');
  }

  const args = isPlainObject(params) && isPlainObject(params.arguments) ? params.arguments : {};
  return { toolName: name, args };
}

// This helper converts a binding failure into the error the response mapping understands.
function bindingError(failure: BindingFailure): AppError {
  const details = { parameter: failure.parameter, expectedType: failure.expectedType };

  switch (failure.kind) {
    case 'missing_required':
    case 'type_mismatch':
      return new AppError('invalid_params', failure.message, details);
    case 'schema_missing':
      return new AppError('binding_schema_missing', failure.message, details);
    case 'internal':
      return new AppError('binding_failed', failure.message, details);
  }
}

// This class routes tools/list, tools/call and the legacy direct-call shape through lookup, binding and invocation.
export class McpDispatcher {
  private readonly registry: ToolRegistry;
  private readonly binder: ParameterBinder;
  private readonly invoker: DynamicInvoker;
  private readonly logger: AppLogger;

  public constructor(options: McpDispatcherOptions) {
    this.registry = options.registry;
    this.binder = options.binder;
    this.invoker = options.invoker;
    this.logger = options.logger;
  }

  // Never rejects: every failure becomes an error envelope.
  public async handle(raw: string): Promise<JsonRpcResponse> {
    const requestId = recoverRequestId(raw);
    const startedAt = Date.now();
    const rpcTraceId = randomUUID();
    let method: string | null = null;

    try {
      const request = parseEnvelope(raw);
      method = request.method;

      this.logger.info(
        {
          event: 'mcp_rpc_request_received',
          rpcTraceId,
          rpcRequestId: requestId,
          method,
          notification: request.id === undefined
        },
        'mcp_rpc_request_received'
      );

      const result = await this.dispatch(request, rpcTraceId, requestId);
      return rpcResult(requestId, result);
    } catch (error) {
      const appError = normalizeError(error);
      const mapped = mapAppErrorToRpc(appError);

      this.logger.error(
        {
          event: 'mcp_rpc_request_failed',
          rpcTraceId,
          rpcRequestId: requestId,
          method,
          code: appError.code,
          rpcCode: mapped.code,
          details: sanitizeForLog(appError.details),
          error: errorForLog(error),
          durationMs: Date.now() - startedAt
        },
        'mcp_rpc_request_failed'
      );

      return rpcError(requestId, mapped.code, mapped.message, mapped.data);
    } finally {
      this.logger.info(
        {
          event: 'mcp_rpc_request_completed',
          rpcTraceId,
          rpcRequestId: requestId,
          method,
          durationMs: Date.now() - startedAt
        },
        'mcp_rpc_request_completed'
      );
    }
  }

  private async dispatch(request: JsonRpcRequest, rpcTraceId: string, requestId: JsonRpcId): Promise<unknown> {
    switch (request.method) {
      case 'tools/list':
        return { tools: buildToolList(this.registry.list()) };
      case 'tools/call':
        return this.callTool(readToolCall(request.params), rpcTraceId, requestId);
      default:
        return this.callTool(
          {
            toolName: request.method,
            args: isPlainObject(request.params) ? request.params : {}
          },
          rpcTraceId,
          requestId
        );
    }
  }

  private async callTool(call: ToolCall, rpcTraceId: string, requestId: JsonRpcId): Promise<unknown> {
    const tool = this.registry.lookup(call.toolName);
    if (!tool) {
      throw new AppError('tool_not_found', `Method '${call.toolName}' not found`);
    }

    this.logger.info(
      {
        event: 'mcp_tool_call_requested',
        rpcTraceId,
        rpcRequestId: requestId,
        toolName: tool.name,
        arguments: sanitizeForLog(call.args)
      },
      'mcp_tool_call_requested'
    );

    const binding = this.binder.bind(tool.method.parameters, tool.schema, call.args, tool.name);
    if (!binding.ok) {
      throw bindingError(binding.failure);
    }

    return this.invoker.invoke(tool, binding.args);
  }
}
