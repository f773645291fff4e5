// This file defines minimal JSON-RPC and MCP protocol payload types used by the dispatcher and transport.

export type JsonRpcId = string | number | null;

export interface JsonRpcRequest {
  jsonrpc?: '2.0';
  id?: JsonRpcId;
  method: string;
  params?: unknown;
}

export interface JsonRpcError {
  code: number;
  message: string;
  data?: unknown;
}

export type JsonRpcResponse =
  | { jsonrpc: '2.0'; id: JsonRpcId; result: unknown }
  | { jsonrpc: '2.0'; id: JsonRpcId; error: JsonRpcError };

export interface McpTool {
  name: string;
  description: string;
  inputSchema: Record<string, unknown>;
}

export interface McpTextContent {
  type: 'text';
  text: string;
}

// This type captures the content-block output format returned when the transport profile asks for it.
export interface McpContentResult {
  content: McpTextContent[];
  structuredContent?: Record<string, unknown>;
}

export const RPC_ERROR_CODES = {
  PARSE_ERROR: -32700,
  METHOD_NOT_FOUND: -32601,
  INVALID_PARAMS: -32602,
  INTERNAL_ERROR: -32603,
  SERVER_ERROR: -32000
} as const;
