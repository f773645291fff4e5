// This module implements the streamable HTTP JSON-RPC endpoint in front of the tool dispatcher.

import type { FastifyInstance, FastifyReply, FastifyRequest } from 'fastify';
import type { JsonRpcId, JsonRpcResponse } from '../types/mcp.js';
import { isPlainObject, tryParseJson } from '../utils/json.js';
import { MCP_PROTOCOL_VERSION, SERVER_NAME, SERVER_VERSION } from '../version.js';
import type { McpDispatcher } from './dispatcher.js';
import { rpcResult } from './dispatcher.js';
import type { ToolRegistry } from './registry.js';

export interface McpRouteDeps {
  dispatcher: McpDispatcher;
  registry: ToolRegistry;
  endpoint?: string;
}

const HANDSHAKE_METHODS = ['initialize', 'notifications/initialized', 'ping'];

// This helper answers the session handshake, which never reaches the tool surface; null means "not a handshake".
export function answerHandshake(raw: string): JsonRpcResponse | null | 'accepted' {
  const parsed = tryParseJson(raw);
  if (!isPlainObject(parsed) || typeof parsed.method !== 'string' || !HANDSHAKE_METHODS.includes(parsed.method)) {
    return null;
  }

  const id: JsonRpcId = typeof parsed.id === 'string' || typeof parsed.id === 'number' ? parsed.id : null;

  switch (parsed.method) {
    case 'initialize':
      return rpcResult(id, {
        protocolVersion: MCP_PROTOCOL_VERSION,
        capabilities: {
          tools: {
            listChanged: false
          }
        },
        serverInfo: {
          name: SERVER_NAME,
          version: SERVER_VERSION
        }
      });
    case 'notifications/initialized':
      return parsed.id === undefined ? 'accepted' : rpcResult(id, {});
    default:
      return rpcResult(id, { pong: true });
  }
}

// This function registers the MCP routes; POST bodies arrive as raw text so malformed JSON reaches the dispatcher.
export function registerMcpRoutes(fastify: FastifyInstance, deps: McpRouteDeps): void {
  const endpoint = deps.endpoint ?? '/mcp';

  fastify.removeContentTypeParser('application/json');
  fastify.addContentTypeParser('application/json', { parseAs: 'string' }, (_request, body, done) => {
    done(null, body);
  });

  fastify.get(endpoint, async (request, reply) => {
    request.log.info(
      {
        event: 'mcp_transport_discovery',
        toolCount: deps.registry.size
      },
      'mcp_transport_discovery'
    );

    reply.send({
      name: SERVER_NAME,
      version: SERVER_VERSION,
      transport: 'streamable-http',
      endpoint,
      methods: ['initialize', 'tools/list', 'tools/call', 'ping'],
      toolCount: deps.registry.size
    });
  });

  fastify.post(endpoint, async (request: FastifyRequest, reply: FastifyReply) => {
    const requestLogger = request.log.child({ component: 'mcp' });
    const raw = typeof request.body === 'string' ? request.body : '';

    if (raw.trim().length === 0) {
      requestLogger.warn({ event: 'mcp_post_missing_payload' }, 'mcp_post_missing_payload');
    }

    const handshake = answerHandshake(raw);
    if (handshake === 'accepted') {
      reply.code(202).send();
      return;
    }

    if (handshake) {
      requestLogger.info({ event: 'mcp_handshake_answered' }, 'mcp_handshake_answered');
      reply.send(handshake);
      return;
    }

    reply.send(await deps.dispatcher.handle(raw));
  });
}
