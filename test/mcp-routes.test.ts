// This test suite verifies the HTTP transport in front of the dispatcher using in-process injection.

import Fastify, { type FastifyInstance } from 'fastify';
import pino from 'pino';
import { afterEach, describe, expect, it } from 'vitest';
import { ParameterBinder } from '../src/binding/binder.js';
import { HandlerCatalog } from '../src/catalog/handler-catalog.js';
import { ServiceContainer } from '../src/invocation/container.js';
import { DynamicInvoker } from '../src/invocation/invoker.js';
import { McpDispatcher } from '../src/mcp/dispatcher.js';
import { answerHandshake, registerMcpRoutes } from '../src/mcp/protocol.js';
import { ToolRegistry } from '../src/mcp/registry.js';
import { CLOCK, sampleToolsDefinition, systemClock } from '../src/samples/sample-tools.js';

let app: FastifyInstance | null = null;

async function buildApp(): Promise<{ app: FastifyInstance; registry: ToolRegistry }> {
  const logger = pino({ level: 'silent' });
  const catalog = new HandlerCatalog().register(sampleToolsDefinition);
  const registry = new ToolRegistry({ locator: catalog, logger });
  await registry.importFrom(catalog);

  const dispatcher = new McpDispatcher({
    registry,
    binder: new ParameterBinder({ logger }),
    invoker: new DynamicInvoker({ logger, resolver: new ServiceContainer().addValue(CLOCK, systemClock) }),
    logger
  });

  const instance = Fastify({ logger: false });
  registerMcpRoutes(instance, { dispatcher, registry, endpoint: '/rpc' });
  app = instance;
  return { app: instance, registry };
}

afterEach(async () => {
  if (app) {
    await app.close();
    app = null;
  }
});

describe('mcp routes', () => {
  it('dispatches tools/call bodies', async () => {
    const { app } = await buildApp();

    const response = await app.inject({
      method: 'POST',
      url: '/rpc',
      headers: { 'content-type': 'application/json' },
      payload: JSON.stringify({
        jsonrpc: '2.0',
        id: 10,
        method: 'tools/call',
        params: { name: 'SampleToolService_add', arguments: { a: 20, b: 22 } }
      })
    });

    expect(response.statusCode).toBe(200);
    expect(response.json()).toEqual({ jsonrpc: '2.0', id: 10, result: 42 });
  });

  it('answers malformed bodies with -32700 and a null id', async () => {
    const { app } = await buildApp();

    const response = await app.inject({
      method: 'POST',
      url: '/rpc',
      headers: { 'content-type': 'application/json' },
      payload: '{"jsonrpc": "2.0", "id": 1,'
    });

    expect(response.statusCode).toBe(200);
    expect(response.json()).toMatchObject({ jsonrpc: '2.0', id: null, error: { code: -32700 } });
  });

  it('answers the initialize handshake without touching the tool surface', async () => {
    const { app } = await buildApp();

    const response = await app.inject({
      method: 'POST',
      url: '/rpc',
      headers: { 'content-type': 'application/json' },
      payload: JSON.stringify({ jsonrpc: '2.0', id: 1, method: 'initialize', params: {} })
    });

    expect(response.json()).toEqual({
      jsonrpc: '2.0',
      id: 1,
      result: {
        protocolVersion: '2025-03-26',
        capabilities: { tools: { listChanged: false } },
        serverInfo: { name: 'toolgate', version: '0.3.0' }
      }
    });
  });

  it('accepts the initialized notification with 202', async () => {
    const { app } = await buildApp();

    const response = await app.inject({
      method: 'POST',
      url: '/rpc',
      headers: { 'content-type': 'application/json' },
      payload: JSON.stringify({ jsonrpc: '2.0', method: 'notifications/initialized' })
    });

    expect(response.statusCode).toBe(202);
  });

  it('publishes a discovery document on GET', async () => {
    const { app, registry } = await buildApp();

    const response = await app.inject({ method: 'GET', url: '/rpc' });

    expect(response.json()).toEqual({
      name: 'toolgate',
      version: '0.3.0',
      transport: 'streamable-http',
      endpoint: '/rpc',
      methods: ['initialize', 'tools/list', 'tools/call', 'ping'],
      toolCount: registry.size
    });
  });
});

describe('handshake detection', () => {
  it('ignores tool methods and answers ping', () => {
    expect(answerHandshake(JSON.stringify({ jsonrpc: '2.0', id: 1, method: 'tools/list' }))).toBeNull();
    expect(answerHandshake('not json')).toBeNull();
    expect(answerHandshake(JSON.stringify({ jsonrpc: '2.0', id: 'p', method: 'ping' }))).toEqual({
      jsonrpc: '2.0',
      id: 'p',
      result: { pong: true }
    });
  });
});
