// This module wires the dispatch engine, its collaborators and the HTTP routes into one Fastify application.

import Fastify, { type FastifyInstance } from 'fastify';
import { ParameterBinder } from './binding/binder.js';
import { FileCatalogProvider } from './catalog/file-catalog.js';
import { HandlerCatalog } from './catalog/handler-catalog.js';
import type { Settings } from './config/settings.js';
import { ServiceContainer } from './invocation/container.js';
import { ConstructorInjectionStrategy } from './invocation/instantiation.js';
import { DynamicInvoker } from './invocation/invoker.js';
import { McpDispatcher } from './mcp/dispatcher.js';
import { registerMcpRoutes } from './mcp/protocol.js';
import { ToolRegistry } from './mcp/registry.js';
import { CLOCK, sampleToolsDefinition, systemClock } from './samples/sample-tools.js';
import type { HandlerDefinition } from './types/domain.js';
import { buildLoggerOptions } from './utils/logger.js';
import { SERVER_NAME, SERVER_VERSION } from './version.js';

export interface ServerResources {
  app: FastifyInstance;
  registry: ToolRegistry;
  container: ServiceContainer;
}

export interface CreateServerOptions {
  handlers?: HandlerDefinition[];
  container?: ServiceContainer;
}

// This symbol stores high-resolution request start time on Fastify request objects.
const REQUEST_START_TIME = Symbol('request-start-time');

// This helper reads the start time stored by the onRequest hook.
function readStartTime(request: object): bigint | undefined {
  const value: unknown = Reflect.get(request, REQUEST_START_TIME);
  return typeof value === 'bigint' ? value : undefined;
}

// This function builds the application and populates the registry from the handler and file catalogs.
export async function createServer(settings: Settings, options: CreateServerOptions = {}): Promise<ServerResources> {
  const app = Fastify({
    logger: buildLoggerOptions(settings.logLevel),
    bodyLimit: 1024 * 1024
  });

  const container = options.container ?? new ServiceContainer().addValue(CLOCK, systemClock);
  const catalog = new HandlerCatalog({
    includeHandlerName: settings.includeHandlerName,
    excludedHandlers: settings.excludedHandlers,
    ambientTypes: settings.ambientTypes
  });

  for (const definition of options.handlers ?? [sampleToolsDefinition]) {
    catalog.register(definition);
  }

  const registry = new ToolRegistry({ locator: catalog, logger: app.log });
  await registry.importFrom(catalog);

  if (settings.catalogPath) {
    await registry.importFrom(new FileCatalogProvider({ path: settings.catalogPath, logger: app.log }));
  }

  const dispatcher = new McpDispatcher({
    registry,
    binder: new ParameterBinder({ logger: app.log, ambientTypes: settings.ambientTypes }),
    invoker: new DynamicInvoker({
      logger: app.log,
      resolver: container,
      instantiation: [new ConstructorInjectionStrategy()],
      outputFormat: settings.outputFormat
    }),
    logger: app.log
  });

  // This hook enriches request logs with consistent route and request-id metadata.
  app.addHook('onRequest', async (request) => {
    Reflect.set(request, REQUEST_START_TIME, process.hrtime.bigint());

    request.log.info(
      {
        event: 'http_request_start',
        requestId: request.id,
        method: request.method,
        path: request.url,
        ip: request.ip,
        userAgent: request.headers['user-agent'] ?? null,
        contentLength: request.headers['content-length'] ?? null
      },
      'http_request_start'
    );
  });

  // This hook logs response completion including status and duration for request tracing.
  app.addHook('onResponse', async (request, reply) => {
    const startTime = readStartTime(request);
    const durationMs = startTime ? Number(process.hrtime.bigint() - startTime) / 1_000_000 : undefined;

    request.log.info(
      {
        event: 'http_request_complete',
        requestId: request.id,
        statusCode: reply.statusCode,
        method: request.method,
        path: request.url,
        durationMs
      },
      'http_request_complete'
    );
  });

  // This endpoint exposes a lightweight liveness signal.
  app.get('/health', async () => {
    app.log.debug({ event: 'health_check' }, 'health_check');

    return {
      ok: true,
      status: 'alive',
      ts: new Date().toISOString()
    };
  });

  app.get('/version', async () => {
    return {
      ok: true,
      name: SERVER_NAME,
      version: SERVER_VERSION,
      toolCount: registry.size
    };
  });

  registerMcpRoutes(app, { dispatcher, registry, endpoint: settings.endpoint });

  return { app, registry, container };
}
