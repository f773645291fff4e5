// This test suite verifies server wiring: registry population, catalog files, and settings-driven behaviour.

import { fileURLToPath } from 'node:url';
import { afterEach, describe, expect, it } from 'vitest';
import { loadSettings } from '../src/config/settings.js';
import { createServer, type ServerResources } from '../src/server.js';

const fixturePath = fileURLToPath(new URL('./fixtures/catalog.json', import.meta.url));
let resources: ServerResources | null = null;

afterEach(async () => {
  if (resources) {
    await resources.app.close();
    resources = null;
  }
});

describe('server', () => {
  it('registers the sample handlers and answers health checks', async () => {
    resources = await createServer(loadSettings({ LOG_LEVEL: 'silent' }));

    const health = await resources.app.inject({ method: 'GET', url: '/health' });

    expect(health.json()).toMatchObject({ ok: true, status: 'alive' });
    expect(resources.registry.lookup('GetUserOrders')).toBeDefined();
    expect(resources.registry.size).toBe(9);
  });

  it('imports the configured catalog file and hides excluded handlers', async () => {
    resources = await createServer(
      loadSettings({
        LOG_LEVEL: 'silent',
        MCP_CATALOG_PATH: fixturePath,
        MCP_EXCLUDED_HANDLERS: 'SampleToolService'
      })
    );

    expect(resources.registry.list().map((tool) => tool.name)).toEqual(['orders_search']);
  });

  it('serves content blocks on the configured endpoint', async () => {
    resources = await createServer(
      loadSettings({ LOG_LEVEL: 'silent', MCP_ENDPOINT: '/rpc', MCP_OUTPUT_FORMAT: 'content' })
    );

    const response = await resources.app.inject({
      method: 'POST',
      url: '/rpc',
      headers: { 'content-type': 'application/json' },
      payload: JSON.stringify({
        jsonrpc: '2.0',
        id: 1,
        method: 'tools/call',
        params: { name: 'SampleToolService_greet', arguments: { name: 'Ada' } }
      })
    });

    expect(response.json()).toEqual({
      jsonrpc: '2.0',
      id: 1,
      result: { content: [{ type: 'text', text: 'Hello, Ada!' }] }
    });
  });
});
