// This test suite verifies loading a tool catalog from JSON and importing it into the registry.

import { mkdtempSync, rmSync, writeFileSync } from 'node:fs';
import { tmpdir } from 'node:os';
import { join } from 'node:path';
import { fileURLToPath } from 'node:url';
import pino from 'pino';
import { afterEach, describe, expect, it } from 'vitest';
import { ParameterBinder } from '../src/binding/binder.js';
import { FileCatalogProvider } from '../src/catalog/file-catalog.js';
import { HandlerCatalog } from '../src/catalog/handler-catalog.js';
import { ToolRegistry } from '../src/mcp/registry.js';
import { sampleToolsDefinition } from '../src/samples/sample-tools.js';

const fixturePath = fileURLToPath(new URL('./fixtures/catalog.json', import.meta.url));
const logger = pino({ level: 'silent' });
const tempDirs: string[] = [];

function writeCatalog(content: string): string {
  const dir = mkdtempSync(join(tmpdir(), 'toolgate-catalog-'));
  tempDirs.push(dir);
  const path = join(dir, 'catalog.json');
  writeFileSync(path, content, 'utf8');
  return path;
}

afterEach(() => {
  for (const dir of tempDirs.splice(0)) {
    rmSync(dir, { recursive: true, force: true });
  }
});

describe('file catalog provider', () => {
  it('keeps valid entries and skips invalid ones', () => {
    const entries = new FileCatalogProvider({ path: fixturePath, logger }).listTools();

    expect(entries.map((entry) => entry.name)).toEqual(['orders_search', 'legacy_ping']);
    expect(entries[0]?.parameterSchema[0]).toEqual({
      name: 'orgId',
      type: 'integer',
      required: true,
      annotations: { source: 'route' }
    });
    expect(entries[1]?.parameterSchema).toEqual([]);
  });

  it('feeds the registry, which skips entries whose handler is unknown', async () => {
    const catalog = new HandlerCatalog().register(sampleToolsDefinition);
    const registry = new ToolRegistry({ locator: catalog, logger });

    const summary = await registry.importFrom(new FileCatalogProvider({ path: fixturePath, logger }));

    expect(summary).toEqual({ imported: 1, skipped: 1 });
    const tool = registry.lookup('orders_search');
    expect(tool?.method.name).toBe('getUserOrders');

    const binding = new ParameterBinder({ logger }).bind(
      tool?.method.parameters ?? [],
      tool?.schema ?? new Map(),
      { orgId: 1, userId: 2 },
      'orders_search'
    );
    expect(binding).toEqual({ ok: true, args: [1, 2, 25, 'Date'] });
  });

  it('fails for a missing file', () => {
    const provider = new FileCatalogProvider({ path: join(tmpdir(), 'toolgate-missing', 'catalog.json'), logger });

    expect(() => provider.listTools()).toThrow(/does not exist/);
  });

  it('fails for malformed JSON and for documents without a tools array', () => {
    const malformed = new FileCatalogProvider({ path: writeCatalog('{"tools": ['), logger });
    const wrongShape = new FileCatalogProvider({ path: writeCatalog('{"entries": []}'), logger });

    expect(() => malformed.listTools()).toThrow('Failed to parse JSON for tool catalog.');
    expect(() => wrongShape.listTools()).toThrow('Tool catalog file must contain a tools array.');
  });
});
