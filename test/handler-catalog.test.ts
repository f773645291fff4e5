// This test suite verifies catalog derivation from declared handlers: naming, hiding, and published schemas.

import { describe, expect, it } from 'vitest';
import { defineHandler, HandlerCatalog, toParameterSchema } from '../src/catalog/handler-catalog.js';
import { param, t } from '../src/handlers/signature.js';

enum Priority {
  Low,
  High
}

class Inbox {
  public send(): void {}
  public archive(): void {}
  public purge(): void {}
}

class Audit {
  public record(): void {}
}

const inboxDefinition = defineHandler(Inbox, {
  send: {
    description: 'Sends a message.',
    parameters: [
      param('signal', t.opaque('AbortSignal')),
      param('to', t.string(), { description: 'Recipient address' }),
      param('priority', t.enumeration('Priority', Priority), { default: Priority.Low }),
      param('cc', t.array(t.string()), { optional: true })
    ]
  },
  archive: { toolName: 'archive_message', parameters: [] },
  purge: { toolName: false, parameters: [] }
});

const auditDefinition = defineHandler(Audit, { record: { parameters: [] } });

describe('handler catalog', () => {
  it('names tools after handler and method unless overridden or hidden', () => {
    const catalog = new HandlerCatalog().register(inboxDefinition);

    expect(catalog.listTools().map((entry) => entry.name)).toEqual(['Inbox_send', 'archive_message']);
  });

  it('drops the handler prefix when configured', () => {
    const catalog = new HandlerCatalog({ includeHandlerName: false }).register(inboxDefinition).register(auditDefinition);

    expect(catalog.listTools().map((entry) => entry.name)).toEqual(['send', 'archive_message', 'record']);
  });

  it('hides excluded handlers from the catalog but still locates them', () => {
    const catalog = new HandlerCatalog({ excludedHandlers: ['Audit'] })
      .register(inboxDefinition)
      .register(auditDefinition);

    expect(catalog.listTools().map((entry) => entry.handlerIdentity)).toEqual(['Inbox', 'Inbox']);
    expect(catalog.locate('Audit')).toBe(auditDefinition);
    expect(catalog.locate('Unknown')).toBeUndefined();
  });

  it('publishes parameter schemas without ambient parameters', () => {
    const catalog = new HandlerCatalog({ ambientTypes: ['AbortSignal'] }).register(inboxDefinition);
    const [send] = catalog.listTools();

    expect(send).toEqual({
      name: 'Inbox_send',
      description: 'Sends a message.',
      handlerIdentity: 'Inbox',
      methodName: 'send',
      parameterSchema: [
        { name: 'to', type: 'string', required: true, description: 'Recipient address' },
        {
          name: 'priority',
          type: 'string',
          required: false,
          enum: ['Low', 'High'],
          format: 'enum',
          default: Priority.Low
        },
        { name: 'cc', type: 'array', required: false, items: { name: '', type: 'string', required: false } }
      ]
    });
  });

  it('publishes nested object fields as properties', () => {
    const schema = toParameterSchema(
      param('filter', t.object('Filter', [param('orgId', t.integer()), param('closed', t.boolean(), { default: false })]))
    );

    expect(schema).toEqual({
      name: 'filter',
      type: 'object',
      required: true,
      properties: {
        orgId: { name: 'orgId', type: 'integer', required: true },
        closed: { name: 'closed', type: 'boolean', required: false, default: false }
      }
    });
  });

  it('rejects blank handler names', () => {
    expect(() => defineHandler(Audit, {}, ' ')).toThrow('Handler name cannot be empty.');
  });
});
