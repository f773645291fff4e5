// This module reads an externally maintained tool catalog from a JSON file.

import { existsSync, readFileSync } from 'node:fs';
import type { CatalogEntry, CatalogProvider } from '../types/domain.js';
import { AppError } from '../utils/errors.js';
import { parseJson } from '../utils/json.js';
import type { AppLogger } from '../utils/logger.js';
import { catalogEntrySchema, catalogFileSchema } from './entry-schema.js';

export interface FileCatalogProviderOptions {
  path: string;
  logger: AppLogger;
}

// This class validates the file as a whole, then each entry on its own so one bad row does not hide the rest.
export class FileCatalogProvider implements CatalogProvider {
  private readonly path: string;
  private readonly logger: AppLogger;

  public constructor(options: FileCatalogProviderOptions) {
    this.path = options.path;
    this.logger = options.logger;
  }

  public listTools(): CatalogEntry[] {
    if (!existsSync(this.path)) {
      throw new AppError('catalog_unavailable', `Tool catalog file '${this.path}' does not exist.`);
    }

    const document = catalogFileSchema.safeParse(parseJson(readFileSync(this.path, 'utf8'), 'tool catalog'));
    if (!document.success) {
      throw new AppError('invalid_catalog', 'Tool catalog file must contain a tools array.', document.error.flatten());
    }

    const entries: CatalogEntry[] = [];
    for (const [index, raw] of document.data.tools.entries()) {
      const parsed = catalogEntrySchema.safeParse(raw);
      if (!parsed.success) {
        this.logger.warn(
          {
            event: 'tool_catalog_entry_invalid',
            path: this.path,
            index,
            issues: parsed.error.flatten()
          },
          'tool_catalog_entry_invalid'
        );
        continue;
      }

      entries.push(parsed.data);
    }

    this.logger.info(
      {
        event: 'tool_catalog_loaded',
        path: this.path,
        entries: entries.length
      },
      'tool_catalog_loaded'
    );

    return entries;
  }
}
