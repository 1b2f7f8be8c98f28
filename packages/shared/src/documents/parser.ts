/**
 * Document Parsing Service
 *
 * Cache lookup, then conversion on a miss, then a best-effort cache store.
 */

import type { ParseCache } from '../cache/parse-cache';
import { logger } from '../logger';
import type { ParsedDocument } from '../types';
import type { DocumentConverter } from './converter';

export class DocumentParser {
  constructor(
    private readonly converter: DocumentConverter,
    private readonly cache: ParseCache | null
  ) {}

  /**
   * @throws DocumentConversionError when the document cannot be converted
   */
  async parse(bytes: Uint8Array, sourceName: string): Promise<ParsedDocument> {
    if (this.cache) {
      const cached = await this.cache.get(bytes, sourceName);
      if (cached) {
        return cached;
      }
    }

    const doc = await this.converter.convert(bytes, sourceName);

    if (this.cache) {
      const stored = await this.cache.set(bytes, doc, sourceName);
      if (!stored) {
        logger.warn('Converted document was not cached', { source_file: sourceName });
      }
    }

    return doc;
  }
}
