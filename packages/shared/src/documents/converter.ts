/**
 * Document Conversion Client
 *
 * OCR and table-structure recognition run in a separate conversion service.
 * This module posts raw document bytes to it and validates the structured reply.
 */

import { config } from '../config';
import { DocumentConversionError, errorMessage } from '../errors';
import { logger } from '../logger';
import { documentConversionsCounter } from '../metrics';
import { validateParsedDocument } from '../schemas';
import type { ParsedDocument } from '../types';

export interface DocumentConverter {
  convert(bytes: Uint8Array, sourceName: string): Promise<ParsedDocument>;
}

export interface HttpDocumentConverterOptions {
  baseUrl?: string;
  timeoutMs?: number;
}

export class HttpDocumentConverter implements DocumentConverter {
  private readonly baseUrl: string;
  private readonly timeoutMs: number;

  constructor(options: HttpDocumentConverterOptions = {}) {
    this.baseUrl = (options.baseUrl || config.documentConverterUrl).replace(/\/+$/, '');
    this.timeoutMs = options.timeoutMs || config.documentConverterTimeoutMs;
  }

  async convert(bytes: Uint8Array, sourceName: string): Promise<ParsedDocument> {
    const startTime = Date.now();
    const url = `${this.baseUrl}/convert?filename=${encodeURIComponent(sourceName)}`;

    let body: unknown;
    try {
      const response = await fetch(url, {
        method: 'POST',
        headers: { 'Content-Type': 'application/octet-stream' },
        body: bytes,
        signal: AbortSignal.timeout(this.timeoutMs),
      });

      if (!response.ok) {
        const text = await response.text();
        throw new Error(`converter responded ${response.status}: ${text.slice(0, 200)}`);
      }

      body = await response.json();
    } catch (error) {
      documentConversionsCounter.inc({ status: 'error' });
      logger.error('Document conversion request failed', error, {
        source_file: sourceName,
        duration_ms: Date.now() - startTime,
      });
      throw new DocumentConversionError(errorMessage(error), error);
    }

    const validation = validateParsedDocument(body);
    if (!validation.valid) {
      documentConversionsCounter.inc({ status: 'invalid' });
      throw new DocumentConversionError(`malformed converter reply: ${validation.errors.join('; ')}`);
    }

    documentConversionsCounter.inc({ status: 'success' });
    logger.info('Document converted', {
      source_file: sourceName,
      table_count: validation.value.tables.length,
      section_count: validation.value.chunks.length,
      duration_ms: Date.now() - startTime,
    });

    return validation.value;
  }
}
