/**
 * Parse Cache
 *
 * Content-addressed disk store for converted documents. The key is the SHA-256 of
 * the document bytes, never the filename. Entries whose stored hash disagrees
 * with the recomputed one, or that fail the cache-entry schema, are deleted on
 * read and reported as misses.
 */

import { createHash } from 'node:crypto';
import { mkdir, readFile, readdir, rename, rm, stat, writeFile } from 'node:fs/promises';
import * as path from 'node:path';
import { ulid } from 'ulid';
import { normalizeRows } from '../documents/normalize';
import { CacheCorruptionError, errorMessage } from '../errors';
import { logger } from '../logger';
import { cacheLookupsCounter } from '../metrics';
import { validateParseCacheEntry } from '../schemas';
import type { CachedTable, ParseCacheEntry, ParsedDocument, ParsedTable } from '../types';

const ENTRY_SUFFIX = '.json';
const TEMP_SUFFIX = '.tmp';

export interface ParseCacheStats {
  cacheDir: string;
  totalFiles: number;
  totalSizeBytes: number;
  totalSizeMb: number;
}

export function hashDocument(bytes: Uint8Array): string {
  return createHash('sha256').update(bytes).digest('hex');
}

function isMissingFile(error: unknown): boolean {
  return error instanceof Error && 'code' in error && error.code === 'ENOENT';
}

function serializeTable(table: ParsedTable): CachedTable {
  return {
    id: table.id,
    page: table.page,
    columns: [...table.columns],
    content: normalizeRows(table.columns, table.rows),
  };
}

function deserializeTable(table: CachedTable): ParsedTable {
  return {
    id: table.id,
    page: table.page,
    columns: [...table.columns],
    rows: normalizeRows(table.columns, table.content),
  };
}

export class ParseCache {
  readonly cacheDir: string;

  constructor(cacheDir: string) {
    this.cacheDir = path.resolve(cacheDir);
  }

  entryPath(fileHash: string): string {
    return path.join(this.cacheDir, `${fileHash}${ENTRY_SUFFIX}`);
  }

  /**
   * Look up a previously converted document. Never throws: every failure is a miss.
   */
  async get(bytes: Uint8Array, sourceName = 'document.pdf'): Promise<ParsedDocument | null> {
    const fileHash = hashDocument(bytes);
    const entryPath = this.entryPath(fileHash);

    let raw: string;
    try {
      raw = await readFile(entryPath, 'utf-8');
    } catch (error) {
      if (isMissingFile(error)) {
        logger.debug('Parse cache miss', { source_file: sourceName, file_hash: fileHash.slice(0, 8) });
        cacheLookupsCounter.inc({ outcome: 'miss' });
        return null;
      }
      await this.invalidate(new CacheCorruptionError(fileHash, 'unreadable entry', error), entryPath);
      return null;
    }

    let parsed: unknown;
    try {
      parsed = JSON.parse(raw);
    } catch (error) {
      await this.invalidate(new CacheCorruptionError(fileHash, 'malformed JSON', error), entryPath);
      return null;
    }

    const validation = validateParseCacheEntry(parsed);
    if (!validation.valid) {
      await this.invalidate(
        new CacheCorruptionError(fileHash, `schema violation: ${validation.errors.join('; ')}`),
        entryPath
      );
      return null;
    }

    const entry = validation.value;
    if (entry.metadata.file_hash !== fileHash) {
      await this.invalidate(
        new CacheCorruptionError(fileHash, `stored hash ${entry.metadata.file_hash.slice(0, 8)} does not match`),
        entryPath
      );
      return null;
    }

    logger.info('Parse cache hit', { source_file: sourceName, file_hash: fileHash.slice(0, 8) });
    cacheLookupsCounter.inc({ outcome: 'hit' });

    return {
      text: entry.data.text,
      tables: entry.data.tables.map(deserializeTable),
      chunks: entry.data.chunks.map(({ header, text, page }) => ({ header, text, page })),
    };
  }

  /**
   * Store a converted document. Writes a uniquely named temp file and renames it
   * into place; on failure the previous entry, if any, is left untouched.
   */
  async set(bytes: Uint8Array, doc: ParsedDocument, sourceName = 'document.pdf'): Promise<boolean> {
    const fileHash = hashDocument(bytes);
    const entryPath = this.entryPath(fileHash);
    const tempPath = path.join(this.cacheDir, `${fileHash}.${ulid()}${TEMP_SUFFIX}`);

    const entry: ParseCacheEntry = {
      metadata: {
        source_file: sourceName,
        cached_at: new Date().toISOString(),
        file_hash: fileHash,
        file_size_bytes: bytes.byteLength,
      },
      data: {
        text: doc.text,
        chunks: doc.chunks.map(({ header, text, page }) => ({ header, text, page })),
        tables: doc.tables.map(serializeTable),
      },
    };

    try {
      await mkdir(this.cacheDir, { recursive: true });
      await writeFile(tempPath, JSON.stringify(entry, null, 2), 'utf-8');
      await rename(tempPath, entryPath);
    } catch (error) {
      logger.error('Parse cache write failed', error, {
        source_file: sourceName,
        file_hash: fileHash.slice(0, 8),
      });
      await rm(tempPath, { force: true }).catch((cleanupError: unknown) => {
        logger.warn('Parse cache temp file cleanup failed', { temp_path: tempPath, error: errorMessage(cleanupError) });
      });
      return false;
    }

    logger.info('Parse cache entry stored', { source_file: sourceName, file_hash: fileHash.slice(0, 8) });
    return true;
  }

  /**
   * Remove every entry and stray temp file.
   *
   * @returns number of entries removed
   */
  async clear(): Promise<number> {
    const files = await this.listFiles();
    let deleted = 0;

    for (const file of files) {
      const filePath = path.join(this.cacheDir, file);
      if (file.endsWith(ENTRY_SUFFIX)) {
        await rm(filePath, { force: true });
        deleted++;
      } else if (file.endsWith(TEMP_SUFFIX)) {
        await rm(filePath, { force: true });
      }
    }

    logger.info('Parse cache cleared', { deleted });
    return deleted;
  }

  async stats(): Promise<ParseCacheStats> {
    const entries = (await this.listFiles()).filter((file) => file.endsWith(ENTRY_SUFFIX));

    let totalSizeBytes = 0;
    for (const file of entries) {
      totalSizeBytes += (await stat(path.join(this.cacheDir, file))).size;
    }

    return {
      cacheDir: this.cacheDir,
      totalFiles: entries.length,
      totalSizeBytes,
      totalSizeMb: Math.round((totalSizeBytes / (1024 * 1024)) * 100) / 100,
    };
  }

  private async listFiles(): Promise<string[]> {
    try {
      return await readdir(this.cacheDir);
    } catch (error) {
      if (isMissingFile(error)) {
        return [];
      }
      throw error;
    }
  }

  private async invalidate(error: CacheCorruptionError, entryPath: string): Promise<void> {
    logger.error('Invalidating parse cache entry', error, { file_hash: error.fileHash.slice(0, 8) });
    cacheLookupsCounter.inc({ outcome: 'invalidated' });
    try {
      await rm(entryPath, { force: true });
    } catch (rmError) {
      logger.warn('Failed to delete invalid parse cache entry', {
        entry_path: entryPath,
        error: errorMessage(rmError),
      });
    }
  }
}
