/**
 * Extraction API Tests
 *
 * Runs the Express app on an ephemeral local port with in-process stand-ins
 * for document conversion and embeddings.
 */

import type { Server } from 'http';
import {
  DocumentConversionError,
  DocumentParser,
  ParameterExtractionOrchestrator,
  ParseCache,
  type DocumentConverter,
  type ParsedDocument,
} from '@risklens/shared';
import { createApp } from '../../services/extraction-api/src/app';
import { ExtractionPipeline } from '../../services/extraction-api/src/lib/pipeline';
import { KeywordEmbeddingProvider, loadParsedDocument, makeTempDir } from './helpers';

const PARAMETERS = [
  { id: 'bureau_credit_score', name: 'CIBIL Score', description: 'Credit bureau score' },
  { id: 'bureau_overdue_threshold', name: 'Overdue Threshold', description: 'Maximum allowable overdue amount' },
];

/** Returns the GST fixture for files named like a GST return, the bureau fixture otherwise */
class FilenameConverter implements DocumentConverter {
  constructor(private readonly failWith?: Error) {}

  async convert(_bytes: Uint8Array, sourceName: string): Promise<ParsedDocument> {
    if (this.failWith) throw this.failWith;
    return loadParsedDocument(sourceName.includes('gst') ? 'gstr3b_return' : 'crif_report');
  }
}

function buildPipeline(converter: DocumentConverter): ExtractionPipeline {
  return new ExtractionPipeline({
    parser: new DocumentParser(converter, null),
    orchestrator: new ParameterExtractionOrchestrator({
      embeddings: new KeywordEmbeddingProvider(),
      retrieval: { topK: 3, threshold: 0.5 },
    }),
  });
}

async function start(app: ReturnType<typeof createApp>): Promise<{ server: Server; baseUrl: string }> {
  return new Promise((resolve) => {
    const server = app.listen(0, () => {
      const address = server.address();
      const port = typeof address === 'object' && address !== null ? address.port : 0;
      resolve({ server, baseUrl: `http://127.0.0.1:${port}` });
    });
  });
}

async function stop(server: Server): Promise<void> {
  return new Promise((resolve) => server.close(() => resolve()));
}

function postJson(url: string, body: unknown, headers: Record<string, string> = {}): Promise<Response> {
  return fetch(url, {
    method: 'POST',
    headers: { 'Content-Type': 'application/json', ...headers },
    body: JSON.stringify(body),
  });
}

function upload(filename: string): { filename: string; content_base64: string } {
  return { filename, content_base64: Buffer.from(`%PDF ${filename}`).toString('base64') };
}

describe('Extraction API', () => {
  let server: Server;
  let baseUrl: string;

  beforeAll(async () => {
    ({ server, baseUrl } = await start(createApp({ pipeline: buildPipeline(new FilenameConverter()), cache: null })));
  });

  afterAll(async () => {
    await stop(server);
  });

  it('should report health', async () => {
    const response = await fetch(`${baseUrl}/health`);
    const body = JSON.parse(await response.text());

    expect(response.status).toBe(200);
    expect(body.status).toBe('healthy');
    expect(body.parse_cache).toBe('disabled');
  });

  it('should extract from converted documents', async () => {
    const response = await postJson(
      `${baseUrl}/extract/parsed`,
      {
        bureau_document: loadParsedDocument('crif_report'),
        gst_document: loadParsedDocument('gstr3b_return'),
        parameters: PARAMETERS,
      },
      { 'X-Correlation-Id': 'test-correlation-id' }
    );
    const body = JSON.parse(await response.text());

    expect(response.status).toBe(200);
    expect(response.headers.get('x-correlation-id')).toBe('test-correlation-id');
    expect(Object.keys(body.bureau_parameters)).toEqual(['bureau_credit_score', 'bureau_overdue_threshold']);
    expect(body.bureau_parameters.bureau_credit_score.value).toBe(742);
    expect(body.bureau_parameters.bureau_overdue_threshold.status).toBe('not_applicable');
    expect(body.gst_sales).toEqual([
      {
        month: 'April 2024',
        sales: 951381,
        source: 'GSTR-3B Table 3.1 (Page 2)',
        confidence: 1,
        status: 'extracted',
      },
    ]);
    expect(body.overall_confidence_score).toBe(0.975);
  });

  it('should extract from uploaded documents', async () => {
    const response = await postJson(`${baseUrl}/extract`, {
      bureau_document: upload('bureau.pdf'),
      gst_document: upload('gst_april.pdf'),
      parameters: JSON.stringify(PARAMETERS),
    });
    const body = JSON.parse(await response.text());

    expect(response.status).toBe(200);
    expect(body.bureau_parameters.bureau_credit_score.value).toBe(742);
    expect(body.gst_sales[0].sales).toBe(951381);
  });

  it('should generate a correlation id when none is sent', async () => {
    const response = await fetch(`${baseUrl}/health`);
    expect(response.headers.get('x-correlation-id')).toMatch(/^[0-9A-HJKMNP-TV-Z]{26}$/);
  });

  it('should reject a malformed body with an error envelope', async () => {
    const response = await postJson(
      `${baseUrl}/extract/parsed`,
      { parameters: PARAMETERS },
      { 'X-Correlation-Id': 'test-bad-request' }
    );
    const body = JSON.parse(await response.text());

    expect(response.status).toBe(400);
    expect(body.error.code).toBe('invalid_input');
    expect(body.error.correlation_id).toBe('test-bad-request');
    expect(body.error.details).toContain("/: must have required property 'bureau_document'");
  });

  it('should reject invalid JSON', async () => {
    const response = await fetch(`${baseUrl}/extract`, {
      method: 'POST',
      headers: { 'Content-Type': 'application/json' },
      body: '{"bureau_document":',
    });
    const body = JSON.parse(await response.text());

    expect(response.status).toBe(400);
    expect(body.error.code).toBe('invalid_input');
  });

  it('should answer 404 for cache routes when the cache is disabled', async () => {
    const response = await fetch(`${baseUrl}/cache/stats`);
    const body = JSON.parse(await response.text());

    expect(response.status).toBe(404);
    expect(body.error.code).toBe('cache_disabled');
  });

  it('should expose metrics', async () => {
    const response = await fetch(`${baseUrl}/metrics`);
    expect(response.status).toBe(200);
    expect(await response.text()).toContain('risklens_parameter_extractions_total');
  });
});

describe('Extraction API failures and cache routes', () => {
  it('should map a conversion failure to 502', async () => {
    const { server, baseUrl } = await start(
      createApp({
        pipeline: buildPipeline(new FilenameConverter(new DocumentConversionError('converter down'))),
        cache: null,
      })
    );

    try {
      const response = await postJson(`${baseUrl}/extract`, {
        bureau_document: upload('bureau.pdf'),
        gst_document: upload('gst.pdf'),
        parameters: PARAMETERS,
      });
      const body = JSON.parse(await response.text());

      expect(response.status).toBe(502);
      expect(body.error.code).toBe('document_conversion_failed');
      expect(body.error.message).toBe('Document conversion failed: converter down');
    } finally {
      await stop(server);
    }
  });

  it('should report and clear the parse cache', async () => {
    const cache = new ParseCache(makeTempDir('risklens-api-cache-'));
    await cache.set(Buffer.from('%PDF cached'), loadParsedDocument('gstr3b_return'));
    const { server, baseUrl } = await start(createApp({ pipeline: buildPipeline(new FilenameConverter()), cache }));

    try {
      const stats = JSON.parse(await (await fetch(`${baseUrl}/cache/stats`)).text());
      expect(stats.total_files).toBe(1);
      expect(stats.cache_dir).toBe(cache.cacheDir);

      const cleared = await fetch(`${baseUrl}/cache`, { method: 'DELETE' });
      expect(JSON.parse(await cleared.text())).toEqual({ deleted: 1 });
    } finally {
      await stop(server);
    }
  });
});
