/**
 * Extraction Pipeline
 *
 * One sequential run per request: convert (or reuse) both documents, extract the
 * bureau parameters, extract GSTR-3B sales, and assemble the response.
 */

import {
  config,
  logger,
  withDocumentContext,
  extractionDurationHistogram,
  extractSalesRecords,
  formatExtractionResponse,
  validateExtractionResponse,
  DocumentParser,
  HttpDocumentConverter,
  KnowledgeRetriever,
  NoopKnowledgeRetriever,
  NoopTextGenerator,
  OpenAiEmbeddingProvider,
  OpenAiTextGenerator,
  ParameterExtractionOrchestrator,
  ParseCache,
  type DomainKnowledgeRetriever,
  type ExtractionResponse,
  type ParameterRequest,
  type ParsedDocument,
} from '@risklens/shared';
import type { DecodedDocument } from './request';

export interface PipelineDependencies {
  parser: DocumentParser;
  orchestrator: ParameterExtractionOrchestrator;
}

export class ExtractionPipeline {
  constructor(private readonly deps: PipelineDependencies) {}

  /**
   * Convert uploaded bytes (through the parse cache) and run extraction.
   *
   * @throws DocumentConversionError when either document cannot be converted
   */
  async runUploaded(
    bureau: DecodedDocument,
    gst: DecodedDocument,
    parameters: readonly ParameterRequest[]
  ): Promise<ExtractionResponse> {
    const bureauDoc = await withDocumentContext(bureau.filename, 'parse', () =>
      this.deps.parser.parse(bureau.bytes, bureau.filename)
    );
    const gstDoc = await withDocumentContext(gst.filename, 'parse', () =>
      this.deps.parser.parse(gst.bytes, gst.filename)
    );

    return this.runParsed(bureauDoc, gstDoc, parameters, {
      bureauName: bureau.filename,
      gstName: gst.filename,
    });
  }

  async runParsed(
    bureauDoc: ParsedDocument,
    gstDoc: ParsedDocument,
    parameters: readonly ParameterRequest[],
    names: { bureauName: string; gstName: string } = { bureauName: 'bureau_document', gstName: 'gst_document' }
  ): Promise<ExtractionResponse> {
    const endBureauTimer = extractionDurationHistogram.startTimer({ pipeline: 'bureau' });
    const bureauResults = await withDocumentContext(names.bureauName, 'bureau', () =>
      this.deps.orchestrator.extract(
        bureauDoc,
        parameters.map((p) => p.id)
      )
    );
    endBureauTimer();

    const endSalesTimer = extractionDurationHistogram.startTimer({ pipeline: 'gst_sales' });
    const salesRecords = await withDocumentContext(names.gstName, 'gst_sales', async () => extractSalesRecords(gstDoc));
    endSalesTimer();

    const response = formatExtractionResponse(bureauResults, salesRecords);

    const validation = validateExtractionResponse(response);
    if (!validation.valid) {
      logger.warn('ExtractionResponse failed contract validation', { errors: validation.errors });
    }

    logger.info('Extraction pipeline complete', {
      parameter_count: parameters.length,
      sales_records: salesRecords.length,
      overall_confidence_score: response.overall_confidence_score,
    });

    return response;
  }
}

async function buildKnowledgeRetriever(embeddings: OpenAiEmbeddingProvider): Promise<DomainKnowledgeRetriever> {
  if (!config.enableRag) {
    return new NoopKnowledgeRetriever();
  }

  const retriever = new KnowledgeRetriever(config.knowledgeBasePath, embeddings);
  if (await retriever.initialize()) {
    return retriever;
  }

  logger.warn('RAG enabled but knowledge base unavailable, continuing without it', {
    knowledge_base_path: config.knowledgeBasePath,
  });
  return new NoopKnowledgeRetriever();
}

/**
 * Wire the pipeline from configuration.
 */
export async function createPipelineFromConfig(cache: ParseCache | null): Promise<ExtractionPipeline> {
  const embeddings = new OpenAiEmbeddingProvider();
  const knowledge = await buildKnowledgeRetriever(embeddings);

  const orchestrator = new ParameterExtractionOrchestrator({
    embeddings,
    knowledge,
    generator: config.enableRag ? new OpenAiTextGenerator() : new NoopTextGenerator(),
    retrieval: { topK: config.topKChunks, threshold: config.similarityThreshold },
  });

  return new ExtractionPipeline({
    parser: new DocumentParser(new HttpDocumentConverter(), cache),
    orchestrator,
  });
}
