/**
 * Test Helpers
 *
 * Fixture loading and in-process stand-ins for the embedding, LLM and
 * knowledge capabilities.
 */

import * as fs from 'fs';
import * as os from 'os';
import * as path from 'path';
import {
  UpstreamUnavailableError,
  validateParsedDocument,
  type DocumentConverter,
  type DomainKnowledgeRetriever,
  type EmbeddingProvider,
  type ParsedDocument,
  type TextGenerator,
} from '@risklens/shared';

const FIXTURES_DIR = path.join(__dirname, '../fixtures');

/**
 * Load a converted document fixture, checked against the parsed-document contract
 */
export function loadParsedDocument(name: 'crif_report' | 'gstr3b_return'): ParsedDocument {
  const raw = fs.readFileSync(path.join(FIXTURES_DIR, `${name}.parsed.json`), 'utf-8');
  const validation = validateParsedDocument(JSON.parse(raw));
  if (!validation.valid) {
    throw new Error(`Fixture ${name} is not a valid parsed document: ${validation.errors.join('; ')}`);
  }
  return validation.value;
}

/**
 * Topic dimensions of the keyword embedding: one axis per topic, set to 1 when any
 * of its keywords occurs in the text.
 */
export const TOPIC_KEYWORDS: readonly (readonly string[])[] = [
  ['score'],
  ['accounts'],
  ['inquir', 'enquir'],
  ['remarks', 'suit', 'default', 'settlement'],
  ['past due', 'jan:'],
];

export function topicVector(text: string): number[] {
  const lower = text.toLowerCase();
  return TOPIC_KEYWORDS.map((keywords) => (keywords.some((k) => lower.includes(k)) ? 1 : 0));
}

/**
 * Deterministic embedding provider over TOPIC_KEYWORDS. Records every batch it receives.
 */
export class KeywordEmbeddingProvider implements EmbeddingProvider {
  readonly model = 'test-keyword-embedding';
  readonly batches: string[][] = [];

  async embed(texts: string[]): Promise<number[][]> {
    this.batches.push([...texts]);
    return texts.map(topicVector);
  }
}

export class FailingEmbeddingProvider implements EmbeddingProvider {
  readonly model = 'test-failing-embedding';

  async embed(): Promise<number[][]> {
    throw new UpstreamUnavailableError('embedding', 'test outage');
  }
}

/**
 * Text generator returning a fixed answer, or throwing a fixed error.
 */
export class ScriptedTextGenerator implements TextGenerator {
  readonly prompts: string[] = [];

  constructor(private readonly answer: string | Error) {}

  async generate(prompt: string): Promise<string> {
    this.prompts.push(prompt);
    if (this.answer instanceof Error) {
      throw this.answer;
    }
    return this.answer;
  }
}

export class StaticKnowledgeRetriever implements DomainKnowledgeRetriever {
  constructor(private readonly context: string) {}

  async getContextForParameter(): Promise<string> {
    return this.context;
  }
}

/**
 * Converter returning a fixed document and counting calls
 */
export class FixedDocumentConverter implements DocumentConverter {
  calls = 0;

  constructor(private readonly doc: ParsedDocument) {}

  async convert(): Promise<ParsedDocument> {
    this.calls++;
    return this.doc;
  }
}

export function makeTempDir(prefix: string): string {
  return fs.mkdtempSync(path.join(os.tmpdir(), prefix));
}
