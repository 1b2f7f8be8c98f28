/**
 * JSON Schema Validation
 *
 * Schema validation using Ajv for converter replies, parse-cache entries,
 * request parameter lists and extraction responses.
 */

import fs from 'fs';
import path from 'path';
import Ajv2020, { type SchemaObject, type ValidateFunction } from 'ajv/dist/2020';
import addFormats from 'ajv-formats';
import { normalizeParsedDocument } from './documents/normalize';
import { logger } from './logger';
import type {
  ExtractParsedRequestBody,
  ExtractRequestBody,
  ExtractionResponse,
  ParameterRequest,
  ParseCacheEntry,
  ParsedDocument,
  WireParsedDocument,
} from './types';

// Initialize Ajv with 2020-12 draft support
const ajv = new Ajv2020({
  strict: false, // Allow additional keywords from JSON Schema draft
  allErrors: true,
  verbose: true,
});
addFormats(ajv);

/** Base of every contract's $id; contracts reference each other relative to it */
const CONTRACTS_BASE_ID = 'https://risklens.local/contracts/';

const CONTRACT_FILES = [
  'text_section.schema.json',
  'parsed_document.schema.json',
  'parse_cache_entry.schema.json',
  'parameter_list.schema.json',
  'extraction_response.schema.json',
  'extract_request.schema.json',
  'extract_parsed_request.schema.json',
] as const;

export type ContractName = (typeof CONTRACT_FILES)[number];

function loadSchema(schemaName: string): SchemaObject {
  // Try multiple paths for schema resolution
  const possiblePaths = [
    // Relative to shared package in development
    path.join(__dirname, '../../../docs/contracts', schemaName),
    // Relative to shared package dist
    path.join(__dirname, '../../../../docs/contracts', schemaName),
    // Relative to project root (for Docker containers)
    path.join(process.cwd(), 'docs/contracts', schemaName),
  ];

  for (const schemaPath of possiblePaths) {
    if (fs.existsSync(schemaPath)) {
      return JSON.parse(fs.readFileSync(schemaPath, 'utf-8'));
    }
  }

  throw new Error(`Schema file not found: ${schemaName}`);
}

let contractsLoaded = false;

function ensureContracts(): void {
  if (contractsLoaded) return;
  for (const schemaName of CONTRACT_FILES) {
    ajv.addSchema(loadSchema(schemaName));
  }
  contractsLoaded = true;
}

/**
 * Compile a contract on first use and reuse the compiled validator afterwards.
 */
function lazyValidator<T>(schemaName: ContractName): () => ValidateFunction<T> {
  let compiled: ValidateFunction<T> | null = null;
  return () => {
    if (!compiled) {
      ensureContracts();
      compiled = ajv.compile<T>({ $ref: `${CONTRACTS_BASE_ID}${schemaName}` });
    }
    return compiled;
  };
}

const parsedDocumentValidator = lazyValidator<WireParsedDocument>('parsed_document.schema.json');
const parseCacheEntryValidator = lazyValidator<ParseCacheEntry>('parse_cache_entry.schema.json');
const parameterListValidator = lazyValidator<ParameterRequest[]>('parameter_list.schema.json');
const extractionResponseValidator = lazyValidator<ExtractionResponse>('extraction_response.schema.json');
const extractRequestValidator = lazyValidator<ExtractRequestBody>('extract_request.schema.json');
const extractParsedRequestValidator = lazyValidator<ExtractParsedRequestBody>('extract_parsed_request.schema.json');

export type ValidationResult<T> = { valid: true; value: T } | { valid: false; errors: string[] };

function runValidator<T>(validate: ValidateFunction<T>, label: string, data: unknown): ValidationResult<T> {
  if (validate(data)) {
    return { valid: true, value: data };
  }

  const errors = (validate.errors ?? []).map((e) => `${e.instancePath || '/'}: ${e.message ?? 'invalid'}`);
  logger.warn(`${label} validation failed`, { errors });
  return { valid: false, errors };
}

/**
 * Validate a document converter reply against parsed_document.schema.json and
 * normalize it: string cells, documented fields only.
 */
export function validateParsedDocument(data: unknown): ValidationResult<ParsedDocument> {
  const validation = runValidator(parsedDocumentValidator(), 'ParsedDocument', data);
  return validation.valid ? { valid: true, value: normalizeParsedDocument(validation.value) } : validation;
}

/**
 * Validate a stored parse-cache file against parse_cache_entry.schema.json
 */
export function validateParseCacheEntry(data: unknown): ValidationResult<ParseCacheEntry> {
  return runValidator(parseCacheEntryValidator(), 'ParseCacheEntry', data);
}

/**
 * Validate a requested parameter list against parameter_list.schema.json
 */
export function validateParameterList(data: unknown): ValidationResult<ParameterRequest[]> {
  return runValidator(parameterListValidator(), 'ParameterList', data);
}

/**
 * Validate an ExtractionResponse against extraction_response.schema.json
 */
export function validateExtractionResponse(data: unknown): ValidationResult<ExtractionResponse> {
  return runValidator(extractionResponseValidator(), 'ExtractionResponse', data);
}

/**
 * Validate a POST /extract body against extract_request.schema.json
 */
export function validateExtractRequest(data: unknown): ValidationResult<ExtractRequestBody> {
  return runValidator(extractRequestValidator(), 'ExtractRequest', data);
}

/**
 * Validate a POST /extract/parsed body against extract_parsed_request.schema.json
 */
export function validateExtractParsedRequest(data: unknown): ValidationResult<ExtractParsedRequestBody> {
  return runValidator(extractParsedRequestValidator(), 'ExtractParsedRequest', data);
}
