/**
 * Request decoding for the extraction endpoints.
 */

import {
  InvalidInputError,
  normalizeParsedDocument,
  parseParameterList,
  validateExtractParsedRequest,
  validateExtractRequest,
  type ParameterRequest,
  type ParsedDocument,
  type UploadedDocument,
} from '@risklens/shared';

const BASE64_PATTERN = /^[A-Za-z0-9+/]+={0,2}$/;

export interface DecodedDocument {
  filename: string;
  bytes: Buffer;
}

export interface UploadedExtraction {
  bureauDocument: DecodedDocument;
  gstDocument: DecodedDocument;
  parameters: ParameterRequest[];
}

export interface ParsedExtraction {
  bureauDocument: ParsedDocument;
  gstDocument: ParsedDocument;
  parameters: ParameterRequest[];
}

/**
 * @throws InvalidInputError when the content is not base64 or decodes to nothing
 */
export function decodeUploadedDocument(doc: UploadedDocument, field: string): DecodedDocument {
  const compact = doc.content_base64.replace(/\s+/g, '');
  if (compact.length % 4 !== 0 || !BASE64_PATTERN.test(compact)) {
    throw new InvalidInputError(`${field} is not valid base64`, [`${field}/content_base64`]);
  }

  const bytes = Buffer.from(compact, 'base64');
  if (bytes.length === 0) {
    throw new InvalidInputError(`${field} is empty`, [`${field}/content_base64`]);
  }

  return { filename: doc.filename, bytes };
}

export function parseExtractRequest(body: unknown): UploadedExtraction {
  const validation = validateExtractRequest(body);
  if (!validation.valid) {
    throw new InvalidInputError('request body does not match the expected shape', validation.errors);
  }

  const request = validation.value;
  return {
    bureauDocument: decodeUploadedDocument(request.bureau_document, 'bureau_document'),
    gstDocument: decodeUploadedDocument(request.gst_document, 'gst_document'),
    parameters: parseParameterList(request.parameters),
  };
}

export function parseExtractParsedRequest(body: unknown): ParsedExtraction {
  const validation = validateExtractParsedRequest(body);
  if (!validation.valid) {
    throw new InvalidInputError('request body does not match the expected shape', validation.errors);
  }

  const request = validation.value;
  return {
    bureauDocument: normalizeParsedDocument(request.bureau_document),
    gstDocument: normalizeParsedDocument(request.gst_document),
    parameters: parseParameterList(request.parameters),
  };
}
