/**
 * LLM Fallback Extraction
 *
 * Prompt construction and response interpretation for the last step of the
 * fallback chain. The model sees the domain knowledge context, the best matching
 * document section, and the parameter definition, and answers with a bare value
 * or one of the literal tokens NOT_FOUND / NOT_APPLICABLE.
 */

import { parseDecimal } from '../crif/patterns';
import type { ExpectedType, NonNullValue, ParameterSpec } from '../parameters/specs';

/** Characters of chunk content included in the prompt */
export const MAX_PROMPT_CHUNK_CHARS = 2000;

export const NOT_FOUND_TOKEN = 'NOT_FOUND';
export const NOT_APPLICABLE_TOKEN = 'NOT_APPLICABLE';

const TRUTHY_ANSWERS = new Set(['true', 'yes', '1', 'y']);

export type LlmAnswer =
  | { kind: 'not_found' }
  | { kind: 'not_applicable' }
  | { kind: 'value'; value: NonNullValue };

export function buildLlmPrompt(spec: ParameterSpec, chunkContent: string, ragContext: string): string {
  return `You are extracting structured data from a credit bureau report.

Domain Knowledge:
${ragContext}

Document Section:
${chunkContent.slice(0, MAX_PROMPT_CHUNK_CHARS)}

Extract the following parameter:
- Name: ${spec.name}
- Description: ${spec.description}
- Expected Type: ${spec.expectedType}

Instructions:
1. Use the domain knowledge above to understand what to look for
2. Extract the EXACT value from the document section
3. If the value is not found in this section, return exactly: ${NOT_FOUND_TOKEN}
4. If the parameter is not applicable to this document, return exactly: ${NOT_APPLICABLE_TOKEN}
5. Return ONLY the extracted value, nothing else (no explanations, no formatting)

Value:`;
}

/**
 * Coerce a raw answer to the expected type. Numerics drop separators and whitespace;
 * answers that do not convert stay strings and fail validation downstream.
 */
export function coerceLlmValue(raw: string, expectedType: ExpectedType): NonNullValue {
  switch (expectedType) {
    case 'int': {
      const parsed = parseDecimal(raw.replace(/[,\s]/g, ''));
      return parsed === null ? raw : Math.trunc(parsed);
    }
    case 'float': {
      const parsed = parseDecimal(raw.replace(/[,\s]/g, ''));
      return parsed === null ? raw : parsed;
    }
    case 'bool':
      return TRUTHY_ANSWERS.has(raw.toLowerCase());
    case 'string':
    case 'none':
      return raw;
  }
}

export function interpretLlmResponse(response: string, expectedType: ExpectedType): LlmAnswer {
  const answer = response.trim();

  if (answer === '' || answer === NOT_FOUND_TOKEN) {
    return { kind: 'not_found' };
  }
  if (answer === NOT_APPLICABLE_TOKEN) {
    return { kind: 'not_applicable' };
  }

  return { kind: 'value', value: coerceLlmValue(answer, expectedType) };
}
