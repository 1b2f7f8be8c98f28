/**
 * Response Formatting
 *
 * Assembles the caller-facing response: per-parameter results, sales records,
 * and the overall confidence across both.
 */

import { calculateOverallConfidence } from './confidence';
import type { ExtractionResponse, ExtractionResult, SalesRecord } from './types';

function formatResult(result: ExtractionResult): ExtractionResult {
  const formatted: ExtractionResult = {
    value: result.value,
    source: result.source,
    confidence: result.confidence,
    status: result.status,
  };
  if (result.similarity_score !== undefined) formatted.similarity_score = result.similarity_score;
  if (result.extraction_method !== undefined) formatted.extraction_method = result.extraction_method;
  if (result.rag_context) formatted.rag_context = result.rag_context;
  if (result.error) formatted.error = result.error;
  return formatted;
}

export function formatExtractionResponse(
  bureauResults: Record<string, ExtractionResult>,
  salesRecords: readonly SalesRecord[]
): ExtractionResponse {
  const bureauParameters: Record<string, ExtractionResult> = Object.fromEntries(
    Object.entries(bureauResults).map(([parameterId, result]) => [parameterId, formatResult(result)])
  );

  const gstSales = salesRecords.map(({ month, sales, source, confidence, status }) => ({
    month,
    sales,
    source,
    confidence,
    status,
  }));

  return {
    bureau_parameters: bureauParameters,
    gst_sales: gstSales,
    overall_confidence_score: calculateOverallConfidence([
      ...Object.values(bureauParameters).map((r) => r.confidence),
      ...gstSales.map((r) => r.confidence),
    ]),
  };
}
