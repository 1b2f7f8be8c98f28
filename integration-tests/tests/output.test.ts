/**
 * Response Formatting Tests
 */

import { formatExtractionResponse, validateExtractionResponse, type ExtractionResult } from '@risklens/shared';

const extracted: ExtractionResult = {
  value: 742,
  source: 'Verification Table (from Table 1)',
  confidence: 0.95,
  status: 'extracted',
  similarity_score: 1,
  extraction_method: 'chunk_scoped',
  rag_context: '',
};

const notFound: ExtractionResult = {
  value: null,
  source: 'No relevant sections found',
  confidence: 0,
  status: 'not_found',
};

describe('formatExtractionResponse', () => {
  it('should drop empty optional fields and compute the overall confidence', () => {
    const response = formatExtractionResponse(
      { bureau_credit_score: extracted, bureau_max_loans: notFound },
      [{ month: 'April 2024', sales: 951381, source: 'GSTR-3B Table 3.1 (Page 2)', confidence: 1, status: 'extracted' }]
    );

    expect(response).toEqual({
      bureau_parameters: {
        bureau_credit_score: {
          value: 742,
          source: 'Verification Table (from Table 1)',
          confidence: 0.95,
          status: 'extracted',
          similarity_score: 1,
          extraction_method: 'chunk_scoped',
        },
        bureau_max_loans: notFound,
      },
      gst_sales: [
        { month: 'April 2024', sales: 951381, source: 'GSTR-3B Table 3.1 (Page 2)', confidence: 1, status: 'extracted' },
      ],
      overall_confidence_score: 0.975,
    });
  });

  it('should keep parameter order', () => {
    const response = formatExtractionResponse({ b: notFound, a: extracted }, []);
    expect(Object.keys(response.bureau_parameters)).toEqual(['b', 'a']);
  });

  it('should satisfy the response contract', () => {
    const response = formatExtractionResponse({ bureau_credit_score: extracted }, []);
    expect(validateExtractionResponse(response).valid).toBe(true);
  });

  it('should score an empty response at 0', () => {
    expect(formatExtractionResponse({}, []).overall_confidence_score).toBe(0);
  });
});
