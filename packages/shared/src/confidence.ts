/**
 * Confidence scoring for extracted parameters.
 *
 * confidence = methodWeight × typeCertainty × similarityBoost, forced to 0 when the
 * value fails its spec's domain validation. Weights and similarity bands live in
 * a ConfidencePolicy.
 */

import type { ExtractionMethod, ParameterValue } from './types';
import {
  matchesExpectedType,
  validateParameterValue,
  type ParameterSpec,
} from './parameters/specs';

export interface SimilarityBand {
  /** Inclusive lower bound on the similarity score */
  minSimilarity: number;
  boost: number;
}

export interface ConfidencePolicy {
  methodWeights: Readonly<Record<ExtractionMethod, number>>;
  /** Bands ordered from highest minSimilarity to lowest */
  similarityBands: readonly SimilarityBand[];
  /** Boost when the similarity falls below every band */
  floorBoost: number;
}

/** Weight per extraction method (0.0–1.0). */
export const METHOD_WEIGHTS: Readonly<Record<ExtractionMethod, number>> = {
  chunk_scoped: 0.95,
  full_report: 0.9,
  computed: 1.0,
  llm_with_rag: 0.6,
};

/** Default weight when the extraction method is missing or unknown. */
export const DEFAULT_METHOD_WEIGHT = 0.5;

export const SIMILARITY_BANDS: readonly SimilarityBand[] = [
  { minSimilarity: 0.85, boost: 1.0 },
  { minSimilarity: 0.7, boost: 0.9 },
  { minSimilarity: 0.5, boost: 0.7 },
];

export const DEFAULT_CONFIDENCE_POLICY: ConfidencePolicy = {
  methodWeights: METHOD_WEIGHTS,
  similarityBands: SIMILARITY_BANDS,
  floorBoost: 0.5,
};

/**
 * Get the weight for an extraction method. Uses DEFAULT_METHOD_WEIGHT for missing/unknown methods.
 */
export function getMethodWeight(
  method?: ExtractionMethod | null,
  policy: ConfidencePolicy = DEFAULT_CONFIDENCE_POLICY
): number {
  if (method && method in policy.methodWeights) {
    return policy.methodWeights[method];
  }
  return DEFAULT_METHOD_WEIGHT;
}

export function getTypeCertainty(spec: ParameterSpec, value: ParameterValue): number {
  if (value === null) return 0;
  return matchesExpectedType(value, spec.expectedType) ? 1 : 0.5;
}

export function getSimilarityBoost(
  similarity: number,
  policy: ConfidencePolicy = DEFAULT_CONFIDENCE_POLICY
): number {
  for (const band of policy.similarityBands) {
    if (similarity >= band.minSimilarity) {
      return band.boost;
    }
  }
  return policy.floorBoost;
}

/** Whether the similarity boost applies to results produced by this method. */
export function isSimilarityBoosted(method: ExtractionMethod): boolean {
  return method !== 'computed';
}

/**
 * Base confidence for a value, before any similarity boost.
 */
export function calculateConfidence(
  spec: ParameterSpec,
  value: ParameterValue,
  method: ExtractionMethod,
  policy: ConfidencePolicy = DEFAULT_CONFIDENCE_POLICY
): number {
  if (!validateParameterValue(spec, value)) {
    return 0;
  }
  return clampUnit(getMethodWeight(method, policy) * getTypeCertainty(spec, value));
}

/**
 * Full confidence for a value found on the embedding-guided path.
 * Results computed over the whole report keep their base confidence.
 */
export function scoreExtraction(
  spec: ParameterSpec,
  value: ParameterValue,
  method: ExtractionMethod,
  similarity: number,
  policy: ConfidencePolicy = DEFAULT_CONFIDENCE_POLICY
): number {
  const base = calculateConfidence(spec, value, method, policy);
  if (base === 0 || !isSimilarityBoosted(method)) {
    return base;
  }
  return clampUnit(base * getSimilarityBoost(similarity, policy));
}

/**
 * Overall document confidence: mean of every strictly positive confidence, rounded
 * to 3 decimals. Not-found entries are left out of the denominator; 0 when none remain.
 */
export function calculateOverallConfidence(confidences: readonly number[]): number {
  const positive = confidences.filter((c) => c > 0);
  if (positive.length === 0) {
    return 0;
  }
  const mean = positive.reduce((sum, c) => sum + c, 0) / positive.length;
  return Math.round(mean * 1000) / 1000;
}

function clampUnit(value: number): number {
  if (!Number.isFinite(value) || value <= 0) return 0;
  return value >= 1 ? 1 : value;
}
