// Interview Signal Engine - Score Combiner
// Weighted AI/manual combination per indicator and the weighted overall score.
// Combined scores are never stored; they are recomputed from the current
// weights whenever a report is read.

import { ConfigurationError } from "./errors.js";
import { roundTo } from "./utils.js";
import type { HiringRecommendation, Indicator, ScoringWeights } from "./types.js";

export const DEFAULT_SCORING_WEIGHTS: ScoringWeights = Object.freeze({ aiWeight: 60, manualWeight: 40 });

/**
 * @throws ConfigurationError unless both weights are finite, non-negative and
 * sum to exactly 100. Weights are never normalized.
 */
export function validateWeights(weights: ScoringWeights): void {
  const { aiWeight, manualWeight } = weights;
  if (!Number.isFinite(aiWeight) || !Number.isFinite(manualWeight)) {
    throw new ConfigurationError(`Scoring weights must be finite numbers, got {${aiWeight}, ${manualWeight}}`);
  }
  if (aiWeight < 0 || manualWeight < 0) {
    throw new ConfigurationError(`Scoring weights must not be negative, got {${aiWeight}, ${manualWeight}}`);
  }
  if (aiWeight + manualWeight !== 100) {
    throw new ConfigurationError(
      `Scoring weights must sum to 100, got ${aiWeight} + ${manualWeight} = ${aiWeight + manualWeight}`,
    );
  }
}

/** @throws ConfigurationError unless the score is a finite number in [0, 100]. */
export function validateScore(score: number, label: string = "score"): void {
  if (typeof score !== "number" || !Number.isFinite(score) || score < 0 || score > 100) {
    throw new ConfigurationError(`${label} must be a number between 0 and 100, got ${String(score)}`);
  }
}

/**
 * A manual score that is absent or ≤ 0 counts as not entered and the AI score
 * stands alone. Otherwise the weighted blend, rounded to one decimal.
 */
export function combine(aiScore: number, manualScore: number | null | undefined, weights: ScoringWeights): number {
  validateWeights(weights);
  if (manualScore === null || manualScore === undefined || manualScore <= 0) {
    return aiScore;
  }
  return roundTo((aiScore * weights.aiWeight) / 100 + (manualScore * weights.manualWeight) / 100, 1);
}

/**
 * Indicator-weighted mean of the scored indicators. Indicators missing from
 * `scores` are left out of both sums. Null when nothing is scored.
 */
export function overall(scores: ReadonlyMap<string, number>, indicators: readonly Indicator[]): number | null {
  let weighted = 0;
  let totalWeight = 0;
  for (const indicator of indicators) {
    const score = scores.get(indicator.id);
    if (score === undefined) continue;
    weighted += score * indicator.weight;
    totalWeight += indicator.weight;
  }
  if (totalWeight === 0) return null;
  return roundTo(weighted / totalWeight, 1);
}

/** Lowest overall scores for the upper two recommendation bands. */
export const RECOMMENDATION_THRESHOLDS = Object.freeze({ recommended: 80, consider: 60 });

/** Recommendation band for an overall score; null when nothing was scored. */
export function recommend(overallScore: number | null): HiringRecommendation | null {
  if (overallScore === null) return null;
  if (overallScore >= RECOMMENDATION_THRESHOLDS.recommended) return "recommended";
  if (overallScore >= RECOMMENDATION_THRESHOLDS.consider) return "consider";
  return "not_recommended";
}

// ─── Weights Holder ─────────────────────────────────────────────────────────────

/**
 * Process-wide weights as one frozen object. Readers take the whole pair with
 * `current()`; `update()` validates and swaps the reference, so no reader can
 * see one new field with one old one.
 */
export class ScoringWeightsHolder {
  private weights: ScoringWeights;

  constructor(initial: ScoringWeights = DEFAULT_SCORING_WEIGHTS) {
    validateWeights(initial);
    this.weights = Object.freeze({ aiWeight: initial.aiWeight, manualWeight: initial.manualWeight });
  }

  current(): ScoringWeights {
    return this.weights;
  }

  /** @throws ConfigurationError and keeps the previous pair when `next` is invalid. */
  update(next: ScoringWeights): ScoringWeights {
    validateWeights(next);
    this.weights = Object.freeze({ aiWeight: next.aiWeight, manualWeight: next.manualWeight });
    return this.weights;
  }
}
