// Interview Signal Engine - Semantic Evidence Extractor
//
// Scores each indicator against the candidate's side of the transcript:
//   1. Candidate spans: candidate segments split into sentences, short and
//      greeting-only sentences removed.
//   2. Relevance: cosine similarity between the indicator query and each span,
//      lifted to `exactMatchRelevance` when the span names the indicator or
//      one of its keywords.
//   3. Evidence: top-K spans above the relevance threshold, joined with
//      EVIDENCE_SEPARATOR, or the no-evidence sentinel with a baseline score.
//   4. aiScore = count component + relevance component + direct-mention bonus.
//   5. Reasoning: fixed template naming the band, the spans' timestamps and
//      the direct mention count.
//
// Output depends only on (transcript, indicators, embeddings), so re-running
// an unchanged transcript reproduces the same fields.

import { EmbeddingCache, cosineSimilarity, type EmbeddingProvider } from "./embedding-similarity.js";
import { errorMessage } from "./errors.js";
import { createConsoleLogger, type Logger } from "./logger.js";
import { clamp, formatTimestamp, roundTo, segmentSpans } from "./utils.js";
import type {
  AiAssessmentFields,
  EvidenceSpan,
  ExtractionConfig,
  Indicator,
  IndicatorOutcome,
  TranscriptSegment,
} from "./types.js";

export const EVIDENCE_SEPARATOR = " | ";
export const NO_EVIDENCE_SENTINEL = "no specific evidence found in the transcript";

/** Greeting-only sentences shorter than this are not evidence. */
const INTRO_MAX_CHARS = 50;

export const DEFAULT_EXTRACTION_CONFIG: ExtractionConfig = {
  candidateSpeaker: "candidate",
  maxEvidence: 3,
  relevanceThreshold: 0.5,
  exactMatchRelevance: 0.95,
  baselineScore: 10,
  minSpanChars: 15,
  introPatterns: [
    /^(hi|hello|hey)\b/,
    /^good (morning|afternoon|evening)\b/,
    /^(my name is|let me introduce)\b/,
    /^nice to meet you\b/,
    /^thank(s| you)\b/,
  ],
};

export interface CandidateSpan {
  index: number; // transcript order
  text: string;
  startTime: number;
}

// ─── Scoring ────────────────────────────────────────────────────────────────────

/**
 * Score for qualifying spans, given their relevances (any order) and how many
 * of them were direct mentions:
 *   count     = min(50, 20 + ln(n + 1) × 15)
 *   relevance = clamp((top − threshold) × 100 + 30, 30, 60)
 *   bonus     = min(15, exactCount × 8)
 * clamped to [0, 100] and rounded to one decimal. No spans → baseline.
 */
export function computeAiScore(relevances: number[], exactCount: number, config: ExtractionConfig): number {
  if (relevances.length === 0) return config.baselineScore;

  const top = Math.max(...relevances);
  const countComponent = Math.min(50, 20 + Math.log(relevances.length + 1) * 15);
  const relevanceComponent = clamp((top - config.relevanceThreshold) * 100 + 30, 30, 60);
  const bonus = Math.min(15, exactCount * 8);
  return roundTo(clamp(countComponent + relevanceComponent + bonus, 0, 100), 1);
}

export function scoreBand(aiScore: number): "strong" | "clear" | "adequate" | "limited" {
  if (aiScore >= 75) return "strong";
  if (aiScore >= 55) return "clear";
  if (aiScore >= 35) return "adequate";
  return "limited";
}

export function buildReasoning(indicator: Indicator, evidence: EvidenceSpan[], qualifyingCount: number, exactCount: number, aiScore: number, config: ExtractionConfig): string {
  if (evidence.length === 0) {
    return (
      `No candidate statement relates to ${indicator.name} above the ` +
      `${Math.round(config.relevanceThreshold * 100)}% relevance threshold; baseline score ${config.baselineScore} applied.`
    );
  }

  const top = evidence[0].relevance;
  const times = evidence.map((span) => `[${formatTimestamp(span.startTime)}]`).join(", ");
  const statements = qualifyingCount === 1 ? "statement" : "statements";
  const mentions =
    exactCount > 0 ? ` Includes ${exactCount} direct mention${exactCount === 1 ? "" : "s"} of the indicator.` : "";

  return (
    `${capitalize(scoreBand(aiScore))} evidence of ${indicator.name}: ${qualifyingCount} relevant ${statements}, ` +
    `top relevance ${(top * 100).toFixed(1)}%. Score driven by the statements at ${times}.${mentions}`
  );
}

function capitalize(word: string): string {
  return word.charAt(0).toUpperCase() + word.slice(1);
}

/** Split stored evidence text back into the individual quotes. */
export function splitEvidence(evidenceText: string): string[] {
  if (evidenceText === NO_EVIDENCE_SENTINEL || evidenceText.length === 0) return [];
  return evidenceText.split(EVIDENCE_SEPARATOR);
}

export function indicatorQuery(indicator: Indicator): string {
  const description = indicator.description.trim();
  return description ? `${indicator.name}. ${description}` : indicator.name;
}

function escapeRegExp(text: string): string {
  return text.replace(/[.*+?^${}()|[\]\\]/g, "\\$&");
}

/** Patterns for the indicator name and keywords of at least three characters. */
export function keywordPatterns(indicator: Indicator): RegExp[] {
  const terms = [indicator.name, ...(indicator.keywords ?? [])]
    .map((term) => term.trim().toLowerCase())
    .filter((term) => term.length >= 3);
  return [...new Set(terms)].map((term) => new RegExp(`(^|[^a-z0-9])${escapeRegExp(term)}`));
}

// ─── Extractor ──────────────────────────────────────────────────────────────────

export class SemanticEvidenceExtractor {
  private readonly config: ExtractionConfig;
  private readonly log: Logger;

  constructor(
    private readonly provider: EmbeddingProvider,
    config?: Partial<ExtractionConfig>,
    logger?: Logger,
  ) {
    this.config = { ...DEFAULT_EXTRACTION_CONFIG, ...config };
    this.log = logger ?? createConsoleLogger("EvidenceExtractor");
  }

  /**
   * Candidate sentences in transcript order. Greeting-only sentences are
   * dropped unless that would leave nothing.
   */
  candidateSpans(segments: TranscriptSegment[]): CandidateSpan[] {
    const sentences: Array<{ text: string; startTime: number }> = [];
    for (const segment of segments) {
      if (segment.speaker !== this.config.candidateSpeaker) continue;
      for (const sentence of segmentSpans(segment.text)) {
        const text = sentence.replace(/\s*\|\s*/g, " / ").trim();
        if (text.length >= this.config.minSpanChars) sentences.push({ text, startTime: segment.startTime });
      }
    }

    const withoutIntros = sentences.filter((s) => !this.isIntroOnly(s.text));
    const kept = withoutIntros.length > 0 ? withoutIntros : sentences;
    return kept.map((s, index) => ({ index, ...s }));
  }

  /** One outcome per indicator, in indicator order. */
  async extract(segments: TranscriptSegment[], indicators: Indicator[]): Promise<IndicatorOutcome[]> {
    const spans = this.candidateSpans(segments);
    const cache = new EmbeddingCache(this.provider, this.log);

    let spanVectors: number[][] = [];
    if (spans.length > 0) {
      try {
        spanVectors = await cache.embedAll(spans.map((s) => s.text));
      } catch (err) {
        const reason = `Embedding transcript spans failed: ${errorMessage(err)}`;
        this.log.error(reason);
        return indicators.map((ind): IndicatorOutcome => ({ status: "not_assessed", indicatorId: ind.id, reason }));
      }
    }

    const queryVectors = await this.embedQueries(cache, spans.length > 0 ? indicators : []);

    return indicators.map((indicator): IndicatorOutcome => {
      const query = queryVectors.get(indicator.id) ?? [];
      if (typeof query === "string") {
        return { status: "not_assessed", indicatorId: indicator.id, reason: query };
      }
      return {
        status: "assessed",
        indicatorId: indicator.id,
        fields: this.scoreIndicator(indicator, spans, spanVectors, query),
      };
    });
  }

  /**
   * Rank spans for one indicator and build its AI fields. Pure given its inputs.
   */
  scoreIndicator(
    indicator: Indicator,
    spans: CandidateSpan[],
    spanVectors: number[][],
    queryVector: number[],
  ): AiAssessmentFields {
    const patterns = keywordPatterns(indicator);

    const ranked = spans
      .map((span, i) => {
        const lower = span.text.toLowerCase();
        const exactMatch = patterns.some((p) => p.test(lower));
        const similarity = clamp(cosineSimilarity(queryVector, spanVectors[i] ?? []), 0, 1);
        const relevance = roundTo(exactMatch ? Math.max(similarity, this.config.exactMatchRelevance) : similarity, 4);
        return { span, relevance, exactMatch };
      })
      .filter((r) => r.relevance > this.config.relevanceThreshold)
      .sort((a, b) => b.relevance - a.relevance || a.span.index - b.span.index);

    const exactCount = ranked.filter((r) => r.exactMatch).length;
    const aiScore = computeAiScore(
      ranked.map((r) => r.relevance),
      exactCount,
      this.config,
    );
    const evidence: EvidenceSpan[] = ranked.slice(0, this.config.maxEvidence).map((r) => ({
      text: r.span.text,
      startTime: r.span.startTime,
      relevance: r.relevance,
      exactMatch: r.exactMatch,
    }));

    return {
      aiScore,
      evidence,
      evidenceText: evidence.length > 0 ? evidence.map((e) => e.text).join(EVIDENCE_SEPARATOR) : NO_EVIDENCE_SENTINEL,
      reasoning: buildReasoning(indicator, evidence, ranked.length, exactCount, aiScore, this.config),
    };
  }

  /**
   * Query vectors per indicator id. A failed batch falls back to one call per
   * indicator so a failure only affects the indicators it hits; failures map
   * to their error message.
   */
  private async embedQueries(cache: EmbeddingCache, indicators: Indicator[]): Promise<Map<string, number[] | string>> {
    const result = new Map<string, number[] | string>();
    if (indicators.length === 0) return result;

    const queries = indicators.map(indicatorQuery);
    try {
      const vectors = await cache.embedAll(queries);
      indicators.forEach((ind, i) => result.set(ind.id, vectors[i]));
      return result;
    } catch (err) {
      this.log.warn(`Batch query embedding failed, retrying per indicator: ${errorMessage(err)}`);
    }

    for (const [i, indicator] of indicators.entries()) {
      try {
        const [vector] = await cache.embedAll([queries[i]]);
        result.set(indicator.id, vector);
      } catch (err) {
        const reason = `Embedding query for ${indicator.name} failed: ${errorMessage(err)}`;
        this.log.error(reason);
        result.set(indicator.id, reason);
      }
    }
    return result;
  }

  private isIntroOnly(sentence: string): boolean {
    const lower = sentence.toLowerCase().trim();
    return lower.length < INTRO_MAX_CHARS && this.config.introPatterns.some((p) => p.test(lower));
  }
}
