// Interview Signal Engine - Sentiment Analyzer
// Scores transcript segments by comparing each one with positive and negative
// reference statements through the embedding provider.
//
// Score: 0.5 is neutral. The side with the higher maximum similarity moves the
// score by half that similarity, toward 1.0 (positive) or 0.0 (negative).

import { cosineSimilarity, type EmbeddingProvider } from "./embedding-similarity.js";
import { errorMessage } from "./errors.js";
import { createConsoleLogger, type Logger } from "./logger.js";
import type { Sentiment } from "./types.js";

// ─── Reference Statements ───────────────────────────────────────────────────────

export const POSITIVE_REFERENCES = [
  "I am really happy and satisfied with how this went",
  "This was a very good and positive experience",
  "I feel optimistic and excited about this",
  "It was a great and enjoyable experience",
  "I am very enthusiastic and motivated",
];

export const NEGATIVE_REFERENCES = [
  "I am very disappointed and unhappy with this",
  "This was a bad and negative experience",
  "I feel pessimistic and unsure about this",
  "It was a frustrating and unpleasant experience",
  "I feel discouraged and unmotivated",
];

/** Texts shorter than this are neutral without being embedded. */
const MIN_TEXT_CHARS = 5;
const POSITIVE_LABEL_MIN = 0.65;
const NEGATIVE_LABEL_MAX = 0.35;

export const NEUTRAL_SENTIMENT: Sentiment = Object.freeze({ score: 0.5, label: "neutral", confidence: 0 });

/** Sentiment from the best positive and best negative reference similarity. */
export function sentimentFromSimilarities(maxPositive: number, maxNegative: number): Sentiment {
  if (maxPositive > maxNegative) {
    const score = Math.min(1, 0.5 + maxPositive * 0.5);
    return { score, label: score >= POSITIVE_LABEL_MIN ? "positive" : "neutral", confidence: maxPositive };
  }
  if (maxNegative > maxPositive) {
    const score = Math.max(0, 0.5 - maxNegative * 0.5);
    return { score, label: score <= NEGATIVE_LABEL_MAX ? "negative" : "neutral", confidence: maxNegative };
  }
  return { score: 0.5, label: "neutral", confidence: Math.max(0, maxPositive) };
}

export class SentimentAnalyzer {
  private readonly log: Logger;

  constructor(
    private readonly provider: EmbeddingProvider,
    logger?: Logger,
  ) {
    this.log = logger ?? createConsoleLogger("SentimentAnalyzer");
  }

  /**
   * One sentiment per text, in input order. Embeds the texts and the reference
   * statements in one provider call; a provider failure leaves every text neutral.
   */
  async analyze(texts: string[]): Promise<Sentiment[]> {
    const scorable = texts.map((t) => t.trim()).filter((t) => t.length >= MIN_TEXT_CHARS);
    if (scorable.length === 0) return texts.map(() => NEUTRAL_SENTIMENT);

    const references = [...POSITIVE_REFERENCES, ...NEGATIVE_REFERENCES];
    let vectors: number[][];
    try {
      vectors = await this.provider.embed([...references, ...scorable]);
    } catch (err) {
      this.log.warn(`Sentiment analysis skipped: ${errorMessage(err)}`);
      return texts.map(() => NEUTRAL_SENTIMENT);
    }
    if (vectors.length !== references.length + scorable.length) {
      this.log.warn(`Sentiment analysis skipped: ${this.provider.name} returned ${vectors.length} vectors`);
      return texts.map(() => NEUTRAL_SENTIMENT);
    }

    const positive = vectors.slice(0, POSITIVE_REFERENCES.length);
    const negative = vectors.slice(POSITIVE_REFERENCES.length, references.length);
    const byText = new Map<string, Sentiment>();
    scorable.forEach((text, i) => {
      const vector = vectors[references.length + i];
      const best = (refs: number[][]) => Math.max(...refs.map((ref) => cosineSimilarity(vector, ref)));
      byText.set(text, sentimentFromSimilarities(best(positive), best(negative)));
    });

    return texts.map((t) => byText.get(t.trim()) ?? NEUTRAL_SENTIMENT);
  }
}
