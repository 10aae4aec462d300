import { describe, it, expect, vi } from "vitest";
import {
  NEGATIVE_REFERENCES,
  NEUTRAL_SENTIMENT,
  POSITIVE_REFERENCES,
  SentimentAnalyzer,
  sentimentFromSimilarities,
} from "./sentiment-analyzer.js";
import type { EmbeddingProvider } from "./embedding-similarity.js";

function createSilentLogger() {
  return {
    info: vi.fn(),
    warn: vi.fn(),
    error: vi.fn(),
    debug: vi.fn(),
  };
}

/** Positive references embed to [1, 0], negative ones to [0, 1], other texts as listed or to the zero vector. */
function axisProvider(vectors: Record<string, number[]>) {
  const embed = vi.fn(async (texts: string[]) =>
    texts.map((t) => {
      if (POSITIVE_REFERENCES.includes(t)) return [1, 0];
      if (NEGATIVE_REFERENCES.includes(t)) return [0, 1];
      return vectors[t] ?? [0, 0];
    }),
  );
  const provider: EmbeddingProvider = { name: "axis", embed };
  return { provider, embed };
}

describe("sentimentFromSimilarities", () => {
  it.each([
    [0.4, 0.1, 0.7, "positive"],
    [0.2, 0.1, 0.6, "neutral"],
    [0.1, 0.2, 0.4, "neutral"],
    [0.1, 0.5, 0.25, "negative"],
  ])("maps best positive %s and best negative %s to %s (%s)", (positive, negative, score, label) => {
    const sentiment = sentimentFromSimilarities(positive, negative);
    expect(sentiment.score).toBeCloseTo(score, 10);
    expect(sentiment.label).toBe(label);
    expect(sentiment.confidence).toBe(Math.max(positive, negative));
  });

  it("is neutral when both sides are equally close", () => {
    expect(sentimentFromSimilarities(0.3, 0.3)).toEqual({ score: 0.5, label: "neutral", confidence: 0.3 });
  });
});

describe("SentimentAnalyzer", () => {
  it("scores each text against the reference statements in one provider call", async () => {
    const { provider, embed } = axisProvider({
      "I really enjoyed building that": [1, 0],
      "That release went badly for us": [0, 1],
    });
    const analyzer = new SentimentAnalyzer(provider, createSilentLogger());

    const sentiments = await analyzer.analyze([
      "I really enjoyed building that",
      "ok",
      "That release went badly for us",
      "We moved offices in March",
    ]);

    expect(sentiments).toEqual([
      { score: 1, label: "positive", confidence: 1 },
      NEUTRAL_SENTIMENT,
      { score: 0, label: "negative", confidence: 1 },
      { score: 0.5, label: "neutral", confidence: 0 },
    ]);
    expect(embed).toHaveBeenCalledTimes(1);
    expect(embed.mock.calls[0][0]).toHaveLength(POSITIVE_REFERENCES.length + NEGATIVE_REFERENCES.length + 3);
  });

  it("does not call the provider when every text is too short", async () => {
    const { provider, embed } = axisProvider({});
    const analyzer = new SentimentAnalyzer(provider, createSilentLogger());

    await expect(analyzer.analyze(["", "yes", "  hm  "])).resolves.toEqual([
      NEUTRAL_SENTIMENT,
      NEUTRAL_SENTIMENT,
      NEUTRAL_SENTIMENT,
    ]);
    expect(embed).not.toHaveBeenCalled();
  });

  it("leaves every text neutral when the provider fails", async () => {
    const logger = createSilentLogger();
    const provider: EmbeddingProvider = { name: "down", embed: vi.fn().mockRejectedValue(new Error("quota")) };
    const analyzer = new SentimentAnalyzer(provider, logger);

    await expect(analyzer.analyze(["I really enjoyed building that"])).resolves.toEqual([NEUTRAL_SENTIMENT]);
    expect(logger.warn).toHaveBeenCalledWith("Sentiment analysis skipped: quota");
  });
});
