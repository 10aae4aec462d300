import { describe, it, expect, vi } from "vitest";
import {
  DEFAULT_EXTRACTION_CONFIG,
  NO_EVIDENCE_SENTINEL,
  SemanticEvidenceExtractor,
  computeAiScore,
  indicatorQuery,
  keywordPatterns,
  scoreBand,
  splitEvidence,
  type CandidateSpan,
} from "./evidence-extractor.js";
import type { EmbeddingProvider } from "./embedding-similarity.js";
import type { Indicator, TranscriptSegment } from "./types.js";

// ─── Test Helpers ───────────────────────────────────────────────────────────────

function createSilentLogger() {
  return {
    info: vi.fn(),
    warn: vi.fn(),
    error: vi.fn(),
    debug: vi.fn(),
  };
}

/** Texts mentioning "team" embed to [1, 0]; everything else to the zero vector. */
function teamAxis(texts: string[]): number[][] {
  return texts.map((t) => (t.toLowerCase().includes("team") ? [1, 0] : [0, 0]));
}

function teamProvider() {
  return { name: "team-axis", embed: vi.fn(async (texts: string[]) => teamAxis(texts)) };
}

const COLLABORATION: Indicator = {
  id: "collab",
  name: "Collaboration",
  description: "Works well with others",
  weight: 1,
  keywords: ["pair programming"],
};

const TEAMWORK: Indicator = { id: "team", name: "Teamwork", description: "Builds a strong team", weight: 2 };

function span(index: number, text: string, startTime: number): CandidateSpan {
  return { index, text, startTime };
}

// ─── Scoring Helpers ────────────────────────────────────────────────────────────

describe("computeAiScore", () => {
  it("uses the baseline when no span qualifies", () => {
    expect(computeAiScore([], 0, DEFAULT_EXTRACTION_CONFIG)).toBe(10);
  });

  it("adds the count, relevance and mention components", () => {
    expect(computeAiScore([0.6], 0, DEFAULT_EXTRACTION_CONFIG)).toBe(70.4);
    expect(computeAiScore([0.52], 0, DEFAULT_EXTRACTION_CONFIG)).toBe(62.4);
    expect(computeAiScore([0.95], 1, DEFAULT_EXTRACTION_CONFIG)).toBe(98.4);
  });

  it("caps the score at 100", () => {
    expect(computeAiScore([0.9, 0.8, 0.7], 3, DEFAULT_EXTRACTION_CONFIG)).toBe(100);
  });
});

describe("scoreBand", () => {
  it("maps scores onto bands", () => {
    expect([90, 75, 74.9, 55, 35, 10].map(scoreBand)).toEqual([
      "strong",
      "strong",
      "clear",
      "clear",
      "adequate",
      "limited",
    ]);
  });
});

describe("splitEvidence", () => {
  it("recovers the quotes from stored evidence text", () => {
    expect(splitEvidence("First quote. | Second quote.")).toEqual(["First quote.", "Second quote."]);
    expect(splitEvidence(NO_EVIDENCE_SENTINEL)).toEqual([]);
    expect(splitEvidence("")).toEqual([]);
  });
});

describe("indicatorQuery and keywordPatterns", () => {
  it("builds the query from name and description", () => {
    expect(indicatorQuery(COLLABORATION)).toBe("Collaboration. Works well with others");
    expect(indicatorQuery({ ...COLLABORATION, description: "  " })).toBe("Collaboration");
  });

  it("matches the name and keywords at word starts", () => {
    const patterns = keywordPatterns({ ...COLLABORATION, keywords: ["pair programming", "UI", "c++"] });
    const matches = (text: string) => patterns.some((p) => p.test(text));

    expect(patterns).toHaveLength(3);
    expect(matches("we did pair programming daily")).toBe(true);
    expect(matches("strong collaboration skills")).toBe(true);
    expect(matches("mostly c++ services")).toBe(true);
    expect(matches("recollaboration")).toBe(false);
  });
});

// ─── Candidate Spans ────────────────────────────────────────────────────────────

describe("SemanticEvidenceExtractor.candidateSpans", () => {
  const extractor = new SemanticEvidenceExtractor(teamProvider(), {}, createSilentLogger());

  it("keeps the candidate's substantive sentences in transcript order", () => {
    const segments: TranscriptSegment[] = [
      { speaker: "interviewer", text: "Tell me about your last role.", startTime: 0, endTime: 2 },
      {
        speaker: "candidate",
        text: "Hi, I'm Sam. Thanks for having me today. I led the payments team for two years.",
        startTime: 3,
        endTime: 9,
      },
      { speaker: "candidate", text: "We tracked A | B metrics closely.", startTime: 10, endTime: 12 },
    ];

    expect(extractor.candidateSpans(segments)).toEqual([
      span(0, "I led the payments team for two years.", 3),
      span(1, "We tracked A / B metrics closely.", 10),
    ]);
  });

  it("keeps greetings when they are all the candidate said", () => {
    const segments: TranscriptSegment[] = [
      { speaker: "candidate", text: "Hello everyone, great to be here.", startTime: 1, endTime: 3 },
    ];
    expect(extractor.candidateSpans(segments)).toEqual([span(0, "Hello everyone, great to be here.", 1)]);
  });
});

// ─── Scoring One Indicator ──────────────────────────────────────────────────────

describe("SemanticEvidenceExtractor.scoreIndicator", () => {
  const extractor = new SemanticEvidenceExtractor(teamProvider(), {}, createSilentLogger());

  it("quotes qualifying spans and explains the score", () => {
    const spans = [span(0, "I paired with design on every release.", 65), span(1, "I enjoy hiking on weekends.", 90)];
    const fields = extractor.scoreIndicator(COLLABORATION, spans, [[0.6, 0.8], [-1, 0]], [1, 0]);

    expect(fields).toEqual({
      aiScore: 70.4,
      evidence: [{ text: "I paired with design on every release.", startTime: 65, relevance: 0.6, exactMatch: false }],
      evidenceText: "I paired with design on every release.",
      reasoning:
        "Clear evidence of Collaboration: 1 relevant statement, top relevance 60.0%. " +
        "Score driven by the statements at [01:05].",
    });
  });

  it("lifts direct keyword mentions to the exact-match relevance", () => {
    const spans = [span(0, "Pair programming helped us ship.", 0)];
    const fields = extractor.scoreIndicator(COLLABORATION, spans, [[0, 1]], [1, 0]);

    expect(fields.aiScore).toBe(98.4);
    expect(fields.evidence[0]).toMatchObject({ relevance: 0.95, exactMatch: true });
    expect(fields.reasoning).toBe(
      "Strong evidence of Collaboration: 1 relevant statement, top relevance 95.0%. " +
        "Score driven by the statements at [00:00]. Includes 1 direct mention of the indicator.",
    );
  });

  it("keeps the top spans, ties in transcript order", () => {
    const spans = [0, 1, 2, 3].map((i) => span(i, `Statement number ${i} here.`, i * 10));
    const fields = extractor.scoreIndicator(COLLABORATION, spans, [[1, 0], [0.6, 0.8], [1, 0], [1, 0]], [1, 0]);

    expect(fields.evidence.map((e) => e.startTime)).toEqual([0, 20, 30]);
    expect(fields.evidenceText).toBe("Statement number 0 here. | Statement number 2 here. | Statement number 3 here.");
    expect(fields.reasoning).toContain("4 relevant statements");
  });

  it("falls back to the sentinel and baseline without evidence", () => {
    const fields = extractor.scoreIndicator(COLLABORATION, [span(0, "I enjoy hiking on weekends.", 4)], [[0, 1]], [1, 0]);

    expect(fields).toEqual({
      aiScore: 10,
      evidence: [],
      evidenceText: NO_EVIDENCE_SENTINEL,
      reasoning:
        "No candidate statement relates to Collaboration above the 50% relevance threshold; baseline score 10 applied.",
    });
  });
});

// ─── Extraction ─────────────────────────────────────────────────────────────────

describe("SemanticEvidenceExtractor.extract", () => {
  const transcript: TranscriptSegment[] = [
    { speaker: "candidate", text: "I led the payments team for two years.", startTime: 12, endTime: 16 },
    { speaker: "candidate", text: "Most of my time went into reliability work.", startTime: 17, endTime: 20 },
  ];

  it("scores every indicator in order", async () => {
    const extractor = new SemanticEvidenceExtractor(teamProvider(), {}, createSilentLogger());
    const outcomes = await extractor.extract(transcript, [TEAMWORK, COLLABORATION]);

    expect(outcomes.map((o) => o.indicatorId)).toEqual(["team", "collab"]);
    const [team, collab] = outcomes;
    expect(team.status === "assessed" && team.fields.aiScore).toBe(90.4);
    expect(team.status === "assessed" && team.fields.evidenceText).toBe("I led the payments team for two years.");
    expect(collab.status === "assessed" && collab.fields.evidenceText).toBe(NO_EVIDENCE_SENTINEL);
  });

  it("reproduces the same fields for an unchanged transcript", async () => {
    const extractor = new SemanticEvidenceExtractor(teamProvider(), {}, createSilentLogger());
    const first = await extractor.extract(transcript, [TEAMWORK, COLLABORATION]);
    const second = await extractor.extract(transcript, [TEAMWORK, COLLABORATION]);
    expect(second).toEqual(first);
  });

  it("gives the baseline without calling the provider when the candidate said nothing", async () => {
    const provider = teamProvider();
    const extractor = new SemanticEvidenceExtractor(provider, {}, createSilentLogger());
    const outcomes = await extractor.extract(
      [{ speaker: "interviewer", text: "Are you still there?", startTime: 0, endTime: 1 }],
      [TEAMWORK],
    );

    expect(outcomes).toEqual([
      {
        status: "assessed",
        indicatorId: "team",
        fields: {
          aiScore: 10,
          evidence: [],
          evidenceText: NO_EVIDENCE_SENTINEL,
          reasoning: "No candidate statement relates to Teamwork above the 50% relevance threshold; baseline score 10 applied.",
        },
      },
    ]);
    expect(provider.embed).not.toHaveBeenCalled();
  });

  it("marks every indicator not assessed when the transcript cannot be embedded", async () => {
    const provider: EmbeddingProvider = { name: "down", embed: vi.fn().mockRejectedValue(new Error("boom")) };
    const extractor = new SemanticEvidenceExtractor(provider, {}, createSilentLogger());

    await expect(extractor.extract(transcript, [TEAMWORK, COLLABORATION])).resolves.toEqual([
      { status: "not_assessed", indicatorId: "team", reason: "Embedding transcript spans failed: boom" },
      { status: "not_assessed", indicatorId: "collab", reason: "Embedding transcript spans failed: boom" },
    ]);
  });

  it("isolates a query that cannot be embedded", async () => {
    const broken: Indicator = { id: "broken", name: "Broken", description: "", weight: 1 };
    const provider: EmbeddingProvider = {
      name: "picky",
      embed: async (texts) => {
        if (texts.includes("Broken")) throw new Error("boom");
        return teamAxis(texts);
      },
    };
    const logger = createSilentLogger();
    const extractor = new SemanticEvidenceExtractor(provider, {}, logger);

    const [team, brokenOutcome] = await extractor.extract(transcript, [TEAMWORK, broken]);

    expect(team.status).toBe("assessed");
    expect(brokenOutcome).toEqual({
      status: "not_assessed",
      indicatorId: "broken",
      reason: "Embedding query for Broken failed: boom",
    });
    expect(logger.warn).toHaveBeenCalledTimes(1);
    expect(logger.error).toHaveBeenCalledTimes(1);
  });
});
