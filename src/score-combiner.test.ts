import { describe, it, expect } from "vitest";
import fc from "fast-check";
import {
  DEFAULT_SCORING_WEIGHTS,
  ScoringWeightsHolder,
  combine,
  overall,
  recommend,
  validateScore,
  validateWeights,
} from "./score-combiner.js";
import { ConfigurationError } from "./errors.js";
import type { Indicator } from "./types.js";

const INDICATORS: Indicator[] = [
  { id: "a", name: "Ownership", description: "", weight: 1 },
  { id: "b", name: "Communication", description: "", weight: 3 },
  { id: "c", name: "Curiosity", description: "", weight: 2 },
];

describe("combine", () => {
  it("returns the AI score when no manual score was entered", () => {
    expect(combine(70, null, DEFAULT_SCORING_WEIGHTS)).toBe(70);
    expect(combine(70, undefined, DEFAULT_SCORING_WEIGHTS)).toBe(70);
    expect(combine(70, 0, DEFAULT_SCORING_WEIGHTS)).toBe(70);
  });

  it("blends AI and manual scores by weight", () => {
    expect(combine(70, 80, DEFAULT_SCORING_WEIGHTS)).toBe(74);
    expect(combine(70, 80, { aiWeight: 70, manualWeight: 30 })).toBe(73);
    expect(combine(85.5, 62, DEFAULT_SCORING_WEIGHTS)).toBe(76.1);
    expect(combine(40, 90, { aiWeight: 0, manualWeight: 100 })).toBe(90);
  });

  it("rejects invalid weights", () => {
    expect(() => combine(70, 80, { aiWeight: 70, manualWeight: 40 })).toThrow(ConfigurationError);
  });

  it("stays between the AI and manual scores", () => {
    fc.assert(
      fc.property(
        fc.integer({ min: 0, max: 100 }),
        fc.integer({ min: 1, max: 100 }),
        fc.integer({ min: 0, max: 100 }),
        (ai, manual, aiWeight) => {
          const combined = combine(ai, manual, { aiWeight, manualWeight: 100 - aiWeight });
          expect(combined).toBeGreaterThanOrEqual(Math.min(ai, manual));
          expect(combined).toBeLessThanOrEqual(Math.max(ai, manual));
        },
      ),
    );
  });
});

describe("overall", () => {
  it("weights each indicator's score by its weight", () => {
    expect(overall(new Map([["a", 80], ["b", 50]]), INDICATORS)).toBe(57.5);
  });

  it("ignores scores for indicators outside the list", () => {
    expect(overall(new Map([["c", 60], ["zzz", 0]]), INDICATORS)).toBe(60);
  });

  it("is null when nothing is scored", () => {
    expect(overall(new Map(), INDICATORS)).toBeNull();
  });
});

describe("validateWeights and validateScore", () => {
  it("accepts pairs summing to exactly 100", () => {
    expect(() => validateWeights({ aiWeight: 70, manualWeight: 30 })).not.toThrow();
    expect(() => validateWeights({ aiWeight: 100, manualWeight: 0 })).not.toThrow();
  });

  it("rejects other pairs without normalizing", () => {
    expect(() => validateWeights({ aiWeight: 70, manualWeight: 40 })).toThrow(
      "Scoring weights must sum to 100, got 70 + 40 = 110",
    );
    expect(() => validateWeights({ aiWeight: 120, manualWeight: -20 })).toThrow("must not be negative");
    expect(() => validateWeights({ aiWeight: Number.NaN, manualWeight: 100 })).toThrow("must be finite");
  });

  it("checks scores are within [0, 100]", () => {
    expect(() => validateScore(0)).not.toThrow();
    expect(() => validateScore(100)).not.toThrow();
    expect(() => validateScore(100.5, "manualScore")).toThrow("manualScore must be a number between 0 and 100, got 100.5");
    expect(() => validateScore(Number.POSITIVE_INFINITY)).toThrow(ConfigurationError);
  });
});

describe("recommend", () => {
  it.each([
    [100, "recommended"],
    [80, "recommended"],
    [79.9, "consider"],
    [60, "consider"],
    [59.9, "not_recommended"],
    [0, "not_recommended"],
  ])("puts %s in the %s band", (score, band) => {
    expect(recommend(score)).toBe(band);
  });

  it("has no band when nothing was scored", () => {
    expect(recommend(null)).toBeNull();
  });
});

describe("ScoringWeightsHolder", () => {
  it("starts from the defaults", () => {
    expect(new ScoringWeightsHolder().current()).toEqual({ aiWeight: 60, manualWeight: 40 });
  });

  it("swaps in a valid pair as one frozen object", () => {
    const holder = new ScoringWeightsHolder();
    const before = holder.current();

    expect(holder.update({ aiWeight: 70, manualWeight: 30 })).toEqual({ aiWeight: 70, manualWeight: 30 });
    expect(holder.current()).not.toBe(before);
    expect(Object.isFrozen(holder.current())).toBe(true);
    expect(before).toEqual({ aiWeight: 60, manualWeight: 40 });
  });

  it("keeps the previous pair when an update is invalid", () => {
    const holder = new ScoringWeightsHolder({ aiWeight: 50, manualWeight: 50 });
    expect(() => holder.update({ aiWeight: 70, manualWeight: 40 })).toThrow(ConfigurationError);
    expect(holder.current()).toEqual({ aiWeight: 50, manualWeight: 50 });
  });

  it("rejects invalid initial weights", () => {
    expect(() => new ScoringWeightsHolder({ aiWeight: 10, manualWeight: 10 })).toThrow(ConfigurationError);
  });
});
