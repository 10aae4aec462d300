// Interview Signal Engine - Emotion Aggregator
//
// Owns a session's append-only EmotionSample log and derives live snapshots
// from it. Stability for a modality is the share of samples in the rolling
// window that carry the window's most frequent label.
//
// The window is anchored on the modality's latest sample rather than the wall
// clock, so a detector that goes quiet leaves the last label, confidence and
// stability in place instead of decaying them.

import { ConfigurationError } from "./errors.js";
import { createConsoleLogger, type Logger } from "./logger.js";
import {
  MODALITIES,
  type AggregatorConfig,
  type EmotionSample,
  type EmotionSnapshot,
  type Modality,
  type ModalitySnapshot,
} from "./types.js";
import { clamp } from "./utils.js";

export const DEFAULT_AGGREGATOR_CONFIG: AggregatorConfig = {
  windowSeconds: 30,
  maxWindowSamples: 100,
  emptyWindowStability: 1.0,
};

export class EmotionAggregator {
  private readonly config: AggregatorConfig;
  private readonly log: Logger;
  private readonly all: EmotionSample[] = [];
  private readonly byModality: Record<Modality, EmotionSample[]> = { facial: [], voice: [] };

  constructor(
    readonly sessionId: string,
    config?: Partial<AggregatorConfig>,
    logger?: Logger,
  ) {
    this.config = { ...DEFAULT_AGGREGATOR_CONFIG, ...config };
    this.log = logger ?? createConsoleLogger("EmotionAggregator");
    validateWindowSeconds(this.config.windowSeconds);
    if (!Number.isInteger(this.config.maxWindowSamples) || this.config.maxWindowSamples < 1) {
      throw new ConfigurationError(`maxWindowSamples must be a positive integer, got ${this.config.maxWindowSamples}`);
    }
    const empty = this.config.emptyWindowStability;
    if (empty !== null && !(empty >= 0 && empty <= 1)) {
      throw new ConfigurationError(`emptyWindowStability must be null or within [0, 1], got ${empty}`);
    }
  }

  // ─── Recording ──────────────────────────────────────────────────────────────

  /**
   * Append a sample. Confidence is clamped into [0, 1]. Returns null (and logs)
   * for an empty label, a non-finite value, or a timestamp earlier than the
   * modality's previous sample.
   */
  record(modality: Modality, label: string, confidence: number, timestamp: number): EmotionSample | null {
    const trimmed = typeof label === "string" ? label.trim() : "";
    const previous = MODALITIES.includes(modality) ? this.latest(modality) : undefined;

    let problem: string | null = null;
    if (!MODALITIES.includes(modality)) problem = `unknown modality "${String(modality)}"`;
    else if (trimmed.length === 0) problem = "empty label";
    else if (!Number.isFinite(confidence)) problem = `non-finite confidence ${confidence}`;
    else if (!Number.isFinite(timestamp) || timestamp < 0) problem = `invalid timestamp ${timestamp}`;
    else if (previous && timestamp < previous.timestampSeconds) {
      problem = `timestamp ${timestamp} precedes previous ${previous.timestampSeconds}`;
    }

    if (problem) {
      this.log.warn(`Session ${this.sessionId}: ${modality} sample rejected: ${problem}`);
      return null;
    }

    const sample: EmotionSample = Object.freeze({
      sessionId: this.sessionId,
      timestampSeconds: timestamp,
      modality,
      label: trimmed,
      confidence: clamp(confidence, 0, 1),
    });
    this.all.push(sample);
    this.byModality[modality].push(sample);
    return sample;
  }

  // ─── Window Queries ─────────────────────────────────────────────────────────

  /**
   * Fraction of window samples sharing the modal label. A single sample gives
   * 1.0; an empty window gives the configured `emptyWindowStability`.
   */
  stability(modality: Modality, windowSeconds: number = this.config.windowSeconds): number | null {
    const window = this.window(modality, windowSeconds);
    if (window.length === 0) return this.config.emptyWindowStability;
    const { count } = modalLabel(window);
    return count / window.length;
  }

  /** Most frequent label in the window; ties go to the most recently seen label. */
  dominantLabel(modality: Modality, windowSeconds: number = this.config.windowSeconds): string | null {
    const window = this.window(modality, windowSeconds);
    return window.length === 0 ? null : modalLabel(window).label;
  }

  snapshot(): EmotionSnapshot {
    return {
      sessionId: this.sessionId,
      facial: this.modalitySnapshot("facial"),
      voice: this.modalitySnapshot("voice"),
      totalSamples: this.all.length,
    };
  }

  // ─── Log Access ─────────────────────────────────────────────────────────────

  samples(): readonly EmotionSample[] {
    return this.all.slice();
  }

  // ─── Internals ──────────────────────────────────────────────────────────────

  private latest(modality: Modality): EmotionSample | undefined {
    const list = this.byModality[modality];
    return list[list.length - 1];
  }

  /**
   * Samples within `windowSeconds` of the modality's latest sample, capped at
   * the most recent `maxWindowSamples`, in arrival order.
   */
  private window(modality: Modality, windowSeconds: number): EmotionSample[] {
    validateWindowSeconds(windowSeconds);
    const list = this.byModality[modality];
    const last = list[list.length - 1];
    if (!last) return [];

    const cutoff = last.timestampSeconds - windowSeconds;
    let start = list.length;
    while (
      start > 0 &&
      list.length - start < this.config.maxWindowSamples &&
      list[start - 1].timestampSeconds >= cutoff
    ) {
      start--;
    }
    return list.slice(start);
  }

  private modalitySnapshot(modality: Modality): ModalitySnapshot {
    const window = this.window(modality, this.config.windowSeconds);
    const last = window[window.length - 1];
    return {
      label: window.length === 0 ? null : modalLabel(window).label,
      confidence: last ? last.confidence : null,
      stability: window.length === 0 ? this.config.emptyWindowStability : modalLabel(window).count / window.length,
      sampleCount: window.length,
      lastTimestampSeconds: last ? last.timestampSeconds : null,
    };
  }
}

function validateWindowSeconds(windowSeconds: number): void {
  if (!Number.isFinite(windowSeconds) || windowSeconds <= 0) {
    throw new ConfigurationError(`windowSeconds must be a positive number, got ${windowSeconds}`);
  }
}

/** Modal label of a non-empty window and its count. */
function modalLabel(window: readonly EmotionSample[]): { label: string; count: number } {
  const counts = new Map<string, { count: number; lastIndex: number }>();
  window.forEach((sample, index) => {
    const entry = counts.get(sample.label);
    if (entry) {
      entry.count++;
      entry.lastIndex = index;
    } else {
      counts.set(sample.label, { count: 1, lastIndex: index });
    }
  });

  let best = { label: window[window.length - 1].label, count: 0, lastIndex: -1 };
  for (const [label, entry] of counts) {
    if (entry.count > best.count || (entry.count === best.count && entry.lastIndex > best.lastIndex)) {
      best = { label, ...entry };
    }
  }
  return { label: best.label, count: best.count };
}
