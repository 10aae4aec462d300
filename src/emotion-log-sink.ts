// Interview Signal Engine - Emotion log persistence
// The session controller hands each finalized EmotionSample log to an
// EmotionLogSink. The file sink writes one JSON document per session with the
// samples in arrival order plus a per-modality label summary.

import { mkdir, writeFile } from "node:fs/promises";
import { join } from "node:path";
import { v4 as uuidv4 } from "uuid";
import { createConsoleLogger, type Logger } from "./logger.js";
import { MODALITIES, type EmotionSample, type Modality } from "./types.js";

export interface EmotionLogSink {
  /** Persist the full log. Returns a reference to the stored log, if any. */
  persist(sessionId: string, samples: readonly EmotionSample[]): Promise<string | null>;
}

export interface ModalitySummary {
  sampleCount: number;
  labelCounts: Record<string, number>;
  averageConfidence: number | null;
}

export interface EmotionLogDocument {
  sessionId: string;
  persistedAt: string;
  sampleCount: number;
  summary: Record<Modality, ModalitySummary>;
  samples: EmotionSample[];
}

export function summarizeSamples(samples: readonly EmotionSample[]): Record<Modality, ModalitySummary> {
  const summary: Record<Modality, ModalitySummary> = {
    facial: { sampleCount: 0, labelCounts: {}, averageConfidence: null },
    voice: { sampleCount: 0, labelCounts: {}, averageConfidence: null },
  };

  for (const modality of MODALITIES) {
    const ofModality = samples.filter((s) => s.modality === modality);
    if (ofModality.length === 0) continue;

    const labelCounts: Record<string, number> = {};
    let confidenceSum = 0;
    for (const sample of ofModality) {
      labelCounts[sample.label] = (labelCounts[sample.label] ?? 0) + 1;
      confidenceSum += sample.confidence;
    }
    summary[modality] = {
      sampleCount: ofModality.length,
      labelCounts,
      averageConfidence: confidenceSum / ofModality.length,
    };
  }
  return summary;
}

export function buildEmotionLogDocument(
  sessionId: string,
  samples: readonly EmotionSample[],
  persistedAt: Date = new Date(),
): EmotionLogDocument {
  return {
    sessionId,
    persistedAt: persistedAt.toISOString(),
    sampleCount: samples.length,
    summary: summarizeSamples(samples),
    samples: [...samples],
  };
}

export class FileEmotionLogSink implements EmotionLogSink {
  private readonly log: Logger;

  constructor(
    private readonly outputDir: string,
    logger?: Logger,
  ) {
    this.log = logger ?? createConsoleLogger("EmotionLogSink");
  }

  async persist(sessionId: string, samples: readonly EmotionSample[]): Promise<string> {
    await mkdir(this.outputDir, { recursive: true });
    const safeId = sessionId.replace(/[^\w-]/g, "_");
    const filePath = join(this.outputDir, `${safeId}_${uuidv4()}_emotions.json`);
    const doc = buildEmotionLogDocument(sessionId, samples);
    await writeFile(filePath, JSON.stringify(doc, null, 2), "utf-8");
    this.log.info(`Persisted ${samples.length} emotion samples for session ${sessionId} to ${filePath}`);
    return filePath;
  }
}

/** Keeps persisted logs in memory. */
export class InMemoryEmotionLogSink implements EmotionLogSink {
  private readonly logs = new Map<string, EmotionSample[]>();

  async persist(sessionId: string, samples: readonly EmotionSample[]): Promise<string> {
    this.logs.set(sessionId, [...samples]);
    return `memory:${sessionId}`;
  }

  get(sessionId: string): readonly EmotionSample[] | undefined {
    return this.logs.get(sessionId);
  }
}
