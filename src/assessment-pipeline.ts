// Interview Signal Engine - Assessment pipeline
// Post-session batch path: transcribe the finalized audio artifact, extract
// evidence per indicator, store AI fields, and serve reports whose combined
// scores are recomputed from the current weights on every read.
//
// Run status: pending → processing → completed | failed
// A failed transcription ends the run with no assessments written. The live
// path never feeds this one; it only hands over the artifact reference.
// Reports and manual scores read the session's last completed run, so a newer
// run that is still processing or has failed does not hide it.

import { ConfigurationError, NotFoundError, SessionStateError, TranscriptionError, errorMessage } from "./errors.js";
import { KeyedMutex } from "./keyed-mutex.js";
import { createConsoleLogger, type Logger } from "./logger.js";
import { combine, overall, recommend, validateScore, type ScoringWeightsHolder } from "./score-combiner.js";
import { NEUTRAL_SENTIMENT, type SentimentAnalyzer } from "./sentiment-analyzer.js";
import type { AssessmentRepository } from "./assessment-repository.js";
import type { SemanticEvidenceExtractor } from "./evidence-extractor.js";
import type { Transcriber } from "./transcription-engine.js";
import type {
  Assessment,
  AssessmentReport,
  AssessmentRunStatus,
  Indicator,
  IndicatorOutcome,
  IndicatorReport,
  TranscriptEntry,
  TranscriptSegment,
} from "./types.js";

export type AssessmentReadyListener = (sessionId: string, indicatorId: string, assessment: Assessment) => void;

export interface AssessmentPipelineDeps {
  transcriber: Transcriber;
  extractor: SemanticEvidenceExtractor;
  repository: AssessmentRepository;
  weights: ScoringWeightsHolder;
  /** Scores transcript entries; without one every entry is neutral. */
  sentiment?: SentimentAnalyzer;
  mutex?: KeyedMutex;
  logger?: Logger;
}

interface RunRecord {
  seq: number;
  status: AssessmentRunStatus;
  indicators: Indicator[];
  outcomes: Map<string, IndicatorOutcome>;
  transcript: TranscriptEntry[];
}

/** Segments shorter than this are left out of stored transcript entries. */
const MIN_ENTRY_CHARS = 3;

/** Mutex key for one (session, indicator) pair. */
export function assessmentKey(sessionId: string, indicatorId: string): string {
  return `${sessionId}\u0000${indicatorId}`;
}

/**
 * Validate and normalize an indicator list supplied with a run.
 * @throws ConfigurationError for an empty list, duplicate or empty ids,
 * empty names, or weights that are not positive numbers.
 */
export function validateIndicators(input: unknown): Indicator[] {
  if (!Array.isArray(input) || input.length === 0) {
    throw new ConfigurationError("At least one indicator is required");
  }

  const seen = new Set<string>();
  return input.map((raw: unknown, i): Indicator => {
    if (typeof raw !== "object" || raw === null) {
      throw new ConfigurationError(`Indicator ${i} must be an object`);
    }
    const id = "id" in raw ? raw.id : undefined;
    const name = "name" in raw ? raw.name : undefined;
    const description = "description" in raw ? raw.description : undefined;
    const weight = "weight" in raw ? raw.weight : undefined;
    const keywords = "keywords" in raw ? raw.keywords : undefined;

    if (typeof id !== "string" || id.trim().length === 0) {
      throw new ConfigurationError(`Indicator ${i} has no id`);
    }
    if (seen.has(id)) throw new ConfigurationError(`Duplicate indicator id: ${id}`);
    seen.add(id);
    if (typeof name !== "string" || name.trim().length === 0) {
      throw new ConfigurationError(`Indicator ${id} has no name`);
    }
    if (typeof weight !== "number" || !Number.isFinite(weight) || weight <= 0) {
      throw new ConfigurationError(`Indicator ${id} weight must be greater than 0, got ${String(weight)}`);
    }
    if (description !== undefined && typeof description !== "string") {
      throw new ConfigurationError(`Indicator ${id} description must be a string`);
    }
    if (keywords !== undefined && (!Array.isArray(keywords) || !keywords.every((k) => typeof k === "string"))) {
      throw new ConfigurationError(`Indicator ${id} keywords must be an array of strings`);
    }

    const indicator: Indicator = { id, name: name.trim(), description: description ?? "", weight };
    if (Array.isArray(keywords)) indicator.keywords = keywords.filter((k): k is string => typeof k === "string");
    return indicator;
  });
}

export class AssessmentPipeline {
  private readonly latest = new Map<string, RunRecord>();
  private readonly completed = new Map<string, RunRecord>();
  private nextSeq = 1;
  private readonly listeners = new Set<AssessmentReadyListener>();
  private readonly mutex: KeyedMutex;
  private readonly log: Logger;

  constructor(private readonly deps: AssessmentPipelineDeps) {
    this.mutex = deps.mutex ?? new KeyedMutex();
    this.log = deps.logger ?? createConsoleLogger("AssessmentPipeline");
  }

  /** Subscribe to assessmentReady events. Returns an unsubscribe function. */
  onAssessmentReady(listener: AssessmentReadyListener): () => void {
    this.listeners.add(listener);
    return () => {
      this.listeners.delete(listener);
    };
  }

  /**
   * Transcribe, extract and store. Second and later runs for the same
   * (session, indicator) pairs queue behind earlier ones.
   * @throws ConfigurationError for invalid indicators (no run is recorded).
   * @throws TranscriptionError when transcription fails or is empty; the run is marked failed.
   */
  async run(sessionId: string, audioArtifactRef: string, indicatorInput: unknown): Promise<AssessmentReport> {
    const indicators = validateIndicators(indicatorInput);
    const record = this.startRecord(sessionId, audioArtifactRef, indicators);
    record.status.state = "processing";
    record.status.startedAt = new Date();
    this.log.info(`Assessment run for session ${sessionId} started: ${indicators.length} indicators`);

    let transcript: TranscriptSegment[];
    try {
      transcript = await this.deps.transcriber.transcribe(audioArtifactRef);
      if (!transcript.some((segment) => segment.text.trim().length > 0)) {
        throw new TranscriptionError(`Transcript is empty for session ${sessionId}`);
      }
    } catch (err) {
      this.fail(record, err);
      throw err instanceof TranscriptionError
        ? err
        : new TranscriptionError(`Transcription failed for session ${sessionId}: ${errorMessage(err)}`, { cause: err });
    }
    const keys = indicators.map((ind) => assessmentKey(sessionId, ind.id));
    try {
      record.transcript = await this.toEntries(transcript);
      await this.mutex.runExclusiveAll(keys, async () => {
        const outcomes = await this.deps.extractor.extract(transcript, indicators);
        const assessedAt = new Date();
        for (const outcome of outcomes) {
          record.outcomes.set(outcome.indicatorId, outcome);
          if (outcome.status === "not_assessed") {
            this.log.warn(`Session ${sessionId}: indicator ${outcome.indicatorId} not assessed: ${outcome.reason}`);
            continue;
          }
          const assessment = await this.deps.repository.upsertAiFields(sessionId, outcome.indicatorId, outcome.fields, assessedAt);
          this.emitReady(sessionId, outcome.indicatorId, assessment);
        }
      });
    } catch (err) {
      this.fail(record, err);
      throw err;
    }

    record.status.state = "completed";
    record.status.finishedAt = new Date();
    const previous = this.completed.get(sessionId);
    if (!previous || previous.seq < record.seq) this.completed.set(sessionId, record);
    this.log.info(`Assessment run for session ${sessionId} completed`);
    return this.buildReport(record);
  }

  /**
   * Set manual scores for indicators of the last completed run. `null` clears
   * a score. All entries are validated before any is written.
   */
  async setManualScores(sessionId: string, scores: Record<string, number | null>): Promise<AssessmentReport> {
    const record = this.completed.get(sessionId);
    if (!record) {
      const state = this.getLatest(sessionId).status.state;
      throw new SessionStateError(
        `Manual scores require a completed assessment for session ${sessionId}. Current state: "${state}".`,
      );
    }

    const entries = Object.entries(scores);
    for (const [indicatorId, score] of entries) {
      if (!record.indicators.some((ind) => ind.id === indicatorId)) {
        throw new NotFoundError(`Indicator not found in session ${sessionId}: ${indicatorId}`);
      }
      if (record.outcomes.get(indicatorId)?.status !== "assessed") {
        throw new NotFoundError(`No assessment for indicator ${indicatorId} in session ${sessionId}`);
      }
      if (score !== null) validateScore(score, `Manual score for ${indicatorId}`);
    }

    const updatedAt = new Date();
    for (const [indicatorId, score] of entries) {
      await this.mutex.runExclusive(assessmentKey(sessionId, indicatorId), () =>
        this.deps.repository.setManualScore(sessionId, indicatorId, score, updatedAt),
      );
    }
    return this.buildReport(record);
  }

  /** Status of the session's most recent run. */
  getStatus(sessionId: string): AssessmentRunStatus {
    return { ...this.getLatest(sessionId).status };
  }

  /**
   * Report of the last completed run, or of the most recent run when none has
   * completed yet. Scores are recomputed from the current weights.
   */
  async getReport(sessionId: string): Promise<AssessmentReport> {
    return this.buildReport(this.completed.get(sessionId) ?? this.getLatest(sessionId));
  }

  // ─── Internals ──────────────────────────────────────────────────────────────

  /** Weights are read once so the whole report uses one pair. */
  private async buildReport(record: RunRecord): Promise<AssessmentReport> {
    const { sessionId } = record.status;
    const weights = this.deps.weights.current();

    const aiScores = new Map<string, number>();
    const combinedScores = new Map<string, number>();
    const indicators: IndicatorReport[] = [];

    for (const indicator of record.indicators) {
      const outcome = record.outcomes.get(indicator.id);
      const assessment =
        outcome?.status === "assessed" ? await this.deps.repository.get(sessionId, indicator.id) : null;

      if (!assessment) {
        indicators.push({
          indicatorId: indicator.id,
          indicatorName: indicator.name,
          weight: indicator.weight,
          status: "not_assessed",
          aiScore: null,
          manualScore: null,
          combinedScore: null,
          evidence: [],
          evidenceText: null,
          reasoning: outcome?.status === "not_assessed" ? outcome.reason : null,
        });
        continue;
      }

      const combinedScore = combine(assessment.aiScore, assessment.manualScore, weights);
      aiScores.set(indicator.id, assessment.aiScore);
      combinedScores.set(indicator.id, combinedScore);
      indicators.push({
        indicatorId: indicator.id,
        indicatorName: indicator.name,
        weight: indicator.weight,
        status: "assessed",
        aiScore: assessment.aiScore,
        manualScore: assessment.manualScore,
        combinedScore,
        evidence: assessment.evidence,
        evidenceText: assessment.evidenceText,
        reasoning: assessment.reasoning,
      });
    }

    const overallScore = overall(combinedScores, record.indicators);
    return {
      sessionId,
      status: { ...record.status },
      weights,
      indicators,
      overallAiScore: overall(aiScores, record.indicators),
      overallScore,
      recommendation: recommend(overallScore),
      transcript: record.transcript,
    };
  }

  private async toEntries(transcript: TranscriptSegment[]): Promise<TranscriptEntry[]> {
    const kept = transcript.filter((segment) => segment.text.trim().length >= MIN_ENTRY_CHARS);
    const sentiments = this.deps.sentiment
      ? await this.deps.sentiment.analyze(kept.map((segment) => segment.text))
      : kept.map(() => NEUTRAL_SENTIMENT);
    return kept.map((segment, i) => ({
      ...segment,
      text: segment.text.trim(),
      sentiment: sentiments[i] ?? NEUTRAL_SENTIMENT,
    }));
  }

  private startRecord(sessionId: string, audioArtifactRef: string, indicators: Indicator[]): RunRecord {
    const record: RunRecord = {
      seq: this.nextSeq++,
      status: {
        sessionId,
        state: "pending",
        audioArtifactRef,
        startedAt: null,
        finishedAt: null,
        error: null,
      },
      indicators,
      outcomes: new Map(),
      transcript: [],
    };
    this.latest.set(sessionId, record);
    return record;
  }

  private getLatest(sessionId: string): RunRecord {
    const record = this.latest.get(sessionId);
    if (!record) {
      throw new NotFoundError(`No assessment run for session: ${sessionId}`);
    }
    return record;
  }

  private fail(record: RunRecord, err: unknown): void {
    record.status.state = "failed";
    record.status.finishedAt = new Date();
    record.status.error = errorMessage(err);
    this.log.error(`Assessment run for session ${record.status.sessionId} failed: ${record.status.error}`);
  }

  private emitReady(sessionId: string, indicatorId: string, assessment: Assessment): void {
    for (const listener of this.listeners) {
      try {
        listener(sessionId, indicatorId, assessment);
      } catch (err) {
        this.log.warn(`assessmentReady listener failed for ${sessionId}/${indicatorId}: ${errorMessage(err)}`);
      }
    }
  }
}
