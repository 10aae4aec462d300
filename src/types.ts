// Interview Signal Engine - Shared TypeScript interfaces and types

// ─── Session State Machine ──────────────────────────────────────────────────────

export enum SessionState {
  IDLE = "idle",
  OPEN = "open",
  CLOSING = "closing",
  CLOSED = "closed",
}

// ─── Session ────────────────────────────────────────────────────────────────────

export interface Session {
  id: string;
  state: SessionState;
  startedAt: Date | null;
  endedAt: Date | null;
  finalAudioArtifactRef: string | null;
}

// ─── Emotion Samples and Snapshots ──────────────────────────────────────────────

export type Modality = "facial" | "voice";

export const MODALITIES: readonly Modality[] = ["facial", "voice"];

export interface EmotionSample {
  readonly sessionId: string;
  readonly timestampSeconds: number; // client clock, seconds since capture start
  readonly modality: Modality;
  readonly label: string;
  readonly confidence: number; // 0.0-1.0
}

/** What a detector adapter returns for one frame or audio window. */
export interface EmotionDetection {
  label: string;
  confidence: number;
}

export interface ModalitySnapshot {
  label: string | null; // dominant label in the stability window
  confidence: number | null; // latest sample's confidence, not an average
  stability: number | null; // null only under the "null" empty-window policy
  sampleCount: number; // samples currently inside the window
  lastTimestampSeconds: number | null;
}

export interface EmotionSnapshot {
  sessionId: string;
  facial: ModalitySnapshot;
  voice: ModalitySnapshot;
  totalSamples: number;
}

// ─── Live Pipeline Statistics ───────────────────────────────────────────────────

export interface ModalityStats {
  framesReceived: number;
  framesRejected: number; // malformed payloads, timestamp regressions
  framesSkippedBySampler: number;
  framesDroppedBusy: number; // a detection for this modality was still pending
  detectionsCompleted: number;
  detectionsEmpty: number; // detector saw no face / no voiced audio
  detectorFailures: number;
  detectionsCancelled: number;
}

export interface SessionStats {
  facial: ModalityStats;
  voice: ModalityStats;
  framesDroppedAfterClose: number;
  samplesRecorded: number;
  samplesRejected: number;
  updatesDelivered: number;
  updatesCoalesced: number;
}

export type CloseReason = "close" | "abort";

export interface FinalizedSession {
  sessionId: string;
  audioArtifactRef: string | null;
  sampleCount: number;
  startedAt: Date;
  endedAt: Date;
  closedBy: CloseReason;
  emotionLogPersisted: boolean;
  stats: SessionStats;
}

// ─── Indicators and Assessments ─────────────────────────────────────────────────

export interface Indicator {
  id: string;
  name: string;
  description: string;
  weight: number; // > 0
  keywords?: string[]; // exact-match terms in addition to the indicator name
}

export interface TranscriptSegment {
  speaker: string; // "candidate" | "interviewer" | provider speaker label
  text: string;
  startTime: number; // seconds from recording start
  endTime: number;
  confidence?: number;
}

export type SentimentLabel = "positive" | "neutral" | "negative";

export interface Sentiment {
  score: number; // 0.0 negative, 0.5 neutral, 1.0 positive
  label: SentimentLabel;
  confidence: number;
}

/** A transcript segment as stored with a run, with its sentiment. */
export interface TranscriptEntry extends TranscriptSegment {
  sentiment: Sentiment;
}

export interface EvidenceSpan {
  text: string;
  startTime: number;
  relevance: number; // 0.0-1.0
  exactMatch: boolean;
}

export interface Assessment {
  sessionId: string;
  indicatorId: string;
  aiScore: number; // 0-100
  manualScore: number | null; // 0-100, null when not entered
  evidence: EvidenceSpan[];
  evidenceText: string; // spans joined by EVIDENCE_SEPARATOR, or the no-evidence sentinel
  reasoning: string;
  assessedAt: Date;
  manualUpdatedAt: Date | null;
}

/** AI-side fields produced by the extractor. Never carries a manual score. */
export type AiAssessmentFields = Pick<Assessment, "aiScore" | "evidence" | "evidenceText" | "reasoning">;

export type IndicatorOutcome =
  | { status: "assessed"; indicatorId: string; fields: AiAssessmentFields }
  | { status: "not_assessed"; indicatorId: string; reason: string };

export interface ScoringWeights {
  readonly aiWeight: number;
  readonly manualWeight: number;
}

// ─── Assessment Runs and Reports ────────────────────────────────────────────────

export type AssessmentRunState = "pending" | "processing" | "completed" | "failed";

export interface AssessmentRunStatus {
  sessionId: string;
  state: AssessmentRunState;
  audioArtifactRef: string | null;
  startedAt: Date | null;
  finishedAt: Date | null;
  error: string | null;
}

export interface IndicatorReport {
  indicatorId: string;
  indicatorName: string;
  weight: number;
  status: "assessed" | "not_assessed";
  aiScore: number | null;
  manualScore: number | null;
  combinedScore: number | null; // always recomputed from current weights
  evidence: EvidenceSpan[];
  evidenceText: string | null;
  reasoning: string | null;
}

/** Hiring recommendation band derived from the overall score. */
export type HiringRecommendation = "recommended" | "consider" | "not_recommended";

export interface AssessmentReport {
  sessionId: string;
  status: AssessmentRunStatus;
  weights: ScoringWeights;
  indicators: IndicatorReport[];
  overallAiScore: number | null;
  overallScore: number | null;
  recommendation: HiringRecommendation | null; // null when nothing is scored
  transcript: TranscriptEntry[];
}

// ─── Configuration ──────────────────────────────────────────────────────────────

export interface AggregatorConfig {
  windowSeconds: number; // rolling stability window; default: 30
  maxWindowSamples: number; // cap on samples considered per window; default: 100
  emptyWindowStability: number | null; // policy for an empty window; default: 1.0
}

export interface IngressConfig {
  videoSampleRate: number; // frames per second sent to the facial detector; default: 2
  audioSampleRate: number; // PCM sample rate; default: 16000
  audioWindowSeconds: number; // voice detector window; default: 1.0
  maxVideoPayloadBytes: number; // default: 2 MB
  maxAudioPayloadBytes: number; // default: 256 KB
}

export interface SessionControllerConfig {
  drainTimeoutMs: number; // bounded wait per in-flight detector call at close; default: 300
  closedRetentionMs: number; // how long CLOSED sessions stay queryable; default: 10 min
}

export interface ExtractionConfig {
  candidateSpeaker: string; // default: "candidate"
  maxEvidence: number; // top-K spans; default: 3
  relevanceThreshold: number; // default: 0.5
  exactMatchRelevance: number; // relevance floor for direct keyword mentions; default: 0.95
  baselineScore: number; // aiScore when no span qualifies; default: 10
  minSpanChars: number; // default: 15
  introPatterns: RegExp[]; // greeting-only sentences excluded from candidates
}

// ─── Wire Protocol ──────────────────────────────────────────────────────────────

export interface FrameHeader {
  timestamp: number; // seconds since client-side capture start
  seq: number;
}

export interface VideoFrameHeader extends FrameHeader {
  width?: number;
  height?: number;
}

// Client → Server messages
export type ClientMessage =
  | { type: "video_frame"; data: string; timestamp: number }
  | { type: "audio_chunk"; data: string; timestamp: number }
  | { type: "get_snapshot" }
  | { type: "end_session" };

// Server → Client messages
export type ServerMessage =
  | { type: "session_opened"; sessionId: string }
  | { type: "emotion_update"; data: EmotionSnapshot }
  | { type: "snapshot"; data: EmotionSnapshot }
  | { type: "session_closed"; data: FinalizedSession }
  | {
      type: "assessment_ready";
      data: { sessionId: string; indicatorId: string; assessment: Assessment };
    }
  | { type: "error"; message: string; recoverable: boolean };
