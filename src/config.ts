// Interview Signal Engine - Environment configuration
// Parses process.env (loaded from .env by the entry point) into typed config.
// Every setting has a default; malformed values throw ConfigurationError.

import { ConfigurationError } from "./errors.js";
import { DEFAULT_AGGREGATOR_CONFIG } from "./emotion-aggregator.js";
import { DEFAULT_INGRESS_CONFIG } from "./frame-ingress.js";
import { DEFAULT_SESSION_CONTROLLER_CONFIG } from "./session-controller.js";
import { DEFAULT_SCORING_WEIGHTS, validateWeights } from "./score-combiner.js";
import type {
  AggregatorConfig,
  IngressConfig,
  ScoringWeights,
  SessionControllerConfig,
} from "./types.js";

export type TranscriptionProvider = "openai" | "deepgram";

export interface AppConfig {
  port: number;
  openaiApiKey: string | null;
  deepgramApiKey: string | null;
  transcriptionProvider: TranscriptionProvider;
  openaiTranscribeModel: string;
  openaiEmbeddingModel: string;
  transcriptLanguage: string;
  /** Diarized speaker index that is the candidate (Deepgram only). */
  candidateSpeakerIndex: number;
  emotionServiceUrl: string | null;
  recordingsDir: string;
  emotionLogDir: string;
  weights: ScoringWeights;
  aggregator: AggregatorConfig;
  ingress: IngressConfig;
  session: SessionControllerConfig;
}

type Env = Record<string, string | undefined>;

// ─── Parsers ────────────────────────────────────────────────────────────────────

function readString(env: Env, key: string, fallback: string): string {
  const raw = env[key]?.trim();
  return raw ? raw : fallback;
}

function readOptional(env: Env, key: string): string | null {
  const raw = env[key]?.trim();
  return raw ? raw : null;
}

function readNumber(
  env: Env,
  key: string,
  fallback: number,
  check: { min?: number; integer?: boolean; positive?: boolean } = {},
): number {
  const raw = env[key]?.trim();
  if (!raw) return fallback;

  const value = Number(raw);
  if (!Number.isFinite(value)) {
    throw new ConfigurationError(`${key} must be a number, got "${raw}"`);
  }
  if (check.integer && !Number.isInteger(value)) {
    throw new ConfigurationError(`${key} must be an integer, got "${raw}"`);
  }
  if (check.positive && value <= 0) {
    throw new ConfigurationError(`${key} must be greater than 0, got "${raw}"`);
  }
  if (check.min !== undefined && value < check.min) {
    throw new ConfigurationError(`${key} must be at least ${check.min}, got "${raw}"`);
  }
  return value;
}

/** `null` (any case) selects the null policy; otherwise a number in [0, 1]. */
function readEmptyWindowStability(env: Env): number | null {
  const raw = env.EMPTY_WINDOW_STABILITY?.trim();
  if (!raw) return DEFAULT_AGGREGATOR_CONFIG.emptyWindowStability;
  if (raw.toLowerCase() === "null") return null;

  const value = Number(raw);
  if (!Number.isFinite(value) || value < 0 || value > 1) {
    throw new ConfigurationError(`EMPTY_WINDOW_STABILITY must be "null" or a number in [0, 1], got "${raw}"`);
  }
  return value;
}

function readProvider(env: Env): TranscriptionProvider {
  const raw = readString(env, "TRANSCRIPTION_PROVIDER", "openai").toLowerCase();
  if (raw === "openai" || raw === "deepgram") return raw;
  throw new ConfigurationError(`TRANSCRIPTION_PROVIDER must be "openai" or "deepgram", got "${raw}"`);
}

// ─── Loader ─────────────────────────────────────────────────────────────────────

export function loadConfig(env: Env = process.env): AppConfig {
  const weights: ScoringWeights = {
    aiWeight: readNumber(env, "AI_SCORE_WEIGHT", DEFAULT_SCORING_WEIGHTS.aiWeight, { min: 0 }),
    manualWeight: readNumber(env, "MANUAL_SCORE_WEIGHT", DEFAULT_SCORING_WEIGHTS.manualWeight, { min: 0 }),
  };
  validateWeights(weights);

  const transcriptionProvider = readProvider(env);
  const deepgramApiKey = readOptional(env, "DEEPGRAM_API_KEY");
  const openaiApiKey = readOptional(env, "OPENAI_API_KEY");
  if (transcriptionProvider === "openai" && !openaiApiKey) {
    throw new ConfigurationError("OPENAI_API_KEY is required when TRANSCRIPTION_PROVIDER=openai");
  }
  if (transcriptionProvider === "deepgram" && !deepgramApiKey) {
    throw new ConfigurationError("DEEPGRAM_API_KEY is required when TRANSCRIPTION_PROVIDER=deepgram");
  }

  return {
    port: readNumber(env, "PORT", 3000, { integer: true, min: 0 }),
    openaiApiKey,
    deepgramApiKey,
    transcriptionProvider,
    openaiTranscribeModel: readString(env, "OPENAI_TRANSCRIBE_MODEL", "whisper-1"),
    openaiEmbeddingModel: readString(env, "OPENAI_EMBEDDING_MODEL", "text-embedding-3-small"),
    transcriptLanguage: readString(env, "TRANSCRIPT_LANGUAGE", "en"),
    candidateSpeakerIndex: readNumber(env, "DEEPGRAM_CANDIDATE_SPEAKER", 0, { integer: true, min: 0 }),
    emotionServiceUrl: readOptional(env, "EMOTION_SERVICE_URL"),
    recordingsDir: readString(env, "RECORDINGS_DIR", "storage/recordings"),
    emotionLogDir: readString(env, "EMOTION_LOG_DIR", "storage/emotion-logs"),
    weights,
    aggregator: {
      ...DEFAULT_AGGREGATOR_CONFIG,
      windowSeconds: readNumber(env, "STABILITY_WINDOW_SECONDS", DEFAULT_AGGREGATOR_CONFIG.windowSeconds, {
        positive: true,
      }),
      emptyWindowStability: readEmptyWindowStability(env),
    },
    ingress: {
      ...DEFAULT_INGRESS_CONFIG,
      videoSampleRate: readNumber(env, "VIDEO_SAMPLE_RATE", DEFAULT_INGRESS_CONFIG.videoSampleRate, {
        positive: true,
      }),
      audioWindowSeconds: readNumber(env, "AUDIO_WINDOW_SECONDS", DEFAULT_INGRESS_CONFIG.audioWindowSeconds, {
        positive: true,
      }),
    },
    session: {
      ...DEFAULT_SESSION_CONTROLLER_CONFIG,
      drainTimeoutMs: readNumber(env, "DETECTOR_DRAIN_TIMEOUT_MS", DEFAULT_SESSION_CONTROLLER_CONFIG.drainTimeoutMs, {
        min: 0,
      }),
    },
  };
}
