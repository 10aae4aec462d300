// Interview Signal Engine - Emotion detector adapters
//
// Detectors are opaque: an image or a PCM window goes in, a (label, confidence)
// pair or null (no face / no voiced audio) comes out. Each call receives an
// AbortSignal so the session can cancel it at close.
//
// Implementations:
//   - HttpEmotionDetector: posts to an external model service over HTTP
//   - AcousticVoiceDetector: in-process energy / zero-crossing heuristic
//   - DisabledEmotionDetector: no model configured, every call detects nothing

import axios, { type AxiosInstance } from "axios";
import { DetectorUnavailableError, errorMessage } from "./errors.js";
import { encodeWav } from "./audio-recorder.js";
import { clamp, roundTo } from "./utils.js";
import type { EmotionDetection, Modality } from "./types.js";

// ─── Interfaces ─────────────────────────────────────────────────────────────────

export interface EmotionDetector {
  readonly modality: Modality;
  detect(input: Buffer, signal: AbortSignal): Promise<EmotionDetection | null>;
}

/** Takes an encoded JPEG/PNG frame. */
export interface FacialEmotionDetector extends EmotionDetector {
  readonly modality: "facial";
}

/** Takes a window of 16-bit LE mono PCM. */
export interface VoiceEmotionDetector extends EmotionDetector {
  readonly modality: "voice";
}

// ─── Response Parsing ───────────────────────────────────────────────────────────

/**
 * Parse a model service response. Accepts `{ label, confidence }` or the
 * `{ dominant_emotion, confidence, face_detected }` shape. A null label or
 * `face_detected: false` means nothing was detected. Confidence above 1 is
 * read as a percentage.
 */
export function parseDetectionResponse(data: unknown): EmotionDetection | null {
  if (typeof data !== "object" || data === null) {
    throw new Error("Detector response is not an object");
  }
  if ("face_detected" in data && data.face_detected === false) return null;

  const label = "label" in data ? data.label : "dominant_emotion" in data ? data.dominant_emotion : undefined;
  if (label === null) return null;
  if (typeof label !== "string" || label.trim().length === 0) {
    throw new Error("Detector response has no label");
  }

  const raw = "confidence" in data ? data.confidence : undefined;
  if (typeof raw !== "number" || !Number.isFinite(raw) || raw < 0) {
    throw new Error(`Detector response has invalid confidence for "${label}"`);
  }
  const confidence = raw > 1 ? raw / 100 : raw;

  return { label: label.trim().toLowerCase(), confidence: clamp(confidence, 0, 1) };
}

// ─── HTTP Adapter ───────────────────────────────────────────────────────────────

export interface HttpEmotionDetectorOptions {
  baseUrl: string;
  /** Per-request timeout. Default: 5000 ms */
  timeoutMs?: number;
  /** PCM sample rate for voice windows. Default: 16000 */
  sampleRate?: number;
  http?: AxiosInstance;
}

/**
 * Adapter for a model service exposing
 *   POST {baseUrl}/facial/analyze  (multipart "file": image)
 *   POST {baseUrl}/voice/analyze   (multipart "file": WAV)
 */
export class HttpEmotionDetector<M extends Modality = Modality> implements EmotionDetector {
  private readonly http: AxiosInstance;
  private readonly baseUrl: string;
  private readonly timeoutMs: number;
  private readonly sampleRate: number;

  constructor(
    readonly modality: M,
    options: HttpEmotionDetectorOptions,
  ) {
    this.baseUrl = options.baseUrl.replace(/\/+$/, "");
    this.timeoutMs = options.timeoutMs ?? 5000;
    this.sampleRate = options.sampleRate ?? 16000;
    this.http = options.http ?? axios.create();
  }

  async detect(input: Buffer, signal: AbortSignal): Promise<EmotionDetection | null> {
    const form = new FormData();
    if (this.modality === "facial") {
      form.append("file", new Blob([new Uint8Array(input)], { type: "image/jpeg" }), "frame.jpg");
    } else {
      const wav = encodeWav(input, this.sampleRate);
      form.append("file", new Blob([new Uint8Array(wav)], { type: "audio/wav" }), "window.wav");
    }

    let data: unknown;
    try {
      const res = await this.http.post<unknown>(`${this.baseUrl}/${this.modality}/analyze`, form, {
        signal,
        timeout: this.timeoutMs,
        maxBodyLength: Infinity,
      });
      data = res.data;
    } catch (err) {
      throw new DetectorUnavailableError(this.modality, `${this.modality} detector request failed: ${errorMessage(err)}`, {
        cause: err,
      });
    }

    try {
      return parseDetectionResponse(data);
    } catch (err) {
      throw new DetectorUnavailableError(this.modality, errorMessage(err), { cause: err });
    }
  }
}

// ─── Acoustic Voice Heuristic ───────────────────────────────────────────────────

export interface AcousticVoiceConfig {
  sampleRate: number; // default: 16000
  frameSeconds: number; // analysis frame; default: 0.02
  silenceRms: number; // int16 RMS below which a frame is unvoiced; default: 200
  minVoicedFraction: number; // below this the window yields no detection; default: 0.2
  loudRms: number; // RMS treated as full energy; default: 3000
  highZcr: number; // zero-crossing rate treated as fully tense; default: 0.15
}

export const DEFAULT_ACOUSTIC_VOICE_CONFIG: AcousticVoiceConfig = {
  sampleRate: 16000,
  frameSeconds: 0.02,
  silenceRms: 200,
  minVoicedFraction: 0.2,
  loudRms: 3000,
  highZcr: 0.15,
};

export interface AcousticFeatures {
  voicedFraction: number;
  meanRms: number; // over voiced frames
  rmsVariation: number; // coefficient of variation over voiced frames
  zeroCrossingRate: number; // over voiced frames, crossings per sample
}

/** RMS energy of 16-bit PCM samples in [start, end). */
export function computeRms(pcm: Buffer, start = 0, end = Math.floor(pcm.length / 2)): number {
  const count = end - start;
  if (count <= 0) return 0;
  let sumSquares = 0;
  for (let i = start; i < end; i++) {
    const sample = pcm.readInt16LE(i * 2);
    sumSquares += sample * sample;
  }
  return Math.sqrt(sumSquares / count);
}

function countZeroCrossings(pcm: Buffer, start: number, end: number): number {
  let crossings = 0;
  for (let i = start + 1; i < end; i++) {
    const prev = pcm.readInt16LE((i - 1) * 2);
    const curr = pcm.readInt16LE(i * 2);
    if ((prev >= 0 && curr < 0) || (prev < 0 && curr >= 0)) crossings++;
  }
  return crossings;
}

export function extractAcousticFeatures(pcm: Buffer, config: AcousticVoiceConfig): AcousticFeatures {
  const totalSamples = Math.floor(pcm.length / 2);
  const frameSamples = Math.max(1, Math.round(config.sampleRate * config.frameSeconds));

  const voicedRms: number[] = [];
  let frames = 0;
  let crossings = 0;
  let voicedSamples = 0;

  for (let start = 0; start + frameSamples <= totalSamples; start += frameSamples) {
    frames++;
    const end = start + frameSamples;
    const rms = computeRms(pcm, start, end);
    if (rms < config.silenceRms) continue;
    voicedRms.push(rms);
    crossings += countZeroCrossings(pcm, start, end);
    voicedSamples += frameSamples;
  }

  if (voicedRms.length === 0) {
    return { voicedFraction: 0, meanRms: 0, rmsVariation: 0, zeroCrossingRate: 0 };
  }

  const meanRms = voicedRms.reduce((a, b) => a + b, 0) / voicedRms.length;
  const variance = voicedRms.reduce((acc, v) => acc + (v - meanRms) ** 2, 0) / voicedRms.length;

  return {
    voicedFraction: voicedRms.length / frames,
    meanRms,
    rmsVariation: Math.sqrt(variance) / meanRms,
    zeroCrossingRate: crossings / voicedSamples,
  };
}

/**
 * Map acoustic features to a coarse vocal state.
 * Arousal rises with energy and zero-crossing rate; steadiness falls with
 * energy variation.
 */
export function classifyVoice(features: AcousticFeatures, config: AcousticVoiceConfig): EmotionDetection {
  const energy = clamp(features.meanRms / config.loudRms, 0, 1);
  const tension = clamp(features.zeroCrossingRate / config.highZcr, 0, 1);
  const arousal = 2 * (0.6 * energy + 0.4 * tension) - 1;
  const steadiness = 1 - clamp(features.rmsVariation, 0, 1);

  let label: string;
  if (arousal > 0.3) {
    label = steadiness >= 0.6 ? "confident" : "nervous";
  } else if (arousal < -0.3) {
    label = steadiness >= 0.6 ? "calm" : "tired";
  } else {
    label = "neutral";
  }

  const confidence = clamp(0.4 + 0.3 * features.voicedFraction + 0.3 * steadiness, 0, 1);
  return { label, confidence: roundTo(confidence, 3) };
}

export class AcousticVoiceDetector implements VoiceEmotionDetector {
  readonly modality = "voice" as const;
  private readonly config: AcousticVoiceConfig;

  constructor(config?: Partial<AcousticVoiceConfig>) {
    this.config = { ...DEFAULT_ACOUSTIC_VOICE_CONFIG, ...config };
  }

  async detect(pcm: Buffer, signal: AbortSignal): Promise<EmotionDetection | null> {
    if (signal.aborted) {
      throw new DetectorUnavailableError("voice", "Voice detection cancelled");
    }
    const features = extractAcousticFeatures(pcm, this.config);
    if (features.voicedFraction < this.config.minVoicedFraction) return null;
    return classifyVoice(features, this.config);
  }
}

// ─── Disabled ───────────────────────────────────────────────────────────────────

/** Stands in for a modality with no model behind it. Frames count as empty detections. */
export class DisabledEmotionDetector<M extends Modality = Modality> implements EmotionDetector {
  constructor(readonly modality: M) {}

  async detect(_input: Buffer, signal: AbortSignal): Promise<EmotionDetection | null> {
    if (signal.aborted) {
      throw new DetectorUnavailableError(this.modality, `${this.modality} detection cancelled`);
    }
    return null;
  }
}
