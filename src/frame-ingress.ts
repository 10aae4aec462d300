// Interview Signal Engine - Frame Ingress
// Per-session entry point for live frames: validate → decode → sample (video)
// or window (audio) → dispatch to the modality's detector lane. Never throws
// for bad input; rejected frames are counted and logged.

import { AudioWindow } from "./audio-window.js";
import { decodeBase64Payload, isSupportedImage } from "./frame-codec.js";
import { FrameSampler } from "./frame-sampler.js";
import { createConsoleLogger, type Logger } from "./logger.js";
import type { AudioRecorder } from "./audio-recorder.js";
import type { DetectorLane, DispatchResult } from "./detector-lane.js";
import type { IngressConfig, Modality, ModalityStats } from "./types.js";

export const DEFAULT_INGRESS_CONFIG: IngressConfig = {
  videoSampleRate: 2,
  audioSampleRate: 16000,
  audioWindowSeconds: 1.0,
  maxVideoPayloadBytes: 2 * 1024 * 1024,
  maxAudioPayloadBytes: 256 * 1024,
};

/** Base64 text (optionally a data URL) or raw bytes. */
export type FramePayload = string | Buffer;

export type IngestResult = DispatchResult | "rejected" | "sampled_out" | "buffered";

export interface FrameIngressDeps {
  sessionId: string;
  facialLane: DetectorLane;
  voiceLane: DetectorLane;
  recorder: AudioRecorder;
  stats: Record<Modality, ModalityStats>;
  config?: Partial<IngressConfig>;
  logger?: Logger;
}

export class FrameIngress {
  private readonly config: IngressConfig;
  private readonly sampler: FrameSampler;
  private readonly audioWindow: AudioWindow;
  private readonly lastTimestamp: Record<Modality, number> = { facial: -Infinity, voice: -Infinity };
  private readonly log: Logger;

  constructor(private readonly deps: FrameIngressDeps) {
    this.config = { ...DEFAULT_INGRESS_CONFIG, ...deps.config };
    this.sampler = new FrameSampler(this.config.videoSampleRate);
    this.audioWindow = new AudioWindow(this.config.audioSampleRate, this.config.audioWindowSeconds);
    this.log = deps.logger ?? createConsoleLogger("FrameIngress");
  }

  ingest(modality: Modality, payload: FramePayload, timestamp: number): IngestResult {
    const stats = this.deps.stats[modality];
    stats.framesReceived++;

    const problem = this.checkTimestamp(modality, timestamp);
    if (problem) return this.reject(modality, problem);

    const bytes = typeof payload === "string" ? decodeBase64Payload(payload) : payload;
    if (!bytes || bytes.length === 0) return this.reject(modality, "empty or undecodable payload");

    return modality === "facial" ? this.ingestVideo(bytes, timestamp) : this.ingestAudio(bytes, timestamp);
  }

  /** Drain both lanes in parallel, each bounded by `timeoutMs`. */
  async drain(timeoutMs: number): Promise<void> {
    await Promise.all([this.deps.facialLane.drain(timeoutMs), this.deps.voiceLane.drain(timeoutMs)]);
  }

  cancel(): void {
    this.deps.facialLane.cancel();
    this.deps.voiceLane.cancel();
    this.audioWindow.reset();
  }

  private ingestVideo(image: Buffer, timestamp: number): IngestResult {
    if (image.length > this.config.maxVideoPayloadBytes) {
      return this.reject("facial", `image of ${image.length} bytes exceeds ${this.config.maxVideoPayloadBytes}`);
    }
    if (!isSupportedImage(image)) return this.reject("facial", "payload is not a JPEG or PNG image");

    this.lastTimestamp.facial = timestamp;
    if (!this.sampler.shouldSample(timestamp)) {
      this.deps.stats.facial.framesSkippedBySampler++;
      return "sampled_out";
    }
    return this.deps.facialLane.dispatch(image, timestamp);
  }

  private ingestAudio(pcm: Buffer, timestamp: number): IngestResult {
    if (pcm.length > this.config.maxAudioPayloadBytes) {
      return this.reject("voice", `chunk of ${pcm.length} bytes exceeds ${this.config.maxAudioPayloadBytes}`);
    }
    if (pcm.length % 2 !== 0) return this.reject("voice", "odd byte length for 16-bit PCM");

    this.lastTimestamp.voice = timestamp;
    this.deps.recorder.append(pcm);

    let result: IngestResult = "buffered";
    for (const window of this.audioWindow.push(pcm, timestamp)) {
      result = this.deps.voiceLane.dispatch(window.pcm, window.timestamp);
    }
    return result;
  }

  private checkTimestamp(modality: Modality, timestamp: number): string | null {
    if (typeof timestamp !== "number" || !Number.isFinite(timestamp) || timestamp < 0) {
      return `invalid timestamp ${String(timestamp)}`;
    }
    if (timestamp < this.lastTimestamp[modality]) {
      return `timestamp regression (${timestamp} < ${this.lastTimestamp[modality]})`;
    }
    return null;
  }

  private reject(modality: Modality, reason: string): "rejected" {
    this.deps.stats[modality].framesRejected++;
    this.log.warn(`Session ${this.deps.sessionId}: ${modality} frame rejected: ${reason}`);
    return "rejected";
  }
}
