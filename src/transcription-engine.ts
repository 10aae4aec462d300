// Interview Signal Engine - Transcription Adapter
// Converts a finalized audio artifact (WAV file) into timestamped transcript
// segments for the assessment run. Two providers:
//   1. OpenAI audio transcriptions (whisper-1 verbose_json segments). Single
//      speaker: every segment is attributed to the candidate.
//   2. Deepgram prerecorded with diarization. Utterances from the configured
//      candidate speaker index become "candidate", others "interviewer".
//
// Both clients are injected through minimal interfaces for testability.

import { readFile } from "node:fs/promises";
import path from "node:path";
import { TranscriptionError, errorMessage } from "./errors.js";
import { createConsoleLogger, type Logger } from "./logger.js";
import { clamp } from "./utils.js";
import type { TranscriptSegment } from "./types.js";

export const CANDIDATE_SPEAKER = "candidate";
export const INTERVIEWER_SPEAKER = "interviewer";

export interface Transcriber {
  /** @throws TranscriptionError when the artifact cannot be read or the provider fails. */
  transcribe(audioArtifactRef: string): Promise<TranscriptSegment[]>;
}

async function readArtifact(audioArtifactRef: string): Promise<Buffer> {
  let audio: Buffer;
  try {
    audio = await readFile(audioArtifactRef);
  } catch (err) {
    throw new TranscriptionError(`Cannot read audio artifact ${audioArtifactRef}: ${errorMessage(err)}`, { cause: err });
  }
  if (audio.length === 0) {
    throw new TranscriptionError(`Audio artifact is empty: ${audioArtifactRef}`);
  }
  return audio;
}

// ─── OpenAI ─────────────────────────────────────────────────────────────────────

/**
 * Minimal interface for the OpenAI audio transcriptions API surface we use.
 * Mirrors `audio.transcriptions.create()` so tests can inject a mock client.
 */
export interface OpenAITranscriptionClient {
  audio: {
    transcriptions: {
      create(params: {
        file: File;
        model: string;
        response_format?: string;
        timestamp_granularities?: Array<"word" | "segment">;
        language?: string;
      }): Promise<OpenAITranscriptionResponse>;
    };
  };
}

/** `segments` only come back with `verbose_json` (whisper-1). */
export interface OpenAITranscriptionResponse {
  text: string;
  duration?: number;
  language?: string;
  segments?: Array<{
    id: number;
    start: number;
    end: number;
    text: string;
    avg_logprob?: number;
  }>;
}

export interface OpenAITranscriberOptions {
  model?: string; // default: "whisper-1"
  language?: string; // default: "en"
  logger?: Logger;
}

/** Map a segment's average log-probability onto [0, 1]. */
export function logprobToConfidence(avgLogprob: number): number {
  return clamp((avgLogprob + 5) / 5, 0, 1);
}

export function parseOpenAITranscription(response: OpenAITranscriptionResponse): TranscriptSegment[] {
  const text = response.text?.trim();
  if (!text) return [];

  if (response.segments && response.segments.length > 0) {
    return response.segments
      .filter((seg) => seg.text.trim().length > 0)
      .map((seg) => {
        const segment: TranscriptSegment = {
          speaker: CANDIDATE_SPEAKER,
          text: seg.text.trim(),
          startTime: seg.start,
          endTime: seg.end,
        };
        if (typeof seg.avg_logprob === "number") segment.confidence = logprobToConfidence(seg.avg_logprob);
        return segment;
      });
  }

  // Text only: one segment spanning the recording.
  return [{ speaker: CANDIDATE_SPEAKER, text, startTime: 0, endTime: response.duration ?? 0 }];
}

export class OpenAITranscriber implements Transcriber {
  private readonly model: string;
  private readonly language: string;
  private readonly log: Logger;

  constructor(
    private readonly client: OpenAITranscriptionClient,
    options: OpenAITranscriberOptions = {},
  ) {
    this.model = options.model ?? "whisper-1";
    this.language = options.language ?? "en";
    this.log = options.logger ?? createConsoleLogger("TranscriptionEngine");
  }

  async transcribe(audioArtifactRef: string): Promise<TranscriptSegment[]> {
    const audio = await readArtifact(audioArtifactRef);
    const file = new File([new Uint8Array(audio)], path.basename(audioArtifactRef), { type: "audio/wav" });
    const verbose = this.model === "whisper-1";

    let response: OpenAITranscriptionResponse;
    try {
      response = await this.client.audio.transcriptions.create({
        file,
        model: this.model,
        language: this.language,
        ...(verbose
          ? { response_format: "verbose_json", timestamp_granularities: ["segment"] }
          : { response_format: "json" }),
      });
    } catch (err) {
      throw new TranscriptionError(`OpenAI transcription failed for ${audioArtifactRef}: ${errorMessage(err)}`, {
        cause: err,
      });
    }

    const segments = parseOpenAITranscription(response);
    this.log.info(`Transcribed ${audioArtifactRef}: ${segments.length} segments (${this.model})`);
    return segments;
  }
}

// ─── Deepgram ───────────────────────────────────────────────────────────────────

export interface DeepgramUtterance {
  start: number;
  end: number;
  confidence: number;
  transcript: string;
  speaker?: number;
}

export interface DeepgramPrerecordedResult {
  metadata?: { duration?: number };
  results: {
    utterances?: DeepgramUtterance[];
    channels: Array<{
      alternatives: Array<{ transcript: string; confidence: number }>;
    }>;
  };
}

/** Minimal interface for `listen.prerecorded.transcribeFile()` of the Deepgram SDK. */
export interface DeepgramPrerecordedClient {
  listen: {
    prerecorded: {
      transcribeFile(
        source: Buffer,
        options: {
          model: string;
          language: string;
          punctuate: boolean;
          smart_format: boolean;
          diarize: boolean;
          utterances: boolean;
        },
      ): Promise<{ result: DeepgramPrerecordedResult | null; error: { message: string } | null }>;
    };
  };
}

export interface DeepgramTranscriberOptions {
  model?: string; // default: "nova-2"
  language?: string; // default: "en"
  /** Diarized speaker index attributed to the candidate. Default: 0 */
  candidateSpeakerIndex?: number;
  logger?: Logger;
}

export function parseDeepgramResult(result: DeepgramPrerecordedResult, candidateSpeakerIndex: number): TranscriptSegment[] {
  const utterances = result.results.utterances ?? [];
  if (utterances.length > 0) {
    return utterances
      .filter((u) => u.transcript.trim().length > 0)
      .map((u) => ({
        speaker: (u.speaker ?? candidateSpeakerIndex) === candidateSpeakerIndex ? CANDIDATE_SPEAKER : INTERVIEWER_SPEAKER,
        text: u.transcript.trim(),
        startTime: u.start,
        endTime: u.end,
        confidence: u.confidence,
      }));
  }

  const alternative = result.results.channels[0]?.alternatives[0];
  const text = alternative?.transcript.trim() ?? "";
  if (!alternative || text.length === 0) return [];
  return [
    {
      speaker: CANDIDATE_SPEAKER,
      text,
      startTime: 0,
      endTime: result.metadata?.duration ?? 0,
      confidence: alternative.confidence,
    },
  ];
}

export class DeepgramTranscriber implements Transcriber {
  private readonly model: string;
  private readonly language: string;
  private readonly candidateSpeakerIndex: number;
  private readonly log: Logger;

  constructor(
    private readonly client: DeepgramPrerecordedClient,
    options: DeepgramTranscriberOptions = {},
  ) {
    this.model = options.model ?? "nova-2";
    this.language = options.language ?? "en";
    this.candidateSpeakerIndex = options.candidateSpeakerIndex ?? 0;
    this.log = options.logger ?? createConsoleLogger("TranscriptionEngine");
  }

  async transcribe(audioArtifactRef: string): Promise<TranscriptSegment[]> {
    const audio = await readArtifact(audioArtifactRef);

    let response: Awaited<ReturnType<DeepgramPrerecordedClient["listen"]["prerecorded"]["transcribeFile"]>>;
    try {
      response = await this.client.listen.prerecorded.transcribeFile(audio, {
        model: this.model,
        language: this.language,
        punctuate: true,
        smart_format: true,
        diarize: true,
        utterances: true,
      });
    } catch (err) {
      throw new TranscriptionError(`Deepgram transcription failed for ${audioArtifactRef}: ${errorMessage(err)}`, {
        cause: err,
      });
    }

    if (response.error || !response.result) {
      throw new TranscriptionError(
        `Deepgram transcription failed for ${audioArtifactRef}: ${response.error?.message ?? "empty response"}`,
      );
    }

    const segments = parseDeepgramResult(response.result, this.candidateSpeakerIndex);
    this.log.info(`Transcribed ${audioArtifactRef}: ${segments.length} segments (${this.model}, diarized)`);
    return segments;
  }
}
