// Interview Signal Engine - Session audio recorder
// Accumulates the session's PCM stream in memory and, at finalize, writes it
// as a 16-bit mono WAV file. The file path is the audio artifact reference
// handed to the assessment run.

import { mkdir, writeFile } from "node:fs/promises";
import path from "node:path";
import { v4 as uuidv4 } from "uuid";
import { createConsoleLogger, type Logger } from "./logger.js";

export const WAV_HEADER_BYTES = 44;

/** Wrap 16-bit little-endian mono PCM in a canonical RIFF/WAVE header. */
export function encodeWav(pcm: Buffer, sampleRate: number): Buffer {
  const channels = 1;
  const bitsPerSample = 16;
  const blockAlign = channels * (bitsPerSample / 8);
  const byteRate = sampleRate * blockAlign;

  const header = Buffer.alloc(WAV_HEADER_BYTES);
  header.write("RIFF", 0, "ascii");
  header.writeUInt32LE(36 + pcm.length, 4);
  header.write("WAVE", 8, "ascii");
  header.write("fmt ", 12, "ascii");
  header.writeUInt32LE(16, 16); // fmt chunk size
  header.writeUInt16LE(1, 20); // PCM
  header.writeUInt16LE(channels, 22);
  header.writeUInt32LE(sampleRate, 24);
  header.writeUInt32LE(byteRate, 28);
  header.writeUInt16LE(blockAlign, 32);
  header.writeUInt16LE(bitsPerSample, 34);
  header.write("data", 36, "ascii");
  header.writeUInt32LE(pcm.length, 40);

  return Buffer.concat([header, pcm]);
}

// ─── Recorder ───────────────────────────────────────────────────────────────────

export interface AudioRecorder {
  append(pcm: Buffer): void;
  readonly bytesRecorded: number;
  /** Write the artifact and return its reference, or null if nothing was recorded. */
  finalize(): Promise<string | null>;
}

export type AudioRecorderFactory = (sessionId: string) => AudioRecorder;

export class WavFileRecorder implements AudioRecorder {
  private chunks: Buffer[] = [];
  private total = 0;
  private finalized: Promise<string | null> | null = null;
  private readonly log: Logger;

  constructor(
    private readonly sessionId: string,
    private readonly outputDir: string,
    private readonly sampleRate: number = 16000,
    logger?: Logger,
  ) {
    this.log = logger ?? createConsoleLogger("AudioRecorder");
  }

  append(pcm: Buffer): void {
    if (this.finalized) return;
    this.chunks.push(pcm);
    this.total += pcm.length;
  }

  get bytesRecorded(): number {
    return this.total;
  }

  finalize(): Promise<string | null> {
    if (!this.finalized) {
      this.finalized = this.write();
    }
    return this.finalized;
  }

  private async write(): Promise<string | null> {
    if (this.total === 0) {
      this.log.warn(`No audio recorded for session ${this.sessionId}`);
      return null;
    }

    const pcm = Buffer.concat(this.chunks, this.total);
    this.chunks = [];

    await mkdir(this.outputDir, { recursive: true });
    const safeId = this.sessionId.replace(/[^\w-]/g, "_");
    const filePath = path.join(this.outputDir, `${safeId}_${uuidv4()}.wav`);
    await writeFile(filePath, encodeWav(pcm, this.sampleRate));

    const seconds = pcm.length / (this.sampleRate * 2);
    this.log.info(`Saved ${seconds.toFixed(1)}s of audio for session ${this.sessionId} to ${filePath}`);
    return filePath;
  }
}

export function createWavRecorderFactory(outputDir: string, sampleRate: number, logger?: Logger): AudioRecorderFactory {
  return (sessionId) => new WavFileRecorder(sessionId, outputDir, sampleRate, logger);
}
