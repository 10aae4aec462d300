// Accumulates inbound PCM chunks into fixed-length windows for the voice
// detector. Chunks arrive at whatever size the client sends; the detector
// always sees exactly `windowBytes` of 16-bit mono PCM.

import { ConfigurationError } from "./errors.js";

const BYTES_PER_SAMPLE = 2;

export interface PcmWindow {
  pcm: Buffer;
  /** Client timestamp of the chunk that completed the window. */
  timestamp: number;
}

export class AudioWindow {
  readonly windowBytes: number;
  private chunks: Buffer[] = [];
  private buffered = 0;

  constructor(sampleRate: number, windowSeconds: number) {
    const samples = Math.round(sampleRate * windowSeconds);
    if (!Number.isFinite(samples) || samples <= 0) {
      throw new ConfigurationError(
        `Audio window must hold at least one sample (sampleRate=${sampleRate}, windowSeconds=${windowSeconds})`,
      );
    }
    this.windowBytes = samples * BYTES_PER_SAMPLE;
  }

  /** Append a chunk; returns every window it completed, oldest first. */
  push(chunk: Buffer, timestamp: number): PcmWindow[] {
    if (chunk.length === 0) return [];
    this.chunks.push(chunk);
    this.buffered += chunk.length;

    const windows: PcmWindow[] = [];
    while (this.buffered >= this.windowBytes) {
      const all = Buffer.concat(this.chunks, this.buffered);
      windows.push({ pcm: all.subarray(0, this.windowBytes), timestamp });
      const rest = all.subarray(this.windowBytes);
      this.chunks = rest.length > 0 ? [rest] : [];
      this.buffered = rest.length;
    }
    return windows;
  }

  /** Bytes waiting for the next window. */
  get pendingBytes(): number {
    return this.buffered;
  }

  /** Discard the partial window. */
  reset(): void {
    this.chunks = [];
    this.buffered = 0;
  }
}
