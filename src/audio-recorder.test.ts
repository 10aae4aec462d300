import { describe, it, expect, vi, beforeEach, afterEach } from "vitest";
import { mkdtemp, readFile, readdir, rm } from "node:fs/promises";
import { tmpdir } from "node:os";
import path from "node:path";
import { WAV_HEADER_BYTES, WavFileRecorder, createWavRecorderFactory, encodeWav } from "./audio-recorder.js";

function createSilentLogger() {
  return {
    info: vi.fn(),
    warn: vi.fn(),
    error: vi.fn(),
    debug: vi.fn(),
  };
}

describe("encodeWav", () => {
  it("writes a canonical 16-bit mono header", () => {
    const wav = encodeWav(Buffer.alloc(320), 16000);

    expect(wav.length).toBe(WAV_HEADER_BYTES + 320);
    expect(wav.toString("ascii", 0, 4)).toBe("RIFF");
    expect(wav.readUInt32LE(4)).toBe(36 + 320);
    expect(wav.toString("ascii", 8, 16)).toBe("WAVEfmt ");
    expect(wav.readUInt16LE(20)).toBe(1);
    expect(wav.readUInt16LE(22)).toBe(1);
    expect(wav.readUInt32LE(24)).toBe(16000);
    expect(wav.readUInt32LE(28)).toBe(32000);
    expect(wav.readUInt16LE(32)).toBe(2);
    expect(wav.readUInt16LE(34)).toBe(16);
    expect(wav.toString("ascii", 36, 40)).toBe("data");
    expect(wav.readUInt32LE(40)).toBe(320);
  });
});

describe("WavFileRecorder", () => {
  let dir: string;

  beforeEach(async () => {
    dir = await mkdtemp(path.join(tmpdir(), "recorder-test-"));
  });

  afterEach(async () => {
    await rm(dir, { recursive: true, force: true });
  });

  it("writes the appended PCM as a WAV file", async () => {
    const recorder = new WavFileRecorder("session-1", dir, 16000, createSilentLogger());
    recorder.append(Buffer.from([1, 0, 2, 0]));
    recorder.append(Buffer.from([3, 0]));
    expect(recorder.bytesRecorded).toBe(6);

    const ref = await recorder.finalize();

    expect(ref).not.toBeNull();
    if (ref === null) return;
    expect(path.dirname(ref)).toBe(dir);
    expect(path.basename(ref)).toMatch(/^session-1_[0-9a-f-]{36}\.wav$/);
    const wav = await readFile(ref);
    expect([...wav.subarray(WAV_HEADER_BYTES)]).toEqual([1, 0, 2, 0, 3, 0]);
  });

  it("returns the same reference from repeated finalize calls", async () => {
    const recorder = new WavFileRecorder("s1", dir, 16000, createSilentLogger());
    recorder.append(Buffer.alloc(4));
    const [a, b] = await Promise.all([recorder.finalize(), recorder.finalize()]);
    expect(a).toBe(b);
    expect(await readdir(dir)).toHaveLength(1);
  });

  it("ignores audio appended after finalize", async () => {
    const recorder = new WavFileRecorder("s1", dir, 16000, createSilentLogger());
    recorder.append(Buffer.alloc(4));
    await recorder.finalize();
    recorder.append(Buffer.alloc(4));
    expect(recorder.bytesRecorded).toBe(4);
  });

  it("returns null and writes nothing when no audio was recorded", async () => {
    const logger = createSilentLogger();
    const recorder = new WavFileRecorder("s1", dir, 16000, logger);
    await expect(recorder.finalize()).resolves.toBeNull();
    expect(await readdir(dir)).toEqual([]);
    expect(logger.warn).toHaveBeenCalledTimes(1);
  });

  it("sanitizes the session id in the file name", async () => {
    const factory = createWavRecorderFactory(path.join(dir, "nested"), 8000, createSilentLogger());
    const recorder = factory("../evil/id");
    recorder.append(Buffer.alloc(2));
    const ref = await recorder.finalize();
    expect(ref).not.toBeNull();
    if (ref === null) return;
    expect(path.dirname(ref)).toBe(path.join(dir, "nested"));
    expect(path.basename(ref).startsWith("___evil_id_")).toBe(true);
    expect((await readFile(ref)).readUInt32LE(24)).toBe(8000);
  });
});
