import { describe, it, expect } from "vitest";
import fc from "fast-check";
import {
  decodeBase64Payload,
  decodeFrame,
  encodeAudioFrame,
  encodeVideoFrame,
  isSupportedImage,
  isWireFrame,
} from "./frame-codec.js";

const JPEG = Buffer.from([0xff, 0xd8, 0xff, 0xe0, 0x00, 0x10]);
const PNG = Buffer.from([0x89, 0x50, 0x4e, 0x47, 0x0d, 0x0a, 0x1a, 0x0a, 0x00]);

/** Assemble a frame by hand so tests can corrupt individual parts. */
function rawFrame(type: number, headerText: string, payload: Buffer = Buffer.alloc(0)): Buffer {
  const header = Buffer.from(headerText, "utf-8");
  const prefix = Buffer.alloc(6);
  prefix[0] = 0x49;
  prefix[1] = 0x56;
  prefix[2] = type;
  prefix.writeUIntBE(header.length, 3, 3);
  return Buffer.concat([prefix, header, payload]);
}

describe("encode / decode", () => {
  it("decodes a video frame with its dimensions", () => {
    const frame = encodeVideoFrame({ timestamp: 1.5, seq: 3, width: 640, height: 480 }, JPEG);
    const decoded = decodeFrame(frame);
    expect(decoded?.modality).toBe("facial");
    expect(decoded?.header).toEqual({ timestamp: 1.5, seq: 3, width: 640, height: 480 });
    expect(decoded?.payload.equals(JPEG)).toBe(true);
  });

  it("decodes an audio frame without video fields", () => {
    const pcm = Buffer.from([1, 0, 2, 0]);
    const decoded = decodeFrame(encodeAudioFrame({ timestamp: 0.25, seq: 1 }, pcm));
    expect(decoded?.modality).toBe("voice");
    expect(decoded?.header).toEqual({ timestamp: 0.25, seq: 1 });
    expect(decoded?.payload.equals(pcm)).toBe(true);
  });

  it("round-trips audio headers and payloads", () => {
    fc.assert(
      fc.property(
        fc.integer({ min: 0, max: 100_000_000 }).map((n) => n / 100),
        fc.nat(),
        fc.uint8Array({ maxLength: 64 }),
        (timestamp, seq, bytes) => {
          const pcm = Buffer.from(bytes);
          const decoded = decodeFrame(encodeAudioFrame({ timestamp, seq }, pcm));
          expect(decoded?.header).toEqual({ timestamp, seq });
          expect(decoded?.payload.equals(pcm)).toBe(true);
        },
      ),
    );
  });
});

describe("decodeFrame rejects malformed input", () => {
  it("rejects short buffers and a wrong magic", () => {
    expect(decodeFrame(Buffer.from([0x49, 0x56, 0x41]))).toBeNull();
    const frame = encodeAudioFrame({ timestamp: 0, seq: 0 }, Buffer.alloc(2));
    frame[0] = 0x00;
    expect(decodeFrame(frame)).toBeNull();
  });

  it("rejects an unknown type byte", () => {
    expect(decodeFrame(rawFrame(0x58, '{"timestamp":0,"seq":0}'))).toBeNull();
  });

  it("rejects an empty or truncated header", () => {
    expect(decodeFrame(rawFrame(0x41, ""))).toBeNull();
    const frame = rawFrame(0x41, '{"timestamp":0,"seq":0}');
    expect(decodeFrame(frame.subarray(0, frame.length - 3))).toBeNull();
  });

  it("rejects headers that are not valid JSON", () => {
    expect(decodeFrame(rawFrame(0x41, "{timestamp:0"))).toBeNull();
  });

  it("rejects invalid header fields", () => {
    expect(decodeFrame(rawFrame(0x41, '{"timestamp":-1,"seq":0}'))).toBeNull();
    expect(decodeFrame(rawFrame(0x41, '{"timestamp":1,"seq":1.5}'))).toBeNull();
    expect(decodeFrame(rawFrame(0x41, '{"seq":1}'))).toBeNull();
    expect(decodeFrame(rawFrame(0x56, '{"timestamp":1,"seq":1,"width":0}'))).toBeNull();
  });
});

describe("isWireFrame", () => {
  it("checks the IV magic", () => {
    expect(isWireFrame(encodeVideoFrame({ timestamp: 0, seq: 0 }, JPEG))).toBe(true);
    expect(isWireFrame(Buffer.from("{}"))).toBe(false);
  });
});

describe("decodeBase64Payload", () => {
  it("strips a data URL prefix", () => {
    expect(decodeBase64Payload("data:image/jpeg;base64,/9j/")).toEqual(Buffer.from([0xff, 0xd8, 0xff]));
  });

  it("ignores embedded whitespace", () => {
    expect(decodeBase64Payload("aGVs bG8=")?.toString("utf-8")).toBe("hello");
  });

  it("returns null for empty or non-base64 text", () => {
    expect(decodeBase64Payload("")).toBeNull();
    expect(decodeBase64Payload("!!!!")).toBeNull();
    expect(decodeBase64Payload("abcde")).toBeNull();
  });
});

describe("isSupportedImage", () => {
  it("accepts JPEG and PNG signatures only", () => {
    expect(isSupportedImage(JPEG)).toBe(true);
    expect(isSupportedImage(PNG)).toBe(true);
    expect(isSupportedImage(Buffer.from("GIF89a"))).toBe(false);
    expect(isSupportedImage(Buffer.from([0xff, 0xd8]))).toBe(false);
  });
});
