/**
 * Binary frame codec for the IV-prefixed wire format, plus decoding of the
 * base64 payloads carried by JSON `video_frame` / `audio_chunk` messages.
 *
 * Wire format: [0x49 0x56 magic ("IV")][type byte][3-byte big-endian uint24 header JSON length][UTF-8 header JSON][payload bytes]
 *
 * Video frames: type byte 0x56 ('V'), payload = JPEG or PNG bytes
 * Audio frames: type byte 0x41 ('A'), payload = 16-bit LE mono PCM
 */

import type { FrameHeader, Modality, VideoFrameHeader } from "./types.js";

// ─── Constants ──────────────────────────────────────────────────────────────────

const IV_MAGIC_0 = 0x49; // 'I'
const IV_MAGIC_1 = 0x56; // 'V'
const TYPE_VIDEO = 0x56; // 'V'
const TYPE_AUDIO = 0x41; // 'A'

/** 2 (magic) + 1 (type) + 3 (header len) */
const PREFIX_SIZE = 6;

const MAX_HEADER_JSON_BYTES = 4096;

/** Largest header length representable in a uint24. */
const MAX_UINT24 = 0xffffff;

export interface DecodedFrame {
  modality: Modality;
  header: VideoFrameHeader;
  payload: Buffer;
}

// ─── Encode ─────────────────────────────────────────────────────────────────────

function encodeFrame(type: number, header: FrameHeader, payload: Buffer): Buffer {
  const headerJson = Buffer.from(JSON.stringify(header), "utf-8");
  if (headerJson.length > MAX_UINT24) {
    throw new RangeError(`Frame header too large: ${headerJson.length} bytes`);
  }

  const buf = Buffer.alloc(PREFIX_SIZE + headerJson.length + payload.length);
  buf[0] = IV_MAGIC_0;
  buf[1] = IV_MAGIC_1;
  buf[2] = type;
  buf.writeUIntBE(headerJson.length, 3, 3);
  headerJson.copy(buf, PREFIX_SIZE);
  payload.copy(buf, PREFIX_SIZE + headerJson.length);
  return buf;
}

/** Encode a video frame: [IV][V][uint24 header len][header JSON][image bytes] */
export function encodeVideoFrame(header: VideoFrameHeader, image: Buffer): Buffer {
  return encodeFrame(TYPE_VIDEO, header, image);
}

/** Encode an audio frame: [IV][A][uint24 header len][header JSON][PCM bytes] */
export function encodeAudioFrame(header: FrameHeader, pcm: Buffer): Buffer {
  return encodeFrame(TYPE_AUDIO, header, pcm);
}

// ─── Decode ─────────────────────────────────────────────────────────────────────

function isNonNegativeFinite(value: unknown): value is number {
  return typeof value === "number" && Number.isFinite(value) && value >= 0;
}

function isOptionalPositiveInt(value: unknown): boolean {
  return value === undefined || (typeof value === "number" && Number.isInteger(value) && value > 0);
}

function parseHeader(raw: unknown, modality: Modality): VideoFrameHeader | null {
  if (typeof raw !== "object" || raw === null) return null;
  if (!("timestamp" in raw) || !("seq" in raw)) return null;

  const { timestamp, seq } = raw;
  if (!isNonNegativeFinite(timestamp)) return null;
  if (!isNonNegativeFinite(seq) || !Number.isInteger(seq)) return null;
  if (modality === "voice") return { timestamp, seq };

  const width = "width" in raw ? raw.width : undefined;
  const height = "height" in raw ? raw.height : undefined;
  if (!isOptionalPositiveInt(width) || !isOptionalPositiveInt(height)) return null;

  const header: VideoFrameHeader = { timestamp, seq };
  if (typeof width === "number") header.width = width;
  if (typeof height === "number") header.height = height;
  return header;
}

/**
 * Decode an IV-prefixed frame of either type.
 * Returns null on malformed input.
 */
export function decodeFrame(data: Buffer): DecodedFrame | null {
  if (!Buffer.isBuffer(data) || data.length < PREFIX_SIZE) return null;
  if (data[0] !== IV_MAGIC_0 || data[1] !== IV_MAGIC_1) return null;

  const modality = modalityForType(data[2]);
  if (!modality) return null;

  const headerLen = data.readUIntBE(3, 3);
  if (headerLen <= 0 || headerLen > MAX_HEADER_JSON_BYTES) return null;
  if (data.length < PREFIX_SIZE + headerLen) return null;

  let raw: unknown;
  try {
    raw = JSON.parse(data.toString("utf-8", PREFIX_SIZE, PREFIX_SIZE + headerLen));
  } catch {
    return null;
  }

  const header = parseHeader(raw, modality);
  if (!header) return null;

  return { modality, header, payload: data.subarray(PREFIX_SIZE + headerLen) };
}

function modalityForType(type: number): Modality | null {
  if (type === TYPE_VIDEO) return "facial";
  if (type === TYPE_AUDIO) return "voice";
  return null;
}

/** True when the buffer starts with the IV magic prefix. */
export function isWireFrame(data: Buffer): boolean {
  return Buffer.isBuffer(data) && data.length >= 2 && data[0] === IV_MAGIC_0 && data[1] === IV_MAGIC_1;
}

// ─── Base64 Payloads ────────────────────────────────────────────────────────────

const DATA_URL_PREFIX = /^data:[\w.+-]+\/[\w.+-]+;base64,/;
const BASE64_BODY = /^[A-Za-z0-9+/]*={0,2}$/;

/**
 * Decode a base64 payload, optionally prefixed with a data URL header
 * (`data:image/jpeg;base64,`). Returns null for empty or non-base64 text.
 */
export function decodeBase64Payload(data: string): Buffer | null {
  const body = data.trim().replace(DATA_URL_PREFIX, "").replace(/\s+/g, "");
  if (body.length === 0 || body.length % 4 === 1 || !BASE64_BODY.test(body)) return null;

  const bytes = Buffer.from(body, "base64");
  return bytes.length > 0 ? bytes : null;
}

// ─── Image Inspection ───────────────────────────────────────────────────────────

/** True for buffers that start with a JPEG SOI or PNG signature. */
export function isSupportedImage(data: Buffer): boolean {
  if (data.length >= 3 && data[0] === 0xff && data[1] === 0xd8 && data[2] === 0xff) return true;
  return (
    data.length >= 8 &&
    data[0] === 0x89 &&
    data[1] === 0x50 &&
    data[2] === 0x4e &&
    data[3] === 0x47 &&
    data[4] === 0x0d &&
    data[5] === 0x0a &&
    data[6] === 0x1a &&
    data[7] === 0x0a
  );
}
