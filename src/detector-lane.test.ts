import { describe, it, expect, vi } from "vitest";
import { DetectorLane } from "./detector-lane.js";
import type { EmotionDetector } from "./emotion-detectors.js";
import type { EmotionDetection, Modality, ModalityStats } from "./types.js";

// ─── Test Helpers ───────────────────────────────────────────────────────────────

function createSilentLogger() {
  return {
    info: vi.fn(),
    warn: vi.fn(),
    error: vi.fn(),
    debug: vi.fn(),
  };
}

function emptyStats(): ModalityStats {
  return {
    framesReceived: 0,
    framesRejected: 0,
    framesSkippedBySampler: 0,
    framesDroppedBusy: 0,
    detectionsCompleted: 0,
    detectionsEmpty: 0,
    detectorFailures: 0,
    detectionsCancelled: 0,
  };
}

interface PendingCall {
  input: Buffer;
  signal: AbortSignal;
  resolve: (detection: EmotionDetection | null) => void;
  reject: (err: unknown) => void;
}

/** Detector whose calls stay pending until the test settles them. */
class ManualDetector implements EmotionDetector {
  readonly calls: PendingCall[] = [];

  constructor(readonly modality: Modality = "facial") {}

  detect(input: Buffer, signal: AbortSignal): Promise<EmotionDetection | null> {
    return new Promise((resolve, reject) => {
      this.calls.push({ input, signal, resolve, reject });
    });
  }
}

const flush = () => new Promise<void>((resolve) => setImmediate(resolve));

function setup() {
  const detector = new ManualDetector();
  const stats = emptyStats();
  const onDetection = vi.fn();
  const logger = createSilentLogger();
  const lane = new DetectorLane("s1", detector, onDetection, stats, logger);
  return { detector, stats, onDetection, logger, lane };
}

// ─── Tests ──────────────────────────────────────────────────────────────────────

describe("DetectorLane", () => {
  it("drops frames while a detection is pending", async () => {
    const { detector, stats, onDetection, lane } = setup();

    expect(lane.dispatch(Buffer.from([1]), 1.0)).toBe("dispatched");
    expect(lane.dispatch(Buffer.from([2]), 1.5)).toBe("busy");
    expect(lane.busy).toBe(true);
    expect(stats.framesDroppedBusy).toBe(1);
    expect(detector.calls).toHaveLength(1);

    detector.calls[0].resolve({ label: "happy", confidence: 0.9 });
    await flush();

    expect(onDetection).toHaveBeenCalledWith({ label: "happy", confidence: 0.9 }, 1.0);
    expect(stats.detectionsCompleted).toBe(1);
    expect(lane.busy).toBe(false);
    expect(lane.dispatch(Buffer.from([3]), 2.0)).toBe("dispatched");
  });

  it("counts empty detections without delivering them", async () => {
    const { detector, stats, onDetection, lane } = setup();
    lane.dispatch(Buffer.from([1]), 0);
    detector.calls[0].resolve(null);
    await flush();

    expect(stats.detectionsEmpty).toBe(1);
    expect(onDetection).not.toHaveBeenCalled();
  });

  it("contains detector failures and keeps accepting frames", async () => {
    const { detector, stats, onDetection, logger, lane } = setup();
    lane.dispatch(Buffer.from([1]), 0);
    detector.calls[0].reject(new Error("model crashed"));
    await flush();

    expect(stats.detectorFailures).toBe(1);
    expect(onDetection).not.toHaveBeenCalled();
    expect(logger.warn).toHaveBeenCalledTimes(1);
    expect(lane.dispatch(Buffer.from([2]), 1)).toBe("dispatched");
  });

  it("drain waits for a call that finishes within the timeout", async () => {
    const { detector, stats, onDetection, lane } = setup();
    lane.dispatch(Buffer.from([1]), 4.0);

    const drained = lane.drain(1000);
    detector.calls[0].resolve({ label: "calm", confidence: 0.7 });
    await drained;

    expect(onDetection).toHaveBeenCalledWith({ label: "calm", confidence: 0.7 }, 4.0);
    expect(stats.detectionsCancelled).toBe(0);
    expect(lane.dispatch(Buffer.from([2]), 5.0)).toBe("closed");
  });

  it("drain cancels a call that outlives the timeout and discards its result", async () => {
    const { detector, stats, onDetection, logger, lane } = setup();
    lane.dispatch(Buffer.from([1]), 4.0);

    await lane.drain(20);

    expect(detector.calls[0].signal.aborted).toBe(true);
    expect(stats.detectionsCancelled).toBe(1);
    expect(lane.busy).toBe(false);
    expect(logger.warn).toHaveBeenCalledTimes(1);

    detector.calls[0].resolve({ label: "happy", confidence: 1 });
    await flush();
    expect(onDetection).not.toHaveBeenCalled();
    expect(stats.detectionsCompleted).toBe(0);
  });

  it("drain returns at once when nothing is pending", async () => {
    const { stats, lane } = setup();
    await lane.drain(10_000);
    expect(stats.detectionsCancelled).toBe(0);
    expect(lane.dispatch(Buffer.from([1]), 0)).toBe("closed");
  });

  it("cancel aborts the pending call without counting a failure", async () => {
    const { detector, stats, onDetection, lane } = setup();
    lane.dispatch(Buffer.from([1]), 0);

    lane.cancel();
    detector.calls[0].reject(new Error("aborted"));
    await flush();

    expect(detector.calls[0].signal.aborted).toBe(true);
    expect(stats.detectionsCancelled).toBe(1);
    expect(stats.detectorFailures).toBe(0);
    expect(onDetection).not.toHaveBeenCalled();
    expect(lane.dispatch(Buffer.from([2]), 1)).toBe("closed");
  });
});
