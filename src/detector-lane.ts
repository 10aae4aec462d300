// Interview Signal Engine - Detector lane
// One lane per (session, modality). At most one detector call is in flight;
// frames arriving while it is pending are dropped, never queued. A result is
// delivered only if its call finished before the lane aborted it.

import { DetectorUnavailableError, errorMessage } from "./errors.js";
import { createConsoleLogger, type Logger } from "./logger.js";
import type { EmotionDetector } from "./emotion-detectors.js";
import type { EmotionDetection, ModalityStats } from "./types.js";

export type DispatchResult = "dispatched" | "busy" | "closed";

export type DetectionHandler = (detection: EmotionDetection, timestamp: number) => void;

interface InFlightCall {
  controller: AbortController;
  done: Promise<void>;
  timestamp: number;
}

export class DetectorLane {
  private inFlight: InFlightCall | null = null;
  private closed = false;
  private readonly log: Logger;

  constructor(
    private readonly sessionId: string,
    private readonly detector: EmotionDetector,
    private readonly onDetection: DetectionHandler,
    private readonly stats: ModalityStats,
    logger?: Logger,
  ) {
    this.log = logger ?? createConsoleLogger("DetectorLane");
  }

  get modality() {
    return this.detector.modality;
  }

  get busy(): boolean {
    return this.inFlight !== null;
  }

  /** Start a detection unless one is already pending or the lane is closed. */
  dispatch(input: Buffer, timestamp: number): DispatchResult {
    if (this.closed) return "closed";
    if (this.inFlight) {
      this.stats.framesDroppedBusy++;
      return "busy";
    }

    const controller = new AbortController();
    const call: InFlightCall = { controller, timestamp, done: Promise.resolve() };
    call.done = this.run(input, timestamp, controller).finally(() => {
      if (this.inFlight === call) this.inFlight = null;
    });
    this.inFlight = call;
    return "dispatched";
  }

  /**
   * Stop accepting frames and wait up to `timeoutMs` for the pending call.
   * A call still pending after the timeout is aborted and its result discarded.
   */
  async drain(timeoutMs: number): Promise<void> {
    this.closed = true;
    const call = this.inFlight;
    if (!call) return;

    let timer: ReturnType<typeof setTimeout> | undefined;
    const timedOut = await Promise.race([
      call.done.then(() => false),
      new Promise<boolean>((resolve) => {
        timer = setTimeout(() => resolve(true), timeoutMs);
      }),
    ]);
    clearTimeout(timer);

    if (timedOut) {
      this.log.warn(
        `Session ${this.sessionId}: ${this.modality} detection at t=${call.timestamp}s exceeded ${timeoutMs}ms drain timeout; cancelled`,
      );
      this.abort(call);
    }
  }

  /** Stop accepting frames and abort the pending call immediately. */
  cancel(): void {
    this.closed = true;
    if (this.inFlight) this.abort(this.inFlight);
  }

  private abort(call: InFlightCall): void {
    if (call.controller.signal.aborted) return;
    call.controller.abort();
    this.stats.detectionsCancelled++;
    if (this.inFlight === call) this.inFlight = null;
  }

  private async run(input: Buffer, timestamp: number, controller: AbortController): Promise<void> {
    let detection: EmotionDetection | null;
    try {
      detection = await this.detector.detect(input, controller.signal);
    } catch (err) {
      if (controller.signal.aborted) return;
      const failure =
        err instanceof DetectorUnavailableError
          ? err
          : new DetectorUnavailableError(this.modality, errorMessage(err), { cause: err });
      this.stats.detectorFailures++;
      this.log.warn(`Session ${this.sessionId}: ${this.modality} detector failed at t=${timestamp}s, frame dropped: ${failure.message}`);
      return;
    }

    if (controller.signal.aborted) return;
    if (!detection) {
      this.stats.detectionsEmpty++;
      return;
    }
    this.stats.detectionsCompleted++;
    this.onDetection(detection, timestamp);
  }
}
