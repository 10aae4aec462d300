/**
 * Time-based frame sampler. Accepts the first frame in each sampling interval
 * (measured on the client's capture clock) and skips the rest.
 */

import { ConfigurationError } from "./errors.js";

export class FrameSampler {
  private readonly intervalSeconds: number;
  private lastSampledTimestamp = -Infinity;

  constructor(frameRate: number) {
    this.intervalSeconds = FrameSampler.toInterval(frameRate);
  }

  /**
   * Returns true if this frame should go to the detector. The first frame is
   * always sampled; later frames once a full interval has elapsed.
   */
  shouldSample(timestamp: number): boolean {
    if (timestamp - this.lastSampledTimestamp >= this.intervalSeconds) {
      this.lastSampledTimestamp = timestamp;
      return true;
    }
    return false;
  }

  private static toInterval(frameRate: number): number {
    if (!Number.isFinite(frameRate) || frameRate <= 0) {
      throw new ConfigurationError(`Frame rate must be a positive number, got ${frameRate}`);
    }
    return 1 / frameRate;
  }
}
