// Interview Signal Engine - Snapshot publisher
// Delivers emotion_update snapshots to a session's consumer with at most one
// delivery in flight. Snapshots produced while a delivery is pending replace
// each other, so a slow consumer receives the latest snapshot, not a backlog.

import { errorMessage } from "./errors.js";
import { createConsoleLogger, type Logger } from "./logger.js";
import type { EmotionSnapshot, SessionStats } from "./types.js";

export type SnapshotSink = (snapshot: EmotionSnapshot) => void | Promise<void>;

export class SnapshotPublisher {
  private pending: EmotionSnapshot | null = null;
  private delivering: Promise<void> | null = null;
  private closed = false;
  private readonly log: Logger;

  constructor(
    private readonly sessionId: string,
    private readonly sink: SnapshotSink,
    private readonly stats: Pick<SessionStats, "updatesDelivered" | "updatesCoalesced">,
    logger?: Logger,
  ) {
    this.log = logger ?? createConsoleLogger("SnapshotPublisher");
  }

  publish(snapshot: EmotionSnapshot): void {
    if (this.closed) return;
    if (this.delivering) {
      if (this.pending) this.stats.updatesCoalesced++;
      this.pending = snapshot;
      return;
    }
    this.delivering = this.deliverFrom(snapshot);
  }

  /** Resolves once the in-flight delivery and any pending snapshot are delivered. */
  async flush(): Promise<void> {
    while (this.delivering) {
      await this.delivering;
    }
  }

  /**
   * Deliver what is pending, then accept nothing further. A consumer that has
   * not settled within `timeoutMs` is abandoned: pending snapshots are dropped
   * and the result is false.
   */
  async close(timeoutMs: number): Promise<boolean> {
    let timer: ReturnType<typeof setTimeout> | undefined;
    const timedOut = await Promise.race([
      this.flush().then(() => false),
      new Promise<boolean>((resolve) => {
        timer = setTimeout(() => resolve(true), timeoutMs);
      }),
    ]);
    clearTimeout(timer);

    if (timedOut) {
      this.log.warn(`Session ${this.sessionId}: emotion update consumer exceeded ${timeoutMs}ms on close; pending updates dropped`);
      this.discard();
      return false;
    }
    this.closed = true;
    return true;
  }

  /** Drop pending snapshots and accept nothing further. */
  discard(): void {
    if (this.pending) this.stats.updatesCoalesced++;
    this.pending = null;
    this.closed = true;
  }

  private async deliverFrom(first: EmotionSnapshot): Promise<void> {
    let next: EmotionSnapshot | null = first;
    while (next) {
      try {
        await this.sink(next);
        this.stats.updatesDelivered++;
      } catch (err) {
        this.log.warn(`Session ${this.sessionId}: emotion update delivery failed: ${errorMessage(err)}`);
      }
      next = this.pending;
      this.pending = null;
    }
    this.delivering = null;
  }
}
