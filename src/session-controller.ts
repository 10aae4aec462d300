// Interview Signal Engine - Session Controller
// Owns the lifecycle of live sessions and the per-session pipeline:
// FrameIngress → DetectorLane (per modality) → EmotionAggregator → SnapshotPublisher.
//
// State machine:
//   IDLE → OPEN      open()
//   OPEN → CLOSING   close()  (bounded drain of in-flight detector calls)
//   CLOSING → CLOSED close() finalization complete
//   OPEN → CLOSED    abort()  (abrupt disconnect, no drain)
//
// Each session's state is owned by its own record; sessions share nothing
// mutable with each other.

import { AlreadyOpenError, NotFoundError, SessionStateError, errorMessage } from "./errors.js";
import { DetectorLane } from "./detector-lane.js";
import { EmotionAggregator } from "./emotion-aggregator.js";
import { FrameIngress, type FramePayload, type IngestResult } from "./frame-ingress.js";
import { createConsoleLogger, type Logger } from "./logger.js";
import { SnapshotPublisher, type SnapshotSink } from "./snapshot-publisher.js";
import type { AudioRecorder, AudioRecorderFactory } from "./audio-recorder.js";
import type { EmotionDetector } from "./emotion-detectors.js";
import type { EmotionLogSink } from "./emotion-log-sink.js";
import {
  SessionState,
  type AggregatorConfig,
  type CloseReason,
  type EmotionDetection,
  type EmotionSample,
  type EmotionSnapshot,
  type FinalizedSession,
  type IngressConfig,
  type Modality,
  type ModalityStats,
  type Session,
  type SessionControllerConfig,
  type SessionStats,
} from "./types.js";

export const DEFAULT_SESSION_CONTROLLER_CONFIG: SessionControllerConfig = {
  drainTimeoutMs: 300,
  closedRetentionMs: 10 * 60 * 1000,
};

/**
 * Valid state transitions for the session state machine.
 * OPEN has two exits: a drained close through CLOSING, or an abort straight to CLOSED.
 */
const VALID_TRANSITIONS: ReadonlyMap<SessionState, readonly SessionState[]> = new Map([
  [SessionState.IDLE, [SessionState.OPEN]],
  [SessionState.OPEN, [SessionState.CLOSING, SessionState.CLOSED]],
  [SessionState.CLOSING, [SessionState.CLOSED]],
  [SessionState.CLOSED, []],
]);

export interface SessionControllerDeps {
  facialDetector: EmotionDetector;
  voiceDetector: EmotionDetector;
  recorderFactory: AudioRecorderFactory;
  emotionLogSink: EmotionLogSink;
  config?: Partial<SessionControllerConfig>;
  aggregatorConfig?: Partial<AggregatorConfig>;
  ingressConfig?: Partial<IngressConfig>;
  logger?: Logger;
}

export interface OpenSessionOptions {
  /** Receives coalesced emotion_update snapshots. */
  onEmotionUpdate?: SnapshotSink;
}

interface LiveSession {
  session: Session;
  aggregator: EmotionAggregator;
  ingress: FrameIngress;
  publisher: SnapshotPublisher;
  recorder: AudioRecorder;
  stats: SessionStats;
  finalization: Promise<FinalizedSession> | null;
  purgeTimer: ReturnType<typeof setTimeout> | null;
}

function emptyModalityStats(): ModalityStats {
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

function emptySessionStats(): SessionStats {
  return {
    facial: emptyModalityStats(),
    voice: emptyModalityStats(),
    framesDroppedAfterClose: 0,
    samplesRecorded: 0,
    samplesRejected: 0,
    updatesDelivered: 0,
    updatesCoalesced: 0,
  };
}

export class SessionController {
  private readonly sessions = new Map<string, LiveSession>();
  private readonly config: SessionControllerConfig;
  private readonly log: Logger;

  constructor(private readonly deps: SessionControllerDeps) {
    this.config = { ...DEFAULT_SESSION_CONTROLLER_CONFIG, ...deps.config };
    this.log = deps.logger ?? createConsoleLogger("SessionController");
  }

  // ─── Lifecycle ──────────────────────────────────────────────────────────────

  /**
   * Allocate a session's pipeline and move it to OPEN.
   * @throws AlreadyOpenError if the id is OPEN or CLOSING. A CLOSED id is replaced.
   */
  open(sessionId: string, options: OpenSessionOptions = {}): Session {
    const existing = this.sessions.get(sessionId);
    if (existing && existing.session.state !== SessionState.CLOSED) {
      throw new AlreadyOpenError(sessionId);
    }
    if (existing) this.purge(sessionId);

    const session: Session = {
      id: sessionId,
      state: SessionState.IDLE,
      startedAt: null,
      endedAt: null,
      finalAudioArtifactRef: null,
    };
    const stats = emptySessionStats();
    const aggregator = new EmotionAggregator(sessionId, this.deps.aggregatorConfig, this.deps.logger);
    const publisher = new SnapshotPublisher(sessionId, options.onEmotionUpdate ?? (() => {}), stats, this.deps.logger);
    const recorder = this.deps.recorderFactory(sessionId);

    const onDetection = (modality: Modality) => (detection: EmotionDetection, timestamp: number) => {
      const sample = aggregator.record(modality, detection.label, detection.confidence, timestamp);
      if (!sample) {
        stats.samplesRejected++;
        return;
      }
      stats.samplesRecorded++;
      publisher.publish(aggregator.snapshot());
    };

    const ingress = new FrameIngress({
      sessionId,
      facialLane: new DetectorLane(sessionId, this.deps.facialDetector, onDetection("facial"), stats.facial, this.deps.logger),
      voiceLane: new DetectorLane(sessionId, this.deps.voiceDetector, onDetection("voice"), stats.voice, this.deps.logger),
      recorder,
      stats,
      config: this.deps.ingressConfig,
      logger: this.deps.logger,
    });

    const live: LiveSession = {
      session,
      aggregator,
      ingress,
      publisher,
      recorder,
      stats,
      finalization: null,
      purgeTimer: null,
    };
    this.transition(live, SessionState.OPEN, "open");
    session.startedAt = new Date();
    this.sessions.set(sessionId, live);

    this.log.info(`Session ${sessionId} opened`);
    return { ...session };
  }

  /**
   * Hand a frame to the session's ingress. Returns without waiting for
   * detection. Frames for a CLOSING or CLOSED session are dropped.
   * @throws NotFoundError for unknown ids.
   */
  ingestFrame(sessionId: string, modality: Modality, payload: FramePayload, clientTimestamp: number): IngestResult | "dropped" {
    const live = this.getLive(sessionId);
    if (live.session.state !== SessionState.OPEN) {
      live.stats.framesDroppedAfterClose++;
      return "dropped";
    }
    return live.ingress.ingest(modality, payload, clientTimestamp);
  }

  /**
   * Current snapshot. Valid while OPEN or CLOSING.
   * @throws SessionStateError otherwise.
   */
  requestSnapshot(sessionId: string): EmotionSnapshot {
    const live = this.getLive(sessionId);
    const { state } = live.session;
    if (state !== SessionState.OPEN && state !== SessionState.CLOSING) {
      throw new SessionStateError(
        `Cannot request a snapshot for session ${sessionId} in "${state}" state. Expected "open" or "closing".`,
      );
    }
    return live.aggregator.snapshot();
  }

  /**
   * Drain, finalize and close. Every call after the first, including calls
   * made while the first is still finalizing, returns the same promise.
   */
  close(sessionId: string): Promise<FinalizedSession> {
    const live = this.getLive(sessionId);
    if (live.finalization) return live.finalization;

    this.transition(live, SessionState.CLOSING, "close");
    this.log.info(`Session ${sessionId} closing`);
    live.finalization = this.finalize(live, "close");
    return live.finalization;
  }

  /**
   * Abrupt disconnect: OPEN → CLOSED without a drain. In-flight detector calls
   * are cancelled; the audio artifact and emotion log are still written.
   */
  abort(sessionId: string): Promise<FinalizedSession> {
    const live = this.getLive(sessionId);
    if (live.finalization) return live.finalization;

    this.transition(live, SessionState.CLOSED, "abort");
    live.session.endedAt = new Date();
    this.log.warn(`Session ${sessionId} aborted (abrupt disconnect)`);
    live.finalization = this.finalize(live, "abort");
    return live.finalization;
  }

  /** Forget a session. Active sessions are aborted first. */
  purge(sessionId: string): void {
    const live = this.sessions.get(sessionId);
    if (!live) return;
    if (live.purgeTimer) clearTimeout(live.purgeTimer);
    if (live.session.state === SessionState.OPEN) {
      live.ingress.cancel();
      live.publisher.discard();
    }
    this.sessions.delete(sessionId);
  }

  /** Abort every open session and wait for their finalization. */
  async shutdown(): Promise<void> {
    const pending: Promise<FinalizedSession>[] = [];
    for (const [id, live] of this.sessions) {
      if (live.finalization) pending.push(live.finalization);
      else pending.push(this.abort(id));
    }
    await Promise.all(pending);
    for (const id of [...this.sessions.keys()]) this.purge(id);
  }

  // ─── Read Helpers ───────────────────────────────────────────────────────────

  /**
   * Retrieves a copy of the session record.
   * @throws NotFoundError if the session does not exist.
   */
  getSession(sessionId: string): Session {
    return { ...this.getLive(sessionId).session };
  }

  getStats(sessionId: string): SessionStats {
    return structuredClone(this.getLive(sessionId).stats);
  }

  /** The full EmotionSample log in arrival order. */
  getSamples(sessionId: string): readonly EmotionSample[] {
    return this.getLive(sessionId).aggregator.samples();
  }

  /** Ids of sessions that are OPEN or CLOSING. */
  activeSessionIds(): string[] {
    return [...this.sessions.values()]
      .filter((live) => live.session.state === SessionState.OPEN || live.session.state === SessionState.CLOSING)
      .map((live) => live.session.id);
  }

  // ─── Finalization ───────────────────────────────────────────────────────────

  private async finalize(live: LiveSession, reason: CloseReason): Promise<FinalizedSession> {
    const { session } = live;

    if (reason === "close") {
      await live.ingress.drain(this.config.drainTimeoutMs);
      await live.publisher.close(this.config.drainTimeoutMs);
    } else {
      live.ingress.cancel();
      live.publisher.discard();
    }

    let audioArtifactRef: string | null = null;
    try {
      audioArtifactRef = await live.recorder.finalize();
    } catch (err) {
      this.log.error(`Session ${session.id}: failed to finalize audio artifact: ${errorMessage(err)}`);
    }

    const samples = live.aggregator.samples();
    let emotionLogPersisted = false;
    try {
      await this.deps.emotionLogSink.persist(session.id, samples);
      emotionLogPersisted = true;
    } catch (err) {
      this.log.error(`Session ${session.id}: failed to persist emotion log: ${errorMessage(err)}`);
    }

    if (session.state === SessionState.CLOSING) {
      this.transition(live, SessionState.CLOSED, "close");
      session.endedAt = new Date();
    }
    session.finalAudioArtifactRef = audioArtifactRef;
    this.schedulePurge(live);

    const endedAt = session.endedAt ?? new Date();
    this.log.info(
      `Session ${session.id} closed (${reason}): ${samples.length} samples, artifact ${audioArtifactRef ?? "none"}`,
    );

    return {
      sessionId: session.id,
      audioArtifactRef,
      sampleCount: samples.length,
      startedAt: session.startedAt ?? endedAt,
      endedAt,
      closedBy: reason,
      emotionLogPersisted,
      stats: structuredClone(live.stats),
    };
  }

  private schedulePurge(live: LiveSession): void {
    const timer = setTimeout(() => {
      if (this.sessions.get(live.session.id) === live) this.purge(live.session.id);
    }, this.config.closedRetentionMs);
    timer.unref();
    live.purgeTimer = timer;
  }

  // ─── State Transition Helpers ───────────────────────────────────────────────

  private getLive(sessionId: string): LiveSession {
    const live = this.sessions.get(sessionId);
    if (!live) {
      throw new NotFoundError(`Session not found: ${sessionId}`);
    }
    return live;
  }

  /**
   * @throws SessionStateError naming the method and current state if the
   * transition is not allowed.
   */
  private transition(live: LiveSession, target: SessionState, methodName: string): void {
    const allowed = VALID_TRANSITIONS.get(live.session.state) ?? [];
    if (!allowed.includes(target)) {
      throw new SessionStateError(
        `Invalid state transition: cannot call ${methodName}() for session ${live.session.id} in "${live.session.state}" state.`,
      );
    }
    live.session.state = target;
  }
}
