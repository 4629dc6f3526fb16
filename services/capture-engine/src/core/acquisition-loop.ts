/**
 * Acquisition Loop
 *
 * Generic repeated-sampling engine, one per instrument subsystem (camera
 * pair, oscilloscope group, power-supply logger). Owns its instrument
 * connection for its whole lifetime.
 *
 * States: idle → running → stopping → stopped, or → failed.
 * Stop requests are observed between iterations (and between retries); an
 * in-flight acquire() is never preempted. The coordinator's forceTerminate()
 * covers instruments that hang.
 *
 * Events: 'state' (LoopState), 'artifact' (Artifact), 'gap' (Gap),
 * 'setpoint' (SetpointOutcome).
 */

import { EventEmitter } from 'events';
import { log, Logger } from '../utils/logger.js';
import {
  FatalError,
  InternalError,
  errorMessage,
  isTransientError,
} from '../utils/errors.js';
import { sleep } from '../utils/time.js';
import { CoverageTracker } from './coverage-tracker.js';
import { SetpointController } from './setpoint-controller.js';
import {
  FORCED_TIMEOUT_REASON,
  isTerminalState,
  type AcquiredData,
  type Artifact,
  type ArtifactSink,
  type CaptureWindow,
  type Gap,
  type Instrument,
  type LoopReport,
  type LoopState,
  type Setpoint,
  type SetpointOutcome,
  type StopFlag,
  type SupervisedLoop,
} from '../types/capture-types.js';

// ============================================================================
// Types
// ============================================================================

export interface AcquisitionLoopOptions {
  instrument: Instrument;
  /** Test-directory subfolder the loop's artifacts are relocated into */
  subsystem: string;
  sink: ArtifactSink;
  stop: StopFlag;
  acquireTimeoutMs: number;
  maxRetriesPerIteration: number;
  /** Fixed pause between retries of one iteration */
  retryDelayMs: number;
  /** Windows per artifact before rotating; 0 keeps one artifact for the run */
  windowsPerArtifact: number;
  startupDelayMs?: number;
  setpoints?: Setpoint[];
  abortOnDegraded?: boolean;
  setpointController?: SetpointController;
  emergencyOffTimeoutMs?: number;
  logger?: Logger;
  now?: () => Date;
}

export interface LoopStatus {
  id: string;
  capability: Instrument['capability'];
  subsystem: string;
  state: LoopState;
  failureReason?: string;
  coverage: number;
  windows: number;
  artifacts: number;
  gaps: number;
}

const TRANSITIONS: Record<LoopState, readonly LoopState[]> = {
  idle: ['running', 'failed'],
  running: ['stopping', 'failed'],
  stopping: ['stopped', 'failed'],
  stopped: [],
  failed: [],
};

// ============================================================================
// AcquisitionLoop
// ============================================================================

export class AcquisitionLoop extends EventEmitter implements SupervisedLoop {
  readonly id: string;

  private readonly instrument: Instrument;
  private readonly sink: ArtifactSink;
  private readonly stop: StopFlag;
  private readonly options: AcquisitionLoopOptions;
  private readonly logger: Logger;
  private readonly controller: SetpointController;
  private readonly coverage: CoverageTracker;
  private readonly now: () => Date;

  private _state: LoopState = 'idle';
  private failureReason?: string;
  private released = false;
  private terminating = false;
  private windowCount = 0;
  private windowsInArtifact = 0;
  private lastArtifactStartMs = Number.NEGATIVE_INFINITY;
  private readonly artifacts: Artifact[] = [];
  private readonly gaps: Gap[] = [];
  private readonly setpointOutcomes: SetpointOutcome[] = [];
  private readonly terminalWaiters: Array<(state: LoopState) => void> = [];

  constructor(options: AcquisitionLoopOptions) {
    super();
    this.options = options;
    this.instrument = options.instrument;
    this.id = options.instrument.id;
    this.sink = options.sink;
    this.stop = options.stop;
    this.now = options.now ?? (() => new Date());
    this.logger = (options.logger ?? log).child({
      service: 'acquisition-loop',
      instrumentId: this.id,
      subsystem: options.subsystem,
    });
    this.controller = options.setpointController ?? new SetpointController({ logger: this.logger });
    this.coverage = new CoverageTracker(() => this.now().getTime());
  }

  get state(): LoopState {
    return this._state;
  }

  whenTerminal(): Promise<LoopState> {
    if (isTerminalState(this._state)) {
      return Promise.resolve(this._state);
    }
    return new Promise((resolve) => this.terminalWaiters.push(resolve));
  }

  /**
   * Run until a stop is requested or the instrument fails. Never rejects:
   * every error ends up in the report.
   */
  async run(): Promise<LoopReport> {
    if (this._state !== 'idle') {
      throw new InternalError(`Loop ${this.id} already started`, { operation: 'run', instrumentId: this.id });
    }
    this.transition('running');

    try {
      await this.instrument.connect();
      this.logger.info('Instrument connected', {
        capability: this.instrument.capability,
        transport: this.instrument.transport,
      });

      if (this.options.startupDelayMs && this.isActive()) {
        this.logger.info('Waiting for instrument to initialize', { delayMs: this.options.startupDelayMs });
        await sleep(this.options.startupDelayMs, this.stop.signal);
      }

      await this.applySetpoints();

      this.coverage.start();
      while (this.isActive() && !this.stop.isStopRequested()) {
        await this.iterate();
      }

      if (this.state === 'running' && !this.terminating) {
        await this.stopGracefully();
      }
    } catch (error) {
      await this.fail(error);
    }

    if (this.terminating) {
      await this.whenTerminal();
    }

    return this.report();
  }

  /**
   * Resource-level termination for a loop that overran the grace timeout.
   * Keeps whatever the open artifact already holds.
   */
  async forceTerminate(reason: string = FORCED_TIMEOUT_REASON): Promise<void> {
    if (isTerminalState(this._state)) {
      return;
    }

    this.logger.warn('Force terminating loop', { reason, state: this._state });
    // The iteration in flight may settle while emergency off runs; it must not act on it
    this.terminating = true;

    if (this.instrument.capability === 'power-supply') {
      await this.controller.emergencyOff(this.instrument, this.options.emergencyOffTimeoutMs ?? 500);
      if (isTerminalState(this._state)) {
        return;
      }
    }

    const partial = this.sink.abandon();
    if (partial) {
      this.recordArtifact(partial);
    }

    this.released = true;
    try {
      this.instrument.forceClose();
    } catch (error) {
      this.logger.error('Force close failed', error instanceof Error ? error : undefined, {
        error: errorMessage(error),
      });
    }

    this.coverage.freeze();
    this.failureReason = reason;
    this.transition('failed');
  }

  status(): LoopStatus {
    return {
      id: this.id,
      capability: this.instrument.capability,
      subsystem: this.options.subsystem,
      state: this._state,
      failureReason: this.failureReason,
      coverage: this.coverage.coverage,
      windows: this.windowCount,
      artifacts: this.artifacts.length,
      gaps: this.gaps.length,
    };
  }

  report(): LoopReport {
    return {
      instrumentId: this.id,
      capability: this.instrument.capability,
      subsystem: this.options.subsystem,
      state: this._state,
      failureReason: this.failureReason,
      coverage: this.coverage.coverage,
      windows: this.windowCount,
      artifacts: [...this.artifacts],
      gaps: [...this.gaps],
      setpoints: [...this.setpointOutcomes],
    };
  }

  // ==========================================================================
  // Iteration
  // ==========================================================================

  private async iterate(): Promise<void> {
    const maxAttempts = 1 + Math.max(0, this.options.maxRetriesPerIteration);
    const iterationStart = this.now();
    let attempts = 0;
    let lastError = 'unknown';

    while (attempts < maxAttempts) {
      attempts++;
      const startedAt = this.now();

      try {
        const data = await this.instrument.acquire(this.options.acquireTimeoutMs);
        if (!this.isActive()) {
          return;
        }
        await this.persist(this.buildWindow(data, startedAt, this.now()));
        return;
      } catch (error) {
        if (!this.isActive()) {
          return;
        }
        if (!isTransientError(error)) {
          throw error;
        }

        lastError = errorMessage(error);
        this.logger.debug('Transient acquisition failure', { attempt: attempts, maxAttempts, error: lastError });

        if (this.stop.isStopRequested()) {
          break;
        }
        if (attempts < maxAttempts) {
          await sleep(this.options.retryDelayMs, this.stop.signal);
        }
      }
    }

    this.recordGap({
      instrumentId: this.id,
      startUtc: iterationStart.toISOString(),
      endUtc: this.now().toISOString(),
      attempts,
      reason: lastError,
    });
  }

  private buildWindow(data: AcquiredData, startedAt: Date, completedAt: Date): CaptureWindow {
    // Stamped on completion; the instrument clock may be absent or skewed
    const timestamp = completedAt.toISOString();
    const samples = data.channels.flatMap((channel) =>
      channel.values.map((value, index) => ({
        instrumentId: this.id,
        channelId: channel.channelId,
        value,
        timestamp,
        index,
      }))
    );
    const sampleCount = data.channels.reduce((max, channel) => Math.max(max, channel.values.length), 0);

    return {
      instrumentId: this.id,
      samples,
      sampleIntervalMs: data.sampleIntervalMs,
      sampleCount,
      durationMs: data.sampleIntervalMs * sampleCount,
      startedAt,
      completedAt,
      files: data.files ?? [],
    };
  }

  private async persist(window: CaptureWindow): Promise<void> {
    this.coverage.record({
      sampleIntervalMs: window.sampleIntervalMs,
      sampleCount: window.sampleCount,
      wallMs: window.completedAt.getTime() - window.startedAt.getTime(),
    });
    this.windowCount++;

    if (!this.sink.isOpen) {
      let start = window.startedAt;
      if (start.getTime() < this.lastArtifactStartMs) {
        this.logger.warn('Wall clock stepped backwards, holding artifact start', {
          windowStart: start.toISOString(),
          previousStart: new Date(this.lastArtifactStartMs).toISOString(),
        });
        start = new Date(this.lastArtifactStartMs);
      }
      await this.sink.open(start);
      this.lastArtifactStartMs = start.getTime();
      this.windowsInArtifact = 0;
    }

    await this.sink.append(window);
    this.windowsInArtifact++;

    const rotateAfter = this.options.windowsPerArtifact;
    if (this.isActive() && rotateAfter > 0 && this.windowsInArtifact >= rotateAfter) {
      await this.closeArtifact();
    }
  }

  // ==========================================================================
  // Setpoints
  // ==========================================================================

  private async applySetpoints(): Promise<void> {
    for (const setpoint of this.options.setpoints ?? []) {
      if (!this.isActive()) {
        return;
      }

      const outcome = await this.controller.configure(this.instrument, setpoint);
      this.setpointOutcomes.push(outcome);
      this.emit('setpoint', outcome);

      if (outcome.status === 'degraded' && this.options.abortOnDegraded) {
        throw new FatalError(`Setpoint ${setpoint.channelId}=${setpoint.target} degraded: ${outcome.reason}`, {
          operation: 'setpoint',
          instrumentId: this.id,
        });
      }
    }
  }

  // ==========================================================================
  // Termination
  // ==========================================================================

  private async stopGracefully(): Promise<void> {
    this.transition('stopping');
    await this.closeArtifact();
    await this.release();
    this.coverage.freeze();
    if (this._state === 'stopping') {
      this.transition('stopped');
      this.logger.info('Loop stopped', { ...this.coverage.snapshot(), gaps: this.gaps.length });
    }
  }

  private async fail(error: unknown): Promise<void> {
    if (isTerminalState(this._state) || this.terminating) {
      this.logger.debug('Error after terminal state ignored', { error: errorMessage(error) });
      return;
    }

    const reason = errorMessage(error);
    this.logger.error('Loop failed', error instanceof Error ? error : undefined, { state: this._state });

    try {
      await this.closeArtifact();
    } catch (closeError) {
      this.logger.error('Could not finalize artifact', closeError instanceof Error ? closeError : undefined);
    }
    await this.release();
    this.coverage.freeze();

    if (isTerminalState(this._state)) {
      return;
    }
    this.failureReason = reason;
    this.transition('failed');
    this.stop.requestStop('loop-fatal', `${this.id}: ${reason}`);
  }

  private async closeArtifact(): Promise<void> {
    const artifact = await this.sink.close();
    if (!artifact) {
      return;
    }
    if (isTerminalState(this._state)) {
      // Force-terminated while the file was being finalized; the file stays
      // in the staging directory for the reconciler's source scan
      this.logger.warn('Artifact finalized after termination, left to staging scan', { paths: artifact.paths });
      return;
    }
    this.recordArtifact(artifact);
  }

  private async release(): Promise<void> {
    if (this.released) {
      return;
    }
    this.released = true;
    try {
      await this.instrument.close();
    } catch (error) {
      this.logger.warn('Instrument close failed', { error: errorMessage(error) });
    }
  }

  // ==========================================================================
  // Bookkeeping
  // ==========================================================================

  private isActive(): boolean {
    return this._state === 'running' && !this.terminating;
  }

  private recordArtifact(artifact: Artifact): void {
    this.artifacts.push(artifact);
    this.emit('artifact', artifact);
  }

  private recordGap(gap: Gap): void {
    this.gaps.push(gap);
    this.logger.warn('Acquisition gap recorded', { attempts: gap.attempts, reason: gap.reason });
    this.emit('gap', gap);
  }

  private transition(next: LoopState): void {
    const allowed = TRANSITIONS[this._state];
    if (!allowed.includes(next)) {
      throw new InternalError(`Illegal loop transition ${this._state} → ${next}`, {
        operation: 'transition',
        instrumentId: this.id,
      });
    }

    this._state = next;
    this.emit('state', next);

    if (isTerminalState(next)) {
      const waiters = this.terminalWaiters.splice(0);
      for (const resolve of waiters) {
        resolve(next);
      }
    }
  }
}
