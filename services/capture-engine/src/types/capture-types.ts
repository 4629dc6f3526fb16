/**
 * Acquisition Type Definitions
 *
 * Instruments, capture windows, artifacts, gaps, setpoints and loop states
 * shared by the acquisition loops, the shutdown coordinator and the
 * reconciler.
 */

// ============================================================================
// INSTRUMENT TYPES
// ============================================================================

/**
 * Capability tag. The core never branches on vendor, only on this tag.
 */
export type InstrumentCapability = 'camera' | 'scope-channel-group' | 'power-supply';

/**
 * Transport family the driver speaks. Informational for the core.
 */
export type TransportFamily = 'serial-ascii' | 'modbus-rtu' | 'usb-tmc' | 'uvc' | 'simulated';

/**
 * Commands understood by every instrument driver.
 *
 * - `set`      write a setpoint register, resolves to the driver's echo
 * - `readback` read the commanded (set) register, not a live measurement
 * - `off`      disable the output(s); best effort
 */
export type InstrumentCommand =
  | { op: 'set'; channelId: string; value: number }
  | { op: 'readback'; channelId: string }
  | { op: 'off'; channelId?: string };

/**
 * Raw data returned by one acquire() call, before the core stamps it.
 */
export interface AcquiredData {
  channels: Array<{
    channelId: string;
    values: number[];
  }>;
  /** Interval between samples as reported by the instrument */
  sampleIntervalMs: number;
  /** Files the driver persisted itself (recordings, screenshots) */
  files?: string[];
}

/**
 * Closed capability interface implemented by every driver.
 *
 * acquire() and command() reject with TransientError or FatalError.
 */
export interface Instrument {
  readonly id: string;
  readonly capability: InstrumentCapability;
  readonly transport: TransportFamily;

  connect(): Promise<void>;
  acquire(timeoutMs: number): Promise<AcquiredData>;
  command(cmd: InstrumentCommand): Promise<number>;
  close(): Promise<void>;
  /** Resource-level termination, used when a loop overruns the grace timeout */
  forceClose(): void;
}

// ============================================================================
// CAPTURE TYPES
// ============================================================================

export interface Sample {
  instrumentId: string;
  channelId: string;
  value: number;
  /** UTC ISO time at which the acquisition completed */
  timestamp: string;
  /** Position within the capture window */
  index: number;
}

export interface CaptureWindow {
  instrumentId: string;
  samples: Sample[];
  sampleIntervalMs: number;
  sampleCount: number;
  /** sampleIntervalMs × sampleCount */
  durationMs: number;
  startedAt: Date;
  completedAt: Date;
  files: string[];
}

/**
 * A span where acquisition was attempted but failed after all retries.
 */
export interface Gap {
  instrumentId: string;
  startUtc: string;
  endUtc: string;
  attempts: number;
  reason: string;
}

// ============================================================================
// ARTIFACT TYPES
// ============================================================================

export interface Artifact {
  id: string;
  /** Producing instrument; absent for files listed by an external source */
  producerId?: string;
  subsystem: string;
  paths: string[];
  startUtc: string;
  endUtc: string;
  /** Timestamp embedded in the file name, when there is one */
  embeddedUtc?: string;
}

/**
 * Where a loop persists its capture windows.
 */
export interface ArtifactSink {
  /** Start a new artifact. `startedAt` is the first window's start. */
  open(startedAt: Date): Promise<void>;
  append(window: CaptureWindow): Promise<void>;
  /** Finalize the open artifact; resolves to null when nothing is open */
  close(): Promise<Artifact | null>;
  /** Give up on the open artifact without further I/O */
  abandon(): Artifact | null;
  readonly isOpen: boolean;
}

/**
 * External producer of files (camera recorders, vendor loggers).
 */
export interface ArtifactSource {
  readonly subsystem: string;
  listRecent(since: Date): Promise<Artifact[]>;
}

// ============================================================================
// SETPOINT TYPES
// ============================================================================

export interface Setpoint {
  channelId: string;
  target: number;
  tolerance: number;
  /** Total issue+settle+verify cycles, at least 1 */
  maxRetries: number;
  settleDelayMs: number;
  /** Absolute ceiling; targets beyond it are refused before anything is sent */
  safeLimit?: number;
}

export type SetpointOutcome =
  | {
      status: 'accepted';
      channelId: string;
      target: number;
      value: number;
      attempts: number;
    }
  | {
      status: 'degraded';
      channelId: string;
      target: number;
      lastValue: number | null;
      attempts: number;
      reason: string;
    };

// ============================================================================
// LOOP TYPES
// ============================================================================

export type LoopState = 'idle' | 'running' | 'stopping' | 'stopped' | 'failed';

export const TERMINAL_LOOP_STATES: readonly LoopState[] = ['stopped', 'failed'];

export function isTerminalState(state: LoopState): boolean {
  return TERMINAL_LOOP_STATES.includes(state);
}

export const FORCED_TIMEOUT_REASON = 'forced-timeout';

export interface LoopReport {
  instrumentId: string;
  capability: InstrumentCapability;
  subsystem: string;
  state: LoopState;
  failureReason?: string;
  coverage: number;
  windows: number;
  artifacts: Artifact[];
  gaps: Gap[];
  setpoints: SetpointOutcome[];
}

export type StopSource = 'operator' | 'signal' | 'loop-fatal' | 'duration';

export interface StopRequest {
  source: StopSource;
  reason: string;
  requestedAt: Date;
}

/**
 * The single piece of cross-loop shared state, as seen by a loop.
 */
export interface StopFlag {
  isStopRequested(): boolean;
  requestStop(source: StopSource, reason: string): void;
  /** Aborts when a stop is requested; lets waits end early */
  readonly signal: AbortSignal;
}

/**
 * What the shutdown coordinator needs from a loop.
 */
export interface SupervisedLoop {
  readonly id: string;
  readonly state: LoopState;
  whenTerminal(): Promise<LoopState>;
  forceTerminate(reason: string): Promise<void>;
}
