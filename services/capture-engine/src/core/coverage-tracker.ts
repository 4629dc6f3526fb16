/**
 * Coverage Tracker
 *
 * Fraction of elapsed wall time actually represented by captured samples for
 * one acquisition loop. Captured time is taken from the interval the
 * instrument reports for each window, never from the configured sampling
 * rate: on a transport-limited link the nominal rate overstates coverage by
 * an order of magnitude.
 *
 * Diagnostic only. Nothing gates on it.
 */

export interface CoverageWindow {
  sampleIntervalMs: number;
  sampleCount: number;
  /** Wall span of the acquisition attempt that produced the window */
  wallMs: number;
}

export interface CoverageSnapshot {
  coverage: number;
  capturedMs: number;
  observedMs: number;
  windows: number;
  clampedWindows: number;
}

export class CoverageTracker {
  private startedAtMs: number | null = null;
  private frozenAtMs: number | null = null;
  private capturedMs = 0;
  private windows = 0;
  private clampedWindows = 0;

  constructor(private readonly now: () => number = Date.now) {}

  start(atMs: number = this.now()): void {
    this.startedAtMs = atMs;
    this.frozenAtMs = null;
  }

  /**
   * Account one capture window. Returns the duration actually credited.
   *
   * A window claiming more time than the attempt took is clamped to the
   * attempt's wall span.
   */
  record(window: CoverageWindow): number {
    const claimed = Math.max(0, window.sampleIntervalMs) * Math.max(0, window.sampleCount);
    const wall = Math.max(0, window.wallMs);
    let credited = claimed;

    if (claimed > wall) {
      credited = wall;
      this.clampedWindows++;
    }

    this.capturedMs += credited;
    this.windows++;
    return credited;
  }

  /** Pin the observed end, e.g. when the loop reaches a terminal state. */
  freeze(atMs: number = this.now()): void {
    if (this.frozenAtMs === null) {
      this.frozenAtMs = atMs;
    }
  }

  observedMs(): number {
    if (this.startedAtMs === null) {
      return 0;
    }
    const end = this.frozenAtMs ?? this.now();
    return Math.max(0, end - this.startedAtMs);
  }

  get coverage(): number {
    const observed = this.observedMs();
    if (observed <= 0) {
      return 0;
    }
    return Math.min(1, Math.max(0, this.capturedMs / observed));
  }

  snapshot(): CoverageSnapshot {
    return {
      coverage: this.coverage,
      capturedMs: this.capturedMs,
      observedMs: this.observedMs(),
      windows: this.windows,
      clampedWindows: this.clampedWindows,
    };
  }
}
