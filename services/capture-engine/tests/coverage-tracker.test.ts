/**
 * Tests for CoverageTracker
 */

import { describe, it, expect, beforeEach } from 'vitest';
import { CoverageTracker } from '../src/core/coverage-tracker.js';

describe('CoverageTracker', () => {
  let now: number;
  let tracker: CoverageTracker;

  beforeEach(() => {
    now = 1_000_000;
    tracker = new CoverageTracker(() => now);
  });

  it('reports zero before any wall time has passed', () => {
    expect(tracker.coverage).toBe(0);
    tracker.start();
    expect(tracker.coverage).toBe(0);
  });

  it('uses the reported sample interval, not the nominal rate', () => {
    tracker.start();
    // 1200 samples at 0.5 ms = 600 ms of signal out of a 2 s attempt
    tracker.record({ sampleIntervalMs: 0.5, sampleCount: 1200, wallMs: 2000 });
    now += 2000;

    expect(tracker.coverage).toBeCloseTo(0.3, 10);
    expect(tracker.snapshot()).toEqual({
      coverage: 0.3,
      capturedMs: 600,
      observedMs: 2000,
      windows: 1,
      clampedWindows: 0,
    });
  });

  it('clamps a window that claims more time than its attempt took', () => {
    tracker.start();
    const credited = tracker.record({ sampleIntervalMs: 10, sampleCount: 100, wallMs: 400 });
    now += 400;

    expect(credited).toBe(400);
    expect(tracker.coverage).toBe(1);
    expect(tracker.snapshot().clampedWindows).toBe(1);
  });

  it('stays within [0, 1] across many windows', () => {
    tracker.start();
    for (let i = 0; i < 50; i++) {
      tracker.record({ sampleIntervalMs: 1, sampleCount: 300, wallMs: 250 });
      now += 200;
    }
    expect(tracker.coverage).toBeGreaterThanOrEqual(0);
    expect(tracker.coverage).toBeLessThanOrEqual(1);
  });

  it('pins the observed span on freeze', () => {
    tracker.start();
    tracker.record({ sampleIntervalMs: 1, sampleCount: 100, wallMs: 100 });
    now += 200;
    tracker.freeze();
    now += 10_000;

    expect(tracker.observedMs()).toBe(200);
    expect(tracker.coverage).toBe(0.5);
  });

  it('keeps the first freeze', () => {
    tracker.start();
    now += 100;
    tracker.freeze();
    now += 100;
    tracker.freeze();
    expect(tracker.observedMs()).toBe(100);
  });
});
