/**
 * Tests for the operator stop channels
 */

import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { EventEmitter } from 'events';
import * as fs from 'fs/promises';
import * as os from 'os';
import * as path from 'path';
import { PassThrough } from 'stream';
import { ShutdownCoordinator } from '../src/core/shutdown-coordinator.js';
import { watchKeyPress, watchProcessSignals, watchStopFlag } from '../src/services/stop-signals/index.js';
import type { StopRequest } from '../src/types/capture-types.js';

const tick = (ms = 10): Promise<void> => new Promise((resolve) => setTimeout(resolve, ms));

async function stopWithin(coordinator: ShutdownCoordinator, ms: number): Promise<StopRequest | null> {
  let timer: NodeJS.Timeout | undefined;
  const timeout = new Promise<null>((resolve) => {
    timer = setTimeout(() => resolve(null), ms);
  });
  try {
    return await Promise.race([coordinator.whenStopRequested(), timeout]);
  } finally {
    clearTimeout(timer);
  }
}

describe('watchStopFlag', () => {
  let dir: string;

  beforeEach(async () => {
    dir = await fs.mkdtemp(path.join(os.tmpdir(), 'flag-'));
  });

  afterEach(async () => {
    await fs.rm(dir, { recursive: true, force: true });
  });

  it('requests a stop when the flag file appears', async () => {
    const coordinator = new ShutdownCoordinator({ graceTimeoutMs: 1000 });
    const file = path.join(dir, 'STOP');
    const dispose = await watchStopFlag(coordinator, { file, pollMs: 50 });

    try {
      await tick(300);
      await fs.writeFile(file, '');
      const request = await stopWithin(coordinator, 5000);

      expect(request).toMatchObject({ source: 'operator', reason: `stop flag ${file}` });
    } finally {
      await dispose();
    }
  });

  it('removes a stale flag before watching', async () => {
    const coordinator = new ShutdownCoordinator({ graceTimeoutMs: 1000 });
    const file = path.join(dir, 'STOP');
    await fs.writeFile(file, '');

    const dispose = await watchStopFlag(coordinator, { file, pollMs: 50 });
    try {
      await expect(fs.access(file)).rejects.toThrow();
      await tick(200);
      expect(coordinator.isStopRequested()).toBe(false);
    } finally {
      await dispose();
    }
  });
});

describe('watchKeyPress', () => {
  it('stops on the configured key regardless of case', async () => {
    const coordinator = new ShutdownCoordinator({ graceTimeoutMs: 1000 });
    const input = new PassThrough();
    const dispose = watchKeyPress(coordinator, { key: 'q', input });

    input.write('x');
    await tick();
    expect(coordinator.isStopRequested()).toBe(false);

    input.write('Q');
    await tick();
    expect(coordinator.stopRequest).toMatchObject({ source: 'operator', reason: "key 'q' pressed" });
    await dispose();
  });

  it('treats Ctrl+C as a signal', async () => {
    const coordinator = new ShutdownCoordinator({ graceTimeoutMs: 1000 });
    const input = new PassThrough();
    const dispose = watchKeyPress(coordinator, { key: 'q', input });

    input.write('\u0003');
    await tick();

    expect(coordinator.stopRequest).toMatchObject({ source: 'signal', reason: 'Ctrl+C' });
    await dispose();
  });

  it('toggles raw mode on a terminal and ignores input after disposal', async () => {
    const coordinator = new ShutdownCoordinator({ graceTimeoutMs: 1000 });
    const modes: boolean[] = [];
    const input = Object.assign(new PassThrough(), {
      isTTY: true,
      setRawMode: (mode: boolean) => modes.push(mode),
    });

    const dispose = watchKeyPress(coordinator, { key: 'q', input });
    await dispose();
    input.write('q');
    await tick();

    expect(modes).toEqual([true, false]);
    expect(input.listenerCount('data')).toBe(0);
    expect(coordinator.isStopRequested()).toBe(false);
  });
});

describe('watchProcessSignals', () => {
  it('maps the first signal to a stop and ignores repeats', async () => {
    const coordinator = new ShutdownCoordinator({ graceTimeoutMs: 1000 });
    const source = new EventEmitter();
    const dispose = watchProcessSignals(coordinator, ['SIGINT', 'SIGTERM'], source);

    source.emit('SIGTERM', 'SIGTERM');
    source.emit('SIGINT', 'SIGINT');

    expect(coordinator.stopRequest).toMatchObject({ source: 'signal', reason: 'SIGTERM' });

    await dispose();
    expect(source.listenerCount('SIGINT')).toBe(0);
    expect(source.listenerCount('SIGTERM')).toBe(0);
  });
});
