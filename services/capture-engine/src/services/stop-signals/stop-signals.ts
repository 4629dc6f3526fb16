/**
 * Operator Stop Channels
 *
 * Every way an operator can end a run funnels into the same stop flag:
 * a flag file appearing, a key press on the terminal, SIGINT/SIGTERM.
 * (The control server is the fourth channel, see api/control-server.ts.)
 *
 * Each installer returns a disposer that removes what it installed.
 */

import { watch } from 'chokidar';
import * as fs from 'fs/promises';
import type { Readable } from 'stream';
import { log, Logger } from '../../utils/logger.js';
import type { StopFlag } from '../../types/capture-types.js';

export type Disposer = () => Promise<void>;

// ============================================================================
// Flag file
// ============================================================================

export interface FlagFileOptions {
  file: string;
  /** Polling interval; bounds how long a stop takes to be noticed */
  pollMs: number;
  logger?: Logger;
}

/**
 * Stop when `file` appears. A flag left over from an earlier run is removed
 * first so it cannot end this one immediately.
 */
export async function watchStopFlag(stop: StopFlag, options: FlagFileOptions): Promise<Disposer> {
  const logger = (options.logger ?? log).child({ service: 'stop-flag' });

  try {
    await fs.unlink(options.file);
    logger.warn('Removed stale stop flag', { file: options.file });
  } catch (error) {
    if (!(error instanceof Error && 'code' in error && error.code === 'ENOENT')) {
      throw error;
    }
  }

  const watcher = watch(options.file, {
    ignoreInitial: true,
    usePolling: true,
    interval: options.pollMs,
    persistent: true,
  });

  const onFlag = (): void => {
    logger.info('Stop flag detected', { file: options.file });
    stop.requestStop('operator', `stop flag ${options.file}`);
  };
  watcher.on('add', onFlag);
  watcher.on('change', onFlag);
  watcher.on('error', (error) => {
    logger.error('Stop flag watcher error', error instanceof Error ? error : undefined, { file: options.file });
  });

  return () => watcher.close();
}

// ============================================================================
// Key press
// ============================================================================

export interface KeyInput extends Readable {
  isTTY?: boolean;
  setRawMode?(mode: boolean): unknown;
}

export interface KeyPressOptions {
  key: string;
  input?: KeyInput;
  logger?: Logger;
}

const CTRL_C = '\u0003';

/**
 * Stop on `key` (case-insensitive). In raw mode Ctrl+C no longer raises
 * SIGINT, so it is handled here too.
 */
export function watchKeyPress(stop: StopFlag, options: KeyPressOptions): Disposer {
  const input: KeyInput = options.input ?? process.stdin;
  const logger = (options.logger ?? log).child({ service: 'stop-key' });
  const key = options.key.toLowerCase();

  if (input === process.stdin && !process.stdin.isTTY) {
    logger.debug('stdin is not a terminal, key stop disabled');
    return async () => undefined;
  }

  const onData = (chunk: Buffer | string): void => {
    const text = chunk.toString();
    if (text.includes(CTRL_C)) {
      stop.requestStop('signal', 'Ctrl+C');
    } else if (text.toLowerCase().includes(key)) {
      stop.requestStop('operator', `key '${options.key}' pressed`);
    }
  };

  input.setRawMode?.(true);
  input.on('data', onData);
  input.resume();
  logger.info(`Press '${options.key}' to stop the test`);

  return async () => {
    input.off('data', onData);
    input.setRawMode?.(false);
    input.pause();
  };
}

// ============================================================================
// Process signals
// ============================================================================

export interface SignalSource {
  on(signal: NodeJS.Signals, listener: (signal: NodeJS.Signals) => void): unknown;
  off(signal: NodeJS.Signals, listener: (signal: NodeJS.Signals) => void): unknown;
}

export function watchProcessSignals(
  stop: StopFlag,
  signals: NodeJS.Signals[] = ['SIGINT', 'SIGTERM'],
  source: SignalSource = process,
  logger: Logger = log.child({ service: 'stop-signal' })
): Disposer {
  const onSignal = (signal: NodeJS.Signals): void => {
    if (stop.isStopRequested()) {
      logger.warn('Stop already in progress, waiting for loops to finish', { signal });
      return;
    }
    stop.requestStop('signal', signal);
  };

  for (const signal of signals) {
    source.on(signal, onSignal);
  }

  return async () => {
    for (const signal of signals) {
      source.off(signal, onSignal);
    }
  };
}
