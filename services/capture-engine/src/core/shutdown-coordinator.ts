/**
 * Shutdown Coordinator
 *
 * Owns the stop flag shared by every loop. The first request wins; later
 * ones are logged and ignored. supervise() enforces the grace period and
 * force-terminates loops that do not reach a terminal state in time.
 */

import { EventEmitter } from 'events';
import { log, Logger } from '../utils/logger.js';
import { errorMessage } from '../utils/errors.js';
import {
  FORCED_TIMEOUT_REASON,
  isTerminalState,
  type LoopState,
  type StopFlag,
  type StopRequest,
  type StopSource,
  type SupervisedLoop,
} from '../types/capture-types.js';

export interface ShutdownCoordinatorOptions {
  graceTimeoutMs: number;
  logger?: Logger;
}

export interface SupervisionResult {
  stop: StopRequest | null;
  /** Time from the stop request (or natural end) to the barrier */
  shutdownMs: number;
  forced: string[];
  states: Record<string, LoopState>;
}

export class ShutdownCoordinator extends EventEmitter implements StopFlag {
  private readonly graceTimeoutMs: number;
  private readonly logger: Logger;
  private readonly controller = new AbortController();
  private request: StopRequest | null = null;

  constructor(options: ShutdownCoordinatorOptions) {
    super();
    this.graceTimeoutMs = options.graceTimeoutMs;
    this.logger = options.logger ?? log.child({ service: 'shutdown-coordinator' });
  }

  get signal(): AbortSignal {
    return this.controller.signal;
  }

  get stopRequest(): StopRequest | null {
    return this.request;
  }

  isStopRequested(): boolean {
    return this.request !== null;
  }

  requestStop(source: StopSource, reason: string): void {
    if (this.request) {
      this.logger.debug('Stop already requested', { source, reason, firstSource: this.request.source });
      return;
    }

    this.request = { source, reason, requestedAt: new Date() };
    this.logger.info('Stop requested', { source, reason });
    this.controller.abort();
    this.emit('stop', this.request);
  }

  /**
   * Resolve once a stop was requested, or immediately if one already was.
   */
  whenStopRequested(): Promise<StopRequest> {
    const current = this.request;
    if (current) {
      return Promise.resolve(current);
    }
    return new Promise((resolve) => this.once('stop', resolve));
  }

  /**
   * Wait for a stop (or every loop ending on its own), then give the loops
   * `graceTimeoutMs` to reach a terminal state before forcing the rest.
   */
  async supervise(loops: SupervisedLoop[]): Promise<SupervisionResult> {
    const allTerminal = Promise.all(loops.map((loop) => loop.whenTerminal()));

    let detach: () => void = () => undefined;
    const current = this.request;
    const stopped = current
      ? Promise.resolve(current)
      : new Promise<StopRequest>((resolve) => {
          this.once('stop', resolve);
          detach = () => this.off('stop', resolve);
        });
    try {
      await Promise.race([stopped, allTerminal]);
    } finally {
      detach();
    }
    const shutdownStart = Date.now();

    let timer: NodeJS.Timeout | undefined;
    const graceExpired = new Promise<'timeout'>((resolve) => {
      timer = setTimeout(() => resolve('timeout'), this.graceTimeoutMs);
    });

    let outcome: 'timeout' | 'settled';
    try {
      outcome = await Promise.race([allTerminal.then(() => 'settled' as const), graceExpired]);
    } finally {
      clearTimeout(timer);
    }

    const forced: string[] = [];
    if (outcome === 'timeout') {
      const stragglers = loops.filter((loop) => !isTerminalState(loop.state));
      this.logger.warn('Grace period expired, forcing loops', {
        graceTimeoutMs: this.graceTimeoutMs,
        loops: stragglers.map((loop) => loop.id),
      });

      await Promise.all(
        stragglers.map(async (loop) => {
          forced.push(loop.id);
          try {
            await loop.forceTerminate(FORCED_TIMEOUT_REASON);
          } catch (error) {
            this.logger.error('Force termination failed', error instanceof Error ? error : undefined, {
              instrumentId: loop.id,
              error: errorMessage(error),
            });
          }
        })
      );
    }

    const states: Record<string, LoopState> = {};
    for (const loop of loops) {
      states[loop.id] = loop.state;
    }

    const shutdownMs = Date.now() - shutdownStart;
    this.logger.info('All loops terminal', { shutdownMs, forced });

    return { stop: this.request, shutdownMs, forced, states };
  }
}
