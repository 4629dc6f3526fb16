/**
 * Setpoint Controller
 *
 * Commands an analog output and verifies it took effect over a transport
 * that may drop or garble frames. Verification reads the set register (what
 * the device believes it was told), not the live measurement, so load noise
 * is never mistaken for a failed write.
 */

import { log, Logger } from '../utils/logger.js';
import { SafetyLimitError, errorMessage, isTransientError } from '../utils/errors.js';
import { sleep } from '../utils/time.js';
import type { Instrument, Setpoint, SetpointOutcome } from '../types/capture-types.js';

export interface SetpointControllerOptions {
  logger?: Logger;
  /** Injected for tests; defaults to a real timer */
  wait?: (ms: number) => Promise<void>;
}

export interface EmergencyOffResult {
  delivered: boolean;
  error?: string;
}

export function assertWithinSafeLimit(setpoint: Setpoint, instrumentId?: string): void {
  if (setpoint.safeLimit !== undefined && Math.abs(setpoint.target) > setpoint.safeLimit) {
    throw new SafetyLimitError(setpoint.channelId, setpoint.target, setpoint.safeLimit, {
      operation: 'setpoint',
      instrumentId,
    });
  }
}

export class SetpointController {
  private readonly logger: Logger;
  private readonly wait: (ms: number) => Promise<void>;

  constructor(options: SetpointControllerOptions = {}) {
    this.logger = options.logger ?? log.child({ service: 'setpoint-controller' });
    this.wait = options.wait ?? ((ms) => sleep(ms));
  }

  /**
   * Issue, settle, verify; repeat up to `maxRetries` cycles.
   *
   * Exhausting the cycles yields `degraded`, a returned value the caller
   * decides about. Transient command failures count as failed cycles.
   * FatalError propagates.
   */
  async configure(instrument: Instrument, setpoint: Setpoint): Promise<SetpointOutcome> {
    assertWithinSafeLimit(setpoint, instrument.id);

    const { channelId, target, tolerance, settleDelayMs } = setpoint;
    const maxAttempts = Math.max(1, Math.floor(setpoint.maxRetries));
    let lastValue: number | null = null;
    let lastError: string | undefined;

    for (let attempt = 1; attempt <= maxAttempts; attempt++) {
      try {
        await instrument.command({ op: 'set', channelId, value: target });
        await this.wait(settleDelayMs);
        const readback = await instrument.command({ op: 'readback', channelId });
        lastValue = readback;

        if (Math.abs(readback - target) <= tolerance) {
          this.logger.info('Setpoint accepted', {
            instrumentId: instrument.id,
            channelId,
            target,
            readback,
            attempt,
          });
          return { status: 'accepted', channelId, target, value: readback, attempts: attempt };
        }

        lastError = `readback ${readback} outside ${target}±${tolerance}`;
        this.logger.warn('Setpoint verification missed tolerance', {
          instrumentId: instrument.id,
          channelId,
          target,
          readback,
          tolerance,
          attempt,
          maxAttempts,
        });
      } catch (error) {
        if (!isTransientError(error)) {
          throw error;
        }
        lastError = errorMessage(error);
        this.logger.warn('Setpoint command failed', {
          instrumentId: instrument.id,
          channelId,
          attempt,
          maxAttempts,
          error: lastError,
        });
      }
    }

    this.logger.warn('Setpoint degraded', {
      instrumentId: instrument.id,
      channelId,
      target,
      lastValue,
      attempts: maxAttempts,
    });

    return {
      status: 'degraded',
      channelId,
      target,
      lastValue,
      attempts: maxAttempts,
      reason: lastError ?? 'verification failed',
    };
  }

  /**
   * Single `off` command with no settle, verify or retry, bounded by
   * `timeoutMs`. Only for the forced-shutdown path. Never throws.
   */
  async emergencyOff(instrument: Instrument, timeoutMs: number): Promise<EmergencyOffResult> {
    let timer: NodeJS.Timeout | undefined;
    const timeout = new Promise<EmergencyOffResult>((resolve) => {
      timer = setTimeout(
        () => resolve({ delivered: false, error: `no answer within ${timeoutMs}ms` }),
        timeoutMs
      );
    });

    const attempt = instrument
      .command({ op: 'off' })
      .then((): EmergencyOffResult => ({ delivered: true }))
      .catch((error: unknown): EmergencyOffResult => ({ delivered: false, error: errorMessage(error) }));

    const result = await Promise.race([attempt, timeout]);
    clearTimeout(timer);

    if (result.delivered) {
      this.logger.warn('Emergency off delivered', { instrumentId: instrument.id });
    } else {
      this.logger.error('Emergency off not confirmed', undefined, {
        instrumentId: instrument.id,
        error: result.error,
      });
    }
    return result;
  }
}
