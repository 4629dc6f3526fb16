/**
 * Simulated Instrument
 *
 * Deterministic stand-in for a real driver: seeded failures, a fixed
 * acquisition time and reported sample interval, an optional hang and a set
 * register that only takes the commanded value from the N-th `set` onwards.
 * Used for dry runs of a rig file and throughout the tests.
 */

import { AcquireTimeoutError, FatalError, TransientError } from '../utils/errors.js';
import type {
  AcquiredData,
  Instrument,
  InstrumentCapability,
  InstrumentCommand,
  TransportFamily,
} from '../types/capture-types.js';

export interface SimulatedInstrumentOptions {
  id: string;
  capability: InstrumentCapability;
  transport?: TransportFamily;
  channels?: string[];
  /** Wall time one acquire() takes */
  acquireMs?: number;
  /** Interval the instrument reports for its samples */
  sampleIntervalMs?: number;
  samplesPerWindow?: number;
  /** Probability that an acquire() fails transiently */
  transientFailureRate?: number;
  /** acquire() fails fatally once this many windows were delivered */
  fatalAfterWindows?: number;
  /** acquire() never settles once this many windows were delivered */
  hangAfterWindows?: number;
  /** `off` never answers */
  hangOnOff?: boolean;
  failConnect?: boolean;
  /** The set register holds the commanded value from this `set` on (1-based) */
  settleOnSet?: number;
  /** Register error before settling */
  setOffset?: number;
  /** Files reported with each window */
  filesPerWindow?: (window: number) => string[];
  seed?: number;
}

/** mulberry32 */
export function seededRandom(seed: number): () => number {
  let state = seed >>> 0;
  return () => {
    state = (state + 0x6d2b79f5) >>> 0;
    let t = state;
    t = Math.imul(t ^ (t >>> 15), t | 1);
    t ^= t + Math.imul(t ^ (t >>> 7), t | 61);
    return ((t ^ (t >>> 14)) >>> 0) / 4294967296;
  };
}

interface Pending {
  timer?: NodeJS.Timeout;
  reject: (error: Error) => void;
}

export class SimulatedInstrument implements Instrument {
  readonly id: string;
  readonly capability: InstrumentCapability;
  readonly transport: TransportFamily;

  private readonly options: SimulatedInstrumentOptions;
  private readonly random: () => number;
  private readonly registers = new Map<string, number>();
  private readonly setCounts = new Map<string, number>();
  private readonly pending = new Set<Pending>();
  private connected = false;
  private windows = 0;

  /** Every command received, in order */
  readonly commands: InstrumentCommand[] = [];
  closeCalls = 0;
  forceCloseCalls = 0;

  constructor(options: SimulatedInstrumentOptions) {
    this.options = options;
    this.id = options.id;
    this.capability = options.capability;
    this.transport = options.transport ?? 'simulated';
    this.random = seededRandom(options.seed ?? 1);
  }

  get isConnected(): boolean {
    return this.connected;
  }

  get windowsDelivered(): number {
    return this.windows;
  }

  async connect(): Promise<void> {
    if (this.options.failConnect) {
      throw new FatalError(`Instrument ${this.id} not found`, { operation: 'connect', instrumentId: this.id });
    }
    this.connected = true;
  }

  async acquire(timeoutMs: number): Promise<AcquiredData> {
    this.assertConnected('acquire');
    const { hangAfterWindows, fatalAfterWindows } = this.options;

    if (hangAfterWindows !== undefined && this.windows >= hangAfterWindows) {
      await this.wait(null);
    }
    if (fatalAfterWindows !== undefined && this.windows >= fatalAfterWindows) {
      throw new FatalError(`Instrument ${this.id} stopped responding`, {
        operation: 'acquire',
        instrumentId: this.id,
      });
    }

    const acquireMs = this.options.acquireMs ?? 100;
    if (acquireMs > timeoutMs) {
      await this.wait(timeoutMs);
      throw new AcquireTimeoutError(this.id, timeoutMs);
    }
    await this.wait(acquireMs);

    if (this.random() < (this.options.transientFailureRate ?? 0)) {
      throw new TransientError(`Garbled reply from ${this.id}`, { operation: 'acquire', instrumentId: this.id });
    }

    this.windows++;
    const samples = this.options.samplesPerWindow ?? 10;
    const channels = (this.options.channels ?? ['ch1']).map((channelId, c) => ({
      channelId,
      values: Array.from({ length: samples }, (_, i) => Number((c + Math.sin(i / 4) + this.random() * 0.01).toFixed(4))),
    }));

    return {
      channels,
      sampleIntervalMs: this.options.sampleIntervalMs ?? acquireMs / samples,
      files: this.options.filesPerWindow?.(this.windows) ?? [],
    };
  }

  async command(cmd: InstrumentCommand): Promise<number> {
    this.assertConnected('command');
    this.commands.push(cmd);

    switch (cmd.op) {
      case 'set': {
        const count = (this.setCounts.get(cmd.channelId) ?? 0) + 1;
        this.setCounts.set(cmd.channelId, count);
        const settled = count >= (this.options.settleOnSet ?? 1);
        const value = settled ? cmd.value : cmd.value - (this.options.setOffset ?? 1);
        this.registers.set(cmd.channelId, value);
        return cmd.value;
      }
      case 'readback':
        return this.registers.get(cmd.channelId) ?? 0;
      case 'off':
        if (this.options.hangOnOff) {
          await this.wait(null);
        }
        for (const channel of this.registers.keys()) {
          this.registers.set(channel, 0);
        }
        return 0;
    }
  }

  async close(): Promise<void> {
    this.closeCalls++;
    this.connected = false;
  }

  forceClose(): void {
    this.forceCloseCalls++;
    this.connected = false;
    for (const pending of this.pending) {
      clearTimeout(pending.timer);
      pending.reject(new FatalError(`Connection to ${this.id} force closed`, { operation: 'forceClose' }));
    }
    this.pending.clear();
  }

  /** `ms === null` waits until force closed */
  private wait(ms: number | null): Promise<void> {
    return new Promise((resolve, reject) => {
      const pending: Pending = { reject };
      if (ms !== null) {
        pending.timer = setTimeout(() => {
          this.pending.delete(pending);
          resolve();
        }, ms);
      }
      this.pending.add(pending);
    });
  }

  private assertConnected(operation: string): void {
    if (!this.connected) {
      throw new FatalError(`Instrument ${this.id} is not connected`, { operation, instrumentId: this.id });
    }
  }
}
