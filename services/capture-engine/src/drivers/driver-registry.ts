/**
 * Driver Registry
 *
 * Maps a rig file's `driver.kind` to a factory. The core only ever sees the
 * resulting Instrument; channel enable/scale from the rig file is applied by
 * a thin wrapper so drivers stay unaware of it.
 */

import { ConfigError } from '../utils/errors.js';
import type { Logger } from '../utils/logger.js';
import { SimulatedInstrument } from './simulated-instrument.js';
import { ProcessInstrument, type SpawnDriver } from './process-instrument.js';
import type {
  AcquiredData,
  Instrument,
  InstrumentCapability,
  InstrumentCommand,
  TransportFamily,
} from '../types/capture-types.js';
import type { ChannelConfig, DriverConfig, InstrumentConfig } from '../services/rig-config/index.js';

export interface DriverContext {
  logger?: Logger;
  spawnFn?: SpawnDriver;
}

export type DriverFactory<K extends DriverConfig['kind']> = (
  instrument: InstrumentConfig,
  driver: Extract<DriverConfig, { kind: K }>,
  context: DriverContext
) => Instrument;

type DriverFactories = { [K in DriverConfig['kind']]: DriverFactory<K> };

const factories: DriverFactories = {
  simulated: (instrument, driver) =>
    new SimulatedInstrument({
      id: instrument.id,
      capability: instrument.capability,
      channels: instrument.channels.length > 0 ? instrument.channels.map((channel) => channel.id) : undefined,
      acquireMs: driver.acquireMs,
      sampleIntervalMs: driver.sampleIntervalMs,
      samplesPerWindow: driver.samplesPerWindow,
      transientFailureRate: driver.transientFailureRate,
      fatalAfterWindows: driver.fatalAfterWindows,
      hangAfterWindows: driver.hangAfterWindows,
      settleOnSet: driver.settleOnSet,
      seed: driver.seed,
    }),

  process: (instrument, driver, context) =>
    new ProcessInstrument({
      id: instrument.id,
      capability: instrument.capability,
      transport: driver.transport,
      command: driver.command,
      args: driver.args,
      env: driver.env,
      commandTimeoutMs: driver.commandTimeoutMs,
      spawnFn: context.spawnFn,
      logger: context.logger,
    }),
};

/**
 * Drops disabled channels from acquired data and applies per-channel scale.
 */
export class ChannelMappedInstrument implements Instrument {
  private readonly channels: Map<string, ChannelConfig>;

  constructor(
    private readonly inner: Instrument,
    channels: ChannelConfig[]
  ) {
    this.channels = new Map(channels.map((channel) => [channel.id, channel]));
  }

  get id(): string {
    return this.inner.id;
  }

  get capability(): InstrumentCapability {
    return this.inner.capability;
  }

  get transport(): TransportFamily {
    return this.inner.transport;
  }

  connect(): Promise<void> {
    return this.inner.connect();
  }

  async acquire(timeoutMs: number): Promise<AcquiredData> {
    const data = await this.inner.acquire(timeoutMs);
    const channels = data.channels.flatMap((channel) => {
      const config = this.channels.get(channel.channelId);
      if (!config) {
        return [channel];
      }
      if (!config.enabled) {
        return [];
      }
      return [{ channelId: channel.channelId, values: channel.values.map((value) => value * config.scale) }];
    });
    return { ...data, channels };
  }

  command(cmd: InstrumentCommand): Promise<number> {
    return this.inner.command(cmd);
  }

  close(): Promise<void> {
    return this.inner.close();
  }

  forceClose(): void {
    this.inner.forceClose();
  }
}

export function createInstrument(instrument: InstrumentConfig, context: DriverContext = {}): Instrument {
  const { driver } = instrument;
  let created: Instrument;

  switch (driver.kind) {
    case 'simulated':
      created = factories.simulated(instrument, driver, context);
      break;
    case 'process':
      created = factories.process(instrument, driver, context);
      break;
    default:
      throw new ConfigError(`Unknown driver kind for ${instrument.id}`, [`instruments.${instrument.id}.driver.kind`]);
  }

  const mapped = instrument.channels.some((channel) => !channel.enabled || channel.scale !== 1);
  return mapped ? new ChannelMappedInstrument(created, instrument.channels) : created;
}

export function supportedDriverKinds(): string[] {
  return Object.keys(factories);
}
