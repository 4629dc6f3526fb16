import { describe, it, expect } from 'vitest';
import {
  ChannelMappedInstrument,
  createInstrument,
  supportedDriverKinds,
} from '../src/drivers/driver-registry.js';
import { SimulatedInstrument } from '../src/drivers/simulated-instrument.js';
import { ProcessInstrument } from '../src/drivers/process-instrument.js';
import { InstrumentSchema, type InstrumentConfig } from '../src/services/rig-config/index.js';
import { ScriptedAcquireInstrument } from './fakes.js';

const instrumentConfig = (raw: Record<string, unknown>): InstrumentConfig =>
  InstrumentSchema.parse({ id: 'scope-1', capability: 'scope-channel-group', subsystem: 'scope', ...raw });

describe('createInstrument', () => {
  it('builds a simulated driver', () => {
    const instrument = createInstrument(instrumentConfig({ driver: { kind: 'simulated' } }));

    expect(instrument).toBeInstanceOf(SimulatedInstrument);
    expect(instrument.id).toBe('scope-1');
    expect(instrument.transport).toBe('simulated');
  });

  it('builds a process driver without starting it', () => {
    let spawned = 0;
    const instrument = createInstrument(
      instrumentConfig({ driver: { kind: 'process', transport: 'usb-tmc', command: 'scope-driver' } }),
      {
        spawnFn: () => {
          spawned++;
          throw new Error('not expected');
        },
      }
    );

    expect(instrument).toBeInstanceOf(ProcessInstrument);
    expect(instrument.transport).toBe('usb-tmc');
    expect(spawned).toBe(0);
  });

  it('wraps the driver when a channel is disabled or scaled', async () => {
    const instrument = createInstrument(
      instrumentConfig({
        driver: { kind: 'simulated', samplesPerWindow: 2, acquireMs: 1 },
        channels: [{ id: 'ch1' }, { id: 'ch2', enabled: false }],
      })
    );
    expect(instrument).toBeInstanceOf(ChannelMappedInstrument);

    await instrument.connect();
    const data = await instrument.acquire(1000);

    expect(data.channels.map((channel) => channel.channelId)).toEqual(['ch1']);
    expect(data.channels[0].values).toHaveLength(2);
  });

  it('leaves the driver unwrapped when every channel passes through', () => {
    const instrument = createInstrument(
      instrumentConfig({ driver: { kind: 'simulated' }, channels: [{ id: 'ch1' }, { id: 'ch2' }] })
    );
    expect(instrument).toBeInstanceOf(SimulatedInstrument);
  });
});

describe('ChannelMappedInstrument', () => {
  it('scales configured channels and passes unknown ones through', async () => {
    const inner = new ScriptedAcquireInstrument('scope-1', 'scope-channel-group', [
      {
        channels: [
          { channelId: 'ch1', values: [1, 2] },
          { channelId: 'ch2', values: [3] },
          { channelId: 'ch3', values: [4] },
        ],
        sampleIntervalMs: 1,
      },
    ]);
    const mapped = new ChannelMappedInstrument(inner, [
      { id: 'ch1', enabled: true, scale: 2 },
      { id: 'ch2', enabled: false, scale: 1 },
    ]);

    await expect(mapped.acquire(1000)).resolves.toEqual({
      channels: [
        { channelId: 'ch1', values: [2, 4] },
        { channelId: 'ch3', values: [4] },
      ],
      sampleIntervalMs: 1,
    });
  });

  it('forwards commands and shutdown to the driver', async () => {
    const inner = new ScriptedAcquireInstrument('psu-1', 'power-supply', []);
    const mapped = new ChannelMappedInstrument(inner, []);

    await expect(mapped.command({ op: 'set', channelId: 'out1', value: 3 })).resolves.toBe(3);
    await mapped.close();
    mapped.forceClose();

    expect(inner.commands).toEqual([{ op: 'set', channelId: 'out1', value: 3 }]);
    expect(inner.closeCalls).toBe(1);
    expect(inner.forceCloseCalls).toBe(1);
    expect(mapped.capability).toBe('power-supply');
  });
});

describe('supportedDriverKinds', () => {
  it('lists every driver kind', () => {
    expect(supportedDriverKinds()).toEqual(['simulated', 'process']);
  });
});
