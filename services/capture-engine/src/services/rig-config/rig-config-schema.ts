/**
 * Rig Configuration Schema
 *
 * One file per rig layout (YAML or JSON). Process-wide defaults come from
 * config.ts and fill whatever the rig file leaves out.
 */

import { z } from 'zod';

// ============================================================================
// Drivers
// ============================================================================

export const SimulatedDriverSchema = z.object({
  kind: z.literal('simulated'),
  acquireMs: z.number().int().positive().default(100),
  sampleIntervalMs: z.number().positive().optional(),
  samplesPerWindow: z.number().int().positive().default(10),
  transientFailureRate: z.number().min(0).max(1).default(0),
  fatalAfterWindows: z.number().int().min(0).optional(),
  hangAfterWindows: z.number().int().min(0).optional(),
  settleOnSet: z.number().int().positive().default(1),
  seed: z.number().int().default(1),
});

export const ProcessDriverSchema = z.object({
  kind: z.literal('process'),
  transport: z.enum(['serial-ascii', 'modbus-rtu', 'usb-tmc', 'uvc']),
  command: z.string().min(1),
  args: z.array(z.string()).default([]),
  env: z.record(z.string()).default({}),
  commandTimeoutMs: z.number().int().positive().default(2000),
});

export const DriverSchema = z.discriminatedUnion('kind', [SimulatedDriverSchema, ProcessDriverSchema]);

// ============================================================================
// Instruments
// ============================================================================

export const ChannelSchema = z.object({
  id: z.string().min(1),
  enabled: z.boolean().default(true),
  scale: z.number().default(1),
});

export const SetpointSchema = z.object({
  channel: z.string().min(1),
  target: z.number(),
  tolerance: z.number().nonnegative(),
  maxRetries: z.number().int().min(1).default(3),
  settleDelayMs: z.number().int().min(0).default(500),
  safeLimit: z.number().positive().optional(),
});

export const InstrumentSchema = z.object({
  id: z.string().regex(/^[A-Za-z0-9_.-]+$/, 'letters, digits, dot, dash and underscore only'),
  capability: z.enum(['camera', 'scope-channel-group', 'power-supply']),
  subsystem: z.string().regex(/^[A-Za-z0-9_.-]+$/, 'must be a plain directory name'),
  enabled: z.boolean().default(true),
  driver: DriverSchema,
  channels: z.array(ChannelSchema).default([]),
  setpoints: z.array(SetpointSchema).default([]),
  abortOnDegraded: z.boolean().default(false),
  startupDelayMs: z.number().int().min(0).default(0),
  acquireTimeoutMs: z.number().int().positive().optional(),
  maxRetriesPerIteration: z.number().int().min(0).optional(),
  retryDelayMs: z.number().int().min(0).optional(),
  /** 0 keeps one artifact for the whole run */
  windowsPerArtifact: z.number().int().min(0).default(1),
});

// ============================================================================
// Sources, stop channels, control server
// ============================================================================

export const SourceSchema = z.object({
  subsystem: z.string().regex(/^[A-Za-z0-9_.-]+$/, 'must be a plain directory name'),
  directory: z.string().min(1),
  pattern: z
    .string()
    .refine((value) => {
      try {
        new RegExp(value);
        return true;
      } catch {
        return false;
      }
    }, 'not a valid regular expression')
    .optional(),
  recursive: z.boolean().default(false),
  producerId: z.string().optional(),
});

export const StopChannelsSchema = z.object({
  flagFile: z.string().optional(),
  flagPollMs: z.number().int().positive().default(500),
  key: z.string().length(1).nullable().default('q'),
  signals: z.boolean().default(true),
});

export const ControlServerSchema = z.object({
  enabled: z.boolean().default(false),
  host: z.string().optional(),
  port: z.number().int().min(0).max(65535).optional(),
});

export const RigConfigSchema = z.object({
  testName: z.string().regex(/^[A-Za-z0-9_.-]+$/, 'letters, digits, dot, dash and underscore only'),
  outputRoot: z.string().default('./test_output'),
  stagingDir: z.string().optional(),
  graceTimeoutMs: z.number().int().positive().optional(),
  durationMs: z.number().int().positive().optional(),
  reconcile: z
    .object({
      marginMs: z.number().int().min(0).optional(),
      lookbackMs: z.number().int().positive().optional(),
    })
    .default({}),
  instruments: z.array(InstrumentSchema).min(1, 'at least one instrument is required'),
  sources: z.array(SourceSchema).default([]),
  stop: StopChannelsSchema.default({}),
  controlServer: ControlServerSchema.default({}),
});

export type DriverConfig = z.infer<typeof DriverSchema>;
export type SimulatedDriverConfig = z.infer<typeof SimulatedDriverSchema>;
export type ProcessDriverConfig = z.infer<typeof ProcessDriverSchema>;
export type ChannelConfig = z.infer<typeof ChannelSchema>;
export type SetpointConfig = z.infer<typeof SetpointSchema>;
export type InstrumentConfig = z.infer<typeof InstrumentSchema>;
export type SourceConfig = z.infer<typeof SourceSchema>;
export type StopChannelsConfig = z.infer<typeof StopChannelsSchema>;
export type RigConfig = z.infer<typeof RigConfigSchema>;
