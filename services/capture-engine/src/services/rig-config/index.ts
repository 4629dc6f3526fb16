/**
 * Rig Configuration Exports
 */

export { loadRigConfig, parseRigConfig, checkRigConfig } from './rig-config-loader.js';
export type { LoadedRigConfig } from './rig-config-loader.js';

export { RigConfigSchema, InstrumentSchema, DriverSchema } from './rig-config-schema.js';
export type {
  RigConfig,
  InstrumentConfig,
  DriverConfig,
  SimulatedDriverConfig,
  ProcessDriverConfig,
  ChannelConfig,
  SetpointConfig,
  SourceConfig,
  StopChannelsConfig,
} from './rig-config-schema.js';
