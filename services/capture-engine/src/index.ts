/**
 * Capture Engine
 *
 * Synchronized multi-instrument acquisition and post-run reconciliation.
 */

export { AcquisitionLoop } from './core/acquisition-loop.js';
export type { AcquisitionLoopOptions, LoopStatus } from './core/acquisition-loop.js';
export { CoverageTracker } from './core/coverage-tracker.js';
export type { CoverageSnapshot, CoverageWindow } from './core/coverage-tracker.js';
export { SetpointController, assertWithinSafeLimit } from './core/setpoint-controller.js';
export type { EmergencyOffResult, SetpointControllerOptions } from './core/setpoint-controller.js';
export { ShutdownCoordinator } from './core/shutdown-coordinator.js';
export type { ShutdownCoordinatorOptions, SupervisionResult } from './core/shutdown-coordinator.js';
export { Reconciler, relocateFile, sha256File } from './core/reconciler.js';
export type { ReconcileInput, ReconcileResult, RelocatedFile } from './core/reconciler.js';
export {
  TestManifestSchema,
  buildManifest,
  exitCodeFor,
  formatSummary,
  parseManifest,
  readManifest,
  serializeManifest,
  writeManifest,
  writeTestSummary,
} from './core/manifest.js';
export type { ArtifactRecord, InstrumentRecord, ManifestInput, TestManifest } from './core/manifest.js';

export { CsvArtifactSink, CSV_HEADER, artifactFileName } from './artifacts/csv-artifact-sink.js';
export { DirectoryArtifactSource } from './artifacts/directory-artifact-source.js';

export { SimulatedInstrument } from './drivers/simulated-instrument.js';
export type { SimulatedInstrumentOptions } from './drivers/simulated-instrument.js';
export { ProcessInstrument } from './drivers/process-instrument.js';
export type { DriverProcess, ProcessInstrumentOptions, SpawnDriver } from './drivers/process-instrument.js';
export { ChannelMappedInstrument, createInstrument, supportedDriverKinds } from './drivers/driver-registry.js';
export type { DriverContext } from './drivers/driver-registry.js';

export * from './services/rig-config/index.js';
export * from './services/stop-signals/index.js';

export { ControlServer } from './api/control-server.js';
export type { ControlServerOptions, SessionStatus, StatusProvider } from './api/control-server.js';
export { TestSession, testDirectoryName } from './orchestrator/test-session.js';
export type { TestSessionOptions, TestSessionResult } from './orchestrator/test-session.js';

export * from './types/capture-types.js';
export * from './utils/errors.js';
export { formatUtcStamp, parseEmbeddedTimestamp, sleep } from './utils/time.js';
export { log, type Logger, type LogMetadata } from './utils/logger.js';
export { config, getConfig, type Config } from './config.js';
