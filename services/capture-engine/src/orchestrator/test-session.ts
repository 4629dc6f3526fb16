/**
 * Test Session
 *
 * One test run end to end:
 *
 *   build instruments (ConfigError here means nothing was started)
 *   → create <outputRoot>/<YYYYMMDD_HHMMSS>_UTC_<testName>/
 *   → start every loop, install stop channels
 *   → supervise until all loops are terminal
 *   → reconcile once, write test_metadata/test_manifest.json and TEST_SUMMARY.txt
 */

import * as fs from 'fs/promises';
import * as path from 'path';
import { v4 as uuidv4 } from 'uuid';

import { config } from '../config.js';
import { log, Logger, attachRunLogFile } from '../utils/logger.js';
import { InternalError, errorMessage } from '../utils/errors.js';
import { formatUtcStamp } from '../utils/time.js';
import { AcquisitionLoop } from '../core/acquisition-loop.js';
import { ShutdownCoordinator } from '../core/shutdown-coordinator.js';
import { Reconciler } from '../core/reconciler.js';
import { SetpointController } from '../core/setpoint-controller.js';
import {
  METADATA_DIR,
  buildManifest,
  writeManifest,
  writeTestSummary,
  type TestManifest,
} from '../core/manifest.js';
import { CsvArtifactSink } from '../artifacts/csv-artifact-sink.js';
import { DirectoryArtifactSource } from '../artifacts/directory-artifact-source.js';
import { createInstrument, type DriverContext } from '../drivers/driver-registry.js';
import { ControlServer, type SessionStatus, type StatusProvider } from '../api/control-server.js';
import {
  watchKeyPress,
  watchProcessSignals,
  watchStopFlag,
  type Disposer,
  type KeyInput,
  type SignalSource,
} from '../services/stop-signals/index.js';
import type { InstrumentConfig, RigConfig } from '../services/rig-config/index.js';
import type {
  Artifact,
  ArtifactSource,
  Gap,
  Instrument,
  LoopReport,
  LoopState,
  SetpointOutcome,
  StopRequest,
} from '../types/capture-types.js';

export interface TestSessionOptions {
  rig: RigConfig;
  configRef: string;
  /** Overrides rig.testName */
  testName?: string;
  /** Overrides rig.durationMs */
  durationMs?: number;
  driverContext?: DriverContext;
  /** Replaces the driver registry, e.g. with pre-built simulated instruments */
  instrumentFactory?: (instrument: InstrumentConfig) => Instrument;
  /** Install flag-file, key and signal stop channels from the rig file (default true) */
  stopChannels?: boolean;
  signalSource?: SignalSource;
  keyInput?: KeyInput;
  logger?: Logger;
}

export interface TestSessionResult {
  testId: string;
  testDir: string;
  manifestPath: string;
  summaryPath: string;
  manifest: TestManifest;
  exitCode: number;
}

interface PreparedLoop {
  config: InstrumentConfig;
  instrument: Instrument;
  stagingDir: string;
}

export function testDirectoryName(startedAt: Date, testName: string): string {
  return `${formatUtcStamp(startedAt)}_UTC_${testName}`;
}

export class TestSession implements StatusProvider {
  readonly testId = uuidv4();
  readonly coordinator: ShutdownCoordinator;

  private readonly options: TestSessionOptions;
  private readonly rig: RigConfig;
  private readonly testName: string;
  private readonly logger: Logger;
  private loops: AcquisitionLoop[] = [];
  private startedAt: Date | null = null;
  private server: ControlServer | null = null;
  private ran = false;

  constructor(options: TestSessionOptions) {
    this.options = options;
    this.rig = options.rig;
    this.testName = options.testName ?? options.rig.testName;
    this.logger = (options.logger ?? log).child({ service: 'test-session', testId: this.testId });
    this.coordinator = new ShutdownCoordinator({
      graceTimeoutMs: this.rig.graceTimeoutMs ?? config.shutdown.graceTimeoutMs,
      logger: this.logger.child({ service: 'shutdown-coordinator' }),
    });
  }

  get controlServer(): ControlServer | null {
    return this.server;
  }

  status(): SessionStatus {
    return {
      testId: this.testId,
      testName: this.testName,
      startedAt: this.startedAt?.toISOString() ?? null,
      stop: this.coordinator.stopRequest,
      loops: this.loops.map((loop) => loop.status()),
    };
  }

  async run(): Promise<TestSessionResult> {
    if (this.ran) {
      throw new InternalError(`Test session ${this.testId} already ran`, { operation: 'run' });
    }
    this.ran = true;

    // Everything that can fail on configuration happens before any I/O
    const startedAt = new Date();
    const testDir = path.join(this.rig.outputRoot, testDirectoryName(startedAt, this.testName));
    const stagingRoot = this.rig.stagingDir ?? path.join(testDir, '.staging');
    const prepared = this.prepareInstruments(stagingRoot);

    await fs.mkdir(path.join(testDir, METADATA_DIR), { recursive: true });
    const detachLog = attachRunLogFile(path.join(testDir, METADATA_DIR, 'capture.log'));

    let disposers: Disposer[] = [];
    let durationTimer: NodeJS.Timeout | undefined;

    try {
      this.startedAt = startedAt;
      this.logger.info('Test started', { testName: this.testName, testDir, instruments: prepared.length });

      this.loops = prepared.map((entry) => this.createLoop(entry));
      const sources = this.createSources(prepared);
      disposers = await this.installStopChannels();
      await this.startControlServer();

      const durationMs = this.options.durationMs ?? this.rig.durationMs;
      durationTimer = durationMs
        ? setTimeout(() => this.coordinator.requestStop('duration', `duration of ${durationMs}ms elapsed`), durationMs)
        : undefined;

      // run() never rejects; force-terminated loops may never settle at all
      for (const loop of this.loops) {
        loop.run().catch((error: unknown) => {
          this.logger.error('Loop run rejected', error instanceof Error ? error : undefined, { instrumentId: loop.id });
        });
      }

      const supervision = await this.coordinator.supervise(this.loops);
      clearTimeout(durationTimer);
      const endedAt = new Date();
      await this.dispose(disposers.splice(0));

      const reports = this.loops.map((loop) => loop.report());
      const reconciliation = await new Reconciler(this.logger).reconcile({
        testDir,
        startedAt,
        endedAt,
        loopArtifacts: reports.flatMap((report) => report.artifacts),
        sources,
        marginMs: this.rig.reconcile.marginMs ?? config.reconcile.marginMs,
        lookbackMs: this.rig.reconcile.lookbackMs ?? config.reconcile.lookbackMs,
      });
      await this.removeEmptyStaging(prepared, stagingRoot);

      const manifest = buildManifest({
        testId: this.testId,
        testName: this.testName,
        configRef: this.options.configRef,
        startedAt,
        endedAt,
        stop: supervision.stop,
        reports,
        artifacts: reconciliation.artifacts,
        warnings: [...this.loopWarnings(reports, supervision.forced), ...reconciliation.warnings],
      });

      const manifestPath = await writeManifest(testDir, manifest);
      const summaryPath = await writeTestSummary(testDir, manifest);

      this.logger.info('Test finished', {
        exitCode: manifest.exit_code,
        artifacts: manifest.artifacts.length,
        warnings: manifest.warnings.length,
        durationS: manifest.duration_s,
      });

      return { testId: this.testId, testDir, manifestPath, summaryPath, manifest, exitCode: manifest.exit_code };
    } finally {
      clearTimeout(durationTimer);
      await this.dispose(disposers);
      await this.stopControlServer();
      detachLog();
    }
  }

  // ==========================================================================
  // Setup
  // ==========================================================================

  private prepareInstruments(stagingRoot: string): PreparedLoop[] {
    const factory = this.options.instrumentFactory ?? ((cfg: InstrumentConfig) => createInstrument(cfg, this.options.driverContext));
    return this.rig.instruments
      .filter((instrument) => instrument.enabled)
      .map((instrument) => ({
        config: instrument,
        instrument: factory(instrument),
        stagingDir: path.join(stagingRoot, instrument.id),
      }));
  }

  private createLoop({ config: cfg, instrument, stagingDir }: PreparedLoop): AcquisitionLoop {
    const loopLogger = this.logger.child({ instrumentId: cfg.id, subsystem: cfg.subsystem });
    const loop = new AcquisitionLoop({
      instrument,
      subsystem: cfg.subsystem,
      sink: new CsvArtifactSink({ instrumentId: cfg.id, subsystem: cfg.subsystem, stagingDir }),
      stop: this.coordinator,
      acquireTimeoutMs: cfg.acquireTimeoutMs ?? config.acquisition.acquireTimeoutMs,
      maxRetriesPerIteration: cfg.maxRetriesPerIteration ?? config.acquisition.maxRetriesPerIteration,
      retryDelayMs: cfg.retryDelayMs ?? config.acquisition.retryDelayMs,
      windowsPerArtifact: cfg.windowsPerArtifact,
      startupDelayMs: cfg.startupDelayMs,
      setpoints: cfg.setpoints.map((setpoint) => ({
        channelId: setpoint.channel,
        target: setpoint.target,
        tolerance: setpoint.tolerance,
        maxRetries: setpoint.maxRetries,
        settleDelayMs: setpoint.settleDelayMs,
        safeLimit: setpoint.safeLimit,
      })),
      abortOnDegraded: cfg.abortOnDegraded,
      setpointController: new SetpointController({ logger: loopLogger }),
      emergencyOffTimeoutMs: config.shutdown.emergencyOffTimeoutMs,
      logger: loopLogger,
    });

    loop.on('state', (state: LoopState) => this.server?.broadcast('loop:state', { instrumentId: cfg.id, state }));
    loop.on('artifact', (artifact: Artifact) => this.server?.broadcast('loop:artifact', artifact));
    loop.on('gap', (gap: Gap) => this.server?.broadcast('loop:gap', gap));
    loop.on('setpoint', (outcome: SetpointOutcome) => this.server?.broadcast('loop:setpoint', { instrumentId: cfg.id, ...outcome }));
    return loop;
  }

  private createSources(prepared: PreparedLoop[]): ArtifactSource[] {
    // Staging scans catch files finalized after a loop was force-terminated
    const staging = prepared.map(
      (entry) =>
        new DirectoryArtifactSource({
          directory: entry.stagingDir,
          subsystem: entry.config.subsystem,
          producerId: entry.config.id,
          logger: this.logger,
        })
    );
    const external = this.rig.sources.map(
      (source) =>
        new DirectoryArtifactSource({
          directory: source.directory,
          subsystem: source.subsystem,
          pattern: source.pattern ? new RegExp(source.pattern) : undefined,
          recursive: source.recursive,
          producerId: source.producerId,
          logger: this.logger,
        })
    );
    return [...staging, ...external];
  }

  private async installStopChannels(): Promise<Disposer[]> {
    this.coordinator.on('stop', (request: StopRequest) => this.server?.broadcast('test:stop', request));
    if (this.options.stopChannels === false) {
      return [];
    }

    const { stop } = this.rig;
    const disposers: Disposer[] = [];
    if (stop.signals) {
      disposers.push(watchProcessSignals(this.coordinator, ['SIGINT', 'SIGTERM'], this.options.signalSource, this.logger));
    }
    if (stop.key) {
      disposers.push(watchKeyPress(this.coordinator, { key: stop.key, input: this.options.keyInput, logger: this.logger }));
    }
    if (stop.flagFile) {
      disposers.push(await watchStopFlag(this.coordinator, { file: stop.flagFile, pollMs: stop.flagPollMs, logger: this.logger }));
    }
    return disposers;
  }

  private async startControlServer(): Promise<void> {
    const settings = this.rig.controlServer;
    if (!settings.enabled) {
      return;
    }
    const server = new ControlServer({
      host: settings.host ?? config.controlServer.host,
      port: settings.port ?? config.controlServer.port,
      stop: this.coordinator,
      provider: this,
      logger: this.logger,
    });
    await server.start();
    this.server = server;
  }

  // ==========================================================================
  // Teardown
  // ==========================================================================

  private async dispose(disposers: Disposer[]): Promise<void> {
    for (const dispose of disposers) {
      try {
        await dispose();
      } catch (error) {
        this.logger.warn('Stop channel cleanup failed', { error: errorMessage(error) });
      }
    }
  }

  private async stopControlServer(): Promise<void> {
    const server = this.server;
    this.server = null;
    if (!server) {
      return;
    }
    try {
      await server.close();
    } catch (error) {
      this.logger.warn('Control server did not close cleanly', { error: errorMessage(error) });
    }
  }

  private async removeEmptyStaging(prepared: PreparedLoop[], stagingRoot: string): Promise<void> {
    for (const dir of [...prepared.map((entry) => entry.stagingDir), stagingRoot]) {
      try {
        const entries = await fs.readdir(dir);
        if (entries.length === 0) {
          await fs.rmdir(dir);
        } else {
          this.logger.warn('Staging directory not empty, left in place', { dir, files: entries.length });
        }
      } catch (error) {
        if (!(error instanceof Error && 'code' in error && error.code === 'ENOENT')) {
          this.logger.warn('Could not clean staging directory', { dir, error: errorMessage(error) });
        }
      }
    }
  }

  private loopWarnings(reports: LoopReport[], forced: string[]): string[] {
    const warnings: string[] = [];
    for (const report of reports) {
      if (forced.includes(report.instrumentId)) {
        warnings.push(`${report.instrumentId} did not stop within the grace period and was force terminated`);
      }
      for (const outcome of report.setpoints) {
        if (outcome.status === 'degraded') {
          warnings.push(
            `${report.instrumentId} setpoint ${outcome.channelId}=${outcome.target} degraded after ` +
              `${outcome.attempts} attempts: ${outcome.reason}`
          );
        }
      }
      if (report.gaps.length > 0) {
        warnings.push(`${report.instrumentId} recorded ${report.gaps.length} acquisition gap(s)`);
      }
    }
    return warnings;
  }
}
