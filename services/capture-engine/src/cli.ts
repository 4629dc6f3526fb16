#!/usr/bin/env node
/**
 * capture-rig command line
 *
 *   capture-rig run <rig-file> [--name <test>] [--duration <ms>]
 *   capture-rig validate <rig-file>
 *
 * Exit codes: 0 every loop stopped, 1 a loop failed (forced stops included),
 * 2 the rig file was rejected before anything started.
 */

import { Command, Option } from 'commander';
import { realpathSync } from 'fs';
import { pathToFileURL } from 'url';

import { config } from './config.js';
import { log } from './utils/logger.js';
import { errorMessage, isCaptureError, ConfigError } from './utils/errors.js';
import { loadRigConfig } from './services/rig-config/index.js';
import { createInstrument, supportedDriverKinds } from './drivers/driver-registry.js';
import { TestSession } from './orchestrator/test-session.js';

export const EXIT_OK = 0;
export const EXIT_FAILED = 1;
export const EXIT_CONFIG = 2;

export interface RunCommandOptions {
  name?: string;
  duration?: number;
  keys?: boolean;
}

type Output = (line: string) => void;

const stdout: Output = (line) => process.stdout.write(`${line}\n`);
const stderr: Output = (line) => process.stderr.write(`${line}\n`);

function reportConfigError(error: ConfigError, out: Output): void {
  out(`Configuration rejected: ${error.message}`);
  for (const issue of error.issues) {
    out(`  - ${issue}`);
  }
}

export async function validateCommand(file: string, out: Output = stdout, err: Output = stderr): Promise<number> {
  try {
    const { rig, configRef } = await loadRigConfig(file);
    for (const instrument of rig.instruments.filter((entry) => entry.enabled)) {
      createInstrument(instrument);
    }
    out(`${configRef}: OK`);
    out(`  test name:   ${rig.testName}`);
    out(`  output root: ${rig.outputRoot}`);
    for (const instrument of rig.instruments) {
      const state = instrument.enabled ? '' : ' (disabled)';
      out(`  ${instrument.id}: ${instrument.capability} via ${instrument.driver.kind} → ${instrument.subsystem}/${state}`);
    }
    return EXIT_OK;
  } catch (error) {
    if (error instanceof ConfigError) {
      reportConfigError(error, err);
      return EXIT_CONFIG;
    }
    throw error;
  }
}

export async function runCommand(file: string, options: RunCommandOptions, err: Output = stderr): Promise<number> {
  try {
    const { rig, configRef } = await loadRigConfig(file);
    const stop = options.keys === false ? { ...rig.stop, key: null } : rig.stop;
    const session = new TestSession({
      rig: { ...rig, stop },
      configRef,
      testName: options.name,
      durationMs: options.duration,
    });
    const result = await session.run();
    err(`Test ${result.manifest.test_name} finished with exit code ${result.exitCode}`);
    err(`  ${result.testDir}`);
    return result.exitCode;
  } catch (error) {
    if (error instanceof ConfigError) {
      reportConfigError(error, err);
      return EXIT_CONFIG;
    }
    throw error;
  }
}

function parseDuration(value: string): number {
  const ms = Number.parseInt(value, 10);
  if (!Number.isFinite(ms) || ms <= 0) {
    throw new ConfigError(`Invalid duration "${value}"`, ['--duration must be a positive number of milliseconds']);
  }
  return ms;
}

export function buildProgram(): Command {
  const program = new Command();
  program
    .name('capture-rig')
    .description('Synchronized multi-instrument acquisition and reconciliation')
    .version(config.version);

  program
    .command('run')
    .description('run one test with the instruments described in a rig file')
    .argument('<rig-file>', 'rig configuration (YAML or JSON)')
    .option('-n, --name <test>', 'test name, overrides the rig file')
    .addOption(new Option('-d, --duration <ms>', 'stop automatically after this many milliseconds').argParser(parseDuration))
    .option('--no-keys', 'do not listen for the stop key on the terminal')
    .action(async (file: string, options: RunCommandOptions) => {
      process.exitCode = await runCommand(file, options);
    });

  program
    .command('validate')
    .description('check a rig file without touching any instrument')
    .argument('<rig-file>', 'rig configuration (YAML or JSON)')
    .action(async (file: string) => {
      process.exitCode = await validateCommand(file);
    });

  program
    .command('drivers')
    .description('list the driver kinds a rig file may use')
    .action(() => {
      stdout(supportedDriverKinds().join('\n'));
    });

  return program;
}

export async function main(argv: string[] = process.argv): Promise<void> {
  try {
    await buildProgram().parseAsync(argv);
  } catch (error) {
    if (error instanceof ConfigError) {
      reportConfigError(error, stderr);
      process.exitCode = EXIT_CONFIG;
      return;
    }
    log.error('Unexpected failure', error instanceof Error ? error : undefined, {
      code: isCaptureError(error) ? error.code : undefined,
    });
    stderr(`capture-rig: ${errorMessage(error)}`);
    process.exitCode = EXIT_FAILED;
  }
}

function invokedDirectly(): boolean {
  const script = process.argv[1];
  if (!script) {
    return false;
  }
  try {
    // npm links bin entries, so compare resolved paths
    return import.meta.url === pathToFileURL(realpathSync(script)).href;
  } catch {
    return false;
  }
}

if (invokedDirectly()) {
  main().catch((error: unknown) => {
    stderr(`capture-rig: ${errorMessage(error)}`);
    process.exitCode = EXIT_FAILED;
  });
}
