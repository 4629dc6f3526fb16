/**
 * Test Manifest
 *
 * Persisted record of one test run, written to
 * <testDir>/test_metadata/test_manifest.json alongside a plain-text
 * TEST_SUMMARY.txt. Field names are snake_case on disk.
 */

import * as fs from 'fs/promises';
import * as path from 'path';
import { z } from 'zod';
import { ConfigError } from '../utils/errors.js';
import { elapsedSeconds } from '../utils/time.js';
import type { LoopReport, StopRequest } from '../types/capture-types.js';
import type { RelocatedFile } from './reconciler.js';

const StopSourceSchema = z.enum(['operator', 'signal', 'loop-fatal', 'duration']);
const LoopStateSchema = z.enum(['idle', 'running', 'stopping', 'stopped', 'failed']);

const GapSchema = z.object({
  start_utc: z.string(),
  end_utc: z.string(),
  attempts: z.number().int(),
  reason: z.string(),
});

const SetpointRecordSchema = z.object({
  channel: z.string(),
  target: z.number(),
  status: z.enum(['accepted', 'degraded']),
  value: z.number().nullable(),
  attempts: z.number().int(),
  reason: z.string().nullable(),
});

const InstrumentRecordSchema = z.object({
  id: z.string(),
  capability: z.enum(['camera', 'scope-channel-group', 'power-supply']),
  subsystem: z.string(),
  terminal_state: LoopStateSchema,
  failure_reason: z.string().nullable(),
  coverage: z.number().min(0).max(1),
  windows: z.number().int().min(0),
  gaps: z.array(GapSchema),
  setpoints: z.array(SetpointRecordSchema),
});

const ArtifactRecordSchema = z.object({
  path: z.string(),
  producer_id: z.string().nullable(),
  subsystem: z.string(),
  start_utc: z.string(),
  end_utc: z.string(),
  size: z.number().int().min(0),
  checksum: z.string().nullable(),
});

export const TestManifestSchema = z.object({
  test_id: z.string(),
  test_name: z.string(),
  config_ref: z.string(),
  start_utc: z.string(),
  end_utc: z.string(),
  duration_s: z.number().min(0),
  stop: z
    .object({
      source: StopSourceSchema,
      reason: z.string(),
    })
    .nullable(),
  instruments: z.array(InstrumentRecordSchema),
  artifacts: z.array(ArtifactRecordSchema),
  warnings: z.array(z.string()),
  exit_code: z.number().int(),
});

export type TestManifest = z.infer<typeof TestManifestSchema>;
export type InstrumentRecord = z.infer<typeof InstrumentRecordSchema>;
export type ArtifactRecord = z.infer<typeof ArtifactRecordSchema>;

export const MANIFEST_FILE = 'test_manifest.json';
export const SUMMARY_FILE = 'TEST_SUMMARY.txt';
export const METADATA_DIR = 'test_metadata';

export interface ManifestInput {
  testId: string;
  testName: string;
  configRef: string;
  startedAt: Date;
  endedAt: Date;
  stop: StopRequest | null;
  reports: LoopReport[];
  artifacts: RelocatedFile[];
  warnings: string[];
}

/** 0 when every loop stopped cleanly, 1 when any failed (forced included) */
export function exitCodeFor(reports: LoopReport[]): number {
  return reports.every((report) => report.state === 'stopped') ? 0 : 1;
}

export function toInstrumentRecord(report: LoopReport): InstrumentRecord {
  return {
    id: report.instrumentId,
    capability: report.capability,
    subsystem: report.subsystem,
    terminal_state: report.state,
    failure_reason: report.failureReason ?? null,
    coverage: report.coverage,
    windows: report.windows,
    gaps: report.gaps.map((gap) => ({
      start_utc: gap.startUtc,
      end_utc: gap.endUtc,
      attempts: gap.attempts,
      reason: gap.reason,
    })),
    setpoints: report.setpoints.map((outcome) =>
      outcome.status === 'accepted'
        ? {
            channel: outcome.channelId,
            target: outcome.target,
            status: outcome.status,
            value: outcome.value,
            attempts: outcome.attempts,
            reason: null,
          }
        : {
            channel: outcome.channelId,
            target: outcome.target,
            status: outcome.status,
            value: outcome.lastValue,
            attempts: outcome.attempts,
            reason: outcome.reason,
          }
    ),
  };
}

export function buildManifest(input: ManifestInput): TestManifest {
  return {
    test_id: input.testId,
    test_name: input.testName,
    config_ref: input.configRef,
    start_utc: input.startedAt.toISOString(),
    end_utc: input.endedAt.toISOString(),
    duration_s: elapsedSeconds(input.startedAt, input.endedAt),
    stop: input.stop ? { source: input.stop.source, reason: input.stop.reason } : null,
    instruments: input.reports.map(toInstrumentRecord),
    artifacts: input.artifacts.map((file) => ({
      path: file.path,
      producer_id: file.producerId,
      subsystem: file.subsystem,
      start_utc: file.startUtc,
      end_utc: file.endUtc,
      size: file.size,
      checksum: file.checksum,
    })),
    warnings: [...input.warnings],
    exit_code: exitCodeFor(input.reports),
  };
}

export function serializeManifest(manifest: TestManifest): string {
  return `${JSON.stringify(manifest, null, 2)}\n`;
}

export function parseManifest(text: string): TestManifest {
  let raw: unknown;
  try {
    raw = JSON.parse(text);
  } catch (error) {
    throw new ConfigError('Manifest is not valid JSON', [error instanceof Error ? error.message : String(error)], {
      operation: 'parseManifest',
    });
  }

  const result = TestManifestSchema.safeParse(raw);
  if (!result.success) {
    throw new ConfigError(
      'Manifest does not match the expected schema',
      result.error.issues.map((issue) => `${issue.path.join('.') || '(root)'}: ${issue.message}`),
      { operation: 'parseManifest' }
    );
  }
  return result.data;
}

export async function writeManifest(testDir: string, manifest: TestManifest): Promise<string> {
  const dir = path.join(testDir, METADATA_DIR);
  await fs.mkdir(dir, { recursive: true });
  const file = path.join(dir, MANIFEST_FILE);
  await fs.writeFile(file, serializeManifest(manifest), 'utf-8');
  return file;
}

export async function readManifest(file: string): Promise<TestManifest> {
  return parseManifest(await fs.readFile(file, 'utf-8'));
}

const percent = (ratio: number): string => `${(ratio * 100).toFixed(1)}%`;

export function formatSummary(manifest: TestManifest): string {
  const lines: string[] = [
    `Test:      ${manifest.test_name}`,
    `Test ID:   ${manifest.test_id}`,
    `Config:    ${manifest.config_ref}`,
    `Start:     ${manifest.start_utc}`,
    `End:       ${manifest.end_utc}`,
    `Duration:  ${manifest.duration_s.toFixed(1)} s`,
    `Stopped by ${manifest.stop ? `${manifest.stop.source}: ${manifest.stop.reason}` : 'natural end'}`,
    `Exit code: ${manifest.exit_code}`,
    '',
    'Instruments:',
  ];

  for (const instrument of manifest.instruments) {
    const failure = instrument.failure_reason ? ` (${instrument.failure_reason})` : '';
    lines.push(
      `  ${instrument.id} [${instrument.capability}, ${instrument.subsystem}] ` +
        `${instrument.terminal_state}${failure}, coverage ${percent(instrument.coverage)}, ` +
        `${instrument.windows} windows, ${instrument.gaps.length} gaps`
    );
    for (const setpoint of instrument.setpoints) {
      lines.push(`    setpoint ${setpoint.channel}=${setpoint.target}: ${setpoint.status} after ${setpoint.attempts}`);
    }
  }

  const bySubsystem = new Map<string, number>();
  for (const artifact of manifest.artifacts) {
    bySubsystem.set(artifact.subsystem, (bySubsystem.get(artifact.subsystem) ?? 0) + 1);
  }
  lines.push('', `Artifacts: ${manifest.artifacts.length}`);
  for (const [subsystem, count] of [...bySubsystem].sort(([a], [b]) => a.localeCompare(b))) {
    lines.push(`  ${subsystem}/: ${count}`);
  }

  lines.push('', `Warnings: ${manifest.warnings.length}`);
  for (const warning of manifest.warnings) {
    lines.push(`  - ${warning}`);
  }

  return `${lines.join('\n')}\n`;
}

export async function writeTestSummary(testDir: string, manifest: TestManifest): Promise<string> {
  const file = path.join(testDir, SUMMARY_FILE);
  await fs.writeFile(file, formatSummary(manifest), 'utf-8');
  return file;
}
