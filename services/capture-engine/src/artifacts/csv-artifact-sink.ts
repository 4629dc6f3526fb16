/**
 * CSV Artifact Sink
 *
 * One CSV file per artifact in the staging directory:
 *   <instrumentId>_<YYYYMMDD_HHMMSS_mmm>_UTC.csv
 *
 * Artifacts that start in the same millisecond get a numeric suffix
 * (_1, _2, ...) instead of sharing a file.
 *
 * Columns: utc_timestamp, channel, sample_index, offset_s, value
 * (offset_s is the sample's offset within its capture window).
 * Files a driver persisted itself join the artifact's file set.
 */

import * as fs from 'fs/promises';
import * as path from 'path';
import { v4 as uuidv4 } from 'uuid';
import { formatUtcStamp } from '../utils/time.js';
import { InternalError } from '../utils/errors.js';
import type { Artifact, ArtifactSink, CaptureWindow } from '../types/capture-types.js';

export const CSV_HEADER = 'utc_timestamp,channel,sample_index,offset_s,value';

export interface CsvArtifactSinkOptions {
  instrumentId: string;
  subsystem: string;
  stagingDir: string;
}

interface OpenArtifact {
  id: string;
  csvPath: string;
  startedAt: Date;
  lastEnd: Date;
  extraFiles: Set<string>;
}

export function artifactFileName(instrumentId: string, startedAt: Date, sequence = 0): string {
  const suffix = sequence > 0 ? `_${sequence}` : '';
  return `${instrumentId}_${formatUtcStamp(startedAt, true)}_UTC${suffix}.csv`;
}

function isAlreadyExists(error: unknown): boolean {
  return error instanceof Error && 'code' in error && error.code === 'EEXIST';
}

export function windowToCsvRows(window: CaptureWindow): string[] {
  return window.samples.map((sample) => {
    const offset = (sample.index * window.sampleIntervalMs) / 1000;
    return [sample.timestamp, csvField(sample.channelId), sample.index, offset.toFixed(6), sample.value].join(',');
  });
}

function csvField(value: string): string {
  return /[",\n]/.test(value) ? `"${value.replace(/"/g, '""')}"` : value;
}

export class CsvArtifactSink implements ArtifactSink {
  private current: OpenArtifact | null = null;

  constructor(private readonly options: CsvArtifactSinkOptions) {}

  get isOpen(): boolean {
    return this.current !== null;
  }

  async open(startedAt: Date): Promise<void> {
    if (this.current) {
      throw new InternalError('Artifact already open', {
        operation: 'open',
        instrumentId: this.options.instrumentId,
      });
    }

    await fs.mkdir(this.options.stagingDir, { recursive: true });
    const csvPath = await this.create(startedAt);

    this.current = {
      id: uuidv4(),
      csvPath,
      startedAt,
      lastEnd: startedAt,
      extraFiles: new Set(),
    };
  }

  private async create(startedAt: Date): Promise<string> {
    for (let sequence = 0; ; sequence++) {
      const csvPath = path.join(
        this.options.stagingDir,
        artifactFileName(this.options.instrumentId, startedAt, sequence),
      );
      try {
        await fs.writeFile(csvPath, `${CSV_HEADER}\n`, { encoding: 'utf-8', flag: 'wx' });
        return csvPath;
      } catch (error) {
        if (!isAlreadyExists(error)) {
          throw error;
        }
      }
    }
  }

  async append(window: CaptureWindow): Promise<void> {
    const current = this.current;
    if (!current) {
      throw new InternalError('No open artifact', {
        operation: 'append',
        instrumentId: this.options.instrumentId,
      });
    }

    const rows = windowToCsvRows(window);
    if (rows.length > 0) {
      await fs.appendFile(current.csvPath, `${rows.join('\n')}\n`, 'utf-8');
    }
    for (const file of window.files) {
      current.extraFiles.add(file);
    }
    if (window.completedAt > current.lastEnd) {
      current.lastEnd = window.completedAt;
    }
  }

  async close(): Promise<Artifact | null> {
    return this.abandon();
  }

  abandon(): Artifact | null {
    const current = this.current;
    if (!current) {
      return null;
    }
    this.current = null;

    return {
      id: current.id,
      producerId: this.options.instrumentId,
      subsystem: this.options.subsystem,
      paths: [current.csvPath, ...current.extraFiles],
      startUtc: current.startedAt.toISOString(),
      endUtc: current.lastEnd.toISOString(),
    };
  }
}
