/**
 * Reconciler
 *
 * Single-shot, after every loop is terminal. Collects the loops' own
 * artifacts plus whatever the configured sources list, keeps the ones dated
 * inside the test window, moves them into <testDir>/<subsystem>/ and sizes
 * and checksums each file.
 *
 * Producer-tagged artifacts are dated by their UTC start. Untagged files are
 * dated by the stamp embedded in their name and are unmatched without one.
 * Nothing recent is dropped silently: it is either relocated or warned about.
 * A relocated file whose checksum cannot be computed stays in the manifest
 * with a null checksum.
 */

import { createHash } from 'crypto';
import { createReadStream } from 'fs';
import * as fs from 'fs/promises';
import * as path from 'path';
import { pipeline } from 'stream/promises';
import { log, Logger } from '../utils/logger.js';
import { InternalError, errorMessage } from '../utils/errors.js';
import type { Artifact, ArtifactSource } from '../types/capture-types.js';

export interface ReconcileInput {
  testDir: string;
  startedAt: Date;
  endedAt: Date;
  loopArtifacts: Artifact[];
  sources: ArtifactSource[];
  marginMs: number;
  lookbackMs: number;
}

export interface RelocatedFile {
  /** Relative to the test directory, forward slashes */
  path: string;
  producerId: string | null;
  subsystem: string;
  startUtc: string;
  endUtc: string;
  size: number;
  checksum: string | null;
}

export type FileHasher = (file: string) => Promise<string>;

export interface ReconcileResult {
  artifacts: RelocatedFile[];
  unmatched: Artifact[];
  warnings: string[];
}

type MatchDecision = { matched: true; at: Date } | { matched: false; why: string };

function isCrossDevice(error: unknown): boolean {
  return error instanceof Error && 'code' in error && error.code === 'EXDEV';
}

function isNotFound(error: unknown): boolean {
  return error instanceof Error && 'code' in error && error.code === 'ENOENT';
}

async function exists(file: string): Promise<boolean> {
  try {
    await fs.access(file);
    return true;
  } catch (error) {
    if (isNotFound(error)) {
      return false;
    }
    throw error;
  }
}

export async function sha256File(file: string): Promise<string> {
  const hash = createHash('sha256');
  await pipeline(createReadStream(file), async (chunks: AsyncIterable<Buffer>) => {
    for await (const chunk of chunks) {
      hash.update(chunk);
    }
  });
  return hash.digest('hex');
}

/**
 * Move `source` into `directory`, suffixing `_1`, `_2`… on a name clash.
 * Falls back to copy + unlink across devices.
 */
export async function relocateFile(source: string, directory: string): Promise<string> {
  await fs.mkdir(directory, { recursive: true });

  if (path.resolve(path.dirname(source)) === path.resolve(directory)) {
    return path.resolve(source);
  }

  const ext = path.extname(source);
  const stem = path.basename(source, ext);
  let target = path.join(directory, `${stem}${ext}`);
  for (let n = 1; await exists(target); n++) {
    target = path.join(directory, `${stem}_${n}${ext}`);
  }

  try {
    await fs.rename(source, target);
  } catch (error) {
    if (!isCrossDevice(error)) {
      throw error;
    }
    await fs.copyFile(source, target);
    await fs.unlink(source);
  }
  return path.resolve(target);
}

export class Reconciler {
  private readonly logger: Logger;
  private ran = false;

  constructor(
    logger?: Logger,
    private readonly hashFile: FileHasher = sha256File
  ) {
    this.logger = (logger ?? log).child({ service: 'reconciler' });
  }

  async reconcile(input: ReconcileInput): Promise<ReconcileResult> {
    if (this.ran) {
      throw new InternalError('Reconciler already ran for this test', { operation: 'reconcile' });
    }
    this.ran = true;

    const windowStart = new Date(input.startedAt.getTime() - input.marginMs);
    const windowEnd = new Date(input.endedAt.getTime() + input.marginMs);
    const warnings: string[] = [];

    const candidates = [...input.loopArtifacts, ...(await this.listSources(input, warnings))];

    // Ordered so loop-produced (tagged) entries claim a path first
    const seen = new Set<string>();
    const matched: Array<{ artifact: Artifact; paths: string[]; at: Date }> = [];
    const unmatched: Artifact[] = [];

    for (const artifact of candidates) {
      const fresh = artifact.paths.map((p) => path.resolve(p)).filter((p) => !seen.has(p));
      if (fresh.length === 0) {
        continue;
      }
      fresh.forEach((p) => seen.add(p));

      const decision = this.decide(artifact, windowStart, windowEnd);
      if (decision.matched) {
        matched.push({ artifact, paths: fresh, at: decision.at });
      } else {
        unmatched.push(artifact);
        warnings.push(`Unmatched artifact ${fresh.join(', ')} (${artifact.subsystem}): ${decision.why}`);
      }
    }

    warnings.push(...this.findAmbiguities(matched));

    const relocated: RelocatedFile[] = [];
    for (const { artifact, paths } of matched) {
      const destination = path.join(input.testDir, artifact.subsystem);
      for (const source of paths) {
        let finalPath: string;
        let size: number;
        try {
          finalPath = await relocateFile(source, destination);
          size = (await fs.stat(finalPath)).size;
        } catch (error) {
          warnings.push(`Relocation failed for ${source}: ${errorMessage(error)}`);
          this.logger.error('Relocation failed', error instanceof Error ? error : undefined, { source });
          continue;
        }

        const relativePath = path.relative(input.testDir, finalPath).split(path.sep).join('/');
        let checksum: string | null = null;
        try {
          checksum = await this.hashFile(finalPath);
        } catch (error) {
          warnings.push(`Checksum failed for ${relativePath}: ${errorMessage(error)}`);
          this.logger.error('Checksum failed', error instanceof Error ? error : undefined, { path: finalPath });
        }

        relocated.push({
          path: relativePath,
          producerId: artifact.producerId ?? null,
          subsystem: artifact.subsystem,
          startUtc: artifact.startUtc,
          endUtc: artifact.endUtc,
          size,
          checksum,
        });
      }
    }

    relocated.sort((a, b) => a.startUtc.localeCompare(b.startUtc) || a.path.localeCompare(b.path));

    this.logger.info('Reconciliation complete', {
      relocated: relocated.length,
      unmatched: unmatched.length,
      warnings: warnings.length,
    });

    return { artifacts: relocated, unmatched, warnings };
  }

  private async listSources(input: ReconcileInput, warnings: string[]): Promise<Artifact[]> {
    const since = new Date(input.startedAt.getTime() - input.lookbackMs);
    const listed: Artifact[] = [];

    for (const source of input.sources) {
      try {
        listed.push(...(await source.listRecent(since)));
      } catch (error) {
        warnings.push(`Artifact source ${source.subsystem} could not be listed: ${errorMessage(error)}`);
        this.logger.warn('Artifact source failed', { subsystem: source.subsystem, error: errorMessage(error) });
      }
    }

    // Tagged first so a file claimed by both a loop and a scan keeps its producer
    return [...listed.filter((a) => a.producerId), ...listed.filter((a) => !a.producerId)];
  }

  private decide(artifact: Artifact, windowStart: Date, windowEnd: Date): MatchDecision {
    const stamp = artifact.producerId ? artifact.startUtc : artifact.embeddedUtc;
    if (!stamp) {
      return { matched: false, why: 'no producer tag and no date/time in its name' };
    }

    const at = new Date(stamp);
    if (Number.isNaN(at.getTime())) {
      return { matched: false, why: `unreadable timestamp ${stamp}` };
    }
    if (at < windowStart || at > windowEnd) {
      return {
        matched: false,
        why: `dated ${at.toISOString()} outside test window [${windowStart.toISOString()}, ${windowEnd.toISOString()}]`,
      };
    }
    return { matched: true, at };
  }

  private findAmbiguities(matched: Array<{ artifact: Artifact; paths: string[] }>): string[] {
    const byStamp = new Map<string, Array<{ subsystem: string; paths: string[] }>>();
    for (const { artifact, paths } of matched) {
      if (artifact.producerId || !artifact.embeddedUtc) {
        continue;
      }
      const group = byStamp.get(artifact.embeddedUtc) ?? [];
      group.push({ subsystem: artifact.subsystem, paths });
      byStamp.set(artifact.embeddedUtc, group);
    }

    const warnings: string[] = [];
    for (const [stamp, group] of byStamp) {
      const subsystems = new Set(group.map((g) => g.subsystem));
      if (subsystems.size > 1) {
        const files = group.flatMap((g) => g.paths.map((p) => `${g.subsystem}:${path.basename(p)}`));
        warnings.push(`Ambiguous match: identical embedded time ${stamp} in ${files.join(', ')}; all kept`);
      }
    }
    return warnings;
  }
}
