/**
 * Tests for Reconciler
 */

import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { createHash } from 'crypto';
import * as fs from 'fs/promises';
import * as os from 'os';
import * as path from 'path';
import { Reconciler, relocateFile, sha256File, type ReconcileInput } from '../src/core/reconciler.js';
import { DirectoryArtifactSource } from '../src/artifacts/directory-artifact-source.js';
import { InternalError } from '../src/utils/errors.js';
import type { Artifact, ArtifactSource } from '../src/types/capture-types.js';

const startedAt = new Date('2025-10-15T12:00:00.000Z');
const endedAt = new Date('2025-10-15T12:00:30.000Z');

async function touch(file: string, content = 'x'): Promise<string> {
  await fs.mkdir(path.dirname(file), { recursive: true });
  await fs.writeFile(file, content);
  return file;
}

describe('Reconciler', () => {
  let root: string;
  let testDir: string;

  beforeEach(async () => {
    root = await fs.mkdtemp(path.join(os.tmpdir(), 'reconciler-'));
    testDir = path.join(root, 'test');
  });

  afterEach(async () => {
    await fs.rm(root, { recursive: true, force: true });
  });

  const input = (overrides: Partial<ReconcileInput> = {}): ReconcileInput => ({
    testDir,
    startedAt,
    endedAt,
    loopArtifacts: [],
    sources: [],
    marginMs: 2000,
    lookbackMs: 60_000,
    ...overrides,
  });

  const loopArtifact = (file: string, startUtc: string, producerId = 'scope-1'): Artifact => ({
    id: `artifact-${path.basename(file)}`,
    producerId,
    subsystem: 'scope',
    paths: [file],
    startUtc,
    endUtc: startUtc,
  });

  it('relocates a loop artifact and records its size and checksum', async () => {
    const file = await touch(path.join(root, 'staging', 'scope-1_20251015_120005_000_UTC.csv'), 'abc');

    const result = await new Reconciler().reconcile(
      input({ loopArtifacts: [loopArtifact(file, '2025-10-15T12:00:05.000Z')] })
    );

    expect(result.warnings).toEqual([]);
    expect(result.artifacts).toEqual([
      {
        path: 'scope/scope-1_20251015_120005_000_UTC.csv',
        producerId: 'scope-1',
        subsystem: 'scope',
        startUtc: '2025-10-15T12:00:05.000Z',
        endUtc: '2025-10-15T12:00:05.000Z',
        size: 3,
        checksum: 'ba7816bf8f01cfea414140de5dae2223b00361a396177a9cb410ff61f20015ad',
      },
    ]);
    await expect(fs.readFile(path.join(testDir, 'scope', 'scope-1_20251015_120005_000_UTC.csv'), 'utf-8')).resolves.toBe(
      'abc'
    );
    await expect(fs.access(file)).rejects.toThrow();
  });

  it('excludes an untagged file dated ten minutes before the test and warns', async () => {
    const external = path.join(root, 'thermal');
    await touch(path.join(external, 'thermal_20251015_120010.mp4'));
    const stale = await touch(path.join(external, 'thermal_20251015_115000.mp4'));
    const source = new DirectoryArtifactSource({ directory: external, subsystem: 'thermal' });

    const result = await new Reconciler().reconcile(input({ sources: [source] }));

    expect(result.artifacts.map((artifact) => artifact.path)).toEqual(['thermal/thermal_20251015_120010.mp4']);
    expect(result.artifacts[0].producerId).toBeNull();
    expect(result.unmatched).toHaveLength(1);
    expect(result.warnings).toEqual([
      `Unmatched artifact ${stale} (thermal): dated 2025-10-15T11:50:00.000Z outside test window ` +
        '[2025-10-15T11:59:58.000Z, 2025-10-15T12:00:32.000Z]',
    ]);
    await expect(fs.access(stale)).resolves.toBeUndefined();
  });

  it('keeps a file dated within the margin', async () => {
    const external = path.join(root, 'visual');
    await touch(path.join(external, 'visual_20251015_120031.avi'));
    const source = new DirectoryArtifactSource({ directory: external, subsystem: 'visual' });

    const result = await new Reconciler().reconcile(input({ sources: [source] }));

    expect(result.artifacts.map((artifact) => artifact.path)).toEqual(['visual/visual_20251015_120031.avi']);
  });

  it('warns about untagged files without a timestamp in their name', async () => {
    const external = path.join(root, 'thermal');
    const notes = await touch(path.join(external, 'notes.txt'));
    const source = new DirectoryArtifactSource({ directory: external, subsystem: 'thermal' });

    const result = await new Reconciler().reconcile(input({ sources: [source] }));

    expect(result.artifacts).toEqual([]);
    expect(result.warnings).toEqual([
      `Unmatched artifact ${notes} (thermal): no producer tag and no date/time in its name`,
    ]);
  });

  it('keeps every file sharing an embedded time across subsystems and warns', async () => {
    await touch(path.join(root, 'thermal', 'cam_20251015_120010.mp4'));
    await touch(path.join(root, 'visual', 'vis_20251015_120010.avi'));
    const sources = [
      new DirectoryArtifactSource({ directory: path.join(root, 'thermal'), subsystem: 'thermal' }),
      new DirectoryArtifactSource({ directory: path.join(root, 'visual'), subsystem: 'visual' }),
    ];

    const result = await new Reconciler().reconcile(input({ sources }));

    expect(result.artifacts.map((artifact) => artifact.path).sort()).toEqual([
      'thermal/cam_20251015_120010.mp4',
      'visual/vis_20251015_120010.avi',
    ]);
    expect(result.warnings).toEqual([
      'Ambiguous match: identical embedded time 2025-10-15T12:00:10.000Z in ' +
        'thermal:cam_20251015_120010.mp4, visual:vis_20251015_120010.avi; all kept',
    ]);
  });

  it('takes a file listed twice only once and keeps its producer', async () => {
    const staging = path.join(root, 'staging', 'scope-1');
    const file = await touch(path.join(staging, 'scope-1_20251015_120005_000_UTC.csv'));
    const source = new DirectoryArtifactSource({ directory: staging, subsystem: 'scope', producerId: 'scope-1' });

    const result = await new Reconciler().reconcile(
      input({ loopArtifacts: [loopArtifact(file, '2025-10-15T12:00:05.000Z')], sources: [source] })
    );

    expect(result.artifacts).toHaveLength(1);
    expect(result.artifacts[0]).toMatchObject({ producerId: 'scope-1', startUtc: '2025-10-15T12:00:05.000Z' });
    expect(result.warnings).toEqual([]);
  });

  it('picks up a tagged file the loop never reported', async () => {
    const staging = path.join(root, 'staging', 'cam-1');
    await touch(path.join(staging, 'cam-1_20251015_120029_500_UTC.csv'));
    const source = new DirectoryArtifactSource({ directory: staging, subsystem: 'camera', producerId: 'cam-1' });

    const result = await new Reconciler().reconcile(input({ sources: [source] }));

    expect(result.artifacts).toHaveLength(1);
    expect(result.artifacts[0]).toMatchObject({
      path: 'camera/cam-1_20251015_120029_500_UTC.csv',
      producerId: 'cam-1',
      startUtc: '2025-10-15T12:00:29.500Z',
    });
  });

  it('suffixes clashing names instead of overwriting', async () => {
    const external = path.join(root, 'thermal');
    await touch(path.join(external, 'a', 'cam_20251015_120010.mp4'), 'first');
    await touch(path.join(external, 'b', 'cam_20251015_120010.mp4'), 'second');
    const source = new DirectoryArtifactSource({ directory: external, subsystem: 'thermal', recursive: true });

    const result = await new Reconciler().reconcile(input({ sources: [source] }));

    expect(result.artifacts.map((artifact) => artifact.path).sort()).toEqual([
      'thermal/cam_20251015_120010.mp4',
      'thermal/cam_20251015_120010_1.mp4',
    ]);
    await expect(fs.readFile(path.join(testDir, 'thermal', 'cam_20251015_120010.mp4'), 'utf-8')).resolves.toBe('first');
    await expect(fs.readFile(path.join(testDir, 'thermal', 'cam_20251015_120010_1.mp4'), 'utf-8')).resolves.toBe(
      'second'
    );
  });

  it('excludes a tagged artifact whose start lies outside the window', async () => {
    const file = await touch(path.join(root, 'staging', 'scope-1_old.csv'));

    const result = await new Reconciler().reconcile(
      input({ loopArtifacts: [loopArtifact(file, '2025-10-15T11:50:00.000Z')] })
    );

    expect(result.artifacts).toEqual([]);
    expect(result.unmatched.map((artifact) => artifact.producerId)).toEqual(['scope-1']);
  });

  it('reports a source that cannot be listed and carries on', async () => {
    const broken: ArtifactSource = {
      subsystem: 'broken',
      listRecent: async () => {
        throw new Error('permission denied');
      },
    };
    const file = await touch(path.join(root, 'staging', 'scope-1_a.csv'));

    const result = await new Reconciler().reconcile(
      input({ loopArtifacts: [loopArtifact(file, '2025-10-15T12:00:01.000Z')], sources: [broken] })
    );

    expect(result.artifacts).toHaveLength(1);
    expect(result.warnings).toEqual(['Artifact source broken could not be listed: permission denied']);
  });

  it('keeps a relocated file whose checksum could not be computed', async () => {
    const file = await touch(path.join(root, 'staging', 'scope-1_b.csv'), 'abc');
    const reconciler = new Reconciler(undefined, async () => {
      throw new Error('read interrupted');
    });

    const result = await reconciler.reconcile(
      input({ loopArtifacts: [loopArtifact(file, '2025-10-15T12:00:01.000Z')] })
    );

    expect(result.artifacts).toMatchObject([{ path: 'scope/scope-1_b.csv', size: 3, checksum: null }]);
    expect(result.warnings).toEqual(['Checksum failed for scope/scope-1_b.csv: read interrupted']);
    await expect(fs.readFile(path.join(testDir, 'scope', 'scope-1_b.csv'), 'utf-8')).resolves.toBe('abc');
  });

  it('warns when a file vanished before it could be moved', async () => {
    const missing = path.join(root, 'staging', 'gone.csv');

    const result = await new Reconciler().reconcile(
      input({ loopArtifacts: [loopArtifact(missing, '2025-10-15T12:00:01.000Z')] })
    );

    expect(result.artifacts).toEqual([]);
    expect(result.warnings).toHaveLength(1);
    expect(result.warnings[0].startsWith(`Relocation failed for ${missing}: `)).toBe(true);
  });

  it('runs only once', async () => {
    const reconciler = new Reconciler();
    await reconciler.reconcile(input());
    await expect(reconciler.reconcile(input())).rejects.toBeInstanceOf(InternalError);
  });
});

describe('relocateFile', () => {
  let root: string;

  beforeEach(async () => {
    root = await fs.mkdtemp(path.join(os.tmpdir(), 'relocate-'));
  });

  afterEach(async () => {
    await fs.rm(root, { recursive: true, force: true });
  });

  it('leaves a file already in the target directory where it is', async () => {
    const file = await touch(path.join(root, 'scope', 'a.csv'));
    await expect(relocateFile(file, path.join(root, 'scope'))).resolves.toBe(path.resolve(file));
  });

  it('counts suffixes upwards', async () => {
    await touch(path.join(root, 'out', 'a.csv'));
    await touch(path.join(root, 'out', 'a_1.csv'));
    const file = await touch(path.join(root, 'in', 'a.csv'));

    await expect(relocateFile(file, path.join(root, 'out'))).resolves.toBe(path.resolve(root, 'out', 'a_2.csv'));
  });
});

describe('sha256File', () => {
  it('hashes the file content', async () => {
    const root = await fs.mkdtemp(path.join(os.tmpdir(), 'sha-'));
    try {
      const file = await touch(path.join(root, 'empty.bin'), '');
      await expect(sha256File(file)).resolves.toBe('e3b0c44298fc1c149afbf4c8996fb92427ae41e4649b934ca495991b7852b855');
    } finally {
      await fs.rm(root, { recursive: true, force: true });
    }
  });

  it('hashes a file larger than one read chunk', async () => {
    const root = await fs.mkdtemp(path.join(os.tmpdir(), 'sha-'));
    try {
      const content = Buffer.alloc(300 * 1024);
      for (let i = 0; i < content.length; i++) {
        content[i] = i % 251;
      }
      const file = path.join(root, 'frames.bin');
      await fs.writeFile(file, content);

      await expect(sha256File(file)).resolves.toBe(createHash('sha256').update(content).digest('hex'));
    } finally {
      await fs.rm(root, { recursive: true, force: true });
    }
  });
});
