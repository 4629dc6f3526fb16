/**
 * Directory Artifact Source
 *
 * Lists files an external recorder (camera software, vendor logger) dropped
 * into a directory. Each file becomes a single-path artifact carrying the
 * timestamp embedded in its name, if any.
 */

import type { Stats } from 'fs';
import * as fs from 'fs/promises';
import * as path from 'path';
import { v4 as uuidv4 } from 'uuid';
import { log, Logger } from '../utils/logger.js';
import { parseEmbeddedTimestamp } from '../utils/time.js';
import type { Artifact, ArtifactSource } from '../types/capture-types.js';

export interface DirectoryArtifactSourceOptions {
  directory: string;
  subsystem: string;
  /** Files matching this pattern are listed; defaults to every file */
  pattern?: RegExp;
  recursive?: boolean;
  /** Tag listed files with a producing instrument */
  producerId?: string;
  logger?: Logger;
}

function isNotFound(error: unknown): boolean {
  return error instanceof Error && 'code' in error && error.code === 'ENOENT';
}

export class DirectoryArtifactSource implements ArtifactSource {
  readonly subsystem: string;
  private readonly options: DirectoryArtifactSourceOptions;
  private readonly logger: Logger;

  constructor(options: DirectoryArtifactSourceOptions) {
    this.options = options;
    this.subsystem = options.subsystem;
    this.logger = (options.logger ?? log).child({
      service: 'directory-artifact-source',
      subsystem: options.subsystem,
    });
  }

  async listRecent(since: Date): Promise<Artifact[]> {
    const files = await this.walk(this.options.directory);
    const artifacts: Artifact[] = [];

    for (const file of files) {
      const name = path.basename(file);
      if (this.options.pattern && !this.options.pattern.test(name)) {
        continue;
      }

      let stats: Stats;
      try {
        stats = await fs.stat(file);
      } catch (error) {
        if (!isNotFound(error)) {
          throw error;
        }
        this.logger.debug('File vanished while listing', { file });
        continue;
      }
      if (stats.mtime < since) {
        continue;
      }

      const embedded = parseEmbeddedTimestamp(name);
      artifacts.push({
        id: uuidv4(),
        producerId: this.options.producerId,
        subsystem: this.subsystem,
        paths: [file],
        startUtc: (embedded ?? stats.mtime).toISOString(),
        endUtc: stats.mtime.toISOString(),
        embeddedUtc: embedded?.toISOString(),
      });
    }

    this.logger.debug('Listed recent files', { directory: this.options.directory, count: artifacts.length });
    return artifacts;
  }

  private async walk(directory: string): Promise<string[]> {
    let entries;
    try {
      entries = await fs.readdir(directory, { withFileTypes: true });
    } catch (error) {
      if (isNotFound(error)) {
        this.logger.warn('Source directory does not exist', { directory });
        return [];
      }
      throw error;
    }

    const files: string[] = [];
    for (const entry of entries) {
      const full = path.join(directory, entry.name);
      if (entry.isDirectory()) {
        if (this.options.recursive) {
          files.push(...(await this.walk(full)));
        }
      } else if (entry.isFile()) {
        files.push(full);
      }
    }
    return files.sort();
  }
}
