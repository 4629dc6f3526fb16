/**
 * Rig Configuration Loader
 *
 * Reads a rig file, validates it, resolves its paths against the file's own
 * directory and checks the cross-field rules the schema cannot express.
 * Every problem found is reported at once in a single ConfigError.
 */

import * as fs from 'fs/promises';
import * as path from 'path';
import * as yaml from 'js-yaml';
import { z } from 'zod';
import { ConfigError, errorMessage } from '../../utils/errors.js';
import { RigConfigSchema, type RigConfig } from './rig-config-schema.js';

export interface LoadedRigConfig {
  rig: RigConfig;
  /** Absolute path of the file it came from, recorded in the manifest */
  configRef: string;
}

function formatIssues(error: z.ZodError): string[] {
  return error.issues.map((issue) => `${issue.path.join('.') || '(root)'}: ${issue.message}`);
}

/**
 * Cross-field checks: unique ids, setpoints addressing known channels and
 * staying inside their safety limit.
 */
export function checkRigConfig(rig: RigConfig): string[] {
  const issues: string[] = [];
  const seen = new Set<string>();

  rig.instruments.forEach((instrument, i) => {
    if (seen.has(instrument.id)) {
      issues.push(`instruments.${i}.id: duplicate instrument id "${instrument.id}"`);
    }
    seen.add(instrument.id);

    const channelIds = new Set(instrument.channels.map((channel) => channel.id));
    if (channelIds.size !== instrument.channels.length) {
      issues.push(`instruments.${i}.channels: duplicate channel id`);
    }

    instrument.setpoints.forEach((setpoint, s) => {
      const where = `instruments.${i}.setpoints.${s}`;
      if (channelIds.size > 0 && !channelIds.has(setpoint.channel)) {
        issues.push(`${where}.channel: unknown channel "${setpoint.channel}" on ${instrument.id}`);
      }
      if (setpoint.safeLimit !== undefined && Math.abs(setpoint.target) > setpoint.safeLimit) {
        issues.push(`${where}.target: |${setpoint.target}| exceeds safe limit ${setpoint.safeLimit}`);
      }
    });
  });

  if (!rig.instruments.some((instrument) => instrument.enabled)) {
    issues.push('instruments: every instrument is disabled');
  }

  return issues;
}

/**
 * Validate an already-parsed document. Relative paths resolve against
 * `baseDir`.
 */
export function parseRigConfig(raw: unknown, baseDir: string): RigConfig {
  const result = RigConfigSchema.safeParse(raw);
  if (!result.success) {
    throw new ConfigError('Invalid rig configuration', formatIssues(result.error), { operation: 'parseRigConfig' });
  }

  const rig = result.data;
  const issues = checkRigConfig(rig);
  if (issues.length > 0) {
    throw new ConfigError('Invalid rig configuration', issues, { operation: 'parseRigConfig' });
  }

  const resolve = (p: string): string => path.resolve(baseDir, p);
  return {
    ...rig,
    outputRoot: resolve(rig.outputRoot),
    stagingDir: rig.stagingDir ? resolve(rig.stagingDir) : undefined,
    sources: rig.sources.map((source) => ({ ...source, directory: resolve(source.directory) })),
    stop: { ...rig.stop, flagFile: rig.stop.flagFile ? resolve(rig.stop.flagFile) : undefined },
  };
}

export async function loadRigConfig(file: string): Promise<LoadedRigConfig> {
  const configRef = path.resolve(file);

  let text: string;
  try {
    text = await fs.readFile(configRef, 'utf-8');
  } catch (error) {
    throw new ConfigError(`Cannot read rig configuration ${configRef}`, [errorMessage(error)], {
      operation: 'loadRigConfig',
    });
  }

  let raw: unknown;
  try {
    raw = yaml.load(text, { filename: configRef });
  } catch (error) {
    throw new ConfigError(`Rig configuration ${configRef} is not valid YAML/JSON`, [errorMessage(error)], {
      operation: 'loadRigConfig',
    });
  }

  return { rig: parseRigConfig(raw, path.dirname(configRef)), configRef };
}
