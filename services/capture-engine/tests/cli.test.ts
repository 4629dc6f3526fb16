import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import * as fs from 'fs/promises';
import * as os from 'os';
import * as path from 'path';
import { EXIT_CONFIG, EXIT_OK, buildProgram, runCommand, validateCommand } from '../src/cli.js';

const RIG = `
testName: bench-run
outputRoot: out
instruments:
  - id: cam-1
    capability: camera
    subsystem: thermal
    driver: { kind: simulated }
  - id: psu-1
    capability: power-supply
    subsystem: power
    enabled: false
    driver: { kind: process, transport: modbus-rtu, command: psu-driver }
`;

describe('cli', () => {
  let dir: string;
  let out: string[];
  let err: string[];

  beforeEach(async () => {
    dir = await fs.mkdtemp(path.join(os.tmpdir(), 'cli-'));
    out = [];
    err = [];
  });

  afterEach(async () => {
    await fs.rm(dir, { recursive: true, force: true });
  });

  describe('validate', () => {
    it('describes a valid rig file', async () => {
      const file = path.join(dir, 'rig.yaml');
      await fs.writeFile(file, RIG);

      const code = await validateCommand(file, (line) => out.push(line), (line) => err.push(line));

      expect(code).toBe(EXIT_OK);
      expect(out).toEqual([
        `${file}: OK`,
        '  test name:   bench-run',
        `  output root: ${path.join(dir, 'out')}`,
        '  cam-1: camera via simulated → thermal/',
        '  psu-1: power-supply via process → power/ (disabled)',
      ]);
      expect(err).toEqual([]);
    });

    it('lists every issue of a rejected rig file', async () => {
      const file = path.join(dir, 'rig.yaml');
      await fs.writeFile(file, RIG.replace('id: psu-1', 'id: cam-1'));

      const code = await validateCommand(file, (line) => out.push(line), (line) => err.push(line));

      expect(code).toBe(EXIT_CONFIG);
      expect(err).toEqual([
        'Configuration rejected: Invalid rig configuration',
        '  - instruments.1.id: duplicate instrument id "cam-1"',
      ]);
    });
  });

  describe('run', () => {
    it('exits with the configuration code before starting anything', async () => {
      const code = await runCommand(path.join(dir, 'missing.yaml'), {}, (line) => err.push(line));

      expect(code).toBe(EXIT_CONFIG);
      expect(err[0]).toBe(`Configuration rejected: Cannot read rig configuration ${path.join(dir, 'missing.yaml')}`);
    });
  });

  describe('buildProgram', () => {
    it('registers the commands', () => {
      expect(buildProgram().commands.map((command) => command.name())).toEqual(['run', 'validate', 'drivers']);
    });
  });
});
