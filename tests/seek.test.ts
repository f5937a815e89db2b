import { describe, it, expect, beforeEach, afterEach, vi } from 'vitest';
import * as fs from 'fs';
import * as os from 'os';
import * as path from 'path';
import { Config } from '@oclif/core';
import Seek from '../src/commands/seek.js';
import { captureProcessOutput } from './test-utils.js';

describe('seek command', () => {
  let testConfigInstance: Config;
  let tempDir: string;
  let output: ReturnType<typeof captureProcessOutput>;

  beforeEach(async () => {
    tempDir = fs.mkdtempSync(path.join(os.tmpdir(), 'seek-cli-test-'));
    fs.mkdirSync(path.join(tempDir, 'nested'));
    fs.mkdirSync(path.join(tempDir, '.hidden'));
    fs.writeFileSync(path.join(tempDir, 'a.ts'), '');
    fs.writeFileSync(path.join(tempDir, 'nested', 'b.ts'), '');
    fs.writeFileSync(path.join(tempDir, '.hidden', 'c.ts'), '');
    fs.writeFileSync(path.join(tempDir, 'readme.md'), '');

    testConfigInstance = new Config({ root: process.cwd() });
    await testConfigInstance.load();
    output = captureProcessOutput();
  });

  afterEach(() => {
    vi.restoreAllMocks();
    fs.rmSync(tempDir, { recursive: true, force: true });
  });

  it('prints every match as a sorted absolute path', async () => {
    const command = new Seek(['ts', '--dir', tempDir], testConfigInstance);
    await command.run();

    expect(output.stdout()).toEqual([
      `${tempDir}/.hidden/c.ts\n`,
      `${tempDir}/a.ts\n`,
      `${tempDir}/nested/b.ts\n`,
    ]);
    expect(output.stderr()).toEqual([]);
  });

  it('prefixes 1-based positions with --index', async () => {
    const command = new Seek(['.ts', '--index', '--dir', tempDir], testConfigInstance);
    await command.run();

    expect(output.stdout()).toEqual([
      `1: ${tempDir}/.hidden/c.ts\n`,
      `2: ${tempDir}/a.ts\n`,
      `3: ${tempDir}/nested/b.ts\n`,
    ]);
  });

  it('writes the not-found message to stderr and exits with status 1', async () => {
    const command = new Seek(['.py', '--dir', tempDir], testConfigInstance);

    await expect(command.run()).rejects.toMatchObject({ oclif: { exit: 1 } });
    expect(output.stderr()).toEqual(['Error: No Files Found with extension .py\n']);
    expect(output.stdout()).toEqual([]);
  });

  it('does not create log files in the searched directory', async () => {
    const before = fs.readdirSync(tempDir).sort();
    const command = new Seek(['log', '--dir', tempDir], testConfigInstance);

    await expect(command.run()).rejects.toMatchObject({ oclif: { exit: 1 } });
    expect(output.stderr()).toEqual(['Error: No Files Found with extension .log\n']);
    expect(fs.readdirSync(tempDir).sort()).toEqual(before);
  });

  it('rejects an extension made only of dots', async () => {
    const command = new Seek(['...', '--dir', tempDir], testConfigInstance);

    await expect(command.run()).rejects.toThrow('Invalid extension: "..."');
    expect(output.stdout()).toEqual([]);
  });
});
