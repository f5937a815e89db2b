import { describe, it, expect, beforeAll, afterAll } from 'vitest';
import * as fs from 'fs';
import * as os from 'os';
import * as path from 'path';
import {
  formatSeekLine,
  noFilesFoundMessage,
  sanitizeExtension,
  searchForFiles,
} from '../file-seeker.js';
import { AppError } from '../../common/AppError.js';

describe('sanitizeExtension', () => {
  it('should strip every leading dot', () => {
    expect(sanitizeExtension('ts')).toBe('ts');
    expect(sanitizeExtension('.ts')).toBe('ts');
    expect(sanitizeExtension('..ts')).toBe('ts');
    expect(sanitizeExtension('d.ts')).toBe('d.ts');
  });
});

describe('searchForFiles', () => {
  let root: string;

  beforeAll(() => {
    root = fs.mkdtempSync(path.join(os.tmpdir(), 'file-seeker-test-'));
    const files = [
      'a.ts',
      'sub/b.ts',
      'sub/deeper/c.ts',
      '.hidden/d.ts',
      'e.tsx',
      'f.ts.bak',
      'g.json',
    ];
    for (const file of files) {
      const fullPath = path.join(root, file);
      fs.mkdirSync(path.dirname(fullPath), { recursive: true });
      fs.writeFileSync(fullPath, '');
    }
    // A directory whose name ends in the extension is not a match.
    fs.mkdirSync(path.join(root, 'folder.ts'));
  });

  afterAll(() => {
    fs.rmSync(root, { recursive: true, force: true });
  });

  const expected = (): string[] =>
    ['.hidden/d.ts', 'a.ts', 'sub/b.ts', 'sub/deeper/c.ts'].map((file) =>
      path.join(root, file)
    );

  it('should find matching files recursively, hidden ones included, as sorted absolute paths', async () => {
    await expect(searchForFiles(root, 'ts')).resolves.toEqual(expected());
  });

  it('should accept the extension with leading dots', async () => {
    await expect(searchForFiles(root, '.ts')).resolves.toEqual(expected());
  });

  it('should return nothing when no file matches', async () => {
    await expect(searchForFiles(root, 'rs')).resolves.toEqual([]);
  });

  it('should reject an extension made only of dots', async () => {
    await expect(searchForFiles(root, '..')).rejects.toBeInstanceOf(AppError);
  });
});

describe('formatSeekLine', () => {
  it('should prefix the 1-based index when asked', () => {
    expect(formatSeekLine(3, '/work/a.ts', true)).toBe('3: /work/a.ts\n');
  });

  it('should print the bare path otherwise, with no space before the newline', () => {
    expect(formatSeekLine(3, '/work/a.ts', false)).toBe('/work/a.ts\n');
  });
});

describe('noFilesFoundMessage', () => {
  it('should name the extension with exactly one leading dot however it was typed', () => {
    expect(noFilesFoundMessage('.py')).toBe('Error: No Files Found with extension .py\n');
    expect(noFilesFoundMessage('py')).toBe('Error: No Files Found with extension .py\n');
  });
});
