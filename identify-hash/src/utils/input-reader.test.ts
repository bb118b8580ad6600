import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import fs from 'fs/promises';
import path from 'path';
import os from 'os';
import { Readable } from 'node:stream';
import { splitHashLines, readHashFile, readHashStream } from './input-reader.js';

describe('splitHashLines', () => {
  it('should split on Unix and Windows line endings', () => {
    expect(splitHashLines('aaa\nbbb\r\nccc')).toEqual(['aaa', 'bbb', 'ccc']);
  });

  it('should drop blank and whitespace-only lines', () => {
    expect(splitHashLines('aaa\n\n   \nbbb\n')).toEqual(['aaa', 'bbb']);
  });

  it('should keep surrounding whitespace for the classifier to trim', () => {
    expect(splitHashLines('  aaa  \n')).toEqual(['  aaa  ']);
  });

  it('should return nothing for empty content', () => {
    expect(splitHashLines('')).toEqual([]);
  });
});

describe('readHashFile', () => {
  let tempDir: string;

  beforeEach(async () => {
    tempDir = await fs.mkdtemp(path.join(os.tmpdir(), 'identify-hash-input-test-'));
  });

  afterEach(async () => {
    await fs.rm(tempDir, { recursive: true, force: true });
  });

  it('should read one hash per line', async () => {
    const filePath = path.join(tempDir, 'hashes.txt');
    await fs.writeFile(filePath, 'deadbeef\n5f4dcc3b5aa765d61d8327deb882cf99\n');

    await expect(readHashFile(filePath)).resolves.toEqual([
      'deadbeef',
      '5f4dcc3b5aa765d61d8327deb882cf99'
    ]);
  });

  it('should throw error for missing file', async () => {
    const filePath = path.join(tempDir, 'missing.txt');

    await expect(readHashFile(filePath)).rejects.toThrow(`Input file not found: ${filePath}`);
  });
});

describe('readHashStream', () => {
  it('should read lines across chunk boundaries', async () => {
    const stream = Readable.from(['dead', 'beef\n\nabc', 'def\n']);

    await expect(readHashStream(stream)).resolves.toEqual(['deadbeef', 'abcdef']);
  });

  it('should return nothing for an empty stream', async () => {
    await expect(readHashStream(Readable.from([]))).resolves.toEqual([]);
  });
});
