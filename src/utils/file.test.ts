import fs from 'fs-extra';
import os from 'os';
import path from 'path';
import { afterEach, beforeEach, describe, expect, it } from 'vitest';

import { generateOutputPath, isDetectionLogFile, resolveInputFiles, writeJsonFile } from './file';

describe('file utils', () => {
  let dir: string;

  beforeEach(async () => {
    dir = await fs.mkdtemp(path.join(os.tmpdir(), 'file-utils-'));
    await fs.writeFile(path.join(dir, 'a.json'), '{}');
    await fs.writeFile(path.join(dir, 'b.jsonl'), '');
    await fs.writeFile(path.join(dir, 'notes.txt'), '');
  });

  afterEach(async () => {
    await fs.remove(dir);
  });

  it('recognises detection logs by extension and existence', async () => {
    expect(await isDetectionLogFile(path.join(dir, 'a.json'))).toBe(true);
    expect(await isDetectionLogFile(path.join(dir, 'notes.txt'))).toBe(false);
    expect(await isDetectionLogFile(path.join(dir, 'missing.json'))).toBe(false);
  });

  it('expands glob patterns and drops duplicates and other files', async () => {
    const pattern = path.join(dir, '*').split(path.sep).join('/');
    const files = await resolveInputFiles([pattern, path.join(dir, 'a.json')]);

    expect(files.map(file => path.basename(file))).toEqual(['a.json', 'b.jsonl']);
  });

  it('derives the report path next to the input', () => {
    expect(generateOutputPath(path.join('logs', 'cam1.jsonl'))).toBe(path.join('logs', 'cam1_counts.json'));
  });

  it('creates missing directories when writing JSON', async () => {
    const target = path.join(dir, 'reports', 'out.json');
    await writeJsonFile(target, { total: 3 });

    expect(await fs.readJson(target)).toEqual({ total: 3 });
  });
});
