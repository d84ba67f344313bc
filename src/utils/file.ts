import fs from 'fs-extra';
import path from 'path';
import * as glob from 'glob';

const DETECTION_LOG_EXTENSIONS = ['.json', '.jsonl'];

export async function isDetectionLogFile(filePath: string): Promise<boolean> {
  const ext = path.extname(filePath).toLowerCase();

  if (!DETECTION_LOG_EXTENSIONS.includes(ext)) {
    return false;
  }

  try {
    const stats = await fs.stat(filePath);
    return stats.isFile();
  } catch {
    return false;
  }
}

// 引数はファイルパスでも glob パターンでもよい
export async function resolveInputFiles(patterns: string[]): Promise<string[]> {
  const files = new Set<string>();
  for (const pattern of patterns) {
    const matches = glob.hasMagic(pattern) ? glob.sync(pattern, { nodir: true }).sort() : [pattern];
    for (const match of matches) {
      if (await isDetectionLogFile(match)) {
        files.add(match);
      }
    }
  }
  return [...files];
}

export function generateOutputPath(inputPath: string, suffix = '_counts'): string {
  const parsed = path.parse(inputPath);
  return path.join(parsed.dir, `${parsed.name}${suffix}.json`);
}

export async function writeJsonFile(filePath: string, data: unknown): Promise<void> {
  await fs.outputJson(filePath, data, { spaces: 2 });
}
