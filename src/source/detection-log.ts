import fs from 'fs-extra';
import path from 'path';
import readline from 'readline';
import { DetectionLogError } from '../errors';
import { detectionLogSchema, frameRecordSchema } from '../types/detection';
import type { DetectionLogHeader, FrameRecord } from '../types/detection';

// ストリーム終端はエラーではなく明示的な結果として返す
export type FrameReadResult =
  | { status: 'frame'; index: number; frame: FrameRecord }
  | { status: 'end'; framesRead: number };

interface FrameReader {
  next(): Promise<{ frame: FrameRecord } | null>;
  close(): void;
}

export class DetectionLogSource {
  private framesRead = 0;
  private ended = false;

  private constructor(
    readonly filePath: string,
    readonly header: DetectionLogHeader,
    private readonly reader: FrameReader
  ) {}

  static async open(filePath: string): Promise<DetectionLogSource> {
    const ext = path.extname(filePath).toLowerCase();
    if (ext === '.jsonl') {
      return new DetectionLogSource(filePath, {}, openJsonLines(filePath));
    }
    if (ext === '.json') {
      const { frames, ...header } = await readJsonLog(filePath);
      let cursor = 0;
      const reader: FrameReader = {
        next: async () => (cursor < frames.length ? { frame: frames[cursor++] } : null),
        close: () => {}
      };
      return new DetectionLogSource(filePath, header, reader);
    }
    throw new DetectionLogError(filePath, 'file', `Unsupported detection log extension: ${ext || '(none)'}`);
  }

  async next(): Promise<FrameReadResult> {
    if (this.ended) {
      return { status: 'end', framesRead: this.framesRead };
    }

    const item = await this.reader.next();
    if (item === null) {
      this.ended = true;
      this.reader.close();
      return { status: 'end', framesRead: this.framesRead };
    }

    return { status: 'frame', index: this.framesRead++, frame: item.frame };
  }

  close(): void {
    this.ended = true;
    this.reader.close();
  }
}

async function readJsonLog(filePath: string) {
  let raw: unknown;
  try {
    raw = await fs.readJson(filePath);
  } catch (error) {
    throw new DetectionLogError(filePath, 'file', error instanceof Error ? error.message : String(error));
  }

  const parsed = detectionLogSchema.safeParse(raw);
  if (!parsed.success) {
    const issue = parsed.error.issues[0];
    throw new DetectionLogError(filePath, issue.path.join('.') || 'root', issue.message);
  }
  return parsed.data;
}

function openJsonLines(filePath: string): FrameReader {
  const stream = fs.createReadStream(filePath, { encoding: 'utf-8' });
  const lines = readline.createInterface({ input: stream, crlfDelay: Infinity });
  const iterator = lines[Symbol.asyncIterator]();
  let lineNumber = 0;

  return {
    next: async () => {
      for (;;) {
        const { value, done } = await iterator.next();
        if (done) return null;

        lineNumber++;
        const text = value.trim();
        if (text === '') continue;

        let raw: unknown;
        try {
          raw = JSON.parse(text);
        } catch (error) {
          throw new DetectionLogError(filePath, `line ${lineNumber}`, error instanceof Error ? error.message : String(error));
        }

        const parsed = frameRecordSchema.safeParse(raw);
        if (!parsed.success) {
          const issue = parsed.error.issues[0];
          throw new DetectionLogError(filePath, `line ${lineNumber}`, `${issue.path.join('.') || 'frame'}: ${issue.message}`);
        }
        return { frame: parsed.data };
      }
    },
    close: () => {
      lines.close();
      stream.destroy();
    }
  };
}

export function frameTimestamp(frame: FrameRecord, index: number, fps: number): number {
  if (frame.timestamp !== undefined) return frame.timestamp;
  return (frame.frameNumber ?? index) / fps;
}
