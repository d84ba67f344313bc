import ffmpeg from 'fluent-ffmpeg';
import type { FfprobeData } from 'fluent-ffmpeg';
import type { FrameDimensions } from '../types';

export interface VideoInfo {
  dimensions: FrameDimensions;
  fps: number;
  durationSeconds: number | null;
}

/**
 * ffprobe で動画のメタデータを取得する。フレームのデコードは行わない。
 * FFPROBE_PATH が未設定なら PATH 上の `ffprobe` を使う。
 */
export class VideoProbe {
  async getVideoInfo(videoPath: string): Promise<VideoInfo> {
    const metadata = await this.probe(videoPath);
    const videoStream = metadata.streams.find(stream => stream.codec_type === 'video');
    if (!videoStream || !videoStream.width || !videoStream.height) {
      throw new Error(`No video stream with a frame size in ${videoPath}`);
    }

    return {
      dimensions: { width: videoStream.width, height: videoStream.height },
      fps: parseFrameRate(videoStream.r_frame_rate) ?? 30,
      durationSeconds: metadata.format.duration ?? null
    };
  }

  private probe(videoPath: string): Promise<FfprobeData> {
    return new Promise((resolve, reject) => {
      ffmpeg.ffprobe(videoPath, (err, metadata) => {
        if (err) {
          reject(err);
          return;
        }
        resolve(metadata);
      });
    });
  }
}

export function parseFrameRate(rate: string | undefined): number | null {
  if (!rate) return null;
  const [num, den] = rate.split('/').map(Number);
  const fps = den === undefined ? num : num / den;
  return Number.isFinite(fps) && fps > 0 ? fps : null;
}
