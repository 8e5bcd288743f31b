import path from 'path';
import type { VideoId } from '@clipvault/common-types';

/**
 * Where a video's files live
 *
 * - chunks while uploading: {chunkStoragePath}/{videoId}
 * - promoted asset: {externalStoragePath}/{videoId}
 */
export class MediaStorageLayout {
  constructor(
    private readonly chunkStoragePath: string,
    private readonly externalStoragePath: string
  ) {}

  chunkDirectory(videoId: VideoId): string {
    return path.join(this.chunkStoragePath, String(videoId));
  }

  externalDirectory(videoId: VideoId): string {
    return path.join(this.externalStoragePath, String(videoId));
  }
}
