import type { VideoId, Video } from '@clipvault/common-types';

/**
 * Video Repository Interface (Server-side)
 *
 * Read access to the video catalog plus the one field the upload
 * lifecycle is allowed to change.
 */
export interface IVideoRepository {
  findById(id: VideoId): Promise<Video | null>;

  /**
   * Update the published flag
   */
  setPublished(id: VideoId, isPublished: boolean): Promise<void>;
}
