import type { VideoId, Video } from '@clipvault/common-types';
import { VideoNotFoundError } from '@clipvault/common-types';
import type { IVideoRepository } from '../../domain/repositories/IVideoRepository.js';

/**
 * In-memory Video Repository
 */
export class InMemoryVideoRepository implements IVideoRepository {
  private videos: Map<VideoId, Video> = new Map();

  async findById(id: VideoId): Promise<Video | null> {
    const video = this.videos.get(id);
    return video ? { ...video } : null;
  }

  async setPublished(id: VideoId, isPublished: boolean): Promise<void> {
    const video = this.videos.get(id);
    if (!video) {
      throw new VideoNotFoundError(`Video not found: ${id}`);
    }
    video.isPublished = isPublished;
  }

  /**
   * Register a catalog entry
   */
  add(video: Video): void {
    this.videos.set(video.id, { ...video });
  }

  snapshot(id: VideoId): Video | undefined {
    const video = this.videos.get(id);
    return video ? { ...video } : undefined;
  }

  restore(id: VideoId, video: Video | undefined): void {
    if (video) {
      this.videos.set(id, video);
    } else {
      this.videos.delete(id);
    }
  }
}
