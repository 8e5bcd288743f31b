import type pg from 'pg';
import type { VideoId, Video } from '@clipvault/common-types';
import { VideoNotFoundError } from '@clipvault/common-types';
import type { IVideoRepository } from '../../domain/repositories/IVideoRepository.js';

type VideoRow = {
  // int8 columns arrive as strings
  id: string;
  title: string;
  is_published: boolean;
  published_at: Date | null;
  num_likes: number;
  num_views: number;
};

/**
 * PostgreSQL Video Repository
 */
export class PostgresVideoRepository implements IVideoRepository {
  constructor(private readonly client: pg.PoolClient) {}

  async findById(id: VideoId): Promise<Video | null> {
    const result = await this.client.query<VideoRow>(
      'SELECT id, title, is_published, published_at, num_likes, num_views FROM videos WHERE id = $1',
      [id]
    );

    if (result.rows.length === 0) {
      return null;
    }

    const row = result.rows[0];
    return {
      id: Number(row.id),
      title: row.title,
      isPublished: row.is_published,
      publishedAt: row.published_at ? row.published_at.toISOString() : undefined,
      numLikes: row.num_likes,
      numViews: row.num_views,
    };
  }

  async setPublished(id: VideoId, isPublished: boolean): Promise<void> {
    const result = await this.client.query(
      'UPDATE videos SET is_published = $1 WHERE id = $2',
      [isPublished, id]
    );

    if (result.rowCount === 0) {
      throw new VideoNotFoundError(`Video not found: ${id}`);
    }
  }
}
