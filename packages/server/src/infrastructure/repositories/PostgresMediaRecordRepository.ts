import type pg from 'pg';
import type { VideoId, MediaRecord, MediaRecordStatus } from '@clipvault/common-types';
import { MediaRecordEntity, MediaRecordNotFoundError } from '@clipvault/common-types';
import type { IMediaRecordRepository } from '../../domain/repositories/IMediaRecordRepository.js';

type MediaRecordRow = {
  // int8 columns arrive as strings
  video_id: string;
  status: MediaRecordStatus;
  video_path: string;
  created_at: Date;
  updated_at: Date;
};

/**
 * PostgreSQL Media Record Repository
 *
 * Bound to the client of one transaction (see PostgresUploadUnitOfWork).
 */
export class PostgresMediaRecordRepository implements IMediaRecordRepository {
  constructor(private readonly client: pg.PoolClient) {}

  async findByVideoId(videoId: VideoId): Promise<MediaRecordEntity | null> {
    const result = await this.client.query<MediaRecordRow>(
      'SELECT * FROM video_media WHERE video_id = $1',
      [videoId]
    );

    if (result.rows.length === 0) {
      return null;
    }

    return MediaRecordEntity.reconstitute(this.rowToDTO(result.rows[0]));
  }

  async findOrCreate(videoId: VideoId, storagePath: string): Promise<MediaRecordEntity> {
    const record = MediaRecordEntity.create(videoId, storagePath);
    const dto = record.toDTO();

    const inserted = await this.client.query<MediaRecordRow>(
      `INSERT INTO video_media (video_id, status, video_path, created_at, updated_at)
       VALUES ($1, $2, $3, $4, $5)
       ON CONFLICT (video_id) DO NOTHING
       RETURNING *`,
      [dto.videoId, dto.status, dto.storagePath, dto.createdAt, dto.updatedAt]
    );

    if (inserted.rows.length > 0) {
      return MediaRecordEntity.reconstitute(this.rowToDTO(inserted.rows[0]));
    }

    // Another writer created it first
    const existing = await this.findByVideoId(videoId);
    if (!existing) {
      throw new MediaRecordNotFoundError(`Media record not found for video: ${videoId}`);
    }
    return existing;
  }

  async save(record: MediaRecordEntity): Promise<void> {
    const dto = record.toDTO();
    const result = await this.client.query(
      'UPDATE video_media SET status = $1, video_path = $2, updated_at = $3 WHERE video_id = $4',
      [dto.status, dto.storagePath, dto.updatedAt, dto.videoId]
    );

    if (result.rowCount === 0) {
      throw new MediaRecordNotFoundError(`Media record not found for video: ${dto.videoId}`);
    }
  }

  /**
   * Convert a DB row to a MediaRecord DTO
   */
  private rowToDTO(row: MediaRecordRow): MediaRecord {
    return {
      videoId: Number(row.video_id),
      status: row.status,
      storagePath: row.video_path,
      createdAt: row.created_at.toISOString(),
      updatedAt: row.updated_at.toISOString(),
    };
  }
}
