import type { VideoId } from '@clipvault/common-types';
import type { MediaRecordEntity } from '@clipvault/common-types';

/**
 * Media Record Repository Interface (Server-side)
 *
 * Single source of truth for a video's upload/processing status.
 * Implementations: PostgresMediaRecordRepository, InMemoryMediaRecordRepository
 */
export interface IMediaRecordRepository {
  /**
   * Get the record of a video
   */
  findByVideoId(videoId: VideoId): Promise<MediaRecordEntity | null>;

  /**
   * Get the record of a video, creating it in upload_in_progress when absent
   *
   * Creation is an idempotent upsert: when another writer creates the record
   * first, that record is returned. Never raises on the race.
   */
  findOrCreate(videoId: VideoId, storagePath: string): Promise<MediaRecordEntity>;

  /**
   * Persist status and storage path
   */
  save(record: MediaRecordEntity): Promise<void>;
}
