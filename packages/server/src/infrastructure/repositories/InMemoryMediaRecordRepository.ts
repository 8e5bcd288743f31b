import type { VideoId, MediaRecord } from '@clipvault/common-types';
import { MediaRecordEntity, MediaRecordNotFoundError } from '@clipvault/common-types';
import type { IMediaRecordRepository } from '../../domain/repositories/IMediaRecordRepository.js';

/**
 * In-memory Media Record Repository
 *
 * Backs InMemoryUploadUnitOfWork; snapshot/restore let the unit of work
 * undo a failed unit.
 */
export class InMemoryMediaRecordRepository implements IMediaRecordRepository {
  private records: Map<VideoId, MediaRecord> = new Map();

  async findByVideoId(videoId: VideoId): Promise<MediaRecordEntity | null> {
    const data = this.records.get(videoId);
    if (!data) {
      return null;
    }
    return MediaRecordEntity.reconstitute(data);
  }

  async findOrCreate(videoId: VideoId, storagePath: string): Promise<MediaRecordEntity> {
    const existing = this.records.get(videoId);
    if (existing) {
      return MediaRecordEntity.reconstitute(existing);
    }

    const record = MediaRecordEntity.create(videoId, storagePath);
    this.records.set(videoId, record.toDTO());
    return record;
  }

  async save(record: MediaRecordEntity): Promise<void> {
    const dto = record.toDTO();
    if (!this.records.has(dto.videoId)) {
      throw new MediaRecordNotFoundError(`Media record not found for video: ${dto.videoId}`);
    }
    this.records.set(dto.videoId, dto);
  }

  /**
   * Test helper: seed a record in any status
   */
  put(record: MediaRecord): void {
    this.records.set(record.videoId, { ...record });
  }

  count(): number {
    return this.records.size;
  }

  snapshot(videoId: VideoId): MediaRecord | undefined {
    const data = this.records.get(videoId);
    return data ? { ...data } : undefined;
  }

  restore(videoId: VideoId, data: MediaRecord | undefined): void {
    if (data) {
      this.records.set(videoId, data);
    } else {
      this.records.delete(videoId);
    }
  }
}
