import type { VideoId } from '@clipvault/common-types';
import type { IUploadUnitOfWork, UploadTransactionScope } from '../../domain/repositories/IUploadUnitOfWork.js';
import { KeyedMutex } from '../locks/KeyedMutex.js';
import type { InMemoryMediaRecordRepository } from '../repositories/InMemoryMediaRecordRepository.js';
import type { InMemoryVideoRepository } from '../repositories/InMemoryVideoRepository.js';

/**
 * In-memory Unit of Work
 *
 * Per-video exclusion through KeyedMutex. The video's record and catalog
 * entry are snapshotted before the unit runs and restored if it rejects.
 */
export class InMemoryUploadUnitOfWork implements IUploadUnitOfWork {
  private mutex = new KeyedMutex<VideoId>();

  constructor(
    private readonly mediaRecords: InMemoryMediaRecordRepository,
    private readonly videos: InMemoryVideoRepository
  ) {}

  async runForVideo<T>(
    videoId: VideoId,
    work: (scope: UploadTransactionScope) => Promise<T>
  ): Promise<T> {
    return this.mutex.runExclusive(videoId, async () => {
      const recordBefore = this.mediaRecords.snapshot(videoId);
      const videoBefore = this.videos.snapshot(videoId);

      try {
        return await work({ mediaRecords: this.mediaRecords, videos: this.videos });
      } catch (err) {
        this.mediaRecords.restore(videoId, recordBefore);
        this.videos.restore(videoId, videoBefore);
        throw err;
      }
    });
  }
}
