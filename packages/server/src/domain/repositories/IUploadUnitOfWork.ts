import type { VideoId } from '@clipvault/common-types';
import type { IMediaRecordRepository } from './IMediaRecordRepository.js';
import type { IVideoRepository } from './IVideoRepository.js';

/**
 * Repositories bound to one unit of work
 */
export interface UploadTransactionScope {
  mediaRecords: IMediaRecordRepository;
  videos: IVideoRepository;
}

/**
 * Upload Unit of Work Interface
 *
 * Runs a read-modify-write sequence for one video with mutual exclusion
 * against every other unit for the same video. Changes made through the
 * scope are committed when `work` resolves and discarded when it rejects.
 * Units for different videos run in parallel.
 *
 * Implementations: PostgresUploadUnitOfWork, InMemoryUploadUnitOfWork
 */
export interface IUploadUnitOfWork {
  runForVideo<T>(
    videoId: VideoId,
    work: (scope: UploadTransactionScope) => Promise<T>
  ): Promise<T>;
}
