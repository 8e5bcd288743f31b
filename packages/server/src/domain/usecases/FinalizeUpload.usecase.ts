import type { VideoId, MediaRecord } from '@clipvault/common-types';
import {
  UploadNotStartedError,
  IncompleteChunkSetError,
  InvalidChunkError,
  InvalidOperationError,
} from '@clipvault/common-types';
import type { IUploadUnitOfWork } from '../repositories/IUploadUnitOfWork.js';
import type { IChunkRepository } from '../repositories/IChunkRepository.js';
import type { IMediaEventPublisher } from '../events/IMediaEventPublisher.js';

const MAX_FILE_NAME_LENGTH = 255;

/**
 * Upload finalize request
 */
export interface FinalizeUploadRequest {
  videoId: VideoId;
  totalChunks: number;
  fileName?: string;
}

/**
 * Upload finalize Use Case (Server-side)
 *
 * Business flow:
 * 1. Get the media record (missing -> upload not started)
 * 2. Check the status allows finalizing
 * 3. Check chunks 0..totalChunks-1 are all stored
 * 4. Move to processing_started
 * 5. Notify the processing pipeline once committed
 */
export class FinalizeUploadUseCase {
  private unitOfWork: IUploadUnitOfWork;
  private chunkRepository: IChunkRepository;
  private mediaEventPublisher: IMediaEventPublisher | null;

  constructor(
    unitOfWork: IUploadUnitOfWork,
    chunkRepository: IChunkRepository,
    mediaEventPublisher: IMediaEventPublisher | null = null
  ) {
    this.unitOfWork = unitOfWork;
    this.chunkRepository = chunkRepository;
    this.mediaEventPublisher = mediaEventPublisher;
  }

  async execute(request: FinalizeUploadRequest): Promise<MediaRecord> {
    const { videoId, totalChunks, fileName } = request;

    if (!Number.isInteger(totalChunks) || totalChunks < 1) {
      throw new InvalidChunkError(`totalChunks must be a positive integer: ${totalChunks}`);
    }
    if (fileName !== undefined && fileName.length > MAX_FILE_NAME_LENGTH) {
      throw new InvalidOperationError(`fileName must be at most ${MAX_FILE_NAME_LENGTH} characters`);
    }

    const finalized = await this.unitOfWork.runForVideo(videoId, async ({ mediaRecords }) => {
      // 1. Media record
      const record = await mediaRecords.findByVideoId(videoId);
      if (!record) {
        throw new UploadNotStartedError(`Upload not started for video: ${videoId}`);
      }

      // 2. Status
      record.assertFinalizable();

      // 3. Completeness
      const directory = record.getStoragePath();
      const complete = await this.chunkRepository.allChunksPresent(directory, totalChunks);
      if (!complete) {
        const stored = new Set(await this.chunkRepository.listChunkIndexes(directory));
        const missing: number[] = [];
        for (let i = 0; i < totalChunks; i++) {
          if (!stored.has(i)) missing.push(i);
        }
        throw new IncompleteChunkSetError(
          `Chunks are incomplete for video ${videoId}: ${missing.length} of ${totalChunks} missing`,
          missing
        );
      }

      // 4. Transition
      record.startProcessing();
      await mediaRecords.save(record);

      return record.toDTO();
    });

    console.log(`✅ [FinalizeUpload] Video ${videoId} finalized with ${totalChunks} chunks`);

    // 5. Notification
    if (this.mediaEventPublisher) {
      this.mediaEventPublisher.publishUploadFinalized(videoId, {
        totalChunks,
        storagePath: finalized.storagePath,
        fileName,
      });
    }

    return finalized;
  }
}
