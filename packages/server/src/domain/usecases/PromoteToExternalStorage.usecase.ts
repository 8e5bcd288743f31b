import type { VideoId, MediaRecord, RelocationReport } from '@clipvault/common-types';
import { InvalidStatusTransitionError } from '@clipvault/common-types';
import type { IUploadUnitOfWork } from '../repositories/IUploadUnitOfWork.js';
import type { IChunkRepository } from '../repositories/IChunkRepository.js';
import type { IMediaEventPublisher } from '../events/IMediaEventPublisher.js';
import type { MediaStorageLayout } from '../services/MediaStorageLayout.js';

export interface PromoteToExternalStorageRequest {
  videoId: VideoId;
}

export interface PromoteToExternalStorageResponse {
  record: MediaRecord;
  relocation: RelocationReport;
}

/**
 * External storage promotion Use Case (Server-side)
 *
 * Business flow:
 * 1. The media record must be processing_started
 * 2. Replace the chunks of any earlier promotion in the video's external
 *    directory with the current chunk files
 * 3. Point the record at the external directory, processing_finished
 * 4. Notify the pipeline once committed
 *
 * Relocation is best effort; files that fail to move are listed in the
 * response and the record is still finished.
 */
export class PromoteToExternalStorageUseCase {
  private unitOfWork: IUploadUnitOfWork;
  private chunkRepository: IChunkRepository;
  private layout: MediaStorageLayout;
  private mediaEventPublisher: IMediaEventPublisher | null;

  constructor(
    unitOfWork: IUploadUnitOfWork,
    chunkRepository: IChunkRepository,
    layout: MediaStorageLayout,
    mediaEventPublisher: IMediaEventPublisher | null = null
  ) {
    this.unitOfWork = unitOfWork;
    this.chunkRepository = chunkRepository;
    this.layout = layout;
    this.mediaEventPublisher = mediaEventPublisher;
  }

  async execute(request: PromoteToExternalStorageRequest): Promise<PromoteToExternalStorageResponse> {
    const { videoId } = request;
    const destination = this.layout.externalDirectory(videoId);

    const result = await this.unitOfWork.runForVideo(videoId, async ({ mediaRecords }) => {
      // 1. Status
      const record = await mediaRecords.findByVideoId(videoId);
      if (!record) {
        throw new InvalidStatusTransitionError(`Cannot promote video ${videoId}: upload was never started`);
      }
      record.assertProcessing();

      // 2. Relocation
      await this.chunkRepository.clearChunks(destination);
      const relocation = await this.chunkRepository.relocate(record.getStoragePath(), destination);
      if (relocation.failed.length > 0) {
        console.warn(
          `⚠️ [PromoteToExternalStorage] ${relocation.failed.length} file(s) of video ${videoId} were not moved`
        );
      }

      // 3. Transition
      record.finishProcessing(destination);
      await mediaRecords.save(record);

      return { record: record.toDTO(), relocation };
    });

    console.log(
      `📦 [PromoteToExternalStorage] Video ${videoId} promoted to ${destination} (${result.relocation.moved.length} file(s))`
    );

    // 4. Notification
    if (this.mediaEventPublisher) {
      this.mediaEventPublisher.publishPromotionRequested(videoId, destination);
    }

    return result;
  }
}
