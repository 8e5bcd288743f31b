import type { VideoId, MediaRecord } from '@clipvault/common-types';
import { MediaRecordNotFoundError, InvalidOperationError } from '@clipvault/common-types';
import type { IUploadUnitOfWork } from '../repositories/IUploadUnitOfWork.js';

export interface RegisterProcessedVideoPathRequest {
  videoId: VideoId;
  videoPath: string;
}

/**
 * Processed video registration Use Case (Server-side)
 *
 * Used by the processing pipeline when it writes the finished asset
 * somewhere itself instead of asking for a promotion.
 * processing_started -> processing_finished with the given path.
 */
export class RegisterProcessedVideoPathUseCase {
  private unitOfWork: IUploadUnitOfWork;

  constructor(unitOfWork: IUploadUnitOfWork) {
    this.unitOfWork = unitOfWork;
  }

  async execute(request: RegisterProcessedVideoPathRequest): Promise<MediaRecord> {
    const { videoId, videoPath } = request;

    if (videoPath.trim() === '') {
      throw new InvalidOperationError('videoPath is required');
    }

    return this.unitOfWork.runForVideo(videoId, async ({ mediaRecords }) => {
      const record = await mediaRecords.findByVideoId(videoId);
      if (!record) {
        throw new MediaRecordNotFoundError(`Media record not found for video: ${videoId}`);
      }

      record.finishProcessing(videoPath);
      await mediaRecords.save(record);

      return record.toDTO();
    });
  }
}
