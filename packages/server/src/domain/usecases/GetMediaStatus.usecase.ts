import type { VideoId, Video, MediaRecord, ChunkIndex } from '@clipvault/common-types';
import { VideoNotFoundError } from '@clipvault/common-types';
import type { IUploadUnitOfWork } from '../repositories/IUploadUnitOfWork.js';
import type { IChunkRepository } from '../repositories/IChunkRepository.js';

export interface GetMediaStatusRequest {
  videoId: VideoId;
}

export interface GetMediaStatusResponse {
  video: Video;
  media: MediaRecord | null;
  receivedChunks: ChunkIndex[];
}

/**
 * Media status Use Case (Server-side)
 *
 * Backs the admin upload page: the video, its media record and the
 * chunks already stored, so an interrupted upload can resume.
 */
export class GetMediaStatusUseCase {
  private unitOfWork: IUploadUnitOfWork;
  private chunkRepository: IChunkRepository;

  constructor(unitOfWork: IUploadUnitOfWork, chunkRepository: IChunkRepository) {
    this.unitOfWork = unitOfWork;
    this.chunkRepository = chunkRepository;
  }

  async execute(request: GetMediaStatusRequest): Promise<GetMediaStatusResponse> {
    return this.unitOfWork.runForVideo(request.videoId, async ({ mediaRecords, videos }) => {
      const video = await videos.findById(request.videoId);
      if (!video) {
        throw new VideoNotFoundError(`Video not found: ${request.videoId}`);
      }

      const record = await mediaRecords.findByVideoId(request.videoId);
      if (!record) {
        return { video, media: null, receivedChunks: [] };
      }

      // Only an upload still receiving chunks has a meaningful chunk list
      const receivedChunks = record.getStatus() === 'upload_in_progress'
        ? await this.chunkRepository.listChunkIndexes(record.getStoragePath())
        : [];

      return { video, media: record.toDTO(), receivedChunks };
    });
  }
}
