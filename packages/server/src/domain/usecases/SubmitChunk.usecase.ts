import type { VideoId, ChunkIndex, MediaRecord } from '@clipvault/common-types';
import { VideoNotFoundError, InvalidChunkError, ChunkTooLargeError } from '@clipvault/common-types';
import type { IUploadUnitOfWork } from '../repositories/IUploadUnitOfWork.js';
import type { IChunkRepository } from '../repositories/IChunkRepository.js';
import type { MediaStorageLayout } from '../services/MediaStorageLayout.js';

/**
 * Chunk submission request
 */
export interface SubmitChunkRequest {
  videoId: VideoId;
  chunkIndex: ChunkIndex;
  data: Buffer;
}

/**
 * Chunk submission Use Case (Server-side)
 *
 * Business flow:
 * 1. Validate the chunk (index, size) before touching storage
 * 2. Inside the video's unit of work: check the video exists and get or
 *    create its media record
 * 3. Let the entity decide whether the chunk is accepted; a re-upload
 *    also unpublishes the video and drops chunks left from the last upload
 * 4. Write the chunk under the record's storage path
 */
export class SubmitChunkUseCase {
  private unitOfWork: IUploadUnitOfWork;
  private chunkRepository: IChunkRepository;
  private layout: MediaStorageLayout;
  private maxChunkBytes: number;

  constructor(
    unitOfWork: IUploadUnitOfWork,
    chunkRepository: IChunkRepository,
    layout: MediaStorageLayout,
    maxChunkBytes: number
  ) {
    this.unitOfWork = unitOfWork;
    this.chunkRepository = chunkRepository;
    this.layout = layout;
    this.maxChunkBytes = maxChunkBytes;
  }

  async execute(request: SubmitChunkRequest): Promise<MediaRecord> {
    const { videoId, chunkIndex, data } = request;

    // 1. Validation
    if (!Number.isInteger(chunkIndex) || chunkIndex < 0) {
      throw new InvalidChunkError(`Chunk index must be a non-negative integer: ${chunkIndex}`);
    }
    if (data.byteLength === 0) {
      throw new InvalidChunkError('Chunk data is empty');
    }
    if (data.byteLength > this.maxChunkBytes) {
      throw new ChunkTooLargeError(
        `Chunk is ${data.byteLength} bytes; the limit is ${this.maxChunkBytes} bytes`,
        this.maxChunkBytes
      );
    }

    const defaultDirectory = this.layout.chunkDirectory(videoId);

    return this.unitOfWork.runForVideo(videoId, async ({ mediaRecords, videos }) => {
      // 2. Video and media record
      const video = await videos.findById(videoId);
      if (!video) {
        throw new VideoNotFoundError(`Video not found: ${videoId}`);
      }

      const record = await mediaRecords.findOrCreate(videoId, defaultDirectory);

      // 3. Status transition
      const acceptance = record.acceptChunk(defaultDirectory);
      if (acceptance === 'restarted') {
        await videos.setPublished(videoId, false);
        await this.chunkRepository.clearChunks(record.getStoragePath());
        console.log(`🔁 [SubmitChunk] Re-upload started for video ${videoId}, video unpublished`);
      }
      if (acceptance !== 'continued') {
        await mediaRecords.save(record);
      }

      // 4. Chunk
      await this.chunkRepository.storeChunk(record.getStoragePath(), chunkIndex, data);

      return record.toDTO();
    });
  }
}
