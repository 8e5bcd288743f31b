/**
 * BullMQMediaEventPublisher - enqueue media pipeline jobs on BullMQ
 *
 * IMediaEventPublisher implementation. Enqueue failures are logged and
 * never reach the caller; the status change they follow is already
 * committed.
 */

import type {
  VideoId,
  MediaPipelineJobName,
  MediaPipelineJobPayload,
} from '@clipvault/common-types';
import { MEDIA_JOB_NAMES } from '@clipvault/common-types';
import type {
  IMediaEventPublisher,
  UploadFinalizedDetails,
} from '../../domain/events/IMediaEventPublisher.js';

/**
 * The part of a BullMQ Queue this publisher uses
 */
export interface MediaPipelineQueue {
  add(name: MediaPipelineJobName, data: MediaPipelineJobPayload): Promise<unknown>;
}

export class BullMQMediaEventPublisher implements IMediaEventPublisher {
  constructor(private readonly queue: MediaPipelineQueue) {}

  publishUploadFinalized(videoId: VideoId, details: UploadFinalizedDetails): void {
    this.enqueue(MEDIA_JOB_NAMES.UPLOAD_FINALIZED, {
      videoId,
      totalChunks: details.totalChunks,
      fileName: details.fileName,
      storagePath: details.storagePath,
      createdAt: new Date().toISOString(),
    });
  }

  publishPromotionRequested(videoId: VideoId, storagePath: string): void {
    this.enqueue(MEDIA_JOB_NAMES.PROMOTION_REQUESTED, {
      videoId,
      storagePath,
      createdAt: new Date().toISOString(),
    });
  }

  private enqueue(name: MediaPipelineJobName, payload: MediaPipelineJobPayload): void {
    this.queue
      .add(name, payload)
      .then(() => {
        console.log(`📨 [MediaPipeline] Enqueued ${name} for video ${payload.videoId}`);
      })
      .catch((err: unknown) => {
        console.error(`❌ [MediaPipeline] Failed to enqueue ${name} for video ${payload.videoId}:`, err);
      });
  }
}
