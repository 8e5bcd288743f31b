/**
 * LoggingMediaEventPublisher - used when no queue is configured
 */

import type { VideoId } from '@clipvault/common-types';
import type {
  IMediaEventPublisher,
  UploadFinalizedDetails,
} from '../../domain/events/IMediaEventPublisher.js';

export class LoggingMediaEventPublisher implements IMediaEventPublisher {
  publishUploadFinalized(videoId: VideoId, details: UploadFinalizedDetails): void {
    console.log(
      `ℹ️ [MediaPipeline] Queue not configured, upload-finalized for video ${videoId} (${details.totalChunks} chunks at ${details.storagePath}) not enqueued`
    );
  }

  publishPromotionRequested(videoId: VideoId, storagePath: string): void {
    console.log(
      `ℹ️ [MediaPipeline] Queue not configured, promotion-requested for video ${videoId} (${storagePath}) not enqueued`
    );
  }
}
