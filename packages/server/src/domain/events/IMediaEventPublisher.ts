/**
 * IMediaEventPublisher - media pipeline notification interface
 *
 * Signals the downstream processing pipeline after a status change has
 * been committed. Delivery and retries belong to the sink; callers do not
 * wait for it.
 */

import type { VideoId } from '@clipvault/common-types';

export interface UploadFinalizedDetails {
  totalChunks: number;
  storagePath: string;
  fileName?: string;
}

export interface IMediaEventPublisher {
  /**
   * All chunks received, processing can start
   */
  publishUploadFinalized(videoId: VideoId, details: UploadFinalizedDetails): void;

  /**
   * Chunks moved to external storage
   */
  publishPromotionRequested(videoId: VideoId, storagePath: string): void;
}
