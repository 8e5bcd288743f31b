import type { VideoId } from './video.js';

/**
 * Media processing status
 * - upload_started: record exists, no chunk received yet
 * - upload_in_progress: receiving chunks
 * - processing_started: upload finalized, waiting for downstream processing
 * - processing_finished: asset stored at its final location
 */
export type MediaRecordStatus =
  | 'upload_started'
  | 'upload_in_progress'
  | 'processing_started'
  | 'processing_finished';

/**
 * Media record information
 */
export interface MediaRecord {
  /** Owning video (unique: one record per video) */
  videoId: VideoId;

  /** Current processing status */
  status: MediaRecordStatus;

  /** Chunk directory while uploading, final asset location once processed */
  storagePath: string;

  /** Creation timestamp (ISO 8601) */
  createdAt: string;

  /** Last updated timestamp (ISO 8601) */
  updatedAt: string;
}
