/**
 * API Request/Response Type Definitions
 * Types shared with the admin upload page
 */

import type { MediaRecordStatus } from './media-record.js';

/**
 * POST /api/videos/:id/upload/finish - Request
 */
export interface FinishUploadRequest {
  fileName: string;
  totalChunks: number;
}

/**
 * POST /api/videos/:id/upload/promote - Response
 */
export interface PromoteUploadResponse {
  video_id: number;
  status: MediaRecordStatus;
  storage_path: string;
  moved: number;
  skipped: number;
  failed: { file: string; reason: string }[];
}

/**
 * POST /api/videos/:id/media/processed - Request
 */
export interface RegisterProcessedVideoRequest {
  video_path: string;
}

/**
 * GET /api/videos/:id/media - Response
 *
 * media is null until the first chunk arrives
 */
export interface MediaStatusResponse {
  video_id: number;
  title: string;
  is_published: boolean;
  media: {
    status: MediaRecordStatus;
    storage_path: string;
    received_chunks: number[];
    updated_at: string;
  } | null;
}
