import type { VideoId } from './video.js';

export interface UploadFinalizedJobPayload {
  videoId: VideoId;
  totalChunks: number;
  fileName?: string;
  storagePath: string;
  createdAt: string;
}

export interface PromotionRequestedJobPayload {
  videoId: VideoId;
  storagePath: string;
  createdAt: string;
}

export type MediaPipelineJobPayload = UploadFinalizedJobPayload | PromotionRequestedJobPayload;

export const QUEUE_NAMES = {
  MEDIA_PIPELINE: 'media-pipeline',
} as const;

export const MEDIA_JOB_NAMES = {
  UPLOAD_FINALIZED: 'upload-finalized',
  PROMOTION_REQUESTED: 'promotion-requested',
} as const;

export type MediaPipelineJobName = (typeof MEDIA_JOB_NAMES)[keyof typeof MEDIA_JOB_NAMES];
