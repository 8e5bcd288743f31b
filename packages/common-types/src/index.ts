// Entities
export { MediaRecordEntity } from './entities/MediaRecord.entity.js';
export type { ChunkAcceptance } from './entities/MediaRecord.entity.js';

// Domain Errors
export {
  DomainError,
  VideoNotFoundError,
  MediaRecordNotFoundError,
  UploadNotStartedError,
  InvalidStatusTransitionError,
  UploadInProgressConflictError,
  InvalidOperationError,
  InvalidChunkError,
  ChunkTooLargeError,
  IncompleteChunkSetError,
  StorageAccessError,
} from './errors/DomainErrors.js';

// Video types
export type { VideoId, Video } from './video.js';

// Media record types
export type { MediaRecordStatus, MediaRecord } from './media-record.js';

// Chunk types
export type { ChunkIndex, RelocationReport } from './chunk.js';

// Job types
export type {
  UploadFinalizedJobPayload,
  PromotionRequestedJobPayload,
  MediaPipelineJobPayload,
  MediaPipelineJobName,
} from './job.js';
export { QUEUE_NAMES, MEDIA_JOB_NAMES } from './job.js';

// API types
export type {
  FinishUploadRequest,
  PromoteUploadResponse,
  RegisterProcessedVideoRequest,
  MediaStatusResponse,
} from './api-types.js';
