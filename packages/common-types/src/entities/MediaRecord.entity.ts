import type { VideoId } from '../video.js';
import type { MediaRecordStatus, MediaRecord } from '../media-record.js';
import {
  InvalidStatusTransitionError,
  UploadInProgressConflictError,
} from '../errors/DomainErrors.js';

/**
 * What accepting a chunk did to the record
 * - continued: already receiving chunks, nothing changed
 * - started: first chunk for a record that was only created
 * - restarted: a processed asset is being replaced by a new upload
 */
export type ChunkAcceptance = 'continued' | 'started' | 'restarted';

/**
 * MediaRecord domain entity
 *
 * Business rules:
 * - upload_in_progress -> processing_started -> processing_finished
 * - a chunk arriving for a processing_finished record restarts the upload
 *   at the default chunk directory
 * - no chunk is accepted while processing_started
 */
export class MediaRecordEntity {
  private constructor(
    private readonly videoId: VideoId,
    private status: MediaRecordStatus,
    private storagePath: string,
    private readonly createdAt: Date,
    private updatedAt: Date
  ) {}

  /**
   * Create the record for the first chunk of a video
   */
  static create(videoId: VideoId, storagePath: string): MediaRecordEntity {
    const now = new Date();
    return new MediaRecordEntity(videoId, 'upload_in_progress', storagePath, now, now);
  }

  /**
   * Restore a persisted record
   */
  static reconstitute(data: MediaRecord): MediaRecordEntity {
    return new MediaRecordEntity(
      data.videoId,
      data.status,
      data.storagePath,
      new Date(data.createdAt),
      new Date(data.updatedAt)
    );
  }

  /**
   * Business rule: accept a chunk
   * Rejected while processing_started. A processing_finished record goes back
   * to upload_in_progress with its path reset to defaultChunkDirectory.
   */
  acceptChunk(defaultChunkDirectory: string): ChunkAcceptance {
    switch (this.status) {
      case 'processing_started':
        throw new UploadInProgressConflictError(
          `Upload for video ${this.videoId} is being processed; chunks are not accepted until it finishes.`
        );
      case 'upload_in_progress':
        return 'continued';
      case 'processing_finished':
        this.storagePath = defaultChunkDirectory;
        this.transitionTo('upload_in_progress');
        return 'restarted';
      case 'upload_started':
        this.transitionTo('upload_in_progress');
        return 'started';
    }
  }

  /**
   * Business rule: finalize the upload
   * Only from upload_in_progress.
   */
  startProcessing(): void {
    this.assertFinalizable();
    this.transitionTo('processing_started');
  }

  /**
   * Check that finalize is legal without changing the record
   */
  assertFinalizable(): void {
    if (this.status !== 'upload_in_progress') {
      throw new InvalidStatusTransitionError(
        `Cannot finalize upload from status: ${this.status}. Must be in 'upload_in_progress' status.`
      );
    }
  }

  /**
   * Business rule: processing finished, asset lives at finalPath
   * Only from processing_started.
   */
  finishProcessing(finalPath: string): void {
    this.assertProcessing();
    this.storagePath = finalPath;
    this.transitionTo('processing_finished');
  }

  assertProcessing(): void {
    if (this.status !== 'processing_started') {
      throw new InvalidStatusTransitionError(
        `Cannot finish processing from status: ${this.status}. Must be in 'processing_started' status.`
      );
    }
  }

  private transitionTo(status: MediaRecordStatus): void {
    this.status = status;
    this.updatedAt = new Date();
  }

  // Getters
  getVideoId(): VideoId {
    return this.videoId;
  }

  getStatus(): MediaRecordStatus {
    return this.status;
  }

  getStoragePath(): string {
    return this.storagePath;
  }

  getCreatedAt(): Date {
    return this.createdAt;
  }

  getUpdatedAt(): Date {
    return this.updatedAt;
  }

  /**
   * Plain object for persistence and API responses
   */
  toDTO(): MediaRecord {
    return {
      videoId: this.videoId,
      status: this.status,
      storagePath: this.storagePath,
      createdAt: this.createdAt.toISOString(),
      updatedAt: this.updatedAt.toISOString(),
    };
  }
}
