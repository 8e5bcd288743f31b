import { describe, it, expect } from 'vitest';
import { MediaRecordEntity } from '../MediaRecord.entity.js';
import {
  InvalidStatusTransitionError,
  UploadInProgressConflictError,
} from '../../errors/DomainErrors.js';

function recordIn(status: 'upload_started' | 'upload_in_progress' | 'processing_started' | 'processing_finished', storagePath = '/media/uploads/7'): MediaRecordEntity {
  return MediaRecordEntity.reconstitute({
    videoId: 7,
    status,
    storagePath,
    createdAt: '2026-01-01T00:00:00.000Z',
    updatedAt: '2026-01-01T00:00:00.000Z',
  });
}

describe('MediaRecordEntity', () => {
  describe('create', () => {
    it('starts in upload_in_progress with the given path', () => {
      const record = MediaRecordEntity.create(7, '/tmp/videos/7');

      expect(record.getVideoId()).toBe(7);
      expect(record.getStatus()).toBe('upload_in_progress');
      expect(record.getStoragePath()).toBe('/tmp/videos/7');
    });
  });

  describe('acceptChunk', () => {
    it('keeps an upload_in_progress record unchanged', () => {
      const record = recordIn('upload_in_progress', '/tmp/videos/7');

      expect(record.acceptChunk('/tmp/videos/7')).toBe('continued');
      expect(record.getStatus()).toBe('upload_in_progress');
      expect(record.getUpdatedAt().toISOString()).toBe('2026-01-01T00:00:00.000Z');
    });

    it('moves upload_started to upload_in_progress', () => {
      const record = recordIn('upload_started', '/tmp/videos/7');

      expect(record.acceptChunk('/tmp/videos/7')).toBe('started');
      expect(record.getStatus()).toBe('upload_in_progress');
    });

    it('restarts a processed record at the default chunk directory', () => {
      const record = recordIn('processing_finished', '/media/uploads/7');

      expect(record.acceptChunk('/tmp/videos/7')).toBe('restarted');
      expect(record.getStatus()).toBe('upload_in_progress');
      expect(record.getStoragePath()).toBe('/tmp/videos/7');
    });

    it('rejects chunks while processing_started', () => {
      const record = recordIn('processing_started', '/tmp/videos/7');

      expect(() => record.acceptChunk('/tmp/videos/7')).toThrow(UploadInProgressConflictError);
      expect(record.getStatus()).toBe('processing_started');
      expect(record.getStoragePath()).toBe('/tmp/videos/7');
    });
  });

  describe('startProcessing', () => {
    it('moves upload_in_progress to processing_started', () => {
      const record = recordIn('upload_in_progress');
      record.startProcessing();
      expect(record.getStatus()).toBe('processing_started');
    });

    it.each(['upload_started', 'processing_started', 'processing_finished'] as const)(
      'rejects finalize from %s',
      (status) => {
        const record = recordIn(status);
        expect(() => record.startProcessing()).toThrow(InvalidStatusTransitionError);
        expect(record.getStatus()).toBe(status);
      }
    );
  });

  describe('finishProcessing', () => {
    it('stores the final path and moves to processing_finished', () => {
      const record = recordIn('processing_started', '/tmp/videos/7');
      record.finishProcessing('/media/uploads/7');

      expect(record.getStatus()).toBe('processing_finished');
      expect(record.getStoragePath()).toBe('/media/uploads/7');
    });

    it('rejects finishing an upload that is still receiving chunks', () => {
      const record = recordIn('upload_in_progress', '/tmp/videos/7');

      expect(() => record.finishProcessing('/media/uploads/7')).toThrow(
        "Cannot finish processing from status: upload_in_progress. Must be in 'processing_started' status."
      );
      expect(record.getStoragePath()).toBe('/tmp/videos/7');
    });
  });

  describe('toDTO', () => {
    it('round-trips through reconstitute', () => {
      const record = recordIn('processing_finished', '/media/uploads/7');

      expect(MediaRecordEntity.reconstitute(record.toDTO()).toDTO()).toEqual({
        videoId: 7,
        status: 'processing_finished',
        storagePath: '/media/uploads/7',
        createdAt: '2026-01-01T00:00:00.000Z',
        updatedAt: '2026-01-01T00:00:00.000Z',
      });
    });
  });
});
