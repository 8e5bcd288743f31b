import { describe, it, expect, beforeEach, afterAll, vi } from 'vitest';
import { UploadInProgressConflictError } from '@clipvault/common-types';
import { PostgresUploadUnitOfWork } from '../PostgresUploadUnitOfWork.js';
import {
  getTestPool,
  resetDatabase,
  insertVideo,
  insertVideoWithId,
  closeTestPool,
  TEST_LOCK_TIMEOUT_MS,
} from '../../repositories/__tests__/db-test-helper.js';

describe('PostgresUploadUnitOfWork', () => {
  const pool = getTestPool();
  const unitOfWork = new PostgresUploadUnitOfWork(pool);
  let videoId: number;

  beforeEach(async () => {
    vi.spyOn(console, 'log').mockImplementation(() => {});
    await resetDatabase(pool);
    videoId = await insertVideo(pool, 'Launch keynote', true);
  });

  afterAll(async () => {
    vi.restoreAllMocks();
    await closeTestPool();
  });

  it('commits a unit that resolves', async () => {
    await unitOfWork.runForVideo(videoId, async ({ mediaRecords, videos }) => {
      await mediaRecords.findOrCreate(videoId, '/tmp/videos/1');
      await videos.setPublished(videoId, false);
    });

    const media = await pool.query('SELECT status FROM video_media WHERE video_id = $1', [videoId]);
    const video = await pool.query('SELECT is_published FROM videos WHERE id = $1', [videoId]);
    expect(media.rows[0].status).toBe('upload_in_progress');
    expect(video.rows[0].is_published).toBe(false);
  });

  it('rolls back a unit that rejects', async () => {
    await expect(
      unitOfWork.runForVideo(videoId, async ({ mediaRecords, videos }) => {
        await mediaRecords.findOrCreate(videoId, '/tmp/videos/1');
        await videos.setPublished(videoId, false);
        throw new Error('abort');
      })
    ).rejects.toThrow('abort');

    const media = await pool.query('SELECT * FROM video_media WHERE video_id = $1', [videoId]);
    const video = await pool.query('SELECT is_published FROM videos WHERE id = $1', [videoId]);
    expect(media.rows).toHaveLength(0);
    expect(video.rows[0].is_published).toBe(true);
  });

  it('serializes units for the same video', async () => {
    const order: string[] = [];

    await Promise.all([
      unitOfWork.runForVideo(videoId, async () => {
        order.push('a:start');
        await new Promise((resolve) => setTimeout(resolve, 100));
        order.push('a:end');
      }),
      new Promise((resolve) => setTimeout(resolve, 20)).then(() =>
        unitOfWork.runForVideo(videoId, async () => {
          order.push('b:start');
        })
      ),
    ]);

    expect(order).toEqual(['a:start', 'a:end', 'b:start']);
  });

  it('reports a lock wait beyond lock_timeout as an upload conflict', async () => {
    const holder = unitOfWork.runForVideo(videoId, async () => {
      await new Promise((resolve) => setTimeout(resolve, TEST_LOCK_TIMEOUT_MS * 3));
    });
    await new Promise((resolve) => setTimeout(resolve, 20));

    await expect(unitOfWork.runForVideo(videoId, async () => 'late')).rejects.toBeInstanceOf(
      UploadInProgressConflictError
    );
    await holder;
  });

  it('handles video ids beyond the 32-bit range', async () => {
    const bigId = 3_000_000_000;
    await insertVideoWithId(pool, bigId, 'Archive reel');

    const result = await unitOfWork.runForVideo(bigId, async ({ mediaRecords, videos }) => {
      const video = await videos.findById(bigId);
      const record = await mediaRecords.findOrCreate(bigId, `/tmp/videos/${bigId}`);
      const missing = await mediaRecords.findByVideoId(bigId + 1);
      return { video, record: record.toDTO(), missing };
    });

    expect(result.video?.id).toBe(bigId);
    expect(result.record.videoId).toBe(bigId);
    expect(result.record.status).toBe('upload_in_progress');
    expect(result.missing).toBeNull();
  });
});
