import { describe, it, expect, beforeEach, afterAll, vi } from 'vitest';
import { MediaRecordEntity, MediaRecordNotFoundError } from '@clipvault/common-types';
import { PostgresMediaRecordRepository } from '../PostgresMediaRecordRepository.js';
import { PostgresVideoRepository } from '../PostgresVideoRepository.js';
import { getTestPool, resetDatabase, insertVideo, closeTestPool } from './db-test-helper.js';

describe('PostgresMediaRecordRepository', () => {
  const pool = getTestPool();
  let videoId: number;

  async function withClient<T>(fn: (repository: PostgresMediaRecordRepository) => Promise<T>): Promise<T> {
    const client = await pool.connect();
    try {
      return await fn(new PostgresMediaRecordRepository(client));
    } finally {
      client.release();
    }
  }

  beforeEach(async () => {
    vi.spyOn(console, 'log').mockImplementation(() => {});
    await resetDatabase(pool);
    videoId = await insertVideo(pool, 'Launch keynote');
  });

  afterAll(async () => {
    vi.restoreAllMocks();
    await closeTestPool();
  });

  it('creates the record once and returns it afterwards', async () => {
    const created = await withClient((repository) => repository.findOrCreate(videoId, '/tmp/videos/a'));
    const again = await withClient((repository) => repository.findOrCreate(videoId, '/tmp/videos/b'));

    expect(created.getStatus()).toBe('upload_in_progress');
    expect(again.getStoragePath()).toBe('/tmp/videos/a');

    const count = await pool.query('SELECT COUNT(*)::int AS count FROM video_media WHERE video_id = $1', [videoId]);
    expect(count.rows[0].count).toBe(1);
  });

  it('never creates two records when creators race', async () => {
    await Promise.all(
      Array.from({ length: 5 }, (_, i) =>
        withClient((repository) => repository.findOrCreate(videoId, `/tmp/videos/${i}`))
      )
    );

    const count = await pool.query('SELECT COUNT(*)::int AS count FROM video_media WHERE video_id = $1', [videoId]);
    expect(count.rows[0].count).toBe(1);
  });

  it('saves status and path', async () => {
    await withClient(async (repository) => {
      const record = await repository.findOrCreate(videoId, '/tmp/videos/x');
      record.startProcessing();
      await repository.save(record);
    });

    const found = await withClient((repository) => repository.findByVideoId(videoId));
    expect(found?.getStatus()).toBe('processing_started');
    expect(found?.getStoragePath()).toBe('/tmp/videos/x');
  });

  it('throws when saving a record that does not exist', async () => {
    const record = MediaRecordEntity.create(videoId, '/tmp/videos/x');

    await expect(withClient((repository) => repository.save(record))).rejects.toBeInstanceOf(
      MediaRecordNotFoundError
    );
  });

  it('clears the published flag of a video', async () => {
    const publishedId = await insertVideo(pool, 'Released', true);
    const client = await pool.connect();
    try {
      const videos = new PostgresVideoRepository(client);
      await videos.setPublished(publishedId, false);
      expect((await videos.findById(publishedId))?.isPublished).toBe(false);
    } finally {
      client.release();
    }
  });
});
