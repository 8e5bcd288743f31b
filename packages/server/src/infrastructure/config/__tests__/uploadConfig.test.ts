import { describe, it, expect } from 'vitest';
import { getUploadConfig, DEFAULT_MAX_CHUNK_BYTES } from '../uploadConfig.js';

describe('getUploadConfig', () => {
  it('falls back to the defaults', () => {
    expect(getUploadConfig({})).toEqual({
      chunkStoragePath: '/tmp/videos',
      externalStoragePath: '/media/uploads',
      maxChunkBytes: DEFAULT_MAX_CHUNK_BYTES,
    });
  });

  it('reads the environment', () => {
    expect(
      getUploadConfig({
        CHUNK_STORAGE_PATH: '/data/chunks',
        EXTERNAL_STORAGE_PATH: '/mnt/archive',
        MAX_CHUNK_BYTES: '2048',
      })
    ).toEqual({
      chunkStoragePath: '/data/chunks',
      externalStoragePath: '/mnt/archive',
      maxChunkBytes: 2048,
    });
  });

  it.each(['0', '-5', 'lots'])('rejects MAX_CHUNK_BYTES=%s', (value) => {
    expect(() => getUploadConfig({ MAX_CHUNK_BYTES: value })).toThrow(
      `MAX_CHUNK_BYTES must be a positive integer, got: ${value}`
    );
  });
});
