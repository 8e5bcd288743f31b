import { describe, it, expect } from 'vitest';
import { getMediaPipelineConfig } from '../pipelineConfig.js';

describe('getMediaPipelineConfig', () => {
  it('is null without REDIS_HOST', () => {
    expect(getMediaPipelineConfig({ REDIS_PORT: '6380' })).toBeNull();
  });

  it('falls back to the default port and retry policy', () => {
    expect(getMediaPipelineConfig({ REDIS_HOST: 'redis' })).toEqual({
      redisHost: 'redis',
      redisPort: 6379,
      attempts: 5,
      backoffMillis: 5000,
      keepCompleted: 500,
      keepFailed: 1000,
    });
  });

  it('reads the retry policy', () => {
    expect(
      getMediaPipelineConfig({
        REDIS_HOST: 'redis',
        REDIS_PORT: '6380',
        MEDIA_PIPELINE_ATTEMPTS: '2',
        MEDIA_PIPELINE_BACKOFF_MS: '250',
      })
    ).toMatchObject({ redisPort: 6380, attempts: 2, backoffMillis: 250 });
  });

  it('rejects a malformed port', () => {
    expect(() => getMediaPipelineConfig({ REDIS_HOST: 'redis', REDIS_PORT: 'six' })).toThrow(
      'REDIS_PORT must be a positive integer, got: six'
    );
  });
});
