import { readPositiveInteger } from './env.js';

export interface MediaPipelineConfig {
  redisHost: string;
  redisPort: number;

  /** Delivery attempts per notification job */
  attempts: number;

  /** First retry delay; later retries back off exponentially */
  backoffMillis: number;

  /** Completed/failed jobs kept in Redis for inspection */
  keepCompleted: number;
  keepFailed: number;
}

/**
 * Read the media pipeline queue settings from environment variables
 *
 * Returns null when REDIS_HOST is unset: notifications are then logged
 * instead of queued.
 */
export function getMediaPipelineConfig(
  env: NodeJS.ProcessEnv = process.env
): MediaPipelineConfig | null {
  const redisHost = env.REDIS_HOST;
  if (!redisHost) {
    return null;
  }

  return {
    redisHost,
    redisPort: readPositiveInteger(env, 'REDIS_PORT', 6379),
    attempts: readPositiveInteger(env, 'MEDIA_PIPELINE_ATTEMPTS', 5),
    backoffMillis: readPositiveInteger(env, 'MEDIA_PIPELINE_BACKOFF_MS', 5000),
    keepCompleted: readPositiveInteger(env, 'MEDIA_PIPELINE_KEEP_COMPLETED', 500),
    keepFailed: readPositiveInteger(env, 'MEDIA_PIPELINE_KEEP_FAILED', 1000),
  };
}
