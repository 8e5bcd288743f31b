import { Queue } from 'bullmq';
import type { MediaPipelineJobPayload } from '@clipvault/common-types';
import { QUEUE_NAMES } from '@clipvault/common-types';
import type { MediaPipelineConfig } from '../config/pipelineConfig.js';
import { getMediaPipelineConfig } from '../config/pipelineConfig.js';

/**
 * BullMQ queue for upload-finalized and promotion-requested jobs
 */
export function createMediaPipelineQueue(config: MediaPipelineConfig): Queue<MediaPipelineJobPayload> {
  return new Queue<MediaPipelineJobPayload>(QUEUE_NAMES.MEDIA_PIPELINE, {
    connection: { host: config.redisHost, port: config.redisPort },
    defaultJobOptions: {
      attempts: config.attempts,
      backoff: { type: 'exponential', delay: config.backoffMillis },
      removeOnComplete: config.keepCompleted,
      removeOnFail: config.keepFailed,
    },
  });
}

let queue: Queue<MediaPipelineJobPayload> | null = null;

/**
 * Shared queue, or null when Redis is not configured
 */
export function getMediaPipelineQueue(): Queue<MediaPipelineJobPayload> | null {
  if (queue) {
    return queue;
  }
  const config = getMediaPipelineConfig();
  if (config) {
    queue = createMediaPipelineQueue(config);
  }
  return queue;
}

export async function closeMediaPipelineQueue(): Promise<void> {
  if (!queue) {
    return;
  }
  const closing = queue;
  queue = null;
  await closing.close();
}
