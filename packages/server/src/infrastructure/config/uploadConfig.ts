import { readPositiveInteger } from './env.js';

export interface UploadConfig {
  /** Parent of the per-video chunk directories */
  chunkStoragePath: string;

  /** Parent of the per-video directories on external storage */
  externalStoragePath: string;

  /** Largest accepted chunk in bytes */
  maxChunkBytes: number;
}

export const DEFAULT_MAX_CHUNK_BYTES = 1024 * 1024;

/**
 * Read the upload settings from environment variables
 *
 * CHUNK_STORAGE_PATH (default /tmp/videos)
 * EXTERNAL_STORAGE_PATH (default /media/uploads)
 * MAX_CHUNK_BYTES (default 1 MiB)
 */
export function getUploadConfig(env: NodeJS.ProcessEnv = process.env): UploadConfig {
  return {
    chunkStoragePath: env.CHUNK_STORAGE_PATH || '/tmp/videos',
    externalStoragePath: env.EXTERNAL_STORAGE_PATH || '/media/uploads',
    maxChunkBytes: readPositiveInteger(env, 'MAX_CHUNK_BYTES', DEFAULT_MAX_CHUNK_BYTES),
  };
}
