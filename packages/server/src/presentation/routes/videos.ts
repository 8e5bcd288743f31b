import express from 'express';
import { ChunkTooLargeError } from '@clipvault/common-types';
import type { UploadController } from '../controllers/UploadController.js';
import type { MediaController } from '../controllers/MediaController.js';
import { asyncHandler, isPayloadTooLarge } from '../middleware/errorHandler.js';

/**
 * Videos Router
 *
 * Chunk uploads use express.raw(); the other routes take JSON.
 * A chunk body above maxChunkBytes becomes a ChunkTooLargeError.
 */
export function createVideosRouter(
  uploadController: UploadController,
  mediaController: MediaController,
  maxChunkBytes: number
): express.Router {
  const router = express.Router();

  const parseChunkBody = express.raw({
    type: 'application/octet-stream',
    limit: maxChunkBytes,
  });
  const rawParser: express.RequestHandler = (req, res, next) => {
    parseChunkBody(req, res, (err?: unknown) => {
      if (isPayloadTooLarge(err)) {
        next(new ChunkTooLargeError(`Chunk exceeds the limit of ${maxChunkBytes} bytes`, maxChunkBytes));
        return;
      }
      next(err);
    });
  };
  const jsonParser = express.json();

  /**
   * POST /api/videos/:id/upload/chunks?chunk_index=N
   * Store one chunk
   */
  router.post('/videos/:id/upload/chunks', rawParser, asyncHandler(async (req, res) => {
    await uploadController.submitChunk(req, res);
  }));

  /**
   * POST /api/videos/:id/upload/finish
   * All chunks sent, start processing
   */
  router.post('/videos/:id/upload/finish', jsonParser, asyncHandler(async (req, res) => {
    await uploadController.finish(req, res);
  }));

  /**
   * POST /api/videos/:id/upload/promote
   * Move the chunks to external storage
   */
  router.post('/videos/:id/upload/promote', asyncHandler(async (req, res) => {
    await uploadController.promote(req, res);
  }));

  /**
   * POST /api/videos/:id/media/processed
   */
  router.post('/videos/:id/media/processed', jsonParser, asyncHandler(async (req, res) => {
    await mediaController.registerProcessed(req, res);
  }));

  /**
   * GET /api/videos/:id/media
   */
  router.get('/videos/:id/media', asyncHandler(async (req, res) => {
    await mediaController.getStatus(req, res);
  }));

  return router;
}
