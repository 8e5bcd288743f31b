import type { Request, Response } from 'express';
import type { PromoteUploadResponse } from '@clipvault/common-types';
import type { SubmitChunkUseCase } from '../../domain/usecases/SubmitChunk.usecase.js';
import type { FinalizeUploadUseCase } from '../../domain/usecases/FinalizeUpload.usecase.js';
import type { PromoteToExternalStorageUseCase } from '../../domain/usecases/PromoteToExternalStorage.usecase.js';
import { parseVideoId, parseNonNegativeInteger, jsonBody } from '../http/requestParams.js';

/**
 * Upload Controller
 *
 * Parses the request, runs the use case and writes the response.
 * Errors are left to the error handler middleware.
 */
export class UploadController {
  private submitChunkUseCase: SubmitChunkUseCase;
  private finalizeUploadUseCase: FinalizeUploadUseCase;
  private promoteToExternalStorageUseCase: PromoteToExternalStorageUseCase;

  constructor(
    submitChunkUseCase: SubmitChunkUseCase,
    finalizeUploadUseCase: FinalizeUploadUseCase,
    promoteToExternalStorageUseCase: PromoteToExternalStorageUseCase
  ) {
    this.submitChunkUseCase = submitChunkUseCase;
    this.finalizeUploadUseCase = finalizeUploadUseCase;
    this.promoteToExternalStorageUseCase = promoteToExternalStorageUseCase;
  }

  async submitChunk(req: Request, res: Response): Promise<void> {
    const videoId = parseVideoId(req);
    if (videoId === null) {
      res.status(400).json({ error: 'Video id must be a positive integer' });
      return;
    }

    const { chunk_index } = req.query;
    if (chunk_index === undefined) {
      res.status(400).json({ error: 'chunk_index query parameter is required' });
      return;
    }

    const chunkIndex = parseNonNegativeInteger(chunk_index);
    if (chunkIndex === null) {
      res.status(400).json({ error: 'chunk_index must be a non-negative integer' });
      return;
    }

    const data: unknown = req.body;
    if (!Buffer.isBuffer(data)) {
      res.status(400).json({ error: 'Request body must be binary data' });
      return;
    }

    await this.submitChunkUseCase.execute({ videoId, chunkIndex, data });

    res.status(204).end();
  }

  async finish(req: Request, res: Response): Promise<void> {
    const videoId = parseVideoId(req);
    if (videoId === null) {
      res.status(400).json({ error: 'Video id must be a positive integer' });
      return;
    }

    const { fileName, totalChunks } = jsonBody(req);
    if (typeof fileName !== 'string' || fileName.trim() === '') {
      res.status(400).json({ error: 'fileName is required' });
      return;
    }

    const parsedTotal = parseNonNegativeInteger(totalChunks);
    if (parsedTotal === null) {
      res.status(400).json({ error: 'totalChunks must be a positive integer' });
      return;
    }

    await this.finalizeUploadUseCase.execute({ videoId, totalChunks: parsedTotal, fileName });

    res.status(204).end();
  }

  async promote(req: Request, res: Response): Promise<void> {
    const videoId = parseVideoId(req);
    if (videoId === null) {
      res.status(400).json({ error: 'Video id must be a positive integer' });
      return;
    }

    const { record, relocation } = await this.promoteToExternalStorageUseCase.execute({ videoId });

    const body: PromoteUploadResponse = {
      video_id: record.videoId,
      status: record.status,
      storage_path: record.storagePath,
      moved: relocation.moved.length,
      skipped: relocation.skipped.length,
      failed: relocation.failed,
    };
    res.status(200).json(body);
  }
}
