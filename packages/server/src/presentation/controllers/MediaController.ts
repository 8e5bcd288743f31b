import type { Request, Response } from 'express';
import type { MediaStatusResponse } from '@clipvault/common-types';
import type { RegisterProcessedVideoPathUseCase } from '../../domain/usecases/RegisterProcessedVideoPath.usecase.js';
import type { GetMediaStatusUseCase } from '../../domain/usecases/GetMediaStatus.usecase.js';
import { parseVideoId, jsonBody } from '../http/requestParams.js';

/**
 * Media Controller
 *
 * Status reads for the admin page and the processing pipeline callback
 */
export class MediaController {
  private registerProcessedVideoPathUseCase: RegisterProcessedVideoPathUseCase;
  private getMediaStatusUseCase: GetMediaStatusUseCase;

  constructor(
    registerProcessedVideoPathUseCase: RegisterProcessedVideoPathUseCase,
    getMediaStatusUseCase: GetMediaStatusUseCase
  ) {
    this.registerProcessedVideoPathUseCase = registerProcessedVideoPathUseCase;
    this.getMediaStatusUseCase = getMediaStatusUseCase;
  }

  async getStatus(req: Request, res: Response): Promise<void> {
    const videoId = parseVideoId(req);
    if (videoId === null) {
      res.status(400).json({ error: 'Video id must be a positive integer' });
      return;
    }

    const { video, media, receivedChunks } = await this.getMediaStatusUseCase.execute({ videoId });

    const body: MediaStatusResponse = {
      video_id: video.id,
      title: video.title,
      is_published: video.isPublished,
      media: media
        ? {
            status: media.status,
            storage_path: media.storagePath,
            received_chunks: receivedChunks,
            updated_at: media.updatedAt,
          }
        : null,
    };
    res.status(200).json(body);
  }

  /**
   * The processing pipeline reports where the finished asset was written
   */
  async registerProcessed(req: Request, res: Response): Promise<void> {
    const videoId = parseVideoId(req);
    if (videoId === null) {
      res.status(400).json({ error: 'Video id must be a positive integer' });
      return;
    }

    const { video_path } = jsonBody(req);
    if (typeof video_path !== 'string') {
      res.status(400).json({ error: 'video_path is required' });
      return;
    }

    await this.registerProcessedVideoPathUseCase.execute({ videoId, videoPath: video_path });

    res.status(204).end();
  }
}
