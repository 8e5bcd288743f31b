import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import {
  InvalidOperationError,
  InvalidStatusTransitionError,
  MediaRecordNotFoundError,
} from '@clipvault/common-types';
import { RegisterProcessedVideoPathUseCase } from '../RegisterProcessedVideoPath.usecase.js';
import { createUseCaseTestContext, buildVideo } from './testContext.js';
import type { UseCaseTestContext } from './testContext.js';

describe('RegisterProcessedVideoPathUseCase', () => {
  let ctx: UseCaseTestContext;
  let useCase: RegisterProcessedVideoPathUseCase;

  beforeEach(async () => {
    ctx = await createUseCaseTestContext();
    ctx.videos.add(buildVideo(42));
    useCase = new RegisterProcessedVideoPathUseCase(ctx.unitOfWork);
  });

  afterEach(async () => {
    await ctx.cleanup();
  });

  it('finishes a processing record at the given path', async () => {
    ctx.mediaRecords.put({
      videoId: 42,
      status: 'processing_started',
      storagePath: ctx.layout.chunkDirectory(42),
      createdAt: '2026-01-05T10:00:00.000Z',
      updatedAt: '2026-01-05T10:00:00.000Z',
    });

    const result = await useCase.execute({ videoId: 42, videoPath: '/srv/media/42/master.mp4' });

    expect(result.status).toBe('processing_finished');
    expect(result.storagePath).toBe('/srv/media/42/master.mp4');
  });

  it('refuses a record that is still uploading', async () => {
    ctx.mediaRecords.put({
      videoId: 42,
      status: 'upload_in_progress',
      storagePath: ctx.layout.chunkDirectory(42),
      createdAt: '2026-01-05T10:00:00.000Z',
      updatedAt: '2026-01-05T10:00:00.000Z',
    });

    await expect(
      useCase.execute({ videoId: 42, videoPath: '/srv/media/42/master.mp4' })
    ).rejects.toBeInstanceOf(InvalidStatusTransitionError);
  });

  it('fails when the video has no record', async () => {
    await expect(
      useCase.execute({ videoId: 42, videoPath: '/srv/media/42/master.mp4' })
    ).rejects.toBeInstanceOf(MediaRecordNotFoundError);
  });

  it('requires a path', async () => {
    await expect(useCase.execute({ videoId: 42, videoPath: '  ' })).rejects.toBeInstanceOf(
      InvalidOperationError
    );
  });
});
