import { DIContainer } from './DIContainer.js';
import { LocalFileSystemChunkRepository } from '../repositories/LocalFileSystemChunkRepository.js';
import { PostgresUploadUnitOfWork } from '../transactions/PostgresUploadUnitOfWork.js';
import { BullMQMediaEventPublisher } from '../events/BullMQMediaEventPublisher.js';
import { LoggingMediaEventPublisher } from '../events/LoggingMediaEventPublisher.js';
import { getMediaPipelineQueue } from '../queue/mediaPipelineQueue.js';
import { getPool } from '../database/PostgresClient.js';
import { getUploadConfig } from '../config/uploadConfig.js';
import type { UploadConfig } from '../config/uploadConfig.js';
import { MediaStorageLayout } from '../../domain/services/MediaStorageLayout.js';

// Use Cases
import { SubmitChunkUseCase } from '../../domain/usecases/SubmitChunk.usecase.js';
import { FinalizeUploadUseCase } from '../../domain/usecases/FinalizeUpload.usecase.js';
import { PromoteToExternalStorageUseCase } from '../../domain/usecases/PromoteToExternalStorage.usecase.js';
import { RegisterProcessedVideoPathUseCase } from '../../domain/usecases/RegisterProcessedVideoPath.usecase.js';
import { GetMediaStatusUseCase } from '../../domain/usecases/GetMediaStatus.usecase.js';

// Controllers
import { UploadController } from '../../presentation/controllers/UploadController.js';
import { MediaController } from '../../presentation/controllers/MediaController.js';

import type { IChunkRepository } from '../../domain/repositories/IChunkRepository.js';
import type { IUploadUnitOfWork } from '../../domain/repositories/IUploadUnitOfWork.js';
import type { IMediaEventPublisher } from '../../domain/events/IMediaEventPublisher.js';

/**
 * Everything the server resolves from the container
 */
export interface ServerServices {
  UploadConfig: UploadConfig;
  ChunkRepository: IChunkRepository;
  UploadUnitOfWork: IUploadUnitOfWork;
  MediaEventPublisher: IMediaEventPublisher;
  SubmitChunkUseCase: SubmitChunkUseCase;
  FinalizeUploadUseCase: FinalizeUploadUseCase;
  PromoteToExternalStorageUseCase: PromoteToExternalStorageUseCase;
  RegisterProcessedVideoPathUseCase: RegisterProcessedVideoPathUseCase;
  GetMediaStatusUseCase: GetMediaStatusUseCase;
  UploadController: UploadController;
  MediaController: MediaController;
}

export interface ContainerDependencies {
  uploadConfig: UploadConfig;
  chunkRepository: IChunkRepository;
  unitOfWork: IUploadUnitOfWork;
  mediaEventPublisher: IMediaEventPublisher;
}

/**
 * Wire use cases and controllers on top of the given infrastructure
 */
export function createContainer(deps: ContainerDependencies): DIContainer<ServerServices> {
  const container = new DIContainer<ServerServices>();
  const { uploadConfig, chunkRepository, unitOfWork, mediaEventPublisher } = deps;

  container.register('UploadConfig', uploadConfig);
  container.register('ChunkRepository', chunkRepository);
  container.register('UploadUnitOfWork', unitOfWork);
  container.register('MediaEventPublisher', mediaEventPublisher);

  const layout = new MediaStorageLayout(uploadConfig.chunkStoragePath, uploadConfig.externalStoragePath);

  // Use Cases
  const submitChunkUseCase = new SubmitChunkUseCase(
    unitOfWork,
    chunkRepository,
    layout,
    uploadConfig.maxChunkBytes
  );
  container.register('SubmitChunkUseCase', submitChunkUseCase);

  const finalizeUploadUseCase = new FinalizeUploadUseCase(
    unitOfWork,
    chunkRepository,
    mediaEventPublisher
  );
  container.register('FinalizeUploadUseCase', finalizeUploadUseCase);

  const promoteToExternalStorageUseCase = new PromoteToExternalStorageUseCase(
    unitOfWork,
    chunkRepository,
    layout,
    mediaEventPublisher
  );
  container.register('PromoteToExternalStorageUseCase', promoteToExternalStorageUseCase);

  const registerProcessedVideoPathUseCase = new RegisterProcessedVideoPathUseCase(unitOfWork);
  container.register('RegisterProcessedVideoPathUseCase', registerProcessedVideoPathUseCase);

  const getMediaStatusUseCase = new GetMediaStatusUseCase(unitOfWork, chunkRepository);
  container.register('GetMediaStatusUseCase', getMediaStatusUseCase);

  // Controllers
  container.register(
    'UploadController',
    new UploadController(submitChunkUseCase, finalizeUploadUseCase, promoteToExternalStorageUseCase)
  );
  container.register(
    'MediaController',
    new MediaController(registerProcessedVideoPathUseCase, getMediaStatusUseCase)
  );

  return container;
}

let container: DIContainer<ServerServices> | null = null;

/**
 * DI container setup (Server-side)
 *
 * PostgreSQL for records, the local filesystem for chunks, and BullMQ for
 * pipeline notifications when REDIS_HOST is set.
 */
export function setupContainer(): DIContainer<ServerServices> {
  // Already set up
  if (container) {
    return container;
  }

  const uploadConfig = getUploadConfig();
  console.log(`📦 Chunk storage: ${uploadConfig.chunkStoragePath}`);
  console.log(`📦 External storage: ${uploadConfig.externalStoragePath}`);

  const queue = getMediaPipelineQueue();
  let mediaEventPublisher: IMediaEventPublisher;
  if (queue) {
    mediaEventPublisher = new BullMQMediaEventPublisher(queue);
    console.log('📨 Media pipeline: BullMQ');
  } else {
    mediaEventPublisher = new LoggingMediaEventPublisher();
    console.log('ℹ️ Media pipeline: Redis not configured, notifications are logged only');
  }

  container = createContainer({
    uploadConfig,
    chunkRepository: new LocalFileSystemChunkRepository(),
    unitOfWork: new PostgresUploadUnitOfWork(getPool()),
    mediaEventPublisher,
  });

  console.log('✅ Server DIContainer setup complete');

  return container;
}
