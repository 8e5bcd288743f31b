import express from 'express';
import cors from 'cors';
import morgan from 'morgan';
import type { DIContainer } from './infrastructure/di/DIContainer.js';
import type { ServerServices } from './infrastructure/di/setupContainer.js';
import { createVideosRouter } from './presentation/routes/videos.js';
import { errorHandler } from './presentation/middleware/errorHandler.js';

export interface AppOptions {
  corsOrigin: string;
  logLevel: string;
}

/**
 * Build the Express application on top of a wired container
 */
export function createApp(
  container: DIContainer<ServerServices>,
  options: AppOptions
): express.Express {
  const app = express();

  const uploadController = container.resolve('UploadController');
  const mediaController = container.resolve('MediaController');
  const { maxChunkBytes } = container.resolve('UploadConfig');

  // Middleware
  app.use(cors({
    origin: options.corsOrigin,
    credentials: true,
  }));
  if (options.logLevel !== 'silent') {
    app.use(morgan(options.logLevel === 'debug' ? 'dev' : 'combined'));
  }

  // API routes (each route brings its own body parser)
  app.use('/api', createVideosRouter(uploadController, mediaController, maxChunkBytes));

  // Health check endpoint
  app.get('/health', (_req, res) => {
    res.json({
      status: 'ok',
      timestamp: new Date().toISOString(),
      uptime: process.uptime(),
    });
  });

  // 404 handler
  app.use((_req, res) => {
    res.status(404).json({ error: 'Not Found' });
  });

  // Error handler (must be last)
  app.use(errorHandler);

  return app;
}
