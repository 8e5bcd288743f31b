import dotenv from 'dotenv';
import { createServer } from 'http';
import { setupContainer } from './infrastructure/di/setupContainer.js';
import { getPool, closePool } from './infrastructure/database/PostgresClient.js';
import { migrate } from './infrastructure/database/migrate.js';
import { closeMediaPipelineQueue } from './infrastructure/queue/mediaPipelineQueue.js';
import { createApp } from './app.js';

// Load environment variables
dotenv.config();

const PORT = Number(process.env.PORT) || 3000;
const LOG_LEVEL = process.env.LOG_LEVEL || 'info';
const CORS_ORIGIN = process.env.CORS_ORIGIN || 'http://localhost:5173';

async function main(): Promise<void> {
  await migrate(getPool());

  // Initialize DI Container
  const container = setupContainer();
  const app = createApp(container, { corsOrigin: CORS_ORIGIN, logLevel: LOG_LEVEL });

  const httpServer = createServer(app);

  httpServer.listen(PORT, () => {
    console.log(`🚀 ClipVault upload server running on port ${PORT}`);
    console.log(`📊 Log level: ${LOG_LEVEL}`);
    console.log(`🏥 Health check: http://localhost:${PORT}/health`);
  });

  const shutdown = (signal: string) => {
    console.log(`🛑 [Server] ${signal} received, shutting down`);
    httpServer.close(() => {
      Promise.all([closeMediaPipelineQueue(), closePool()])
        .then(() => process.exit(0))
        .catch((err: unknown) => {
          console.error('❌ [Server] Shutdown failed:', err);
          process.exit(1);
        });
    });
  };

  process.on('SIGTERM', () => shutdown('SIGTERM'));
  process.on('SIGINT', () => shutdown('SIGINT'));
}

main().catch((err: unknown) => {
  console.error('❌ [Server] Failed to start:', err);
  process.exit(1);
});
