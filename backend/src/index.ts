import 'express-async-errors';
import { createApp } from './app';
import { logger } from './config/logger';
import { env } from './config/env';
import { closeDatabase, isGeminiConfigured } from './config';
import { createServices } from './services/container';
import { handleUncaughtException, handleUnhandledRejection } from './middleware/error-handler';
import { cleanupStaleRequests } from './middleware/request-logger';

// Graceful shutdown handler
function gracefulShutdown(signal: string) {
  logger.info(`${signal} received. Starting graceful shutdown...`);

  try {
    closeDatabase();
    logger.info('Graceful shutdown completed');
    process.exit(0);
  } catch (error) {
    logger.error('Error during graceful shutdown:', error);
    process.exit(1);
  }
}

// Initialize and start server
async function startServer() {
  try {
    if (!isGeminiConfigured()) {
      logger.warn('GOOGLE_API_KEY not configured. Agent replies will fail until it is set.');
    }
    if (!env.GOOGLE_CLOUD_PROJECT) {
      logger.warn('GOOGLE_CLOUD_PROJECT not set. BigQuery will use the default project of the credentials.');
    }

    const services = createServices();
    const app = createApp(services);

    // Initialize cleanup for stale requests
    cleanupStaleRequests();

    // Setup global error handlers
    handleUncaughtException();
    handleUnhandledRejection();

    // Start server
    const server = await new Promise<ReturnType<typeof app.listen>>(resolve => {
      const listening = app.listen(env.PORT, env.HOST, () => resolve(listening));
    });
    logger.info(`Server is running on ${env.HOST}:${env.PORT} in ${env.NODE_ENV} mode`);
    logger.info(`Health check available at http://localhost:${env.PORT}/api/health`);

    // Handle graceful shutdown
    process.on('SIGTERM', () => gracefulShutdown('SIGTERM'));
    process.on('SIGINT', () => gracefulShutdown('SIGINT'));

    return server;
  } catch (error) {
    logger.error('Failed to start server:', error);
    process.exit(1);
  }
}

// Start the server if this file is run directly
if (require.main === module) {
  startServer().catch(error => {
    logger.error('Server crashed during startup:', error);
    process.exit(1);
  });
}

export { startServer };
