import { config } from './config';
import { logger } from './lib/logger';
import { createApp } from './app';

const app = createApp();

const server = app.listen(config.port, '0.0.0.0', () => {
  logger.info(`Excite v${config.version} running on port ${config.port}`);
  logger.info(`Environment: ${config.nodeEnv}`);
  logger.info(`Health check: http://localhost:${config.port}/health`);
  logger.info(`API Base: http://localhost:${config.port}/api/v1`);
});

const gracefulShutdown = () => {
  logger.info('Shutting down gracefully...');

  server.close(() => {
    logger.info('HTTP server closed');
    process.exit(0);
  });
};

process.on('SIGTERM', gracefulShutdown);
process.on('SIGINT', gracefulShutdown);

export default app;
