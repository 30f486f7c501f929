import { App } from './app.js';
import { ConfigManager } from './config/ConfigManager.js';
import { createServices } from './container.js';
import { initializeLogger, logger } from './middleware/logging.js';

const config = ConfigManager.getInstance().getConfig();
initializeLogger(config.logging);

const app = new App(config, createServices(config));

const shutdown = (signal: string): void => {
  logger.info(`Received ${signal} signal, shutting down gracefully`);
  app
    .stop()
    .then(() => process.exit(0))
    .catch((error: unknown) => {
      logger.error('Error during server shutdown', { error });
      process.exit(1);
    });
};

process.on('SIGTERM', () => shutdown('SIGTERM'));
process.on('SIGINT', () => shutdown('SIGINT'));

process.on('unhandledRejection', (reason: unknown) => {
  logger.error('Unhandled promise rejection detected', {
    reason: reason instanceof Error ? { name: reason.name, message: reason.message, stack: reason.stack } : reason,
  });
});

process.on('uncaughtException', (error: Error) => {
  logger.error('Uncaught exception detected', {
    name: error.name,
    message: error.message,
    stack: error.stack,
  });

  app
    .stop()
    .then(() => {
      logger.error('Server stopped after uncaught exception');
      process.exit(1);
    })
    .catch((shutdownError: unknown) => {
      logger.error('Failed to gracefully shutdown after uncaught exception', { shutdownError });
      process.exit(1);
    });
});

app.start().catch((error: unknown) => {
  logger.error('Failed to start application', { error });
  process.exit(1);
});
