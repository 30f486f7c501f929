import express from 'express';
import cors from 'cors';
import { createServer, Server as HttpServer } from 'http';
import type { AppConfig } from './config/types.js';
import type { Services } from './container.js';
import { securityMiddleware } from './middleware/security.js';
import { requestLoggingMiddleware, logger } from './middleware/logging.js';
import { errorHandler, notFoundHandler } from './middleware/errorHandler.js';
import { createApiRouter } from './routes/api.js';
import { checkRequiredBinaries } from './utils/binaryCheck.js';

export class App {
  public express: express.Application;
  private httpServer: HttpServer;

  constructor(
    private readonly config: AppConfig,
    private readonly services: Services
  ) {
    this.express = express();
    this.httpServer = createServer(this.express);

    this.initializeMiddleware();
    this.initializeRoutes();
    // Error handling must come after every route
    this.initializeErrorHandling();
  }

  private initializeMiddleware(): void {
    this.express.use(securityMiddleware);

    this.express.use(
      cors({
        origin: this.config.server.env === 'development' ? true : false,
      })
    );

    this.express.use(express.json({ limit: '1mb' }));

    this.express.use(requestLoggingMiddleware);
  }

  private initializeRoutes(): void {
    this.express.get('/health', (_req, res, next) => {
      this.services.health
        .check()
        .then(report => {
          res.json(report);
        })
        .catch(next);
    });

    this.express.use('/api', createApiRouter(this.services.tools));
  }

  private initializeErrorHandling(): void {
    this.express.use(notFoundHandler);
    this.express.use(errorHandler);
  }

  public async start(): Promise<void> {
    const { extraction, credentials } = this.config;
    const hasRemoteHosts =
      Boolean(credentials.global.remoteHost) ||
      Object.values(credentials.platforms).some(settings => Boolean(settings.remoteHost));
    await checkRequiredBinaries(extraction, hasRemoteHosts);

    const { port, host } = this.config.server;
    await new Promise<void>((resolve, reject) => {
      this.httpServer.once('error', reject);
      this.httpServer.listen(port, host, () => {
        this.httpServer.off('error', reject);
        resolve();
      });
    });

    logger.info(`mediascope server started on ${host}:${port}`);
    logger.info(`Environment: ${this.config.server.env}`);
    logger.info(`Max concurrent extractions: ${extraction.maxConcurrentExtractions}`);
  }

  public async stop(): Promise<void> {
    this.services.media.close();
    this.services.danmaku.close();
    logger.info('Cache sweeps stopped');

    if (!this.httpServer.listening) {
      return;
    }
    await new Promise<void>((resolve, reject) => {
      this.httpServer.close(error => (error ? reject(error) : resolve()));
    });
    logger.info('Server stopped gracefully');
  }
}
