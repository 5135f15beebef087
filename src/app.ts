import cors from 'cors';
import express from 'express';
import { createTransferRouter } from './file-serving/router.ts';
import { limitConcurrency } from './middleware/concurrency.ts';
import { createRequestLogging } from './middleware/logging.ts';
import type { Logger, ServerConfig } from './types.ts';

export type AppConfig = Pick<ServerConfig, 'sharedFolder' | 'chunkSize' | 'maxUploadBytes' | 'maxConcurrent' | 'exclusiveCreate' | 'corsOrigin'>;

/**
 * Assemble the Express app: request logging, the concurrency limit, optional CORS
 * and the transfer routes mounted at the root.
 */
export function createApp(config: AppConfig, options: { logger: Logger }): express.Express {
  const { logger } = options;
  const app = express();

  app.disable('x-powered-by');
  app.use(createRequestLogging({ logger }));
  app.use(limitConcurrency({ max: config.maxConcurrent, logger }));

  if (config.corsOrigin) {
    app.use(
      cors({
        origin: config.corsOrigin,
        exposedHeaders: ['Content-Range', 'Content-Length', 'Content-Disposition', 'Accept-Ranges'],
        allowedHeaders: ['Content-Type', 'Range'],
      })
    );
  }

  app.use(
    createTransferRouter(
      {
        sharedFolder: config.sharedFolder,
        chunkSize: config.chunkSize,
        maxUploadBytes: config.maxUploadBytes,
        exclusiveCreate: config.exclusiveCreate,
      },
      { logger }
    )
  );

  return app;
}
