import type express from 'express';
import * as http from 'http';
import type { Logger, SetupHttpTransportResult } from '../types.ts';

/**
 * Start listening with an Express app
 *
 * Request timeouts are disabled: a multi-gigabyte upload over Wi-Fi easily outlasts
 * Node's five minute default.
 *
 * @param app - Express app with the transfer router mounted
 * @param options - Logger, port and interface to bind
 * @returns HTTP server instance and a close function
 *
 * @example
 * ```typescript
 * const app = createApp(config, { logger });
 * const { close, httpServer } = await connectHttp(app, {
 *   logger,
 *   port: 5000,
 *   host: '0.0.0.0'
 * });
 * ```
 */
export async function connectHttp(app: express.Application, options: { logger: Logger; port: number; host?: string }): Promise<SetupHttpTransportResult> {
  const { logger, port, host } = options;

  // Create HTTP server with error handling
  const httpServer = http.createServer({ requestTimeout: 0 }, app);

  await new Promise<void>((resolve, reject) => {
    httpServer.once('error', (err: NodeJS.ErrnoException) => {
      if (err.code === 'EADDRINUSE') {
        reject(new Error(`Port ${port} is already in use. This usually means another process is using this port, ` + `or a previous instance didn't shut down cleanly. Try running: lsof -ti :${port} | xargs kill -9`));
      } else {
        reject(err);
      }
    });

    httpServer.listen(port, host, () => {
      httpServer.removeAllListeners('error');
      logger.info(`HTTP server ready on ${host ?? '*'}:${port}`);
      resolve();
    });
  });

  const close = async () => {
    logger.info('Shutting down HTTP server...');
    httpServer.closeAllConnections();
    await new Promise<void>((resolve) => {
      httpServer.close(() => resolve());
    });
  };

  return { close, httpServer };
}
