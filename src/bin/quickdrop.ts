#!/usr/bin/env tsx
/**
 * QuickDrop - share a folder with phones on the same network
 *
 * USAGE: tsx src/bin/quickdrop.ts [--folder <dir>] [--port <port>] [--host <addr>]
 *        [--max-upload-size <bytes>] [--chunk-size <bytes>] [--max-concurrent <n>]
 *        [--cors-origin <origin>] [--log-level debug|info|warn|error|silent] [--unsafe-naming]
 */

import { mkdir } from 'fs/promises';
import { createApp } from '../app.ts';
import { renderBanner } from '../lib/banner.ts';
import { getLocalAddress } from '../lib/local-address.ts';
import { createConsoleLogger } from '../lib/logger.ts';
import { parseConfig } from '../lib/parse-config.ts';
import { connectHttp } from '../transports/http.ts';

async function main() {
  const config = parseConfig(process.argv.slice(2), process.env);
  const logger = createConsoleLogger(config.logLevel);

  await mkdir(config.sharedFolder, { recursive: true });

  const app = createApp(config, { logger });
  const { close } = await connectHttp(app, { logger, port: config.port, host: config.host });

  console.log(await renderBanner(`http://${getLocalAddress()}:${config.port}`, config.sharedFolder));

  const shutdown = () => {
    close().then(
      () => process.exit(0),
      (error: unknown) => {
        console.error('Error during shutdown:', error);
        process.exit(1);
      }
    );
  };
  process.on('SIGINT', shutdown);
  process.on('SIGTERM', shutdown);
}

main().catch((error) => {
  console.error('Fatal error:', error);
  process.exit(1);
});
