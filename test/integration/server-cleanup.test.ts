/**
 * Integration tests for server close
 *
 * Validates that the transfer server shuts down cleanly:
 * - close() drops idle keep-alive connections instead of waiting them out
 * - close() ends a download still streaming
 * - a taken port rejects with an explanation
 *
 * Without `httpServer.closeAllConnections()`, `httpServer.close()` waits for keep-alive
 * connections to close naturally, so shutdown timing depends on the client.
 */

import assert from 'assert';
import getPort from 'get-port';
import * as fs from 'fs';
import * as http from 'http';
import { tmpdir } from 'os';
import * as path from 'path';
import { createApp, connectHttp, type AppConfig, type Logger } from '../../src/index.ts';

const logger = {
  debug: () => {},
  info: () => {},
  warn: () => {},
  error: () => {},
} as Logger;

describe('Server close', () => {
  let sharedFolder: string;
  let config: AppConfig;

  beforeEach(() => {
    sharedFolder = fs.mkdtempSync(path.join(tmpdir(), 'server-close-'));
    config = { sharedFolder, chunkSize: 16 * 1024, maxUploadBytes: 1024 * 1024, maxConcurrent: 8, exclusiveCreate: true };
  });

  afterEach(() => {
    fs.rmSync(sharedFolder, { recursive: true, force: true });
  });

  it('should close HTTP server with active keep-alive connection', async () => {
    const port = await getPort();
    const { close, httpServer } = await connectHttp(createApp(config, { logger }), { logger, port, host: '127.0.0.1' });
    const agent = new http.Agent({ keepAlive: true });

    try {
      await new Promise<void>((resolve, reject) => {
        const req = http.get(`http://127.0.0.1:${port}/`, { agent, headers: { Accept: 'application/json' } }, (res) => {
          res.on('data', () => {});
          res.on('end', () => resolve());
        });
        req.on('error', reject);
      });

      assert.ok(httpServer.listening, 'Server should be listening before close');

      await close();

      assert.strictEqual(httpServer.listening, false, 'Server should not be listening after close');
    } finally {
      agent.destroy();
      if (httpServer.listening) await close();
    }
  });

  it('should close HTTP server while a download is streaming', async () => {
    fs.writeFileSync(path.join(sharedFolder, 'big.bin'), Buffer.alloc(32 * 1024 * 1024, 7));
    const port = await getPort();
    const { close, httpServer } = await connectHttp(createApp(config, { logger }), { logger, port, host: '127.0.0.1' });

    try {
      const responseEnded = new Promise<void>((resolve, reject) => {
        const req = http.get(`http://127.0.0.1:${port}/download/big.bin`, (res) => {
          res.once('data', () => {
            close().catch(reject);
          });
          res.on('data', () => {});
          res.on('close', () => resolve());
          res.on('error', () => resolve());
        });
        // Connection reset by the server is the expected outcome
        req.on('error', () => resolve());
      });

      await responseEnded;

      assert.strictEqual(httpServer.listening, false, 'Server should not be listening after close');
    } finally {
      if (httpServer.listening) await close();
    }
  });

  it('should log a download the client abandons', async () => {
    fs.writeFileSync(path.join(sharedFolder, 'big.bin'), Buffer.alloc(32 * 1024 * 1024, 7));
    const port = await getPort();
    let sawAbort: () => void = () => {};
    const abortLogged = new Promise<void>((resolve) => {
      sawAbort = resolve;
    });
    const watchingLogger = {
      ...logger,
      debug: (message: string) => {
        if (message === 'Transfer of big.bin aborted by client') sawAbort();
      },
    } as Logger;
    const { close } = await connectHttp(createApp(config, { logger: watchingLogger }), { logger, port, host: '127.0.0.1' });

    try {
      const req = http.get(`http://127.0.0.1:${port}/download/big.bin`, (res) => {
        res.on('error', () => {});
        res.once('data', () => {
          req.destroy();
        });
      });
      req.on('error', () => {});

      await abortLogged;
    } finally {
      await close();
    }
  });

  it('should reject when the port is taken', async () => {
    const port = await getPort();
    const first = await connectHttp(createApp(config, { logger }), { logger, port, host: '127.0.0.1' });

    try {
      await assert.rejects(connectHttp(createApp(config, { logger }), { logger, port, host: '127.0.0.1' }), new RegExp(`Port ${port} is already in use`));
    } finally {
      await first.close();
    }
  });
});
