import * as os from 'os';
import * as path from 'path';
import { parseArgs } from 'util';
import { z } from 'zod';
import { DEFAULT_CHUNK_SIZE } from '../file-serving/chunk-stream.ts';
import { DEFAULT_MAX_UPLOAD_BYTES } from '../file-serving/types.ts';
import type { ServerConfig } from '../types.ts';

export const DEFAULT_PORT = 5000;
export const DEFAULT_MAX_CONCURRENT = 8;

export function defaultSharedFolder(homedir: string = os.homedir()): string {
  return path.join(homedir, 'Downloads', 'PhoneTransfer');
}

const positiveInt = (name: string) => z.coerce.number({ invalid_type_error: `${name} must be a number` }).int(`${name} must be a whole number`).positive(`${name} must be positive`);

const ServerConfigSchema = z.object({
  sharedFolder: z.string().min(1, 'Shared folder must not be empty'),
  port: positiveInt('Port').max(65535, 'Port must be at most 65535'),
  host: z.string().min(1),
  maxUploadBytes: positiveInt('Max upload size'),
  chunkSize: positiveInt('Chunk size'),
  maxConcurrent: positiveInt('Max concurrent requests'),
  corsOrigin: z.string().min(1).optional(),
  exclusiveCreate: z.boolean(),
  logLevel: z.enum(['debug', 'info', 'warn', 'error', 'silent']),
});

function expandHome(value: string, homedir: string): string {
  if (value === '~') return homedir;
  if (value.startsWith('~/')) return path.join(homedir, value.slice(2));
  return value;
}

function stringOption(value: string | boolean | undefined): string | undefined {
  return typeof value === 'string' ? value : undefined;
}

/**
 * Parse server configuration from CLI arguments and environment variables.
 *
 * CLI flags override environment variables, which override the defaults.
 *
 * @param args - CLI arguments array (typically process.argv.slice(2))
 * @param env - Environment variables object (typically process.env)
 * @returns Validated configuration with an absolute shared folder
 * @throws ZodError when a value is out of range or not a number
 *
 * @example Defaults
 * const config = parseConfig([], {});
 * // Result: { sharedFolder: '~/Downloads/PhoneTransfer' (expanded), port: 5000, host: '0.0.0.0', ... }
 *
 * @example Port and folder from flags
 * const config = parseConfig(['--port=8080', '--folder', '/srv/share'], process.env);
 */
export function parseConfig(args: string[], env: Record<string, string | undefined>, homedir: string = os.homedir()): ServerConfig {
  const { values } = parseArgs({
    args,
    options: {
      folder: { type: 'string' },
      port: { type: 'string' },
      host: { type: 'string' },
      'max-upload-size': { type: 'string' },
      'chunk-size': { type: 'string' },
      'max-concurrent': { type: 'string' },
      'cors-origin': { type: 'string' },
      'log-level': { type: 'string' },
      'unsafe-naming': { type: 'boolean' },
    },
    strict: false,
    allowPositionals: true,
  });

  const folder = stringOption(values.folder) ?? env.SHARE_FOLDER ?? defaultSharedFolder(homedir);

  const config = ServerConfigSchema.parse({
    sharedFolder: folder,
    port: stringOption(values.port) ?? env.PORT ?? DEFAULT_PORT,
    host: stringOption(values.host) ?? env.HOST ?? '0.0.0.0',
    maxUploadBytes: stringOption(values['max-upload-size']) ?? env.MAX_UPLOAD_SIZE ?? DEFAULT_MAX_UPLOAD_BYTES,
    chunkSize: stringOption(values['chunk-size']) ?? env.CHUNK_SIZE ?? DEFAULT_CHUNK_SIZE,
    maxConcurrent: stringOption(values['max-concurrent']) ?? env.MAX_CONCURRENT ?? DEFAULT_MAX_CONCURRENT,
    corsOrigin: stringOption(values['cors-origin']) ?? (env.CORS_ORIGIN || undefined),
    exclusiveCreate: values['unsafe-naming'] !== true,
    logLevel: stringOption(values['log-level']) ?? env.LOG_LEVEL ?? 'info',
  });

  return { ...config, sharedFolder: path.resolve(expandHome(config.sharedFolder, homedir)) };
}
