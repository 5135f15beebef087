import type { Logger } from '../types.ts';

export const DEFAULT_MAX_UPLOAD_BYTES = 10 * 1024 * 1024 * 1024;

/**
 * Configuration for the transfer endpoints
 *
 * @example
 * const config: TransferConfig = {
 *   sharedFolder: '/home/me/Downloads/PhoneTransfer',
 *   chunkSize: 256 * 1024,
 * };
 */
export interface TransferConfig {
  sharedFolder: string;
  /** @default 1 MiB */
  chunkSize?: number;
  /** @default 10 GiB - checked against Content-Length and per uploaded file */
  maxUploadBytes?: number;
  /**
   * Create upload targets with O_EXCL and pick the next free name on conflict.
   * Turning this off reproduces the check-then-write race between concurrent
   * uploads of the same name.
   * @default true
   */
  exclusiveCreate?: boolean;
}

export interface TransferRouterOptions {
  logger: Logger;
}

export interface UploadResponse {
  uploaded: string[];
}
