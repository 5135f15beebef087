import type * as http from 'http';

export type Logger = Pick<Console, 'info' | 'error' | 'warn' | 'debug'>;

export type LogLevel = 'debug' | 'info' | 'warn' | 'error' | 'silent';

/** Server configuration - one shared folder per process, passed explicitly to every component */
export interface ServerConfig {
  /** Absolute path of the shared folder */
  sharedFolder: string;
  port: number;
  host: string;
  /** Ceiling for a whole upload request body, in bytes */
  maxUploadBytes: number;
  /** Read size for download streaming, in bytes */
  chunkSize: number;
  /** Requests handled at once; the rest wait their turn */
  maxConcurrent: number;
  /** Enables CORS for this origin when set */
  corsOrigin?: string | undefined;
  /** Open upload targets with O_EXCL and rename on conflict */
  exclusiveCreate: boolean;
  logLevel: LogLevel;
}

export type ErrorCode = 'INVALID_PATH' | 'NOT_FOUND' | 'ACCESS_DENIED' | 'RANGE_NOT_SATISFIABLE' | 'INTERNAL';

/**
 * Error branch type for discriminated union results
 */
export interface ErrorBranch {
  type: 'error';
  error: string;
  code?: ErrorCode;
  help?: string;
  debug?: Record<string, unknown>;
}

/** Create actionable error branches with guidance */
export function createActionableError(error: string, code: ErrorCode, help?: string): ErrorBranch {
  const result: ErrorBranch = {
    type: 'error',
    error,
  };
  if (code !== undefined) result.code = code;
  if (help !== undefined) result.help = help;
  return result;
}

const STATUS_BY_CODE: Record<ErrorCode, number> = {
  INVALID_PATH: 400,
  ACCESS_DENIED: 403,
  NOT_FOUND: 404,
  RANGE_NOT_SATISFIABLE: 416,
  INTERNAL: 500,
};

/** HTTP status for an error branch; branches without a code are internal errors */
export function httpStatusFor(code: ErrorCode | undefined): number {
  return code ? STATUS_BY_CODE[code] : 500;
}

export interface SetupHttpTransportResult {
  httpServer: http.Server;
  close: () => Promise<void>;
}
