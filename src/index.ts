// App assembly
export * from './app.ts';
// Device bridge (USB transfers)
export * from './device-bridge/adb.ts';
export * from './device-bridge/run-command.ts';
export * from './device-bridge/types.ts';
export * from './cli/quicksend.ts';
// File serving
export * from './file-serving/index.ts';
// Configuration and helpers
export * from './lib/banner.ts';
export * from './lib/local-address.ts';
export * from './lib/logger.ts';
export * from './lib/parse-config.ts';
// Middleware
export * from './middleware/concurrency.ts';
export * from './middleware/logging.ts';
// Transports
export * from './transports/http.ts';
// Core types and utilities
export * from './types.ts';
