import { existsSync, statSync } from 'fs';
import * as os from 'os';
import * as path from 'path';
import { formatSize } from '../file-serving/listing.ts';
import type { Logger } from '../types.ts';
import { runCommand } from './run-command.ts';
import type { CommandRunner, DeviceBridge, DeviceStatus } from './types.ts';

export const DEFAULT_DEVICE_DIR = '/sdcard/Download/';

// Homebrew installs outside the default PATH of GUI-launched shells
const FALLBACK_ADB_PATHS = ['/opt/homebrew/bin/adb', '/usr/local/bin/adb'];

/**
 * Locate the adb binary: every PATH entry first, then the Homebrew locations.
 * Returns null when adb is not installed.
 */
export function resolveAdbPath(env: Record<string, string | undefined> = process.env, exists: (file: string) => boolean = existsSync): string | null {
  const searchPath = (env.PATH ?? '').split(path.delimiter).filter(Boolean);
  for (const dir of searchPath) {
    const candidate = path.join(dir, 'adb');
    if (exists(candidate)) return candidate;
  }
  return FALLBACK_ADB_PATHS.find((candidate) => exists(candidate)) ?? null;
}

/**
 * Read `adb devices` output into a status.
 *
 * @example
 * parseDevices('List of devices attached\nR58M123ABC\tdevice\n')
 * // => { connected: true, info: 'R58M123ABC' }
 */
export function parseDevices(output: string): DeviceStatus {
  // First line is the "List of devices attached" header
  const lines = output.trim().split('\n').slice(1);

  for (const line of lines) {
    if (line.includes('\tdevice')) {
      return { connected: true, info: line.split('\t')[0] ?? '' };
    }
  }
  if (lines.some((line) => line.includes('\tunauthorized'))) {
    return { connected: false, info: 'Device unauthorized - check your phone for USB debugging prompt' };
  }
  return { connected: false, info: 'No device connected' };
}

function expandHome(value: string): string {
  if (value === '~') return os.homedir();
  if (value.startsWith('~/')) return path.join(os.homedir(), value.slice(2));
  return value;
}

export interface AdbBridgeOptions {
  /** adb binary; null when not installed */
  adbPath: string | null;
  logger: Logger;
  run?: CommandRunner;
}

/**
 * DeviceBridge backed by the adb command line tool.
 *
 * Transfers run with the terminal attached so adb's own progress output shows;
 * success is adb's exit code.
 */
export class AdbBridge implements DeviceBridge {
  private readonly adbPath: string | null;
  private readonly logger: Logger;
  private readonly run: CommandRunner;

  constructor(options: AdbBridgeOptions) {
    this.adbPath = options.adbPath;
    this.logger = options.logger;
    this.run = options.run ?? runCommand;
  }

  async status(): Promise<DeviceStatus> {
    if (!this.adbPath) return { connected: false, info: 'ADB not found' };
    const result = await this.run(this.adbPath, ['devices']);
    return parseDevices(result.stdout);
  }

  async push(localPath: string, remoteDestDir: string = DEFAULT_DEVICE_DIR): Promise<boolean> {
    const adb = this.requireAdb();
    const source = path.resolve(expandHome(localPath));
    if (!existsSync(source)) {
      this.logger.error(`❌ File not found: ${localPath}`);
      return false;
    }

    const filename = path.basename(source);
    const destination = `${remoteDestDir}${filename}`;
    this.logger.info(`📤 Sending: ${filename}`);
    this.logger.info(`   To: ${destination}`);
    this.logger.info(`   Size: ${formatSize(statSync(source).size)}`);

    const result = await this.run(adb, ['push', source, destination], { inherit: true });
    return this.report(result.exitCode, destination);
  }

  async pull(remotePath: string, localDest = '.'): Promise<boolean> {
    const adb = this.requireAdb();
    let destination = path.resolve(expandHome(localDest));
    if (existsSync(destination) && statSync(destination).isDirectory()) {
      destination = path.join(destination, path.posix.basename(remotePath));
    }

    this.logger.info(`📥 Downloading: ${remotePath}`);
    this.logger.info(`   To: ${destination}`);

    const result = await this.run(adb, ['pull', remotePath, destination], { inherit: true });
    return this.report(result.exitCode, destination);
  }

  async list(remoteDir: string = DEFAULT_DEVICE_DIR): Promise<string> {
    const adb = this.requireAdb();
    const result = await this.run(adb, ['shell', 'ls', '-la', remoteDir]);
    return result.stdout;
  }

  private report(exitCode: number, destination: string): boolean {
    if (exitCode === 0) {
      this.logger.info(`✅ Done! File saved to ${destination}`);
      return true;
    }
    this.logger.error('❌ Transfer failed');
    return false;
  }

  private requireAdb(): string {
    if (!this.adbPath) {
      throw new Error('ADB not found. Install it with: brew install android-platform-tools');
    }
    return this.adbPath;
  }
}
