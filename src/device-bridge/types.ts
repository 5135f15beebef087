export interface DeviceStatus {
  connected: boolean;
  /** Device serial when connected, otherwise why not */
  info: string;
}

/**
 * File transfer to and from a device attached over USB
 */
export interface DeviceBridge {
  /** Copy a local file into a directory on the device */
  push(localPath: string, remoteDestDir?: string): Promise<boolean>;
  /** Copy a file from the device to a local file or directory */
  pull(remotePath: string, localDest?: string): Promise<boolean>;
  /** Directory listing on the device, as the device prints it */
  list(remoteDir?: string): Promise<string>;
  status(): Promise<DeviceStatus>;
}

export interface CommandResult {
  exitCode: number;
  stdout: string;
  stderr: string;
}

export interface RunOptions {
  /** Let the command write straight to this terminal (progress output); stdout is then not captured */
  inherit?: boolean;
}

export type CommandRunner = (command: string, args: string[], options?: RunOptions) => Promise<CommandResult>;
