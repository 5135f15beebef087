import { spawn } from 'child_process';
import type { CommandResult, CommandRunner, RunOptions } from './types.ts';

/**
 * Run a command to completion. A command that cannot be started rejects; a
 * command that fails reports its exit code.
 */
export const runCommand: CommandRunner = (command: string, args: string[], options: RunOptions = {}): Promise<CommandResult> => {
  return new Promise((resolve, reject) => {
    const child = spawn(command, args, { stdio: options.inherit ? 'inherit' : ['ignore', 'pipe', 'pipe'] });
    let stdout = '';
    let stderr = '';

    child.stdout?.setEncoding('utf8').on('data', (chunk: string) => {
      stdout += chunk;
    });
    child.stderr?.setEncoding('utf8').on('data', (chunk: string) => {
      stderr += chunk;
    });

    child.once('error', reject);
    child.once('close', (code, signal) => {
      resolve({ exitCode: code ?? (signal ? 128 : 1), stdout, stderr });
    });
  });
};
