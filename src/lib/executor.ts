import { execFile } from 'child_process';
import { promisify } from 'util';
import fs from 'fs/promises';

const execFileAsync = promisify(execFile);

export interface ExecOptions {
  timeoutMs?: number;
}

/**
 * Read-only access to the host: running query commands and reading
 * kernel tables. Nothing here mutates system state.
 */
export interface Executor {
  exec(file: string, args: string[], options?: ExecOptions): Promise<{ stdout: string; stderr: string }>;
  readFile(path: string): Promise<string>;
  exists(path: string): Promise<boolean>;
  readdir(path: string): Promise<string[]>;
}

export const DEFAULT_COMMAND_TIMEOUT_MS = 2000;

export class LocalExecutor implements Executor {
  async exec(file: string, args: string[], options: ExecOptions = {}) {
    // execFile kills the child with SIGTERM once the timeout elapses and rejects
    const { stdout, stderr } = await execFileAsync(file, args, {
      timeout: options.timeoutMs ?? DEFAULT_COMMAND_TIMEOUT_MS,
      maxBuffer: 4 * 1024 * 1024,
      encoding: 'utf-8',
      env: { ...process.env, LC_ALL: 'C' },
    });
    return { stdout, stderr };
  }

  async readFile(filePath: string) {
    return fs.readFile(filePath, 'utf-8');
  }

  async exists(filePath: string) {
    try {
      await fs.access(filePath);
      return true;
    } catch {
      return false;
    }
  }

  async readdir(dirPath: string) {
    return fs.readdir(dirPath);
  }
}

export function getExecutor(): Executor {
  return new LocalExecutor();
}
