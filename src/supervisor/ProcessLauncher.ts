import { spawn, type SpawnOptions } from 'node:child_process';
import fs from 'node:fs';
import path from 'node:path';
import { LaunchError } from './errors';
import type { SupervisorLogger } from './types';

export interface DetachedChild {
  pid?: number;
  unref(): void;
  once(event: 'error', listener: (error: Error) => void): unknown;
}

export type ProcessFactory = (command: string, args: string[], options: SpawnOptions) => DetachedChild;

export interface LaunchRequest {
  command: string;
  args: string[];
  cwd: string;
  logFilePath: string;
}

const spawnDetached: ProcessFactory = (command, args, options) => spawn(command, args, options);

function closeDescriptor(fd: number): void {
  try {
    fs.closeSync(fd);
  } catch {
    // already closed by the failed spawn
  }
}

/**
 * Starts a process that outlives the CLI: own process group, no stdin,
 * stdout and stderr appended to the log file.
 */
export class ProcessLauncher {
  private readonly processFactory: ProcessFactory;

  public constructor(
    private readonly logger: SupervisorLogger,
    processFactory?: ProcessFactory,
  ) {
    this.processFactory = processFactory ?? spawnDetached;
  }

  public launch(request: LaunchRequest): number {
    fs.mkdirSync(path.dirname(request.logFilePath), { recursive: true });
    const stdoutFd = fs.openSync(request.logFilePath, 'a');
    const stderrFd = fs.openSync(request.logFilePath, 'a');

    let child: DetachedChild;
    try {
      child = this.processFactory(request.command, request.args, {
        cwd: request.cwd,
        env: process.env,
        detached: true,
        stdio: [ 'ignore', stdoutFd, stderrFd ],
      });
    } finally {
      closeDescriptor(stdoutFd);
      closeDescriptor(stderrFd);
    }

    child.once('error', (error) => {
      this.logger.error(`Failed to spawn ${request.command}: ${error.message}`);
    });

    if (!child.pid) {
      throw new LaunchError(`Failed to launch ${request.command} ${request.args.join(' ')}`);
    }

    child.unref();
    return child.pid;
  }
}
