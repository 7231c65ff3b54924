import kill from 'tree-kill';
import { describeError } from './errors';
import type { ProcessProbe, StopOutcome, SupervisorLogger } from './types';

export type SignalSender = (pid: number, signal: NodeJS.Signals) => Promise<void>;

export const treeKillSignal: SignalSender = (pid, signal) =>
  new Promise((resolve, reject) => {
    kill(pid, signal, (error) => {
      if (error) {
        reject(error);
        return;
      }
      resolve();
    });
  });

export interface TerminatorOptions {
  timeoutMs: number;
  pollIntervalMs: number;
  escalate: boolean;
}

const sleep = (ms: number): Promise<void> =>
  new Promise((resolve) => {
    setTimeout(resolve, ms);
  });

/**
 * SIGTERM, wait for the process to go away, then SIGKILL if it is still there.
 * The caller decides what to do with an `unconfirmed` result.
 */
export class ProcessTerminator {
  public constructor(
    private readonly probe: ProcessProbe,
    private readonly logger: SupervisorLogger,
    private readonly options: TerminatorOptions,
    private readonly sendSignal: SignalSender = treeKillSignal,
  ) {}

  public async terminate(pid: number): Promise<StopOutcome> {
    try {
      await this.sendSignal(pid, 'SIGTERM');
    } catch (error: unknown) {
      this.logger.warn(`Failed to send SIGTERM to PID ${pid}: ${describeError(error)}`);
      return 'signal-failed';
    }

    if (await this.waitForExit(pid)) {
      return 'terminated';
    }

    if (!this.options.escalate) {
      this.logger.warn(`PID ${pid} still alive after ${this.options.timeoutMs}ms`);
      return 'unconfirmed';
    }

    this.logger.warn(`PID ${pid} did not exit within ${this.options.timeoutMs}ms, sending SIGKILL`);
    try {
      await this.sendSignal(pid, 'SIGKILL');
    } catch (error: unknown) {
      // 进程可能在两次检查之间已经退出
      if (!this.probe.isAlive(pid)) {
        return 'terminated';
      }
      this.logger.warn(`Failed to send SIGKILL to PID ${pid}: ${describeError(error)}`);
      return 'unconfirmed';
    }

    return await this.waitForExit(pid) ? 'killed' : 'unconfirmed';
  }

  private async waitForExit(pid: number): Promise<boolean> {
    const deadline = Date.now() + this.options.timeoutMs;
    while (this.probe.isAlive(pid)) {
      if (Date.now() >= deadline) {
        return false;
      }
      await sleep(this.options.pollIntervalMs);
    }
    return true;
  }
}
