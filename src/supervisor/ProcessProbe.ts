import type { ProcessProbe } from './types';

/**
 * Liveness via signal 0: nothing is delivered, the kernel only checks that the
 * process exists. EPERM means it exists but belongs to someone else.
 */
export class SignalProcessProbe implements ProcessProbe {
  public isAlive(pid: number): boolean {
    try {
      process.kill(pid, 0);
      return true;
    } catch (error: unknown) {
      return isErrnoException(error) && error.code === 'EPERM';
    }
  }
}

function isErrnoException(error: unknown): error is NodeJS.ErrnoException {
  return error instanceof Error && 'code' in error;
}
