import fs from 'node:fs';
import path from 'node:path';
import { InvalidPidFileError } from './errors';

/**
 * The PID file is the only record that a service was started.
 * Its presence says nothing about whether the process is still alive.
 */
export class PidFile {
  public constructor(public readonly filePath: string) {}

  public exists(): boolean {
    return fs.existsSync(this.filePath);
  }

  public readRaw(): string {
    return fs.readFileSync(this.filePath, 'utf-8').trim();
  }

  public read(): number {
    const text = this.readRaw();
    const pid = /^\d+$/u.test(text) ? Number(text) : Number.NaN;
    if (!Number.isSafeInteger(pid) || pid <= 0) {
      throw new InvalidPidFileError(this.filePath, text);
    }
    return pid;
  }

  public write(pid: number): void {
    fs.mkdirSync(path.dirname(this.filePath), { recursive: true });
    fs.writeFileSync(this.filePath, `${pid}\n`, 'utf-8');
  }

  public remove(): void {
    fs.rmSync(this.filePath, { force: true });
  }
}
