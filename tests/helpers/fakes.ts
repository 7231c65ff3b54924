import os from 'node:os';
import path from 'node:path';
import { promises as fs } from 'node:fs';
import type { SpawnOptions } from 'node:child_process';
import { vi } from 'vitest';
import type { DetachedChild } from '../../src/supervisor/ProcessLauncher';
import type { ProcessProbe } from '../../src/supervisor/types';

export function createTestLogger() {
  return {
    info: vi.fn(),
    warn: vi.fn(),
    error: vi.fn(),
    debug: vi.fn(),
  };
}

export class OutputCollector {
  public readonly chunks: string[] = [];

  public write(chunk: string): boolean {
    this.chunks.push(chunk);
    return true;
  }

  public get text(): string {
    return this.chunks.join('');
  }
}

export class FakeProbe implements ProcessProbe {
  public readonly alive = new Set<number>();

  public isAlive(pid: number): boolean {
    return this.alive.has(pid);
  }
}

export function createFakeSpawn(pid?: number) {
  return vi.fn((_command: string, _args: string[], _options: SpawnOptions): DetachedChild => ({
    pid,
    unref: vi.fn(),
    once: vi.fn(),
  }));
}

export async function makeTempDir(prefix: string): Promise<string> {
  return fs.mkdtemp(path.join(os.tmpdir(), prefix));
}
