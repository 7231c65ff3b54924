import path from 'node:path';
import { spawn, type SpawnOptions } from 'node:child_process';
import { once } from 'node:events';
import { promises as fs } from 'node:fs';
import { describe, it, expect, vi, beforeEach, afterEach } from 'vitest';
import { ProcessLauncher, type DetachedChild } from '../../src/supervisor/ProcessLauncher';
import { SignalProcessProbe } from '../../src/supervisor/ProcessProbe';
import { LaunchError } from '../../src/supervisor/errors';
import { createFakeSpawn, createTestLogger, makeTempDir } from '../helpers/fakes';

describe('ProcessLauncher', () => {
  let tmpDir: string;
  let logFilePath: string;

  beforeEach(async () => {
    tmpDir = await makeTempDir('launcher-test-');
    logFilePath = path.join(tmpDir, 'logs', 'child_20240105.log');
  });

  afterEach(async () => {
    await fs.rm(tmpDir, { recursive: true, force: true });
  });

  it('appends stdout and stderr of a detached child to the log file', async () => {
    await fs.mkdir(path.dirname(logFilePath));
    await fs.writeFile(logFilePath, 'previous run\n');
    const launcher = new ProcessLauncher(createTestLogger());

    const pid = launcher.launch({
      command: process.execPath,
      args: [ '-e', 'console.log("hello from child"); console.error("warning from child");' ],
      cwd: tmpDir,
      logFilePath,
    });

    expect(pid).toBeGreaterThan(0);
    await vi.waitFor(async () => {
      const content = await fs.readFile(logFilePath, 'utf-8');
      expect(content.startsWith('previous run\n')).toBe(true);
      expect(content).toContain('hello from child\n');
      expect(content).toContain('warning from child\n');
    }, { timeout: 5_000 });
  });

  it('creates the log directory and spawns with the working directory', () => {
    const child = { pid: 31337, unref: vi.fn(), once: vi.fn() };
    const spawnStub = vi.fn((_command: string, _args: string[], _options: SpawnOptions): DetachedChild => child);
    const launcher = new ProcessLauncher(createTestLogger(), spawnStub);

    const pid = launcher.launch({ command: 'python3', args: [ 'job.py' ], cwd: tmpDir, logFilePath });

    expect(pid).toBe(31337);
    const [ command, args, options ] = spawnStub.mock.calls[0];
    expect(command).toBe('python3');
    expect(args).toEqual([ 'job.py' ]);
    expect(options.cwd).toBe(tmpDir);
    expect(options.detached).toBe(true);
    expect(child.unref).toHaveBeenCalledTimes(1);
    expect(child.once).toHaveBeenCalledWith('error', expect.any(Function));
  });

  it('throws when the child gets no pid', () => {
    const launcher = new ProcessLauncher(createTestLogger(), createFakeSpawn());

    expect(() => launcher.launch({ command: 'python3', args: [ 'job.py' ], cwd: tmpDir, logFilePath }))
      .toThrow('Failed to launch python3 job.py');
    expect(() => launcher.launch({ command: 'python3', args: [ 'job.py' ], cwd: tmpDir, logFilePath }))
      .toThrow(LaunchError);
  });
});

describe('SignalProcessProbe', () => {
  const probe = new SignalProcessProbe();

  it('sees the current process as alive', () => {
    expect(probe.isAlive(process.pid)).toBe(true);
  });

  it('sees an exited child as gone', async () => {
    const child = spawn(process.execPath, [ '-e', '' ], { stdio: 'ignore' });
    const { pid } = child;
    if (pid === undefined) {
      throw new Error('child did not start');
    }
    await once(child, 'exit');

    expect(probe.isAlive(pid)).toBe(false);
  });
});
