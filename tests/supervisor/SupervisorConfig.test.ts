import path from 'node:path';
import { describe, it, expect } from 'vitest';
import { createSupervisorConfig, formatDateStamp } from '../../src/supervisor/SupervisorConfig';
import { ConfigError } from '../../src/supervisor/errors';
import { docChunkService, genChunksService } from '../../src/services';

const now = new Date(2024, 0, 5, 23, 59);

describe('formatDateStamp', () => {
  it('formats the local date as YYYYMMDD', () => {
    expect(formatDateStamp(now)).toBe('20240105');
    expect(formatDateStamp(new Date(2023, 11, 31))).toBe('20231231');
  });
});

describe('createSupervisorConfig', () => {
  it('derives every path from the working directory', () => {
    const workDir = path.resolve('/srv/kb');
    const config = createSupervisorConfig(genChunksService, { workDir, now }, {});

    expect(config.workDir).toBe(workDir);
    expect(config.scriptPath).toBe(path.join(workDir, 'app_gen_chunks.py'));
    expect(config.pidFilePath).toBe(path.join(workDir, 'app_gen_chunks.py.pid'));
    expect(config.logDir).toBe(path.join(workDir, 'logs'));
    expect(config.logFilePath).toBe(path.join(workDir, 'logs', 'app_gen_chunks.py_20240105.log'));
  });

  it('applies defaults when the environment is empty', () => {
    const config = createSupervisorConfig(docChunkService, { workDir: '/srv/kb', now }, {});

    expect(config.pidFilePath).toBe(path.resolve('/srv/kb/doc_chunk_service.pid'));
    expect(config.scriptPath).toBe(path.resolve('/srv/kb/Write_k_b_from_folder.py'));
    expect(config.interpreter).toBe('python3');
    expect(config.stopTimeoutMs).toBe(10_000);
    expect(config.stopPollIntervalMs).toBe(200);
    expect(config.escalateStop).toBe(true);
    expect(config.restartDelayMs).toBe(2_000);
    expect(config.statusTailLines).toBe(10);
  });

  it('reads settings from the environment, with the CLI override winning', () => {
    const env = {
      KB_WORKDIR: '/opt/from-env',
      KB_PYTHON: '/usr/local/bin/python3.11',
      KB_STOP_TIMEOUT_MS: '500',
      KB_STOP_POLL_MS: '50',
      KB_STOP_ESCALATE: 'no',
      KB_RESTART_DELAY_MS: '0',
    };

    const fromEnv = createSupervisorConfig(genChunksService, { now }, env);
    expect(fromEnv.workDir).toBe(path.resolve('/opt/from-env'));
    expect(fromEnv.interpreter).toBe('/usr/local/bin/python3.11');
    expect(fromEnv.stopTimeoutMs).toBe(500);
    expect(fromEnv.stopPollIntervalMs).toBe(50);
    expect(fromEnv.escalateStop).toBe(false);
    expect(fromEnv.restartDelayMs).toBe(0);

    const overridden = createSupervisorConfig(genChunksService, { workDir: '/opt/from-cli', now }, env);
    expect(overridden.workDir).toBe(path.resolve('/opt/from-cli'));
  });

  it('rejects malformed numbers and booleans', () => {
    expect(() => createSupervisorConfig(genChunksService, { now }, { KB_STOP_TIMEOUT_MS: 'soon' }))
      .toThrow(ConfigError);
    expect(() => createSupervisorConfig(genChunksService, { now }, { KB_RESTART_DELAY_MS: '-1' }))
      .toThrow('Invalid value for KB_RESTART_DELAY_MS: -1 (expected a non-negative integer)');
    expect(() => createSupervisorConfig(genChunksService, { now }, { KB_STOP_ESCALATE: 'maybe' }))
      .toThrow(ConfigError);
  });
});
