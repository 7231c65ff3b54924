import path from 'node:path';
import { ConfigError } from './errors';
import type { ServiceDefinition, SupervisorConfig } from './types';

export const LOG_DIR_NAME = 'logs';
export const DEFAULT_INTERPRETER = 'python3';
export const DEFAULT_STOP_TIMEOUT_MS = 10_000;
export const DEFAULT_STOP_POLL_MS = 200;
export const DEFAULT_RESTART_DELAY_MS = 2_000;
export const STATUS_TAIL_LINES = 10;

export interface ConfigOverrides {
  workDir?: string;
  now?: Date;
}

/** `YYYYMMDD` in local time. */
export function formatDateStamp(date: Date): string {
  const year = date.getFullYear();
  const month = String(date.getMonth() + 1).padStart(2, '0');
  const day = String(date.getDate()).padStart(2, '0');
  return `${year}${month}${day}`;
}

function readNumber(env: NodeJS.ProcessEnv, key: string, fallback: number): number {
  const raw = env[key];
  if (raw === undefined || raw.trim() === '') {
    return fallback;
  }
  const value = Number(raw);
  if (!Number.isInteger(value) || value < 0) {
    throw new ConfigError(`Invalid value for ${key}: ${raw} (expected a non-negative integer)`);
  }
  return value;
}

function readBoolean(env: NodeJS.ProcessEnv, key: string, fallback: boolean): boolean {
  const raw = env[key]?.trim().toLowerCase();
  if (!raw) {
    return fallback;
  }
  if ([ 'true', '1', 'yes', 'on' ].includes(raw)) {
    return true;
  }
  if ([ 'false', '0', 'no', 'off' ].includes(raw)) {
    return false;
  }
  throw new ConfigError(`Invalid value for ${key}: ${env[key]} (expected true or false)`);
}

/**
 * Resolves every path and setting one invocation needs. CLI overrides win over
 * the environment, which wins over the defaults.
 */
export function createSupervisorConfig(
  service: ServiceDefinition,
  overrides: ConfigOverrides = {},
  env: NodeJS.ProcessEnv = process.env,
): SupervisorConfig {
  const workDir = path.resolve(overrides.workDir ?? env.KB_WORKDIR ?? process.cwd());
  const logDir = path.join(workDir, LOG_DIR_NAME);
  const stamp = formatDateStamp(overrides.now ?? new Date());

  return {
    service,
    workDir,
    scriptPath: path.join(workDir, service.script),
    pidFilePath: path.join(workDir, `${service.name}.pid`),
    logDir,
    logFilePath: path.join(logDir, `${service.name}_${stamp}.log`),
    interpreter: env.KB_PYTHON?.trim() || DEFAULT_INTERPRETER,
    stopTimeoutMs: readNumber(env, 'KB_STOP_TIMEOUT_MS', DEFAULT_STOP_TIMEOUT_MS),
    stopPollIntervalMs: readNumber(env, 'KB_STOP_POLL_MS', DEFAULT_STOP_POLL_MS),
    escalateStop: readBoolean(env, 'KB_STOP_ESCALATE', true),
    restartDelayMs: readNumber(env, 'KB_RESTART_DELAY_MS', DEFAULT_RESTART_DELAY_MS),
    statusTailLines: STATUS_TAIL_LINES,
  };
}
