/**
 * An argument the wrapped script takes, asked for interactively on `start`
 * unless it is passed on the command line.
 */
export interface ServiceArgument {
  /** Flag handed to the script, e.g. `--doc_dir`. */
  flag: string;
  /** CLI option that supplies the value without prompting, e.g. `doc-dir`. */
  option: string;
  prompt: string;
  label: string;
  defaultValue: string;
}

export interface ServiceDefinition {
  /** Used for the PID file and log file names. */
  name: string;
  /** Script path relative to the working directory. */
  script: string;
  /** Executable name of the CLI that manages this service. */
  command: string;
  description: string;
  argument?: ServiceArgument;
}

export interface SupervisorConfig {
  service: ServiceDefinition;
  workDir: string;
  scriptPath: string;
  pidFilePath: string;
  logDir: string;
  logFilePath: string;
  interpreter: string;
  stopTimeoutMs: number;
  stopPollIntervalMs: number;
  escalateStop: boolean;
  restartDelayMs: number;
  statusTailLines: number;
}

export interface ServiceRecord {
  serviceName: string;
  scriptPath: string;
  pidFilePath: string;
  logFilePath: string;
  runningPid?: number;
}

export type ServiceStatus =
  | { state: 'running'; record: ServiceRecord; recentLines: string[] }
  | { state: 'stale'; pidFilePath: string; pid?: number }
  | { state: 'stopped'; pidFilePath: string };

export type StopOutcome = 'terminated' | 'killed' | 'unconfirmed' | 'signal-failed';

export interface StopResult {
  pid: number;
  outcome: StopOutcome;
}

export interface StartOptions {
  argumentValue?: string;
}

export interface ProcessProbe {
  isAlive(pid: number): boolean;
}

export interface SupervisorLogger {
  info(message: string): unknown;
  warn(message: string): unknown;
  error(message: string): unknown;
  debug(message: string): unknown;
}

export interface OutputStream {
  write(chunk: string): unknown;
}
