import fs from 'node:fs';
import {
  AlreadyRunningError,
  InvalidPidFileError,
  LogFileMissingError,
  NotRunningError,
} from './errors';
import { createInterpreterResolver, type InterpreterResolver } from './InterpreterResolver';
import { followLogFile, readLastLines } from './LogTail';
import { PidFile } from './PidFile';
import { ProcessLauncher, type ProcessFactory } from './ProcessLauncher';
import { SignalProcessProbe } from './ProcessProbe';
import { ProcessTerminator, type SignalSender } from './ProcessTerminator';
import { createArgumentPrompt, type ArgumentPrompt } from './prompt';
import type {
  OutputStream,
  ProcessProbe,
  ServiceRecord,
  ServiceStatus,
  StartOptions,
  StopResult,
  SupervisorConfig,
  SupervisorLogger,
} from './types';

export interface SupervisorDeps {
  logger: SupervisorLogger;
  output?: OutputStream;
  probe?: ProcessProbe;
  processFactory?: ProcessFactory;
  sendSignal?: SignalSender;
  resolveInterpreter?: InterpreterResolver;
  prompt?: ArgumentPrompt;
  sleep?: (ms: number) => Promise<void>;
}

const defaultSleep = (ms: number): Promise<void> =>
  new Promise((resolve) => {
    setTimeout(resolve, ms);
  });

/**
 * Lifecycle of one background service, tracked through its PID file.
 */
export class ServiceSupervisor {
  private readonly logger: SupervisorLogger;
  private readonly output: OutputStream;
  private readonly probe: ProcessProbe;
  private readonly launcher: ProcessLauncher;
  private readonly terminator: ProcessTerminator;
  private readonly resolveInterpreter: InterpreterResolver;
  private readonly prompt: ArgumentPrompt;
  private readonly sleep: (ms: number) => Promise<void>;
  private readonly pidFile: PidFile;

  public constructor(
    public readonly config: SupervisorConfig,
    deps: SupervisorDeps,
  ) {
    this.logger = deps.logger;
    this.output = deps.output ?? process.stdout;
    this.probe = deps.probe ?? new SignalProcessProbe();
    this.launcher = new ProcessLauncher(this.logger, deps.processFactory);
    this.terminator = new ProcessTerminator(this.probe, this.logger, {
      timeoutMs: config.stopTimeoutMs,
      pollIntervalMs: config.stopPollIntervalMs,
      escalate: config.escalateStop,
    }, deps.sendSignal);
    this.resolveInterpreter = deps.resolveInterpreter ?? createInterpreterResolver();
    this.prompt = deps.prompt ?? createArgumentPrompt();
    this.sleep = deps.sleep ?? defaultSleep;
    this.pidFile = new PidFile(config.pidFilePath);
  }

  private get serviceName(): string {
    return this.config.service.name;
  }

  public async start(options: StartOptions = {}): Promise<ServiceRecord> {
    if (this.pidFile.exists()) {
      throw new AlreadyRunningError(this.serviceName, this.pidFile.readRaw());
    }

    const { argument } = this.config.service;
    const args = [ this.config.scriptPath ];
    let argumentValue: string | undefined;
    if (argument) {
      const supplied = options.argumentValue ?? await this.prompt(argument);
      argumentValue = supplied.trim() || argument.defaultValue;
      args.push(argument.flag, argumentValue);
    }

    const interpreter = this.resolveInterpreter(this.config.interpreter);

    this.logger.info(`Starting ${this.serviceName}...`);
    this.logger.info(`Using interpreter: ${interpreter}`);
    fs.mkdirSync(this.config.logDir, { recursive: true });

    const pid = this.launcher.launch({
      command: interpreter,
      args,
      cwd: this.config.workDir,
      logFilePath: this.config.logFilePath,
    });
    this.pidFile.write(pid);

    this.logger.info(`Service started (PID: ${pid})`);
    if (argument && argumentValue !== undefined) {
      this.logger.info(`${argument.label}: ${argumentValue}`);
    }
    this.logger.info(`Log file: ${this.config.logFilePath}`);

    return this.toRecord(pid);
  }

  public async stop(): Promise<StopResult> {
    if (!this.pidFile.exists()) {
      throw new NotRunningError(this.serviceName);
    }

    let pid: number;
    try {
      pid = this.pidFile.read();
    } catch (error: unknown) {
      if (error instanceof InvalidPidFileError) {
        this.pidFile.remove();
      }
      throw error;
    }

    this.logger.info(`Stopping ${this.serviceName} (PID: ${pid})...`);
    let result: StopResult;
    try {
      result = { pid, outcome: await this.terminator.terminate(pid) };
    } finally {
      this.pidFile.remove();
    }

    switch (result.outcome) {
      case 'terminated':
        this.logger.info('Service stopped');
        break;
      case 'killed':
        this.logger.warn('Service did not stop on SIGTERM and was killed');
        break;
      case 'unconfirmed':
        this.logger.warn(`Service may still be running (PID: ${pid}); PID file removed`);
        break;
      case 'signal-failed':
        this.logger.warn(`Could not signal PID ${pid}; PID file removed`);
        break;
    }
    return result;
  }

  public async restart(options: StartOptions = {}): Promise<ServiceRecord> {
    try {
      await this.stop();
    } catch (error: unknown) {
      // both leave no PID file behind
      if (!(error instanceof NotRunningError || error instanceof InvalidPidFileError)) {
        throw error;
      }
      this.logger.warn(error.message);
    }
    await this.sleep(this.config.restartDelayMs);
    return this.start(options);
  }

  public async status(): Promise<ServiceStatus> {
    const { pidFilePath } = this.config;
    if (!this.pidFile.exists()) {
      return { state: 'stopped', pidFilePath };
    }

    let pid: number;
    try {
      pid = this.pidFile.read();
    } catch (error: unknown) {
      if (error instanceof InvalidPidFileError) {
        return { state: 'stale', pidFilePath };
      }
      throw error;
    }

    if (!this.probe.isAlive(pid)) {
      return { state: 'stale', pidFilePath, pid };
    }

    return {
      state: 'running',
      record: this.toRecord(pid),
      recentLines: await readLastLines(this.config.logFilePath, this.config.statusTailLines),
    };
  }

  /**
   * Blocks until the signal aborts.
   */
  public async logs(signal?: AbortSignal): Promise<void> {
    const { logFilePath } = this.config;
    if (!fs.existsSync(logFilePath)) {
      throw new LogFileMissingError(logFilePath);
    }
    this.logger.info(`Following ${logFilePath}. Press Ctrl+C to stop.`);
    await followLogFile(logFilePath, this.output, {
      initialLines: this.config.statusTailLines,
      signal,
    });
  }

  private toRecord(runningPid?: number): ServiceRecord {
    return {
      serviceName: this.serviceName,
      scriptPath: this.config.scriptPath,
      pidFilePath: this.config.pidFilePath,
      logFilePath: this.config.logFilePath,
      runningPid,
    };
  }
}
