export const EXIT_OK = 0;
export const EXIT_FAILURE = 1;
export const EXIT_STALE_PID = 2;
export const EXIT_NOT_RUNNING = 3;

export class SupervisorError extends Error {
  public readonly exitCode: number;

  public constructor(message: string, exitCode: number = EXIT_FAILURE) {
    super(message);
    this.name = new.target.name;
    this.exitCode = exitCode;
  }
}

export class AlreadyRunningError extends SupervisorError {
  public constructor(serviceName: string, pidText: string) {
    super(`${serviceName} is already running (PID: ${pidText})`);
  }
}

export class NotRunningError extends SupervisorError {
  public constructor(serviceName: string) {
    super(`${serviceName} is not running`);
  }
}

export class InvalidPidFileError extends SupervisorError {
  public constructor(pidFilePath: string, content: string) {
    super(`PID file ${pidFilePath} contains invalid data: ${JSON.stringify(content)}`);
  }
}

export class InterpreterNotFoundError extends SupervisorError {
  public constructor(interpreter: string) {
    super(`Interpreter not found: ${interpreter}`);
  }
}

export class LaunchError extends SupervisorError {}

export class LogFileMissingError extends SupervisorError {
  public constructor(logFilePath: string) {
    super(`Log file does not exist: ${logFilePath}`);
  }
}

export class ConfigError extends SupervisorError {}

export function describeError(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
