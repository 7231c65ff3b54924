import { createSupervisorLogger } from '../../logging/SupervisorLoggerFactory';
import { ServiceSupervisor, type SupervisorDeps } from '../../supervisor/ServiceSupervisor';
import { createSupervisorConfig } from '../../supervisor/SupervisorConfig';
import { EXIT_FAILURE, EXIT_OK, SupervisorError, describeError } from '../../supervisor/errors';
import type { OutputStream, ServiceDefinition, SupervisorLogger } from '../../supervisor/types';
import { loadEnvFile } from './env-file';

export interface GlobalArgs {
  workdir?: string;
  env?: string;
}

export interface CliRuntime {
  env?: NodeJS.ProcessEnv;
  logger?: SupervisorLogger;
  output?: OutputStream;
  now?: Date;
  deps?: Omit<SupervisorDeps, 'logger' | 'output'>;
}

export type SupervisorAction = (supervisor: ServiceSupervisor, logger: SupervisorLogger) => Promise<number>;

/**
 * State shared by the commands of one CLI invocation. Every command goes
 * through `run`, which turns errors into exit codes.
 */
export class CommandContext {
  private exitCode = EXIT_OK;

  public constructor(
    public readonly service: ServiceDefinition,
    private readonly runtime: CliRuntime = {},
  ) {}

  public get output(): OutputStream {
    return this.runtime.output ?? process.stdout;
  }

  public getExitCode(): number {
    return this.exitCode;
  }

  public fail(message: string): void {
    this.createLogger(this.runtime.env ?? process.env).error(message);
    this.exitCode = EXIT_FAILURE;
  }

  public async run(argv: GlobalArgs, action: SupervisorAction): Promise<void> {
    const env = this.runtime.env ?? process.env;
    let envError: unknown;
    try {
      loadEnvFile(env, argv.env, argv.workdir ?? env.KB_WORKDIR);
    } catch (error: unknown) {
      envError = error;
    }

    const logger = this.createLogger(env);
    try {
      if (envError) {
        throw envError;
      }
      const config = createSupervisorConfig(this.service, { workDir: argv.workdir, now: this.runtime.now }, env);
      const supervisor = new ServiceSupervisor(config, {
        ...this.runtime.deps,
        logger,
        output: this.output,
      });
      this.exitCode = await action(supervisor, logger);
    } catch (error: unknown) {
      if (error instanceof SupervisorError) {
        logger.error(error.message);
        this.exitCode = error.exitCode;
        return;
      }
      logger.error(`Unexpected error: ${describeError(error)}`);
      if (error instanceof Error && error.stack) {
        logger.debug(error.stack);
      }
      this.exitCode = EXIT_FAILURE;
    }
  }

  private createLogger(env: NodeJS.ProcessEnv): SupervisorLogger {
    return this.runtime.logger ?? createSupervisorLogger(this.service.name, env);
  }
}
