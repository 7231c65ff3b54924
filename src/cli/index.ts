import yargs from 'yargs';
import type { ServiceDefinition } from '../supervisor/types';
import { createLogsCommand } from './commands/logs';
import { createRestartCommand } from './commands/restart';
import { createStartCommand } from './commands/start';
import { createStatusCommand } from './commands/status';
import { createStopCommand } from './commands/stop';
import { CommandContext, type CliRuntime } from './lib/context';

/**
 * Runs one `<bin> {start|stop|restart|status|logs}` invocation and resolves
 * with the exit code instead of exiting the process.
 */
export async function runServiceCli(
  service: ServiceDefinition,
  args: string[],
  runtime: CliRuntime = {},
): Promise<number> {
  const context = new CommandContext(service, runtime);

  await yargs(args)
    .scriptName(service.command)
    .usage(`$0 <command> [options]\n\n${service.description}`)
    .option('workdir', {
      alias: 'w',
      type: 'string',
      description: 'Directory holding the script, PID file and logs (default: $KB_WORKDIR or cwd)',
    })
    .option('env', {
      alias: 'e',
      type: 'string',
      description: 'Path to .env file',
    })
    .command(createStartCommand(context))
    .command(createStopCommand(context))
    .command(createRestartCommand(context))
    .command(createStatusCommand(context))
    .command(createLogsCommand(context))
    .demandCommand(1, 'Please specify a command')
    .strict()
    .exitProcess(false)
    .fail((message, error) => {
      context.fail(message || (error ? error.message : 'Invalid command'));
    })
    .help()
    .parseAsync();

  return context.getExitCode();
}

export { CommandContext } from './lib/context';
export type { CliRuntime, GlobalArgs } from './lib/context';
