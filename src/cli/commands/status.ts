import type { CommandModule } from 'yargs';
import { EXIT_NOT_RUNNING, EXIT_OK, EXIT_STALE_PID } from '../../supervisor/errors';
import type { ServiceStatus } from '../../supervisor/types';
import type { CommandContext, GlobalArgs } from '../lib/context';

interface StatusArgs extends GlobalArgs {
  json: boolean;
}

const EXIT_CODES: Record<ServiceStatus['state'], number> = {
  running: EXIT_OK,
  stale: EXIT_STALE_PID,
  stopped: EXIT_NOT_RUNNING,
};

export function createStatusCommand(context: CommandContext): CommandModule<GlobalArgs, StatusArgs> {
  const name = context.service.name;
  return {
    command: 'status',
    describe: `Show whether ${name} is running`,
    builder: (yargs) =>
      yargs.option('json', {
        type: 'boolean',
        description: 'Output as JSON',
        default: false,
      }),
    handler: async (argv) => {
      await context.run(argv, async (supervisor, logger) => {
        const status = await supervisor.status();

        if (argv.json) {
          context.output.write(`${JSON.stringify(status, null, 2)}\n`);
          return EXIT_CODES[status.state];
        }

        switch (status.state) {
          case 'running':
            logger.info(`${name} is running (PID: ${status.record.runningPid})`);
            logger.info(`Log file: ${status.record.logFilePath}`);
            for (const line of status.recentLines) {
              context.output.write(`${line}\n`);
            }
            break;
          case 'stale':
            logger.warn(status.pid === undefined ?
              `${name} PID file ${status.pidFilePath} is unreadable` :
              `${name} PID file exists but process ${status.pid} does not`);
            break;
          case 'stopped':
            logger.info(`${name} is not running`);
            break;
        }
        return EXIT_CODES[status.state];
      });
    },
  };
}
