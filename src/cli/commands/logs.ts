import type { CommandModule } from 'yargs';
import { EXIT_OK } from '../../supervisor/errors';
import type { CommandContext, GlobalArgs } from '../lib/context';

export function createLogsCommand(context: CommandContext): CommandModule<GlobalArgs, GlobalArgs> {
  return {
    command: 'logs',
    describe: `Follow today's log of ${context.service.name}`,
    builder: (yargs) => yargs,
    handler: async (argv) => {
      await context.run(argv, async (supervisor) => {
        const controller = new AbortController();
        const stop = (): void => controller.abort();
        process.once('SIGINT', stop);
        process.once('SIGTERM', stop);
        try {
          await supervisor.logs(controller.signal);
        } finally {
          process.off('SIGINT', stop);
          process.off('SIGTERM', stop);
        }
        return EXIT_OK;
      });
    },
  };
}
