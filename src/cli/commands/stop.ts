import type { CommandModule } from 'yargs';
import { EXIT_OK } from '../../supervisor/errors';
import type { CommandContext, GlobalArgs } from '../lib/context';

export function createStopCommand(context: CommandContext): CommandModule<GlobalArgs, GlobalArgs> {
  return {
    command: 'stop',
    describe: `Stop ${context.service.name}`,
    builder: (yargs) => yargs,
    handler: async (argv) => {
      await context.run(argv, async (supervisor) => {
        await supervisor.stop();
        return EXIT_OK;
      });
    },
  };
}
