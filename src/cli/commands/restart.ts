import type { CommandModule } from 'yargs';
import { EXIT_OK } from '../../supervisor/errors';
import type { CommandContext, GlobalArgs } from '../lib/context';
import { readStartOptions, withServiceArgument } from './start';

export function createRestartCommand(context: CommandContext): CommandModule<GlobalArgs, GlobalArgs> {
  const { service } = context;
  return {
    command: 'restart',
    describe: `Stop ${service.name}, wait, then start it again`,
    builder: (yargs) => withServiceArgument(yargs, service),
    handler: async (argv) => {
      await context.run(argv, async (supervisor) => {
        await supervisor.restart(readStartOptions(argv, service));
        return EXIT_OK;
      });
    },
  };
}
