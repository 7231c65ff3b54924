import type { Argv, ArgumentsCamelCase, CommandModule } from 'yargs';
import { EXIT_OK } from '../../supervisor/errors';
import type { ServiceDefinition, StartOptions } from '../../supervisor/types';
import type { CommandContext, GlobalArgs } from '../lib/context';

/** Adds the service's argument option (e.g. `--doc-dir`) when it has one. */
export function withServiceArgument(yargs: Argv<GlobalArgs>, service: ServiceDefinition): Argv<GlobalArgs> {
  const { argument } = service;
  if (argument) {
    yargs.option(argument.option, {
      type: 'string',
      description: `${argument.label} (prompted for when omitted, default: ${argument.defaultValue})`,
    });
  }
  return yargs;
}

export function readStartOptions(argv: ArgumentsCamelCase<GlobalArgs>, service: ServiceDefinition): StartOptions {
  const { argument } = service;
  if (!argument) {
    return {};
  }
  const value = argv[argument.option];
  return typeof value === 'string' ? { argumentValue: value } : {};
}

export function createStartCommand(context: CommandContext): CommandModule<GlobalArgs, GlobalArgs> {
  const { service } = context;
  return {
    command: 'start',
    describe: `Start ${service.name} in the background`,
    builder: (yargs) => withServiceArgument(yargs, service),
    handler: async (argv) => {
      await context.run(argv, async (supervisor) => {
        await supervisor.start(readStartOptions(argv, service));
        return EXIT_OK;
      });
    },
  };
}
