export * from './supervisor';
export { genChunksService, docChunkService } from './services';
export { runServiceCli, CommandContext } from './cli';
export type { CliRuntime, GlobalArgs } from './cli';
export { SupervisorLoggerFactory, createSupervisorLogger } from './logging/SupervisorLoggerFactory';
