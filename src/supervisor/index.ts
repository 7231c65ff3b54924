export { ServiceSupervisor } from './ServiceSupervisor';
export type { SupervisorDeps } from './ServiceSupervisor';
export { createSupervisorConfig, formatDateStamp } from './SupervisorConfig';
export { PidFile } from './PidFile';
export { SignalProcessProbe } from './ProcessProbe';
export { ProcessLauncher } from './ProcessLauncher';
export { ProcessTerminator, treeKillSignal } from './ProcessTerminator';
export { createInterpreterResolver } from './InterpreterResolver';
export { readLastLines, followLogFile } from './LogTail';
export { createArgumentPrompt } from './prompt';
export * from './errors';
export type * from './types';
