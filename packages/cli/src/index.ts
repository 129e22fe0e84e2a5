export { createProgram, exitCodeFor, runCli } from './program';
export { CliContext, createLogger } from './context';
export type { CliOptions, EngineFactory, GlobalOptions } from './context';
export { OutputRenderer, printTable } from './output';
