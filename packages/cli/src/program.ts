import { Command, CommanderError } from 'commander';
import { ConfigError, UsageError } from '@repoindex/shared';
import pkg from '../package.json';
import { CliContext, type CliOptions, type GlobalOptions } from './context';
import { OutputRenderer } from './output';
import { registerIndexCommand } from './commands/index';
import { registerStatusCommand } from './commands/status';
import { registerSearchCommand } from './commands/search';
import { registerChunksCommand } from './commands/chunks';
import { registerGraphCommand } from './commands/graph';
import { registerModelsCommand } from './commands/models';
import { registerStructureCommand } from './commands/structure';
import { registerRepairCommand } from './commands/repair';
import { registerReposCommand } from './commands/repos';
import { registerDeleteCommand } from './commands/delete';

export function createProgram(options: CliOptions = {}): { program: Command; ctx: CliContext } {
  const program = new Command();
  const ctx = new CliContext(() => program.opts<GlobalOptions>(), options);

  program
    .name('repoindex')
    .description('Incremental, syntax-aware repository indexing')
    .version(pkg.version)
    .option('--json', 'Output results as JSON')
    .option('--config <path>', 'Path to configuration file')
    .option('--verbose', 'Enable verbose logging')
    .option('--yes', 'Automatically answer "yes" to all prompts')
    .option('--non-interactive', 'Disable interactive prompts (fail if prompt needed)')
    .exitOverride();

  registerIndexCommand(program, ctx);
  registerStatusCommand(program, ctx);
  registerSearchCommand(program, ctx);
  registerChunksCommand(program, ctx);
  registerGraphCommand(program, ctx);
  registerModelsCommand(program, ctx);
  registerStructureCommand(program, ctx);
  registerRepairCommand(program, ctx);
  registerReposCommand(program, ctx);
  registerDeleteCommand(program, ctx);

  return { program, ctx };
}

/** 2 for errors the user can correct, 1 for everything else. */
export function exitCodeFor(error: unknown): number {
  if (error instanceof ConfigError || error instanceof UsageError) return 2;
  if (error instanceof CommanderError) return error.exitCode === 0 ? 0 : 2;
  return 1;
}

/**
 * Parses `argv` (including the node and script entries) and runs the
 * command. Resolves to the process exit code.
 */
export async function runCli(argv: string[], options: CliOptions = {}): Promise<number> {
  const { program, ctx } = createProgram(options);
  try {
    await program.parseAsync(argv);
    return ctx.exitCode;
  } catch (error) {
    // commander already printed its own usage errors
    if (!(error instanceof CommanderError)) {
      const opts = program.opts<GlobalOptions>();
      new OutputRenderer(Boolean(opts.json)).error(error, Boolean(opts.verbose));
    }
    return exitCodeFor(error);
  }
}
