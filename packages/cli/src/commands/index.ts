import { Command } from 'commander';
import pc from 'picocolors';
import { UsageError } from '@repoindex/shared';
import type { ProgressEvent, TaskStatusView } from '@repoindex/core';
import type { CliContext } from '../context';

interface IndexOptions {
  full?: boolean;
  branch?: string;
  tokenEnv?: string;
}

export function formatProgress(event: ProgressEvent): string {
  const pct = pc.cyan(`[${String(event.progressPct).padStart(3)}%]`);
  const stage = event.currentStage ? ` ${event.currentStage}` : '';
  const files =
    event.filesTotal > 0 ? pc.gray(` (${event.filesProcessed}/${event.filesTotal} files)`) : '';
  return `${pct} ${event.status}${stage}${files}`;
}

function describeOutcome(status: TaskStatusView): string {
  switch (status.status) {
    case 'completed':
      return pc.green(`Task ${status.taskId} completed.`);
    case 'failed':
      return pc.red(
        `Task ${status.taskId} failed at ${status.failedAtStage ?? 'an unknown stage'}: ${status.errorMessage ?? 'no message'}`,
      );
    default:
      return pc.yellow(`Task ${status.taskId} ${status.status}.`);
  }
}

export function registerIndexCommand(program: Command, ctx: CliContext) {
  program
    .command('index <ref>')
    .description('Index a repository URL or local path, incrementally unless --full')
    .option('--full', 'Re-embed every file', false)
    .option('--branch <name>', 'Branch to clone or sync')
    .option('--token-env <var>', 'Environment variable holding a clone token')
    .action(async (ref: string, options: IndexOptions) => {
      let token: string | undefined;
      if (options.tokenEnv) {
        token = ctx.env[options.tokenEnv];
        if (!token) {
          throw new UsageError(`Environment variable ${options.tokenEnv} is not set`);
        }
      }

      const renderer = ctx.renderer();
      const status = await ctx.withEngine(async (engine) => {
        const taskId = await engine.submit(
          { url: ref, branch: options.branch, token },
          Boolean(options.full),
        );

        const onInterrupt = () => {
          engine.cancel(taskId).catch((error: unknown) => renderer.error(error));
        };
        process.once('SIGINT', onInterrupt);
        try {
          if (!renderer.isJson) {
            for await (const event of engine.streamProgress(taskId)) {
              if (event.kind !== 'keep-alive') console.log(formatProgress(event));
            }
          }
          return await engine.waitForTask(taskId);
        } finally {
          process.off('SIGINT', onInterrupt);
        }
      });

      renderer.render(status, () => console.log(describeOutcome(status)));
      if (status.status !== 'completed') ctx.exitCode = 1;
    });
}
