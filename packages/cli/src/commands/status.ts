import { Command } from 'commander';
import type { TaskStatusView } from '@repoindex/core';
import type { CliContext } from '../context';
import { printTable } from '../output';

export function statusRows(status: TaskStatusView): { key: string; value: string | number }[] {
  const rows: { key: string; value: string | number }[] = [
    { key: 'Task', value: status.taskId },
    { key: 'Repository', value: status.repoId },
    { key: 'Type', value: status.type },
    { key: 'Status', value: status.status },
    { key: 'Progress', value: `${status.progressPct}%` },
    { key: 'Stage', value: status.currentStage ?? '-' },
    { key: 'Files', value: `${status.filesProcessed}/${status.filesTotal}` },
  ];
  if (status.failedAtStage) rows.push({ key: 'Failed at', value: status.failedAtStage });
  if (status.errorMessage) rows.push({ key: 'Error', value: status.errorMessage });
  return rows;
}

export function registerStatusCommand(program: Command, ctx: CliContext) {
  program
    .command('status <taskId>')
    .description('Show the status of an indexing task')
    .action(async (taskId: string) => {
      const status = await ctx.withEngine(async (engine) => engine.getStatus(taskId));
      ctx.renderer().render(status, () =>
        printTable(statusRows(status), { head: ['Field', 'Value'], colAligns: ['right', 'left'] }),
      );
    });
}
