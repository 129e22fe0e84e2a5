import { Command } from 'commander';
import type { CliContext } from '../context';
import { printTable } from '../output';

export function registerReposCommand(program: Command, ctx: CliContext) {
  program
    .command('repos')
    .description('List known repositories')
    .action(async () => {
      const repos = await ctx.withEngine(async (engine) => engine.listRepositories());

      ctx.renderer().render(repos, () => {
        if (repos.length === 0) {
          console.log('No repositories indexed.');
          return;
        }
        printTable(
          repos.map((r) => ({
            id: r.id,
            name: r.name,
            status: r.status,
            branch: r.defaultBranch,
            lastSyncedAt: r.lastSyncedAt ?? '-',
          })),
          { head: ['ID', 'Name', 'Status', 'Branch', 'Last synced'] },
        );
      });
    });
}
