import { Command } from 'commander';
import pc from 'picocolors';
import type { CliContext } from '../context';
import { confirm } from '../utils/confirm';

export function registerDeleteCommand(program: Command, ctx: CliContext) {
  program
    .command('delete <ref>')
    .description('Delete a repository with its tasks, checkpoints, vectors and clone')
    .action(async (ref: string) => {
      const renderer = ctx.renderer();
      const { yes, nonInteractive } = ctx.globals;

      const result = await ctx.withEngine(async (engine) => {
        const repo = engine.getRepository(ref);
        const approved = await confirm(
          `Delete repository ${repo.name}?`,
          'Its checkpoints, vectors and structural index are removed.',
          true,
          { yes, nonInteractive: nonInteractive || renderer.isJson },
        );
        if (!approved) return { repoId: repo.id, deleted: false };
        return { repoId: repo.id, deleted: await engine.deleteRepository(repo.id) };
      });

      renderer.render(result, () => {
        console.log(
          result.deleted
            ? pc.green(`Deleted repository ${result.repoId}.`)
            : pc.yellow('Deletion not confirmed; pass --yes to skip the prompt.'),
        );
      });
      if (!result.deleted) ctx.exitCode = 1;
    });
}
