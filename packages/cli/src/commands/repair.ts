import { Command } from 'commander';
import pc from 'picocolors';
import type { CliContext } from '../context';

export function registerRepairCommand(program: Command, ctx: CliContext) {
  program
    .command('repair <ref>')
    .description('Reconcile checkpoints with the vector store')
    .option('--rederive', 'Rebuild checkpoints from stored chunk metadata', false)
    .action(async (ref: string, options: { rederive?: boolean }) => {
      // a queued resync is awaited so the engine is not closed under it
      const report = await ctx.withEngine(async (engine) => {
        const result = await engine.repair(ref, { rederive: Boolean(options.rederive) });
        if (result.resyncTaskId) await engine.waitForTask(result.resyncTaskId);
        return result;
      });

      ctx.renderer().render(report, () => {
        console.log(`Checked ${report.checkedFiles} file(s) in ${report.mode} mode.`);
        if (report.inconsistentFiles.length === 0) {
          console.log(pc.green('Checkpoints and vectors agree.'));
        } else {
          console.log(pc.yellow(`Inconsistent: ${report.inconsistentFiles.join(', ')}`));
        }
        console.log(`Orphaned chunks removed: ${report.orphanedChunksRemoved}`);
        if (report.mode === 'rederive') {
          console.log(`Checkpoints re-derived: ${report.checkpointsRederived}`);
        }
        if (report.resyncTaskId) console.log(`Resync task: ${report.resyncTaskId}`);
      });
    });
}
