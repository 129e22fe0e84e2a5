import { Command } from 'commander';
import pc from 'picocolors';
import type { CliContext } from '../context';

export function registerStructureCommand(program: Command, ctx: CliContext) {
  program
    .command('structure <ref>')
    .description('Print the per-file structural index')
    .action(async (ref: string) => {
      const index = await ctx.withEngine(async (engine) => engine.getStructuralIndex(ref));

      ctx.renderer().render(index, () => {
        const files = Object.keys(index).sort();
        if (files.length === 0) {
          console.log('Structural index is empty.');
          return;
        }
        for (const filePath of files) {
          const entry = index[filePath];
          console.log(`${pc.bold(filePath)} ${pc.gray(`(${entry.language})`)}`);
          if (entry.classes.length > 0) console.log(`  classes: ${entry.classes.join(', ')}`);
          if (entry.functions.length > 0) console.log(`  functions: ${entry.functions.join(', ')}`);
          if (entry.constants.length > 0) console.log(`  constants: ${entry.constants.join(', ')}`);
        }
      });
    });
}
