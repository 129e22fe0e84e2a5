import { Command } from 'commander';
import pc from 'picocolors';
import type { CliContext } from '../context';

export function registerChunksCommand(program: Command, ctx: CliContext) {
  program
    .command('chunks <ref> <ids...>')
    .description('Print stored chunks by id')
    .action(async (ref: string, ids: string[]) => {
      const chunks = await ctx.withEngine((engine) => engine.getChunks(ref, ids));

      ctx.renderer().render(chunks, () => {
        for (const chunk of chunks) {
          console.log(
            pc.bold(`${chunk.filePath}:${chunk.startLine}-${chunk.endLine} ${chunk.kind} ${chunk.name}`),
          );
          console.log('---');
          console.log(chunk.content);
          console.log('---\n');
        }
        const missing = ids.length - chunks.length;
        if (missing > 0) console.log(pc.yellow(`${missing} id(s) not found.`));
      });
    });
}
