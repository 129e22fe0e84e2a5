import { Command } from 'commander';
import pc from 'picocolors';
import { UsageError } from '@repoindex/shared';
import type { CliContext } from '../context';

export function parseTopK(value: string): number {
  const topK = Number(value);
  if (!Number.isInteger(topK) || topK < 1) {
    throw new UsageError(`-k must be a positive integer, got ${value}`);
  }
  return topK;
}

export function registerSearchCommand(program: Command, ctx: CliContext) {
  program
    .command('search <ref> <query>')
    .description('Semantic search over the chunks of an indexed repository')
    .option('-k, --top-k <k>', 'Number of results to return', '10')
    .action(async (ref: string, query: string, options: { topK: string }) => {
      const topK = parseTopK(options.topK);
      const hits = await ctx.withEngine((engine) => engine.searchText(ref, query, topK));

      ctx.renderer().render(hits, () => {
        if (hits.length === 0) {
          console.log('No results found.');
          return;
        }
        for (const hit of hits) {
          console.log(
            `${pc.bold(`${hit.filePath}:${hit.startLine}-${hit.endLine}`)} ${hit.kind} ${hit.name} ${pc.gray(`(score: ${hit.score.toFixed(4)})`)}`,
          );
        }
      });
    });
}
