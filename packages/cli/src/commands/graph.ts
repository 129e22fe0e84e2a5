import { Command } from 'commander';
import pc from 'picocolors';
import type { CliContext } from '../context';

export function registerGraphCommand(program: Command, ctx: CliContext) {
  program
    .command('graph <ref>')
    .description('Print the call graph resolved from chunk call names')
    .option('--prefix <path>', 'Only include files under this path prefix')
    .action(async (ref: string, options: { prefix?: string }) => {
      const graph = await ctx.withEngine((engine) => engine.getDependencyGraph(ref, options.prefix));

      ctx.renderer().render(graph, () => {
        const byId = new Map(graph.nodes.map((n) => [n.id, n]));
        console.log(`${graph.nodes.length} node(s), ${graph.edges.length} edge(s)`);
        for (const edge of graph.edges) {
          const from = byId.get(edge.from);
          const to = byId.get(edge.to);
          if (!from || !to) continue;
          console.log(
            `  ${from.name} ${pc.gray(`(${from.filePath}:${from.startLine})`)} -> ${to.name} ${pc.gray(`(${to.filePath}:${to.startLine})`)}`,
          );
        }
      });
    });
}
