import { Command } from 'commander';
import pc from 'picocolors';
import type { CliContext } from '../context';

export function registerModelsCommand(program: Command, ctx: CliContext) {
  program
    .command('models <ref>')
    .description('List ORM model classes and their column fields')
    .action(async (ref: string) => {
      const models = await ctx.withEngine((engine) => engine.getOrmModels(ref));

      ctx.renderer().render(models, () => {
        if (models.length === 0) {
          console.log('No ORM models found.');
          return;
        }
        for (const model of models) {
          console.log(`${pc.bold(model.name)} ${pc.gray(`(${model.filePath}:${model.startLine})`)}`);
          for (const field of model.fields) {
            const flags = [
              field.primaryKey ? 'pk' : null,
              field.nullable ? 'nullable' : null,
              field.foreignKey ? `-> ${field.foreignKey}` : null,
            ].filter((flag): flag is string => flag !== null);
            console.log(`  ${field.name}: ${field.columnType}${flags.length > 0 ? ` ${pc.gray(flags.join(', '))}` : ''}`);
          }
        }
      });
    });
}
