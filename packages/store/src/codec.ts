import { z } from 'zod';
import { StoreError, type ChunkNode, type StructuralIndex } from '@repoindex/shared';

const ChunkKindSchema = z.enum([
  'function',
  'method',
  'class',
  'interface',
  'struct',
  'enum',
  'trait',
  'impl',
  'type',
  'constant',
  'module',
  'section',
  'config',
]);

const OrmFieldSchema = z.object({
  name: z.string(),
  columnType: z.string(),
  primaryKey: z.boolean(),
  nullable: z.boolean(),
  foreignKey: z.string().nullable(),
});

export const ChunkNodeSchema: z.ZodType<ChunkNode> = z.object({
  id: z.string(),
  filePath: z.string(),
  kind: ChunkKindSchema,
  name: z.string(),
  language: z.string(),
  startLine: z.number().int(),
  endLine: z.number().int(),
  content: z.string(),
  calls: z.array(z.string()),
  decorators: z.array(z.string()),
  parentName: z.string().nullable(),
  docstring: z.string().nullable(),
  isOrmModel: z.boolean(),
  ormFields: z.array(OrmFieldSchema),
  partIndex: z.number().int().nullable(),
  partCount: z.number().int().nullable(),
  fileHash: z.string(),
});

export const StructuralIndexSchema: z.ZodType<StructuralIndex> = z.record(
  z.object({
    language: z.string(),
    functions: z.array(z.string()),
    classes: z.array(z.string()),
    constants: z.array(z.string()),
  }),
);

export const ChunkIdListSchema = z.array(z.string());

/**
 * Parses a JSON column, failing with a StoreError that names the column.
 */
export function decodeJson<T>(schema: z.ZodType<T>, text: string, column: string): T {
  let raw: unknown;
  try {
    raw = JSON.parse(text);
  } catch (error) {
    throw new StoreError(`Corrupt JSON in ${column}`, { cause: error });
  }
  const result = schema.safeParse(raw);
  if (!result.success) {
    throw new StoreError(`Unexpected shape in ${column}: ${result.error.issues[0]?.message}`, {
      cause: result.error,
    });
  }
  return result.data;
}
