import type { ChunkKind, ChunkNode, OrmField } from '@repoindex/shared';
import { isDocumentChunk } from './documents';

export interface GraphNode {
  id: string;
  name: string;
  filePath: string;
  kind: ChunkKind;
  startLine: number;
  endLine: number;
  language: string;
  isOrmModel: boolean;
}

export interface GraphEdge {
  from: string;
  to: string;
  /** The call name that resolved to `to` */
  callName: string;
}

export interface DependencyGraph {
  nodes: GraphNode[];
  edges: GraphEdge[];
}

export interface GraphOptions {
  /** Only chunks whose path starts with this prefix become nodes */
  filePrefix?: string;
}

export interface OrmModelSummary {
  name: string;
  filePath: string;
  startLine: number;
  fields: OrmField[];
}

const ANONYMOUS = '<anonymous>';

function compareNodes(a: GraphNode, b: GraphNode): number {
  if (a.filePath !== b.filePath) return a.filePath < b.filePath ? -1 : 1;
  if (a.startLine !== b.startLine) return a.startLine - b.startLine;
  if (a.id === b.id) return 0;
  return a.id < b.id ? -1 : 1;
}

function toNode(chunk: ChunkNode): GraphNode {
  return {
    id: chunk.id,
    name: chunk.name,
    filePath: chunk.filePath,
    kind: chunk.kind,
    startLine: chunk.startLine,
    endLine: chunk.endLine,
    language: chunk.language,
    isOrmModel: chunk.isOrmModel,
  };
}

/**
 * Call graph over a chunk set, resolved purely by symbol name. Two
 * functions with the same name in unrelated files both become targets of
 * a call to that name; imports, scopes and dynamic dispatch are not
 * considered. Calls that match no chunk are dropped. Documentation and
 * config chunks are not part of the graph.
 */
export function buildDependencyGraph(
  chunks: readonly ChunkNode[],
  options: GraphOptions = {},
): DependencyGraph {
  const prefix = options.filePrefix;
  const selected = chunks.filter(
    (c) => !isDocumentChunk(c) && (!prefix || c.filePath.startsWith(prefix)),
  );

  // Fragments share a name; only the first part is a call target.
  const nameIndex = new Map<string, ChunkNode[]>();
  for (const chunk of selected) {
    if (chunk.name === ANONYMOUS || (chunk.partIndex !== null && chunk.partIndex > 0)) continue;
    const bucket = nameIndex.get(chunk.name);
    if (bucket) {
      bucket.push(chunk);
    } else {
      nameIndex.set(chunk.name, [chunk]);
    }
  }

  const byId = new Map(selected.map((c): [string, ChunkNode] => [c.id, c]));
  const nodes = [...byId.values()].map(toNode).sort(compareNodes);
  const edges: GraphEdge[] = [];
  const seen = new Set<string>();

  for (const node of nodes) {
    const chunk = byId.get(node.id);
    if (!chunk) continue;
    for (const callName of chunk.calls) {
      for (const target of nameIndex.get(callName) ?? []) {
        if (target.id === chunk.id) continue;
        const key = `${chunk.id}->${target.id}`;
        if (seen.has(key)) continue;
        seen.add(key);
        edges.push({ from: chunk.id, to: target.id, callName });
      }
    }
  }

  return { nodes, edges };
}

export function getOrmModels(chunks: readonly ChunkNode[]): OrmModelSummary[] {
  return chunks
    .filter((c) => c.isOrmModel && (c.partIndex === null || c.partIndex === 0))
    .map((c) => ({ name: c.name, filePath: c.filePath, startLine: c.startLine, fields: c.ormFields }));
}
