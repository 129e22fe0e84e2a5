import path from 'node:path';
import type Parser from 'tree-sitter';
import type { ChunkKind, ChunkNode, OrmField } from '@repoindex/shared';
import { DEFAULT_ORM_BASE_CLASSES } from '@repoindex/shared';
import { parseSource, type SupportedLanguage } from '../tree-sitter';
import { computeChunkId } from './chunk-id';
import {
  IDENTIFIER_TYPES,
  LANGUAGE_TABLES,
  MEMBER_ACCESS_FIELDS,
  RECEIVER_KEYWORDS,
  ROOT_NODE_TYPES,
  type LanguageTable,
} from './languages';

type SyntaxNode = Parser.SyntaxNode;

export interface SourceFile {
  /** Repository-relative, forward slashes */
  filePath: string;
  content: string;
  fileHash: string;
  language: SupportedLanguage;
}

export interface ExtractorOptions {
  ormBaseClasses?: readonly string[];
  parseTimeoutMs?: number;
}

export interface ExtractionResult {
  chunks: ChunkNode[];
  /** Syntax errors the grammar recovered from */
  errorsCount: number;
}

interface UnitContext {
  file: SourceFile;
  table: LanguageTable;
  ormPatterns: RegExp[];
  chunks: ChunkNode[];
}

const ANONYMOUS = '<anonymous>';
const CONSTANT_NAME = /^[A-Z][A-Z0-9_]*$/;
const FUNCTION_VALUES = new Set([
  'arrow_function',
  'function_expression',
  'function',
  'generator_function',
]);
const COLUMN_DEFINITION =
  /^(\w+)\s*(?::[^=]+)?=\s*(?:[\w.]+\.)?(?:Column|mapped_column)\(([\s\S]*)\)\s*$/;
const FOREIGN_KEY = /ForeignKey\(\s*["']([^"']+)["']/;
const QUOTED_STRING = /^[rRbBuUfF]*("""|'''|"|')([\s\S]*)\1$/;

function escapeRegExp(value: string): string {
  return value.replace(/[.*+?^${}()|[\]\\]/g, '\\$&');
}

function byCodeUnit(a: string, b: string): number {
  if (a === b) return 0;
  return a < b ? -1 : 1;
}

function lineCount(content: string): number {
  const lines = content.split('\n').length;
  return content.endsWith('\n') ? lines - 1 : lines;
}

/**
 * Turns one source file into chunk candidates: functions, classes, methods
 * and their per-language equivalents, in document order.
 */
export class SyntaxChunkExtractor {
  private readonly ormPatterns: RegExp[];
  private readonly parseTimeoutMs?: number;

  constructor(options: ExtractorOptions = {}) {
    const bases = options.ormBaseClasses ?? DEFAULT_ORM_BASE_CLASSES;
    this.ormPatterns = bases.map((base) => new RegExp(`\\b${escapeRegExp(base)}\\b`));
    this.parseTimeoutMs = options.parseTimeoutMs;
  }

  extract(file: SourceFile): ExtractionResult {
    if (file.content.trim().length === 0) {
      return { chunks: [], errorsCount: 0 };
    }

    const { tree, errorsCount } = parseSource(file.content, file.filePath, {
      languageHint: file.language,
      timeoutMs: this.parseTimeoutMs,
    });

    const ctx: UnitContext = {
      file,
      table: LANGUAGE_TABLES[file.language],
      ormPatterns: this.ormPatterns,
      chunks: [],
    };
    this.visitChildren(ctx, tree.rootNode, null);

    if (ctx.chunks.length === 0) {
      ctx.chunks.push(this.moduleChunk(file));
    }
    return { chunks: ctx.chunks, errorsCount };
  }

  private visitChildren(ctx: UnitContext, node: SyntaxNode, parent: ChunkNode | null): void {
    for (const child of node.namedChildren) {
      this.visit(ctx, child, parent);
    }
  }

  private visit(ctx: UnitContext, node: SyntaxNode, parent: ChunkNode | null): void {
    const { table } = ctx;
    const unitKind = table.units[node.type];

    if (unitKind !== undefined) {
      const kind = parent && unitKind === 'function' ? 'method' : unitKind;
      const chunk = this.toChunk(ctx, node, kind, this.unitName(node), parent);
      ctx.chunks.push(chunk);
      if (table.containers.has(node.type)) {
        this.visitChildren(ctx, node.childForFieldName('body') ?? node, chunk);
      }
      return;
    }

    if (parent === null && this.isModuleLevel(node)) {
      if (table.functionDeclarations.has(node.type) && this.visitDeclaration(ctx, node)) {
        return;
      }
      if (table.constantDeclarations.has(node.type)) {
        const name = this.constantName(node);
        if (name !== null) {
          ctx.chunks.push(this.toChunk(ctx, node, 'constant', name, null));
          return;
        }
      }
    }

    this.visitChildren(ctx, node, parent);
  }

  /**
   * `const handler = () => ...` at module level. Returns false when no
   * declarator holds a function value.
   */
  private visitDeclaration(ctx: UnitContext, node: SyntaxNode): boolean {
    const declarators = node.namedChildren.filter((c) => c.type === 'variable_declarator');
    const functions = declarators.filter((d) => {
      const value = d.childForFieldName('value');
      return value !== null && FUNCTION_VALUES.has(value.type);
    });
    if (functions.length !== 1 || declarators.length !== 1) {
      return false;
    }
    const name = functions[0].childForFieldName('name')?.text ?? ANONYMOUS;
    ctx.chunks.push(this.toChunk(ctx, node, 'function', name, null));
    return true;
  }

  private isModuleLevel(node: SyntaxNode): boolean {
    let current = node.parent;
    while (current !== null && this.isWrapperLike(current)) {
      current = current.parent;
    }
    return current !== null && ROOT_NODE_TYPES.has(current.type);
  }

  private isWrapperLike(node: SyntaxNode): boolean {
    return node.type === 'export_statement' || node.type === 'decorated_definition';
  }

  private constantName(node: SyntaxNode): string | null {
    if (node.type === 'expression_statement') {
      const assignment = node.firstNamedChild;
      if (assignment?.type !== 'assignment') return null;
      const left = assignment.childForFieldName('left');
      return left?.type === 'identifier' && CONSTANT_NAME.test(left.text) ? left.text : null;
    }

    const declarators = node.namedChildren.filter((c) => c.type === 'variable_declarator');
    if (declarators.length !== 1) return null;
    const nameNode = declarators[0].childForFieldName('name');
    return nameNode?.type === 'identifier' && CONSTANT_NAME.test(nameNode.text)
      ? nameNode.text
      : null;
  }

  private unitName(node: SyntaxNode): string {
    if (node.type === 'type_declaration') {
      const spec = node.namedChildren.find((c) => c.type === 'type_spec');
      return spec?.childForFieldName('name')?.text ?? ANONYMOUS;
    }
    if (node.type === 'impl_item') {
      const implemented = node.childForFieldName('type');
      if (implemented) return implemented.text;
    }

    const named = node.childForFieldName('name');
    if (named) return named.text;

    const identifier = node.namedChildren.find((c) => IDENTIFIER_TYPES.has(c.type));
    return identifier?.text ?? ANONYMOUS;
  }

  private refineKind(node: SyntaxNode, kind: ChunkKind): ChunkKind {
    if (node.type !== 'type_declaration') return kind;
    const spec = node.namedChildren.find((c) => c.type === 'type_spec');
    const shape = spec?.childForFieldName('type')?.type;
    if (shape === 'struct_type') return 'struct';
    if (shape === 'interface_type') return 'interface';
    return kind;
  }

  private toChunk(
    ctx: UnitContext,
    node: SyntaxNode,
    kind: ChunkKind,
    name: string,
    parent: ChunkNode | null,
  ): ChunkNode {
    const { file, table } = ctx;
    const refinedKind = this.refineKind(node, kind);
    const startLine = node.startPosition.row + 1;
    const endLine = node.endPosition.row + 1;
    const { isOrmModel, ormFields } = this.detectOrmModel(ctx, node, refinedKind);

    const identity = {
      filePath: file.filePath,
      kind: refinedKind,
      name,
      startLine,
      endLine,
      partIndex: null,
      fileHash: file.fileHash,
    };

    return {
      id: computeChunkId(identity),
      ...identity,
      language: file.language,
      content: file.content.slice(node.startIndex, node.endIndex),
      calls: this.extractCalls(table, node),
      decorators: this.extractDecorators(table, node),
      parentName: parent?.name ?? this.receiverName(node),
      docstring: this.extractDocstring(ctx, node),
      isOrmModel,
      ormFields,
      partCount: null,
    };
  }

  /** Go methods name their owner in the receiver. */
  private receiverName(node: SyntaxNode): string | null {
    if (node.type !== 'method_declaration') return null;
    const receiver = node.childForFieldName('receiver');
    if (!receiver) return null;
    const identifiers = receiver.descendantsOfType('type_identifier');
    return identifiers.length > 0 ? identifiers[0].text : null;
  }

  /**
   * Final identifier of every call target in the unit. Member units of a
   * container are skipped; they carry their own calls.
   */
  private extractCalls(table: LanguageTable, unit: SyntaxNode): string[] {
    const calls = new Set<string>();
    const isContainer = table.containers.has(unit.type);

    const walk = (node: SyntaxNode): void => {
      const calleeField = table.calls[node.type];
      if (calleeField !== undefined) {
        const callee = node.childForFieldName(calleeField);
        const name = callee ? this.finalIdentifier(callee) : null;
        if (name !== null && !RECEIVER_KEYWORDS.has(name)) {
          calls.add(name);
        }
      }
      for (const child of node.namedChildren) {
        if (isContainer && (table.units[child.type] !== undefined || table.wrappers.has(child.type))) {
          continue;
        }
        walk(child);
      }
    };
    walk(unit);

    return [...calls].sort(byCodeUnit);
  }

  private finalIdentifier(node: SyntaxNode): string | null {
    if (IDENTIFIER_TYPES.has(node.type)) {
      return node.text;
    }
    const field = MEMBER_ACCESS_FIELDS[node.type];
    if (field !== undefined) {
      const target = node.childForFieldName(field);
      return target ? this.finalIdentifier(target) : null;
    }
    if (node.type === 'generic_type' && node.firstNamedChild) {
      return this.finalIdentifier(node.firstNamedChild);
    }
    return null;
  }

  private extractDecorators(table: LanguageTable, unit: SyntaxNode): string[] {
    const decorators: string[] = [];
    const collect = (node: SyntaxNode): void => {
      for (const child of node.namedChildren) {
        if (table.decorators.has(child.type)) {
          decorators.push(child.text.trim());
        } else if (child.type === 'modifiers') {
          collect(child);
        }
      }
    };

    const wrapper = unit.parent && table.wrappers.has(unit.parent.type) ? unit.parent : null;
    if (wrapper) collect(wrapper);
    collect(unit);

    if (table.leadingAttributes.size > 0) {
      const leading: string[] = [];
      let sibling = unit.previousNamedSibling;
      while (sibling && table.leadingAttributes.has(sibling.type)) {
        leading.unshift(sibling.text.trim());
        sibling = sibling.previousNamedSibling;
      }
      decorators.unshift(...leading);
    }
    return decorators;
  }

  private extractDocstring(ctx: UnitContext, unit: SyntaxNode): string | null {
    if (ctx.file.language === 'python') {
      return this.pythonDocstring(unit);
    }
    if (ctx.table.comments.size === 0) return null;

    const anchor = unit.parent && ctx.table.wrappers.has(unit.parent.type) ? unit.parent : unit;
    const lines: string[] = [];
    let expectedEndRow = anchor.startPosition.row - 1;
    let sibling = anchor.previousNamedSibling;
    while (sibling && ctx.table.leadingAttributes.has(sibling.type)) {
      expectedEndRow = sibling.startPosition.row - 1;
      sibling = sibling.previousNamedSibling;
    }
    while (
      sibling &&
      ctx.table.comments.has(sibling.type) &&
      sibling.endPosition.row === expectedEndRow
    ) {
      lines.unshift(sibling.text);
      expectedEndRow = sibling.startPosition.row - 1;
      sibling = sibling.previousNamedSibling;
    }
    return cleanComment(lines.join('\n'));
  }

  private pythonDocstring(unit: SyntaxNode): string | null {
    const body = unit.childForFieldName('body');
    const first = body?.firstNamedChild;
    if (first?.type !== 'expression_statement') return null;
    const literal = first.firstNamedChild;
    if (literal?.type !== 'string') return null;
    const match = QUOTED_STRING.exec(literal.text);
    const text = match ? match[2].trim() : '';
    return text.length > 0 ? text : null;
  }

  private detectOrmModel(
    ctx: UnitContext,
    node: SyntaxNode,
    kind: ChunkKind,
  ): { isOrmModel: boolean; ormFields: OrmField[] } {
    if (kind !== 'class') return { isOrmModel: false, ormFields: [] };

    const baseList = ctx.table.baseListField
      ? node.childForFieldName(ctx.table.baseListField)
      : (node.namedChildren.find((c) => c.type === 'class_heritage') ?? null);
    if (!baseList || !ctx.ormPatterns.some((pattern) => pattern.test(baseList.text))) {
      return { isOrmModel: false, ormFields: [] };
    }

    const ormFields: OrmField[] = [];
    const body = node.childForFieldName('body');
    for (const statement of body?.namedChildren ?? []) {
      const field = parseColumnDefinition(statement.text);
      if (field) ormFields.push(field);
    }
    return { isOrmModel: true, ormFields };
  }

  private moduleChunk(file: SourceFile): ChunkNode {
    const identity = {
      filePath: file.filePath,
      kind: 'module' as const,
      name: path.posix.basename(file.filePath),
      startLine: 1,
      endLine: lineCount(file.content),
      partIndex: null,
      fileHash: file.fileHash,
    };
    return {
      id: computeChunkId(identity),
      ...identity,
      language: file.language,
      content: file.content,
      calls: [],
      decorators: [],
      parentName: null,
      docstring: null,
      isOrmModel: false,
      ormFields: [],
      partCount: null,
    };
  }
}

/** `id = Column(Integer, primary_key=True)` and the `mapped_column` form. */
export function parseColumnDefinition(text: string): OrmField | null {
  const match = COLUMN_DEFINITION.exec(text.trim());
  if (!match) return null;

  const [, name, args] = match;
  const typeMatch = /^\s*(\w+)/.exec(args);
  const foreignKey = FOREIGN_KEY.exec(args);
  const primaryKey = /primary_key\s*=\s*True/.test(args);
  return {
    name,
    columnType: typeMatch && typeMatch[1] !== 'ForeignKey' ? typeMatch[1] : 'Unknown',
    primaryKey,
    nullable: !primaryKey && !/nullable\s*=\s*False/.test(args),
    foreignKey: foreignKey ? foreignKey[1] : null,
  };
}

function cleanComment(raw: string): string | null {
  const text = raw
    .split('\n')
    .map((line) =>
      line
        .trim()
        .replace(/^\/\*\*?/, '')
        .replace(/\*\/$/, '')
        .replace(/^\/\/\/?/, '')
        .replace(/^\*(?!\/)/, '')
        .trim(),
    )
    .filter((line) => line.length > 0)
    .join('\n');
  return text.length > 0 ? text : null;
}
